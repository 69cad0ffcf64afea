/**
 * POLICY POOL - SQLite Schema & Query Helpers
 *
 * Row types and prepared-statement helpers for the policy table. The pool is
 * a single-writer store; the WAL journal keeps the file crash-consistent but
 * gives no isolation between independent writer processes.
 */

import Database from 'better-sqlite3';

export type PolicyDatabase = Database.Database;

// ─── Row Types ───────────────────────────────────────────────────

export interface PolicyRow {
  id: number;
  name: string;
  snapshot_path: string;
  architecture_tag: string;
  mu: number;
  sigma: number;
  episodes: number;
  /** JSON document; carries at least `tenured`. */
  metadata: string;
}

export type NewPolicyRow = Omit<PolicyRow, 'id'>;

// ─── Connection ──────────────────────────────────────────────────

/**
 * Open (or create) the policy database at `path`. Pass ':memory:' for a
 * throwaway in-process database.
 */
export function openPolicyDatabase(path: string): PolicyDatabase {
  const db = new Database(path);
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  ensureTables(db);
  return db;
}

/**
 * Create the policies table if it does not exist.
 * Safe to call multiple times (idempotent).
 */
export function ensureTables(db: PolicyDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS policies (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      snapshot_path TEXT NOT NULL,
      architecture_tag TEXT NOT NULL,
      mu REAL NOT NULL,
      sigma REAL NOT NULL,
      episodes INTEGER NOT NULL DEFAULT 0,
      metadata TEXT NOT NULL DEFAULT '{}'
    )
  `);
}

// Same coercion as coerceFlag(): JSON true or 1, or the strings "true"/"1"/"1.0"/"yes"
const TENURED_SQL = `COALESCE(LOWER(TRIM(json_extract(metadata, '$.tenured'))) IN ('1', '1.0', 'true', 'yes'), 0)`;

// ─── Policy Queries ──────────────────────────────────────────────

export function insertPolicy(db: PolicyDatabase, row: NewPolicyRow): number {
  const result = db
    .prepare<[string, string, string, number, number, number, string]>(
      'INSERT INTO policies (name, snapshot_path, architecture_tag, mu, sigma, episodes, metadata) VALUES (?, ?, ?, ?, ?, ?, ?)',
    )
    .run(
      row.name,
      row.snapshot_path,
      row.architecture_tag,
      row.mu,
      row.sigma,
      row.episodes,
      row.metadata,
    );
  return Number(result.lastInsertRowid);
}

export function getPolicyByName(db: PolicyDatabase, name: string): PolicyRow | null {
  const row = db
    .prepare<[string], PolicyRow>('SELECT * FROM policies WHERE name = ?')
    .get(name);
  return row ?? null;
}

export function getAllPolicies(db: PolicyDatabase): PolicyRow[] {
  return db.prepare<[], PolicyRow>('SELECT * FROM policies ORDER BY id ASC').all();
}

export function getTenuredPolicies(db: PolicyDatabase): PolicyRow[] {
  return db
    .prepare<[], PolicyRow>(`SELECT * FROM policies WHERE ${TENURED_SQL} = 1 ORDER BY id ASC`)
    .all();
}

export function getUntenuredPolicies(db: PolicyDatabase): PolicyRow[] {
  return db
    .prepare<[], PolicyRow>(`SELECT * FROM policies WHERE ${TENURED_SQL} = 0 ORDER BY id ASC`)
    .all();
}

export function deletePolicyByName(db: PolicyDatabase, name: string): boolean {
  const result = db.prepare<[string]>('DELETE FROM policies WHERE name = ?').run(name);
  return result.changes > 0;
}

/** Returns false when no row with that name exists. */
export function updatePolicy(
  db: PolicyDatabase,
  name: string,
  fields: Pick<PolicyRow, 'mu' | 'sigma' | 'episodes' | 'metadata'>,
): boolean {
  const result = db
    .prepare<[number, number, number, string, string]>(
      'UPDATE policies SET mu = ?, sigma = ?, episodes = ?, metadata = ? WHERE name = ?',
    )
    .run(fields.mu, fields.sigma, fields.episodes, fields.metadata, name);
  return result.changes > 0;
}
