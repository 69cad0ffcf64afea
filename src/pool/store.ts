/**
 * POLICY POOL - Policy Store
 *
 * Durable repository of policy records keyed by unique name. The SQLite
 * implementation is synchronous (better-sqlite3), so every call completes
 * before returning.
 */

import {
  deletePolicyByName,
  getAllPolicies,
  getPolicyByName,
  getTenuredPolicies,
  getUntenuredPolicies,
  insertPolicy,
  openPolicyDatabase,
  updatePolicy,
  type PolicyDatabase,
  type PolicyRow,
} from '../db/schema';
import {
  NamingConflictError,
  PolicyNotFoundError,
  PolicyPoolError,
  StorageError,
} from './errors';
import { PolicyRecordSchema, toPolicyRecord, type PolicyRecord, type PolicyRecordInput } from './schemas';

export interface PolicyStore {
  /**
   * Insert a record. With `overwrite` an existing record of the same name is
   * replaced atomically; without it a NamingConflictError is raised.
   */
  add(record: PolicyRecordInput, overwrite?: boolean): PolicyRecord;
  getByName(name: string): PolicyRecord | null;
  getAll(): PolicyRecord[];
  getTenured(): PolicyRecord[];
  getUntenured(): PolicyRecord[];
  delete(name: string): boolean;
  /** Commit mu, sigma, episodes and metadata of an existing record. */
  update(record: PolicyRecordInput): PolicyRecord;
  /** Run `fn` atomically; any throw rolls back every write made inside it. */
  transaction<T>(fn: () => T): T;
  close(): void;
}

// ─── Row Mapping ──────────────────────────────────────────────────────────────

function parseMetadata(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new StorageError(`Corrupt metadata document: ${raw}`, err);
  }
}

function rowToRecord(row: PolicyRow): PolicyRecord {
  const candidate = {
    name: row.name,
    snapshotPath: row.snapshot_path,
    architectureTag: row.architecture_tag,
    mu: row.mu,
    sigma: row.sigma,
    episodes: row.episodes,
    metadata: parseMetadata(row.metadata),
  };
  const parsed = PolicyRecordSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new StorageError(`Stored policy '${row.name}' failed validation: ${parsed.error.message}`);
  }
  return toPolicyRecord(parsed.data);
}

// ─── SQLite Store ─────────────────────────────────────────────────────────────

export class SqlitePolicyStore implements PolicyStore {
  private readonly db: PolicyDatabase;

  constructor(db: PolicyDatabase) {
    this.db = db;
  }

  /** Open a store backed by the SQLite file at `path` (':memory:' for tests). */
  static open(path: string): SqlitePolicyStore {
    return new SqlitePolicyStore(guard(`open ${path}`, () => openPolicyDatabase(path)));
  }

  add(record: PolicyRecordInput, overwrite: boolean = false): PolicyRecord {
    const validated = toPolicyRecord(record);

    return this.transaction(() => {
      const existing = guard('lookup', () => getPolicyByName(this.db, validated.name));
      if (existing) {
        if (!overwrite) throw new NamingConflictError(validated.name);
        guard('delete', () => deletePolicyByName(this.db, validated.name));
      }

      guard('insert', () =>
        insertPolicy(this.db, {
          name: validated.name,
          snapshot_path: validated.snapshotPath,
          architecture_tag: validated.architectureTag,
          mu: validated.mu,
          sigma: validated.sigma,
          episodes: validated.episodes,
          metadata: JSON.stringify(validated.metadata),
        }),
      );
      return validated;
    });
  }

  getByName(name: string): PolicyRecord | null {
    const row = guard('lookup', () => getPolicyByName(this.db, name));
    return row ? rowToRecord(row) : null;
  }

  getAll(): PolicyRecord[] {
    return guard('list', () => getAllPolicies(this.db)).map(rowToRecord);
  }

  getTenured(): PolicyRecord[] {
    return guard('list tenured', () => getTenuredPolicies(this.db)).map(rowToRecord);
  }

  getUntenured(): PolicyRecord[] {
    return guard('list untenured', () => getUntenuredPolicies(this.db)).map(rowToRecord);
  }

  delete(name: string): boolean {
    return guard('delete', () => deletePolicyByName(this.db, name));
  }

  update(record: PolicyRecordInput): PolicyRecord {
    const validated = toPolicyRecord(record);
    const changed = guard('update', () =>
      updatePolicy(this.db, validated.name, {
        mu: validated.mu,
        sigma: validated.sigma,
        episodes: validated.episodes,
        metadata: JSON.stringify(validated.metadata),
      }),
    );
    if (!changed) throw new PolicyNotFoundError(validated.name);
    return validated;
  }

  transaction<T>(fn: () => T): T {
    // better-sqlite3 nests inner transactions as savepoints
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }
}

/** Run a database call, wrapping driver failures as StorageError. */
function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof PolicyPoolError) throw err;
    const detail = err instanceof Error ? err.message : String(err);
    throw new StorageError(`[PolicyStore] ${operation} failed: ${detail}`, err);
  }
}
