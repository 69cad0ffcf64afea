/**
 * POLICY POOL - Leaderboard
 *
 * Sorted listing of stored policies by current skill mean. Live ratings from
 * the tournament take precedence over the stored mu/sigma, which can lag
 * until the next rank update.
 */

import { conservativeRating, type Rating } from '../ranking';
import type { PolicyRecord } from './schemas';

export interface LeaderboardEntry {
  rank: number;
  name: string;
  mu: number;
  sigma: number;
  /** mu - 3 * sigma */
  conservative: number;
  episodes: number;
  tenured: boolean;
  anchor: boolean;
  architecture: string;
}

export interface RatingSource {
  readonly ratings: ReadonlyMap<string, Rating>;
  isAnchor(name: string): boolean;
}

export function buildLeaderboard(records: PolicyRecord[], source: RatingSource): LeaderboardEntry[] {
  const rows = records.map((record) => {
    const rating = source.ratings.get(record.name) ?? { mu: record.mu, sigma: record.sigma };
    return { record, rating };
  });

  rows.sort((a, b) => b.rating.mu - a.rating.mu || a.record.name.localeCompare(b.record.name));

  return rows.map(({ record, rating }, i) => ({
    rank: i + 1,
    name: record.name,
    mu: round3(rating.mu),
    sigma: round3(rating.sigma),
    conservative: round3(conservativeRating(rating)),
    episodes: record.episodes,
    tenured: record.tenured,
    anchor: source.isAnchor(record.name),
    architecture: record.architectureTag,
  }));
}

/** Fixed-width text table for terminal output. */
export function formatLeaderboard(entries: LeaderboardEntry[]): string {
  const header = ['#', 'Policy', 'Mu', 'Sigma', 'Conservative', 'Episodes', 'Flags'];
  const body = entries.map((e) => [
    String(e.rank),
    e.name,
    e.mu.toFixed(2),
    e.sigma.toFixed(2),
    e.conservative.toFixed(2),
    String(e.episodes),
    [e.tenured ? 'tenured' : '', e.anchor ? 'anchor' : ''].filter(Boolean).join(','),
  ]);

  const widths = header.map((h, col) => Math.max(h.length, ...body.map((row) => row[col].length)));
  const line = (cells: string[]) =>
    cells.map((cell, col) => cell.padEnd(widths[col])).join('  ').trimEnd();

  return [line(header), ...body.map(line)].join('\n');
}

function round3(n: number): number {
  return Math.round(n * 1000) / 1000;
}
