/**
 * POLICY POOL - Seedable randomness
 *
 * Roster sampling and parameter initialisation draw from an explicit
 * generator so that a fixed seed reproduces the same roster.
 */

export type Rng = () => number;

/**
 * Mulberry32 - fast deterministic PRNG returning floats in [0, 1).
 */
export function mulberry32(seed: number): Rng {
  let state = seed >>> 0;
  return function () {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Seeded generator when a seed is given, Math.random otherwise. */
export function createRng(seed?: number): Rng {
  return seed === undefined ? Math.random : mulberry32(seed);
}

/** Uniform choice with replacement. */
export function sampleWithReplacement<T>(items: readonly T[], count: number, rng: Rng): T[] {
  if (items.length === 0) {
    if (count === 0) return [];
    throw new RangeError('Cannot sample from an empty collection');
  }

  const picks: T[] = [];
  for (let i = 0; i < count; i++) {
    const idx = Math.min(Math.floor(rng() * items.length), items.length - 1);
    picks.push(items[idx]);
  }
  return picks;
}
