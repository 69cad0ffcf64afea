/**
 * POLICY POOL - TrueSkill Rating Math
 *
 * TrueSkill models each policy's skill as a Gaussian (mu, sigma), where mu is
 * the estimated skill and sigma the uncertainty.
 *
 * A round of self-play evaluation is treated as a free-for-all: policies are
 * placed by their mean outcome and the N-player game is decomposed into
 * pairwise comparisons (1st beat 2nd..Nth, 2nd beat 3rd..Nth, and so on).
 *
 * Reference: Herbrich, Minka & Graepel (2006) "TrueSkill: A Bayesian Skill Rating System"
 */

// ─── Constants ────────────────────────────────────────────────────────────────

/** Default initial skill estimate (mu) for pool members. */
export const DEFAULT_MU = 1000;

/** Default initial uncertainty. */
export const DEFAULT_SIGMA = 100 / 3;

/** Sigma assigned to anchors; they are fixed reference points. */
export const ANCHOR_SIGMA = 0.001;

/** Number of sigma below mu for the conservative rating estimate. */
export const CONSERVATIVE_FACTOR = 3;

/** Performance variation factor for a given default sigma (sigma / 2). */
export function betaFor(sigma: number): number {
  return sigma / 2;
}

/** Dynamic factor for a given default sigma (sigma / 100). */
export function tauFor(sigma: number): number {
  return sigma / 100;
}

// ─── Gaussian Helpers ─────────────────────────────────────────────────────────

/**
 * Standard normal probability density function.
 */
export function normPdf(x: number): number {
  return Math.exp(-0.5 * x * x) / Math.sqrt(2 * Math.PI);
}

/**
 * Standard normal cumulative distribution function.
 * Uses the rational approximation by Abramowitz & Stegun.
 */
export function normCdf(x: number): number {
  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;

  const sign = x < 0 ? -1 : 1;
  x = Math.abs(x) / Math.SQRT2;

  const t = 1.0 / (1.0 + p * x);
  const y = 1.0 - ((((a5 * t + a4) * t + a3) * t + a2) * t + a1) * t * Math.exp(-x * x);

  return 0.5 * (1.0 + sign * y);
}

/**
 * v function (truncated Gaussian update factor for wins).
 * For no-draw games: v(t) = pdf(t) / cdf(t)
 */
export function vWin(t: number, epsilon: number = 0): number {
  const denom = normCdf(t - epsilon);
  if (denom < 1e-10) return -t + epsilon; // Limit behavior
  return normPdf(t - epsilon) / denom;
}

/**
 * w function (variance reduction factor for wins).
 */
export function wWin(t: number, epsilon: number = 0): number {
  const v = vWin(t, epsilon);
  return v * (v + t - epsilon);
}

// ─── Rating Type ──────────────────────────────────────────────────────────────

/** A TrueSkill rating represented as a Gaussian distribution. */
export interface Rating {
  /** Estimated skill (mean of the Gaussian). */
  mu: number;
  /** Uncertainty (standard deviation of the Gaussian). */
  sigma: number;
}

export function createRating(mu: number = DEFAULT_MU, sigma: number = DEFAULT_SIGMA): Rating {
  return { mu, sigma };
}

/**
 * Conservative skill estimate: mu - k * sigma.
 * This is the "display" rating used for leaderboards.
 */
export function conservativeRating(rating: Rating, k: number = CONSERVATIVE_FACTOR): number {
  return rating.mu - k * rating.sigma;
}

// ─── FFA (Free-For-All) Update ────────────────────────────────────────────────

/** A policy's identity and rating for an FFA update. */
export interface FfaPlayer {
  id: string;
  rating: Rating;
}

/**
 * Update ratings for a free-for-all game based on placement order.
 *
 * Players are ordered from 1st place (index 0) to last place (index N-1).
 * Each pairwise delta is scaled by 1/(N-1) so that a player taking part in
 * many comparisons is not over-updated.
 *
 * @param placements Players ordered by placement (index 0 = 1st place).
 * @param beta Performance variation factor.
 * @param tau Dynamic factor (sigma increase per game).
 * @returns Map of player ID -> updated Rating.
 */
export function updateFfa(
  placements: FfaPlayer[],
  beta: number = betaFor(DEFAULT_SIGMA),
  tau: number = tauFor(DEFAULT_SIGMA),
): Map<string, Rating> {
  const result = new Map<string, Rating>();
  const n = placements.length;
  if (n < 2) {
    for (const p of placements) result.set(p.id, p.rating);
    return result;
  }

  // Apply dynamic factor: increase sigma slightly before update
  const dynamic = placements.map((p) => ({
    id: p.id,
    rating: {
      mu: p.rating.mu,
      sigma: Math.sqrt(p.rating.sigma * p.rating.sigma + tau * tau),
    },
    muDelta: 0,
    sigmaFactor: 0,
  }));

  const scale = 1.0 / (n - 1);

  for (let i = 0; i < n - 1; i++) {
    for (let j = i + 1; j < n; j++) {
      const winner = dynamic[i];
      const loser = dynamic[j];

      const c = Math.sqrt(
        2 * beta * beta +
        winner.rating.sigma * winner.rating.sigma +
        loser.rating.sigma * loser.rating.sigma,
      );
      const t = (winner.rating.mu - loser.rating.mu) / c;

      const v = vWin(t);
      const w = wWin(t);

      winner.muDelta += scale * (winner.rating.sigma * winner.rating.sigma / c) * v;
      loser.muDelta -= scale * (loser.rating.sigma * loser.rating.sigma / c) * v;

      winner.sigmaFactor += scale * (winner.rating.sigma * winner.rating.sigma / (c * c)) * w;
      loser.sigmaFactor += scale * (loser.rating.sigma * loser.rating.sigma / (c * c)) * w;
    }
  }

  for (const p of dynamic) {
    const sigmaReduction = Math.min(p.sigmaFactor, 0.95);
    const newSigmaSq = p.rating.sigma * p.rating.sigma * (1 - sigmaReduction);

    result.set(p.id, {
      mu: p.rating.mu + p.muDelta,
      sigma: Math.sqrt(Math.max(newSigmaSq, 1e-6)),
    });
  }

  return result;
}

// ─── Outcome Processing ───────────────────────────────────────────────────────

function mean(values: number[]): number {
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Order policies by their mean outcome sample, best first.
 *
 * Names without samples take no part in the game. Equal means keep the
 * order in which the names were supplied.
 */
export function placementsFromSamples(
  names: string[],
  samples: number[][],
  ratingOf: (name: string) => Rating,
): FfaPlayer[] {
  const scored: Array<{ id: string; score: number; order: number }> = [];

  names.forEach((name, order) => {
    const outcomes = samples[order] ?? [];
    if (outcomes.length === 0) return;
    scored.push({ id: name, score: mean(outcomes), order });
  });

  scored.sort((a, b) => b.score - a.score || a.order - b.order);

  return scored.map((s) => ({ id: s.id, rating: ratingOf(s.id) }));
}
