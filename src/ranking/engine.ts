/**
 * POLICY POOL - Rating Engine
 *
 * Live name -> rating mapping for the tournament. The pool registers policies
 * here, seeds their starting ratings and flushes its score ledger through
 * `update()` in one batched call per rank cycle.
 *
 * Anchors are fixed reference points: they take part in placement (so other
 * policies are measured against them) but their own rating never moves.
 */

import {
  ANCHOR_SIGMA,
  DEFAULT_MU,
  DEFAULT_SIGMA,
  betaFor,
  createRating,
  placementsFromSamples,
  tauFor,
  updateFfa,
  type Rating,
} from './trueskill';

export interface RatingEngine {
  /** Live ratings, directly settable to seed values after registration. */
  readonly ratings: Map<string, Rating>;

  /** Register a normal competitor at the engine's default rating. */
  addPolicy(name: string): void;

  /** Register a fixed, non-updating reference point. */
  setAnchor(name: string): void;

  /** The rating `setAnchor` assigns. */
  anchorRating(): Rating;

  isAnchor(name: string): boolean;

  /**
   * Recompute ratings from per-name outcome samples.
   * `samples[i]` belongs to `names[i]`.
   */
  update(names: string[], samples: number[][]): void;
}

export interface TrueSkillOptions {
  mu?: number;
  anchorMu?: number;
  sigma?: number;
  anchorSigma?: number;
}

export class TrueSkillRatingEngine implements RatingEngine {
  readonly ratings = new Map<string, Rating>();

  private readonly anchors = new Set<string>();
  private readonly mu: number;
  private readonly anchorMu: number;
  private readonly sigma: number;
  private readonly anchorSigma: number;

  constructor(options: TrueSkillOptions = {}) {
    this.mu = options.mu ?? DEFAULT_MU;
    this.anchorMu = options.anchorMu ?? this.mu;
    this.sigma = options.sigma ?? DEFAULT_SIGMA;
    this.anchorSigma = options.anchorSigma ?? ANCHOR_SIGMA;
  }

  addPolicy(name: string): void {
    this.anchors.delete(name);
    this.ratings.set(name, createRating(this.mu, this.sigma));
  }

  setAnchor(name: string): void {
    this.anchors.add(name);
    this.ratings.set(name, this.anchorRating());
  }

  anchorRating(): Rating {
    return createRating(this.anchorMu, this.anchorSigma);
  }

  isAnchor(name: string): boolean {
    return this.anchors.has(name);
  }

  update(names: string[], samples: number[][]): void {
    if (names.length !== samples.length) {
      throw new Error(
        `Rating update needs one sample list per name (got ${names.length} names, ${samples.length} lists)`,
      );
    }

    // Unknown names join at the default rating
    for (const name of names) {
      if (!this.ratings.has(name)) this.addPolicy(name);
    }

    const placements = placementsFromSamples(names, samples, (name) => this.ratingOf(name));
    const updated = updateFfa(placements, betaFor(this.sigma), tauFor(this.sigma));

    for (const [name, rating] of updated) {
      if (this.anchors.has(name)) continue;
      this.ratings.set(name, rating);
    }
  }

  private ratingOf(name: string): Rating {
    return this.ratings.get(name) ?? createRating(this.mu, this.sigma);
  }
}
