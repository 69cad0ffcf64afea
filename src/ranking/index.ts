/**
 * POLICY POOL - Ranking Module
 *
 * TrueSkill-based skill tracking for pool members. Each evaluation round is
 * scored as a free-for-all ordered by mean outcome per policy; anchors
 * provide fixed reference points.
 */

// Core TrueSkill math
export {
  createRating,
  conservativeRating,
  updateFfa,
  placementsFromSamples,
  normPdf,
  normCdf,
  vWin,
  wWin,
  betaFor,
  tauFor,
  DEFAULT_MU,
  DEFAULT_SIGMA,
  ANCHOR_SIGMA,
  CONSERVATIVE_FACTOR,
} from './trueskill';

export type { Rating, FfaPlayer } from './trueskill';

// Live tournament state
export { TrueSkillRatingEngine } from './engine';

export type { RatingEngine, TrueSkillOptions } from './engine';
