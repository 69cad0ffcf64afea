#!/usr/bin/env tsx
/**
 * POLICY POOL - Ranking Tests
 *
 * Validates:
 *   - TrueSkill helpers and FFA updates
 *   - Placement ordering from outcome samples
 *   - Rating engine registration, anchors and batched updates
 *
 * Run: npx tsx tests/ranking.test.ts
 */

import {
  ANCHOR_SIGMA,
  DEFAULT_MU,
  DEFAULT_SIGMA,
  TrueSkillRatingEngine,
  conservativeRating,
  createRating,
  normCdf,
  placementsFromSamples,
  updateFfa,
} from '../src/ranking';
import { assert, assertApprox, assertEqual, assertThrows, finish, section } from './harness';

function testHelpers(): void {
  section('TrueSkill: Helpers');

  const r = createRating();
  assert(r.mu === DEFAULT_MU && r.sigma === DEFAULT_SIGMA, 'createRating uses pool defaults');
  assert(conservativeRating({ mu: 1000, sigma: 10 }) === 970, 'conservative = mu - 3 sigma');
  assertApprox(normCdf(0), 0.5, 1e-6, 'normCdf(0) is 0.5');
  assert(normCdf(3) > 0.99 && normCdf(-3) < 0.01, 'normCdf tails');
}

function testFfaTwoEqualPlayers(): void {
  section('TrueSkill: FFA Between Equals');

  const updated = updateFfa([
    { id: 'first', rating: createRating(25, 25 / 3) },
    { id: 'second', rating: createRating(25, 25 / 3) },
  ], 25 / 6, 25 / 300);

  const first = updated.get('first');
  const second = updated.get('second');
  assert(first !== undefined && second !== undefined, 'both players rated');
  if (!first || !second) return;

  assert(first.mu > 25, 'winner mu rises');
  assert(second.mu < 25, 'loser mu falls');
  assertApprox(first.mu - 25, 25 - second.mu, 1e-9, 'updates are symmetric between equals');
  assert(first.sigma < 25 / 3 && second.sigma < 25 / 3, 'uncertainty shrinks for both');
}

function testFfaSinglePlayer(): void {
  section('TrueSkill: FFA With One Player');

  const solo = updateFfa([{ id: 'solo', rating: createRating(900, 20) }]);
  assertEqual(solo.get('solo'), { mu: 900, sigma: 20 }, 'a lone player keeps its rating');
}

function testPlacements(): void {
  section('TrueSkill: Placements From Samples');

  const order = placementsFromSamples(
    ['a', 'b', 'c', 'd'],
    [[1, 3], [5], [], [2]],
    () => createRating(),
  ).map((p) => p.id);

  assertEqual(order, ['b', 'a', 'd'], 'ordered by mean outcome, empty sample lists excluded');

  const ties = placementsFromSamples(['x', 'y'], [[1], [1]], () => createRating()).map((p) => p.id);
  assertEqual(ties, ['x', 'y'], 'equal means keep supplied order');
}

function testEngineRegistration(): void {
  section('Engine: Registration');

  const engine = new TrueSkillRatingEngine({ mu: 1000, anchorMu: 800, sigma: 30 });
  engine.addPolicy('p');
  assertEqual(engine.ratings.get('p'), { mu: 1000, sigma: 30 }, 'competitor starts at defaults');

  engine.ratings.set('p', { mu: 1100, sigma: 12 });
  assertEqual(engine.ratings.get('p'), { mu: 1100, sigma: 12 }, 'ratings are directly settable');

  engine.setAnchor('a');
  assertEqual(engine.ratings.get('a'), { mu: 800, sigma: ANCHOR_SIGMA }, 'anchor uses anchor mu');
  assert(engine.isAnchor('a') && !engine.isAnchor('p'), 'anchor flag tracked');

  engine.addPolicy('a');
  assert(!engine.isAnchor('a'), 're-adding as competitor clears anchor flag');
}

function testEngineUpdate(): void {
  section('Engine: Batched Update');

  const engine = new TrueSkillRatingEngine({ mu: 1000, sigma: 100 / 3 });
  engine.addPolicy('strong');
  engine.addPolicy('weak');
  engine.addPolicy('idle');

  engine.update(['strong', 'weak'], [[1, 1, 0.5], [0, 0.25]]);

  const strong = engine.ratings.get('strong');
  const weak = engine.ratings.get('weak');
  assert(strong !== undefined && strong.mu > 1000, 'higher mean outcome raises mu');
  assert(weak !== undefined && weak.mu < 1000, 'lower mean outcome lowers mu');
  assertEqual(engine.ratings.get('idle'), { mu: 1000, sigma: 100 / 3 }, 'unscored policy untouched');

  engine.update(['newcomer', 'weak'], [[2], [1]]);
  assert(engine.ratings.has('newcomer'), 'unknown names join at the default rating');

  assertThrows(() => engine.update(['a', 'b'], [[1]]), Error, 'mismatched names and sample lists');
}

function testEngineAnchorFixed(): void {
  section('Engine: Anchors Never Move');

  const engine = new TrueSkillRatingEngine({ mu: 1000, anchorMu: 1000, sigma: 100 / 3 });
  engine.setAnchor('anchor');
  engine.addPolicy('challenger');

  engine.update(['anchor', 'challenger'], [[0], [1]]);

  assertEqual(engine.ratings.get('anchor'), { mu: 1000, sigma: ANCHOR_SIGMA }, 'anchor rating unchanged after a loss');
  const challenger = engine.ratings.get('challenger');
  assert(challenger !== undefined && challenger.mu > 1000, 'challenger gains against the anchor');
}

function runAllTests(): void {
  console.log('POLICY POOL - Ranking Tests');
  console.log('=========================');

  testHelpers();
  testFfaTwoEqualPlayers();
  testFfaSinglePlayer();
  testPlacements();
  testEngineRegistration();
  testEngineUpdate();
  testEngineAnchorFixed();

  finish('Ranking');
}

runAllTests();
