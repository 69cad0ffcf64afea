/**
 * POLICY POOL - Sample Partition
 *
 * Splits a fixed-size evaluation batch across roster slots in proportion to
 * integer sample weights. Assignment is interleaved in cycles of
 * `sum(weights)` indices rather than in contiguous blocks:
 *
 *   weights [3, 1], batch 8 -> pattern [0, 0, 0, 1]
 *   slot 0: 0 1 2 4 5 6
 *   slot 1: 3 7
 */

import { ConfigurationError } from './errors';

export interface SamplePartition {
  /** `indices[slot]` lists the batch indices that slot handles, ascending. */
  readonly indices: readonly (readonly number[])[];
  /** 1 where the learner (slot 0) handles the sample, 0 elsewhere. */
  readonly learnerMask: readonly number[];
  readonly batchSize: number;
}

/**
 * Check weights and batch size against the roster size.
 * Throws ConfigurationError on the first problem found.
 */
export function validatePartitionConfig(
  batchSize: number,
  sampleWeights: readonly number[],
  activePolicies: number,
): void {
  if (!Number.isInteger(activePolicies) || activePolicies < 1) {
    throw new ConfigurationError(`active policies must be a positive integer (got ${activePolicies})`);
  }
  if (sampleWeights.length !== activePolicies) {
    throw new ConfigurationError(
      `sample weights length ${sampleWeights.length} does not match ${activePolicies} active policies`,
    );
  }
  for (const weight of sampleWeights) {
    if (!Number.isInteger(weight) || weight < 1) {
      throw new ConfigurationError(`sample weights must be positive integers (got ${weight})`);
    }
  }
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ConfigurationError(`evaluation batch size must be a positive integer (got ${batchSize})`);
  }

  const chunk = sampleWeights.reduce((sum, w) => sum + w, 0);
  if (batchSize % chunk !== 0) {
    throw new ConfigurationError(
      `evaluation batch size ${batchSize} is not divisible by the sample weight total ${chunk}`,
    );
  }
}

/** Slot index repeated `weights[i]` times, concatenated in slot order. */
export function buildSamplePattern(sampleWeights: readonly number[]): number[] {
  const pattern: number[] = [];
  sampleWeights.forEach((weight, slot) => {
    for (let i = 0; i < weight; i++) pattern.push(slot);
  });
  return pattern;
}

export function partitionBatch(batchSize: number, sampleWeights: readonly number[]): SamplePartition {
  validatePartitionConfig(batchSize, sampleWeights, sampleWeights.length);

  const pattern = buildSamplePattern(sampleWeights);
  const indices: number[][] = sampleWeights.map(() => []);

  for (let idx = 0; idx < batchSize; idx++) {
    indices[pattern[idx % pattern.length]].push(idx);
  }

  const learnerMask = new Array<number>(batchSize).fill(0);
  for (const idx of indices[0]) learnerMask[idx] = 1;

  return { indices, learnerMask, batchSize };
}

/** Pick `source[idx]` for every index. */
export function gather<T>(source: readonly T[], indices: readonly number[]): T[] {
  return indices.map((idx) => source[idx]);
}
