/**
 * POLICY POOL - Pool Module
 *
 * Policy store, batch partitioning and the orchestrator that rotates the
 * active roster and commits ratings.
 */

export { PolicyPool, DEFAULT_POOL_PATH } from './policy-pool';
export type {
  PolicyPoolOptions,
  AddPolicyOptions,
  AddPolicyCopyOptions,
  ActivePolicy,
  ForwardOutput,
  AgentInfo,
  StepInfos,
  RankUpdate,
} from './policy-pool';

export { SqlitePolicyStore } from './store';
export type { PolicyStore } from './store';

export { partitionBatch, buildSamplePattern, validatePartitionConfig, gather } from './partition';
export type { SamplePartition } from './partition';

export { buildLeaderboard, formatLeaderboard } from './report';
export type { LeaderboardEntry, RatingSource } from './report';

export {
  PolicyRecordSchema,
  PolicyMetadataSchema,
  PolicyNameSchema,
  coerceFlag,
  coerceTenured,
  toPolicyRecord,
} from './schemas';
export type { PolicyRecord, PolicyRecordInput, PolicyMetadata } from './schemas';

export {
  PolicyPoolError,
  ConfigurationError,
  NamingConflictError,
  PolicyNotFoundError,
  StorageError,
} from './errors';
export type { PolicyPoolErrorCode } from './errors';

export { mulberry32, createRng, sampleWithReplacement } from './random';
export type { Rng } from './random';
