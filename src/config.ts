/**
 * POLICY POOL - Configuration
 *
 * Pool settings read from environment variables (scripts load `.env` through
 * dotenv first). Every variable is optional; defaults give a four-policy
 * roster over a batch of 8 with the learner taking half the batch.
 *
 *   POOL_BATCH_SIZE       evaluation batch size              (8)
 *   POOL_SAMPLE_WEIGHTS   comma list, one weight per slot    (4,2,1,1)
 *   POOL_ACTIVE_POLICIES  roster size                        (weights length)
 *   POOL_SNAPSHOT_DIR     directory for snapshot files       (pool)
 *   POOL_DB_PATH          SQLite file                        (policy_pool.db)
 *   POOL_MU / POOL_ANCHOR_MU / POOL_SIGMA   rating defaults  (1000 / 1000 / 33.33)
 *   POOL_SEED             roster sampling seed               (unseeded)
 *   PORT                  HTTP port for the report server    (8787)
 */

import { z } from 'zod';
import { ConfigurationError } from './pool/errors';
import { DEFAULT_MU, DEFAULT_SIGMA } from './ranking';

const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const WeightsSchema = z
  .string()
  .transform((raw) => raw.split(',').map((part) => part.trim()).filter((part) => part.length > 0))
  .pipe(z.array(z.coerce.number().int().positive()).min(1));

export const PoolEnvSchema = z.object({
  POOL_BATCH_SIZE: intFromEnv(8),
  POOL_SAMPLE_WEIGHTS: WeightsSchema.default('4,2,1,1'),
  POOL_ACTIVE_POLICIES: z.coerce.number().int().positive().optional(),
  POOL_SNAPSHOT_DIR: z.string().min(1).default('pool'),
  POOL_DB_PATH: z.string().min(1).default('policy_pool.db'),
  POOL_MU: z.coerce.number().finite().default(DEFAULT_MU),
  POOL_ANCHOR_MU: z.coerce.number().finite().optional(),
  POOL_SIGMA: z.coerce.number().finite().positive().default(DEFAULT_SIGMA),
  POOL_SEED: z.coerce.number().int().optional(),
  PORT: intFromEnv(8787),
});

export interface PoolConfig {
  evaluationBatchSize: number;
  sampleWeights: number[];
  activePolicies: number;
  snapshotDir: string;
  dbPath: string;
  mu: number;
  anchorMu: number;
  sigma: number;
  seed?: number;
  port: number;
}

/** Empty strings count as unset. */
function dropBlank(env: Record<string, string | undefined>): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value;
  }
  return cleaned;
}

export function loadPoolConfig(env: Record<string, string | undefined> = process.env): PoolConfig {
  const parsed = PoolEnvSchema.safeParse(dropBlank(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid pool configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    evaluationBatchSize: e.POOL_BATCH_SIZE,
    sampleWeights: e.POOL_SAMPLE_WEIGHTS,
    activePolicies: e.POOL_ACTIVE_POLICIES ?? e.POOL_SAMPLE_WEIGHTS.length,
    snapshotDir: e.POOL_SNAPSHOT_DIR,
    dbPath: e.POOL_DB_PATH,
    mu: e.POOL_MU,
    anchorMu: e.POOL_ANCHOR_MU ?? e.POOL_MU,
    sigma: e.POOL_SIGMA,
    seed: e.POOL_SEED,
    port: e.PORT,
  };
}
