#!/usr/bin/env tsx
/**
 * POLICY POOL - CLI Self-Play Runner
 *
 * Runs a synthetic self-play session in the terminal: a learner is nudged
 * each round, periodically checkpointed into the pool, evaluated against a
 * rotating roster of its own snapshots and rated.
 *
 * Usage:
 *   npx tsx scripts/run-pool.ts [--rounds 20] [--steps 16] [--checkpoint-every 4]
 *   npm run pool
 *
 * Pool settings come from POOL_* environment variables (see src/config.ts).
 */

import 'dotenv/config';

import { loadPoolConfig } from '../src/config';
import { LinearPolicy } from '../src/models';
import {
  PolicyPool,
  SqlitePolicyStore,
  createRng,
  formatLeaderboard,
  type Rng,
  type StepInfos,
} from '../src/pool';

// ═══════════════════════════════════════════════════════════════════════════════
// ANSI Color Utilities
// ═══════════════════════════════════════════════════════════════════════════════

const C = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  gray: '\x1b[90m',
  brightGreen: '\x1b[92m',
  brightYellow: '\x1b[93m',
  brightCyan: '\x1b[96m',
  brightWhite: '\x1b[97m',
} as const;

function c(color: keyof typeof C, text: string): string {
  return `${C[color]}${text}${C.reset}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Arguments
// ═══════════════════════════════════════════════════════════════════════════════

function intArg(flag: string, fallback: number): number {
  const at = process.argv.indexOf(flag);
  if (at === -1) return fallback;
  const value = Number(process.argv[at + 1]);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${flag} expects a positive integer`);
  }
  return value;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Synthetic Environment
// ═══════════════════════════════════════════════════════════════════════════════

const OBSERVATION_SIZE = 6;
const ACTION_SIZE = 3;
const AGENTS_PER_ENV = 2;

function sampleObservations(batchSize: number, rng: Rng): number[][] {
  return Array.from({ length: batchSize }, () =>
    Array.from({ length: OBSERVATION_SIZE }, () => rng() * 2 - 1),
  );
}

/** Reward 1 when the action picks the largest of the first ACTION_SIZE features. */
function reward(observation: number[], action: number[]): number {
  let target = 0;
  for (let a = 1; a < ACTION_SIZE; a++) {
    if (observation[a] > observation[target]) target = a;
  }
  return action[0] === target ? 1 : 0;
}

function stepInfos(observations: number[][], actions: number[][]): StepInfos[] {
  const envs: StepInfos[] = [];
  for (let start = 0; start < observations.length; start += AGENTS_PER_ENV) {
    const env: StepInfos = {};
    for (let agent = 0; agent < AGENTS_PER_ENV; agent++) {
      const i = start + agent;
      env[`agent_${agent}`] = { reward: reward(observations[i], actions[i]) };
    }
    envs.push(env);
  }
  return envs;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Session
// ═══════════════════════════════════════════════════════════════════════════════

function runPool(): void {
  const config = loadPoolConfig();
  const rounds = intArg('--rounds', 20);
  const steps = intArg('--steps', 16);
  const checkpointEvery = intArg('--checkpoint-every', 4);

  if (config.evaluationBatchSize % AGENTS_PER_ENV !== 0) {
    throw new Error(`POOL_BATCH_SIZE must be a multiple of ${AGENTS_PER_ENV} agents per environment`);
  }

  const rng = createRng(config.seed ?? 1);
  const learner = new LinearPolicy(
    { observationSize: OBSERVATION_SIZE, actionSize: ACTION_SIZE },
    config.seed ?? 1,
  );

  const store = SqlitePolicyStore.open(config.dbPath);
  const pool = new PolicyPool({
    evaluationBatchSize: config.evaluationBatchSize,
    sampleWeights: config.sampleWeights,
    activePolicies: config.activePolicies,
    learner,
    learnerName: 'learner',
    store,
    path: config.snapshotDir,
    mu: config.mu,
    anchorMu: config.anchorMu,
    sigma: config.sigma,
    seed: config.seed,
  });

  pool.addPolicy(learner, 'anchor', { anchor: true, tenured: true });

  console.log('');
  console.log(c('brightYellow', `  POLICY POOL - ${rounds} rounds x ${steps} steps, batch ${config.evaluationBatchSize}`));

  for (let round = 1; round <= rounds; round++) {
    // Stand-in for a training update
    learner.perturb(0.05, rng);

    const live = pool.ratings.get(pool.learnerName);
    pool.addPolicy(learner, pool.learnerName, {
      tenured: true,
      mu: live?.mu,
      sigma: live?.sigma,
      episodes: store.getByName(pool.learnerName)?.episodes ?? 0,
    });
    if (round % checkpointEvery === 0) {
      pool.addPolicyCopy(pool.learnerName, `learner-r${round}`);
    }

    pool.updateActivePolicies();

    for (let step = 0; step < steps; step++) {
      const observations = sampleObservations(config.evaluationBatchSize, rng);
      const { actions } = pool.forward(observations);
      pool.updateScores(stepInfos(observations, actions), 'reward');
    }

    const updates = pool.updateRanks();
    const learnerUpdate = updates.find((u) => u.name === pool.learnerName);
    if (learnerUpdate) {
      const delta = learnerUpdate.after.mu - learnerUpdate.before.mu;
      const color = delta >= 0 ? 'brightGreen' : 'brightYellow';
      console.log(
        `  ${c('gray', `round ${String(round).padStart(3)}`)}  learner mu ${c(color, learnerUpdate.after.mu.toFixed(2))} ${c('gray', `(${delta >= 0 ? '+' : ''}${delta.toFixed(2)})`)}`,
      );
    }
  }

  console.log('');
  console.log(c('bold', '  LEADERBOARD'));
  console.log(
    formatLeaderboard(pool.leaderboard())
      .split('\n')
      .map((line) => `  ${line}`)
      .join('\n'),
  );
  console.log('');
  console.log(c('gray', `  ${pool.numScores} samples scored; store at ${config.dbPath}`));

  store.close();
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run
// ═══════════════════════════════════════════════════════════════════════════════

try {
  runPool();
} catch (err) {
  console.error('\n\x1b[91mFATAL ERROR:\x1b[0m', err);
  process.exit(1);
}
