/**
 * POLICY POOL - Orchestrator
 *
 * Maintains the rotating population of policies used for self-play
 * evaluation. One caller drives the round:
 *
 *   addPolicy / addPolicyCopy   register snapshots in the store
 *   updateActivePolicies        rotate the roster (slot 0 = learner)
 *   forward                     split the batch across roster slots
 *   updateScores                fold per-agent outcomes into the ledger
 *   updateRanks                 flush the ledger through the rating engine
 *
 * Output buffers and the score ledger are mutated in place; the pool is not
 * safe for concurrent callers.
 */

import { join } from 'node:path';
import { createDefaultRegistry, type ArchitectureRegistry } from '../models/registry';
import type { ObservationBatch, PolicyModel, RecurrentState } from '../models/types';
import { DEFAULT_MU, DEFAULT_SIGMA, TrueSkillRatingEngine, type Rating, type RatingEngine } from '../ranking';
import {
  ConfigurationError,
  NamingConflictError,
  PolicyNotFoundError,
  PolicyPoolError,
  StorageError,
} from './errors';
import { gather, partitionBatch, validatePartitionConfig, type SamplePartition } from './partition';
import { createRng, sampleWithReplacement, type Rng } from './random';
import { buildLeaderboard, type LeaderboardEntry } from './report';
import { PolicyNameSchema, coerceFlag, type PolicyRecord } from './schemas';
import type { PolicyStore } from './store';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface PolicyPoolOptions {
  evaluationBatchSize: number;
  /** One positive integer per roster slot. */
  sampleWeights: number[];
  /** Roster size; defaults to `sampleWeights.length`. */
  activePolicies?: number;
  learner: PolicyModel;
  learnerName: string;
  store: PolicyStore;
  /** Directory that holds one snapshot file per policy name. */
  path?: string;
  mu?: number;
  anchorMu?: number;
  sigma?: number;
  ratingEngine?: RatingEngine;
  registry?: ArchitectureRegistry;
  /** Seed for roster sampling; unseeded pools use Math.random. */
  seed?: number;
}

export interface AddPolicyOptions {
  tenured?: boolean;
  mu?: number;
  sigma?: number;
  anchor?: boolean;
  overwriteExisting?: boolean;
  /** Starting episode count; carries a lifetime total across re-registration. */
  episodes?: number;
}

export interface AddPolicyCopyOptions {
  tenured?: boolean;
  anchor?: boolean;
}

export interface ActivePolicy {
  name: string;
  record: PolicyRecord;
  model: PolicyModel;
}

export interface ForwardOutput {
  actions: number[][];
  logProbabilities: number[];
  values: number[];
  /** Updated full-batch state; present when recurrent state was supplied. */
  recurrentState?: RecurrentState;
}

/** Info reported for one agent in one environment step. */
export type AgentInfo = Record<string, unknown>;

/** Agent id -> info, in agent order. */
export type StepInfos = Record<string, AgentInfo>;

export interface RankUpdate {
  name: string;
  before: Rating;
  after: Rating;
  samples: number;
}

interface OutputBuffers {
  actions: number[][];
  logProbabilities: number[];
  values: number[];
  recurrentState?: RecurrentState;
}

export const DEFAULT_POOL_PATH = 'pool';

// ─── Pool ─────────────────────────────────────────────────────────────────────

export class PolicyPool {
  readonly evaluationBatchSize: number;
  readonly numActivePolicies: number;
  readonly sampleWeights: readonly number[];
  readonly learnerName: string;
  readonly path: string;
  readonly mu: number;
  readonly anchorMu: number;
  readonly sigma: number;

  private readonly learner: PolicyModel;
  private readonly store: PolicyStore;
  private readonly engine: RatingEngine;
  private readonly registry: ArchitectureRegistry;
  private readonly rng: Rng;
  private readonly partition: SamplePartition;

  private active: ActivePolicy[] = [];
  private buffers: OutputBuffers | null = null;
  private readonly ledger = new Map<string, number[]>();
  private scoreCount = 0;

  constructor(options: PolicyPoolOptions) {
    const activePolicies = options.activePolicies ?? options.sampleWeights.length;
    validatePartitionConfig(options.evaluationBatchSize, options.sampleWeights, activePolicies);

    this.evaluationBatchSize = options.evaluationBatchSize;
    this.numActivePolicies = activePolicies;
    this.sampleWeights = [...options.sampleWeights];
    this.learner = options.learner;
    this.learnerName = options.learnerName;
    this.store = options.store;
    this.path = options.path ?? DEFAULT_POOL_PATH;
    this.mu = options.mu ?? DEFAULT_MU;
    this.anchorMu = options.anchorMu ?? this.mu;
    this.sigma = options.sigma ?? DEFAULT_SIGMA;
    this.engine =
      options.ratingEngine ??
      new TrueSkillRatingEngine({ mu: this.mu, anchorMu: this.anchorMu, sigma: this.sigma });
    this.registry = options.registry ?? createDefaultRegistry();
    this.rng = createRng(options.seed);
    this.partition = partitionBatch(this.evaluationBatchSize, this.sampleWeights);

    this.restoreRatings();
    this.addPolicy(this.learner, this.learnerName, {
      tenured: true,
      mu: this.mu,
      sigma: this.sigma,
      anchor: false,
    });
    this.updateActivePolicies();
  }

  // ─── Read-only views ────────────────────────────────────────────────────

  /** Live rating mapping of the tournament. */
  get ratings(): ReadonlyMap<string, Rating> {
    return this.engine.ratings;
  }

  /** Current roster; slot 0 is the learner. */
  get activePolicies(): readonly ActivePolicy[] {
    return this.active;
  }

  get roster(): string[] {
    return this.active.map((p) => p.name);
  }

  /** `sampleIndices[slot]` lists the batch indices that slot handles. */
  get sampleIndices(): readonly (readonly number[])[] {
    return this.partition.indices;
  }

  /** 1 at batch indices handled by the learner, 0 elsewhere. */
  get learnerMask(): readonly number[] {
    return this.partition.learnerMask;
  }

  /** Copy of the ledger: policy name -> samples since the last rank update. */
  get scores(): Map<string, number[]> {
    return new Map([...this.ledger].map(([name, samples]) => [name, [...samples]]));
  }

  /** Samples recorded over the pool's lifetime. */
  get numScores(): number {
    return this.scoreCount;
  }

  // ─── Registration ───────────────────────────────────────────────────────

  /**
   * Register a by-value snapshot of `model` under `name`.
   *
   * The model is cloned and the clone serialized to `<path>/<name>`, so
   * later changes to the caller's instance never reach the stored snapshot.
   * Anchors are stored with the fixed rating the engine assigns them and an
   * `anchor` flag in their metadata.
   */
  addPolicy(model: PolicyModel, name: string, options: AddPolicyOptions = {}): PolicyRecord {
    const { tenured = false, anchor = false, overwriteExisting = true, episodes = 0 } = options;
    const mu = options.mu ?? this.mu;
    const sigma = options.sigma ?? this.sigma;

    const parsedName = PolicyNameSchema.safeParse(name);
    if (!parsedName.success) {
      throw new ConfigurationError(`Invalid policy name '${name}': ${parsedName.error.issues[0]?.message}`);
    }

    if (this.store.getByName(name) && !overwriteExisting) {
      throw new NamingConflictError(name);
    }

    const snapshotPath = join(this.path, name);
    const snapshot = model.clone();
    try {
      snapshot.save(snapshotPath);
    } catch (err) {
      throw new StorageError(`Failed to save snapshot for '${name}' to ${snapshotPath}`, err);
    }

    const rating = anchor ? this.engine.anchorRating() : { mu, sigma };
    const record = this.store.add(
      {
        name,
        snapshotPath,
        architectureTag: snapshot.architecture,
        mu: rating.mu,
        sigma: rating.sigma,
        episodes,
        metadata: anchor ? { tenured, anchor: true } : { tenured },
      },
      overwriteExisting,
    );

    // Only a committed record reaches the engine
    if (anchor) {
      this.engine.setAnchor(name);
    } else {
      this.engine.addPolicy(name);
      this.engine.ratings.set(name, { mu, sigma });
    }

    console.log(
      `[PolicyPool] Added ${anchor ? 'anchor' : 'policy'} ${name} (mu=${record.mu.toFixed(2)}, sigma=${record.sigma.toFixed(2)}, tenured=${tenured})`,
    );
    return record;
  }

  /** Register `newName` as a copy of the stored policy `sourceName`. */
  addPolicyCopy(sourceName: string, newName: string, options: AddPolicyCopyOptions = {}): PolicyRecord {
    const source = this.store.getByName(sourceName);
    if (!source) throw new PolicyNotFoundError(sourceName);

    return this.addPolicy(this.materialize(source), newName, {
      tenured: options.tenured ?? false,
      anchor: options.anchor ?? false,
      mu: source.mu,
      sigma: source.sigma,
    });
  }

  /** Runnable instance of a stored policy, loaded from its snapshot. */
  loadPolicy(name: string): PolicyModel {
    const record = this.store.getByName(name);
    if (!record) throw new PolicyNotFoundError(name);
    return this.materialize(record);
  }

  // ─── Roster ─────────────────────────────────────────────────────────────

  /**
   * Rebuild the roster: slot 0 is the learner, the other slots are drawn
   * uniformly with replacement from every stored policy (the learner
   * included). Each slot gets a fresh instance loaded from its own snapshot.
   */
  updateActivePolicies(): ActivePolicy[] {
    const learnerRecord = this.store.getByName(this.learnerName);
    if (!learnerRecord) throw new PolicyNotFoundError(this.learnerName);

    const candidates = this.store.getAll();
    const drawn = sampleWithReplacement(candidates, this.numActivePolicies - 1, this.rng);

    const roster = [learnerRecord, ...drawn].map((record) => ({
      name: record.name,
      record,
      model: this.materialize(record),
    }));

    this.active = roster;
    console.log(`[PolicyPool] Active roster: ${this.roster.join(', ')}`);
    return roster;
  }

  // ─── Forward ────────────────────────────────────────────────────────────

  /**
   * Run every roster slot on its share of the batch and gather the results
   * into full-batch buffers. When recurrent state is supplied, each slot's
   * rows of it are replaced in place with the state the slot's model returns.
   */
  forward(
    observations: ObservationBatch,
    recurrentState?: RecurrentState,
    doneFlags?: boolean[],
  ): ForwardOutput {
    this.checkBatch('observations', observations.length);
    if (doneFlags) this.checkBatch('done flags', doneFlags.length);
    recurrentState?.forEach((component, k) => this.checkBatch(`recurrent state component ${k}`, component.length));

    this.active.forEach((policy, slot) => {
      const idxs = this.partition.indices[slot];

      const obs = gather(observations, idxs);
      const state = recurrentState?.map((component) => gather(component, idxs).map((row) => [...row]));
      const dones = doneFlags ? gather(doneFlags, idxs) : undefined;

      const result = policy.model.act(obs, state, dones);
      if (
        result.action.length !== idxs.length ||
        result.logProbability.length !== idxs.length ||
        result.value.length !== idxs.length
      ) {
        throw new Error(
          `[PolicyPool] Policy ${policy.name} returned results for ${result.action.length} samples, expected ${idxs.length}`,
        );
      }

      const buffers = this.allocate(result.action[0].length);

      idxs.forEach((b, j) => {
        buffers.actions[b] = [...result.action[j]];
        buffers.logProbabilities[b] = result.logProbability[j];
        buffers.values[b] = result.value[j];
      });

      if (!recurrentState) return;

      const nextState = result.state;
      if (!nextState || nextState.length !== recurrentState.length) {
        throw new Error(`[PolicyPool] Policy ${policy.name} did not return ${recurrentState.length} state components`);
      }
      const stateBuffers = this.allocateState(recurrentState.length);

      nextState.forEach((component, k) => {
        idxs.forEach((b, j) => {
          recurrentState[k][b] = [...component[j]];
          stateBuffers[k][b] = [...component[j]];
        });
      });
    });

    const buffers = this.requireBuffers();
    const output: ForwardOutput = {
      actions: buffers.actions,
      logProbabilities: buffers.logProbabilities,
      values: buffers.values,
    };
    if (recurrentState) output.recurrentState = buffers.recurrentState;
    return output;
  }

  // ─── Scoring ────────────────────────────────────────────────────────────

  /**
   * Fold one step's per-agent infos into the ledger.
   *
   * `perAgentInfos` holds one agent -> info mapping per environment; agents
   * are flattened in that order to line up with the batch. Each slot's
   * entries are scored under the slot's policy name, so slots sharing a name
   * share a ledger entry. Entries without `metricKey` are skipped.
   *
   * @returns The info entries routed to each policy name.
   */
  updateScores(perAgentInfos: StepInfos[], metricKey: string): Map<string, AgentInfo[]> {
    const agentInfos = perAgentInfos.flatMap((step) => Object.values(step));
    const routed = new Map<string, AgentInfo[]>();

    this.active.forEach((policy, slot) => {
      const entries: AgentInfo[] = [];
      for (const idx of this.partition.indices[slot]) {
        if (idx < agentInfos.length) entries.push(agentInfos[idx]);
      }

      const existing = routed.get(policy.name);
      if (existing) existing.push(...entries);
      else routed.set(policy.name, entries);

      for (const info of entries) {
        if (!(metricKey in info)) continue;

        const raw = info[metricKey];
        const value = typeof raw === 'boolean' ? Number(raw) : raw;
        if (typeof value !== 'number' || !Number.isFinite(value)) {
          console.warn(`[PolicyPool] Ignoring non-numeric ${metricKey} for ${policy.name}: ${String(raw)}`);
          continue;
        }

        const samples = this.ledger.get(policy.name);
        if (samples) samples.push(value);
        else this.ledger.set(policy.name, [value]);
        this.scoreCount += 1;
      }
    });

    return routed;
  }

  /**
   * Flush the ledger through the rating engine in one batched update and
   * write the new ratings back for every scored policy still in the store.
   *
   * The write-back is one store transaction. If it fails, the engine's
   * ratings are restored, the ledger is kept and a StorageError is raised.
   */
  updateRanks(): RankUpdate[] {
    const names = [...this.ledger.keys()];
    if (names.length === 0) return [];

    const samples = names.map((name) => this.ledger.get(name) ?? []);
    const before = new Map(
      [...this.engine.ratings].map(([name, rating]) => [name, { ...rating }]),
    );

    this.engine.update(names, samples);

    let updates: RankUpdate[];
    try {
      updates = this.store.transaction(() => {
        const committed: RankUpdate[] = [];
        names.forEach((name, i) => {
          const record = this.store.getByName(name);
          const rating = this.engine.ratings.get(name);
          if (!record || !rating) return;

          this.store.update({
            ...record,
            mu: rating.mu,
            sigma: rating.sigma,
            episodes: record.episodes + samples[i].length,
          });
          committed.push({
            name,
            before: { mu: record.mu, sigma: record.sigma },
            after: { mu: rating.mu, sigma: rating.sigma },
            samples: samples[i].length,
          });
        });
        return committed;
      });
    } catch (err) {
      this.engine.ratings.clear();
      for (const [name, rating] of before) this.engine.ratings.set(name, rating);
      if (err instanceof PolicyPoolError) throw err;
      throw new StorageError('[PolicyPool] Rank write-back failed', err);
    }

    this.ledger.clear();
    console.log(`[PolicyPool] Updated ranks for ${updates.length} of ${names.length} scored policies`);
    return updates;
  }

  // ─── Reporting ──────────────────────────────────────────────────────────

  /** Stored policies ordered by live skill mean, best first. */
  leaderboard(): LeaderboardEntry[] {
    return buildLeaderboard(this.store.getAll(), this.engine);
  }

  // ─── Internals ──────────────────────────────────────────────────────────

  /**
   * Seed the engine with every stored record it does not know yet, so
   * ratings committed by an earlier run carry over.
   */
  private restoreRatings(): void {
    let restored = 0;
    for (const record of this.store.getAll()) {
      if (this.engine.ratings.has(record.name)) continue;

      if (coerceFlag(record.metadata.anchor)) {
        this.engine.setAnchor(record.name);
      } else {
        this.engine.addPolicy(record.name);
      }
      this.engine.ratings.set(record.name, { mu: record.mu, sigma: record.sigma });
      restored += 1;
    }
    if (restored > 0) {
      console.log(`[PolicyPool] Restored ${restored} stored ratings`);
    }
  }

  /**
   * Allocate an instance shaped like the record's architecture and load its
   * snapshot. The learner is cloned when architectures match; otherwise the
   * registry supplies the instance.
   */
  private materialize(record: PolicyRecord): PolicyModel {
    const model =
      record.architectureTag === this.learner.architecture
        ? this.learner.clone()
        : this.registry.create(record.architectureTag);
    if (!model) {
      throw new ConfigurationError(
        `No model factory registered for architecture '${record.architectureTag}' (policy ${record.name})`,
      );
    }

    try {
      model.load(record.snapshotPath);
    } catch (err) {
      throw new StorageError(`Failed to load snapshot for '${record.name}' from ${record.snapshotPath}`, err);
    }
    return model;
  }

  private checkBatch(label: string, length: number): void {
    if (length !== this.evaluationBatchSize) {
      throw new ConfigurationError(
        `${label} batch of ${length} does not match evaluation batch size ${this.evaluationBatchSize}`,
      );
    }
  }

  private allocate(actionSize: number): OutputBuffers {
    if (!this.buffers) {
      const size = this.evaluationBatchSize;
      this.buffers = {
        actions: Array.from({ length: size }, () => new Array<number>(actionSize).fill(0)),
        logProbabilities: new Array<number>(size).fill(0),
        values: new Array<number>(size).fill(0),
      };
    }
    return this.buffers;
  }

  private allocateState(components: number): RecurrentState {
    const buffers = this.requireBuffers();
    if (!buffers.recurrentState || buffers.recurrentState.length !== components) {
      buffers.recurrentState = Array.from({ length: components }, () =>
        Array.from({ length: this.evaluationBatchSize }, (): number[] => []),
      );
    }
    return buffers.recurrentState;
  }

  private requireBuffers(): OutputBuffers {
    if (!this.buffers) throw new Error('[PolicyPool] forward() produced no output');
    return this.buffers;
  }
}
