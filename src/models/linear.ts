/**
 * POLICY POOL - Linear Policy
 *
 * Small reference model for the pool: a linear softmax policy with a linear
 * value head and an optional single-component recurrent state. Parameters
 * are saved as a versioned JSON snapshot and validated with zod on load.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { createRng, type Rng } from '../pool/random';
import type { ActResult, ObservationBatch, PolicyModel, RecurrentState } from './types';

export const LINEAR_ARCHITECTURE = 'linear-softmax';

/** Hidden state carry-over between steps. */
const RECURRENT_DECAY = 0.5;

export interface LinearPolicyShape {
  observationSize: number;
  actionSize: number;
  /** Size of the single recurrent component; 0 for a feed-forward policy. */
  hiddenSize?: number;
}

const SnapshotSchema = z
  .object({
    architecture: z.literal(LINEAR_ARCHITECTURE),
    version: z.literal(1),
    observationSize: z.number().int().nonnegative(),
    actionSize: z.number().int().nonnegative(),
    hiddenSize: z.number().int().nonnegative(),
    policyWeights: z.array(z.array(z.number())),
    policyBias: z.array(z.number()),
    valueWeights: z.array(z.number()),
    valueBias: z.number(),
    recurrentWeights: z.array(z.array(z.number())),
  })
  .superRefine((snap, ctx) => {
    const inputSize = snap.observationSize + snap.hiddenSize;
    const shapeOk =
      snap.policyWeights.length === snap.actionSize &&
      snap.policyWeights.every((row) => row.length === inputSize) &&
      snap.policyBias.length === snap.actionSize &&
      snap.valueWeights.length === inputSize &&
      snap.recurrentWeights.length === snap.hiddenSize &&
      snap.recurrentWeights.every((row) => row.length === snap.observationSize);
    if (!shapeOk) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Parameter arrays do not match declared shape' });
    }
  });
export type LinearSnapshot = z.infer<typeof SnapshotSchema>;

function randomMatrix(rows: number, cols: number, rng: Rng, scale: number): number[][] {
  return Array.from({ length: rows }, () =>
    Array.from({ length: cols }, () => (rng() * 2 - 1) * scale),
  );
}

function dot(weights: number[], input: number[]): number {
  let sum = 0;
  for (let i = 0; i < weights.length; i++) sum += weights[i] * input[i];
  return sum;
}

function logSumExp(values: number[]): number {
  const max = Math.max(...values);
  let sum = 0;
  for (const v of values) sum += Math.exp(v - max);
  return max + Math.log(sum);
}

/**
 * Linear softmax policy with a linear value head and an optional
 * single-component recurrent state. Acts greedily: the chosen action is the
 * arg-max logit and its log-probability comes from the softmax.
 */
export class LinearPolicy implements PolicyModel {
  readonly architecture = LINEAR_ARCHITECTURE;

  private observationSize: number;
  private actionSize: number;
  private hiddenSize: number;
  private policyWeights: number[][];
  private policyBias: number[];
  private valueWeights: number[];
  private valueBias: number;
  private recurrentWeights: number[][];

  /**
   * Without a shape the instance is empty and only becomes usable after
   * `load()`; this is how the architecture registry allocates it.
   */
  constructor(shape?: LinearPolicyShape, seed?: number) {
    const rng = createRng(seed);
    this.observationSize = shape?.observationSize ?? 0;
    this.actionSize = shape?.actionSize ?? 0;
    this.hiddenSize = shape?.hiddenSize ?? 0;

    const inputSize = this.observationSize + this.hiddenSize;
    const scale = inputSize > 0 ? 1 / Math.sqrt(inputSize) : 0;

    this.policyWeights = randomMatrix(this.actionSize, inputSize, rng, scale);
    this.policyBias = new Array<number>(this.actionSize).fill(0);
    this.valueWeights = randomMatrix(1, inputSize, rng, scale)[0];
    this.valueBias = 0;
    this.recurrentWeights = randomMatrix(this.hiddenSize, this.observationSize, rng, scale);
  }

  act(observations: ObservationBatch, state?: RecurrentState, dones?: boolean[]): ActResult {
    if (this.actionSize === 0) {
      throw new Error('LinearPolicy: no parameters loaded');
    }

    const hidden = state?.[0];
    const action: number[][] = [];
    const logProbability: number[] = [];
    const value: number[] = [];
    const nextHidden: number[][] = [];

    observations.forEach((obs, i) => {
      if (obs.length !== this.observationSize) {
        throw new Error(
          `LinearPolicy: expected observation of size ${this.observationSize}, got ${obs.length}`,
        );
      }

      const reset = dones?.[i] === true;
      const prev = hidden && !reset ? hidden[i] : undefined;
      const h = this.recurrentWeights.map(
        (row, k) => Math.tanh(dot(row, obs) + RECURRENT_DECAY * (prev?.[k] ?? 0)),
      );
      nextHidden.push(h);

      const input = this.hiddenSize > 0 ? [...obs, ...h] : obs;
      const logits = this.policyWeights.map((row, a) => dot(row, input) + this.policyBias[a]);

      let best = 0;
      for (let a = 1; a < logits.length; a++) {
        if (logits[a] > logits[best]) best = a;
      }

      action.push([best]);
      logProbability.push(logits[best] - logSumExp(logits));
      value.push(dot(this.valueWeights, input) + this.valueBias);
    });

    if (!state) return { action, logProbability, value };

    // Components past the first are passed through untouched
    const passthrough = state.slice(1).map((component) => component.map((row) => [...row]));
    return { action, logProbability, value, state: [nextHidden, ...passthrough] };
  }

  save(path: string): void {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, JSON.stringify(this.toJSON()), 'utf-8');
  }

  load(path: string): void {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    this.fromJSON(SnapshotSchema.parse(raw));
  }

  clone(): LinearPolicy {
    const copy = new LinearPolicy();
    copy.fromJSON(this.toJSON());
    return copy;
  }

  /** Add uniform noise in [-scale, scale] to every parameter. */
  perturb(scale: number, rng: Rng): void {
    const jitter = (v: number) => v + (rng() * 2 - 1) * scale;
    this.policyWeights = this.policyWeights.map((row) => row.map(jitter));
    this.policyBias = this.policyBias.map(jitter);
    this.valueWeights = this.valueWeights.map(jitter);
    this.valueBias = jitter(this.valueBias);
    this.recurrentWeights = this.recurrentWeights.map((row) => row.map(jitter));
  }

  toJSON(): LinearSnapshot {
    return {
      architecture: LINEAR_ARCHITECTURE,
      version: 1,
      observationSize: this.observationSize,
      actionSize: this.actionSize,
      hiddenSize: this.hiddenSize,
      policyWeights: this.policyWeights.map((row) => [...row]),
      policyBias: [...this.policyBias],
      valueWeights: [...this.valueWeights],
      valueBias: this.valueBias,
      recurrentWeights: this.recurrentWeights.map((row) => [...row]),
    };
  }

  fromJSON(snapshot: LinearSnapshot): void {
    this.observationSize = snapshot.observationSize;
    this.actionSize = snapshot.actionSize;
    this.hiddenSize = snapshot.hiddenSize;
    this.policyWeights = snapshot.policyWeights.map((row) => [...row]);
    this.policyBias = [...snapshot.policyBias];
    this.valueWeights = [...snapshot.valueWeights];
    this.valueBias = snapshot.valueBias;
    this.recurrentWeights = snapshot.recurrentWeights.map((row) => [...row]);
  }
}
