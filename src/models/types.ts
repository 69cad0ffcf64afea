/**
 * POLICY POOL - Policy Model capability
 *
 * What the pool needs from a model. Batches are plain arrays indexed by
 * sample; recurrent state is a list of components, each indexed by sample
 * (for example hidden and cell state of an LSTM).
 */

export type ObservationBatch = number[][];

/** One recurrent-state component: `component[sample]` is that sample's vector. */
export type StateComponent = number[][];

export type RecurrentState = StateComponent[];

export interface ActResult {
  /** Per-sample action vectors. */
  action: number[][];
  logProbability: number[];
  value: number[];
  /** Present when recurrent state was supplied. */
  state?: RecurrentState;
}

export interface PolicyModel {
  /** Stable identifier of the model's class and shape. */
  readonly architecture: string;

  act(observations: ObservationBatch, state?: RecurrentState, dones?: boolean[]): ActResult;

  /** Serialize parameters to `path`. */
  save(path: string): void;

  /** Replace parameters with those serialized at `path`. */
  load(path: string): void;

  /** Independent deep copy; mutating either side never affects the other. */
  clone(): PolicyModel;
}
