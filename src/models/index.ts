export { LinearPolicy, LINEAR_ARCHITECTURE } from './linear';
export type { LinearPolicyShape, LinearSnapshot } from './linear';

export { ArchitectureRegistry, createDefaultRegistry } from './registry';
export type { ModelFactory } from './registry';

export type {
  ActResult,
  ObservationBatch,
  PolicyModel,
  RecurrentState,
  StateComponent,
} from './types';
