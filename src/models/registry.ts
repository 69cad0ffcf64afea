/**
 * POLICY POOL - Architecture Registry
 *
 * Maps the architecture tag stored with each policy record to a factory that
 * allocates an empty model of that architecture. Snapshots are loaded into
 * the allocated instance; model classes are never resolved from free-form
 * strings.
 */

import { LINEAR_ARCHITECTURE, LinearPolicy } from './linear';
import type { PolicyModel } from './types';

export type ModelFactory = () => PolicyModel;

export class ArchitectureRegistry {
  private readonly factories = new Map<string, ModelFactory>();

  register(tag: string, factory: ModelFactory): this {
    if (this.factories.has(tag)) {
      throw new Error(`Architecture '${tag}' is already registered`);
    }
    this.factories.set(tag, factory);
    return this;
  }

  has(tag: string): boolean {
    return this.factories.has(tag);
  }

  /** Allocate an empty instance, or null for an unknown tag. */
  create(tag: string): PolicyModel | null {
    const factory = this.factories.get(tag);
    return factory ? factory() : null;
  }

  tags(): string[] {
    return [...this.factories.keys()];
  }
}

/** Registry preloaded with the architectures shipped in this package. */
export function createDefaultRegistry(): ArchitectureRegistry {
  return new ArchitectureRegistry().register(LINEAR_ARCHITECTURE, () => new LinearPolicy());
}
