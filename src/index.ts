/**
 * POLICY POOL
 *
 * Rotating population of policies for self-play evaluation, rated by a
 * TrueSkill tournament and persisted in SQLite.
 */

export * from './pool';
export * from './ranking';
export * from './models';
export { createApiRouter } from './api';
export type { ApiDependencies } from './api';
export { loadPoolConfig, PoolEnvSchema } from './config';
export type { PoolConfig } from './config';
