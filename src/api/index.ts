/**
 * POLICY POOL - API Module
 *
 * REST endpoints for the policy leaderboard.
 */

export { createApiRouter } from './routes';
export type { ApiDependencies } from './routes';
