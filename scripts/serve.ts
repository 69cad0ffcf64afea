#!/usr/bin/env tsx
/**
 * POLICY POOL - Leaderboard Server
 *
 * Serves the read-only policy API over the store at POOL_DB_PATH.
 *
 * Usage:
 *   npx tsx scripts/serve.ts
 *   npm run serve
 */

import 'dotenv/config';

import { serve } from '@hono/node-server';
import { createApiRouter } from '../src/api';
import { loadPoolConfig } from '../src/config';
import { SqlitePolicyStore } from '../src/pool';

const config = loadPoolConfig();
const store = SqlitePolicyStore.open(config.dbPath);
const app = createApiRouter({ store });

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`[API] Policy leaderboard on http://localhost:${info.port} (store ${config.dbPath})`);
});

process.on('SIGINT', () => {
  store.close();
  process.exit(0);
});
