/**
 * POLICY POOL - API Routes
 *
 * Read-only REST endpoints over the policy store: leaderboard and single
 * policy lookup. Uses Hono for routing with CORS middleware.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { buildLeaderboard, type RatingSource } from '../pool/report';
import type { PolicyRecord } from '../pool/schemas';
import type { PolicyStore } from '../pool/store';
import { conservativeRating } from '../ranking';

export interface ApiDependencies {
  store: PolicyStore;
  /** Live ratings; the stored mu/sigma are used when omitted. */
  ratings?: RatingSource;
}

const STORED_RATINGS: RatingSource = {
  ratings: new Map(),
  isAnchor: () => false,
};

export function createApiRouter(deps: ApiDependencies): Hono {
  const app = new Hono();
  const ratings = deps.ratings ?? STORED_RATINGS;

  app.use(
    '*',
    cors({
      origin: '*',
      allowMethods: ['GET', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
    }),
  );

  // ─── Health / Root ─────────────────────────────────────────────

  app.get('/health', (c) => {
    return c.json({
      status: 'alive',
      service: 'policy-pool',
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/', (c) => {
    return c.json({
      name: 'policy-pool',
      version: '0.1.0',
      endpoints: {
        health: '/health',
        leaderboard: 'GET /policies?tenured=true|false',
        policy: 'GET /policies/:name',
      },
    });
  });

  // ─── Policies ──────────────────────────────────────────────────

  /**
   * GET /policies
   *
   * Stored policies ranked by skill mean. `tenured=true|false` restricts the
   * listing to tenured or untenured policies.
   */
  app.get('/policies', (c) => {
    const tenured = c.req.query('tenured');

    let records: PolicyRecord[];
    if (tenured === undefined) {
      records = deps.store.getAll();
    } else if (tenured === 'true') {
      records = deps.store.getTenured();
    } else if (tenured === 'false') {
      records = deps.store.getUntenured();
    } else {
      return c.json({ error: 'tenured must be "true" or "false"' }, 400);
    }

    const policies = buildLeaderboard(records, ratings);
    return c.json({ count: policies.length, policies });
  });

  app.get('/policies/:name', (c) => {
    const name = c.req.param('name');
    const record = deps.store.getByName(name);
    if (!record) {
      return c.json({ error: `Policy '${name}' not found` }, 404);
    }

    const live = ratings.ratings.get(name) ?? { mu: record.mu, sigma: record.sigma };
    return c.json({
      policy: record,
      rating: {
        mu: live.mu,
        sigma: live.sigma,
        conservative: conservativeRating(live),
        anchor: ratings.isAnchor(name),
      },
    });
  });

  // ─── Errors ────────────────────────────────────────────────────

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    console.error('[API] Request failed:', err);
    return c.json({ error: err.message }, 500);
  });

  return app;
}
