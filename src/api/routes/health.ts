/**
 * Health Route
 * Public liveness probe
 */

import { Hono } from 'hono';

import { systemClock, type Clock } from '@/lib/dates.js';

interface HealthRoutesDeps {
  clock?: Clock;
}

export function createHealthRoutes(deps: HealthRoutesDeps = {}): Hono {
  const clock = deps.clock ?? systemClock;
  const app = new Hono();

  /**
   * GET /health
   * No authentication; reports the engine clock so skew is visible
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      service: 'entitlements',
      timestamp: clock().toISOString(),
      version: 'v1',
    });
  });

  return app;
}
