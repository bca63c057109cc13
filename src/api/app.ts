/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as accessLogger } from 'hono/logger';

import type { Clock } from '@/lib/dates.js';
import { logger as defaultLogger, type Logger } from '@/lib/logger.js';

import { createAuthMiddleware } from './middleware/auth.js';
import { createRequestIdMiddleware } from './middleware/request-id.js';
import { createHealthRoutes } from './routes/health.js';
import { createJobRoutes } from './routes/jobs.js';
import { createPlanRoutes } from './routes/plans.js';
import { createSubscriberRoutes } from './routes/subscribers.js';
import { createSubscriptionRoutes } from './routes/subscriptions.js';
import type { ApiServices } from './types.js';

/**
 * App configuration
 */
interface AppConfig {
  services: ApiServices;
  apiKey: string;
  allowedOrigins?: string[];
  logger?: Logger;
  clock?: Clock;
  /** hono/logger access lines; off in tests */
  accessLog?: boolean;
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { services, apiKey, allowedOrigins } = config;
  const log = config.logger ?? defaultLogger;
  const app = new Hono();

  // Global middleware
  app.use('*', createRequestIdMiddleware());
  if (config.accessLog ?? true) {
    app.use('*', accessLogger((line) => log.info(line)));
  }
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      allowHeaders: ['Authorization', 'Content-Type', 'X-Request-ID', 'X-Client-ID'],
      exposeHeaders: ['X-Request-ID'],
    })
  );

  // Public routes (no auth)
  app.route(
    '/api/v1',
    createHealthRoutes(config.clock === undefined ? {} : { clock: config.clock })
  );

  // Everything else requires the API key
  const authMiddleware = createAuthMiddleware({ apiKey });
  for (const prefix of ['plans', 'subscribers', 'subscriptions', 'jobs']) {
    app.use(`/api/v1/${prefix}`, authMiddleware);
    app.use(`/api/v1/${prefix}/*`, authMiddleware);
  }

  app.route('/api/v1', createPlanRoutes({ subscriptionService: services.subscriptionService }));
  app.route(
    '/api/v1',
    createSubscriberRoutes({ subscriptionService: services.subscriptionService })
  );
  app.route(
    '/api/v1',
    createSubscriptionRoutes({ subscriptionService: services.subscriptionService })
  );
  app.route('/api/v1', createJobRoutes({ jobs: services.jobs }));

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: c.get('requestId'),
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    const requestId = c.get('requestId');
    log.error('Unhandled error', err, { requestId, path: c.req.path });

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId,
        },
      },
      500
    );
  });

  return app;
}
