/**
 * Entitlement Engine Entry Point
 *
 * Wires together all services and starts the Hono application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/index.js';
import { createEngine } from './bootstrap.js';
import { JsonLogger, loadServerConfig } from './lib/index.js';
import { createCurrencyService } from './services/index.js';

const server = loadServerConfig();
const logger = new JsonLogger(server.logLevel);

const engine = createEngine({ logger });

const currencyProblems = createCurrencyService(engine.config.currency).validateConfiguration();
for (const problem of currencyProblems) {
  logger.warn('Currency configuration problem', { problem });
}

engine.events.onAny((event) => {
  logger.info('Entitlement event', {
    requestId: event.requestId,
    eventType: event.type,
    subscriberType: event.subscriber.type,
    subscriberId: event.subscriber.id,
  });
});

const app = createApp({
  services: { subscriptionService: engine.subscriptionService, jobs: engine.jobs },
  apiKey: server.apiKey,
  allowedOrigins: server.allowedOrigins,
  logger,
});

logger.info('Server starting', { port: server.port });

serve({
  fetch: app.fetch,
  port: server.port,
});

export { app };
