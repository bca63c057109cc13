/**
 * Engine wiring shared by the HTTP server and the job runner
 */

import {
  createInProcessLock,
  createRedisLock,
  createSupabaseAdmin,
  createUpstashLockClient,
  getRedis,
  loadEngineConfig,
  loadRedisSettings,
  loadSupabaseSettings,
  logger,
  type EngineConfig,
  type Logger,
  type SubscriberLock,
} from './lib/index.js';
import {
  createEventService,
  createSubscriptionService,
  createSubscriptionServiceDb,
  type BillingHooks,
  type EventService,
  type SubscriptionService,
  type SubscriptionServiceDb,
} from './services/index.js';
import { createLifecycleJobs, type LifecycleJobs } from './workers/index.js';

export interface Engine {
  config: EngineConfig;
  db: SubscriptionServiceDb;
  events: EventService;
  locks: SubscriberLock;
  subscriptionService: SubscriptionService;
  jobs: LifecycleJobs;
}

export interface EngineOptions {
  config?: EngineConfig;
  db?: SubscriptionServiceDb;
  billing?: BillingHooks;
  logger?: Logger;
  /** Variables to read settings from; defaults to process.env */
  env?: Record<string, string | undefined>;
}

/**
 * Supabase-backed engine; Redis locks when Upstash is configured, an
 * in-process lock otherwise (single instance only).
 */
export function createEngine(options: EngineOptions = {}): Engine {
  const log = options.logger ?? logger;
  const env = options.env ?? process.env;
  const config = options.config ?? loadEngineConfig(env);
  const db =
    options.db ?? createSubscriptionServiceDb(createSupabaseAdmin(loadSupabaseSettings(env)));
  const events = createEventService({ logger: log });

  let locks: SubscriberLock;
  const redis = loadRedisSettings(env);
  if (redis !== null) {
    locks = createRedisLock(createUpstashLockClient(getRedis(redis)), { logger: log });
  } else {
    log.warn('UPSTASH_REDIS_URL not set; using in-process subscriber locks');
    locks = createInProcessLock();
  }

  const subscriptionService = createSubscriptionService({
    db,
    events,
    config,
    locks,
    logger: log,
    ...(options.billing !== undefined && { billing: options.billing }),
  });

  const jobs = createLifecycleJobs({ subscriptionService, db, events, config, logger: log });

  return { config, db, events, locks, subscriptionService, jobs };
}
