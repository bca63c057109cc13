/**
 * Upstash Redis client backing the subscriber lock
 */

import { Redis } from '@upstash/redis';

import type { RedisSettings } from './config.js';

const clients = new Map<string, Redis>();

/**
 * One REST client per endpoint; engines sharing an Upstash database share
 * the client.
 */
export function getRedis(settings: RedisSettings): Redis {
  const existing = clients.get(settings.url);
  if (existing !== undefined) {
    return existing;
  }
  const client = new Redis({ url: settings.url, token: settings.token });
  clients.set(settings.url, client);
  return client;
}
