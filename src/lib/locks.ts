/**
 * Subscriber Locks
 *
 * Serializes lifecycle operations for one subscriber so the
 * single-active check, the write and the post-commit events happen
 * without interleaving. Redis backs it in production; the in-process
 * variant covers tests and single-instance use.
 */

import { setTimeout as sleep } from 'node:timers/promises';

import type { Redis } from '@upstash/redis';
import { nanoid } from 'nanoid';

import type { SubscriberRef } from '@/types/index.js';
import { LockTimeoutError } from '@/types/index.js';

import { logger as defaultLogger, type Logger } from './logger.js';

export interface SubscriberLock {
  withLock<T>(key: string, fn: () => Promise<T>): Promise<T>;
}

export function subscriberLockKey(subscriber: SubscriberRef): string {
  return `subscriber:${subscriber.type}:${subscriber.id}`;
}

// ─────────────────────────────────────────────────────────────
// IN-PROCESS
// ─────────────────────────────────────────────────────────────

export function createInProcessLock(): SubscriberLock {
  const tails = new Map<string, Promise<void>>();

  return {
    async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();
      let release: () => void = () => undefined;
      const current = new Promise<void>((resolve) => {
        release = resolve;
      });
      const tail = previous.then(() => current);
      tails.set(key, tail);

      await previous;
      try {
        return await fn();
      } finally {
        release();
        if (tails.get(key) === tail) {
          tails.delete(key);
        }
      }
    },
  };
}

// ─────────────────────────────────────────────────────────────
// REDIS
// ─────────────────────────────────────────────────────────────

export interface LockClient {
  acquire(key: string, token: string, ttlSeconds: number): Promise<boolean>;
  release(key: string, token: string): Promise<void>;
}

// Delete only if we still own the key
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

export function createUpstashLockClient(redis: Redis): LockClient {
  return {
    async acquire(key, token, ttlSeconds) {
      const result = await redis.set(key, token, { nx: true, ex: ttlSeconds });
      return result === 'OK';
    },
    async release(key, token) {
      await redis.eval(RELEASE_SCRIPT, [key], [token]);
    },
  };
}

export interface RedisLockOptions {
  ttlSeconds?: number;
  retryDelayMs?: number;
  maxWaitMs?: number;
  prefix?: string;
  logger?: Logger;
}

export function createRedisLock(
  client: LockClient,
  options: RedisLockOptions = {}
): SubscriberLock {
  const ttlSeconds = options.ttlSeconds ?? 30;
  const retryDelayMs = options.retryDelayMs ?? 50;
  const maxWaitMs = options.maxWaitMs ?? 5000;
  const prefix = options.prefix ?? 'lock:';
  const log = options.logger ?? defaultLogger;

  return {
    async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
      const lockKey = `${prefix}${key}`;
      const token = nanoid();
      const startedAt = Date.now();

      while (!(await client.acquire(lockKey, token, ttlSeconds))) {
        const waited = Date.now() - startedAt;
        if (waited >= maxWaitMs) {
          throw new LockTimeoutError(key, waited);
        }
        await sleep(retryDelayMs);
      }

      try {
        return await fn();
      } finally {
        try {
          await client.release(lockKey, token);
        } catch (error) {
          // The TTL reclaims the key
          log.warn('Failed to release subscriber lock', {
            key: lockKey,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    },
  };
}
