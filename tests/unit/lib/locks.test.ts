/**
 * Subscriber Lock Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { createInProcessLock, createRedisLock, subscriberLockKey } from '@/lib/locks.js';
import { LockTimeoutError } from '@/types/index.js';

import { createCapturingLogger } from '../../helpers/test-utils.js';
import { createFakeLockClient } from '../../mocks/index.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Subscriber Locks', () => {
  it('should build keys from the subscriber reference', () => {
    expect(subscriberLockKey({ type: 'team', id: 't1' })).toBe('subscriber:team:t1');
  });

  describe('createInProcessLock()', () => {
    it('should run callers of the same key one at a time', async () => {
      const lock = createInProcessLock();
      const gate = deferred();
      const order: string[] = [];

      const a = lock.withLock('k', async () => {
        order.push('a-start');
        await gate.promise;
        order.push('a-end');
      });
      const b = lock.withLock('k', async () => {
        order.push('b');
      });

      gate.resolve();
      await Promise.all([a, b]);

      expect(order).toEqual(['a-start', 'a-end', 'b']);
    });

    it('should not block other keys', async () => {
      const lock = createInProcessLock();
      const gate = deferred();
      const order: string[] = [];

      const a = lock.withLock('k1', async () => {
        order.push('a-start');
        await gate.promise;
        order.push('a-end');
      });
      await lock.withLock('k2', async () => {
        order.push('b');
      });
      gate.resolve();
      await a;

      expect(order).toEqual(['a-start', 'b', 'a-end']);
    });

    it('should release the key when the callback throws', async () => {
      const lock = createInProcessLock();

      await expect(
        lock.withLock('k', async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      await expect(lock.withLock('k', async () => 'next')).resolves.toBe('next');
    });
  });

  describe('createRedisLock()', () => {
    it('should acquire and release around the callback', async () => {
      const client = createFakeLockClient();
      const lock = createRedisLock(client);
      let heldDuring = false;

      const value = await lock.withLock('subscriber:team:t1', async () => {
        heldDuring = client.held.has('lock:subscriber:team:t1');
        return 42;
      });

      expect(value).toBe(42);
      expect(heldDuring).toBe(true);
      expect(client.held.size).toBe(0);
    });

    it('should time out while another holder keeps the key', async () => {
      const client = createFakeLockClient();
      client.held.set('lock:k', 'someone-else');
      const lock = createRedisLock(client, { maxWaitMs: 20, retryDelayMs: 5 });

      await expect(lock.withLock('k', async () => 'never')).rejects.toBeInstanceOf(
        LockTimeoutError
      );
      expect(client.held.get('lock:k')).toBe('someone-else');
    });

    it('should return the result when release fails', async () => {
      const client = createFakeLockClient();
      client.release = async () => {
        throw new Error('redis down');
      };
      const { logger, entries } = createCapturingLogger();
      const lock = createRedisLock(client, { logger });

      await expect(lock.withLock('k', async () => 'done')).resolves.toBe('done');
      expect(entries).toHaveLength(1);
      expect(entries[0]?.level).toBe('warn');
      expect(entries[0]?.message).toBe('Failed to release subscriber lock');
      expect(entries[0]?.context).toEqual({ key: 'lock:k', error: 'redis down' });
    });
  });
});
