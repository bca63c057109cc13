/**
 * App Wiring Unit Tests
 * Middleware order, auth boundary and the global handlers
 */

import type { Hono } from 'hono';
import { describe, it, expect, beforeEach } from 'vitest';

import { createApp } from '@/api/app.js';
import type { LogEntry } from '@/lib/logger.js';
import { success } from '@/types/index.js';

import { NOW } from '../../fixtures/index.js';
import { createCapturingLogger } from '../../helpers/test-utils.js';
import { createMockJobs, createMockSubscriptionService } from '../../mocks/index.js';

const AUTH = { Authorization: 'Bearer test-secret' };

describe('createApp', () => {
  let service: ReturnType<typeof createMockSubscriptionService>;
  let entries: LogEntry[];
  let app: Hono;

  beforeEach(() => {
    service = createMockSubscriptionService();
    const captured = createCapturingLogger('debug');
    entries = captured.entries;
    app = createApp({
      services: { subscriptionService: service, jobs: createMockJobs() },
      apiKey: 'test-secret',
      allowedOrigins: ['https://app.example.test'],
      logger: captured.logger,
      clock: () => NOW,
      accessLog: false,
    });
  });

  it('should serve health without a key', async () => {
    const res = await app.request('/api/v1/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ timestamp: '2025-03-15T12:00:00.000Z' });
  });

  it('should protect the engine routes', async () => {
    const paths = [
      '/api/v1/plans',
      '/api/v1/subscribers/team/team-1/subscription',
      '/api/v1/subscriptions/statistics',
    ];

    for (const path of paths) {
      const res = await app.request(path);
      expect(res.status).toBe(401);
    }
    const job = await app.request('/api/v1/jobs/expire', { method: 'POST' });
    expect(job.status).toBe(401);
  });

  it('should hand the authenticated actor to the service', async () => {
    service.listPlans.mockResolvedValue(success([]));

    const res = await app.request('/api/v1/plans', {
      headers: { ...AUTH, 'X-Request-ID': 'req-7', 'X-Client-ID': 'storefront' },
    });

    expect(res.status).toBe(200);
    expect(res.headers.get('X-Request-ID')).toBe('req-7');
    expect(service.listPlans).toHaveBeenCalledWith({
      type: 'service',
      requestId: 'req-7',
      clientId: 'storefront',
    });
  });

  it('should answer unknown endpoints with 404', async () => {
    const res = await app.request('/api/v1/nothing-here', {
      headers: { ...AUTH, 'X-Request-ID': 'req-8' },
    });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: 'NOT_FOUND', message: 'Endpoint not found', requestId: 'req-8' },
    });
  });

  it('should turn a thrown error into a logged 500', async () => {
    service.listPlans.mockRejectedValue(new Error('socket hang up'));

    const res = await app.request('/api/v1/plans', {
      headers: { ...AUTH, 'X-Request-ID': 'req-9' },
    });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
        requestId: 'req-9',
      },
    });
    expect(entries.find((e) => e.message === 'Unhandled error')).toMatchObject({
      level: 'error',
      requestId: 'req-9',
      error: { message: 'socket hang up' },
      context: { path: '/api/v1/plans' },
    });
  });

  it('should allow configured origins', async () => {
    service.listPlans.mockResolvedValue(success([]));

    const res = await app.request('/api/v1/plans', {
      headers: { ...AUTH, Origin: 'https://app.example.test' },
    });

    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('https://app.example.test');
  });
});
