/**
 * Plan Routes Unit Tests
 */

import { Hono } from 'hono';
import { describe, it, expect, beforeEach } from 'vitest';

import { createPlanRoutes, formatPlan } from '@/api/routes/plans.js';
import { failure, success } from '@/types/index.js';

import { basicPlan } from '../../fixtures/index.js';
import { createTestActor, mockAuthMiddleware } from '../../helpers/test-utils.js';
import { createMockSubscriptionService } from '../../mocks/index.js';

describe('Plan Routes', () => {
  let service: ReturnType<typeof createMockSubscriptionService>;
  let app: Hono;
  const actor = createTestActor({ requestId: 'req-123' });

  beforeEach(() => {
    service = createMockSubscriptionService();
    app = new Hono();
    app.use('*', mockAuthMiddleware(actor));
    app.route('/api/v1', createPlanRoutes({ subscriptionService: service }));
  });

  describe('GET /plans', () => {
    it('should return plans with wire-format feature values', async () => {
      service.listPlans.mockResolvedValue(success([basicPlan()]));

      const res = await app.request('/api/v1/plans');

      expect(res.status).toBe(200);
      expect(service.listPlans).toHaveBeenCalledWith(actor);
      expect(await res.json()).toMatchObject({
        data: [
          {
            id: 'plan-basic',
            pricings: [{ id: 'basic-monthly', price: 10, durationInDays: 30 }],
            features: expect.arrayContaining([
              expect.objectContaining({
                key: 'api_calls',
                value: { type: 'integer', value: 100 },
                resetPeriod: 'monthly',
              }),
              expect.objectContaining({
                key: 'seats',
                value: {
                  en: { type: 'integer', value: 1000 },
                  ar: { type: 'integer', value: 2000 },
                },
              }),
            ]),
          },
        ],
        meta: { requestId: 'req-123' },
      });
    });
  });

  describe('GET /plans/:planId', () => {
    it('should return a single plan', async () => {
      service.getPlan.mockResolvedValue(success(basicPlan()));

      const res = await app.request('/api/v1/plans/plan-basic');

      expect(res.status).toBe(200);
      expect(service.getPlan).toHaveBeenCalledWith(actor, 'plan-basic');
    });

    it('should return 404 for an unknown plan', async () => {
      service.getPlan.mockResolvedValue(failure('NOT_FOUND', 'Plan not found', { planId: 'x' }));

      const res = await app.request('/api/v1/plans/x');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: {
          code: 'NOT_FOUND',
          message: 'Plan not found',
          details: { planId: 'x' },
          requestId: 'req-123',
        },
      });
    });
  });

  describe('formatPlan()', () => {
    it('should tag flags and strings with their kind', () => {
      const features = formatPlan(basicPlan()).features;

      expect(features.find((f) => f.key === 'priority_support')?.value).toEqual({
        type: 'boolean',
        value: false,
      });
      expect(features.find((f) => f.key === 'storage')?.value).toEqual({
        type: 'string',
        value: 'unlimited',
      });
    });
  });
});
