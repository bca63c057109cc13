/**
 * Plan Routes
 * Read-only catalogue of plans, pricings and features
 */

import { Hono } from 'hono';

import { toWire } from '@/entitlements/flexible-value.js';
import type { SubscriptionService } from '@/services/subscription.service.js';
import type { Plan } from '@/types/index.js';

import { errorResponse, getActor, getRequestId, successResponse } from '../utils/response.js';

interface PlanRoutesDeps {
  subscriptionService: Pick<SubscriptionService, 'listPlans' | 'getPlan'>;
}

/**
 * Feature values go out in their self-describing wire form so clients
 * can tell 100 from "100" and see every locale variant.
 */
export function formatPlan(plan: Plan) {
  return {
    ...plan,
    features: plan.features.map((feature) => ({
      ...feature,
      value: toWire(feature.value),
    })),
  };
}

export function createPlanRoutes(deps: PlanRoutesDeps): Hono {
  const { subscriptionService } = deps;
  const app = new Hono();

  /**
   * GET /plans
   * Active, non-deleted plans ordered by sort order
   */
  app.get('/plans', async (c) => {
    const requestId = getRequestId(c);
    const result = await subscriptionService.listPlans(getActor(c));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data.map(formatPlan), requestId);
  });

  /**
   * GET /plans/:planId
   */
  app.get('/plans/:planId', async (c) => {
    const requestId = getRequestId(c);
    const result = await subscriptionService.getPlan(getActor(c), c.req.param('planId'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, formatPlan(result.data), requestId);
  });

  return app;
}
