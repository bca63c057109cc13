/**
 * Subscription Routes
 * Lifecycle actions addressed by subscription id
 */

import { Hono } from 'hono';

import type { SubscriptionService } from '@/services/subscription.service.js';
import type { ActorContext, Result, Subscription } from '@/types/index.js';

import { errorResponse, getActor, getRequestId, successResponse } from '../utils/response.js';

type SubscriptionActionsDep = Pick<
  SubscriptionService,
  | 'getSubscription'
  | 'activate'
  | 'deactivate'
  | 'renew'
  | 'cancel'
  | 'resume'
  | 'expire'
  | 'resetAllUsages'
  | 'getValidationSummary'
  | 'getStatistics'
>;

interface SubscriptionRoutesDeps {
  subscriptionService: SubscriptionActionsDep;
}

type Action = (actor: ActorContext, subscriptionId: string) => Promise<Result<Subscription>>;

/**
 * Create subscription routes
 */
export function createSubscriptionRoutes(deps: SubscriptionRoutesDeps): Hono {
  const { subscriptionService } = deps;
  const app = new Hono();

  const actions: Record<string, Action> = {
    activate: (actor, id) => subscriptionService.activate(actor, id),
    deactivate: (actor, id) => subscriptionService.deactivate(actor, id),
    renew: (actor, id) => subscriptionService.renew(actor, id),
    cancel: (actor, id) => subscriptionService.cancel(actor, id),
    resume: (actor, id) => subscriptionService.resume(actor, id),
    expire: (actor, id) => subscriptionService.expire(actor, id),
  };

  /**
   * GET /subscriptions/statistics
   */
  app.get('/subscriptions/statistics', async (c) => {
    const requestId = getRequestId(c);
    const result = await subscriptionService.getStatistics(getActor(c));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  /**
   * GET /subscriptions/:subscriptionId
   */
  app.get('/subscriptions/:subscriptionId', async (c) => {
    const requestId = getRequestId(c);
    const result = await subscriptionService.getSubscription(
      getActor(c),
      c.req.param('subscriptionId')
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  /**
   * GET /subscriptions/:subscriptionId/validation
   */
  app.get('/subscriptions/:subscriptionId/validation', async (c) => {
    const requestId = getRequestId(c);
    const result = await subscriptionService.getValidationSummary(
      getActor(c),
      c.req.param('subscriptionId')
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  /**
   * POST /subscriptions/:subscriptionId/usage/reset
   * Zero every usage counter of the subscription
   */
  app.post('/subscriptions/:subscriptionId/usage/reset', async (c) => {
    const requestId = getRequestId(c);
    const result = await subscriptionService.resetAllUsages(
      getActor(c),
      c.req.param('subscriptionId')
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, { reset: result.data }, requestId);
  });

  /**
   * POST /subscriptions/:subscriptionId/:action
   * activate | deactivate | renew | cancel | resume | expire
   */
  app.post('/subscriptions/:subscriptionId/:action', async (c) => {
    const requestId = getRequestId(c);
    const name = c.req.param('action');
    const action = Object.hasOwn(actions, name) ? actions[name] : undefined;
    if (action === undefined) {
      return errorResponse(
        c,
        { code: 'NOT_FOUND', message: `Unknown action: ${name}` },
        requestId
      );
    }

    const result = await action(getActor(c), c.req.param('subscriptionId'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  return app;
}
