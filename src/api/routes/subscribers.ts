/**
 * Subscriber Routes
 * Subscriber-scoped lifecycle and feature access
 *
 * Every path is under /subscribers/:subscriberType/:subscriberId; the
 * pair is the host application's own reference and is never resolved
 * here.
 */

import type { Context } from 'hono';
import { Hono } from 'hono';

import type { SubscriptionService } from '@/services/subscription.service.js';
import type { SubscriberRef } from '@/types/index.js';

import {
  changePlanSchema,
  consumeSchema,
  duplicateSchema,
  startTrialSchema,
  subscribeSchema,
} from '../schemas/subscription.schemas.js';
import {
  errorResponse,
  getActor,
  getRequestId,
  parseBody,
  successResponse,
} from '../utils/response.js';

type SubscriberServiceDep = Pick<
  SubscriptionService,
  | 'getActiveSubscription'
  | 'listSubscriptions'
  | 'subscribe'
  | 'startTrial'
  | 'changePlan'
  | 'duplicate'
  | 'getUsageSummary'
  | 'hasFeature'
  | 'getFeatureValue'
  | 'getRemainingUsage'
  | 'isFeatureExhausted'
  | 'canConsumeFeature'
  | 'consumeFeature'
  | 'resetFeatureUsage'
>;

interface SubscriberRoutesDeps {
  subscriptionService: SubscriberServiceDep;
}

const BASE = '/subscribers/:subscriberType/:subscriberId';

function getSubscriber(c: Context): SubscriberRef {
  return {
    type: c.req.param('subscriberType') ?? '',
    id: c.req.param('subscriberId') ?? '',
  };
}

function getLocale(c: Context): string | undefined {
  const locale = c.req.query('locale');
  return locale === undefined || locale === '' ? undefined : locale;
}

/**
 * Create subscriber routes
 */
export function createSubscriberRoutes(deps: SubscriberRoutesDeps): Hono {
  const { subscriptionService } = deps;
  const app = new Hono();

  // ─── SUBSCRIPTIONS ───

  /**
   * GET /subscribers/:type/:id/subscription
   * Current usable subscription, or null
   */
  app.get(`${BASE}/subscription`, async (c) => {
    const requestId = getRequestId(c);
    const result = await subscriptionService.getActiveSubscription(
      getActor(c),
      getSubscriber(c)
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  /**
   * GET /subscribers/:type/:id/subscriptions
   * Full history, newest first
   */
  app.get(`${BASE}/subscriptions`, async (c) => {
    const requestId = getRequestId(c);
    const result = await subscriptionService.listSubscriptions(getActor(c), getSubscriber(c));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  /**
   * POST /subscribers/:type/:id/subscriptions
   */
  app.post(`${BASE}/subscriptions`, async (c) => {
    const requestId = getRequestId(c);
    const body = await parseBody(c, subscribeSchema);
    if (!body.success) {
      return body.response;
    }

    const result = await subscriptionService.subscribe(getActor(c), {
      subscriber: getSubscriber(c),
      planId: body.data.planId,
      pricingId: body.data.pricingId,
      ...(body.data.trialDays !== undefined && { trialDays: body.data.trialDays }),
    });
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId, 201);
  });

  /**
   * POST /subscribers/:type/:id/trial
   */
  app.post(`${BASE}/trial`, async (c) => {
    const requestId = getRequestId(c);
    const body = await parseBody(c, startTrialSchema);
    if (!body.success) {
      return body.response;
    }

    const result = await subscriptionService.startTrial(getActor(c), {
      subscriber: getSubscriber(c),
      planId: body.data.planId,
      ...(body.data.trialDays !== undefined && { trialDays: body.data.trialDays }),
    });
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId, 201);
  });

  /**
   * POST /subscribers/:type/:id/plan-change
   */
  app.post(`${BASE}/plan-change`, async (c) => {
    const requestId = getRequestId(c);
    const body = await parseBody(c, changePlanSchema);
    if (!body.success) {
      return body.response;
    }

    const result = await subscriptionService.changePlan(getActor(c), {
      subscriber: getSubscriber(c),
      planId: body.data.planId,
      pricingId: body.data.pricingId,
      ...(body.data.currency !== undefined && { currency: body.data.currency }),
      ...(body.data.resetUsage !== undefined && { resetUsage: body.data.resetUsage }),
    });
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId, 201);
  });

  /**
   * POST /subscribers/:type/:id/subscriptions/:subscriptionId/duplicate
   */
  app.post(`${BASE}/subscriptions/:subscriptionId/duplicate`, async (c) => {
    const requestId = getRequestId(c);
    const body = await parseBody(c, duplicateSchema);
    if (!body.success) {
      return body.response;
    }

    const result = await subscriptionService.duplicate(getActor(c), {
      subscriber: getSubscriber(c),
      subscriptionId: c.req.param('subscriptionId'),
      ...(body.data.startDate !== undefined && { startDate: new Date(body.data.startDate) }),
      ...(body.data.withTrial !== undefined && { withTrial: body.data.withTrial }),
    });
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId, 201);
  });

  // ─── FEATURES ───

  /**
   * GET /subscribers/:type/:id/usage
   * Per-feature usage summary; null without a usable subscription
   */
  app.get(`${BASE}/usage`, async (c) => {
    const requestId = getRequestId(c);
    const result = await subscriptionService.getUsageSummary(
      getActor(c),
      getSubscriber(c),
      getLocale(c)
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  /**
   * GET /subscribers/:type/:id/features/:key
   */
  app.get(`${BASE}/features/:key`, async (c) => {
    const requestId = getRequestId(c);
    const actor = getActor(c);
    const subscriber = getSubscriber(c);
    const key = c.req.param('key');

    const enabled = await subscriptionService.hasFeature(actor, subscriber, key);
    if (!enabled.success) {
      return errorResponse(c, enabled.error, requestId);
    }
    const value = await subscriptionService.getFeatureValue(actor, subscriber, key, getLocale(c));
    if (!value.success) {
      return errorResponse(c, value.error, requestId);
    }
    const remaining = await subscriptionService.getRemainingUsage(actor, subscriber, key);
    if (!remaining.success) {
      return errorResponse(c, remaining.error, requestId);
    }
    const exhausted = await subscriptionService.isFeatureExhausted(actor, subscriber, key);
    if (!exhausted.success) {
      return errorResponse(c, exhausted.error, requestId);
    }

    return successResponse(
      c,
      {
        key,
        enabled: enabled.data,
        value: value.data,
        remaining: remaining.data,
        exhausted: exhausted.data,
      },
      requestId
    );
  });

  /**
   * GET /subscribers/:type/:id/features/:key/can-consume?amount=N
   */
  app.get(`${BASE}/features/:key/can-consume`, async (c) => {
    const requestId = getRequestId(c);
    const amount = Number(c.req.query('amount') ?? '1');
    if (!Number.isInteger(amount) || amount <= 0) {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: 'amount must be a positive integer' },
        requestId
      );
    }

    const result = await subscriptionService.canConsumeFeature(
      getActor(c),
      getSubscriber(c),
      c.req.param('key'),
      amount
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, { allowed: result.data }, requestId);
  });

  /**
   * POST /subscribers/:type/:id/features/:key/consume
   * `consumed: false` is a normal outcome, not an error
   */
  app.post(`${BASE}/features/:key/consume`, async (c) => {
    const requestId = getRequestId(c);
    const body = await parseBody(c, consumeSchema);
    if (!body.success) {
      return body.response;
    }

    const result = await subscriptionService.consumeFeature(getActor(c), {
      subscriber: getSubscriber(c),
      key: c.req.param('key'),
      amount: body.data.amount,
    });
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  /**
   * POST /subscribers/:type/:id/features/:key/reset
   */
  app.post(`${BASE}/features/:key/reset`, async (c) => {
    const requestId = getRequestId(c);
    const result = await subscriptionService.resetFeatureUsage(
      getActor(c),
      getSubscriber(c),
      c.req.param('key')
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, { reset: result.data }, requestId);
  });

  return app;
}
