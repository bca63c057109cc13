/**
 * SubscriptionService Implementation
 *
 * Single entry point for subscriber-facing lifecycle and feature access.
 *
 * Every mutating operation follows the same sequence:
 *   1. take the per-subscriber lock
 *   2. load fresh rows and validate
 *   3. compute the next state with the pure state machine / metering
 *   4. commit one changeset atomically
 *   5. release the lock, then publish the buffered events
 *
 * Lower layers throw EntitlementError subclasses; this is the only
 * layer that turns them into Result failures. Expected negatives
 * (no subscription, exhausted feature) are successful results.
 */

import { nanoid } from 'nanoid';

import {
  assertConsumableAmount,
  effectiveUsed,
  evaluateConsumption,
  featureValue,
  findFeature,
  buildUsageSummary,
  isExhausted,
  remainingUsage,
  resolveLimit,
  type ConsumeOutcome,
  type ConsumeRequest,
  type LocaleOptions,
} from '@/entitlements/metering.js';
import * as machine from '@/entitlements/state-machine.js';
import type { EngineConfig } from '@/lib/config.js';
import { addDays, addHours, diffInDays, systemClock, type Clock } from '@/lib/dates.js';
import { createInProcessLock, subscriberLockKey, type SubscriberLock } from '@/lib/locks.js';
import { logger as defaultLogger, type Logger } from '@/lib/logger.js';
import type {
  ActorContext,
  ChangeType,
  EntitlementEvent,
  FeatureUsageSummary,
  JsonValue,
  Plan,
  PlanChangeSummary,
  PlanPricing,
  ResetPeriod,
  Result,
  SubscriberRef,
  Subscription,
  SubscriptionRenewalFailedEvent,
  SubscriptionStatistics,
  SubscriptionStatus,
  SubscriptionUsage,
} from '@/types/index.js';
import {
  ConflictError,
  EntitlementError,
  InvalidStateError,
  NotFoundError,
  ValidationError,
  fromError,
  success,
} from '@/types/index.js';

import { createCurrencyService, type CurrencyService } from './currency.service.js';
import type { EventService } from './event.service.js';
import {
  createSubscriptionValidator,
  type ValidationSummary,
} from './subscription.validator.js';

// ─────────────────────────────────────────────────────────────
// REPOSITORY INTERFACE
// ─────────────────────────────────────────────────────────────

export interface SubscriptionUpdate {
  subscription: Subscription;
  expectedVersion: number;
}

/**
 * Writes applied in one transaction: updates, then inserts, then usage
 * rows, then usage resets.
 */
export interface SubscriptionChangeset {
  update?: SubscriptionUpdate[];
  insert?: Subscription[];
  insertUsages?: SubscriptionUsage[];
  resetUsagesFor?: string[];
}

export interface DueUsage {
  usage: SubscriptionUsage;
  subscriber: SubscriberRef;
  planId: string;
}

export interface StatusCounts {
  byStatus: Record<SubscriptionStatus, number>;
  expiringSoon: number;
  overdue: number;
  autoRenewing: number;
}

export interface SubscriptionServiceDb {
  listPlans: () => Promise<Plan[]>;
  /** Includes inactive and soft-deleted plans */
  getPlan: (planId: string) => Promise<Plan | null>;

  getSubscription: (subscriptionId: string) => Promise<Subscription | null>;
  /** Newest trial/active subscription, regardless of its dates */
  findActiveFamilySubscription: (subscriber: SubscriberRef) => Promise<Subscription | null>;
  listSubscriptions: (subscriber: SubscriberRef) => Promise<Subscription[]>;
  hasUsedTrial: (subscriber: SubscriberRef, planId: string) => Promise<boolean>;
  findOverdueSubscriptions: (now: Date, limit: number) => Promise<Subscription[]>;
  findRenewableSubscriptions: (endingBefore: Date, limit: number) => Promise<Subscription[]>;
  countSubscriptions: (now: Date, expiringSoonDays: number) => Promise<StatusCounts>;

  getUsage: (subscriptionId: string, key: string) => Promise<SubscriptionUsage | null>;
  listUsages: (subscriptionId: string) => Promise<SubscriptionUsage[]>;
  /** Atomic lazy reset plus conditional increment on one usage row */
  consumeUsage: (request: ConsumeRequest) => Promise<ConsumeOutcome>;
  resetUsage: (subscriptionId: string, key: string, now: Date) => Promise<boolean>;
  findUsagesDueForReset: (
    period: ResetPeriod,
    boundary: Date,
    limit: number
  ) => Promise<DueUsage[]>;
  /** Zero rows still last used before `boundary`; returns the ids reset */
  resetUsagesBefore: (usageIds: string[], boundary: Date, now: Date) => Promise<string[]>;

  commit: (changes: SubscriptionChangeset) => Promise<void>;
}

// ─────────────────────────────────────────────────────────────
// SERVICE INTERFACE
// ─────────────────────────────────────────────────────────────

export type RenewalAuthorization = { approved: true } | { approved: false; reason: string };

export interface BillingHooks {
  authorizeRenewal?: (context: {
    subscription: Subscription;
    plan: Plan;
    pricing: PlanPricing;
    automatic: boolean;
  }) => Promise<RenewalAuthorization>;
}

export interface SubscribeParams {
  subscriber: SubscriberRef;
  planId: string;
  pricingId: string;
  trialDays?: number;
}

export interface StartTrialParams {
  subscriber: SubscriberRef;
  planId: string;
  trialDays?: number;
}

export interface ChangePlanParams {
  subscriber: SubscriberRef;
  planId: string;
  pricingId: string;
  currency?: string;
  resetUsage?: boolean;
}

export interface DuplicateParams {
  subscriber: SubscriberRef;
  subscriptionId: string;
  startDate?: Date;
  withTrial?: boolean;
}

export interface ConsumeParams {
  subscriber: SubscriberRef;
  key: string;
  amount: number;
}

export interface PlanChangeResult {
  subscription: Subscription;
  previousSubscription: Subscription;
  summary: PlanChangeSummary;
}

export interface FeatureConsumption {
  consumed: boolean;
  used: number;
  /** null when unlimited */
  remaining: number | null;
}

/**
 * A sweep step: `changed` is false when the subscription no longer
 * qualified once re-read under the lock
 */
export interface SweepOutcome {
  subscription: Subscription;
  changed: boolean;
}

export interface SubscriptionService {
  listPlans(actor: ActorContext): Promise<Result<Plan[]>>;
  getPlan(actor: ActorContext, planId: string): Promise<Result<Plan>>;

  getSubscription(actor: ActorContext, subscriptionId: string): Promise<Result<Subscription>>;
  getActiveSubscription(
    actor: ActorContext,
    subscriber: SubscriberRef
  ): Promise<Result<Subscription | null>>;
  listSubscriptions(actor: ActorContext, subscriber: SubscriberRef): Promise<Result<Subscription[]>>;

  subscribe(actor: ActorContext, params: SubscribeParams): Promise<Result<Subscription>>;
  startTrial(actor: ActorContext, params: StartTrialParams): Promise<Result<Subscription>>;
  activate(actor: ActorContext, subscriptionId: string): Promise<Result<Subscription>>;
  deactivate(actor: ActorContext, subscriptionId: string): Promise<Result<Subscription>>;
  renew(actor: ActorContext, subscriptionId: string): Promise<Result<Subscription>>;
  /** Automatic renewal; leaves a subscription that is no longer due alone */
  renewIfDue(actor: ActorContext, subscriptionId: string): Promise<Result<SweepOutcome>>;
  cancel(actor: ActorContext, subscriptionId: string): Promise<Result<Subscription>>;
  resume(actor: ActorContext, subscriptionId: string): Promise<Result<Subscription>>;
  expire(actor: ActorContext, subscriptionId: string): Promise<Result<Subscription>>;
  expireIfOverdue(actor: ActorContext, subscriptionId: string): Promise<Result<SweepOutcome>>;
  changePlan(actor: ActorContext, params: ChangePlanParams): Promise<Result<PlanChangeResult>>;
  duplicate(actor: ActorContext, params: DuplicateParams): Promise<Result<Subscription>>;

  hasFeature(actor: ActorContext, subscriber: SubscriberRef, key: string): Promise<Result<boolean>>;
  getFeatureValue(
    actor: ActorContext,
    subscriber: SubscriberRef,
    key: string,
    locale?: string
  ): Promise<Result<JsonValue>>;
  /**
   * 0 without a usable subscription; null when the feature is unlimited
   * or missing from the plan
   */
  getRemainingUsage(
    actor: ActorContext,
    subscriber: SubscriberRef,
    key: string
  ): Promise<Result<number | null>>;
  /** A feature the plan lacks is never exhausted */
  isFeatureExhausted(
    actor: ActorContext,
    subscriber: SubscriberRef,
    key: string
  ): Promise<Result<boolean>>;
  canConsumeFeature(
    actor: ActorContext,
    subscriber: SubscriberRef,
    key: string,
    amount: number
  ): Promise<Result<boolean>>;
  consumeFeature(actor: ActorContext, params: ConsumeParams): Promise<Result<FeatureConsumption>>;
  resetFeatureUsage(
    actor: ActorContext,
    subscriber: SubscriberRef,
    key: string
  ): Promise<Result<boolean>>;
  resetAllUsages(actor: ActorContext, subscriptionId: string): Promise<Result<number>>;

  getUsageSummary(
    actor: ActorContext,
    subscriber: SubscriberRef,
    locale?: string
  ): Promise<Result<FeatureUsageSummary[] | null>>;
  getValidationSummary(
    actor: ActorContext,
    subscriptionId: string
  ): Promise<Result<ValidationSummary>>;
  getStatistics(actor: ActorContext): Promise<Result<SubscriptionStatistics>>;
}

export interface SubscriptionServiceDeps {
  db: SubscriptionServiceDb;
  events: EventService;
  config: EngineConfig;
  locks?: SubscriberLock;
  clock?: Clock;
  logger?: Logger;
  billing?: BillingHooks;
  currency?: CurrencyService;
  generateId?: () => string;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

interface Mutation<T> {
  value: T;
  changes: SubscriptionChangeset | null;
  events: EntitlementEvent[];
}

function sameSubscriber(a: SubscriberRef, b: SubscriberRef): boolean {
  return a.type === b.type && a.id === b.id;
}

function versioned(current: Subscription, next: Subscription): SubscriptionUpdate {
  return {
    subscription: { ...next, version: current.version + 1 },
    expectedVersion: current.version,
  };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Lowest base price first, then the longest duration, then id, so the
 * choice never depends on row order.
 */
export function selectTrialPricing(plan: Plan): PlanPricing | null {
  const sorted = [...plan.pricings].sort(
    (a, b) =>
      a.price - b.price ||
      b.durationInDays - a.durationInDays ||
      a.id.localeCompare(b.id)
  );
  return sorted[0] ?? null;
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

export function createSubscriptionService(deps: SubscriptionServiceDeps): SubscriptionService {
  const { db, events, config } = deps;
  const locks = deps.locks ?? createInProcessLock();
  const clock = deps.clock ?? systemClock;
  const log = deps.logger ?? defaultLogger;
  const billing = deps.billing ?? {};
  const currency = deps.currency ?? createCurrencyService(config.currency);
  const generateId = deps.generateId ?? (() => nanoid());
  const validator = createSubscriptionValidator(config);
  const graceDays = config.gracePeriodDays;

  function localesFor(locale?: string): LocaleOptions {
    return {
      locale: locale ?? config.locale.default,
      fallbackLocale: config.locale.fallback,
    };
  }

  async function run<T>(
    actor: ActorContext,
    operation: string,
    fn: () => Promise<T>
  ): Promise<Result<T>> {
    try {
      return success(await fn());
    } catch (error) {
      if (error instanceof EntitlementError) {
        log.info(`Subscription ${operation} rejected`, {
          requestId: actor.requestId,
          code: error.code,
          reason: error.message,
          ...error.details,
        });
      } else {
        log.error(`Subscription ${operation} failed`, error, {
          requestId: actor.requestId,
        });
      }
      return fromError(error);
    }
  }

  /**
   * Lock, build, commit, unlock, publish
   */
  async function mutate<T>(
    actor: ActorContext,
    operation: string,
    subscriber: SubscriberRef,
    build: (now: Date) => Promise<Mutation<T>>
  ): Promise<Result<T>> {
    return run(actor, operation, async () => {
      validator.assertSubscriber(subscriber);
      const mutation = await locks.withLock(subscriberLockKey(subscriber), async () => {
        const built = await build(clock());
        if (built.changes !== null) {
          await db.commit(built.changes);
        }
        return built;
      });
      await events.publish(mutation.events);
      return mutation.value;
    });
  }

  /**
   * mutate() for an existing subscription; the row is re-read under the lock
   */
  async function mutateSubscription<T>(
    actor: ActorContext,
    operation: string,
    subscriptionId: string,
    build: (current: Subscription, now: Date) => Promise<Mutation<T>>
  ): Promise<Result<T>> {
    const located = await run(actor, operation, () => requireSubscription(subscriptionId));
    if (!located.success) {
      return located;
    }
    return mutate(actor, operation, located.data.subscriber, async (now) =>
      build(await requireSubscription(subscriptionId), now)
    );
  }

  async function requireSubscription(subscriptionId: string): Promise<Subscription> {
    const subscription = await db.getSubscription(subscriptionId);
    if (subscription === null) {
      throw new NotFoundError('Subscription not found', { subscriptionId });
    }
    return subscription;
  }

  async function requirePlan(planId: string): Promise<Plan> {
    const plan = await db.getPlan(planId);
    if (plan === null) {
      throw new NotFoundError('Plan not found', { planId });
    }
    return plan;
  }

  /**
   * Subscriber's current subscription if it still grants access
   */
  async function findUsableSubscription(
    subscriber: SubscriberRef,
    now: Date
  ): Promise<Subscription | null> {
    const subscription = await db.findActiveFamilySubscription(subscriber);
    if (subscription === null || !machine.isActive(subscription, now)) {
      return null;
    }
    return subscription;
  }

  function eventBase(actor: ActorContext, subscriber: SubscriberRef, now: Date) {
    return { subscriber, occurredAt: now, requestId: actor.requestId };
  }

  /**
   * Make room for a new active-family subscription. A usable one is a
   * conflict; a stale one (dates lapsed, not yet swept) is expired in the
   * same changeset.
   */
  async function claimSlot(
    actor: ActorContext,
    subscriber: SubscriberRef,
    now: Date,
    exceptId?: string
  ): Promise<{ updates: SubscriptionUpdate[]; events: EntitlementEvent[] }> {
    const existing = await db.findActiveFamilySubscription(subscriber);
    if (existing === null || existing.id === exceptId) {
      return { updates: [], events: [] };
    }
    if (machine.isActive(existing, now)) {
      throw new ConflictError('Subscriber already has an active subscription', {
        subscriptionId: existing.id,
      });
    }
    const expired = machine.expire(existing, now);
    return {
      updates: [versioned(existing, expired.subscription)],
      events: [
        {
          type: 'subscription.expired',
          ...eventBase(actor, subscriber, now),
          subscription: expired.subscription,
          wasInGracePeriod: expired.wasInGracePeriod,
        },
      ],
    };
  }

  async function assertTrialAllowed(
    subscriber: SubscriberRef,
    planId: string,
    trialDays: number
  ): Promise<void> {
    validator.assertTrialDuration(trialDays);
    if (
      !config.trial.allowMultipleTrialsPerPlan &&
      (await db.hasUsedTrial(subscriber, planId))
    ) {
      throw new ValidationError('Subscriber has already used a trial for this plan', {
        planId,
      });
    }
  }

  function newSubscription(fields: {
    subscriber: SubscriberRef;
    plan: Plan;
    pricing: PlanPricing;
    status: SubscriptionStatus;
    startsAt: Date;
    endsAt: Date | null;
    trialEndsAt: Date | null;
    now: Date;
  }): Subscription {
    return {
      id: generateId(),
      subscriber: fields.subscriber,
      planId: fields.plan.id,
      planPricingId: fields.pricing.id,
      status: fields.status,
      isAutoRenewal: config.autoRenewalDefault,
      startsAt: fields.startsAt,
      endsAt: fields.endsAt,
      trialEndsAt: fields.trialEndsAt,
      graceEndsAt: fields.endsAt === null ? null : addDays(fields.endsAt, graceDays),
      canceledAt: null,
      version: 1,
      createdAt: fields.now,
      updatedAt: fields.now,
    };
  }

  function copyUsages(
    usages: SubscriptionUsage[],
    subscriptionId: string,
    reset: boolean,
    now: Date
  ): SubscriptionUsage[] {
    return usages.map((usage) => ({
      id: generateId(),
      subscriptionId,
      key: usage.key,
      used: reset ? 0 : usage.used,
      lastUsedAt: reset ? null : usage.lastUsedAt,
      createdAt: now,
      updatedAt: now,
    }));
  }

  function endsAfter(start: Date, pricing: PlanPricing): Date | null {
    return pricing.durationInDays > 0 ? addDays(start, pricing.durationInDays) : null;
  }

  function classifyChange(oldPricing: PlanPricing, newPricing: PlanPricing): ChangeType {
    const base = currency.getDefaultCurrency();
    const oldPrice = currency.getPrice(oldPricing, base).amount;
    const newPrice = currency.getPrice(newPricing, base).amount;
    if (newPrice > oldPrice) {
      return 'upgrade';
    }
    if (newPrice < oldPrice) {
      return 'downgrade';
    }
    return 'lateral';
  }

  /**
   * Daily-rate difference over the whole days left on the current
   * period, with both prices in one currency.
   */
  function prorate(
    current: Subscription,
    oldPricing: PlanPricing,
    newPricing: PlanPricing,
    requested: string | undefined,
    now: Date
  ): { currency: string; amount: number } {
    let oldPrice = currency.getPrice(oldPricing, requested);
    let newPrice = currency.getPrice(newPricing, requested);
    if (oldPrice.currency !== newPrice.currency) {
      oldPrice = currency.getPrice(oldPricing, currency.getDefaultCurrency());
      newPrice = currency.getPrice(newPricing, currency.getDefaultCurrency());
    }

    const days = current.endsAt === null ? 0 : diffInDays(now, current.endsAt);
    if (days <= 0 || oldPricing.durationInDays <= 0 || newPricing.durationInDays <= 0) {
      return { currency: newPrice.currency, amount: 0 };
    }

    const oldDaily = oldPrice.amount / oldPricing.durationInDays;
    const newDaily = newPrice.amount / newPricing.durationInDays;
    return { currency: newPrice.currency, amount: round2((newDaily - oldDaily) * days) };
  }

  async function assertNoExcessUsage(
    current: Subscription,
    newPlan: Plan,
    now: Date
  ): Promise<void> {
    const usages = await db.listUsages(current.id);
    for (const feature of newPlan.features) {
      const limit = resolveLimit(feature, localesFor());
      if (limit.type !== 'metered') {
        continue;
      }
      const usage = usages.find((u) => u.key === feature.key) ?? null;
      const used = effectiveUsed(feature, usage, now);
      if (used > limit.limit) {
        throw new ValidationError('Current usage exceeds the limit of the new plan', {
          key: feature.key,
          used,
          limit: limit.limit,
        });
      }
    }
  }

  type RenewalCheck =
    | { ok: true; pricing: PlanPricing }
    | { ok: false; reason: string };

  /**
   * Plan and pricing must still be on sale, and billing must agree
   */
  async function checkRenewal(
    subscription: Subscription,
    automatic: boolean
  ): Promise<RenewalCheck> {
    const plan = await db.getPlan(subscription.planId);
    if (plan === null || plan.deletedAt !== null || !plan.isActive) {
      return { ok: false, reason: 'Plan is no longer available' };
    }
    const pricing = plan.pricings.find((p) => p.id === subscription.planPricingId);
    if (pricing === undefined) {
      return { ok: false, reason: 'Pricing is no longer available' };
    }
    if (billing.authorizeRenewal !== undefined) {
      const decision = await billing.authorizeRenewal({ subscription, plan, pricing, automatic });
      if (!decision.approved) {
        return { ok: false, reason: `Renewal was declined: ${decision.reason}` };
      }
    }
    return { ok: true, pricing };
  }

  async function featureContext(subscriber: SubscriberRef, key: string, now: Date) {
    validator.assertSubscriber(subscriber);
    validator.assertFeatureKey(key);
    const subscription = await findUsableSubscription(subscriber, now);
    if (subscription === null) {
      return null;
    }
    const plan = await requirePlan(subscription.planId);
    const feature = findFeature(plan, key);
    const usage = feature === null ? null : await db.getUsage(subscription.id, key);
    return { subscription, plan, feature, usage };
  }

  // ─── RENEWAL AND EXPIRY ───

  async function renewSubscription(
    actor: ActorContext,
    subscriptionId: string,
    automatic: boolean
  ): Promise<Result<SweepOutcome>> {
    const declined: SubscriptionRenewalFailedEvent[] = [];

    const result = await mutateSubscription(
      actor,
      'renew',
      subscriptionId,
      async (current, now): Promise<Mutation<SweepOutcome>> => {
        if (
          automatic &&
          !machine.shouldAutoRenew(current, addHours(now, config.renewal.lookaheadHours))
        ) {
          return { value: { subscription: current, changed: false }, changes: null, events: [] };
        }
        if (!machine.canRenew(current)) {
          throw new InvalidStateError(`Cannot renew a ${current.status} subscription`, {
            subscriptionId: current.id,
          });
        }

        const check = await checkRenewal(current, automatic);
        if (!check.ok) {
          declined.push({
            type: 'subscription.renewal_failed',
            ...eventBase(actor, current.subscriber, now),
            subscription: current,
            reason: check.reason,
          });
          throw new InvalidStateError(check.reason, {
            subscriptionId: current.id,
            planId: current.planId,
          });
        }

        const slot =
          current.status === 'active'
            ? { updates: [], events: [] }
            : await claimSlot(actor, current.subscriber, now, current.id);
        const next = machine.renew(current, now, check.pricing.durationInDays, graceDays);
        const update = versioned(current, next);

        return {
          value: { subscription: update.subscription, changed: true },
          changes: { update: [...slot.updates, update] },
          events: [
            ...slot.events,
            {
              type: 'subscription.renewed',
              ...eventBase(actor, current.subscriber, now),
              subscription: update.subscription,
              automatic,
              previousEndsAt: current.endsAt,
            },
          ],
        };
      }
    );

    if (!result.success && declined.length > 0) {
      await events.publish(declined);
    }
    return result;
  }

  async function expireSubscription(
    actor: ActorContext,
    subscriptionId: string,
    onlyIfOverdue: boolean
  ): Promise<Result<SweepOutcome>> {
    return mutateSubscription(
      actor,
      'expire',
      subscriptionId,
      async (current, now): Promise<Mutation<SweepOutcome>> => {
        if (
          onlyIfOverdue &&
          !(machine.isActiveFamily(current.status) && machine.isOverdue(current, now))
        ) {
          return { value: { subscription: current, changed: false }, changes: null, events: [] };
        }
        const outcome = machine.expire(current, now);
        const update = versioned(current, outcome.subscription);
        return {
          value: { subscription: update.subscription, changed: true },
          changes: { update: [update] },
          events: [
            {
              type: 'subscription.expired',
              ...eventBase(actor, current.subscriber, now),
              subscription: update.subscription,
              wasInGracePeriod: outcome.wasInGracePeriod,
            },
          ],
        };
      }
    );
  }

  const service: SubscriptionService = {
    // ─── QUERIES ───

    async listPlans(actor) {
      return run(actor, 'listPlans', () => db.listPlans());
    },

    async getPlan(actor, planId) {
      return run(actor, 'getPlan', () => requirePlan(planId));
    },

    async getSubscription(actor, subscriptionId) {
      return run(actor, 'getSubscription', () => requireSubscription(subscriptionId));
    },

    async getActiveSubscription(actor, subscriber) {
      return run(actor, 'getActiveSubscription', () => {
        validator.assertSubscriber(subscriber);
        return findUsableSubscription(subscriber, clock());
      });
    },

    async listSubscriptions(actor, subscriber) {
      return run(actor, 'listSubscriptions', () => {
        validator.assertSubscriber(subscriber);
        return db.listSubscriptions(subscriber);
      });
    },

    // ─── LIFECYCLE ───

    async subscribe(actor, params) {
      const { subscriber, planId, pricingId } = params;
      const trialDays = params.trialDays ?? 0;

      return mutate(actor, 'subscribe', subscriber, async (now) => {
        const slot = await claimSlot(actor, subscriber, now);
        const plan = validator.assertPlanAvailable(await db.getPlan(planId), planId);
        const pricing = validator.findPricing(plan, pricingId);
        if (trialDays > 0) {
          await assertTrialAllowed(subscriber, planId, trialDays);
        }

        const subscription = newSubscription({
          subscriber,
          plan,
          pricing,
          status: trialDays > 0 ? 'trial' : 'active',
          startsAt: now,
          endsAt: endsAfter(now, pricing),
          trialEndsAt: trialDays > 0 ? addDays(now, trialDays) : null,
          now,
        });

        const base = eventBase(actor, subscriber, now);
        const started: EntitlementEvent =
          trialDays > 0
            ? { type: 'trial.started', ...base, subscription, trialDays }
            : { type: 'subscription.started', ...base, subscription, resumed: false };

        return {
          value: subscription,
          changes: { update: slot.updates, insert: [subscription] },
          events: [
            ...slot.events,
            {
              type: 'subscription.created',
              ...base,
              subscription,
              action: 'subscribe',
              withTrial: trialDays > 0,
            },
            started,
          ],
        };
      });
    },

    async startTrial(actor, params) {
      const { subscriber, planId } = params;
      const trialDays = params.trialDays ?? config.trialPeriodDays;

      return mutate(actor, 'startTrial', subscriber, async (now) => {
        const slot = await claimSlot(actor, subscriber, now);
        const plan = validator.assertPlanAvailable(await db.getPlan(planId), planId);
        await assertTrialAllowed(subscriber, planId, trialDays);

        const pricing = selectTrialPricing(plan);
        if (pricing === null) {
          throw new ValidationError('Plan has no pricing to start a trial on', { planId });
        }

        const trialEndsAt = addDays(now, trialDays);
        const subscription = newSubscription({
          subscriber,
          plan,
          pricing,
          status: 'trial',
          startsAt: now,
          endsAt: endsAfter(trialEndsAt, pricing),
          trialEndsAt,
          now,
        });

        const base = eventBase(actor, subscriber, now);
        return {
          value: subscription,
          changes: { update: slot.updates, insert: [subscription] },
          events: [
            ...slot.events,
            {
              type: 'subscription.created',
              ...base,
              subscription,
              action: 'trial',
              withTrial: true,
            },
            { type: 'trial.started', ...base, subscription, trialDays },
          ],
        };
      });
    },

    async activate(actor, subscriptionId) {
      return mutateSubscription(actor, 'activate', subscriptionId, async (current, now) => {
        const outcome = machine.activate(current, now);
        if (!outcome.changed) {
          return { value: current, changes: null, events: [] };
        }
        const slot = await claimSlot(actor, current.subscriber, now, current.id);
        const update = versioned(current, outcome.subscription);
        return {
          value: update.subscription,
          changes: { update: [...slot.updates, update] },
          events: [
            ...slot.events,
            {
              type: 'subscription.started',
              ...eventBase(actor, current.subscriber, now),
              subscription: update.subscription,
              resumed: false,
            },
          ],
        };
      });
    },

    async deactivate(actor, subscriptionId) {
      return mutateSubscription(actor, 'deactivate', subscriptionId, async (current, now) => {
        const update = versioned(current, machine.deactivate(current, now));
        return {
          value: update.subscription,
          changes: { update: [update] },
          events: [
            {
              type: 'subscription.deactivated',
              ...eventBase(actor, current.subscriber, now),
              subscription: update.subscription,
            },
          ],
        };
      });
    },

    async renew(actor, subscriptionId) {
      const result = await renewSubscription(actor, subscriptionId, false);
      return result.success ? success(result.data.subscription) : result;
    },

    async renewIfDue(actor, subscriptionId) {
      return renewSubscription(actor, subscriptionId, true);
    },

    async cancel(actor, subscriptionId) {
      return mutateSubscription(actor, 'cancel', subscriptionId, async (current, now) => {
        const update = versioned(current, machine.cancel(current, now, graceDays));
        return {
          value: update.subscription,
          changes: { update: [update] },
          events: [
            {
              type: 'subscription.canceled',
              ...eventBase(actor, current.subscriber, now),
              subscription: update.subscription,
            },
          ],
        };
      });
    },

    async resume(actor, subscriptionId) {
      return mutateSubscription(actor, 'resume', subscriptionId, async (current, now) => {
        const next = machine.resume(current, now);
        const existing = await db.findActiveFamilySubscription(current.subscriber);
        if (existing !== null && existing.id !== current.id) {
          throw new ConflictError('Subscriber already has an active subscription', {
            subscriptionId: existing.id,
          });
        }
        const update = versioned(current, next);
        return {
          value: update.subscription,
          changes: { update: [update] },
          events: [
            {
              type: 'subscription.started',
              ...eventBase(actor, current.subscriber, now),
              subscription: update.subscription,
              resumed: true,
            },
          ],
        };
      });
    },

    async expire(actor, subscriptionId) {
      const result = await expireSubscription(actor, subscriptionId, false);
      return result.success ? success(result.data.subscription) : result;
    },

    async expireIfOverdue(actor, subscriptionId) {
      return expireSubscription(actor, subscriptionId, true);
    },

    async changePlan(actor, params) {
      const { subscriber, planId, pricingId } = params;

      return mutate(actor, 'changePlan', subscriber, async (now) => {
        const current = await findUsableSubscription(subscriber, now);
        if (current === null) {
          throw new NotFoundError('Subscriber has no active subscription');
        }
        if (current.status === 'trial' && !config.planChanges.allowPlanChangeDuringTrial) {
          throw new InvalidStateError('Plan changes are not allowed during a trial', {
            subscriptionId: current.id,
          });
        }
        if (current.planId === planId && current.planPricingId === pricingId) {
          throw new ValidationError('Subscriber is already on this plan and pricing', {
            planId,
            pricingId,
          });
        }

        const newPlan = validator.assertPlanAvailable(await db.getPlan(planId), planId);
        const newPricing = validator.findPricing(newPlan, pricingId);
        const oldPlan = await requirePlan(current.planId);
        const oldPricing = oldPlan.pricings.find((p) => p.id === current.planPricingId);
        if (oldPricing === undefined) {
          throw new NotFoundError('Current pricing not found', {
            pricingId: current.planPricingId,
          });
        }

        const changeType = classifyChange(oldPricing, newPricing);
        if (changeType === 'downgrade' && !config.planChanges.allowDowngrades) {
          throw new ValidationError('Downgrades are not allowed', { planId });
        }

        const usageReset =
          params.resetUsage ??
          (changeType === 'downgrade' && config.planChanges.resetUsageOnPlanChange);
        if (
          changeType === 'downgrade' &&
          !usageReset &&
          config.planChanges.preventDowngradeWithExcessUsage
        ) {
          await assertNoExcessUsage(current, newPlan, now);
        }

        const proration = prorate(current, oldPricing, newPricing, params.currency, now);
        machine.assertTransition(current, 'canceled');
        const previous = versioned(current, {
          ...current,
          status: 'canceled',
          isAutoRenewal: false,
          canceledAt: now,
          updatedAt: now,
        });

        const subscription = newSubscription({
          subscriber,
          plan: newPlan,
          pricing: newPricing,
          status: 'active',
          startsAt: now,
          endsAt: endsAfter(now, newPricing),
          trialEndsAt: null,
          now,
        });
        const usages = copyUsages(await db.listUsages(current.id), subscription.id, usageReset, now);

        const summary: PlanChangeSummary = {
          changeType,
          oldPlanId: current.planId,
          newPlanId: newPlan.id,
          oldPricingId: current.planPricingId,
          newPricingId: newPricing.id,
          currency: proration.currency,
          prorationAmount: proration.amount,
          usageReset,
          changedAt: now,
        };

        return {
          value: { subscription, previousSubscription: previous.subscription, summary },
          changes: { update: [previous], insert: [subscription], insertUsages: usages },
          events: [
            {
              type: 'subscription.changed',
              ...eventBase(actor, subscriber, now),
              subscription,
              previousSubscription: previous.subscription,
              summary,
            },
          ],
        };
      });
    },

    async duplicate(actor, params) {
      const { subscriber, subscriptionId } = params;
      const withTrial = params.withTrial ?? false;

      return mutate(actor, 'duplicate', subscriber, async (now) => {
        const source = await requireSubscription(subscriptionId);
        if (!sameSubscriber(source.subscriber, subscriber)) {
          throw new NotFoundError('Subscription not found', { subscriptionId });
        }
        if (!['expired', 'canceled', 'inactive'].includes(source.status)) {
          throw new InvalidStateError(
            'Only expired, canceled or inactive subscriptions can be duplicated',
            { subscriptionId, status: source.status }
          );
        }

        const slot = await claimSlot(actor, subscriber, now);
        const plan = validator.assertPlanAvailable(await db.getPlan(source.planId), source.planId);
        const pricing = validator.findPricing(plan, source.planPricingId);
        const trialDays = withTrial ? config.trialPeriodDays : 0;
        if (withTrial) {
          await assertTrialAllowed(subscriber, plan.id, trialDays);
        }

        const start = params.startDate ?? now;
        const subscription = newSubscription({
          subscriber,
          plan,
          pricing,
          status: withTrial ? 'trial' : 'active',
          startsAt: start,
          endsAt: endsAfter(start, pricing),
          trialEndsAt: withTrial ? addDays(start, trialDays) : null,
          now,
        });
        const usages = copyUsages(await db.listUsages(source.id), subscription.id, true, now);

        const base = eventBase(actor, subscriber, now);
        const created: EntitlementEvent[] = [
          {
            type: 'subscription.created',
            ...base,
            subscription,
            action: 'duplicate',
            originalSubscriptionId: source.id,
            withTrial,
          },
          { type: 'subscription.started', ...base, subscription, resumed: false },
        ];
        if (withTrial) {
          created.push({ type: 'trial.started', ...base, subscription, trialDays });
        }

        return {
          value: subscription,
          changes: { update: slot.updates, insert: [subscription], insertUsages: usages },
          events: [...slot.events, ...created],
        };
      });
    },

    // ─── FEATURE ACCESS ───

    async hasFeature(actor, subscriber, key) {
      return run(actor, 'hasFeature', async () => {
        const context = await featureContext(subscriber, key, clock());
        return context !== null && context.feature !== null;
      });
    },

    async getFeatureValue(actor, subscriber, key, locale) {
      return run(actor, 'getFeatureValue', async () => {
        const context = await featureContext(subscriber, key, clock());
        if (context === null || context.feature === null) {
          return null;
        }
        return featureValue(context.feature, localesFor(locale));
      });
    },

    async getRemainingUsage(actor, subscriber, key) {
      return run(actor, 'getRemainingUsage', async () => {
        const now = clock();
        const context = await featureContext(subscriber, key, now);
        if (context === null) {
          return 0;
        }
        if (context.feature === null) {
          return null;
        }
        const limit = resolveLimit(context.feature, localesFor());
        return remainingUsage(limit, effectiveUsed(context.feature, context.usage, now));
      });
    },

    async isFeatureExhausted(actor, subscriber, key) {
      return run(actor, 'isFeatureExhausted', async () => {
        const now = clock();
        const context = await featureContext(subscriber, key, now);
        if (context === null) {
          return true;
        }
        if (context.feature === null) {
          return false;
        }
        const limit = resolveLimit(context.feature, localesFor());
        return isExhausted(limit, effectiveUsed(context.feature, context.usage, now));
      });
    },

    async canConsumeFeature(actor, subscriber, key, amount) {
      return run(actor, 'canConsumeFeature', async () => {
        const now = clock();
        const context = await featureContext(subscriber, key, now);
        if (context === null) {
          return false;
        }
        return evaluateConsumption({
          subscription: context.subscription,
          plan: context.plan,
          usage: context.usage,
          key,
          amount,
          now,
          locales: localesFor(),
        }).allowed;
      });
    },

    async consumeFeature(actor, params) {
      const { subscriber, key, amount } = params;

      return mutate(actor, 'consumeFeature', subscriber, async (now) => {
        assertConsumableAmount(key, amount);
        const context = await featureContext(subscriber, key, now);
        if (context === null) {
          return { value: { consumed: false, used: 0, remaining: 0 }, changes: null, events: [] };
        }

        const { subscription, plan, feature, usage } = context;
        const decision = evaluateConsumption({
          subscription,
          plan,
          usage,
          key,
          amount,
          now,
          locales: localesFor(),
        });
        if (!decision.allowed) {
          return {
            value: {
              consumed: false,
              used: feature === null ? 0 : effectiveUsed(feature, usage, now),
              remaining: decision.remaining,
            },
            changes: null,
            events: [],
          };
        }

        const outcome = await db.consumeUsage({
          subscriptionId: subscription.id,
          key,
          amount,
          limit: decision.limit,
          resetBefore: decision.resetBefore,
          now,
        });
        const remaining =
          decision.limit === null ? null : Math.max(0, decision.limit - outcome.used);

        return {
          value: { consumed: outcome.consumed, used: outcome.used, remaining },
          changes: null,
          events: outcome.consumed
            ? [
                {
                  type: 'feature.used',
                  ...eventBase(actor, subscriber, now),
                  subscription,
                  featureKey: key,
                  amount,
                  remaining: remaining ?? -1,
                },
              ]
            : [],
        };
      });
    },

    async resetFeatureUsage(actor, subscriber, key) {
      return mutate(actor, 'resetFeatureUsage', subscriber, async (now) => {
        validator.assertFeatureKey(key);
        const subscription = await findUsableSubscription(subscriber, now);
        if (subscription === null) {
          return { value: false, changes: null, events: [] };
        }
        const previous = await db.getUsage(subscription.id, key);
        const reset = await db.resetUsage(subscription.id, key, now);
        return {
          value: reset,
          changes: null,
          events:
            reset && previous !== null
              ? [
                  {
                    type: 'feature.usage_reset',
                    ...eventBase(actor, subscriber, now),
                    subscriptionId: subscription.id,
                    featureKey: key,
                    previousUsed: previous.used,
                  },
                ]
              : [],
        };
      });
    },

    async resetAllUsages(actor, subscriptionId) {
      return mutateSubscription(actor, 'resetAllUsages', subscriptionId, async (current, now) => {
        const usages = await db.listUsages(current.id);
        return {
          value: usages.length,
          changes: { resetUsagesFor: [current.id] },
          events: usages
            .filter((usage) => usage.used > 0)
            .map((usage) => ({
              type: 'feature.usage_reset' as const,
              ...eventBase(actor, current.subscriber, now),
              subscriptionId: current.id,
              featureKey: usage.key,
              previousUsed: usage.used,
            })),
        };
      });
    },

    // ─── REPORTING ───

    async getUsageSummary(actor, subscriber, locale) {
      return run(actor, 'getUsageSummary', async () => {
        validator.assertSubscriber(subscriber);
        const now = clock();
        const subscription = await findUsableSubscription(subscriber, now);
        if (subscription === null) {
          return null;
        }
        const plan = await requirePlan(subscription.planId);
        const usages = await db.listUsages(subscription.id);
        return buildUsageSummary(plan, usages, now, localesFor(locale));
      });
    },

    async getValidationSummary(actor, subscriptionId) {
      return run(actor, 'getValidationSummary', async () => {
        const subscription = await requireSubscription(subscriptionId);
        return validator.summarize(subscription, clock());
      });
    },

    async getStatistics(actor) {
      return run(actor, 'getStatistics', async () => {
        const counts = await db.countSubscriptions(clock(), config.expiringSoonDays);
        return {
          byStatus: counts.byStatus,
          active: counts.byStatus.active + counts.byStatus.trial,
          expiringSoon: counts.expiringSoon,
          overdue: counts.overdue,
          autoRenewing: counts.autoRenewing,
          health: counts.overdue > 0 ? 'warning' : 'healthy',
        };
      });
    },
  };

  return service;
}
