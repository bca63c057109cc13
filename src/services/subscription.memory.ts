/**
 * In-memory SubscriptionServiceDb
 *
 * Same contract as the Supabase adapter: rows are cloned on the way in
 * and out, changesets are validated before anything is applied, and
 * the trial/active uniqueness rule of the partial index is enforced.
 * Each method body runs without awaiting in between, so a single call
 * is atomic within the event loop.
 */

import { nanoid } from 'nanoid';

import { applyConsumption } from '@/entitlements/metering.js';
import { isOverdue, isEndingSoon } from '@/entitlements/state-machine.js';
import type {
  Plan,
  ResetPeriod,
  SubscriberRef,
  Subscription,
  SubscriptionStatus,
  SubscriptionUsage,
} from '@/types/index.js';
import {
  ACTIVE_FAMILY_STATUSES,
  ConcurrencyError,
  ConflictError,
} from '@/types/index.js';

import type {
  DueUsage,
  StatusCounts,
  SubscriptionChangeset,
  SubscriptionServiceDb,
} from './subscription.service.js';

export interface InMemorySubscriptionDb extends SubscriptionServiceDb {
  addPlan: (plan: Plan) => void;
  addSubscription: (subscription: Subscription) => void;
  addUsage: (usage: SubscriptionUsage) => void;
  clear: () => void;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

function clone<T>(value: T): T {
  return structuredClone(value);
}

function belongsTo(subscription: Subscription, subscriber: SubscriberRef): boolean {
  return (
    subscription.subscriber.type === subscriber.type &&
    subscription.subscriber.id === subscriber.id
  );
}

function newestFirst(a: Subscription, b: Subscription): number {
  return b.createdAt.getTime() - a.createdAt.getTime();
}

function usageKey(subscriptionId: string, key: string): string {
  return `${subscriptionId}\u0000${key}`;
}

function assertSingleActive(subscriptions: Iterable<Subscription>): void {
  const seen = new Map<string, string>();
  for (const subscription of subscriptions) {
    if (!ACTIVE_FAMILY_STATUSES.includes(subscription.status)) {
      continue;
    }
    const owner = `${subscription.subscriber.type}:${subscription.subscriber.id}`;
    const other = seen.get(owner);
    if (other !== undefined) {
      throw new ConflictError('Subscriber already has an active subscription', {
        subscriptionId: other,
      });
    }
    seen.set(owner, subscription.id);
  }
}

// ─────────────────────────────────────────────────────────────
// IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

export function createInMemorySubscriptionDb(): InMemorySubscriptionDb {
  const plans = new Map<string, Plan>();
  const subscriptions = new Map<string, Subscription>();
  const usages = new Map<string, SubscriptionUsage>();

  function usageRows(subscriptionId: string): SubscriptionUsage[] {
    return [...usages.values()].filter((u) => u.subscriptionId === subscriptionId);
  }

  function featureResetPeriod(planId: string, key: string): ResetPeriod | null {
    const feature = plans.get(planId)?.features.find((f) => f.key === key);
    return feature?.resetPeriod ?? null;
  }

  return {
    addPlan(plan) {
      plans.set(plan.id, clone(plan));
    },

    addSubscription(subscription) {
      subscriptions.set(subscription.id, clone(subscription));
    },

    addUsage(usage) {
      usages.set(usageKey(usage.subscriptionId, usage.key), clone(usage));
    },

    clear() {
      plans.clear();
      subscriptions.clear();
      usages.clear();
    },

    async listPlans() {
      return [...plans.values()]
        .filter((plan) => plan.isActive && plan.deletedAt === null)
        .sort((a, b) => a.sortOrder - b.sortOrder || a.slug.localeCompare(b.slug))
        .map(clone);
    },

    async getPlan(planId) {
      const plan = plans.get(planId);
      return plan === undefined ? null : clone(plan);
    },

    async getSubscription(subscriptionId) {
      const subscription = subscriptions.get(subscriptionId);
      return subscription === undefined ? null : clone(subscription);
    },

    async findActiveFamilySubscription(subscriber) {
      const found = [...subscriptions.values()]
        .filter((s) => belongsTo(s, subscriber) && ACTIVE_FAMILY_STATUSES.includes(s.status))
        .sort(newestFirst)[0];
      return found === undefined ? null : clone(found);
    },

    async listSubscriptions(subscriber) {
      return [...subscriptions.values()]
        .filter((s) => belongsTo(s, subscriber))
        .sort(newestFirst)
        .map(clone);
    },

    async hasUsedTrial(subscriber, planId) {
      return [...subscriptions.values()].some(
        (s) => belongsTo(s, subscriber) && s.planId === planId && s.trialEndsAt !== null
      );
    },

    async findOverdueSubscriptions(now, limit) {
      return [...subscriptions.values()]
        .filter((s) => ACTIVE_FAMILY_STATUSES.includes(s.status) && isOverdue(s, now))
        .sort((a, b) => (a.endsAt?.getTime() ?? 0) - (b.endsAt?.getTime() ?? 0))
        .slice(0, limit)
        .map(clone);
    },

    async findRenewableSubscriptions(endingBefore, limit) {
      return [...subscriptions.values()]
        .filter(
          (s) =>
            s.isAutoRenewal &&
            s.status === 'active' &&
            s.endsAt !== null &&
            s.endsAt.getTime() <= endingBefore.getTime()
        )
        .sort((a, b) => (a.endsAt?.getTime() ?? 0) - (b.endsAt?.getTime() ?? 0))
        .slice(0, limit)
        .map(clone);
    },

    async countSubscriptions(now, expiringSoonDays) {
      const byStatus: Record<SubscriptionStatus, number> = {
        pending: 0,
        trial: 0,
        active: 0,
        inactive: 0,
        canceled: 0,
        expired: 0,
      };
      const counts: StatusCounts = { byStatus, expiringSoon: 0, overdue: 0, autoRenewing: 0 };

      for (const s of subscriptions.values()) {
        byStatus[s.status] += 1;
        if (!ACTIVE_FAMILY_STATUSES.includes(s.status)) {
          continue;
        }
        if (isOverdue(s, now)) {
          counts.overdue += 1;
        } else if (isEndingSoon(s, now, expiringSoonDays)) {
          counts.expiringSoon += 1;
        }
        if (s.isAutoRenewal && s.status === 'active') {
          counts.autoRenewing += 1;
        }
      }
      return counts;
    },

    async getUsage(subscriptionId, key) {
      const usage = usages.get(usageKey(subscriptionId, key));
      return usage === undefined ? null : clone(usage);
    },

    async listUsages(subscriptionId) {
      return usageRows(subscriptionId).map(clone);
    },

    async consumeUsage(request) {
      const id = usageKey(request.subscriptionId, request.key);
      const existing = usages.get(id);
      const { next, outcome } = applyConsumption(
        { used: existing?.used ?? 0, lastUsedAt: existing?.lastUsedAt ?? null },
        request
      );

      if (existing !== undefined) {
        usages.set(id, { ...existing, ...next, updatedAt: request.now });
      } else if (outcome.consumed) {
        usages.set(id, {
          id: nanoid(),
          subscriptionId: request.subscriptionId,
          key: request.key,
          ...next,
          createdAt: request.now,
          updatedAt: request.now,
        });
      }
      return outcome;
    },

    async resetUsage(subscriptionId, key, now) {
      const id = usageKey(subscriptionId, key);
      const existing = usages.get(id);
      if (existing === undefined) {
        return false;
      }
      usages.set(id, { ...existing, used: 0, lastUsedAt: null, updatedAt: now });
      return true;
    },

    async findUsagesDueForReset(period, boundary, limit) {
      const due: DueUsage[] = [];
      for (const usage of usages.values()) {
        const subscription = subscriptions.get(usage.subscriptionId);
        if (
          subscription === undefined ||
          !ACTIVE_FAMILY_STATUSES.includes(subscription.status) ||
          usage.used <= 0 ||
          usage.lastUsedAt === null ||
          usage.lastUsedAt.getTime() >= boundary.getTime() ||
          featureResetPeriod(subscription.planId, usage.key) !== period
        ) {
          continue;
        }
        due.push({
          usage: clone(usage),
          subscriber: clone(subscription.subscriber),
          planId: subscription.planId,
        });
        if (due.length >= limit) {
          break;
        }
      }
      return due;
    },

    async resetUsagesBefore(usageIds, boundary, now) {
      const wanted = new Set(usageIds);
      const reset: string[] = [];
      for (const [id, usage] of usages) {
        if (
          wanted.has(usage.id) &&
          usage.lastUsedAt !== null &&
          usage.lastUsedAt.getTime() < boundary.getTime()
        ) {
          usages.set(id, { ...usage, used: 0, lastUsedAt: null, updatedAt: now });
          reset.push(usage.id);
        }
      }
      return reset;
    },

    async commit(changes: SubscriptionChangeset) {
      const nextSubscriptions = new Map(subscriptions);

      for (const { subscription, expectedVersion } of changes.update ?? []) {
        const stored = nextSubscriptions.get(subscription.id);
        if (stored === undefined || stored.version !== expectedVersion) {
          throw new ConcurrencyError('Subscription was modified concurrently', {
            subscriptionId: subscription.id,
            expectedVersion,
          });
        }
        nextSubscriptions.set(subscription.id, clone(subscription));
      }

      for (const subscription of changes.insert ?? []) {
        if (nextSubscriptions.has(subscription.id)) {
          throw new ConflictError('Subscription id already exists', {
            subscriptionId: subscription.id,
          });
        }
        nextSubscriptions.set(subscription.id, clone(subscription));
      }

      assertSingleActive(nextSubscriptions.values());

      const nextUsages = new Map(usages);
      for (const usage of changes.insertUsages ?? []) {
        const id = usageKey(usage.subscriptionId, usage.key);
        if (nextUsages.has(id)) {
          throw new ConflictError('Usage row already exists', {
            subscriptionId: usage.subscriptionId,
            key: usage.key,
          });
        }
        nextUsages.set(id, clone(usage));
      }

      const resetFor = new Set(changes.resetUsagesFor ?? []);
      for (const [id, usage] of nextUsages) {
        if (resetFor.has(usage.subscriptionId)) {
          nextUsages.set(id, { ...usage, used: 0, lastUsedAt: null });
        }
      }

      subscriptions.clear();
      for (const [id, subscription] of nextSubscriptions) {
        subscriptions.set(id, subscription);
      }
      usages.clear();
      for (const [id, usage] of nextUsages) {
        usages.set(id, usage);
      }
    },
  };
}
