/**
 * Subscription State Machine
 *
 * Legal status edges, time-window predicates and the pure transition
 * functions used by the subscription service. Transitions never write;
 * they return the updated subscription and throw InvalidStateError when
 * the move is not allowed.
 */

import { addDays, diffInDays, isAfter, isBefore } from '@/lib/dates.js';
import type {
  Subscription,
  SubscriptionStatus,
} from '@/types/index.js';
import { ACTIVE_FAMILY_STATUSES, InvalidStateError } from '@/types/index.js';

// ─────────────────────────────────────────────────────────────
// TRANSITION TABLE
// ─────────────────────────────────────────────────────────────

const TRANSITIONS: Record<SubscriptionStatus, readonly SubscriptionStatus[]> = {
  pending: ['trial', 'active', 'canceled', 'expired'],
  trial: ['active', 'canceled', 'expired'],
  active: ['inactive', 'canceled', 'expired'],
  inactive: ['active', 'canceled', 'expired'],
  canceled: ['active'],
  expired: ['active'],
};

export function canTransition(
  from: SubscriptionStatus,
  to: SubscriptionStatus
): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(
  subscription: Subscription,
  to: SubscriptionStatus
): void {
  if (!canTransition(subscription.status, to)) {
    throw new InvalidStateError(
      `Cannot move subscription from ${subscription.status} to ${to}`,
      { subscriptionId: subscription.id, from: subscription.status, to }
    );
  }
}

// ─────────────────────────────────────────────────────────────
// PREDICATES
// ─────────────────────────────────────────────────────────────

export function isActiveFamily(status: SubscriptionStatus): boolean {
  return ACTIVE_FAMILY_STATUSES.includes(status);
}

export function isLifetime(subscription: Subscription): boolean {
  return subscription.endsAt === null;
}

export function isInGracePeriod(subscription: Subscription, now: Date): boolean {
  const { graceEndsAt, endsAt } = subscription;
  if (graceEndsAt === null || isBefore(graceEndsAt, now)) {
    return false;
  }
  return endsAt === null || isBefore(endsAt, now);
}

export function hasValidPeriod(subscription: Subscription, now: Date): boolean {
  const { endsAt } = subscription;
  if (endsAt === null) {
    return true;
  }
  return !isBefore(endsAt, now) || isInGracePeriod(subscription, now);
}

export function isActive(subscription: Subscription, now: Date): boolean {
  return isActiveFamily(subscription.status) && hasValidPeriod(subscription, now);
}

export function isOnTrial(subscription: Subscription, now: Date): boolean {
  return (
    subscription.status === 'trial' &&
    subscription.trialEndsAt !== null &&
    isAfter(subscription.trialEndsAt, now)
  );
}

/**
 * Paid window over and no grace left to absorb it
 */
export function isOverdue(subscription: Subscription, now: Date): boolean {
  return !hasValidPeriod(subscription, now);
}

export function daysRemaining(subscription: Subscription, now: Date): number | null {
  if (subscription.endsAt === null) {
    return null;
  }
  return Math.max(0, diffInDays(now, subscription.endsAt));
}

export function trialDaysRemaining(subscription: Subscription, now: Date): number {
  if (!isOnTrial(subscription, now) || subscription.trialEndsAt === null) {
    return 0;
  }
  return Math.max(0, diffInDays(now, subscription.trialEndsAt));
}

export function isEndingSoon(
  subscription: Subscription,
  now: Date,
  thresholdDays: number
): boolean {
  if (subscription.endsAt === null || isBefore(subscription.endsAt, now)) {
    return false;
  }
  return diffInDays(now, subscription.endsAt) <= thresholdDays;
}

export function shouldAutoRenew(subscription: Subscription, now: Date): boolean {
  return (
    subscription.isAutoRenewal &&
    subscription.status === 'active' &&
    subscription.endsAt !== null &&
    !isAfter(subscription.endsAt, now)
  );
}

export function canCancel(subscription: Subscription): boolean {
  return subscription.status === 'active' || subscription.status === 'trial';
}

export function canResume(subscription: Subscription, now: Date): boolean {
  return subscription.status === 'canceled' && hasValidPeriod(subscription, now);
}

export function canRenew(subscription: Subscription): boolean {
  return (
    subscription.status === 'active' ||
    subscription.status === 'expired' ||
    subscription.status === 'inactive'
  );
}

// ─────────────────────────────────────────────────────────────
// TRANSITIONS
// ─────────────────────────────────────────────────────────────

function graceFrom(endsAt: Date | null, graceDays: number): Date | null {
  return endsAt === null ? null : addDays(endsAt, graceDays);
}

export interface ActivateOutcome {
  subscription: Subscription;
  changed: boolean;
}

/**
 * Activating an already active subscription leaves it untouched. A
 * subscription whose period (and grace) has run out needs a renewal.
 */
export function activate(subscription: Subscription, now: Date): ActivateOutcome {
  if (subscription.status === 'active') {
    return { subscription, changed: false };
  }
  assertTransition(subscription, 'active');
  if (!hasValidPeriod(subscription, now)) {
    throw new InvalidStateError('Subscription period has ended; renew it instead', {
      subscriptionId: subscription.id,
      status: subscription.status,
    });
  }
  return {
    subscription: {
      ...subscription,
      status: 'active',
      startsAt: subscription.startsAt ?? now,
      updatedAt: now,
    },
    changed: true,
  };
}

export function deactivate(subscription: Subscription, now: Date): Subscription {
  if (subscription.status !== 'active') {
    throw new InvalidStateError('Only active subscriptions can be deactivated', {
      subscriptionId: subscription.id,
      status: subscription.status,
    });
  }
  return { ...subscription, status: 'inactive', updatedAt: now };
}

export function cancel(
  subscription: Subscription,
  now: Date,
  graceDays: number
): Subscription {
  if (!canCancel(subscription)) {
    throw new InvalidStateError(
      `Cannot cancel a ${subscription.status} subscription`,
      { subscriptionId: subscription.id, status: subscription.status }
    );
  }
  return {
    ...subscription,
    status: 'canceled',
    graceEndsAt: graceFrom(subscription.endsAt, graceDays),
    canceledAt: now,
    updatedAt: now,
  };
}

export function resume(subscription: Subscription, now: Date): Subscription {
  if (!canResume(subscription, now)) {
    throw new InvalidStateError(
      subscription.status === 'canceled'
        ? 'Subscription period and grace period have both ended'
        : `Cannot resume a ${subscription.status} subscription`,
      { subscriptionId: subscription.id, status: subscription.status }
    );
  }
  return {
    ...subscription,
    status: 'active',
    graceEndsAt: null,
    canceledAt: null,
    updatedAt: now,
  };
}

/**
 * Extend by `durationInDays`, continuing from ends_at while it is still
 * in the future. A lifetime pricing (0 days) keeps the subscription open
 * ended.
 */
export function renew(
  subscription: Subscription,
  now: Date,
  durationInDays: number,
  graceDays: number
): Subscription {
  if (!canRenew(subscription)) {
    throw new InvalidStateError(
      `Cannot renew a ${subscription.status} subscription`,
      { subscriptionId: subscription.id, status: subscription.status }
    );
  }

  let endsAt: Date | null = null;
  if (durationInDays > 0) {
    const base =
      subscription.endsAt !== null && isAfter(subscription.endsAt, now)
        ? subscription.endsAt
        : now;
    endsAt = addDays(base, durationInDays);
  }

  return {
    ...subscription,
    status: 'active',
    endsAt,
    graceEndsAt: graceFrom(endsAt, graceDays),
    updatedAt: now,
  };
}

export interface ExpireOutcome {
  subscription: Subscription;
  wasInGracePeriod: boolean;
}

export function expire(subscription: Subscription, now: Date): ExpireOutcome {
  const details = { subscriptionId: subscription.id, status: subscription.status };

  if (subscription.status === 'expired') {
    throw new InvalidStateError('Subscription is already expired', details);
  }
  if (subscription.status === 'canceled') {
    throw new InvalidStateError(
      'A canceled subscription must be resumed before it can expire',
      details
    );
  }

  const wasInGracePeriod = isInGracePeriod(subscription, now);
  if (isLifetime(subscription) && !wasInGracePeriod) {
    throw new InvalidStateError('Lifetime subscriptions do not expire', details);
  }

  return {
    subscription: { ...subscription, status: 'expired', updatedAt: now },
    wasInGracePeriod,
  };
}
