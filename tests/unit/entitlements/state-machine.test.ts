/**
 * Subscription State Machine Unit Tests
 */

import { describe, it, expect } from 'vitest';

import * as machine from '@/entitlements/state-machine.js';
import { addDays } from '@/lib/dates.js';
import { InvalidStateError } from '@/types/index.js';

import { NOW, buildSubscription } from '../../fixtures/index.js';

const GRACE_DAYS = 3;

describe('State Machine', () => {
  describe('transition table', () => {
    it('should allow the documented edges', () => {
      expect(machine.canTransition('pending', 'trial')).toBe(true);
      expect(machine.canTransition('trial', 'active')).toBe(true);
      expect(machine.canTransition('active', 'inactive')).toBe(true);
      expect(machine.canTransition('expired', 'active')).toBe(true);
    });

    it('should reject edges that are not listed', () => {
      expect(machine.canTransition('canceled', 'trial')).toBe(false);
      expect(machine.canTransition('expired', 'canceled')).toBe(false);
      expect(machine.canTransition('active', 'pending')).toBe(false);
    });

    it('should throw InvalidStateError from assertTransition', () => {
      const subscription = buildSubscription({ status: 'expired' });

      expect(() => machine.assertTransition(subscription, 'canceled')).toThrow(
        'Cannot move subscription from expired to canceled'
      );
    });
  });

  describe('grace period', () => {
    const endsAt = NOW;
    const subscription = buildSubscription({
      endsAt,
      graceEndsAt: addDays(endsAt, GRACE_DAYS),
    });

    it('should not be in grace at the end instant itself', () => {
      expect(machine.isInGracePeriod(subscription, endsAt)).toBe(false);
    });

    it('should be in grace just after the end and at the last instant', () => {
      expect(machine.isInGracePeriod(subscription, new Date(endsAt.getTime() + 1))).toBe(true);
      expect(machine.isInGracePeriod(subscription, addDays(endsAt, GRACE_DAYS))).toBe(true);
    });

    it('should not be in grace after the grace window', () => {
      const after = new Date(addDays(endsAt, GRACE_DAYS).getTime() + 1);
      expect(machine.isInGracePeriod(subscription, after)).toBe(false);
      expect(machine.isOverdue(subscription, after)).toBe(true);
    });

    it('should keep access during grace', () => {
      expect(machine.isActive(subscription, addDays(endsAt, 1))).toBe(true);
    });

    it('should treat lifetime subscriptions as always valid', () => {
      const lifetime = buildSubscription({ endsAt: null, graceEndsAt: null });
      expect(machine.hasValidPeriod(lifetime, addDays(NOW, 10_000))).toBe(true);
      expect(machine.isLifetime(lifetime)).toBe(true);
    });
  });

  describe('activate()', () => {
    it('should leave an active subscription untouched', () => {
      const subscription = buildSubscription();
      const outcome = machine.activate(subscription, NOW);

      expect(outcome.changed).toBe(false);
      expect(outcome.subscription).toBe(subscription);
    });

    it('should set startsAt when activating a pending subscription', () => {
      const subscription = buildSubscription({ status: 'pending', startsAt: null });
      const outcome = machine.activate(subscription, NOW);

      expect(outcome.changed).toBe(true);
      expect(outcome.subscription.status).toBe('active');
      expect(outcome.subscription.startsAt).toEqual(NOW);
    });

    it('should reactivate a canceled subscription still inside its period', () => {
      const subscription = buildSubscription({ status: 'canceled', endsAt: addDays(NOW, 5) });

      expect(machine.activate(subscription, NOW).subscription.status).toBe('active');
    });

    it.each(['canceled', 'expired'] as const)(
      'should refuse to activate a %s subscription whose period has ended',
      (status) => {
        const subscription = buildSubscription({
          status,
          endsAt: addDays(NOW, -10),
          graceEndsAt: addDays(NOW, -7),
        });

        expect(() => machine.activate(subscription, NOW)).toThrow(
          'Subscription period has ended; renew it instead'
        );
      }
    );
  });

  describe('deactivate()', () => {
    it('should move active to inactive', () => {
      expect(machine.deactivate(buildSubscription(), NOW).status).toBe('inactive');
    });

    it('should reject anything else', () => {
      expect(() => machine.deactivate(buildSubscription({ status: 'trial' }), NOW)).toThrow(
        InvalidStateError
      );
    });
  });

  describe('cancel() and resume()', () => {
    const lapsed = buildSubscription({
      endsAt: addDays(NOW, -1),
      graceEndsAt: null,
    });

    it('should compute grace from ends_at on cancel', () => {
      const canceled = machine.cancel(lapsed, NOW, GRACE_DAYS);

      expect(canceled.status).toBe('canceled');
      expect(canceled.canceledAt).toEqual(NOW);
      expect(canceled.graceEndsAt).toEqual(addDays(NOW, 2));
    });

    it('should resume within the grace window', () => {
      const canceled = machine.cancel(lapsed, NOW, GRACE_DAYS);
      const resumed = machine.resume(canceled, addDays(NOW, 1));

      expect(resumed.status).toBe('active');
      expect(resumed.graceEndsAt).toBeNull();
      expect(resumed.canceledAt).toBeNull();
    });

    it('should refuse to resume once grace has passed', () => {
      const canceled = machine.cancel(lapsed, NOW, GRACE_DAYS);

      expect(() => machine.resume(canceled, addDays(NOW, 4))).toThrow(
        'Subscription period and grace period have both ended'
      );
    });

    it('should refuse to resume a subscription that is not canceled', () => {
      expect(() => machine.resume(buildSubscription(), NOW)).toThrow(
        'Cannot resume a active subscription'
      );
    });

    it('should refuse to cancel an expired subscription', () => {
      expect(() =>
        machine.cancel(buildSubscription({ status: 'expired' }), NOW, GRACE_DAYS)
      ).toThrow('Cannot cancel a expired subscription');
    });
  });

  describe('renew()', () => {
    it('should extend from ends_at while it is in the future', () => {
      const subscription = buildSubscription({ endsAt: addDays(NOW, 20) });
      const renewed = machine.renew(subscription, NOW, 30, GRACE_DAYS);

      expect(renewed.endsAt).toEqual(addDays(NOW, 50));
      expect(renewed.graceEndsAt).toEqual(addDays(NOW, 53));
    });

    it('should extend from now once ends_at has passed', () => {
      const subscription = buildSubscription({ status: 'expired', endsAt: addDays(NOW, -5) });
      const renewed = machine.renew(subscription, NOW, 30, GRACE_DAYS);

      expect(renewed.status).toBe('active');
      expect(renewed.endsAt).toEqual(addDays(NOW, 30));
    });

    it('should keep a lifetime pricing open ended', () => {
      const renewed = machine.renew(buildSubscription({ status: 'inactive' }), NOW, 0, GRACE_DAYS);

      expect(renewed.endsAt).toBeNull();
      expect(renewed.graceEndsAt).toBeNull();
    });

    it('should reject trials and canceled subscriptions', () => {
      expect(() =>
        machine.renew(buildSubscription({ status: 'trial' }), NOW, 30, GRACE_DAYS)
      ).toThrow('Cannot renew a trial subscription');
      expect(() =>
        machine.renew(buildSubscription({ status: 'canceled' }), NOW, 30, GRACE_DAYS)
      ).toThrow(InvalidStateError);
    });
  });

  describe('expire()', () => {
    it('should expire an overdue subscription', () => {
      const subscription = buildSubscription({
        endsAt: addDays(NOW, -10),
        graceEndsAt: addDays(NOW, -7),
      });
      const outcome = machine.expire(subscription, NOW);

      expect(outcome.subscription.status).toBe('expired');
      expect(outcome.wasInGracePeriod).toBe(false);
    });

    it('should report when the subscription was still in grace', () => {
      const subscription = buildSubscription({
        endsAt: addDays(NOW, -1),
        graceEndsAt: addDays(NOW, 2),
      });

      expect(machine.expire(subscription, NOW).wasInGracePeriod).toBe(true);
    });

    it('should refuse lifetime, expired and canceled subscriptions', () => {
      expect(() =>
        machine.expire(buildSubscription({ endsAt: null, graceEndsAt: null }), NOW)
      ).toThrow('Lifetime subscriptions do not expire');
      expect(() => machine.expire(buildSubscription({ status: 'expired' }), NOW)).toThrow(
        'Subscription is already expired'
      );
      expect(() => machine.expire(buildSubscription({ status: 'canceled' }), NOW)).toThrow(
        'A canceled subscription must be resumed before it can expire'
      );
    });
  });

  describe('time predicates', () => {
    it('should count remaining days', () => {
      expect(machine.daysRemaining(buildSubscription({ endsAt: addDays(NOW, 20) }), NOW)).toBe(20);
      expect(machine.daysRemaining(buildSubscription({ endsAt: addDays(NOW, -2) }), NOW)).toBe(0);
      expect(machine.daysRemaining(buildSubscription({ endsAt: null }), NOW)).toBeNull();
    });

    it('should report trial days only while on trial', () => {
      const trial = buildSubscription({ status: 'trial', trialEndsAt: addDays(NOW, 5) });

      expect(machine.isOnTrial(trial, NOW)).toBe(true);
      expect(machine.trialDaysRemaining(trial, NOW)).toBe(5);
      expect(machine.trialDaysRemaining(trial, addDays(NOW, 6))).toBe(0);
    });

    it('should flag subscriptions ending within the threshold', () => {
      expect(machine.isEndingSoon(buildSubscription({ endsAt: addDays(NOW, 5) }), NOW, 7)).toBe(
        true
      );
      expect(machine.isEndingSoon(buildSubscription({ endsAt: addDays(NOW, 20) }), NOW, 7)).toBe(
        false
      );
      expect(machine.isEndingSoon(buildSubscription({ endsAt: addDays(NOW, -1) }), NOW, 7)).toBe(
        false
      );
    });

    it('should not flag a subscription that ended less than a day ago', () => {
      const justEnded = buildSubscription({ endsAt: new Date(NOW.getTime() - 60 * 60 * 1000) });

      expect(machine.isEndingSoon(justEnded, NOW, 7)).toBe(false);
      expect(machine.isEndingSoon(buildSubscription({ endsAt: NOW }), NOW, 7)).toBe(true);
    });

    it('should auto-renew only active auto-renewing subscriptions that have ended', () => {
      const due = buildSubscription({ endsAt: addDays(NOW, -1) });

      expect(machine.shouldAutoRenew(due, NOW)).toBe(true);
      expect(machine.shouldAutoRenew({ ...due, isAutoRenewal: false }, NOW)).toBe(false);
      expect(machine.shouldAutoRenew({ ...due, status: 'trial' }, NOW)).toBe(false);
      expect(machine.shouldAutoRenew(buildSubscription(), NOW)).toBe(false);
    });
  });
});
