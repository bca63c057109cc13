/**
 * Subscription Validator Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { addDays } from '@/lib/dates.js';
import { defineEngineConfig } from '@/lib/config.js';
import { createSubscriptionValidator } from '@/services/subscription.validator.js';
import { NotFoundError, ValidationError } from '@/types/index.js';

import { NOW, basicPlan, buildSubscription } from '../../fixtures/index.js';

const validator = createSubscriptionValidator(defineEngineConfig());

describe('SubscriptionValidator', () => {
  describe('input checks', () => {
    it('should require subscriber type and id', () => {
      expect(() => validator.assertSubscriber({ type: '', id: 'x' })).toThrow(
        'Subscriber type and id are required'
      );
      expect(() => validator.assertSubscriber({ type: 'team', id: ' ' })).toThrow(ValidationError);
      expect(() => validator.assertSubscriber({ type: 'team', id: 't1' })).not.toThrow();
    });

    it('should keep trial durations inside the configured range', () => {
      expect(() => validator.assertTrialDuration(3)).not.toThrow();
      expect(() => validator.assertTrialDuration(30)).not.toThrow();
      expect(() => validator.assertTrialDuration(2)).toThrow(
        'Trial duration must be between 3 and 30 days'
      );
      expect(() => validator.assertTrialDuration(31)).toThrow(ValidationError);
      expect(() => validator.assertTrialDuration(3.5)).toThrow(ValidationError);
    });

    it('should restrict feature keys to letters, digits, hyphens and underscores', () => {
      expect(() => validator.assertFeatureKey('api_calls-v2')).not.toThrow();
      expect(() => validator.assertFeatureKey('api calls')).toThrow(
        'Feature key may only contain letters, digits, hyphens and underscores'
      );
      expect(() => validator.assertFeatureKey('')).toThrow('Feature key is required');
    });
  });

  describe('plan checks', () => {
    it('should report a missing plan as not found', () => {
      expect(() => validator.assertPlanAvailable(null, 'plan-x')).toThrow(NotFoundError);
    });

    it('should reject inactive and deleted plans', () => {
      expect(() =>
        validator.assertPlanAvailable({ ...basicPlan(), isActive: false }, 'plan-basic')
      ).toThrow('Plan is not available for subscription');
      expect(() =>
        validator.assertPlanAvailable({ ...basicPlan(), deletedAt: NOW }, 'plan-basic')
      ).toThrow(ValidationError);
    });

    it('should only find pricings of the given plan', () => {
      expect(validator.findPricing(basicPlan(), 'basic-monthly').durationInDays).toBe(30);
      expect(() => validator.findPricing(basicPlan(), 'pro-monthly')).toThrow(
        'Pricing does not belong to the selected plan'
      );
    });
  });

  describe('stateErrors()', () => {
    it('should flag inconsistent dates', () => {
      const subscription = buildSubscription({
        startsAt: NOW,
        endsAt: addDays(NOW, -1),
        graceEndsAt: addDays(NOW, -2),
      });

      expect(validator.stateErrors(subscription)).toEqual([
        'Start date is after end date',
        'Grace period ends before the subscription ends',
      ]);
    });

    it('should accept consistent dates', () => {
      expect(validator.stateErrors(buildSubscription())).toEqual([]);
    });
  });

  describe('summarize()', () => {
    it('should summarise a healthy subscription', () => {
      expect(validator.summarize(buildSubscription(), NOW)).toEqual({
        isValid: true,
        errors: [],
        warnings: [],
        allowed: { cancel: true, resume: false, renew: true, expire: true },
      });
    });

    it('should warn about subscriptions ending soon', () => {
      const summary = validator.summarize(buildSubscription({ endsAt: addDays(NOW, 5) }), NOW);
      expect(summary.warnings).toEqual(['Subscription ends within 7 days']);
    });

    it('should warn about grace and overdue subscriptions', () => {
      const inGrace = buildSubscription({
        endsAt: addDays(NOW, -1),
        graceEndsAt: addDays(NOW, 2),
      });
      const overdue = buildSubscription({
        endsAt: addDays(NOW, -10),
        graceEndsAt: addDays(NOW, -7),
      });

      expect(validator.summarize(inGrace, NOW).warnings).toEqual([
        'Subscription is in its grace period',
      ]);
      expect(validator.summarize(overdue, NOW).warnings).toEqual([
        'Subscription period has ended',
      ]);
    });

    it('should describe trials', () => {
      const trial = buildSubscription({ status: 'trial', trialEndsAt: addDays(NOW, 5) });
      const summary = validator.summarize(trial, NOW);

      expect(summary.warnings).toEqual(['Subscription is on trial']);
      expect(summary.allowed).toEqual({ cancel: true, resume: false, renew: false, expire: true });
    });

    it('should not offer expiry for lifetime subscriptions', () => {
      const lifetime = buildSubscription({ endsAt: null, graceEndsAt: null });
      expect(validator.summarize(lifetime, NOW).allowed.expire).toBe(false);
    });
  });
});
