/**
 * Subscription validation
 *
 * Input and business-rule checks shared by the subscription service.
 * assert* functions throw; the summary helpers return plain data.
 */

import {
  canCancel,
  canRenew,
  canResume,
  isEndingSoon,
  isInGracePeriod,
  isLifetime,
  isOnTrial,
  isOverdue,
} from '@/entitlements/state-machine.js';
import type { EngineConfig } from '@/lib/config.js';
import { isBefore } from '@/lib/dates.js';
import type { Plan, PlanPricing, SubscriberRef, Subscription } from '@/types/index.js';
import { NotFoundError, ValidationError } from '@/types/index.js';

const FEATURE_KEY_PATTERN = /^[a-zA-Z0-9_-]+$/;

export interface ValidationSummary {
  isValid: boolean;
  errors: string[];
  warnings: string[];
  allowed: {
    cancel: boolean;
    resume: boolean;
    renew: boolean;
    expire: boolean;
  };
}

export interface SubscriptionValidator {
  assertSubscriber(subscriber: SubscriberRef): void;
  assertTrialDuration(days: number): void;
  assertFeatureKey(key: string): void;
  assertPlanAvailable(plan: Plan | null, planId: string): Plan;
  findPricing(plan: Plan, pricingId: string): PlanPricing;
  stateErrors(subscription: Subscription): string[];
  summarize(subscription: Subscription, now: Date): ValidationSummary;
}

export function createSubscriptionValidator(config: EngineConfig): SubscriptionValidator {
  const validator: SubscriptionValidator = {
    assertSubscriber(subscriber) {
      if (subscriber.type.trim() === '' || subscriber.id.trim() === '') {
        throw new ValidationError('Subscriber type and id are required');
      }
    },

    assertTrialDuration(days) {
      const { minDays, maxDays } = config.trial;
      if (!Number.isInteger(days) || days < minDays || days > maxDays) {
        throw new ValidationError(
          `Trial duration must be between ${minDays} and ${maxDays} days`,
          { trialDays: days, minDays, maxDays }
        );
      }
    },

    assertFeatureKey(key) {
      if (key.trim() === '') {
        throw new ValidationError('Feature key is required');
      }
      if (!FEATURE_KEY_PATTERN.test(key)) {
        throw new ValidationError(
          'Feature key may only contain letters, digits, hyphens and underscores',
          { key }
        );
      }
    },

    assertPlanAvailable(plan, planId) {
      if (plan === null) {
        throw new NotFoundError('Plan not found', { planId });
      }
      if (plan.deletedAt !== null || !plan.isActive) {
        throw new ValidationError('Plan is not available for subscription', { planId });
      }
      return plan;
    },

    findPricing(plan, pricingId) {
      const pricing = plan.pricings.find((p) => p.id === pricingId);
      if (pricing === undefined) {
        throw new ValidationError('Pricing does not belong to the selected plan', {
          planId: plan.id,
          pricingId,
        });
      }
      return pricing;
    },

    stateErrors(subscription) {
      const errors: string[] = [];
      const { startsAt, endsAt, trialEndsAt, graceEndsAt } = subscription;
      if (startsAt !== null && endsAt !== null && isBefore(endsAt, startsAt)) {
        errors.push('Start date is after end date');
      }
      if (startsAt !== null && trialEndsAt !== null && isBefore(trialEndsAt, startsAt)) {
        errors.push('Trial ends before the subscription starts');
      }
      if (endsAt !== null && graceEndsAt !== null && isBefore(graceEndsAt, endsAt)) {
        errors.push('Grace period ends before the subscription ends');
      }
      return errors;
    },

    summarize(subscription, now) {
      const errors = validator.stateErrors(subscription);
      const warnings: string[] = [];

      if (isOverdue(subscription, now)) {
        warnings.push('Subscription period has ended');
      } else if (isInGracePeriod(subscription, now)) {
        warnings.push('Subscription is in its grace period');
      } else if (isEndingSoon(subscription, now, config.expiringSoonDays)) {
        warnings.push(`Subscription ends within ${config.expiringSoonDays} days`);
      }
      if (isOnTrial(subscription, now)) {
        warnings.push('Subscription is on trial');
      }

      return {
        isValid: errors.length === 0,
        errors,
        warnings,
        allowed: {
          cancel: canCancel(subscription),
          resume: canResume(subscription, now),
          renew: canRenew(subscription),
          expire:
            subscription.status !== 'expired' &&
            subscription.status !== 'canceled' &&
            (!isLifetime(subscription) || isInGracePeriod(subscription, now)),
        },
      };
    },
  };

  return validator;
}
