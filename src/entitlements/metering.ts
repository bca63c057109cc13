/**
 * Usage Metering
 *
 * Pure limit arithmetic for plan features. Reads use the effective
 * counter (zero once its reset period has elapsed); the write path is
 * applyConsumption, which repositories run atomically per usage row.
 */

import type {
  FeatureUsageSummary,
  JsonValue,
  LocalizedText,
  Plan,
  PlanFeature,
  Subscription,
  SubscriptionUsage,
} from '@/types/index.js';
import { ValidationError } from '@/types/index.js';

import { resolveLocale, unwrapScalar } from './flexible-value.js';
import { isResetDue, nextPeriodStart, periodStart } from './periods.js';
import { isActive } from './state-machine.js';

export interface LocaleOptions {
  locale: string;
  fallbackLocale: string;
}

export type FeatureLimit =
  | { type: 'unlimited' }
  | { type: 'metered'; limit: number }
  | { type: 'flag'; value: JsonValue };

const UNLIMITED_WORDS = new Set(['unlimited', 'infinite', 'no-limit']);

// ─────────────────────────────────────────────────────────────
// FEATURE LOOKUP
// ─────────────────────────────────────────────────────────────

export function findFeature(plan: Plan, key: string): PlanFeature | null {
  return plan.features.find((feature) => feature.key === key) ?? null;
}

export function hasFeature(plan: Plan, key: string): boolean {
  return findFeature(plan, key) !== null;
}

export function featureValue(feature: PlanFeature, locales: LocaleOptions): JsonValue {
  return unwrapScalar(
    resolveLocale(feature.value, locales.locale, locales.fallbackLocale)
  );
}

/**
 * Null and negative numbers are unlimited, as are the words
 * "unlimited", "infinite" and "no-limit". Other non-numeric values are
 * flags and are never metered.
 */
export function resolveLimit(feature: PlanFeature, locales: LocaleOptions): FeatureLimit {
  const value = resolveLocale(feature.value, locales.locale, locales.fallbackLocale);
  switch (value.kind) {
    case 'null':
      return { type: 'unlimited' };
    case 'integer':
    case 'float':
      return value.value < 0
        ? { type: 'unlimited' }
        : { type: 'metered', limit: value.value };
    case 'string':
      return UNLIMITED_WORDS.has(value.value.toLowerCase())
        ? { type: 'unlimited' }
        : { type: 'flag', value: value.value };
    default:
      return { type: 'flag', value: unwrapScalar(value) };
  }
}

export function numericLimit(limit: FeatureLimit): number | null {
  return limit.type === 'metered' ? limit.limit : null;
}

export function pickText(
  text: LocalizedText | null,
  locales: LocaleOptions,
  fallback: string
): string {
  if (text === null) {
    return fallback;
  }
  return (
    text[locales.locale] ??
    text[locales.fallbackLocale] ??
    Object.values(text)[0] ??
    fallback
  );
}

// ─────────────────────────────────────────────────────────────
// USAGE ARITHMETIC
// ─────────────────────────────────────────────────────────────

/**
 * Counter value as it stands after any due reset
 */
export function effectiveUsed(
  feature: PlanFeature,
  usage: SubscriptionUsage | null,
  now: Date
): number {
  if (usage === null) {
    return 0;
  }
  return isResetDue(feature.resetPeriod, usage.lastUsedAt, now) ? 0 : usage.used;
}

export function remainingUsage(limit: FeatureLimit, used: number): number | null {
  if (limit.type !== 'metered') {
    return null;
  }
  return Math.max(0, limit.limit - used);
}

export function isExhausted(limit: FeatureLimit, used: number): boolean {
  const remaining = remainingUsage(limit, used);
  return remaining !== null && remaining <= 0;
}

export function assertConsumableAmount(key: string, amount: number): void {
  if (key.trim() === '') {
    throw new ValidationError('Feature key is required');
  }
  if (!Number.isInteger(amount) || amount <= 0) {
    throw new ValidationError('Amount must be a positive integer', { key, amount });
  }
}

// ─────────────────────────────────────────────────────────────
// CONSUMPTION
// ─────────────────────────────────────────────────────────────

export type ConsumptionDecision =
  | {
      allowed: false;
      reason: 'missing_feature' | 'inactive' | 'limit_exceeded';
      remaining: number | null;
    }
  | {
      allowed: true;
      feature: PlanFeature;
      limit: number | null;
      resetBefore: Date | null;
    };

export interface ConsumptionInput {
  subscription: Subscription;
  plan: Plan;
  usage: SubscriptionUsage | null;
  key: string;
  amount: number;
  now: Date;
  locales: LocaleOptions;
}

/**
 * Pre-check before the atomic write. The repository re-checks the limit
 * against the locked row, so a stale `usage` can only make this check
 * more permissive, never let the counter overrun.
 */
export function evaluateConsumption(input: ConsumptionInput): ConsumptionDecision {
  const { subscription, plan, usage, key, amount, now, locales } = input;
  assertConsumableAmount(key, amount);

  const feature = findFeature(plan, key);
  if (feature === null) {
    return { allowed: false, reason: 'missing_feature', remaining: null };
  }

  const limit = resolveLimit(feature, locales);
  const remaining = remainingUsage(limit, effectiveUsed(feature, usage, now));

  if (!isActive(subscription, now)) {
    return { allowed: false, reason: 'inactive', remaining };
  }
  if (remaining !== null && remaining < amount) {
    return { allowed: false, reason: 'limit_exceeded', remaining };
  }

  return {
    allowed: true,
    feature,
    limit: numericLimit(limit),
    resetBefore: periodStart(feature.resetPeriod, now),
  };
}

export interface CounterState {
  used: number;
  lastUsedAt: Date | null;
}

export interface ConsumeRequest {
  subscriptionId: string;
  key: string;
  amount: number;
  /** null when unlimited */
  limit: number | null;
  /** Counters last touched before this instant are zeroed first */
  resetBefore: Date | null;
  now: Date;
}

export interface ConsumeOutcome {
  consumed: boolean;
  used: number;
  reset: boolean;
}

/**
 * Lazy reset, then conditional increment. The reset sticks even when
 * the increment is refused.
 */
export function applyConsumption(
  current: CounterState,
  request: ConsumeRequest
): { next: CounterState; outcome: ConsumeOutcome } {
  const reset =
    request.resetBefore !== null &&
    current.lastUsedAt !== null &&
    current.lastUsedAt.getTime() < request.resetBefore.getTime();

  const base: CounterState = reset ? { used: 0, lastUsedAt: null } : current;

  if (request.limit !== null && base.used + request.amount > request.limit) {
    return { next: base, outcome: { consumed: false, used: base.used, reset } };
  }

  const used = base.used + request.amount;
  return {
    next: { used, lastUsedAt: request.now },
    outcome: { consumed: true, used, reset },
  };
}

// ─────────────────────────────────────────────────────────────
// SUMMARY
// ─────────────────────────────────────────────────────────────

function percentage(used: number, limit: number): number {
  if (limit <= 0) {
    return 100;
  }
  return Math.round((used / limit) * 10000) / 100;
}

export function buildUsageSummary(
  plan: Plan,
  usages: SubscriptionUsage[],
  now: Date,
  locales: LocaleOptions
): FeatureUsageSummary[] {
  return plan.features.map((feature) => {
    const usage = usages.find((u) => u.key === feature.key) ?? null;
    const limit = resolveLimit(feature, locales);
    const used = effectiveUsed(feature, usage, now);
    const numeric = numericLimit(limit);

    return {
      key: feature.key,
      name: pickText(feature.name, locales, feature.key),
      value: featureValue(feature, locales),
      limit: numeric,
      used,
      remaining: remainingUsage(limit, used),
      exhausted: isExhausted(limit, used),
      percentageUsed: numeric === null ? null : percentage(used, numeric),
      resetPeriod: feature.resetPeriod,
      lastUsedAt: usage?.lastUsedAt ?? null,
      nextResetAt: nextPeriodStart(feature.resetPeriod, now),
    };
  });
}
