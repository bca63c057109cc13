/**
 * Entitlement Model
 * Plans, pricing, features, subscriptions and usage counters
 */

import type { FeatureValue, JsonValue } from './flexible-value.js';

export type SubscriptionStatus =
  | 'pending'
  | 'trial'
  | 'active'
  | 'inactive'
  | 'canceled'
  | 'expired';

export const SUBSCRIPTION_STATUSES: readonly SubscriptionStatus[] = [
  'pending',
  'trial',
  'active',
  'inactive',
  'canceled',
  'expired',
];

/**
 * Statuses that count toward the one-subscription-per-subscriber rule
 */
export const ACTIVE_FAMILY_STATUSES: readonly SubscriptionStatus[] = [
  'trial',
  'active',
];

export type ResetPeriod = 'never' | 'daily' | 'monthly' | 'yearly';

export const RESET_PERIODS: readonly ResetPeriod[] = [
  'never',
  'daily',
  'monthly',
  'yearly',
];

/**
 * Locale code -> display text
 */
export type LocalizedText = Record<string, string>;

/**
 * Reference to the host application's owning entity.
 * The engine never resolves it; it is a composite key.
 */
export interface SubscriberRef {
  type: string;
  id: string;
}

/**
 * Capability a host entity exposes to be subscribable
 */
export interface Subscribable {
  subscriberRef(): SubscriberRef;
}

export interface Plan {
  id: string;
  slug: string;
  name: LocalizedText;
  description: LocalizedText | null;
  isActive: boolean;
  sortOrder: number;
  pricings: PlanPricing[];
  features: PlanFeature[];
  deletedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface PlanPricing {
  id: string;
  planId: string;
  label: LocalizedText;
  /** 0 means lifetime */
  durationInDays: number;
  /** Base price in the default currency */
  price: number;
  isBestOffer: boolean;
  prices: PlanPrice[];
}

export interface PlanPrice {
  id: string;
  planPricingId: string;
  currency: string;
  amount: number;
}

export interface PlanFeature {
  id: string;
  planId: string;
  key: string;
  name: LocalizedText;
  description: LocalizedText | null;
  value: FeatureValue;
  resetPeriod: ResetPeriod;
}

export interface Subscription {
  id: string;
  subscriber: SubscriberRef;
  planId: string;
  planPricingId: string;
  status: SubscriptionStatus;
  isAutoRenewal: boolean;
  startsAt: Date | null;
  /** null means lifetime */
  endsAt: Date | null;
  trialEndsAt: Date | null;
  graceEndsAt: Date | null;
  canceledAt: Date | null;
  /** Bumped on every update; used for optimistic concurrency */
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface SubscriptionUsage {
  id: string;
  subscriptionId: string;
  key: string;
  used: number;
  lastUsedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type ChangeType = 'upgrade' | 'downgrade' | 'lateral';

export interface PlanChangeSummary {
  changeType: ChangeType;
  oldPlanId: string;
  newPlanId: string;
  oldPricingId: string;
  newPricingId: string;
  currency: string;
  prorationAmount: number;
  usageReset: boolean;
  changedAt: Date;
}

/**
 * Per-feature view returned by usage summaries
 */
export interface FeatureUsageSummary {
  key: string;
  name: string;
  value: JsonValue;
  limit: number | null;
  used: number;
  remaining: number | null;
  exhausted: boolean;
  percentageUsed: number | null;
  resetPeriod: ResetPeriod;
  lastUsedAt: Date | null;
  nextResetAt: Date | null;
}

export interface SubscriptionStatistics {
  byStatus: Record<SubscriptionStatus, number>;
  active: number;
  expiringSoon: number;
  overdue: number;
  autoRenewing: number;
  health: 'healthy' | 'warning';
}
