/**
 * SubscriptionService Database Adapter
 * Implements SubscriptionServiceDb using Supabase
 *
 * Plain reads go through PostgREST. Everything that must be atomic
 * (changesets, consumption, bulk resets) is a SQL function called via
 * rpc; see supabase/migrations.
 */

import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js';

import { decodeFeatureValue } from '@/entitlements/flexible-value.js';
import type {
  LocalizedText,
  Plan,
  PlanFeature,
  PlanPrice,
  PlanPricing,
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

/**
 * Database row types
 */
interface PlanPriceRow {
  id: string;
  plan_pricing_id: string;
  currency: string;
  amount: number | string;
}

interface PlanPricingRow {
  id: string;
  plan_id: string;
  label: LocalizedText;
  duration_in_days: number | null;
  price: number | string;
  is_best_offer: boolean;
  prices?: PlanPriceRow[];
}

interface PlanFeatureRow {
  id: string;
  plan_id: string;
  key: string;
  name: LocalizedText;
  description: LocalizedText | null;
  value: unknown;
  reset_period: ResetPeriod;
}

interface PlanRow {
  id: string;
  slug: string;
  name: LocalizedText;
  description: LocalizedText | null;
  is_active: boolean;
  sort_order: number;
  deleted_at: string | null;
  created_at: string;
  updated_at: string;
  pricings?: PlanPricingRow[];
  features?: PlanFeatureRow[];
}

interface SubscriptionRow {
  id: string;
  subscriber_type: string;
  subscriber_id: string;
  plan_id: string;
  plan_pricing_id: string;
  status: SubscriptionStatus;
  is_auto_renewal: boolean;
  starts_at: string | null;
  ends_at: string | null;
  trial_ends_at: string | null;
  grace_ends_at: string | null;
  canceled_at: string | null;
  version: number;
  created_at: string;
  updated_at: string;
}

interface UsageRow {
  id: string;
  subscription_id: string;
  key: string;
  used: number;
  last_used_at: string | null;
  created_at: string;
  updated_at: string;
}

interface DueUsageRow extends UsageRow {
  subscriber_type: string;
  subscriber_id: string;
  plan_id: string;
}

interface ConsumeRow {
  consumed: boolean;
  used: number;
  reset: boolean;
}

const PLAN_SELECT = '*, pricings:plan_pricings(*, prices:plan_prices(*)), features:plan_features(*)';

function toDate(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

function toIso(value: Date | null): string | null {
  return value === null ? null : value.toISOString();
}

/**
 * Map database row to Plan entity
 */
function mapRowToPlan(row: PlanRow): Plan {
  return {
    id: row.id,
    slug: row.slug,
    name: row.name,
    description: row.description,
    isActive: row.is_active,
    sortOrder: row.sort_order,
    pricings: (row.pricings ?? []).map(mapRowToPricing),
    features: (row.features ?? []).map(mapRowToFeature),
    deletedAt: toDate(row.deleted_at),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function mapRowToPricing(row: PlanPricingRow): PlanPricing {
  return {
    id: row.id,
    planId: row.plan_id,
    label: row.label,
    durationInDays: row.duration_in_days ?? 0,
    price: Number(row.price),
    isBestOffer: row.is_best_offer,
    prices: (row.prices ?? []).map(
      (price): PlanPrice => ({
        id: price.id,
        planPricingId: price.plan_pricing_id,
        currency: price.currency,
        amount: Number(price.amount),
      })
    ),
  };
}

function mapRowToFeature(row: PlanFeatureRow): PlanFeature {
  return {
    id: row.id,
    planId: row.plan_id,
    key: row.key,
    name: row.name,
    description: row.description,
    value: decodeFeatureValue(row.value),
    resetPeriod: row.reset_period,
  };
}

/**
 * Map database row to Subscription entity
 */
function mapRowToSubscription(row: SubscriptionRow): Subscription {
  return {
    id: row.id,
    subscriber: { type: row.subscriber_type, id: row.subscriber_id },
    planId: row.plan_id,
    planPricingId: row.plan_pricing_id,
    status: row.status,
    isAutoRenewal: row.is_auto_renewal,
    startsAt: toDate(row.starts_at),
    endsAt: toDate(row.ends_at),
    trialEndsAt: toDate(row.trial_ends_at),
    graceEndsAt: toDate(row.grace_ends_at),
    canceledAt: toDate(row.canceled_at),
    version: row.version,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function mapSubscriptionToRow(subscription: Subscription): SubscriptionRow {
  return {
    id: subscription.id,
    subscriber_type: subscription.subscriber.type,
    subscriber_id: subscription.subscriber.id,
    plan_id: subscription.planId,
    plan_pricing_id: subscription.planPricingId,
    status: subscription.status,
    is_auto_renewal: subscription.isAutoRenewal,
    starts_at: toIso(subscription.startsAt),
    ends_at: toIso(subscription.endsAt),
    trial_ends_at: toIso(subscription.trialEndsAt),
    grace_ends_at: toIso(subscription.graceEndsAt),
    canceled_at: toIso(subscription.canceledAt),
    version: subscription.version,
    created_at: subscription.createdAt.toISOString(),
    updated_at: subscription.updatedAt.toISOString(),
  };
}

function mapRowToUsage(row: UsageRow): SubscriptionUsage {
  return {
    id: row.id,
    subscriptionId: row.subscription_id,
    key: row.key,
    used: row.used,
    lastUsedAt: toDate(row.last_used_at),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function mapUsageToRow(usage: SubscriptionUsage): UsageRow {
  return {
    id: usage.id,
    subscription_id: usage.subscriptionId,
    key: usage.key,
    used: usage.used,
    last_used_at: toIso(usage.lastUsedAt),
    created_at: usage.createdAt.toISOString(),
    updated_at: usage.updatedAt.toISOString(),
  };
}

/**
 * Translate SQLSTATE codes raised by the migration's functions
 */
function rethrow(action: string, error: PostgrestError): never {
  if (error.code === '40001') {
    throw new ConcurrencyError('Subscription was modified concurrently', {
      detail: error.message,
    });
  }
  if (error.code === '23505') {
    throw new ConflictError('Subscriber already has an active subscription', {
      detail: error.message,
    });
  }
  throw new Error(`Failed to ${action}: ${error.message}`);
}

/**
 * Create SubscriptionServiceDb implementation using Supabase
 */
export function createSubscriptionServiceDb(supabase: SupabaseClient): SubscriptionServiceDb {
  function subscriberQuery(subscriber: SubscriberRef) {
    return supabase
      .from('subscriptions')
      .select('*')
      .eq('subscriber_type', subscriber.type)
      .eq('subscriber_id', subscriber.id);
  }

  return {
    async listPlans(): Promise<Plan[]> {
      const { data, error } = await supabase
        .from('plans')
        .select(PLAN_SELECT)
        .eq('is_active', true)
        .is('deleted_at', null)
        .order('sort_order', { ascending: true });

      if (error !== null) {
        rethrow('list plans', error);
      }

      return (data as PlanRow[]).map(mapRowToPlan);
    },

    async getPlan(planId: string): Promise<Plan | null> {
      const { data, error } = await supabase
        .from('plans')
        .select(PLAN_SELECT)
        .eq('id', planId)
        .maybeSingle();

      if (error !== null) {
        rethrow('get plan', error);
      }
      if (data === null) {
        return null;
      }

      return mapRowToPlan(data as PlanRow);
    },

    async getSubscription(subscriptionId: string): Promise<Subscription | null> {
      const { data, error } = await supabase
        .from('subscriptions')
        .select('*')
        .eq('id', subscriptionId)
        .maybeSingle();

      if (error !== null) {
        rethrow('get subscription', error);
      }
      if (data === null) {
        return null;
      }

      return mapRowToSubscription(data as SubscriptionRow);
    },

    async findActiveFamilySubscription(subscriber) {
      const { data, error } = await subscriberQuery(subscriber)
        .in('status', [...ACTIVE_FAMILY_STATUSES])
        .order('created_at', { ascending: false })
        .limit(1)
        .maybeSingle();

      if (error !== null) {
        rethrow('find active subscription', error);
      }
      if (data === null) {
        return null;
      }

      return mapRowToSubscription(data as SubscriptionRow);
    },

    async listSubscriptions(subscriber) {
      const { data, error } = await subscriberQuery(subscriber).order('created_at', {
        ascending: false,
      });

      if (error !== null) {
        rethrow('list subscriptions', error);
      }

      return (data as SubscriptionRow[]).map(mapRowToSubscription);
    },

    async hasUsedTrial(subscriber, planId) {
      const { count, error } = await supabase
        .from('subscriptions')
        .select('id', { count: 'exact', head: true })
        .eq('subscriber_type', subscriber.type)
        .eq('subscriber_id', subscriber.id)
        .eq('plan_id', planId)
        .not('trial_ends_at', 'is', null);

      if (error !== null) {
        rethrow('check trial history', error);
      }

      return (count ?? 0) > 0;
    },

    async findOverdueSubscriptions(now, limit) {
      const at = now.toISOString();
      const { data, error } = await supabase
        .from('subscriptions')
        .select('*')
        .in('status', [...ACTIVE_FAMILY_STATUSES])
        .or(`grace_ends_at.lt."${at}",and(grace_ends_at.is.null,ends_at.lt."${at}")`)
        .order('ends_at', { ascending: true })
        .limit(limit);

      if (error !== null) {
        rethrow('find overdue subscriptions', error);
      }

      return (data as SubscriptionRow[]).map(mapRowToSubscription);
    },

    async findRenewableSubscriptions(endingBefore, limit) {
      const { data, error } = await supabase
        .from('subscriptions')
        .select('*')
        .eq('status', 'active')
        .eq('is_auto_renewal', true)
        .not('ends_at', 'is', null)
        .lte('ends_at', endingBefore.toISOString())
        .order('ends_at', { ascending: true })
        .limit(limit);

      if (error !== null) {
        rethrow('find renewable subscriptions', error);
      }

      return (data as SubscriptionRow[]).map(mapRowToSubscription);
    },

    async countSubscriptions(now, expiringSoonDays): Promise<StatusCounts> {
      const { data, error } = await supabase.rpc('subscription_statistics', {
        p_now: now.toISOString(),
        p_expiring_days: expiringSoonDays,
      });

      if (error !== null) {
        rethrow('count subscriptions', error);
      }

      const row = data as {
        by_status: Partial<Record<SubscriptionStatus, number>>;
        expiring_soon: number;
        overdue: number;
        auto_renewing: number;
      };
      return {
        byStatus: {
          pending: row.by_status.pending ?? 0,
          trial: row.by_status.trial ?? 0,
          active: row.by_status.active ?? 0,
          inactive: row.by_status.inactive ?? 0,
          canceled: row.by_status.canceled ?? 0,
          expired: row.by_status.expired ?? 0,
        },
        expiringSoon: row.expiring_soon,
        overdue: row.overdue,
        autoRenewing: row.auto_renewing,
      };
    },

    async getUsage(subscriptionId, key) {
      const { data, error } = await supabase
        .from('subscription_usages')
        .select('*')
        .eq('subscription_id', subscriptionId)
        .eq('key', key)
        .maybeSingle();

      if (error !== null) {
        rethrow('get usage', error);
      }
      if (data === null) {
        return null;
      }

      return mapRowToUsage(data as UsageRow);
    },

    async listUsages(subscriptionId) {
      const { data, error } = await supabase
        .from('subscription_usages')
        .select('*')
        .eq('subscription_id', subscriptionId)
        .order('key', { ascending: true });

      if (error !== null) {
        rethrow('list usages', error);
      }

      return (data as UsageRow[]).map(mapRowToUsage);
    },

    async consumeUsage(request) {
      const { data, error } = await supabase
        .rpc('consume_feature_usage', {
          p_subscription_id: request.subscriptionId,
          p_key: request.key,
          p_amount: request.amount,
          p_limit: request.limit,
          p_reset_before: toIso(request.resetBefore),
          p_now: request.now.toISOString(),
        })
        .single();

      if (error !== null) {
        rethrow('consume feature usage', error);
      }

      const row = data as ConsumeRow;
      return { consumed: row.consumed, used: row.used, reset: row.reset };
    },

    async resetUsage(subscriptionId, key, now) {
      const { data, error } = await supabase
        .from('subscription_usages')
        .update({ used: 0, last_used_at: null, updated_at: now.toISOString() })
        .eq('subscription_id', subscriptionId)
        .eq('key', key)
        .select('id');

      if (error !== null) {
        rethrow('reset usage', error);
      }

      return (data as Array<{ id: string }>).length > 0;
    },

    async findUsagesDueForReset(period, boundary, limit): Promise<DueUsage[]> {
      const { data, error } = await supabase.rpc('find_usages_due_for_reset', {
        p_period: period,
        p_boundary: boundary.toISOString(),
        p_limit: limit,
      });

      if (error !== null) {
        rethrow('find usages due for reset', error);
      }

      return (data as DueUsageRow[]).map((row) => ({
        usage: mapRowToUsage(row),
        subscriber: { type: row.subscriber_type, id: row.subscriber_id },
        planId: row.plan_id,
      }));
    },

    async resetUsagesBefore(usageIds, boundary, now) {
      if (usageIds.length === 0) {
        return [];
      }
      const { data, error } = await supabase
        .from('subscription_usages')
        .update({ used: 0, last_used_at: null, updated_at: now.toISOString() })
        .in('id', usageIds)
        .lt('last_used_at', boundary.toISOString())
        .select('id');

      if (error !== null) {
        rethrow('reset usages', error);
      }

      return (data as Array<{ id: string }>).map((row) => row.id);
    },

    async commit(changes: SubscriptionChangeset) {
      const { error } = await supabase.rpc('apply_subscription_changeset', {
        p_changes: {
          update: (changes.update ?? []).map((u) => ({
            row: mapSubscriptionToRow(u.subscription),
            expected_version: u.expectedVersion,
          })),
          insert: (changes.insert ?? []).map(mapSubscriptionToRow),
          insert_usages: (changes.insertUsages ?? []).map(mapUsageToRow),
          reset_usages_for: changes.resetUsagesFor ?? [],
        },
      });

      if (error !== null) {
        rethrow('apply subscription changes', error);
      }
    },
  };
}
