/**
 * Lifecycle Events
 * Published after the owning operation has committed
 */

import type {
  PlanChangeSummary,
  SubscriberRef,
  Subscription,
} from './entitlement.js';

interface EventBase {
  subscriber: SubscriberRef;
  occurredAt: Date;
  requestId: string;
}

export interface SubscriptionCreatedEvent extends EventBase {
  type: 'subscription.created';
  subscription: Subscription;
  action: 'subscribe' | 'trial' | 'change' | 'duplicate';
  originalSubscriptionId?: string;
  withTrial: boolean;
}

export interface SubscriptionStartedEvent extends EventBase {
  type: 'subscription.started';
  subscription: Subscription;
  resumed: boolean;
}

export interface TrialStartedEvent extends EventBase {
  type: 'trial.started';
  subscription: Subscription;
  trialDays: number;
}

export interface SubscriptionChangedEvent extends EventBase {
  type: 'subscription.changed';
  subscription: Subscription;
  previousSubscription: Subscription;
  summary: PlanChangeSummary;
}

export interface SubscriptionCanceledEvent extends EventBase {
  type: 'subscription.canceled';
  subscription: Subscription;
}

export interface SubscriptionRenewedEvent extends EventBase {
  type: 'subscription.renewed';
  subscription: Subscription;
  automatic: boolean;
  previousEndsAt: Date | null;
}

export interface SubscriptionRenewalFailedEvent extends EventBase {
  type: 'subscription.renewal_failed';
  subscription: Subscription;
  reason: string;
}

export interface SubscriptionExpiredEvent extends EventBase {
  type: 'subscription.expired';
  subscription: Subscription;
  wasInGracePeriod: boolean;
}

export interface SubscriptionDeactivatedEvent extends EventBase {
  type: 'subscription.deactivated';
  subscription: Subscription;
}

export interface FeatureUsedEvent extends EventBase {
  type: 'feature.used';
  subscription: Subscription;
  featureKey: string;
  amount: number;
  /** -1 when the feature is unlimited */
  remaining: number;
}

export interface FeatureUsageResetEvent extends EventBase {
  type: 'feature.usage_reset';
  subscriptionId: string;
  featureKey: string;
  previousUsed: number;
}

export type EntitlementEvent =
  | SubscriptionCreatedEvent
  | SubscriptionStartedEvent
  | TrialStartedEvent
  | SubscriptionChangedEvent
  | SubscriptionCanceledEvent
  | SubscriptionRenewedEvent
  | SubscriptionRenewalFailedEvent
  | SubscriptionExpiredEvent
  | SubscriptionDeactivatedEvent
  | FeatureUsedEvent
  | FeatureUsageResetEvent;

export type EntitlementEventType = EntitlementEvent['type'];

export type EventOfType<T extends EntitlementEventType> = Extract<
  EntitlementEvent,
  { type: T }
>;
