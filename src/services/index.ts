/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the database.
 * All business logic lives here.
 */

// SubscriptionService
export type {
  BillingHooks,
  ChangePlanParams,
  ConsumeParams,
  DueUsage,
  DuplicateParams,
  FeatureConsumption,
  PlanChangeResult,
  RenewalAuthorization,
  StartTrialParams,
  StatusCounts,
  SubscribeParams,
  SubscriptionChangeset,
  SubscriptionService,
  SubscriptionServiceDb,
  SubscriptionServiceDeps,
  SubscriptionUpdate,
} from './subscription.service.js';
export { createSubscriptionService, selectTrialPricing } from './subscription.service.js';
export { createSubscriptionServiceDb } from './subscription.db.js';
export type { InMemorySubscriptionDb } from './subscription.memory.js';
export { createInMemorySubscriptionDb } from './subscription.memory.js';

// Validation
export type { SubscriptionValidator, ValidationSummary } from './subscription.validator.js';
export { createSubscriptionValidator } from './subscription.validator.js';

// EventService
export type { AnyEventHandler, EventHandler, EventService } from './event.service.js';
export { createEventService, isEventOfType } from './event.service.js';

// CurrencyService
export type { CurrencyService, ResolvedPrice } from './currency.service.js';
export { createCurrencyService } from './currency.service.js';
