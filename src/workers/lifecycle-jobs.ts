/**
 * Lifecycle Jobs
 *
 * Periodic sweeps run by an external scheduler (scripts/run-job.ts or
 * POST /api/v1/jobs/*). Each item is processed on its own: one failure
 * is logged with subscriber, subscription and plan ids and the sweep
 * moves on. Failed items are picked up again on the next run.
 */

import { nanoid } from 'nanoid';

import { periodStart } from '@/entitlements/periods.js';
import type { EngineConfig } from '@/lib/config.js';
import { addHours, systemClock, type Clock } from '@/lib/dates.js';
import { logger as defaultLogger, type Logger } from '@/lib/logger.js';
import type { EventService } from '@/services/event.service.js';
import type {
  DueUsage,
  SubscriptionService,
  SubscriptionServiceDb,
  SweepOutcome,
} from '@/services/subscription.service.js';
import type {
  ActorContext,
  EntitlementEvent,
  ResetPeriod,
  Result,
  SubscriberRef,
  Subscription,
} from '@/types/index.js';
import { schedulerActor } from '@/types/index.js';

// ─────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────

export type JobName = 'expire-overdue' | 'auto-renew' | 'reset-usage';

export type ResettablePeriod = Exclude<ResetPeriod, 'never'>;

export const RESETTABLE_PERIODS: readonly ResettablePeriod[] = ['daily', 'monthly', 'yearly'];

export interface JobOptions {
  dryRun?: boolean;
  limit?: number;
}

export type JobItemOutcome = 'succeeded' | 'failed' | 'skipped';

export interface JobItem {
  subscriptionId: string;
  subscriber: SubscriberRef;
  planId: string;
  /** Set for usage resets */
  featureKey?: string;
  outcome: JobItemOutcome;
  reason?: string;
}

export interface JobReport {
  job: JobName;
  runId: string;
  dryRun: boolean;
  processed: number;
  succeeded: number;
  failed: number;
  skipped: number;
  items: JobItem[];
}

export interface LifecycleJobs {
  expireOverdue(options?: JobOptions): Promise<JobReport>;
  autoRenew(options?: JobOptions): Promise<JobReport>;
  resetDueUsage(period: ResettablePeriod | 'all', options?: JobOptions): Promise<JobReport>;
}

export interface LifecycleJobsDeps {
  subscriptionService: SubscriptionService;
  db: SubscriptionServiceDb;
  events: EventService;
  config: EngineConfig;
  clock?: Clock;
  logger?: Logger;
}

export const DEFAULT_JOB_LIMIT = 500;

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

function buildReport(job: JobName, runId: string, dryRun: boolean, items: JobItem[]): JobReport {
  return {
    job,
    runId,
    dryRun,
    processed: items.length,
    succeeded: items.filter((i) => i.outcome === 'succeeded').length,
    failed: items.filter((i) => i.outcome === 'failed').length,
    skipped: items.filter((i) => i.outcome === 'skipped').length,
    items,
  };
}

function subscriptionItem(
  subscription: Subscription,
  outcome: JobItemOutcome,
  reason?: string
): JobItem {
  const item: JobItem = {
    subscriptionId: subscription.id,
    subscriber: subscription.subscriber,
    planId: subscription.planId,
    outcome,
  };
  if (reason !== undefined) {
    item.reason = reason;
  }
  return item;
}

function usageItem(due: DueUsage, outcome: JobItemOutcome, reason?: string): JobItem {
  const item: JobItem = {
    subscriptionId: due.usage.subscriptionId,
    subscriber: due.subscriber,
    planId: due.planId,
    featureKey: due.usage.key,
    outcome,
  };
  if (reason !== undefined) {
    item.reason = reason;
  }
  return item;
}

function itemContext(item: JobItem): Record<string, unknown> {
  return {
    subscriberType: item.subscriber.type,
    subscriberId: item.subscriber.id,
    subscriptionId: item.subscriptionId,
    planId: item.planId,
    ...(item.featureKey === undefined ? {} : { featureKey: item.featureKey }),
  };
}

// ─────────────────────────────────────────────────────────────
// IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

export function createLifecycleJobs(deps: LifecycleJobsDeps): LifecycleJobs {
  const { subscriptionService, db, events, config } = deps;
  const clock = deps.clock ?? systemClock;
  const baseLogger = deps.logger ?? defaultLogger;

  function start(job: JobName): { runId: string; actor: ActorContext; log: Logger } {
    const runId = nanoid(10);
    return {
      runId,
      actor: schedulerActor(job, runId),
      log: baseLogger.child({ job, runId }),
    };
  }

  /**
   * Run one subscription-level operation per candidate. The service
   * re-checks eligibility under the subscriber lock and reports whether
   * it changed anything.
   */
  async function sweep(
    job: JobName,
    candidates: Subscription[],
    dryRun: boolean,
    context: { runId: string; log: Logger },
    apply: (subscription: Subscription) => Promise<Result<SweepOutcome>>,
    noLongerDue: string
  ): Promise<JobReport> {
    const { runId, log } = context;
    const items: JobItem[] = [];

    for (const candidate of candidates) {
      if (dryRun) {
        items.push(subscriptionItem(candidate, 'skipped', 'dry run'));
        continue;
      }

      try {
        const result = await apply(candidate);
        if (!result.success) {
          const item = subscriptionItem(candidate, 'failed', result.error.message);
          log.warn(`${job} item failed`, { ...itemContext(item), code: result.error.code });
          items.push(item);
        } else if (!result.data.changed) {
          items.push(subscriptionItem(candidate, 'skipped', noLongerDue));
        } else {
          items.push(subscriptionItem(candidate, 'succeeded'));
        }
      } catch (error) {
        const item = subscriptionItem(
          candidate,
          'failed',
          error instanceof Error ? error.message : String(error)
        );
        log.error(`${job} item failed`, error, itemContext(item));
        items.push(item);
      }
    }

    const report = buildReport(job, runId, dryRun, items);
    log.info(`${job} finished`, {
      dryRun,
      processed: report.processed,
      succeeded: report.succeeded,
      failed: report.failed,
      skipped: report.skipped,
    });
    return report;
  }

  async function resetPeriod(
    period: ResettablePeriod,
    limit: number,
    dryRun: boolean,
    actor: ActorContext,
    log: Logger
  ): Promise<JobItem[]> {
    const now = clock();
    const boundary = periodStart(period, now);
    if (boundary === null || limit <= 0) {
      return [];
    }

    const due = await db.findUsagesDueForReset(period, boundary, limit);
    if (dryRun) {
      return due.map((d) => usageItem(d, 'skipped', 'dry run'));
    }
    if (due.length === 0) {
      return [];
    }

    let resetIds: Set<string>;
    try {
      resetIds = new Set(
        await db.resetUsagesBefore(
          due.map((d) => d.usage.id),
          boundary,
          now
        )
      );
    } catch (error) {
      const items = due.map((d) =>
        usageItem(d, 'failed', error instanceof Error ? error.message : String(error))
      );
      log.error('reset-usage batch failed', error, { period, count: due.length });
      return items;
    }

    const items: JobItem[] = [];
    const emitted: EntitlementEvent[] = [];
    for (const d of due) {
      if (!resetIds.has(d.usage.id)) {
        items.push(usageItem(d, 'skipped', 'Used again since the period started'));
        continue;
      }
      items.push(usageItem(d, 'succeeded'));
      emitted.push({
        type: 'feature.usage_reset',
        subscriber: d.subscriber,
        occurredAt: now,
        requestId: actor.requestId,
        subscriptionId: d.usage.subscriptionId,
        featureKey: d.usage.key,
        previousUsed: d.usage.used,
      });
    }
    await events.publish(emitted);
    return items;
  }

  return {
    async expireOverdue(options = {}) {
      const dryRun = options.dryRun ?? false;
      const { runId, actor, log } = start('expire-overdue');
      const candidates = await db.findOverdueSubscriptions(
        clock(),
        options.limit ?? DEFAULT_JOB_LIMIT
      );

      return sweep(
        'expire-overdue',
        candidates,
        dryRun,
        { runId, log },
        (subscription) => subscriptionService.expireIfOverdue(actor, subscription.id),
        'No longer overdue'
      );
    },

    async autoRenew(options = {}) {
      const dryRun = options.dryRun ?? false;
      const { runId, actor, log } = start('auto-renew');
      const candidates = await db.findRenewableSubscriptions(
        addHours(clock(), config.renewal.lookaheadHours),
        options.limit ?? DEFAULT_JOB_LIMIT
      );

      return sweep(
        'auto-renew',
        candidates,
        dryRun,
        { runId, log },
        (subscription) => subscriptionService.renewIfDue(actor, subscription.id),
        'No longer due for renewal'
      );
    },

    async resetDueUsage(period, options = {}) {
      const dryRun = options.dryRun ?? false;
      const { runId, actor, log } = start('reset-usage');
      const periods = period === 'all' ? RESETTABLE_PERIODS : [period];
      let remaining = options.limit ?? DEFAULT_JOB_LIMIT;

      const items: JobItem[] = [];
      for (const p of periods) {
        const batch = await resetPeriod(p, remaining, dryRun, actor, log);
        items.push(...batch);
        remaining -= batch.length;
      }

      const report = buildReport('reset-usage', runId, dryRun, items);
      log.info('reset-usage finished', {
        period,
        dryRun,
        processed: report.processed,
        succeeded: report.succeeded,
        skipped: report.skipped,
      });
      return report;
    },
  };
}
