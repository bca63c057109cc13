/**
 * Background Workers Exports
 *
 * Sweeps are idempotent: an item that fails is retried on the next run.
 */

export type {
  JobItem,
  JobItemOutcome,
  JobName,
  JobOptions,
  JobReport,
  LifecycleJobs,
  LifecycleJobsDeps,
  ResettablePeriod,
} from './lifecycle-jobs.js';
export { createLifecycleJobs, DEFAULT_JOB_LIMIT, RESETTABLE_PERIODS } from './lifecycle-jobs.js';
