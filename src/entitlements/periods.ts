/**
 * Reset periods
 * Calendar boundaries (UTC) used by lazy and scheduled usage resets.
 */

import {
  startOfUtcDay,
  startOfUtcMonth,
  startOfUtcYear,
} from '@/lib/dates.js';
import type { ResetPeriod } from '@/types/index.js';

/**
 * Start of the period containing `now`, or null for 'never'
 */
export function periodStart(period: ResetPeriod, now: Date): Date | null {
  switch (period) {
    case 'daily':
      return startOfUtcDay(now);
    case 'monthly':
      return startOfUtcMonth(now);
    case 'yearly':
      return startOfUtcYear(now);
    case 'never':
      return null;
  }
}

/**
 * Start of the period after the one containing `now`
 */
export function nextPeriodStart(period: ResetPeriod, now: Date): Date | null {
  switch (period) {
    case 'daily':
      return new Date(
        Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() + 1)
      );
    case 'monthly':
      return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() + 1, 1));
    case 'yearly':
      return new Date(Date.UTC(now.getUTCFullYear() + 1, 0, 1));
    case 'never':
      return null;
  }
}

/**
 * A counter is due for reset when it was last touched before the start
 * of the current period. Counters never used are not due.
 */
export function isResetDue(
  period: ResetPeriod,
  lastUsedAt: Date | null,
  now: Date
): boolean {
  if (lastUsedAt === null) {
    return false;
  }
  const boundary = periodStart(period, now);
  return boundary !== null && lastUsedAt.getTime() < boundary.getTime();
}
