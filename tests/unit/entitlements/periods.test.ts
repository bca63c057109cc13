/**
 * Reset Period Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { isResetDue, nextPeriodStart, periodStart } from '@/entitlements/periods.js';

const NOW = new Date('2025-03-15T12:00:00.000Z');

describe('Reset Periods', () => {
  describe('periodStart()', () => {
    it('should return UTC calendar boundaries', () => {
      expect(periodStart('daily', NOW)).toEqual(new Date('2025-03-15T00:00:00.000Z'));
      expect(periodStart('monthly', NOW)).toEqual(new Date('2025-03-01T00:00:00.000Z'));
      expect(periodStart('yearly', NOW)).toEqual(new Date('2025-01-01T00:00:00.000Z'));
    });

    it('should return null for never', () => {
      expect(periodStart('never', NOW)).toBeNull();
    });
  });

  describe('nextPeriodStart()', () => {
    it('should return the start of the following period', () => {
      expect(nextPeriodStart('daily', NOW)).toEqual(new Date('2025-03-16T00:00:00.000Z'));
      expect(nextPeriodStart('monthly', NOW)).toEqual(new Date('2025-04-01T00:00:00.000Z'));
      expect(nextPeriodStart('yearly', NOW)).toEqual(new Date('2026-01-01T00:00:00.000Z'));
      expect(nextPeriodStart('never', NOW)).toBeNull();
    });

    it('should roll over the year from December', () => {
      const december = new Date('2025-12-20T08:00:00.000Z');
      expect(nextPeriodStart('monthly', december)).toEqual(new Date('2026-01-01T00:00:00.000Z'));
    });

    it('should roll over the month on its last day', () => {
      const lastDay = new Date('2025-02-28T23:30:00.000Z');
      expect(nextPeriodStart('daily', lastDay)).toEqual(new Date('2025-03-01T00:00:00.000Z'));
    });
  });

  describe('isResetDue()', () => {
    it('should be due when last used before the current period', () => {
      expect(isResetDue('daily', new Date('2025-03-14T23:59:00.000Z'), NOW)).toBe(true);
      expect(isResetDue('monthly', new Date('2025-02-28T10:00:00.000Z'), NOW)).toBe(true);
    });

    it('should not be due when last used inside the current period', () => {
      expect(isResetDue('daily', new Date('2025-03-15T00:00:00.000Z'), NOW)).toBe(false);
      expect(isResetDue('yearly', new Date('2025-01-02T00:00:00.000Z'), NOW)).toBe(false);
    });

    it('should never be due for unused counters or never-reset features', () => {
      expect(isResetDue('daily', null, NOW)).toBe(false);
      expect(isResetDue('never', new Date('2020-01-01T00:00:00.000Z'), NOW)).toBe(false);
    });
  });
});
