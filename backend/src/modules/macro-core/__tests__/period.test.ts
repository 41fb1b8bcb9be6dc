import { describe, it, expect } from 'vitest';
import {
  comparePeriods,
  currentPeriod,
  isValidPeriod,
  isWithinRange,
  maxPeriod,
  periodEndDate,
  periodFromDate,
  periodStartDate,
  periodStartUtc,
  shiftPeriod,
} from '../data/period.js';

describe('period keys', () => {
  describe('isValidPeriod', () => {
    it('should accept canonical keys per cadence', () => {
      expect(isValidPeriod('daily', '2024-02-29')).toBe(true);
      expect(isValidPeriod('weekly', '2024-01-06')).toBe(true);
      expect(isValidPeriod('monthly', '2024-12')).toBe(true);
      expect(isValidPeriod('quarterly', '2024-Q4')).toBe(true);
    });

    it('should reject impossible dates and out-of-range parts', () => {
      expect(isValidPeriod('daily', '2023-02-29')).toBe(false);
      expect(isValidPeriod('monthly', '2024-13')).toBe(false);
      expect(isValidPeriod('monthly', '2024-00')).toBe(false);
      expect(isValidPeriod('quarterly', '2024-Q5')).toBe(false);
      expect(isValidPeriod('monthly', '2024-01-01')).toBe(false);
    });
  });

  describe('periodFromDate', () => {
    it('should map provider dates onto the cadence key', () => {
      expect(periodFromDate('monthly', '2024-01-01')).toBe('2024-01');
      expect(periodFromDate('quarterly', '2024-05-01')).toBe('2024-Q2');
      expect(periodFromDate('daily', ' 2024-03-15 ')).toBe('2024-03-15');
    });

    it('should return null for non-dates', () => {
      expect(periodFromDate('monthly', 'not-a-date')).toBeNull();
      expect(periodFromDate('monthly', '2024-02-31')).toBeNull();
    });
  });

  describe('period bounds', () => {
    it('should give first and last calendar day', () => {
      expect(periodStartDate('quarterly', '2024-Q3')).toBe('2024-07-01');
      expect(periodEndDate('monthly', '2024-02')).toBe('2024-02-29');
      expect(periodEndDate('quarterly', '2024-Q4')).toBe('2024-12-31');
      expect(periodEndDate('daily', '2024-06-30')).toBe('2024-06-30');
    });

    it('should give the UTC instant a period starts at', () => {
      expect(periodStartUtc('quarterly', '2024-Q2').toISOString()).toBe('2024-04-01T00:00:00.000Z');
    });
  });

  describe('shiftPeriod', () => {
    it('should cross year boundaries', () => {
      expect(shiftPeriod('monthly', '2024-01', -1)).toBe('2023-12');
      expect(shiftPeriod('quarterly', '2024-Q1', -1)).toBe('2023-Q4');
      expect(shiftPeriod('monthly', '2023-11', 3)).toBe('2024-02');
    });

    it('should step weekly periods by seven days', () => {
      expect(shiftPeriod('weekly', '2024-01-06', 1)).toBe('2024-01-13');
      expect(shiftPeriod('daily', '2024-03-01', -1)).toBe('2024-02-29');
    });
  });

  it('should derive the current period from a clock', () => {
    const now = new Date('2024-08-15T10:00:00Z');
    expect(currentPeriod('quarterly', now)).toBe('2024-Q3');
    expect(currentPeriod('monthly', now)).toBe('2024-08');
  });

  it('should order keys of one cadence in time order', () => {
    expect(comparePeriods('2023-12', '2024-01')).toBe(-1);
    expect(comparePeriods('2024-Q2', '2024-Q2')).toBe(0);
    expect(maxPeriod('2024-Q1', '2023-Q4')).toBe('2024-Q1');
    expect(isWithinRange('2024-02', { from: '2024-01', to: '2024-03' })).toBe(true);
    expect(isWithinRange('2024-04', { to: '2024-03' })).toBe(false);
  });
});
