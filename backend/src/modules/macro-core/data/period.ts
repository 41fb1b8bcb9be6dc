/**
 * PERIODS
 *
 * Canonical period keys per cadence:
 *   daily, weekly  YYYY-MM-DD   (weekly uses the provider's week date)
 *   monthly        YYYY-MM
 *   quarterly      YYYY-Qn
 *
 * All keys of one cadence sort lexicographically in time order.
 */

import type { Cadence } from '../contracts/macro.contracts.js';

const DAY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MONTH_RE = /^(\d{4})-(\d{2})$/;
const QUARTER_RE = /^(\d{4})-Q([1-4])$/;

const DAY_MS = 24 * 60 * 60 * 1000;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function formatDay(date: Date): string {
  return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
}

function parseDay(value: string): Date | null {
  const m = DAY_RE.exec(value);
  if (!m) return null;
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  // rejects 2024-02-30 and friends
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

function monthIndex(year: number, month: number): number {
  return year * 12 + (month - 1);
}

function fromMonthIndex(index: number): { year: number; month: number } {
  return { year: Math.floor(index / 12), month: (index % 12) + 1 };
}

// ═══════════════════════════════════════════════════════════════
// VALIDATION / PARSING
// ═══════════════════════════════════════════════════════════════

export function isValidPeriod(cadence: Cadence, period: string): boolean {
  switch (cadence) {
    case 'daily':
    case 'weekly':
      return parseDay(period) !== null;
    case 'monthly': {
      const m = MONTH_RE.exec(period);
      return m !== null && Number(m[2]) >= 1 && Number(m[2]) <= 12;
    }
    case 'quarterly':
      return QUARTER_RE.test(period);
  }
}

/**
 * Map a provider date (YYYY-MM-DD) onto the cadence's period key.
 * Returns null for anything that is not a real calendar date.
 */
export function periodFromDate(cadence: Cadence, isoDate: string): string | null {
  const date = parseDay(isoDate.trim());
  if (!date) return null;

  switch (cadence) {
    case 'daily':
    case 'weekly':
      return formatDay(date);
    case 'monthly':
      return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}`;
    case 'quarterly':
      return `${date.getUTCFullYear()}-Q${Math.floor(date.getUTCMonth() / 3) + 1}`;
  }
}

/** First calendar day of a period, as YYYY-MM-DD. */
export function periodStartDate(cadence: Cadence, period: string): string {
  switch (cadence) {
    case 'daily':
    case 'weekly':
      return period;
    case 'monthly':
      return `${period}-01`;
    case 'quarterly': {
      const m = QUARTER_RE.exec(period);
      if (!m) throw new Error(`Invalid quarterly period: ${period}`);
      const month = (Number(m[2]) - 1) * 3 + 1;
      return `${m[1]}-${pad2(month)}-01`;
    }
  }
}

/** Last calendar day of a period, as YYYY-MM-DD. */
export function periodEndDate(cadence: Cadence, period: string): string {
  if (cadence === 'daily' || cadence === 'weekly') return period;
  const next = shiftPeriod(cadence, period, 1);
  const nextStart = parseDay(periodStartDate(cadence, next));
  if (!nextStart) throw new Error(`Invalid period: ${period}`);
  return formatDay(new Date(nextStart.getTime() - DAY_MS));
}

// ═══════════════════════════════════════════════════════════════
// ARITHMETIC
// ═══════════════════════════════════════════════════════════════

export function shiftPeriod(cadence: Cadence, period: string, n: number): string {
  switch (cadence) {
    case 'daily':
    case 'weekly': {
      const date = parseDay(period);
      if (!date) throw new Error(`Invalid ${cadence} period: ${period}`);
      const step = cadence === 'daily' ? 1 : 7;
      return formatDay(new Date(date.getTime() + n * step * DAY_MS));
    }
    case 'monthly': {
      const m = MONTH_RE.exec(period);
      if (!m) throw new Error(`Invalid monthly period: ${period}`);
      const { year, month } = fromMonthIndex(monthIndex(Number(m[1]), Number(m[2])) + n);
      return `${year}-${pad2(month)}`;
    }
    case 'quarterly': {
      const m = QUARTER_RE.exec(period);
      if (!m) throw new Error(`Invalid quarterly period: ${period}`);
      const index = Number(m[1]) * 4 + (Number(m[2]) - 1) + n;
      return `${Math.floor(index / 4)}-Q${(index % 4) + 1}`;
    }
  }
}

export function currentPeriod(cadence: Cadence, now: Date): string {
  const period = periodFromDate(cadence, formatDay(now));
  if (!period) throw new Error(`Cannot derive period from ${now.toISOString()}`);
  return period;
}

export function comparePeriods(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function maxPeriod(a: string, b: string): string {
  return comparePeriods(a, b) >= 0 ? a : b;
}

export function isWithinRange(period: string, range: { from?: string; to?: string }): boolean {
  if (range.from !== undefined && period < range.from) return false;
  if (range.to !== undefined && period > range.to) return false;
  return true;
}

export function periodStartUtc(cadence: Cadence, period: string): Date {
  const date = parseDay(periodStartDate(cadence, period));
  if (!date) throw new Error(`Invalid ${cadence} period: ${period}`);
  return date;
}
