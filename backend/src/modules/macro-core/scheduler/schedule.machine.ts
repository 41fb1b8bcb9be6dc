/**
 * SCHEDULE STATE MACHINE
 *
 *   IDLE ──(now ≥ nextDueAt)──► DUE ──► FETCHING ──ok──► IDLE
 *                                ▲                 └─err─► BACKOFF_WAIT
 *                                └───(now ≥ nextDueAt)─────────┘
 *
 * Pure functions over ScheduleState. Time and randomness come in as
 * arguments; nothing here reads a clock or touches storage.
 */

import type { ScheduleState } from '../contracts/macro.contracts.js';

export interface ScheduleTiming {
  /** Base interval between successful polls of this series. */
  pollIntervalMs: number;
  jitterMinMs: number;
  jitterMaxMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  alertThreshold: number;
}

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export interface FailureOutcome {
  state: ScheduleState;
  delayMs: number;
  /** consecutiveFailures is at or past the alert threshold. */
  alert: boolean;
}

export class IllegalTransitionError extends Error {
  constructor(seriesKey: string, from: string, to: string) {
    super(`Schedule for ${seriesKey}: cannot go from ${from} to ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

// ═══════════════════════════════════════════════════════════════
// TIMING
// ═══════════════════════════════════════════════════════════════

/** Uniform integer in [min, max]. */
export function jitterMs(minMs: number, maxMs: number, random: RandomSource): number {
  if (maxMs <= minMs) return minMs;
  return minMs + Math.floor(random() * (maxMs - minMs + 1));
}

/** min(base · 2^(failures − 1), max) for failures ≥ 1. */
export function backoffDelayMs(failures: number, baseMs: number, maxMs: number): number {
  if (failures <= 0) return 0;
  // cap the exponent before it overflows into Infinity
  const exponent = Math.min(failures - 1, 52);
  return Math.min(baseMs * 2 ** exponent, maxMs);
}

/** Longest a healthy series can go between successes. */
export function maxQuietPeriodMs(timing: ScheduleTiming): number {
  return timing.pollIntervalMs + timing.jitterMaxMs + timing.backoffMaxMs;
}

// ═══════════════════════════════════════════════════════════════
// TRANSITIONS
// ═══════════════════════════════════════════════════════════════

/** A series seen for the first time is due right away. */
export function initialState(seriesKey: string, now: Date): ScheduleState {
  return {
    seriesKey,
    phase: 'DUE',
    lastAttemptAt: null,
    lastSuccessAt: null,
    nextDueAt: new Date(now.getTime()),
    consecutiveFailures: 0,
    lastError: null,
  };
}

/**
 * State loaded from storage after a restart. A fetch that was in flight
 * when the process died is treated as due again.
 */
export function resumeState(persisted: ScheduleState, now: Date): ScheduleState {
  if (persisted.phase !== 'FETCHING') return persisted;
  return { ...persisted, phase: 'DUE', nextDueAt: new Date(now.getTime()) };
}

export function isDue(state: ScheduleState, now: Date): boolean {
  if (state.phase === 'FETCHING') return false;
  return now.getTime() >= state.nextDueAt.getTime();
}

/** IDLE / BACKOFF_WAIT → DUE once the due time has passed; otherwise unchanged. */
export function markDue(state: ScheduleState, now: Date): ScheduleState {
  if (state.phase === 'DUE' || !isDue(state, now)) return state;
  return { ...state, phase: 'DUE' };
}

export function beginFetch(state: ScheduleState, now: Date): ScheduleState {
  if (state.phase !== 'DUE') {
    throw new IllegalTransitionError(state.seriesKey, state.phase, 'FETCHING');
  }
  return { ...state, phase: 'FETCHING', lastAttemptAt: new Date(now.getTime()) };
}

export function recordSuccess(
  state: ScheduleState,
  now: Date,
  timing: ScheduleTiming,
  random: RandomSource,
): ScheduleState {
  if (state.phase !== 'FETCHING') {
    throw new IllegalTransitionError(state.seriesKey, state.phase, 'IDLE');
  }
  const delay = timing.pollIntervalMs + jitterMs(timing.jitterMinMs, timing.jitterMaxMs, random);
  return {
    ...state,
    phase: 'IDLE',
    lastSuccessAt: new Date(now.getTime()),
    nextDueAt: new Date(now.getTime() + delay),
    consecutiveFailures: 0,
    lastError: null,
  };
}

export function recordFailure(
  state: ScheduleState,
  now: Date,
  error: string,
  timing: ScheduleTiming,
): FailureOutcome {
  if (state.phase !== 'FETCHING') {
    throw new IllegalTransitionError(state.seriesKey, state.phase, 'BACKOFF_WAIT');
  }
  const failures = state.consecutiveFailures + 1;
  const delayMs = backoffDelayMs(failures, timing.backoffBaseMs, timing.backoffMaxMs);
  return {
    state: {
      ...state,
      phase: 'BACKOFF_WAIT',
      nextDueAt: new Date(now.getTime() + delayMs),
      consecutiveFailures: failures,
      lastError: error,
    },
    delayMs,
    alert: failures >= timing.alertThreshold,
  };
}
