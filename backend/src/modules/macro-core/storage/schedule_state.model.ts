/**
 * SCHEDULE STATE MODEL
 *
 * Persisted copy of the scheduler's per-series state, written after every
 * fetch attempt so a restart resumes backoff where it left off.
 */

import mongoose, { Schema } from 'mongoose';
import type { SchedulePhase } from '../contracts/macro.contracts.js';

export interface IScheduleState {
  seriesKey: string;
  phase: SchedulePhase;
  lastAttemptAt: Date | null;
  lastSuccessAt: Date | null;
  nextDueAt: Date;
  consecutiveFailures: number;
  lastError: string | null;
}

const ScheduleStateSchema = new Schema<IScheduleState>(
  {
    seriesKey: { type: String, required: true, unique: true },
    phase: {
      type: String,
      enum: ['IDLE', 'DUE', 'FETCHING', 'BACKOFF_WAIT'],
      required: true,
    },
    lastAttemptAt: { type: Date, default: null },
    lastSuccessAt: { type: Date, default: null },
    nextDueAt: { type: Date, required: true },
    consecutiveFailures: { type: Number, default: 0 },
    lastError: { type: String, default: null },
  },
  {
    timestamps: true,
    collection: 'schedule_state',
  }
);

export const ScheduleStateModel = mongoose.model<IScheduleState>('ScheduleState', ScheduleStateSchema);
