/**
 * PENDING SYNTHESIS MODEL
 *
 * Backlog of change-sets whose narrative has not been written yet. An entry
 * is removed only after its artifact exists.
 */

import mongoose, { Schema } from 'mongoose';
import type { ChangeKind } from '../contracts/macro.contracts.js';

export interface IPendingSynthesis {
  changeSetId: string;
  changeSet: {
    id: string;
    createdAt: Date;
    entries: Array<{
      seriesKey: string;
      period: string;
      oldValue?: number;
      newValue: number;
      changeKind: ChangeKind;
      revision: number;
    }>;
    unchangedCount: number;
    skipped: Array<{ seriesKey: string; period: string; reason: string }>;
  };
  attempts: number;
  nextAttemptAt: Date;
  lastError?: string;
  createdAt: Date;
}

const ChangeSetEntrySchema = new Schema(
  {
    seriesKey: { type: String, required: true },
    period: { type: String, required: true },
    oldValue: { type: Number },
    newValue: { type: Number, required: true },
    changeKind: { type: String, enum: ['new', 'revised', 'unchanged'], required: true },
    revision: { type: Number, required: true },
  },
  { _id: false }
);

const SkippedRecordSchema = new Schema(
  {
    seriesKey: { type: String, required: true },
    period: { type: String, required: true },
    reason: { type: String, required: true },
  },
  { _id: false }
);

const PendingSynthesisSchema = new Schema<IPendingSynthesis>(
  {
    changeSetId: { type: String, required: true, unique: true },
    changeSet: {
      id: { type: String, required: true },
      createdAt: { type: Date, required: true },
      entries: { type: [ChangeSetEntrySchema], default: [] },
      unchangedCount: { type: Number, default: 0 },
      skipped: { type: [SkippedRecordSchema], default: [] },
    },
    attempts: { type: Number, default: 0 },
    nextAttemptAt: { type: Date, required: true },
    lastError: { type: String },
    createdAt: { type: Date, required: true },
  },
  {
    collection: 'pending_syntheses',
  }
);

PendingSynthesisSchema.index({ nextAttemptAt: 1 });

export const PendingSynthesisModel = mongoose.model<IPendingSynthesis>(
  'PendingSynthesis',
  PendingSynthesisSchema
);
