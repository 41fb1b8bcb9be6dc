/**
 * INGEST RUN MODEL: sync log
 *
 * One audit row per pipeline attempt, success or not.
 */

import mongoose, { Schema } from 'mongoose';
import type { ProviderId } from '../contracts/macro.contracts.js';

export interface IIngestRun {
  runId: string;
  seriesKey: string;
  provider: ProviderId;
  startedAt: Date;
  finishedAt: Date;
  ok: boolean;
  newCount: number;
  revisedCount: number;
  unchangedCount: number;
  skippedCount: number;
  partial: boolean;
  apiCalls: number;
  changeSetId?: string;
  error?: string;
}

const IngestRunSchema = new Schema<IIngestRun>(
  {
    runId: { type: String, required: true, unique: true },
    seriesKey: { type: String, required: true },
    provider: { type: String, enum: ['FRED', 'BLS'], required: true },
    startedAt: { type: Date, required: true },
    finishedAt: { type: Date, required: true },
    ok: { type: Boolean, required: true },
    newCount: { type: Number, default: 0 },
    revisedCount: { type: Number, default: 0 },
    unchangedCount: { type: Number, default: 0 },
    skippedCount: { type: Number, default: 0 },
    partial: { type: Boolean, default: false },
    apiCalls: { type: Number, default: 0 },
    changeSetId: { type: String },
    error: { type: String },
  },
  {
    collection: 'ingest_runs',
  }
);

IngestRunSchema.index({ seriesKey: 1, startedAt: -1 });

export const IngestRunModel = mongoose.model<IIngestRun>('IngestRun', IngestRunSchema);
