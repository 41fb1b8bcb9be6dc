/**
 * OBSERVATION MODEL
 *
 * One document per (seriesKey, period, revision). A revision never replaces
 * an earlier document; the latest value of a period is its highest revision.
 */

import mongoose, { Schema } from 'mongoose';

export interface IObservation {
  seriesKey: string;
  period: string;       // cadence period key (YYYY-MM-DD | YYYY-MM | YYYY-Qn)
  value: number;
  revision: number;     // 0 = first publication
  fetchedAt: Date;
  createdAt?: Date;
}

const ObservationSchema = new Schema<IObservation>(
  {
    seriesKey: { type: String, required: true },
    period: { type: String, required: true },
    value: { type: Number, required: true },
    revision: { type: Number, required: true, min: 0 },
    fetchedAt: { type: Date, required: true },
  },
  {
    timestamps: { createdAt: true, updatedAt: false },
    collection: 'observations',
  }
);

// one row per revision; doubles as the latest-per-period lookup index
ObservationSchema.index({ seriesKey: 1, period: 1, revision: -1 }, { unique: true });

// revision events by time
ObservationSchema.index({ seriesKey: 1, revision: 1, fetchedAt: -1 });

export const ObservationModel = mongoose.model<IObservation>('Observation', ObservationSchema);
