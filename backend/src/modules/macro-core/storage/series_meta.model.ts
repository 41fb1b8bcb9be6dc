/**
 * SERIES META MODEL
 *
 * Descriptive metadata published by providers (title, native units,
 * last-updated stamp). Refreshed on startup; informational only.
 */

import mongoose, { Schema } from 'mongoose';

export interface ISeriesMeta {
  seriesKey: string;
  title: string;
  units: string;
  frequency: string;
  seasonalAdjustment?: string;
  providerLastUpdated?: string;
  refreshedAt: Date;
}

const SeriesMetaSchema = new Schema<ISeriesMeta>(
  {
    seriesKey: { type: String, required: true, unique: true },
    title: { type: String, required: true },
    units: { type: String, default: '' },
    frequency: { type: String, default: '' },
    seasonalAdjustment: { type: String },
    providerLastUpdated: { type: String },
    refreshedAt: { type: Date, required: true },
  },
  {
    timestamps: true,
    collection: 'series_meta',
  }
);

export const SeriesMetaModel = mongoose.model<ISeriesMeta>('SeriesMeta', SeriesMetaSchema);
