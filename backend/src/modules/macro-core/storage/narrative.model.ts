/**
 * NARRATIVE ARTIFACT MODEL
 *
 * Append-only. At most one artifact per source change-set.
 */

import mongoose, { Schema } from 'mongoose';

export interface INarrativeArtifact {
  artifactId: string;
  generatedAt: Date;
  coveredSeries: string[];
  coveredPeriodRange: { from: string; to: string };
  text: string;
  sourceChangeSetRef: string;
  aiModel: string;
  promptTokensEstimate: number;
  truncated: boolean;
}

const NarrativeArtifactSchema = new Schema<INarrativeArtifact>(
  {
    artifactId: { type: String, required: true, unique: true },
    generatedAt: { type: Date, required: true },
    coveredSeries: { type: [String], required: true },
    coveredPeriodRange: {
      from: { type: String, required: true },
      to: { type: String, required: true },
    },
    text: { type: String, required: true },
    sourceChangeSetRef: { type: String, required: true, unique: true },
    aiModel: { type: String, required: true },
    promptTokensEstimate: { type: Number, default: 0 },
    truncated: { type: Boolean, default: false },
  },
  {
    collection: 'narrative_artifacts',
  }
);

NarrativeArtifactSchema.index({ generatedAt: -1 });

export const NarrativeArtifactModel = mongoose.model<INarrativeArtifact>(
  'NarrativeArtifact',
  NarrativeArtifactSchema
);
