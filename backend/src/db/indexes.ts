/**
 * Database Indexes
 * Run on startup, after the connection is up.
 */

import { moduleLogger } from '../core/logger.js';
import { errorMessage } from '../common/errors.js';
import { ObservationModel } from '../modules/macro-core/storage/observation.model.js';
import { NarrativeArtifactModel } from '../modules/macro-core/storage/narrative.model.js';
import { PendingSynthesisModel } from '../modules/macro-core/storage/pending_synthesis.model.js';
import { ScheduleStateModel } from '../modules/macro-core/storage/schedule_state.model.js';
import { IngestRunModel } from '../modules/macro-core/storage/ingest_run.model.js';
import { SeriesMetaModel } from '../modules/macro-core/storage/series_meta.model.js';

const log = moduleLogger('db');

interface IndexedModel {
  createIndexes(): Promise<unknown>;
  collection: { collectionName: string };
}

const MODELS: readonly IndexedModel[] = [
  ObservationModel,
  NarrativeArtifactModel,
  PendingSynthesisModel,
  ScheduleStateModel,
  IngestRunModel,
  SeriesMetaModel,
];

export async function ensureIndexes(): Promise<void> {
  for (const model of MODELS) {
    try {
      await model.createIndexes();
      log.debug({ collection: model.collection.collectionName }, 'indexes ensured');
    } catch (err) {
      log.error({ collection: model.collection.collectionName, err: errorMessage(err) }, 'index creation failed');
      throw err;
    }
  }
  log.info('indexes ensured');
}
