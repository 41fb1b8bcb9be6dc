/**
 * MongoDB HistoryStore (mongoose).
 *
 * Observation batches are written inside a transaction, so the connection
 * must point at a replica set (a single-node set is enough).
 */

import mongoose, { type PipelineStage } from 'mongoose';
import { DataIntegrityError, StorageUnavailableError } from '../../../common/errors.js';
import type {
  IngestRun,
  NarrativeArtifact,
  Observation,
  PendingSynthesis,
  RevisionEvent,
  ScheduleState,
  SeriesMeta,
} from '../contracts/macro.contracts.js';
import type { HistoryQuery, HistoryStore } from './history.store.js';
import { ObservationModel, type IObservation } from './observation.model.js';
import { NarrativeArtifactModel, type INarrativeArtifact } from './narrative.model.js';
import { PendingSynthesisModel, type IPendingSynthesis } from './pending_synthesis.model.js';
import { ScheduleStateModel, type IScheduleState } from './schedule_state.model.js';
import { IngestRunModel, type IIngestRun } from './ingest_run.model.js';
import { SeriesMetaModel, type ISeriesMeta } from './series_meta.model.js';

// ═══════════════════════════════════════════════════════════════
// MAPPING
// ═══════════════════════════════════════════════════════════════

function toObservation(doc: IObservation): Observation {
  return {
    seriesKey: doc.seriesKey,
    period: doc.period,
    value: doc.value,
    revision: doc.revision,
    fetchedAt: new Date(doc.fetchedAt),
  };
}

function toArtifact(doc: INarrativeArtifact): NarrativeArtifact {
  return {
    id: doc.artifactId,
    generatedAt: new Date(doc.generatedAt),
    coveredSeries: [...doc.coveredSeries],
    coveredPeriodRange: { from: doc.coveredPeriodRange.from, to: doc.coveredPeriodRange.to },
    text: doc.text,
    sourceChangeSetRef: doc.sourceChangeSetRef,
    model: doc.aiModel,
    promptTokensEstimate: doc.promptTokensEstimate,
    truncated: doc.truncated,
  };
}

function toPending(doc: IPendingSynthesis): PendingSynthesis {
  return {
    changeSetId: doc.changeSetId,
    changeSet: {
      id: doc.changeSet.id,
      createdAt: new Date(doc.changeSet.createdAt),
      entries: doc.changeSet.entries.map((e) => ({
        seriesKey: e.seriesKey,
        period: e.period,
        ...(e.oldValue !== undefined && e.oldValue !== null ? { oldValue: e.oldValue } : {}),
        newValue: e.newValue,
        changeKind: e.changeKind,
        revision: e.revision,
      })),
      unchangedCount: doc.changeSet.unchangedCount,
      skipped: doc.changeSet.skipped.map((s) => ({ seriesKey: s.seriesKey, period: s.period, reason: s.reason })),
    },
    attempts: doc.attempts,
    nextAttemptAt: new Date(doc.nextAttemptAt),
    lastError: doc.lastError,
    createdAt: new Date(doc.createdAt),
  };
}

function toScheduleState(doc: IScheduleState): ScheduleState {
  return {
    seriesKey: doc.seriesKey,
    phase: doc.phase,
    lastAttemptAt: doc.lastAttemptAt ? new Date(doc.lastAttemptAt) : null,
    lastSuccessAt: doc.lastSuccessAt ? new Date(doc.lastSuccessAt) : null,
    nextDueAt: new Date(doc.nextDueAt),
    consecutiveFailures: doc.consecutiveFailures,
    lastError: doc.lastError ?? null,
  };
}

function toIngestRun(doc: IIngestRun): IngestRun {
  return {
    runId: doc.runId,
    seriesKey: doc.seriesKey,
    provider: doc.provider,
    startedAt: new Date(doc.startedAt),
    finishedAt: new Date(doc.finishedAt),
    ok: doc.ok,
    newCount: doc.newCount,
    revisedCount: doc.revisedCount,
    unchangedCount: doc.unchangedCount,
    skippedCount: doc.skippedCount,
    partial: doc.partial,
    apiCalls: doc.apiCalls,
    changeSetId: doc.changeSetId,
    error: doc.error,
  };
}

function toSeriesMeta(doc: ISeriesMeta): SeriesMeta {
  return {
    seriesKey: doc.seriesKey,
    title: doc.title,
    units: doc.units,
    frequency: doc.frequency,
    seasonalAdjustment: doc.seasonalAdjustment,
    providerLastUpdated: doc.providerLastUpdated,
    refreshedAt: new Date(doc.refreshedAt),
  };
}

function isDuplicateKeyError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 11000;
}

function periodFilter(query: HistoryQuery): Record<string, string> | undefined {
  if (query.from === undefined && query.to === undefined) return undefined;
  const filter: Record<string, string> = {};
  if (query.from !== undefined) filter.$gte = query.from;
  if (query.to !== undefined) filter.$lte = query.to;
  return filter;
}

// ═══════════════════════════════════════════════════════════════
// STORE
// ═══════════════════════════════════════════════════════════════

export class MongoHistoryStore implements HistoryStore {
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof DataIntegrityError || err instanceof StorageUnavailableError) throw err;
      throw new StorageUnavailableError(operation, err);
    }
  }

  // ─── observations ───────────────────────────────────────────

  async appendObservations(seriesKey: string, rows: readonly Observation[]): Promise<void> {
    if (rows.length === 0) return;

    const session = await this.run('startSession', () => mongoose.startSession());
    try {
      await session.withTransaction(async () => {
        await ObservationModel.insertMany(
          rows.map((r) => ({
            seriesKey: r.seriesKey,
            period: r.period,
            value: r.value,
            revision: r.revision,
            fetchedAt: r.fetchedAt,
          })),
          { session, ordered: true }
        );
      });
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new DataIntegrityError(seriesKey, 'Revision already written by a concurrent writer');
      }
      throw new StorageUnavailableError('appendObservations', err);
    } finally {
      await session.endSession();
    }
  }

  async readLatest(seriesKey: string, periods: readonly string[]): Promise<Map<string, Observation>> {
    if (periods.length === 0) return new Map();

    const rows = await this.run('readLatest', () =>
      ObservationModel.aggregate<{ _id: string; doc: IObservation }>([
        { $match: { seriesKey, period: { $in: [...periods] } } },
        { $sort: { period: 1, revision: -1 } },
        { $group: { _id: '$period', doc: { $first: '$$ROOT' } } },
      ]).exec()
    );

    return new Map(rows.map((r) => [r._id, toObservation(r.doc)]));
  }

  async readHistory(seriesKey: string, query: HistoryQuery = {}): Promise<Observation[]> {
    const range = periodFilter(query);
    const pipeline: PipelineStage[] = [
      { $match: range ? { seriesKey, period: range } : { seriesKey } },
      { $sort: { period: 1, revision: -1 } },
      { $group: { _id: '$period', doc: { $first: '$$ROOT' } } },
      { $sort: { _id: -1 } },
    ];
    if (query.limit !== undefined) pipeline.push({ $limit: query.limit });

    const rows = await this.run('readHistory', () =>
      ObservationModel.aggregate<{ _id: string; doc: IObservation }>(pipeline).exec()
    );

    return rows.map((r) => toObservation(r.doc)).reverse();
  }

  async readRevisions(seriesKey: string, period: string): Promise<Observation[]> {
    const docs = await this.run('readRevisions', () =>
      ObservationModel.find({ seriesKey, period }).sort({ revision: 1 }).lean<IObservation[]>().exec()
    );
    return docs.map(toObservation);
  }

  async readRevisionEvents(seriesKey: string, since: Date): Promise<RevisionEvent[]> {
    return this.run('readRevisionEvents', async () => {
      const revised = await ObservationModel.find({ seriesKey, revision: { $gt: 0 }, fetchedAt: { $gte: since } })
        .sort({ period: 1, revision: 1 })
        .lean<IObservation[]>()
        .exec();
      if (revised.length === 0) return [];

      const predecessors = await ObservationModel.find({
        seriesKey,
        $or: revised.map((r) => ({ period: r.period, revision: r.revision - 1 })),
      })
        .lean<IObservation[]>()
        .exec();

      const byKey = new Map(predecessors.map((p) => [`${p.period}#${p.revision}`, p]));
      const events: RevisionEvent[] = [];
      for (const r of revised) {
        const previous = byKey.get(`${r.period}#${r.revision - 1}`);
        if (!previous) continue;
        events.push({
          seriesKey,
          period: r.period,
          previousValue: previous.value,
          value: r.value,
          revision: r.revision,
          revisedAt: new Date(r.fetchedAt),
        });
      }
      return events;
    });
  }

  async latestPeriod(seriesKey: string): Promise<string | null> {
    const doc = await this.run('latestPeriod', () =>
      ObservationModel.findOne({ seriesKey }).sort({ period: -1 }).select({ period: 1 }).lean<IObservation>().exec()
    );
    return doc ? doc.period : null;
  }

  // ─── narratives ─────────────────────────────────────────────

  async appendArtifact(artifact: NarrativeArtifact): Promise<void> {
    try {
      await NarrativeArtifactModel.create({
        artifactId: artifact.id,
        generatedAt: artifact.generatedAt,
        coveredSeries: artifact.coveredSeries,
        coveredPeriodRange: artifact.coveredPeriodRange,
        text: artifact.text,
        sourceChangeSetRef: artifact.sourceChangeSetRef,
        aiModel: artifact.model,
        promptTokensEstimate: artifact.promptTokensEstimate,
        truncated: artifact.truncated,
      });
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new DataIntegrityError(
          artifact.coveredSeries.join(','),
          `Artifact already exists for change-set ${artifact.sourceChangeSetRef}`
        );
      }
      throw new StorageUnavailableError('appendArtifact', err);
    }
  }

  async findArtifactByChangeSet(changeSetId: string): Promise<NarrativeArtifact | null> {
    const doc = await this.run('findArtifactByChangeSet', () =>
      NarrativeArtifactModel.findOne({ sourceChangeSetRef: changeSetId }).lean<INarrativeArtifact>().exec()
    );
    return doc ? toArtifact(doc) : null;
  }

  async getArtifact(id: string): Promise<NarrativeArtifact | null> {
    const doc = await this.run('getArtifact', () =>
      NarrativeArtifactModel.findOne({ artifactId: id }).lean<INarrativeArtifact>().exec()
    );
    return doc ? toArtifact(doc) : null;
  }

  async listArtifacts(limit: number): Promise<NarrativeArtifact[]> {
    const docs = await this.run('listArtifacts', () =>
      NarrativeArtifactModel.find().sort({ generatedAt: -1 }).limit(limit).lean<INarrativeArtifact[]>().exec()
    );
    return docs.map(toArtifact);
  }

  // ─── pending syntheses ──────────────────────────────────────

  async upsertPendingSynthesis(entry: PendingSynthesis): Promise<void> {
    await this.run('upsertPendingSynthesis', () =>
      PendingSynthesisModel.updateOne(
        { changeSetId: entry.changeSetId },
        {
          $set: {
            changeSet: entry.changeSet,
            attempts: entry.attempts,
            nextAttemptAt: entry.nextAttemptAt,
            lastError: entry.lastError,
            createdAt: entry.createdAt,
          },
        },
        { upsert: true }
      ).exec()
    );
  }

  async listDuePendingSyntheses(now: Date, limit: number): Promise<PendingSynthesis[]> {
    const docs = await this.run('listDuePendingSyntheses', () =>
      PendingSynthesisModel.find({ nextAttemptAt: { $lte: now } })
        .sort({ nextAttemptAt: 1 })
        .limit(limit)
        .lean<IPendingSynthesis[]>()
        .exec()
    );
    return docs.map(toPending);
  }

  async listPendingSyntheses(): Promise<PendingSynthesis[]> {
    const docs = await this.run('listPendingSyntheses', () =>
      PendingSynthesisModel.find().sort({ createdAt: 1 }).lean<IPendingSynthesis[]>().exec()
    );
    return docs.map(toPending);
  }

  async removePendingSynthesis(changeSetId: string): Promise<void> {
    await this.run('removePendingSynthesis', () => PendingSynthesisModel.deleteOne({ changeSetId }).exec());
  }

  // ─── schedule state ─────────────────────────────────────────

  async readScheduleState(seriesKey: string): Promise<ScheduleState | null> {
    const doc = await this.run('readScheduleState', () =>
      ScheduleStateModel.findOne({ seriesKey }).lean<IScheduleState>().exec()
    );
    return doc ? toScheduleState(doc) : null;
  }

  async writeScheduleState(state: ScheduleState): Promise<void> {
    await this.run('writeScheduleState', () =>
      ScheduleStateModel.updateOne({ seriesKey: state.seriesKey }, { $set: state }, { upsert: true }).exec()
    );
  }

  async listScheduleStates(): Promise<ScheduleState[]> {
    const docs = await this.run('listScheduleStates', () =>
      ScheduleStateModel.find().lean<IScheduleState[]>().exec()
    );
    return docs.map(toScheduleState);
  }

  // ─── audit / metadata ───────────────────────────────────────

  async appendIngestRun(run: IngestRun): Promise<void> {
    await this.run('appendIngestRun', () => IngestRunModel.create(run));
  }

  async latestIngestRun(seriesKey: string): Promise<IngestRun | null> {
    const doc = await this.run('latestIngestRun', () =>
      IngestRunModel.findOne({ seriesKey }).sort({ startedAt: -1 }).lean<IIngestRun>().exec()
    );
    return doc ? toIngestRun(doc) : null;
  }

  async upsertSeriesMeta(meta: SeriesMeta): Promise<void> {
    await this.run('upsertSeriesMeta', () =>
      SeriesMetaModel.updateOne({ seriesKey: meta.seriesKey }, { $set: meta }, { upsert: true }).exec()
    );
  }

  async listSeriesMeta(): Promise<SeriesMeta[]> {
    const docs = await this.run('listSeriesMeta', () => SeriesMetaModel.find().lean<ISeriesMeta[]>().exec());
    return docs.map(toSeriesMeta);
  }
}
