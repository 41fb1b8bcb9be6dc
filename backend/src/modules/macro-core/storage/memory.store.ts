/**
 * In-memory HistoryStore.
 *
 * Used by the test suite and by STORE_DRIVER=memory for local runs without
 * MongoDB. Values are copied on the way in and out so callers cannot mutate
 * stored rows.
 */

import { DataIntegrityError } from '../../../common/errors.js';
import type {
  IngestRun,
  NarrativeArtifact,
  Observation,
  PendingSynthesis,
  RevisionEvent,
  ScheduleState,
  SeriesMeta,
} from '../contracts/macro.contracts.js';
import { comparePeriods, isWithinRange } from '../data/period.js';
import type { HistoryQuery, HistoryStore } from './history.store.js';

function cloneObservation(o: Observation): Observation {
  return { ...o, fetchedAt: new Date(o.fetchedAt) };
}

function cloneArtifact(a: NarrativeArtifact): NarrativeArtifact {
  return {
    ...a,
    generatedAt: new Date(a.generatedAt),
    coveredSeries: [...a.coveredSeries],
    coveredPeriodRange: { ...a.coveredPeriodRange },
  };
}

function clonePending(p: PendingSynthesis): PendingSynthesis {
  return structuredClone(p);
}

export class MemoryHistoryStore implements HistoryStore {
  /** seriesKey → period → revisions ascending */
  private observations = new Map<string, Map<string, Observation[]>>();
  private artifacts: NarrativeArtifact[] = [];
  private pending = new Map<string, PendingSynthesis>();
  private schedule = new Map<string, ScheduleState>();
  private runs: IngestRun[] = [];
  private meta = new Map<string, SeriesMeta>();

  // ═══════════════════════════════════════════════════════════════
  // OBSERVATIONS
  // ═══════════════════════════════════════════════════════════════

  async appendObservations(seriesKey: string, rows: readonly Observation[]): Promise<void> {
    const current = this.observations.get(seriesKey) ?? new Map<string, Observation[]>();
    // work on a copy; swap in only if every row is accepted
    const next = new Map<string, Observation[]>();
    for (const [period, revisions] of current) next.set(period, [...revisions]);

    for (const row of rows) {
      if (row.seriesKey !== seriesKey) {
        throw new DataIntegrityError(seriesKey, `Row for ${row.seriesKey} in batch for ${seriesKey}`, row.period);
      }
      const revisions = next.get(row.period) ?? [];
      if (revisions.some((r) => r.revision === row.revision)) {
        throw new DataIntegrityError(seriesKey, `Duplicate revision ${row.revision}`, row.period);
      }
      revisions.push(cloneObservation(row));
      revisions.sort((a, b) => a.revision - b.revision);
      next.set(row.period, revisions);
    }

    this.observations.set(seriesKey, next);
  }

  async readLatest(seriesKey: string, periods: readonly string[]): Promise<Map<string, Observation>> {
    const series = this.observations.get(seriesKey);
    const result = new Map<string, Observation>();
    if (!series) return result;

    for (const period of periods) {
      const revisions = series.get(period);
      const latest = revisions?.[revisions.length - 1];
      if (latest) result.set(period, cloneObservation(latest));
    }
    return result;
  }

  async readHistory(seriesKey: string, query: HistoryQuery = {}): Promise<Observation[]> {
    const series = this.observations.get(seriesKey);
    if (!series) return [];

    const rows: Observation[] = [];
    for (const [period, revisions] of series) {
      const latest = revisions[revisions.length - 1];
      if (latest && isWithinRange(period, query)) rows.push(cloneObservation(latest));
    }
    rows.sort((a, b) => comparePeriods(a.period, b.period));

    return query.limit !== undefined ? rows.slice(Math.max(0, rows.length - query.limit)) : rows;
  }

  async readRevisions(seriesKey: string, period: string): Promise<Observation[]> {
    return (this.observations.get(seriesKey)?.get(period) ?? []).map(cloneObservation);
  }

  async readRevisionEvents(seriesKey: string, since: Date): Promise<RevisionEvent[]> {
    const series = this.observations.get(seriesKey);
    if (!series) return [];

    const events: RevisionEvent[] = [];
    for (const [period, revisions] of series) {
      for (let i = 1; i < revisions.length; i++) {
        const current = revisions[i];
        const previous = revisions[i - 1];
        if (current.fetchedAt.getTime() < since.getTime()) continue;
        events.push({
          seriesKey,
          period,
          previousValue: previous.value,
          value: current.value,
          revision: current.revision,
          revisedAt: new Date(current.fetchedAt),
        });
      }
    }
    return events.sort((a, b) => comparePeriods(a.period, b.period) || a.revision - b.revision);
  }

  async latestPeriod(seriesKey: string): Promise<string | null> {
    const series = this.observations.get(seriesKey);
    if (!series || series.size === 0) return null;
    return [...series.keys()].sort(comparePeriods)[series.size - 1];
  }

  // ═══════════════════════════════════════════════════════════════
  // NARRATIVES
  // ═══════════════════════════════════════════════════════════════

  async appendArtifact(artifact: NarrativeArtifact): Promise<void> {
    if (this.artifacts.some((a) => a.id === artifact.id || a.sourceChangeSetRef === artifact.sourceChangeSetRef)) {
      throw new DataIntegrityError(
        artifact.coveredSeries.join(','),
        `Artifact already exists for change-set ${artifact.sourceChangeSetRef}`,
      );
    }
    this.artifacts.push(cloneArtifact(artifact));
  }

  async findArtifactByChangeSet(changeSetId: string): Promise<NarrativeArtifact | null> {
    const found = this.artifacts.find((a) => a.sourceChangeSetRef === changeSetId);
    return found ? cloneArtifact(found) : null;
  }

  async getArtifact(id: string): Promise<NarrativeArtifact | null> {
    const found = this.artifacts.find((a) => a.id === id);
    return found ? cloneArtifact(found) : null;
  }

  async listArtifacts(limit: number): Promise<NarrativeArtifact[]> {
    return [...this.artifacts]
      .sort((a, b) => b.generatedAt.getTime() - a.generatedAt.getTime())
      .slice(0, limit)
      .map(cloneArtifact);
  }

  // ═══════════════════════════════════════════════════════════════
  // PENDING SYNTHESES
  // ═══════════════════════════════════════════════════════════════

  async upsertPendingSynthesis(entry: PendingSynthesis): Promise<void> {
    this.pending.set(entry.changeSetId, clonePending(entry));
  }

  async listDuePendingSyntheses(now: Date, limit: number): Promise<PendingSynthesis[]> {
    return [...this.pending.values()]
      .filter((p) => p.nextAttemptAt.getTime() <= now.getTime())
      .sort((a, b) => a.nextAttemptAt.getTime() - b.nextAttemptAt.getTime())
      .slice(0, limit)
      .map(clonePending);
  }

  async listPendingSyntheses(): Promise<PendingSynthesis[]> {
    return [...this.pending.values()]
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map(clonePending);
  }

  async removePendingSynthesis(changeSetId: string): Promise<void> {
    this.pending.delete(changeSetId);
  }

  // ═══════════════════════════════════════════════════════════════
  // SCHEDULE STATE
  // ═══════════════════════════════════════════════════════════════

  async readScheduleState(seriesKey: string): Promise<ScheduleState | null> {
    const state = this.schedule.get(seriesKey);
    return state ? structuredClone(state) : null;
  }

  async writeScheduleState(state: ScheduleState): Promise<void> {
    this.schedule.set(state.seriesKey, structuredClone(state));
  }

  async listScheduleStates(): Promise<ScheduleState[]> {
    return [...this.schedule.values()].map((s) => structuredClone(s));
  }

  // ═══════════════════════════════════════════════════════════════
  // AUDIT / METADATA
  // ═══════════════════════════════════════════════════════════════

  async appendIngestRun(run: IngestRun): Promise<void> {
    this.runs.push(structuredClone(run));
  }

  async latestIngestRun(seriesKey: string): Promise<IngestRun | null> {
    for (let i = this.runs.length - 1; i >= 0; i--) {
      if (this.runs[i].seriesKey === seriesKey) return structuredClone(this.runs[i]);
    }
    return null;
  }

  async upsertSeriesMeta(meta: SeriesMeta): Promise<void> {
    this.meta.set(meta.seriesKey, structuredClone(meta));
  }

  async listSeriesMeta(): Promise<SeriesMeta[]> {
    return [...this.meta.values()].map((m) => structuredClone(m));
  }
}
