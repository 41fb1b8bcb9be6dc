/**
 * HISTORY STORE: contract
 *
 * The only shared mutable resource. Observations are append/supersede only,
 * artifacts are append only. Implementations must make
 * `appendObservations` all-or-nothing for one call.
 */

import type {
  IngestRun,
  NarrativeArtifact,
  Observation,
  PendingSynthesis,
  RevisionEvent,
  ScheduleState,
  SeriesMeta,
} from '../contracts/macro.contracts.js';

export interface HistoryQuery {
  from?: string;
  to?: string;
  /** Keep only the most recent `limit` periods of the range. */
  limit?: number;
}

export interface HistoryStore {
  // ─── observations ───────────────────────────────────────────
  /** Atomically insert new revision rows for one series. */
  appendObservations(seriesKey: string, rows: readonly Observation[]): Promise<void>;
  /** Latest revision per period, for the given periods only. */
  readLatest(seriesKey: string, periods: readonly string[]): Promise<Map<string, Observation>>;
  /** Latest revision per period, ascending by period. */
  readHistory(seriesKey: string, query?: HistoryQuery): Promise<Observation[]>;
  /** Every stored revision of one period, ascending by revision. */
  readRevisions(seriesKey: string, period: string): Promise<Observation[]>;
  /** Revisions (revision > 0) written at or after `since`. */
  readRevisionEvents(seriesKey: string, since: Date): Promise<RevisionEvent[]>;
  latestPeriod(seriesKey: string): Promise<string | null>;

  // ─── narratives ─────────────────────────────────────────────
  appendArtifact(artifact: NarrativeArtifact): Promise<void>;
  findArtifactByChangeSet(changeSetId: string): Promise<NarrativeArtifact | null>;
  getArtifact(id: string): Promise<NarrativeArtifact | null>;
  listArtifacts(limit: number): Promise<NarrativeArtifact[]>;

  // ─── pending syntheses ──────────────────────────────────────
  upsertPendingSynthesis(entry: PendingSynthesis): Promise<void>;
  listDuePendingSyntheses(now: Date, limit: number): Promise<PendingSynthesis[]>;
  listPendingSyntheses(): Promise<PendingSynthesis[]>;
  removePendingSynthesis(changeSetId: string): Promise<void>;

  // ─── schedule state ─────────────────────────────────────────
  readScheduleState(seriesKey: string): Promise<ScheduleState | null>;
  writeScheduleState(state: ScheduleState): Promise<void>;
  listScheduleStates(): Promise<ScheduleState[]>;

  // ─── audit / metadata ───────────────────────────────────────
  appendIngestRun(run: IngestRun): Promise<void>;
  latestIngestRun(seriesKey: string): Promise<IngestRun | null>;
  upsertSeriesMeta(meta: SeriesMeta): Promise<void>;
  listSeriesMeta(): Promise<SeriesMeta[]>;
}
