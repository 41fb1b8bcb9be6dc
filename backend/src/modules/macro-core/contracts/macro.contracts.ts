/**
 * MACRO CORE CONTRACTS
 *
 * Shapes shared by the catalog, providers, reconciliation, scheduler and
 * synthesis. Storage models mirror these; nothing here touches I/O.
 */

// ═══════════════════════════════════════════════════════════════
// SERIES
// ═══════════════════════════════════════════════════════════════

export type Cadence = 'daily' | 'weekly' | 'monthly' | 'quarterly';

export const CADENCES: readonly Cadence[] = ['daily', 'weekly', 'monthly', 'quarterly'];

export type ProviderId = 'FRED' | 'BLS';

export type ValueScale = 'units' | 'thousands' | 'millions' | 'billions';

export interface SeriesDefinition {
  readonly key: string;              // stable internal key
  readonly provider: ProviderId;
  readonly providerId: string;       // id at the provider (FRED series id, BLS series id)
  readonly cadence: Cadence;
  readonly unit: string;             // "percent", "index 1982-84=100", "dollars"...
  readonly scale: ValueScale;
  readonly displayName: string;
  readonly backfillStart: string;    // first period to pull when no history exists
  readonly pollIntervalMs?: number;  // per-series override of the cadence interval
}

export interface PeriodRange {
  from: string;
  to: string;
}

// ═══════════════════════════════════════════════════════════════
// OBSERVATIONS
// ═══════════════════════════════════════════════════════════════

/** What a provider adapter hands to reconciliation. */
export interface IncomingObservation {
  seriesKey: string;
  period: string;
  value: number;
  fetchedAt: Date;
}

/** A stored row. One row per (seriesKey, period, revision); rows are never removed. */
export interface Observation extends IncomingObservation {
  revision: number;
}

export interface RevisionEvent {
  seriesKey: string;
  period: string;
  previousValue: number;
  value: number;
  revision: number;
  revisedAt: Date;
}

// ═══════════════════════════════════════════════════════════════
// CHANGE-SETS
// ═══════════════════════════════════════════════════════════════

export type ChangeKind = 'new' | 'revised' | 'unchanged';

export interface ChangeSetEntry {
  seriesKey: string;
  period: string;
  oldValue?: number;
  newValue: number;
  changeKind: ChangeKind;
  revision: number;
}

export interface SkippedRecord {
  seriesKey: string;
  period: string;
  reason: string;
}

export interface ChangeSet {
  id: string;
  createdAt: Date;
  /** Only `new` and `revised` entries; an identical refetch yields none. */
  entries: ChangeSetEntry[];
  unchangedCount: number;
  skipped: SkippedRecord[];
}

// ═══════════════════════════════════════════════════════════════
// NARRATIVES
// ═══════════════════════════════════════════════════════════════

export interface NarrativeArtifact {
  id: string;
  generatedAt: Date;
  coveredSeries: string[];
  coveredPeriodRange: PeriodRange;
  text: string;
  sourceChangeSetRef: string;
  model: string;
  promptTokensEstimate: number;
  truncated: boolean;
}

export interface PendingSynthesis {
  changeSetId: string;
  changeSet: ChangeSet;
  attempts: number;
  nextAttemptAt: Date;
  lastError?: string;
  createdAt: Date;
}

// ═══════════════════════════════════════════════════════════════
// SCHEDULING
// ═══════════════════════════════════════════════════════════════

export type SchedulePhase = 'IDLE' | 'DUE' | 'FETCHING' | 'BACKOFF_WAIT';

export interface ScheduleState {
  seriesKey: string;
  phase: SchedulePhase;
  lastAttemptAt: Date | null;
  lastSuccessAt: Date | null;
  nextDueAt: Date;
  consecutiveFailures: number;
  lastError: string | null;
}

// ═══════════════════════════════════════════════════════════════
// AUDIT
// ═══════════════════════════════════════════════════════════════

export interface IngestRun {
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

export interface SeriesMeta {
  seriesKey: string;
  title: string;
  units: string;
  frequency: string;
  seasonalAdjustment?: string;
  providerLastUpdated?: string;
  refreshedAt: Date;
}
