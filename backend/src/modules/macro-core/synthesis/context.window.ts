/**
 * CONTEXT WINDOWS
 *
 * For each series in a change-set: the trailing N periods ending at its
 * newest changed period, plus older periods whose value was revised while
 * that window was current (so the narrative can say a figure was revised).
 */

import type { SynthesisConfig } from '../../../config/orchestrator.config.js';
import type {
  ChangeSet,
  ChangeSetEntry,
  RevisionEvent,
  SeriesDefinition,
} from '../contracts/macro.contracts.js';
import { comparePeriods, maxPeriod, periodStartUtc, shiftPeriod } from '../data/period.js';
import type { SeriesCatalog } from '../data/series.catalog.js';
import type { HistoryStore } from '../storage/history.store.js';

export interface WindowPoint {
  period: string;
  value: number;
  revision: number;
  /** Value before the most recent revision made inside the lookback span. */
  previousValue?: number;
}

export interface RevisedPoint {
  period: string;
  value: number;
  previousValue: number;
  revision: number;
  revisedAt: Date;
}

export interface SeriesContextWindow {
  series: SeriesDefinition;
  /** Changes inside the window, ascending; these are listed one by one. */
  entries: ChangeSetEntry[];
  /** Changes before the window (a backfill), ascending; rendered as a summary line. */
  olderEntries: ChangeSetEntry[];
  /** Ascending by period. */
  points: WindowPoint[];
  /** Periods before the window, ascending. */
  earlierRevisions: RevisedPoint[];
}

function latestEventPerPeriod(events: readonly RevisionEvent[]): Map<string, RevisionEvent> {
  const byPeriod = new Map<string, RevisionEvent>();
  for (const event of events) {
    const seen = byPeriod.get(event.period);
    if (!seen || event.revision > seen.revision) byPeriod.set(event.period, event);
  }
  return byPeriod;
}

export async function selectContextWindows(
  changeSet: ChangeSet,
  store: HistoryStore,
  catalog: SeriesCatalog,
  windowPeriods: SynthesisConfig['windowPeriods'],
): Promise<SeriesContextWindow[]> {
  const bySeries = new Map<string, ChangeSetEntry[]>();
  for (const entry of changeSet.entries) {
    const list = bySeries.get(entry.seriesKey) ?? [];
    list.push(entry);
    bySeries.set(entry.seriesKey, list);
  }

  const windows: SeriesContextWindow[] = [];
  for (const seriesKey of [...bySeries.keys()].sort()) {
    const series = catalog.get(seriesKey);
    const entries = bySeries.get(seriesKey) ?? [];
    // series dropped from the catalog since the change-set was made
    if (!series || entries.length === 0) continue;

    const newest = entries.map((e) => e.period).reduce(maxPeriod);
    const from = shiftPeriod(series.cadence, newest, -(windowPeriods[series.cadence] - 1));

    const history = await store.readHistory(seriesKey, { from, to: newest });
    const events = latestEventPerPeriod(await store.readRevisionEvents(seriesKey, periodStartUtc(series.cadence, from)));

    const points: WindowPoint[] = history.map((obs) => {
      const event = events.get(obs.period);
      return event
        ? { period: obs.period, value: obs.value, revision: obs.revision, previousValue: event.previousValue }
        : { period: obs.period, value: obs.value, revision: obs.revision };
    });

    const earlierRevisions: RevisedPoint[] = [...events.values()]
      .filter((e) => comparePeriods(e.period, from) < 0)
      .sort((a, b) => comparePeriods(a.period, b.period))
      .map((e) => ({
        period: e.period,
        value: e.value,
        previousValue: e.previousValue,
        revision: e.revision,
        revisedAt: e.revisedAt,
      }));

    const sorted = [...entries].sort((a, b) => comparePeriods(a.period, b.period));
    windows.push({
      series,
      entries: sorted.filter((e) => comparePeriods(e.period, from) >= 0),
      olderEntries: sorted.filter((e) => comparePeriods(e.period, from) < 0),
      points,
      earlierRevisions,
    });
  }
  return windows;
}

/**
 * Shrink windows for a retry after ContextTooLarge: earlier revisions go
 * first, then each window keeps only its most recent half. Changes that
 * fall out of the shortened window join the summarized older changes.
 */
export function truncateWindows(windows: readonly SeriesContextWindow[]): SeriesContextWindow[] {
  return windows.map((w) => {
    const points = w.points.slice(w.points.length - Math.ceil(w.points.length / 2));
    const keepFrom = points.length > 0 ? points[0].period : undefined;
    const cut =
      keepFrom === undefined
        ? w.entries.length - Math.ceil(w.entries.length / 2)
        : w.entries.filter((e) => comparePeriods(e.period, keepFrom) < 0).length;
    return {
      ...w,
      entries: w.entries.slice(cut),
      olderEntries: [...w.olderEntries, ...w.entries.slice(0, cut)],
      points,
      earlierRevisions: [],
    };
  });
}
