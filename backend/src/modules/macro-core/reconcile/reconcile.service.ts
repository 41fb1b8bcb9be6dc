/**
 * RECONCILIATION ENGINE
 *
 * Merges a fetched batch into stored history and reports what moved.
 *
 * Per incoming row, against the latest stored revision of its period:
 *   - nothing stored          → `new`, revision 0
 *   - stored, value differs   → `revised`, revision + 1 (old row kept)
 *   - stored, same value      → `unchanged`, nothing written
 *
 * Bad rows are skipped and reported, never fatal for the batch. Writes for
 * one series go through SeriesLock and land in a single store call, so a
 * batch is either fully written or not at all.
 */

import { v4 as uuid } from 'uuid';
import { DataIntegrityError, NotFoundError } from '../../../common/errors.js';
import { moduleLogger, type Logger } from '../../../core/logger.js';
import type {
  ChangeSet,
  ChangeSetEntry,
  IncomingObservation,
  Observation,
  SkippedRecord,
} from '../contracts/macro.contracts.js';
import { comparePeriods, isValidPeriod } from '../data/period.js';
import type { SeriesCatalog } from '../data/series.catalog.js';
import type { HistoryStore } from '../storage/history.store.js';
import { SeriesLock } from './series.lock.js';

export interface ReconcileOptions {
  lock?: SeriesLock;
  logger?: Logger;
  now?: () => Date;
  newId?: () => string;
}

export function isEmptyChangeSet(changeSet: ChangeSet): boolean {
  return changeSet.entries.length === 0;
}

export class ReconciliationEngine {
  private readonly lock: SeriesLock;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(
    private readonly store: HistoryStore,
    private readonly catalog: SeriesCatalog,
    options: ReconcileOptions = {},
  ) {
    this.lock = options.lock ?? new SeriesLock();
    this.log = options.logger ?? moduleLogger('reconcile');
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? (() => uuid());
  }

  /**
   * Reconcile one series' batch. Throws StorageUnavailableError when the
   * store cannot be read or written; in that case nothing was written.
   */
  async reconcile(seriesKey: string, incoming: readonly IncomingObservation[]): Promise<ChangeSet> {
    const series = this.catalog.get(seriesKey);
    if (!series) throw new NotFoundError(`Unknown series: ${seriesKey}`);

    const skipped: SkippedRecord[] = [];
    const skip = (err: DataIntegrityError): void => {
      skipped.push({ seriesKey, period: err.period ?? '', reason: err.message });
      this.log.warn({ err: err.toJSON() }, 'observation skipped');
    };

    // validate, then collapse duplicate periods (last one wins)
    const byPeriod = new Map<string, IncomingObservation>();
    for (const row of incoming) {
      if (row.seriesKey !== seriesKey) {
        skip(new DataIntegrityError(seriesKey, `Row belongs to ${row.seriesKey}`, row.period));
      } else if (!isValidPeriod(series.cadence, row.period)) {
        skip(new DataIntegrityError(seriesKey, `Period is not a valid ${series.cadence} key`, row.period));
      } else if (!Number.isFinite(row.value)) {
        skip(new DataIntegrityError(seriesKey, `Value is not a finite number`, row.period));
      } else if (Number.isNaN(row.fetchedAt.getTime())) {
        skip(new DataIntegrityError(seriesKey, 'fetchedAt is not a valid date', row.period));
      } else {
        byPeriod.set(row.period, row);
      }
    }
    const batch = [...byPeriod.values()].sort((a, b) => comparePeriods(a.period, b.period));

    return this.lock.withLock(seriesKey, async () => {
      const latest = await this.store.readLatest(
        seriesKey,
        batch.map((r) => r.period),
      );

      const entries: ChangeSetEntry[] = [];
      const rows: Observation[] = [];
      let unchangedCount = 0;

      for (const row of batch) {
        const stored = latest.get(row.period);

        if (!stored) {
          rows.push({ ...row, revision: 0 });
          entries.push({ seriesKey, period: row.period, newValue: row.value, changeKind: 'new', revision: 0 });
          continue;
        }

        if (row.fetchedAt.getTime() < stored.fetchedAt.getTime()) {
          skip(
            new DataIntegrityError(
              seriesKey,
              `Fetched at ${row.fetchedAt.toISOString()}, before stored revision ${stored.revision} (${stored.fetchedAt.toISOString()})`,
              row.period,
            ),
          );
          continue;
        }

        if (stored.value === row.value) {
          unchangedCount++;
          continue;
        }

        const revision = stored.revision + 1;
        rows.push({ ...row, revision });
        entries.push({
          seriesKey,
          period: row.period,
          oldValue: stored.value,
          newValue: row.value,
          changeKind: 'revised',
          revision,
        });
      }

      if (rows.length > 0) {
        await this.store.appendObservations(seriesKey, rows);
      }

      const changeSet: ChangeSet = {
        id: this.newId(),
        createdAt: this.now(),
        entries,
        unchangedCount,
        skipped,
      };

      this.log.info(
        {
          seriesKey,
          changeSetId: changeSet.id,
          new: entries.filter((e) => e.changeKind === 'new').length,
          revised: entries.filter((e) => e.changeKind === 'revised').length,
          unchanged: unchangedCount,
          skipped: skipped.length,
        },
        'reconciled',
      );

      return changeSet;
    });
  }
}

/** Concatenate change-sets from one cycle into a single synthesis unit. */
export function mergeChangeSets(changeSets: readonly ChangeSet[], id: string, createdAt: Date): ChangeSet {
  const entries = changeSets
    .flatMap((cs) => cs.entries)
    .sort((a, b) => a.seriesKey.localeCompare(b.seriesKey) || comparePeriods(a.period, b.period));

  return {
    id,
    createdAt,
    entries,
    unchangedCount: changeSets.reduce((sum, cs) => sum + cs.unchangedCount, 0),
    skipped: changeSets.flatMap((cs) => cs.skipped),
  };
}
