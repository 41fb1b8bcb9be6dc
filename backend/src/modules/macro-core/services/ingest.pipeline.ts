/**
 * INGEST PIPELINE: fetch → reconcile → sync log, for one series.
 */

import { v4 as uuid } from 'uuid';
import { NotFoundError, ProviderError, ValidationError, errorMessage } from '../../../common/errors.js';
import { TimeoutError, withTimeout } from '../../../common/timeout.js';
import type { SchedulerConfig } from '../../../config/orchestrator.config.js';
import { moduleLogger, type Logger } from '../../../core/logger.js';
import type { ChangeSet, IngestRun, PeriodRange, SeriesDefinition } from '../contracts/macro.contracts.js';
import { currentPeriod, isValidPeriod, maxPeriod, shiftPeriod } from '../data/period.js';
import type { SeriesCatalog } from '../data/series.catalog.js';
import type { ProviderRegistry } from '../ingest/provider.registry.js';
import type { FetchResult } from '../ingest/provider.types.js';
import { isEmptyChangeSet, type ReconciliationEngine } from '../reconcile/reconcile.service.js';
import type { HistoryStore } from '../storage/history.store.js';

export interface IngestPipelineDeps {
  store: HistoryStore;
  catalog: SeriesCatalog;
  providers: ProviderRegistry;
  reconciler: ReconciliationEngine;
  config: Pick<SchedulerConfig, 'fetchTimeoutMs' | 'revisionLookbackPeriods'>;
  now?: () => Date;
  logger?: Logger;
}

export interface IngestOptions {
  signal?: AbortSignal;
  /** Fetch from this period instead of the incremental window. */
  from?: string;
}

export interface IngestOutcome {
  changeSet: ChangeSet;
  fetch: FetchResult;
  run: IngestRun;
}

export class IngestPipeline {
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private readonly deps: IngestPipelineDeps) {
    this.now = deps.now ?? (() => new Date());
    this.log = deps.logger ?? moduleLogger('ingest');
  }

  /**
   * Periods to request: from a few periods behind the newest stored one (so
   * recent revisions are picked up) to the current period. A series with no
   * history starts at its backfill start.
   */
  async fetchWindow(series: SeriesDefinition, now: Date): Promise<PeriodRange> {
    const to = currentPeriod(series.cadence, now);
    const latest = await this.deps.store.latestPeriod(series.key);
    if (!latest) {
      return { from: series.backfillStart, to: maxPeriod(to, series.backfillStart) };
    }

    const lookback = this.deps.config.revisionLookbackPeriods[series.cadence];
    const from = maxPeriod(shiftPeriod(series.cadence, latest, -lookback), series.backfillStart);
    return { from, to: maxPeriod(to, latest) };
  }

  async run(seriesKey: string, options: IngestOptions = {}): Promise<IngestOutcome> {
    const series = this.deps.catalog.get(seriesKey);
    if (!series) throw new NotFoundError(`Unknown series: ${seriesKey}`);
    if (options.from !== undefined && !isValidPeriod(series.cadence, options.from)) {
      throw new ValidationError(`"${options.from}" is not a ${series.cadence} period`, { seriesKey });
    }

    const startedAt = this.now();
    const runId = uuid();
    let fetched: FetchResult | undefined;

    try {
      const window = await this.fetchWindow(series, startedAt);
      const range = options.from ? { from: options.from, to: window.to } : window;
      const adapter = this.deps.providers.get(series.provider);
      const timeoutMs = this.deps.config.fetchTimeoutMs;

      this.log.debug({ seriesKey, provider: series.provider, ...range }, 'fetching');

      const result = await withTimeout(
        `${series.provider} fetch ${seriesKey}`,
        timeoutMs,
        (signal) => adapter.fetch(series, range, { signal, timeoutMs }),
        options.signal,
      ).catch((err: unknown) => {
        if (err instanceof TimeoutError) {
          throw new ProviderError(series.provider, 'UNAVAILABLE', err.message, { cause: err });
        }
        throw err;
      });
      fetched = result;

      const changeSet = await this.deps.reconciler.reconcile(seriesKey, result.observations);

      const run: IngestRun = {
        runId,
        seriesKey,
        provider: series.provider,
        startedAt,
        finishedAt: this.now(),
        ok: true,
        newCount: changeSet.entries.filter((e) => e.changeKind === 'new').length,
        revisedCount: changeSet.entries.filter((e) => e.changeKind === 'revised').length,
        unchangedCount: changeSet.unchangedCount,
        skippedCount: changeSet.skipped.length + result.rejected.length,
        partial: result.partial,
        apiCalls: result.apiCalls,
        changeSetId: isEmptyChangeSet(changeSet) ? undefined : changeSet.id,
      };
      // audit only; never fails the run
      await this.recordRun(run);

      return { changeSet, fetch: result, run };
    } catch (err) {
      await this.recordRun({
        runId,
        seriesKey,
        provider: series.provider,
        startedAt,
        finishedAt: this.now(),
        ok: false,
        newCount: 0,
        revisedCount: 0,
        unchangedCount: 0,
        skippedCount: 0,
        partial: fetched?.partial ?? false,
        apiCalls: fetched?.apiCalls ?? 0,
        error: errorMessage(err),
      });
      throw err;
    }
  }

  private async recordRun(run: IngestRun): Promise<void> {
    try {
      await this.deps.store.appendIngestRun(run);
    } catch (logErr) {
      this.log.warn({ seriesKey: run.seriesKey, runId: run.runId, err: errorMessage(logErr) }, 'could not record ingest run');
    }
  }
}
