/**
 * ORCHESTRATOR
 *
 * The long-running loop: every `pollIntervalMs` run the due series, merge
 * the cycle's non-empty change-sets into one synthesis request, then retry
 * whatever sits in the backlog.
 *
 * Stopping is two-phase. `stop()` first ends the loop and lets in-flight
 * work finish; after `shutdownTimeoutMs` it aborts that work through its
 * AbortSignal.
 */

import { v4 as uuid } from 'uuid';
import { errorMessage } from '../../../common/errors.js';
import { sleep } from '../../../common/timeout.js';
import type { OrchestratorConfig } from '../../../config/orchestrator.config.js';
import { moduleLogger, type Logger } from '../../../core/logger.js';
import type { ChangeSet } from '../contracts/macro.contracts.js';
import type { SeriesCatalog } from '../data/series.catalog.js';
import type { ProviderRegistry } from '../ingest/provider.registry.js';
import { isEmptyChangeSet, mergeChangeSets } from '../reconcile/reconcile.service.js';
import type { SchedulerService, SeriesRunResult } from '../scheduler/scheduler.service.js';
import type { DrainReport, SubmitOutcome, SynthesisBacklog } from '../synthesis/synthesis.backlog.js';
import type { HistoryStore } from '../storage/history.store.js';
import type { IngestPipeline } from './ingest.pipeline.js';

export interface OrchestratorDeps {
  store: HistoryStore;
  catalog: SeriesCatalog;
  providers: ProviderRegistry;
  pipeline: Pick<IngestPipeline, 'run'>;
  scheduler: SchedulerService;
  backlog: SynthesisBacklog;
  config: OrchestratorConfig;
  now?: () => Date;
  newId?: () => string;
  logger?: Logger;
}

export interface CycleReport {
  startedAt: Date;
  finishedAt: Date;
  series: SeriesRunResult[];
  changeSet?: ChangeSet;
  synthesis: SubmitOutcome;
  backlog: DrainReport;
}

export interface OrchestratorStatus {
  running: boolean;
  cycles: number;
  lastCycleAt: Date | null;
  lastCycleError: string | null;
  inFlight: number;
}

export class OrchestratorService {
  private readonly now: () => Date;
  private readonly newId: () => string;
  private readonly log: Logger;

  private loopController: AbortController | null = null;
  private workController: AbortController | null = null;
  private loopPromise: Promise<void> | null = null;

  private cycles = 0;
  private lastCycleAt: Date | null = null;
  private lastCycleError: string | null = null;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? (() => uuid());
    this.log = deps.logger ?? moduleLogger('orchestrator');
  }

  // ═══════════════════════════════════════════════════════════════
  // ONE CYCLE
  // ═══════════════════════════════════════════════════════════════

  async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    const startedAt = this.now();
    const series = await this.deps.scheduler.runDue(signal);

    const changed = series
      .map((r) => r.changeSet)
      .filter((cs): cs is ChangeSet => cs !== undefined && !isEmptyChangeSet(cs));

    let changeSet: ChangeSet | undefined;
    if (changed.length === 1) {
      changeSet = changed[0];
    } else if (changed.length > 1) {
      changeSet = mergeChangeSets(changed, this.newId(), this.now());
    }

    const synthesis: SubmitOutcome = changeSet
      ? await this.deps.backlog.submit(changeSet, signal)
      : { status: 'skipped' };

    const backlog = await this.deps.backlog.drain(signal);

    const report: CycleReport = { startedAt, finishedAt: this.now(), series, changeSet, synthesis, backlog };
    this.cycles++;
    this.lastCycleAt = report.finishedAt;
    this.lastCycleError = null;

    this.log.info(
      {
        ran: series.length,
        failed: series.filter((r) => !r.ok).length,
        changes: changeSet?.entries.length ?? 0,
        synthesis: synthesis.status,
        backlogAttempted: backlog.attempted,
        backlogSynthesized: backlog.synthesized,
      },
      'cycle complete',
    );
    return report;
  }

  /** Run one series outside the schedule (backfill), then synthesize its change-set. */
  async backfill(
    seriesKey: string,
    from: string | undefined,
    signal?: AbortSignal,
  ): Promise<{ changeSet: ChangeSet; synthesis: SubmitOutcome }> {
    const outcome = await this.deps.pipeline.run(seriesKey, { from, signal });
    const synthesis = await this.deps.backlog.submit(outcome.changeSet, signal);
    return { changeSet: outcome.changeSet, synthesis };
  }

  /** Pull provider metadata for every series whose adapter can describe it. */
  async refreshMetadata(signal?: AbortSignal): Promise<number> {
    let refreshed = 0;
    for (const series of this.deps.catalog.list()) {
      if (signal?.aborted) break;
      if (!this.deps.providers.has(series.provider)) continue;
      const adapter = this.deps.providers.get(series.provider);
      if (!adapter.describe) continue;

      try {
        const meta = await adapter.describe(series, { signal, timeoutMs: this.deps.config.scheduler.fetchTimeoutMs });
        await this.deps.store.upsertSeriesMeta(meta);
        refreshed++;
      } catch (err) {
        this.log.warn({ seriesKey: series.key, err: errorMessage(err) }, 'metadata refresh failed');
      }
    }
    this.log.info({ refreshed }, 'series metadata refreshed');
    return refreshed;
  }

  // ═══════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════

  start(): void {
    if (this.loopPromise) return;

    this.loopController = new AbortController();
    this.workController = new AbortController();
    this.loopPromise = this.loop(this.loopController.signal, this.workController.signal);
    this.log.info({ series: this.deps.catalog.size }, 'orchestrator started');
  }

  async stop(): Promise<void> {
    const loop = this.loopPromise;
    if (!loop) return;

    this.loopController?.abort();
    const timeoutMs = this.deps.config.scheduler.shutdownTimeoutMs;

    let timer: NodeJS.Timeout | undefined;
    const finished = await Promise.race([
      loop.then(() => true),
      new Promise<false>((resolve) => {
        timer = setTimeout(() => resolve(false), timeoutMs);
      }),
    ]);
    clearTimeout(timer);

    if (!finished) {
      this.log.warn({ timeoutMs }, 'in-flight work did not finish in time, aborting');
      this.workController?.abort();
      await loop;
    }

    this.loopPromise = null;
    this.loopController = null;
    this.workController = null;
    this.log.info('orchestrator stopped');
  }

  status(): OrchestratorStatus {
    return {
      running: this.loopPromise !== null,
      cycles: this.cycles,
      lastCycleAt: this.lastCycleAt,
      lastCycleError: this.lastCycleError,
      inFlight: this.deps.scheduler.inFlightCount(),
    };
  }

  private async loop(stopSignal: AbortSignal, workSignal: AbortSignal): Promise<void> {
    await this.refreshMetadata(workSignal);

    while (!stopSignal.aborted) {
      try {
        await this.runCycle(workSignal);
      } catch (err) {
        // storage outages land here; the next cycle retries
        this.lastCycleError = errorMessage(err);
        this.log.error({ err: this.lastCycleError }, 'cycle failed');
      }
      await sleep(this.deps.config.scheduler.pollIntervalMs, stopSignal);
    }
  }
}
