/**
 * SCHEDULER SERVICE
 *
 * Holds the per-series ScheduleState, picks due series and runs their
 * pipelines on a bounded worker pool. State changes go through
 * schedule.machine; the persisted copy lets a restart resume backoff.
 */

import Bottleneck from 'bottleneck';
import { errorMessage } from '../../../common/errors.js';
import type { SchedulerConfig } from '../../../config/orchestrator.config.js';
import type { AlertSink } from '../../../core/alerts/alert.sink.js';
import { moduleLogger, type Logger } from '../../../core/logger.js';
import type { ChangeSet, ScheduleState, SeriesDefinition } from '../contracts/macro.contracts.js';
import type { SeriesCatalog } from '../data/series.catalog.js';
import type { IngestOutcome, IngestPipeline } from '../services/ingest.pipeline.js';
import type { HistoryStore } from '../storage/history.store.js';
import {
  beginFetch,
  initialState,
  markDue,
  recordFailure,
  recordSuccess,
  resumeState,
  type RandomSource,
  type ScheduleTiming,
} from './schedule.machine.js';

/** The piece of IngestPipeline the scheduler drives. */
export type SeriesRunner = Pick<IngestPipeline, 'run'>;

export interface SchedulerDeps {
  store: HistoryStore;
  catalog: SeriesCatalog;
  pipeline: SeriesRunner;
  alerts: AlertSink;
  config: SchedulerConfig;
  now?: () => Date;
  random?: RandomSource;
  logger?: Logger;
}

export interface SeriesRunResult {
  seriesKey: string;
  ok: boolean;
  changeSet?: ChangeSet;
  error?: string;
}

export class SchedulerService {
  private readonly states = new Map<string, ScheduleState>();
  private readonly inFlight = new Set<string>();
  private readonly pool: Bottleneck;
  private readonly now: () => Date;
  private readonly random: RandomSource;
  private readonly log: Logger;
  private loaded = false;

  constructor(private readonly deps: SchedulerDeps) {
    this.pool = new Bottleneck({ maxConcurrent: deps.config.workerConcurrency });
    this.now = deps.now ?? (() => new Date());
    this.random = deps.random ?? Math.random;
    this.log = deps.logger ?? moduleLogger('scheduler');
  }

  timingFor(series: SeriesDefinition): ScheduleTiming {
    const c = this.deps.config;
    return {
      pollIntervalMs: series.pollIntervalMs ?? c.pollIntervalByCadenceMs[series.cadence],
      jitterMinMs: c.jitterMinMs,
      jitterMaxMs: c.jitterMaxMs,
      backoffBaseMs: c.backoffBaseMs,
      backoffMaxMs: c.backoffMaxMs,
      alertThreshold: c.alertThreshold,
    };
  }

  /**
   * Load persisted state for every catalog series; series never seen before
   * start out due.
   */
  async load(): Promise<void> {
    const now = this.now();
    const persisted = new Map((await this.deps.store.listScheduleStates()).map((s) => [s.seriesKey, s]));

    for (const key of this.deps.catalog.keys()) {
      const saved = persisted.get(key);
      const state = saved ? resumeState(saved, now) : initialState(key, now);
      this.states.set(key, state);
      if (state !== saved) await this.persist(state);
    }
    this.loaded = true;
    this.log.info({ series: this.states.size, restored: persisted.size }, 'schedule loaded');
  }

  /** Keys due at `now`, longest-waiting first. */
  dueSeries(now: Date = this.now()): string[] {
    const due: ScheduleState[] = [];
    for (const [key, state] of this.states) {
      if (this.inFlight.has(key)) continue;
      const next = markDue(state, now);
      if (next !== state) this.states.set(key, next);
      if (next.phase === 'DUE') due.push(next);
    }
    return due
      .sort((a, b) => a.nextDueAt.getTime() - b.nextDueAt.getTime() || a.seriesKey.localeCompare(b.seriesKey))
      .map((s) => s.seriesKey);
  }

  /** Run every due series through the pool; resolves when all have finished. */
  async runDue(signal?: AbortSignal): Promise<SeriesRunResult[]> {
    if (!this.loaded) await this.load();

    const keys = this.dueSeries();
    if (keys.length === 0) return [];

    this.log.debug({ due: keys }, 'dispatching due series');
    const results = await Promise.all(keys.map((key) => this.pool.schedule(() => this.runSeries(key, signal))));
    return results.filter((r): r is SeriesRunResult => r !== null);
  }

  /**
   * One fetch attempt for one series. Returns null when the series is
   * already in flight or the run was cancelled before it began.
   */
  async runSeries(seriesKey: string, signal?: AbortSignal): Promise<SeriesRunResult | null> {
    const series = this.deps.catalog.get(seriesKey);
    const current = this.states.get(seriesKey);
    if (!series || !current || current.phase !== 'DUE') return null;
    if (this.inFlight.has(seriesKey) || signal?.aborted) return null;

    this.inFlight.add(seriesKey);
    const timing = this.timingFor(series);
    let state = beginFetch(current, this.now());
    this.states.set(seriesKey, state);

    try {
      await this.persist(state);

      let outcome: IngestOutcome;
      try {
        outcome = await this.deps.pipeline.run(seriesKey, { signal });
      } catch (err) {
        if (signal?.aborted) {
          // shutting down: not the provider's fault, retry on next start
          state = resumeState(state, this.now());
          this.states.set(seriesKey, state);
          await this.persist(state);
          return { seriesKey, ok: false, error: 'cancelled' };
        }

        const message = errorMessage(err);
        const failure = recordFailure(state, this.now(), message, timing);
        state = failure.state;
        this.states.set(seriesKey, state);
        await this.persist(state);

        this.log.warn(
          { seriesKey, failures: state.consecutiveFailures, retryInMs: failure.delayMs, err: message },
          'fetch failed',
        );
        if (failure.alert) {
          await this.deps.alerts.send({
            kind: 'SERIES_FAILING',
            severity: state.consecutiveFailures >= timing.alertThreshold * 2 ? 'critical' : 'warning',
            seriesKey,
            message: `${seriesKey} failed ${state.consecutiveFailures} times in a row: ${message}`,
            context: { consecutiveFailures: state.consecutiveFailures, nextDueAt: state.nextDueAt.toISOString() },
            at: this.now(),
          });
        }
        return { seriesKey, ok: false, error: message };
      }

      state = recordSuccess(state, this.now(), timing, this.random);
      this.states.set(seriesKey, state);
      await this.persist(state);
      return { seriesKey, ok: true, changeSet: outcome.changeSet };
    } finally {
      this.inFlight.delete(seriesKey);
    }
  }

  getState(seriesKey: string): ScheduleState | undefined {
    return this.states.get(seriesKey);
  }

  inFlightCount(): number {
    return this.inFlight.size;
  }

  // in-memory state stays authoritative when the store is down
  private async persist(state: ScheduleState): Promise<void> {
    try {
      await this.deps.store.writeScheduleState(state);
    } catch (err) {
      this.log.warn({ seriesKey: state.seriesKey, err: errorMessage(err) }, 'could not persist schedule state');
    }
  }
}
