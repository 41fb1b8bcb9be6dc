import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ProviderError } from '../../../common/errors.js';
import { silentLogger } from '../../../core/logger.js';
import type { ChangeSet, ScheduleState } from '../contracts/macro.contracts.js';
import type { SeriesCatalog } from '../data/series.catalog.js';
import { SchedulerService, type SeriesRunner } from '../scheduler/scheduler.service.js';
import type { IngestOptions, IngestOutcome } from '../services/ingest.pipeline.js';
import { MemoryHistoryStore } from '../storage/memory.store.js';
import { RecordingAlertSink, TestClock, testCatalog, testConfig } from './fixtures.js';

const HOUR = 60 * 60 * 1000;

function outcomeFor(seriesKey: string, at: Date): IngestOutcome {
  const changeSet: ChangeSet = {
    id: `cs-${seriesKey}`,
    createdAt: at,
    entries: [{ seriesKey, period: '2024-01', newValue: 1, changeKind: 'new', revision: 0 }],
    unchangedCount: 0,
    skipped: [],
  };
  return {
    changeSet,
    fetch: { seriesKey, observations: [], partial: false, rejected: [], apiCalls: 1 },
    run: {
      runId: `run-${seriesKey}`,
      seriesKey,
      provider: 'FRED',
      startedAt: at,
      finishedAt: at,
      ok: true,
      newCount: 1,
      revisedCount: 0,
      unchangedCount: 0,
      skippedCount: 0,
      partial: false,
      apiCalls: 1,
      changeSetId: changeSet.id,
    },
  };
}

/** Pipeline whose behaviour per series is set by the test; default is success. */
class FakePipeline implements SeriesRunner {
  readonly calls: string[] = [];
  failing = new Map<string, Error>();
  active = 0;
  maxActive = 0;
  delayMs = 0;

  constructor(private readonly clock: TestClock) {}

  async run(seriesKey: string, options: IngestOptions = {}): Promise<IngestOutcome> {
    this.calls.push(seriesKey);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.delayMs > 0) await new Promise((r) => setTimeout(r, this.delayMs));
      if (options.signal?.aborted) throw new Error('aborted');
      const failure = this.failing.get(seriesKey);
      if (failure) throw failure;
      return outcomeFor(seriesKey, this.clock.now());
    } finally {
      this.active--;
    }
  }
}

describe('SchedulerService', () => {
  let store: MemoryHistoryStore;
  let clock: TestClock;
  let pipeline: FakePipeline;
  let alerts: RecordingAlertSink;

  function scheduler(catalog: SeriesCatalog = testCatalog(), overrides: Record<string, unknown> = {}): SchedulerService {
    return new SchedulerService({
      store,
      catalog,
      pipeline,
      alerts,
      config: testConfig({ scheduler: overrides }).scheduler,
      now: clock.now,
      random: () => 0,
      logger: silentLogger(),
    });
  }

  beforeEach(() => {
    store = new MemoryHistoryStore();
    clock = new TestClock('2024-02-15T12:00:00.000Z');
    pipeline = new FakePipeline(clock);
    alerts = new RecordingAlertSink();
  });

  it('should start every catalog series due and persist that state', async () => {
    const s = scheduler();
    await s.load();

    expect(s.dueSeries()).toEqual(['BLS_CPI_U_SA', 'CPIAUCSL', 'GDP']);
    expect((await store.listScheduleStates()).map((st) => st.phase)).toEqual(['DUE', 'DUE', 'DUE']);
  });

  it('should poll each series again after its cadence interval', async () => {
    const s = scheduler();
    const results = await s.runDue();

    expect(results.map((r) => [r.seriesKey, r.ok])).toEqual([
      ['BLS_CPI_U_SA', true],
      ['CPIAUCSL', true],
      ['GDP', true],
    ]);
    expect(results[1].changeSet?.id).toBe('cs-CPIAUCSL');
    expect(s.getState('GDP')).toMatchObject({
      phase: 'IDLE',
      nextDueAt: new Date(clock.now().getTime() + 72 * HOUR),
    });

    expect(await s.runDue()).toEqual([]);

    clock.advance(24 * HOUR);
    expect((await s.runDue()).map((r) => r.seriesKey)).toEqual(['BLS_CPI_U_SA', 'CPIAUCSL']);
  });

  it('should isolate a failing series and back it off', async () => {
    pipeline.failing.set('GDP', new ProviderError('FRED', 'UNAVAILABLE', 'FRED unavailable (HTTP 503): no detail'));
    const s = scheduler();
    const results = await s.runDue();

    expect(results.find((r) => r.seriesKey === 'GDP')).toEqual({
      seriesKey: 'GDP',
      ok: false,
      error: 'FRED unavailable (HTTP 503): no detail',
    });
    expect(results.filter((r) => r.ok)).toHaveLength(2);
    expect(s.getState('GDP')).toMatchObject({
      phase: 'BACKOFF_WAIT',
      consecutiveFailures: 1,
      nextDueAt: new Date(clock.now().getTime() + 1000),
    });
    expect(await store.readScheduleState('GDP')).toMatchObject({ phase: 'BACKOFF_WAIT', consecutiveFailures: 1 });

    clock.advance(1000);
    expect(s.dueSeries()).toEqual(['GDP']);
  });

  it('should alert once failures reach the threshold and reset on success', async () => {
    pipeline.failing.set('GDP', new ProviderError('FRED', 'UNAVAILABLE', 'down'));
    const s = scheduler(testCatalog(['GDP']));

    await s.runDue();
    clock.advance(1000);
    await s.runDue();
    expect(alerts.alerts).toHaveLength(0);

    clock.advance(2000);
    await s.runDue();
    expect(alerts.alerts).toEqual([
      {
        kind: 'SERIES_FAILING',
        severity: 'warning',
        seriesKey: 'GDP',
        message: 'GDP failed 3 times in a row: down',
        context: { consecutiveFailures: 3, nextDueAt: '2024-02-15T12:00:07.000Z' },
        at: new Date('2024-02-15T12:00:03.000Z'),
      },
    ]);

    pipeline.failing.clear();
    clock.advance(4000);
    await s.runDue();
    expect(s.getState('GDP')).toMatchObject({ phase: 'IDLE', consecutiveFailures: 0, lastError: null });
  });

  it('should escalate to critical at twice the threshold', async () => {
    pipeline.failing.set('GDP', new ProviderError('FRED', 'UNAVAILABLE', 'down'));
    const s = scheduler(testCatalog(['GDP']));

    for (let i = 0; i < 6; i++) {
      await s.runDue();
      clock.advance(8000);
    }
    expect(alerts.alerts.map((a) => a.severity)).toEqual(['warning', 'warning', 'warning', 'critical']);
  });

  it('should resume a fetch interrupted by a restart', async () => {
    const interrupted: ScheduleState = {
      seriesKey: 'GDP',
      phase: 'FETCHING',
      lastAttemptAt: new Date('2024-02-15T11:00:00.000Z'),
      lastSuccessAt: null,
      nextDueAt: new Date('2024-02-15T11:00:00.000Z'),
      consecutiveFailures: 2,
      lastError: 'down',
    };
    const future: ScheduleState = {
      ...interrupted,
      seriesKey: 'CPIAUCSL',
      phase: 'IDLE',
      nextDueAt: new Date('2024-02-16T12:00:00.000Z'),
      consecutiveFailures: 0,
      lastError: null,
    };
    await store.writeScheduleState(interrupted);
    await store.writeScheduleState(future);

    const s = scheduler(testCatalog(['GDP', 'CPIAUCSL']));
    await s.load();

    expect(s.getState('GDP')).toMatchObject({ phase: 'DUE', nextDueAt: clock.now(), consecutiveFailures: 2 });
    expect(s.dueSeries()).toEqual(['GDP']);
  });

  it('should return a cancelled series to DUE without counting a failure', async () => {
    const controller = new AbortController();
    pipeline.delayMs = 20;
    const s = scheduler(testCatalog(['GDP']));
    await s.load();

    const run = s.runSeries('GDP', controller.signal);
    controller.abort();
    const result = await run;

    expect(result).toEqual({ seriesKey: 'GDP', ok: false, error: 'cancelled' });
    expect(s.getState('GDP')).toMatchObject({ phase: 'DUE', consecutiveFailures: 0 });
    expect(s.inFlightCount()).toBe(0);
  });

  it('should not start work once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const s = scheduler(testCatalog(['GDP']));
    await s.load();

    expect(await s.runSeries('GDP', controller.signal)).toBeNull();
    expect(pipeline.calls).toEqual([]);
  });

  it('should cap concurrent pipelines at workerConcurrency', async () => {
    pipeline.delayMs = 10;
    const s = scheduler(testCatalog(), { workerConcurrency: 2 });
    const results = await s.runDue();

    expect(results).toHaveLength(3);
    expect(pipeline.maxActive).toBe(2);
  });

  it('should keep scheduling when schedule state cannot be persisted', async () => {
    vi.spyOn(store, 'writeScheduleState').mockRejectedValue(new Error('store down'));
    const s = scheduler(testCatalog(['GDP']));
    const results = await s.runDue();

    expect(results).toEqual([{ seriesKey: 'GDP', ok: true, changeSet: expect.objectContaining({ id: 'cs-GDP' }) }]);
    expect(s.getState('GDP')?.phase).toBe('IDLE');
  });
});
