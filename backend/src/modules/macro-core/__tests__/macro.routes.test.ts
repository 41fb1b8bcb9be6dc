import Bottleneck from 'bottleneck';
import type { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildApp } from '../../../app.js';
import { AIUnavailableError } from '../../../common/errors.js';
import { silentLogger } from '../../../core/logger.js';
import { FredAdapter } from '../ingest/fred.adapter.js';
import { ProviderRegistry } from '../ingest/provider.registry.js';
import { createMacroCore, type MacroCore } from '../index.js';
import { MemoryHistoryStore } from '../storage/memory.store.js';
import { FredRouter, fredRows, ScriptedAI, TestClock, testCatalog, testConfig } from './fixtures.js';

describe('macro API routes', () => {
  let clock: TestClock;
  let core: MacroCore;
  let app: FastifyInstance;

  function setup(ai = new ScriptedAI()): void {
    clock = new TestClock('2024-02-15T12:00:00.000Z');
    const router = new FredRouter()
      .onObservations('CPIAUCSL', fredRows(['2023-12-01', '306.746'], ['2024-01-01', '308.417']))
      .onObservations('GDP', fredRows(['2023-10-01', '27944.627']));
    const fred = new FredAdapter({
      apiKey: 'test-secret',
      http: router,
      limiter: new Bottleneck(),
      now: clock.now,
      logger: silentLogger(),
    });
    core = createMacroCore({
      store: new MemoryHistoryStore(),
      catalog: testCatalog(['CPIAUCSL', 'GDP']),
      providers: new ProviderRegistry([fred]),
      ai,
      config: testConfig(),
      now: clock.now,
      random: () => 0,
      logger: silentLogger(),
    });
    app = buildApp({ env: { LOG_LEVEL: 'silent', CORS_ORIGINS: '*', NODE_ENV: 'test' }, core });
  }

  beforeEach(() => {
    setup();
  });

  afterEach(async () => {
    await app.close();
  });

  // ═══════════════════════════════════════════════════════════════
  // TESTS: health / catalog
  // ═══════════════════════════════════════════════════════════════

  it('should report health with orchestrator status', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/macro/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      ok: true,
      module: 'macro-core',
      series: 2,
      orchestrator: { running: false, cycles: 0, lastCycleAt: null, lastCycleError: null, inFlight: 0 },
    });
  });

  it('should list catalog series with metadata and schedule slots', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/macro/series' });

    const body = res.json();
    expect(body.total).toBe(2);
    expect(body.series[0]).toMatchObject({ key: 'GDP', provider: 'FRED', cadence: 'quarterly', meta: null, schedule: null });
    expect(body.series[1]).toMatchObject({ key: 'CPIAUCSL', cadence: 'monthly' });
  });

  it('should answer unknown routes with a NOT_FOUND body', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/macro/nothing-here' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
  });

  // ═══════════════════════════════════════════════════════════════
  // TESTS: observations
  // ═══════════════════════════════════════════════════════════════

  describe('after a cycle', () => {
    beforeEach(async () => {
      await core.orchestrator.runCycle();
    });

    it('should return the latest value per period', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/macro/series/CPIAUCSL/observations' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        ok: true,
        seriesKey: 'CPIAUCSL',
        count: 2,
        observations: [
          { seriesKey: 'CPIAUCSL', period: '2023-12', value: 306.746, revision: 0, fetchedAt: '2024-02-15T12:00:00.000Z' },
          { seriesKey: 'CPIAUCSL', period: '2024-01', value: 308.417, revision: 0, fetchedAt: '2024-02-15T12:00:00.000Z' },
        ],
      });
    });

    it('should filter observations by period range', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/macro/series/CPIAUCSL/observations?from=2024-01' });

      expect(res.json().observations.map((o: { period: string }) => o.period)).toEqual(['2024-01']);
    });

    it('should reject a range bound of the wrong cadence', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/macro/series/CPIAUCSL/observations?from=2024-Q1' });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: 'from "2024-Q1" is not a monthly period',
      });
    });

    it('should reject a non-positive limit', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/macro/series/CPIAUCSL/observations?limit=0' });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: 'Invalid query: limit: Number must be greater than 0',
      });
    });

    it('should 404 a series outside the catalog', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/macro/series/UNRATE/observations' });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Series UNRATE not in catalog' });
    });

    it('should list every revision of a period', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/macro/series/CPIAUCSL/observations/2024-01/revisions' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ ok: true, seriesKey: 'CPIAUCSL', period: '2024-01' });
      expect(res.json().revisions).toHaveLength(1);
    });

    it('should 404 revisions of a period never observed', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/macro/series/CPIAUCSL/observations/2023-06/revisions' });

      expect(res.statusCode).toBe(404);
      expect(res.json().message).toBe('No observation for CPIAUCSL 2023-06');
    });

    it('should report sync status for a series', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/macro/series/GDP/sync-status' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        ok: true,
        seriesKey: 'GDP',
        latestPeriod: '2023-Q4',
        schedule: { seriesKey: 'GDP', phase: 'IDLE', consecutiveFailures: 0 },
        lastRun: { seriesKey: 'GDP', provider: 'FRED', ok: true, newCount: 1 },
      });
    });

    it('should list narratives and fetch one by id', async () => {
      const list = await app.inject({ method: 'GET', url: '/api/macro/narratives' });
      expect(list.json()).toMatchObject({ ok: true, count: 1 });

      const id: string = list.json().narratives[0].id;
      const one = await app.inject({ method: 'GET', url: `/api/macro/narratives/${id}` });

      expect(one.statusCode).toBe(200);
      expect(one.json().narrative).toMatchObject({ id, coveredSeries: ['CPIAUCSL', 'GDP'], text: 'narrative #1' });
    });

    it('should 404 an unknown narrative', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/macro/narratives/missing' });

      expect(res.statusCode).toBe(404);
      expect(res.json().message).toBe('Narrative missing not found');
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // TESTS: backlog
  // ═══════════════════════════════════════════════════════════════

  it('should show change-sets waiting for synthesis', async () => {
    await app.close();
    setup(new ScriptedAI(new AIUnavailableError('overloaded')));
    const report = await core.orchestrator.runCycle();

    const res = await app.inject({ method: 'GET', url: '/api/macro/backlog' });

    expect(res.json()).toEqual({
      ok: true,
      count: 1,
      pending: [
        {
          changeSetId: report.changeSet?.id,
          attempts: 1,
          nextAttemptAt: '2024-02-15T12:00:01.000Z',
          lastError: 'overloaded',
          createdAt: '2024-02-15T12:00:00.000Z',
          entries: 3,
        },
      ],
    });
  });
});
