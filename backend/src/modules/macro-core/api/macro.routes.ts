/**
 * MACRO API ROUTES
 *
 * Read-only view over the catalog, the stored history, narratives and the
 * synthesis backlog. Nothing here writes.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { NotFoundError, ValidationError } from '../../../common/errors.js';
import type { SeriesDefinition } from '../contracts/macro.contracts.js';
import { isValidPeriod } from '../data/period.js';
import type { MacroCore } from '../index.js';

const seriesParams = z.object({ key: z.string().min(1) });
const revisionParams = seriesParams.extend({ period: z.string().min(1) });
const narrativeParams = z.object({ id: z.string().min(1) });

const historyQuery = z.object({
  from: z.string().optional(),
  to: z.string().optional(),
  limit: z.coerce.number().int().positive().max(5000).optional(),
});

const listQuery = z.object({
  limit: z.coerce.number().int().positive().max(200).default(20),
});

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join('.') || what}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid ${what}: ${detail}`);
  }
  return result.data;
}

function checkPeriod(series: SeriesDefinition, period: string | undefined, field: string): void {
  if (period !== undefined && !isValidPeriod(series.cadence, period)) {
    throw new ValidationError(`${field} "${period}" is not a ${series.cadence} period`);
  }
}

// ═══════════════════════════════════════════════════════════════
// REGISTER ROUTES
// ═══════════════════════════════════════════════════════════════

export async function registerMacroRoutes(fastify: FastifyInstance, core: MacroCore): Promise<void> {
  const prefix = '/api/macro';
  const { store, catalog, scheduler, backlog, orchestrator } = core;

  function requireSeries(key: string): SeriesDefinition {
    const series = catalog.get(key);
    if (!series) throw new NotFoundError(`Series ${key} not in catalog`);
    return series;
  }

  // ─────────────────────────────────────────────────────────────
  // Health
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/health`, async () => {
    return {
      ok: true,
      module: 'macro-core',
      series: catalog.size,
      orchestrator: orchestrator.status(),
    };
  });

  // ─────────────────────────────────────────────────────────────
  // GET /series: catalog joined with provider metadata and schedule
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/series`, async () => {
    const metas = await store.listSeriesMeta();
    const series = catalog.list().map((def) => ({
      ...def,
      meta: metas.find((m) => m.seriesKey === def.key) ?? null,
      schedule: scheduler.getState(def.key) ?? null,
    }));

    return { ok: true, total: series.length, series };
  });

  // ─────────────────────────────────────────────────────────────
  // GET /series/:key/observations: latest revision per period
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/series/:key/observations`, async (req) => {
    const { key } = parse(seriesParams, req.params, 'params');
    const query = parse(historyQuery, req.query, 'query');
    const series = requireSeries(key);
    checkPeriod(series, query.from, 'from');
    checkPeriod(series, query.to, 'to');

    const observations = await store.readHistory(key, query);
    return { ok: true, seriesKey: key, count: observations.length, observations };
  });

  fastify.get(`${prefix}/series/:key/observations/:period/revisions`, async (req) => {
    const { key, period } = parse(revisionParams, req.params, 'params');
    const series = requireSeries(key);
    checkPeriod(series, period, 'period');

    const revisions = await store.readRevisions(key, period);
    if (revisions.length === 0) {
      throw new NotFoundError(`No observation for ${key} ${period}`);
    }
    return { ok: true, seriesKey: key, period, revisions };
  });

  // ─────────────────────────────────────────────────────────────
  // GET /series/:key/sync-status
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/series/:key/sync-status`, async (req) => {
    const { key } = parse(seriesParams, req.params, 'params');
    requireSeries(key);

    const [lastRun, latestPeriod] = await Promise.all([store.latestIngestRun(key), store.latestPeriod(key)]);
    return {
      ok: true,
      seriesKey: key,
      latestPeriod,
      schedule: scheduler.getState(key) ?? (await store.readScheduleState(key)),
      lastRun,
    };
  });

  // ─────────────────────────────────────────────────────────────
  // Narratives
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/narratives`, async (req) => {
    const { limit } = parse(listQuery, req.query, 'query');
    const narratives = await store.listArtifacts(limit);
    return { ok: true, count: narratives.length, narratives };
  });

  fastify.get(`${prefix}/narratives/:id`, async (req) => {
    const { id } = parse(narrativeParams, req.params, 'params');
    const narrative = await store.getArtifact(id);
    if (!narrative) throw new NotFoundError(`Narrative ${id} not found`);
    return { ok: true, narrative };
  });

  // ─────────────────────────────────────────────────────────────
  // GET /backlog: change-sets still waiting for a narrative
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/backlog`, async () => {
    const pending = await backlog.list();
    return {
      ok: true,
      count: pending.length,
      pending: pending.map((p) => ({
        changeSetId: p.changeSetId,
        attempts: p.attempts,
        nextAttemptAt: p.nextAttemptAt,
        lastError: p.lastError ?? null,
        createdAt: p.createdAt,
        entries: p.changeSet.entries.length,
      })),
    };
  });
}
