/**
 * Shared fakes for the macro-core suites: a settable clock, a scripted HTTP
 * client, a scripted AI capability and a small catalog.
 */

import { parseOrchestratorConfig, type OrchestratorConfig } from '../../../config/orchestrator.config.js';
import type { Alert, AlertSink } from '../../../core/alerts/alert.sink.js';
import type { IncomingObservation, SeriesDefinition } from '../contracts/macro.contracts.js';
import { buildSeriesCatalog, DEFAULT_SERIES, type SeriesCatalog } from '../data/series.catalog.js';
import type { HttpClient, HttpGetOptions, HttpResponse } from '../ingest/provider.types.js';
import type { AICapability, GenerateOptions, GenerateResult } from '../synthesis/ai.types.js';

export class TestClock {
  private current: Date;

  constructor(start: string | Date = '2024-02-15T12:00:00.000Z') {
    this.current = new Date(start);
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }

  set(at: string | Date): void {
    this.current = new Date(at);
  }
}

/** Catalog limited to a monthly FRED, a quarterly FRED and a monthly BLS series. */
export function testCatalog(keys: string[] = ['CPIAUCSL', 'GDP', 'BLS_CPI_U_SA']): SeriesCatalog {
  return buildSeriesCatalog(DEFAULT_SERIES, {}, keys);
}

export function seriesOf(catalog: SeriesCatalog, key: string): SeriesDefinition {
  const series = catalog.get(key);
  if (!series) throw new Error(`fixture series ${key} missing`);
  return series;
}

export interface TestConfigInput {
  scheduler?: Record<string, unknown>;
  synthesis?: Record<string, unknown>;
  seriesOverrides?: Record<string, unknown>;
}

/** Short, jitter-free timings so tests can step the clock by hand. */
export function testConfig(input: TestConfigInput = {}): OrchestratorConfig {
  return parseOrchestratorConfig({
    seriesOverrides: input.seriesOverrides,
    scheduler: {
      jitterMinMs: 0,
      jitterMaxMs: 0,
      backoffBaseMs: 1000,
      backoffMaxMs: 8000,
      alertThreshold: 3,
      fetchTimeoutMs: 1000,
      ...input.scheduler,
    },
    synthesis: {
      aiTimeoutMs: 1000,
      backlogBackoffBaseMs: 1000,
      backlogBackoffMaxMs: 8000,
      ...input.synthesis,
    },
  });
}

export function obs(seriesKey: string, period: string, value: number, fetchedAt: Date): IncomingObservation {
  return { seriesKey, period, value, fetchedAt };
}

// ═══════════════════════════════════════════════════════════════
// HTTP
// ═══════════════════════════════════════════════════════════════

export interface RecordedRequest {
  url: string;
  options: HttpGetOptions;
}

type Reply = HttpResponse | Error;

/** Answers GETs from a queue; an Error in the queue is thrown as a transport failure. */
export class FakeHttpClient implements HttpClient {
  readonly requests: RecordedRequest[] = [];
  private readonly replies: Reply[];

  constructor(...replies: Reply[]) {
    this.replies = replies;
  }

  push(...replies: Reply[]): void {
    this.replies.push(...replies);
  }

  async get(url: string, options: HttpGetOptions): Promise<HttpResponse> {
    this.requests.push({ url, options });
    const reply = this.replies.shift();
    if (!reply) throw new Error(`unexpected request to ${url}`);
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

export function ok(data: unknown): HttpResponse {
  return { status: 200, data };
}

/** FRED stand-in answering by path and series_id, so concurrent series get their own replies. */
export class FredRouter implements HttpClient {
  readonly requests: RecordedRequest[] = [];
  private readonly observations = new Map<string, Reply>();
  private readonly series = new Map<string, Reply>();

  onObservations(seriesId: string, reply: Reply): this {
    this.observations.set(seriesId, reply);
    return this;
  }

  onSeries(seriesId: string, reply: Reply): this {
    this.series.set(seriesId, reply);
    return this;
  }

  async get(url: string, options: HttpGetOptions): Promise<HttpResponse> {
    this.requests.push({ url, options });
    const seriesId = String(options.params?.series_id ?? '');
    const routes = url.endsWith('/series/observations') ? this.observations : this.series;
    const reply = routes.get(seriesId) ?? { status: 404, data: { error_code: 404, error_message: 'not found' } };
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

export function fredRows(...rows: Array<[string, string]>): HttpResponse {
  return ok({ observations: rows.map(([date, value]) => ({ date, value })) });
}

// ═══════════════════════════════════════════════════════════════
// AI
// ═══════════════════════════════════════════════════════════════

export interface RecordedPrompt {
  prompt: string;
  options: GenerateOptions;
}

/** Returns scripted results in order; once the script runs out every call succeeds. */
export class ScriptedAI implements AICapability {
  readonly calls: RecordedPrompt[] = [];
  private readonly script: Array<GenerateResult | Error>;

  constructor(...script: Array<GenerateResult | Error>) {
    this.script = script;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<GenerateResult> {
    this.calls.push({ prompt, options });
    const next = this.script.shift() ?? { text: `narrative #${this.calls.length}`, model: 'test-model' };
    if (next instanceof Error) throw next;
    return next;
  }
}

export class RecordingAlertSink implements AlertSink {
  readonly alerts: Alert[] = [];

  async send(alert: Alert): Promise<void> {
    this.alerts.push(alert);
  }
}

/** Await a promise that is expected to reject and hand back the error. */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('expected promise to reject');
}

export function sequentialIds(prefix: string): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}
