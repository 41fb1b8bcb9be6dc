/**
 * BLS ADAPTER
 *
 * Bureau of Labor Statistics public API v2. Rows look like
 * `{ year: '2024', period: 'M01', value: '308.417' }`; quarterly series use
 * Q01..Q04. Annual averages (M13, Q05, A01) are not observations and are
 * ignored. The API caps one request at 10 years (20 with a registration key),
 * so longer ranges are split. A span whose body cannot be read is recorded
 * as rejected and the other spans still count.
 */

import type Bottleneck from 'bottleneck';
import { z } from 'zod';
import { ProviderError } from '../../../common/errors.js';
import { moduleLogger, type Logger } from '../../../core/logger.js';
import type { IncomingObservation, PeriodRange, SeriesDefinition } from '../contracts/macro.contracts.js';
import { comparePeriods, isWithinRange } from '../data/period.js';
import { getJson } from './provider.http.js';
import {
  axiosHttpClient,
  type FetchOptions,
  type FetchResult,
  type HttpClient,
  type ProviderAdapter,
  type RejectedRow,
} from './provider.types.js';
import { getRateLimiter } from './rate.limiter.js';

const blsResponseSchema = z.object({
  status: z.string(),
  message: z.array(z.string()).default([]),
  Results: z
    .object({
      series: z.array(
        z.object({
          seriesID: z.string(),
          data: z.array(z.unknown()).default([]),
        }),
      ),
    })
    .optional(),
});

const blsRowSchema = z.object({
  year: z.string(),
  period: z.string(),
  value: z.string(),
});

const MONTH_CODE = /^M(0[1-9]|1[0-2])$/;
const QUARTER_CODE = /^Q0([1-4])$/;
const ANNUAL_CODE = /^(M13|Q05|A01)$/;

const DEFAULT_TIMEOUT_MS = 30_000;

export const BLS_API_BASE = 'https://api.bls.gov/publicAPI/v2';

export interface BlsAdapterOptions {
  apiKey?: string;
  http?: HttpClient;
  limiter?: Bottleneck;
  baseUrl?: string;
  now?: () => Date;
  logger?: Logger;
}

/** Split [startYear, endYear] into request-sized spans. */
export function yearChunks(startYear: number, endYear: number, maxYears: number): Array<[number, number]> {
  const chunks: Array<[number, number]> = [];
  for (let from = startYear; from <= endYear; from += maxYears) {
    chunks.push([from, Math.min(from + maxYears - 1, endYear)]);
  }
  return chunks;
}

function statusError(status: string, messages: string[]): ProviderError {
  const detail = messages.join('; ') || status;
  if (/threshold|limit/i.test(detail)) {
    return new ProviderError('BLS', 'RATE_LIMITED', `BLS daily threshold reached: ${detail}`);
  }
  if (/key/i.test(detail) && /invalid|expired|not (valid|registered)/i.test(detail)) {
    return new ProviderError('BLS', 'UNAUTHORIZED', `BLS rejected registration key: ${detail}`);
  }
  if (status === 'REQUEST_NOT_PROCESSED') {
    return new ProviderError('BLS', 'UNAVAILABLE', `BLS did not process request: ${detail}`);
  }
  return new ProviderError('BLS', 'MALFORMED_RESPONSE', `BLS request failed: ${detail}`);
}

export class BlsAdapter implements ProviderAdapter {
  readonly id = 'BLS' as const;

  private readonly apiKey: string;
  private readonly http: HttpClient;
  private readonly limiter: Bottleneck;
  private readonly baseUrl: string;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(options: BlsAdapterOptions = {}) {
    this.apiKey = options.apiKey ?? '';
    this.http = options.http ?? axiosHttpClient();
    this.limiter = options.limiter ?? getRateLimiter('BLS');
    this.baseUrl = options.baseUrl ?? BLS_API_BASE;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? moduleLogger('bls');
  }

  async fetch(series: SeriesDefinition, range: PeriodRange, options: FetchOptions = {}): Promise<FetchResult> {
    const cadence = series.cadence;
    if (cadence !== 'monthly' && cadence !== 'quarterly') {
      throw new ProviderError('BLS', 'MALFORMED_RESPONSE', `BLS adapter does not serve ${cadence} series (${series.key})`);
    }

    const maxYears = this.apiKey ? 20 : 10;
    const chunks = yearChunks(Number(range.from.slice(0, 4)), Number(range.to.slice(0, 4)), maxYears);

    const observations = new Map<string, IncomingObservation>();
    const rejected: RejectedRow[] = [];
    let apiCalls = 0;
    let spanError: ProviderError | undefined;

    for (const [startYear, endYear] of chunks) {
      let rows: unknown[];
      try {
        rows = await this.requestRows(series, startYear, endYear, options);
      } catch (err) {
        if (!(err instanceof ProviderError) || err.kind !== 'MALFORMED_RESPONSE') throw err;
        apiCalls++;
        if (!spanError) spanError = err;
        rejected.push({ raw: `${startYear}-${endYear}`, reason: err.message });
        this.log.warn({ seriesKey: series.key, startYear, endYear, err: err.message }, 'BLS span unreadable');
        continue;
      }
      apiCalls++;
      const fetchedAt = this.now();

      for (const raw of rows) {
        const row = blsRowSchema.safeParse(raw);
        if (!row.success) {
          rejected.push({ raw: String(JSON.stringify(raw)), reason: 'row is not { year, period, value }' });
          continue;
        }
        const { year, period: code, value } = row.data;
        if (ANNUAL_CODE.test(code)) continue;

        const period = this.toPeriod(cadence, year, code);
        if (!period) {
          rejected.push({ raw: `${year} ${code}`, reason: `period code does not fit a ${cadence} series` });
          continue;
        }
        // "-" marks an unavailable value
        if (value.trim() === '-' || value.trim() === '') continue;

        const numeric = Number(value.replace(/,/g, ''));
        if (!Number.isFinite(numeric)) {
          rejected.push({ raw: `${year} ${code}`, reason: `non-numeric value "${value}"` });
          continue;
        }
        if (!isWithinRange(period, range)) continue;

        observations.set(period, { seriesKey: series.key, period, value: numeric, fetchedAt });
      }
    }

    if (rejected.length > 0) {
      this.log.warn({ seriesKey: series.key, rejected: rejected.length }, 'dropped malformed BLS rows');
      if (observations.size === 0) {
        if (spanError) throw spanError;
        throw new ProviderError('BLS', 'MALFORMED_RESPONSE', `No usable BLS rows for ${series.providerId}`, {
          context: { rejected: rejected.length },
        });
      }
    }

    return {
      seriesKey: series.key,
      observations: [...observations.values()].sort((a, b) => comparePeriods(a.period, b.period)),
      partial: rejected.length > 0,
      rejected,
      apiCalls,
    };
  }

  private toPeriod(cadence: 'monthly' | 'quarterly', year: string, code: string): string | null {
    if (!/^\d{4}$/.test(year)) return null;
    if (cadence === 'monthly') {
      const m = MONTH_CODE.exec(code);
      return m ? `${year}-${m[1]}` : null;
    }
    const q = QUARTER_CODE.exec(code);
    return q ? `${year}-Q${q[1]}` : null;
  }

  private async requestRows(
    series: SeriesDefinition,
    startYear: number,
    endYear: number,
    options: FetchOptions,
  ): Promise<unknown[]> {
    const params: Record<string, string | number> = { startyear: startYear, endyear: endYear };
    if (this.apiKey) params.registrationkey = this.apiKey;

    const body = await this.limiter.schedule(() =>
      getJson('BLS', this.http, `${this.baseUrl}/timeseries/data/${encodeURIComponent(series.providerId)}`, {
        params,
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        signal: options.signal,
      }),
    );

    const parsed = blsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError('BLS', 'MALFORMED_RESPONSE', `Unexpected BLS response shape for ${series.providerId}`);
    }
    if (parsed.data.status !== 'REQUEST_SUCCEEDED') {
      throw statusError(parsed.data.status, parsed.data.message);
    }

    const match = parsed.data.Results?.series.find((s) => s.seriesID === series.providerId);
    return match ? match.data : [];
  }
}
