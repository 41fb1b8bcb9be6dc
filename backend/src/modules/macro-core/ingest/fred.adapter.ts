/**
 * FRED ADAPTER
 *
 * Federal Reserve Economic Data (api.stlouisfed.org). Observations come back
 * as `{ date: 'YYYY-MM-DD', value: '1.23' }` with "." for a missing value.
 */

import type Bottleneck from 'bottleneck';
import { z } from 'zod';
import { ProviderError } from '../../../common/errors.js';
import { moduleLogger, type Logger } from '../../../core/logger.js';
import type {
  Cadence,
  IncomingObservation,
  PeriodRange,
  SeriesDefinition,
  SeriesMeta,
} from '../contracts/macro.contracts.js';
import { comparePeriods, isWithinRange, periodEndDate, periodFromDate, periodStartDate } from '../data/period.js';
import { errorForStatus, getJson } from './provider.http.js';
import {
  axiosHttpClient,
  type FetchOptions,
  type FetchResult,
  type HttpClient,
  type ProviderAdapter,
  type RejectedRow,
} from './provider.types.js';
import { getRateLimiter } from './rate.limiter.js';

// ═══════════════════════════════════════════════════════════════
// RESPONSE SHAPES
// ═══════════════════════════════════════════════════════════════

const fredErrorSchema = z.object({
  error_code: z.number(),
  error_message: z.string().default(''),
});

const observationsResponseSchema = z.object({
  observations: z.array(z.unknown()),
});

const observationRowSchema = z.object({
  date: z.string(),
  value: z.string(),
});

const seriesResponseSchema = z.object({
  seriess: z
    .array(
      z.object({
        id: z.string(),
        title: z.string(),
        frequency: z.string(),
        units: z.string(),
        seasonal_adjustment: z.string().optional(),
        last_updated: z.string().optional(),
      }),
    )
    .min(1),
});

// FRED aggregates higher-frequency data down when asked; never up.
const FREQUENCY_PARAM: Partial<Record<Cadence, string>> = {
  monthly: 'm',
  quarterly: 'q',
};

const DEFAULT_TIMEOUT_MS = 30_000;

export const FRED_API_BASE = 'https://api.stlouisfed.org/fred';

// ═══════════════════════════════════════════════════════════════
// ADAPTER
// ═══════════════════════════════════════════════════════════════

export interface FredAdapterOptions {
  apiKey?: string;
  http?: HttpClient;
  limiter?: Bottleneck;
  baseUrl?: string;
  now?: () => Date;
  logger?: Logger;
}

function describeFredError(data: unknown): string {
  const parsed = fredErrorSchema.safeParse(data);
  return parsed.success ? parsed.data.error_message : '';
}

// FRED answers a bad or missing key with 400 rather than 401
function keyErrorAsUnauthorized(err: ProviderError): ProviderError {
  if (err.kind === 'MALFORMED_RESPONSE' && /api_key/i.test(err.message)) {
    return new ProviderError('FRED', 'UNAUTHORIZED', err.message, { statusCode: 400, cause: err });
  }
  return err;
}

export class FredAdapter implements ProviderAdapter {
  readonly id = 'FRED' as const;

  private readonly apiKey: string;
  private readonly http: HttpClient;
  private readonly limiter: Bottleneck;
  private readonly baseUrl: string;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(options: FredAdapterOptions = {}) {
    this.apiKey = options.apiKey ?? '';
    this.http = options.http ?? axiosHttpClient();
    this.limiter = options.limiter ?? getRateLimiter('FRED');
    this.baseUrl = options.baseUrl ?? FRED_API_BASE;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? moduleLogger('fred');
  }

  hasApiKey(): boolean {
    return this.apiKey.length > 0;
  }

  async fetch(series: SeriesDefinition, range: PeriodRange, options: FetchOptions = {}): Promise<FetchResult> {
    const params: Record<string, string> = {
      series_id: series.providerId,
      observation_start: periodStartDate(series.cadence, range.from),
      observation_end: periodEndDate(series.cadence, range.to),
      sort_order: 'asc',
    };
    const frequency = FREQUENCY_PARAM[series.cadence];
    if (frequency) {
      params.frequency = frequency;
      params.aggregation_method = 'avg';
    }

    const body = await this.request('series/observations', params, options);
    const fetchedAt = this.now();

    const parsed = observationsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError('FRED', 'MALFORMED_RESPONSE', `FRED observations for ${series.providerId} have no observations array`);
    }

    const observations: IncomingObservation[] = [];
    const rejected: RejectedRow[] = [];

    for (const raw of parsed.data.observations) {
      const row = observationRowSchema.safeParse(raw);
      if (!row.success) {
        rejected.push({ raw: String(JSON.stringify(raw)), reason: 'row is not { date, value }' });
        continue;
      }
      const { date, value } = row.data;

      // "." is FRED's marker for a missing value
      if (value === '.' || value.trim() === '') continue;

      const period = periodFromDate(series.cadence, date);
      if (!period) {
        rejected.push({ raw: date, reason: 'unparseable date' });
        continue;
      }
      const numeric = Number(value);
      if (!Number.isFinite(numeric)) {
        rejected.push({ raw: date, reason: `non-numeric value "${value}"` });
        continue;
      }
      if (!isWithinRange(period, range)) continue;

      observations.push({ seriesKey: series.key, period, value: numeric, fetchedAt });
    }

    if (rejected.length > 0) {
      this.log.warn({ seriesKey: series.key, rejected: rejected.length }, 'dropped malformed FRED rows');
      if (observations.length === 0) {
        throw new ProviderError('FRED', 'MALFORMED_RESPONSE', `No usable FRED rows for ${series.providerId}`, {
          context: { rejected: rejected.length },
        });
      }
    }

    observations.sort((a, b) => comparePeriods(a.period, b.period));

    return {
      seriesKey: series.key,
      observations,
      partial: rejected.length > 0,
      rejected,
      apiCalls: 1,
    };
  }

  async describe(series: SeriesDefinition, options: FetchOptions = {}): Promise<SeriesMeta> {
    const body = await this.request('series', { series_id: series.providerId }, options);
    const parsed = seriesResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError('FRED', 'MALFORMED_RESPONSE', `FRED series ${series.providerId} not found in response`);
    }

    const info = parsed.data.seriess[0];
    return {
      seriesKey: series.key,
      title: info.title,
      units: info.units,
      frequency: info.frequency,
      seasonalAdjustment: info.seasonal_adjustment,
      providerLastUpdated: info.last_updated,
      refreshedAt: this.now(),
    };
  }

  private async request(path: string, params: Record<string, string>, options: FetchOptions): Promise<unknown> {
    if (!this.hasApiKey()) {
      throw new ProviderError('FRED', 'UNAUTHORIZED', 'FRED_API_KEY not configured');
    }

    const body = await this.limiter.schedule(() =>
      getJson(
        'FRED',
        this.http,
        `${this.baseUrl}/${path}`,
        {
          params: { ...params, api_key: this.apiKey, file_type: 'json' },
          timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
          signal: options.signal,
        },
        describeFredError,
      ).catch((err: unknown) => {
        throw err instanceof ProviderError ? keyErrorAsUnauthorized(err) : err;
      }),
    );

    // some FRED failures arrive as 200 with an error body
    const inline = fredErrorSchema.safeParse(body);
    if (inline.success) {
      throw keyErrorAsUnauthorized(errorForStatus('FRED', inline.data.error_code, inline.data.error_message));
    }
    return body;
  }
}
