/**
 * PROVIDER ADAPTER CONTRACT
 *
 * One adapter per external source, selected by provider id. Adapters only
 * talk to the network; they never write to the store.
 */

import axios, { type AxiosInstance } from 'axios';
import type {
  IncomingObservation,
  PeriodRange,
  ProviderId,
  SeriesDefinition,
  SeriesMeta,
} from '../contracts/macro.contracts.js';

export interface RejectedRow {
  /** Provider's own date/period label for the row. */
  raw: string;
  reason: string;
}

export interface FetchResult {
  seriesKey: string;
  /** Normalized rows, ascending by period. */
  observations: IncomingObservation[];
  /** True when some rows in the response were unusable and dropped. */
  partial: boolean;
  rejected: RejectedRow[];
  apiCalls: number;
}

export interface FetchOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface ProviderAdapter {
  readonly id: ProviderId;
  /**
   * Fetch observations for `series` over an inclusive period range.
   * Throws ProviderError (RATE_LIMITED, UNAUTHORIZED, UNAVAILABLE,
   * MALFORMED_RESPONSE) when nothing usable came back.
   */
  fetch(series: SeriesDefinition, range: PeriodRange, options?: FetchOptions): Promise<FetchResult>;
  /** Provider-side metadata, where the provider exposes it. */
  describe?(series: SeriesDefinition, options?: FetchOptions): Promise<SeriesMeta>;
}

// ═══════════════════════════════════════════════════════════════
// HTTP
// ═══════════════════════════════════════════════════════════════

export interface HttpResponse {
  status: number;
  data: unknown;
  retryAfter?: string;
}

export interface HttpGetOptions {
  params?: Record<string, string | number>;
  timeout: number;
  signal?: AbortSignal;
}

/** The slice of an HTTP client the adapters use. Rejects only on transport failure. */
export interface HttpClient {
  get(url: string, options: HttpGetOptions): Promise<HttpResponse>;
}

export function axiosHttpClient(instance: AxiosInstance = axios.create()): HttpClient {
  return {
    async get(url, options) {
      const res = await instance.get<unknown>(url, {
        params: options.params,
        timeout: options.timeout,
        signal: options.signal,
        validateStatus: () => true,
      });
      const retryAfter = res.headers['retry-after'];
      return {
        status: res.status,
        data: res.data,
        retryAfter: typeof retryAfter === 'string' ? retryAfter : undefined,
      };
    },
  };
}
