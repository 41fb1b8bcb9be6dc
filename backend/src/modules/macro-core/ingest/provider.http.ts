/**
 * Shared request path for provider adapters: status → ProviderError.
 */

import { ProviderError, errorMessage } from '../../../common/errors.js';
import type { HttpClient, HttpGetOptions } from './provider.types.js';

export function errorForStatus(provider: string, status: number, detail: string, retryAfter?: string): ProviderError {
  const context = retryAfter ? { retryAfter } : undefined;

  if (status === 429) {
    return new ProviderError(provider, 'RATE_LIMITED', `${provider} rate limit hit: ${detail}`, { statusCode: status, context });
  }
  if (status === 401 || status === 403) {
    return new ProviderError(provider, 'UNAUTHORIZED', `${provider} rejected credentials: ${detail}`, { statusCode: status });
  }
  if (status >= 500 || status === 408) {
    return new ProviderError(provider, 'UNAVAILABLE', `${provider} unavailable (HTTP ${status}): ${detail}`, { statusCode: status });
  }
  return new ProviderError(provider, 'MALFORMED_RESPONSE', `${provider} rejected request (HTTP ${status}): ${detail}`, {
    statusCode: status,
  });
}

/**
 * GET and return the body of a 2xx response. Transport failures
 * (DNS, reset, timeout, abort) surface as UNAVAILABLE.
 */
export async function getJson(
  provider: string,
  http: HttpClient,
  url: string,
  options: HttpGetOptions,
  describeError: (data: unknown) => string = () => '',
): Promise<unknown> {
  let res;
  try {
    res = await http.get(url, options);
  } catch (err) {
    throw new ProviderError(provider, 'UNAVAILABLE', `${provider} request failed: ${errorMessage(err)}`, { cause: err });
  }

  if (res.status < 200 || res.status >= 300) {
    throw errorForStatus(provider, res.status, describeError(res.data) || 'no detail', res.retryAfter);
  }
  return res.data;
}
