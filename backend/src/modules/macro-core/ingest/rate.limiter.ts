/**
 * Rate Limiter
 * ============
 * Per-provider request spacing for the statistics APIs.
 */

import Bottleneck from 'bottleneck';
import { moduleLogger } from '../../../core/logger.js';
import type { ProviderId } from '../contracts/macro.contracts.js';

type RateLimitConfig = {
  minTime: number;      // ms between requests
  maxConcurrent: number;
  reservoir?: number;   // max requests per interval
  reservoirRefreshInterval?: number;
  reservoirRefreshAmount?: number;
};

const RATE_LIMITS: Record<ProviderId, RateLimitConfig> = {
  FRED: {
    minTime: 500,        // 2 req/sec
    maxConcurrent: 1,
  },
  BLS: {
    minTime: 1000,
    maxConcurrent: 1,
    reservoir: 50,       // registered keys: 50 series-queries per 10s
    reservoirRefreshInterval: 10_000,
    reservoirRefreshAmount: 50,
  },
};

const log = moduleLogger('rate-limiter');
const limiters = new Map<ProviderId, Bottleneck>();

function createRateLimiter(provider: ProviderId): Bottleneck {
  const config = RATE_LIMITS[provider];
  const limiter = new Bottleneck({
    minTime: config.minTime,
    maxConcurrent: config.maxConcurrent,
    reservoir: config.reservoir,
    reservoirRefreshInterval: config.reservoirRefreshInterval,
    reservoirRefreshAmount: config.reservoirRefreshAmount,
  });

  limiter.on('depleted', () => {
    log.warn({ provider }, 'reservoir depleted, waiting');
  });

  return limiter;
}

/** Shared limiter for a provider; every adapter instance for it queues here. */
export function getRateLimiter(provider: ProviderId): Bottleneck {
  let limiter = limiters.get(provider);
  if (!limiter) {
    limiter = createRateLimiter(provider);
    limiters.set(provider, limiter);
  }
  return limiter;
}
