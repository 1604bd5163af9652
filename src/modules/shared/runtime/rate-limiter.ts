/**
 * Rate limiter for outbound provider calls
 */

import Bottleneck from 'bottleneck';

export type Provider = 'YAHOO' | 'FRED';

export type RateLimitConfig = {
  minTime: number;      // ms between requests
  maxConcurrent: number;
  reservoir?: number;   // max requests per interval
  reservoirRefreshInterval?: number;
  reservoirRefreshAmount?: number;
};

export const RATE_LIMITS: Record<Provider, RateLimitConfig> = {
  YAHOO: {
    minTime: 100,        // 10 req/sec
    maxConcurrent: 4,
  },
  FRED: {
    minTime: 500,        // FRED allows 120 req/min
    maxConcurrent: 2,
    reservoir: 120,
    reservoirRefreshInterval: 60_000,
    reservoirRefreshAmount: 120,
  },
};

const limiters = new Map<Provider, Bottleneck>();

export function getRateLimiter(provider: Provider): Bottleneck {
  const existing = limiters.get(provider);
  if (existing) return existing;

  const config = RATE_LIMITS[provider];
  const limiter = new Bottleneck({
    minTime: config.minTime,
    maxConcurrent: config.maxConcurrent,
    reservoir: config.reservoir,
    reservoirRefreshInterval: config.reservoirRefreshInterval,
    reservoirRefreshAmount: config.reservoirRefreshAmount,
  });

  limiter.on('depleted', () => {
    console.log(`[RateLimiter] ${provider} reservoir depleted, waiting...`);
  });

  limiters.set(provider, limiter);
  return limiter;
}

export function schedule<T>(provider: Provider, fn: () => Promise<T>): Promise<T> {
  return getRateLimiter(provider).schedule(fn);
}
