import Bottleneck from 'bottleneck';
import pino from 'pino';
import type { ProviderQuotaSnapshot } from './types.js';

const logger = pino({ name: 'ebay-rate-limiter' });

export type CallScheduler = <T>(fn: () => Promise<T>) => Promise<T>;

/**
 * One Browse call at a time, spaced by `minTime` ms.
 */
export function createCallScheduler(minTime = 500): CallScheduler {
  const limiter = new Bottleneck({ maxConcurrent: 1, minTime });
  return <T>(fn: () => Promise<T>) => limiter.schedule(fn);
}

function parseReset(raw: string, now: Date): string | null {
  const trimmed = raw.trim();
  if (/^\d+$/.test(trimmed)) {
    const n = Number(trimmed);
    // Large values are epoch seconds, small ones are seconds from now.
    const ms = n > 1_000_000_000 ? n * 1000 : now.getTime() + n * 1000;
    return new Date(ms).toISOString();
  }
  const parsed = Date.parse(trimmed);
  return Number.isNaN(parsed) ? null : new Date(parsed).toISOString();
}

/**
 * Read the provider's rate-limit headers, when a response carries them.
 */
export function checkRateLimitHeaders(headers: Headers, now = new Date()): ProviderQuotaSnapshot | null {
  const limit = headers.get('X-RateLimit-Limit');
  const remaining = headers.get('X-RateLimit-Remaining');
  const reset = headers.get('X-RateLimit-Reset');

  if (remaining === null) return null;

  const remainingNum = parseInt(remaining, 10);
  if (Number.isNaN(remainingNum)) return null;

  if (remainingNum < 10) {
    logger.warn({ limit, remaining: remainingNum, reset }, 'eBay rate limit running low');
  }

  const limitNum = limit === null ? NaN : parseInt(limit, 10);
  return {
    limit: Number.isNaN(limitNum) ? undefined : limitNum,
    remaining: remainingNum,
    resetTimeUtc: reset === null ? null : parseReset(reset, now),
  };
}
