/**
 * GCRA Rate Limiter (in-memory)
 *
 * Generic Cell Rate Algorithm: each bucket is a single number, the
 * theoretical arrival time (TAT) of the next request if the client sent
 * at exactly the steady-state rate.
 *
 * For a request at `now`:
 * - tat     = max(stored TAT, now)   (a fresh or idle bucket starts at now)
 * - newTat  = tat + T                (T = emission interval = 1000 / rate ms)
 * - allowAt = newTat - burst * T
 * - now < allowAt  → reject, retry after (allowAt - now)
 * - otherwise      → admit and store newTat
 *
 * With rate=2/s, burst=2: two back-to-back requests pass, the third waits
 * 500ms.
 *
 * Buckets live in a fixed-capacity LRU. An evicted client simply starts
 * again with a full quota.
 *
 * check() does its read-modify-write without awaiting, so concurrent
 * requests for one key are serialized by the event loop and can never
 * both take the last token.
 */

import { BucketStore } from './lru';
import { ConfigError } from '../errors';
import { RateLimiter, RateLimitQuota, RateLimitResult, VaryBy } from '../types/ratelimit';

export interface GcraRateLimiterOptions {
  quota: RateLimitQuota;
  capacity: number;
  now?: () => number;
}

export class GcraRateLimiter implements RateLimiter {
  private readonly store: BucketStore<number>;
  private readonly emissionInterval: number;
  private readonly burstWindow: number;
  private readonly limit: number;
  private readonly now: () => number;

  constructor(options: GcraRateLimiterOptions) {
    const { maxRate, maxBurst } = options.quota;

    if (!Number.isFinite(maxRate) || maxRate <= 0) {
      throw new ConfigError(`Rate limit maxRate must be a positive number, got ${maxRate}`);
    }
    if (!Number.isInteger(maxBurst) || maxBurst < 1) {
      throw new ConfigError(`Rate limit maxBurst must be a positive integer, got ${maxBurst}`);
    }

    this.store = new BucketStore<number>(options.capacity);
    this.emissionInterval = 1000 / maxRate;
    this.burstWindow = maxBurst * this.emissionInterval;
    this.limit = maxBurst;
    this.now = options.now ?? Date.now;
  }

  async check(key: string): Promise<RateLimitResult> {
    return this.admit(key);
  }

  /** Synchronous core of check() */
  admit(key: string): RateLimitResult {
    const now = this.now();
    const tat = Math.max(this.store.get(key) ?? now, now);
    const newTat = tat + this.emissionInterval;
    const allowAt = newTat - this.burstWindow;

    if (now < allowAt) {
      return this.result(false, now, tat, allowAt - now);
    }

    this.store.set(key, newTat);
    return this.result(true, now, newTat, 0);
  }

  get size(): number {
    return this.store.size;
  }

  private result(allowed: boolean, now: number, tat: number, retryAfterMs: number): RateLimitResult {
    const remaining = Math.floor((now - (tat - this.burstWindow)) / this.emissionInterval);

    return {
      allowed,
      limit: this.limit,
      remaining: Math.min(this.limit, Math.max(0, remaining)),
      reset_in_seconds: Math.max(0, Math.ceil((tat - now) / 1000)),
      retry_after_seconds: Math.ceil(retryAfterMs / 1000),
    };
  }
}

type HeaderValue = string | string[] | undefined;

/**
 * Derive the bucket key for a request. Repeated requests from the same
 * client to the same path always produce the same key.
 */
export function rateLimitKey(
  path: string,
  headers: Record<string, HeaderValue>,
  varyBy: VaryBy
): string {
  const parts: string[] = [];

  if (varyBy.path) {
    parts.push(path);
  }

  for (const name of varyBy.headers) {
    const value = headers[name.toLowerCase()];
    parts.push(Array.isArray(value) ? value.join(',') : value ?? '');
  }

  return parts.join('\n');
}
