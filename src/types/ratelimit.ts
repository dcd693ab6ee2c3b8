/**
 * Rate Limiting Types
 */

/** GCRA quota: steady-state rate plus instant burst */
export interface RateLimitQuota {
  maxRate: number; // requests per second
  maxBurst: number; // requests admitted back-to-back on a fresh key
}

/** Which parts of a request identify a rate-limit bucket */
export interface VaryBy {
  path: boolean;
  headers: string[];
}

/** Rate limit check result */
export interface RateLimitResult {
  allowed: boolean;
  limit: number;
  remaining: number;
  reset_in_seconds: number;
  retry_after_seconds: number;
}

export interface RateLimiter {
  check(key: string): Promise<RateLimitResult>;
}
