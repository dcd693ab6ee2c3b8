/**
 * Rate Limiting Configuration
 */

import { RateLimitQuota, VaryBy } from '../types/ratelimit';

/** 2 requests/second steady state, 2 back-to-back */
export const DEFAULT_RATE_LIMIT_QUOTA: RateLimitQuota = {
  maxRate: 2,
  maxBurst: 2,
};

/** Max buckets held in memory before LRU eviction */
export const RATE_LIMIT_STORE_CAPACITY = 65536;

/** Buckets are per path and per forwarded client address */
export const RATE_LIMIT_VARY_BY: VaryBy = {
  path: true,
  headers: ['X-Forwarded-For'],
};
