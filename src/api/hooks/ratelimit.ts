/**
 * Rate Limiting Hook
 *
 * Fastify onRequest hook, so a rejected request is answered before its
 * body is read. Sets standard X-RateLimit-* headers on every response it
 * sees; rejections also get Retry-After and a 429.
 */

import { FastifyRequest, FastifyReply, onRequestAsyncHookHandler } from 'fastify';
import { rateLimitKey } from '../../utils/ratelimit';
import { RateLimiter, VaryBy } from '../../types/ratelimit';
import { RateLimitExceeded } from '../schemas';

export function createRateLimitHook(limiter: RateLimiter, varyBy: VaryBy): onRequestAsyncHookHandler {
  return async function rateLimitHook(request: FastifyRequest, reply: FastifyReply) {
    // Matched route, not the raw URL: percent-encoded variants of a path
    // all route here and must share one bucket
    const path = request.routeOptions.url ?? request.url.split('?')[0];
    const key = rateLimitKey(path, request.headers, varyBy);

    const result = await limiter.check(key);

    reply.header('X-RateLimit-Limit', String(result.limit));
    reply.header('X-RateLimit-Remaining', String(result.remaining));
    reply.header('X-RateLimit-Reset', String(result.reset_in_seconds));

    if (!result.allowed) {
      request.log.info({ key, retryAfter: result.retry_after_seconds }, 'Rate limit exceeded');

      const body: RateLimitExceeded = {
        error: 'Rate limit exceeded. Try again later.',
        retry_after_seconds: result.retry_after_seconds,
      };

      reply.header('Retry-After', String(result.retry_after_seconds));
      return reply.status(429).send(body);
    }
  };
}
