// src/middleware/rateLimit.ts
// Rate limiting for routes that call AI capabilities

import rateLimit from '@fastify/rate-limit';
import type { FastifyInstance, FastifyRequest } from 'fastify';

/**
 * Rate limits for routes that spend model or embedding calls.
 * Limits are per-user (or per-IP) per window.
 */
export const QA_RATE_LIMITS = {
  // Classification + generation per request
  query: { max: Number(process.env.RATE_LIMIT_QUERY) || 60, timeWindow: '1 minute' },

  // One embedding call per chunk
  ingest: { max: Number(process.env.RATE_LIMIT_INGEST) || 20, timeWindow: '1 minute' },
};

/**
 * Extract user identifier from request for rate limiting.
 * Priority: x-user-id > IP address
 */
function getUserKey(request: FastifyRequest): string {
  const userId = request.headers['x-user-id'];
  if (userId && typeof userId === 'string') {
    return `user:${userId}`;
  }

  return `ip:${request.ip}`;
}

/**
 * Register the rate limit plugin with Fastify.
 * Call this before route registration.
 */
export async function registerRateLimit(fastify: FastifyInstance): Promise<void> {
  await fastify.register(rateLimit, {
    // Not global: routes opt in via config.rateLimit
    global: false,

    max: 100,
    timeWindow: '1 minute',

    keyGenerator: getUserKey,

    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      error: 'rate_limited',
      message: `Rate limit exceeded. Try again in ${Math.ceil(context.ttl / 1000)} seconds.`,
      retryAfter: Math.ceil(context.ttl / 1000),
    }),

    addHeadersOnExceeding: {
      'x-ratelimit-limit': true,
      'x-ratelimit-remaining': true,
      'x-ratelimit-reset': true,
    },
    addHeaders: {
      'x-ratelimit-limit': true,
      'x-ratelimit-remaining': true,
      'x-ratelimit-reset': true,
      'retry-after': true,
    },
  });
}

/**
 * Route options that apply one of the limits above.
 */
export function getRateLimitConfig(routeType: keyof typeof QA_RATE_LIMITS) {
  return {
    config: {
      rateLimit: QA_RATE_LIMITS[routeType],
    },
  };
}
