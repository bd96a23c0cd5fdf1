// src/middleware/rateLimit.ts
// Request throttling for the public verify route.
// Complements the per-code attempt budget: that one protects a single code,
// this one caps how fast any caller can probe.

import rateLimit from '@fastify/rate-limit';
import type { FastifyInstance, FastifyRequest } from 'fastify';

export interface RouteRateLimit {
  max: number;
  timeWindow: string;
  /** Overrides the plugin-wide caller key for this route. */
  keyGenerator?: (request: FastifyRequest) => string;
}

/**
 * Identify the caller for rate limiting.
 * Priority: x-user-id > IP address
 */
function getCallerKey(request: FastifyRequest): string {
  const userId = request.headers['x-user-id'];
  if (userId && typeof userId === 'string') {
    return `user:${userId}`;
  }
  return clientIpKey(request);
}

/**
 * Key on the client address only. For unauthenticated routes, where
 * x-user-id is caller-supplied and can be rotated freely.
 */
export function clientIpKey(request: FastifyRequest): string {
  return `ip:${request.ip}`;
}

/**
 * Register the rate limit plugin. Not global: routes opt in via routeRateLimit().
 * Call before route registration.
 */
export async function registerRateLimit(fastify: FastifyInstance): Promise<void> {
  await fastify.register(rateLimit, {
    global: false,
    max: 100,
    timeWindow: '1 minute',
    keyGenerator: getCallerKey,

    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      error: 'Too Many Requests',
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

/** Route options enabling the plugin with the given limit. */
export function routeRateLimit(limit: RouteRateLimit) {
  return {
    config: {
      rateLimit: {
        max: limit.max,
        timeWindow: limit.timeWindow,
        ...(limit.keyGenerator ? { keyGenerator: limit.keyGenerator } : {}),
      },
    },
  };
}
