// src/middleware/rateLimit.ts
// Rate limiting for analysis endpoints (each one fans out to the classifier)

import rateLimit from '@fastify/rate-limit';
import type { FastifyInstance, FastifyRequest } from 'fastify';

/**
 * Per-client limits for routes that call the classifier.
 * A batch counts once but may hold several documents, hence the lower ceiling.
 */
export const ANALYSIS_RATE_LIMITS = {
  analyze: { max: 60, timeWindow: '1 hour' },
  upload: { max: 60, timeWindow: '1 hour' },
  batch: { max: 10, timeWindow: '1 hour' },
};

export type AnalysisRouteType = keyof typeof ANALYSIS_RATE_LIMITS;

/**
 * Extract the client identifier for rate limiting.
 * Priority: x-client-id > IP address
 */
function getClientKey(request: FastifyRequest): string {
  const clientId = request.headers['x-client-id'];
  if (clientId && typeof clientId === 'string') {
    return `client:${clientId}`;
  }
  return `ip:${request.ip}`;
}

/**
 * Register the rate limit plugin with Fastify.
 * Call this before route registration.
 */
export async function registerRateLimit(fastify: FastifyInstance): Promise<void> {
  await fastify.register(rateLimit, {
    // Only routes that opt in through getRateLimitConfig are limited
    global: false,

    max: 100,
    timeWindow: '1 hour',

    keyGenerator: getClientKey,

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

export function getRateLimitConfig(routeType: AnalysisRouteType) {
  return {
    config: {
      rateLimit: ANALYSIS_RATE_LIMITS[routeType],
    },
  };
}
