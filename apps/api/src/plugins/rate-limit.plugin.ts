import { type FastifyInstance, type FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import rateLimit from '@fastify/rate-limit';

// ---------------------------------------------------------------------------
// Rate limit tiers (per client IP):
//   Default:      100 req/min
//   Run uploads:  5 req/min
// ---------------------------------------------------------------------------

export interface RateLimitPluginOptions {
  /** Override default max for testing. */
  defaultMax?: number;
}

function clientKey(request: FastifyRequest): string {
  return request.ip;
}

async function rateLimitPlugin(app: FastifyInstance, opts: RateLimitPluginOptions) {
  const defaultMax = opts.defaultMax ?? 100;

  await app.register(rateLimit, {
    max: defaultMax,
    timeWindow: '1 minute',
    keyGenerator: clientKey,
    // Thrown by the plugin and rendered by the error handler.
    errorResponseBuilder: (_request, context) => ({
      statusCode: context.statusCode,
      code: 'RATE_LIMITED',
      message: `Rate limit exceeded. Retry after ${Math.ceil(context.ttl / 1000)} seconds.`,
    }),
  });
}

// ---------------------------------------------------------------------------
// Route-level rate limit config factories
// ---------------------------------------------------------------------------

/**
 * Billing run submission: 5 req/min per IP. Each accepted upload starts a
 * worker that calls the remote PMS for every row.
 * Use as route-level config: { config: { rateLimit: uploadRateLimit() } }
 */
export function uploadRateLimit() {
  return {
    max: 5,
    timeWindow: '1 minute',
    keyGenerator: clientKey,
  };
}

// ---------------------------------------------------------------------------
// Export
// ---------------------------------------------------------------------------

export const rateLimitPluginFp = fp(rateLimitPlugin, {
  name: 'rate-limit-plugin',
});

export { rateLimitPlugin };
