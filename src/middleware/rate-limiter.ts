import type { MiddlewareHandler } from 'hono';
import type { AuthVariables } from '../types/hono.js';
import type { RateLimitedEndpoint } from '../config/index.js';
import type { RateLimiter } from '../services/rate-limiter.js';
import {
  HEADER_CLIENT_ID,
  HEADER_INTERNAL_SERVICE,
  HEADER_RATE_LIMIT_LIMIT,
  HEADER_RATE_LIMIT_REMAINING,
} from '../config/constants.js';

type HeaderReader = (name: string) => string | undefined;

/**
 * Identify the caller: explicit client id first, then the client address
 */
export function clientKey(header: HeaderReader): string {
  return (
    header(HEADER_CLIENT_ID)?.trim() ||
    header('x-forwarded-for')?.split(',')[0]?.trim() ||
    header('x-real-ip')?.trim() ||
    'unknown'
  );
}

/**
 * Endpoint-class rate limiter backed by the shared credential store
 *
 * Rejections and store failures are thrown and rendered by the error handler.
 */
export function rateLimit(
  limiter: RateLimiter,
  endpoint: RateLimitedEndpoint
): MiddlewareHandler<{ Variables: AuthVariables }> {
  return async (c, next) => {
    const header: HeaderReader = (name) => c.req.header(name);

    const info = await limiter.check(endpoint, clientKey(header), header(HEADER_INTERNAL_SERVICE));
    c.set('rateLimit', info);

    if (!info.bypassed) {
      c.header(HEADER_RATE_LIMIT_LIMIT, String(info.limit));
      c.header(HEADER_RATE_LIMIT_REMAINING, String(info.remaining));
    }

    await next();
  };
}
