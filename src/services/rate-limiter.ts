import type { ICredentialStore } from '../storage/interfaces/credential-store.js';
import type { EndpointLimit, RateLimitedEndpoint } from '../config/index.js';
import type { RateLimitInfo } from '../types/hono.js';
import { AuthError } from '../errors/auth-error.js';
import { constantTimeCompare } from '../crypto/hash.js';
import { KEY_PREFIX_RATE_LIMIT } from '../config/constants.js';

export interface RateLimiterOptions {
  limits: Record<RateLimitedEndpoint, EndpointLimit>;
  bypassSecret?: string;
}

/**
 * Fixed-window request counter per endpoint class and client key.
 *
 * A counter is created with the window TTL on its first request and is never
 * extended, so every client's window resets exactly `windowSeconds` after it
 * opened.
 */
export class RateLimiter {
  constructor(
    private readonly store: ICredentialStore,
    private readonly options: RateLimiterOptions
  ) {}

  limitFor(endpoint: RateLimitedEndpoint): EndpointLimit {
    return this.options.limits[endpoint];
  }

  /**
   * True when the presented credential equals the configured bypass secret
   */
  isBypassed(presented: string | undefined): boolean {
    const secret = this.options.bypassSecret;
    if (!secret || !presented) {
      return false;
    }
    return constantTimeCompare(presented, secret);
  }

  /**
   * Count one request. Throws `rate_limited` once the count exceeds the limit.
   */
  async check(
    endpoint: RateLimitedEndpoint,
    clientKey: string,
    bypassCredential?: string
  ): Promise<RateLimitInfo> {
    const { maxRequests, windowSeconds } = this.limitFor(endpoint);

    if (this.isBypassed(bypassCredential)) {
      return { endpoint, limit: maxRequests, remaining: maxRequests, bypassed: true };
    }

    const { count, ttlSeconds } = await this.store.increment(
      `${KEY_PREFIX_RATE_LIMIT}${endpoint}:${clientKey}`,
      windowSeconds
    );

    if (count > maxRequests) {
      throw new AuthError({
        kind: 'rate_limited',
        limit: maxRequests,
        count,
        retryAfter: Math.max(1, ttlSeconds),
      });
    }

    return { endpoint, limit: maxRequests, remaining: maxRequests - count, bypassed: false };
  }
}
