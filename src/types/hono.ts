import type { TokenClaims } from './token.js';

/**
 * Rate limit info for the current request
 */
export interface RateLimitInfo {
  endpoint: string;
  limit: number;
  remaining: number;
  bypassed: boolean;
}

/**
 * Extended Hono context variables
 */
export interface AuthVariables {
  accessToken?: TokenClaims;
  rateLimit?: RateLimitInfo;
}
