import type { Context, MiddlewareHandler } from 'hono';
import type { AuthVariables } from '../types/hono.js';
import type { TokenClaims } from '../types/token.js';
import type { TokenIssuer } from '../services/token-issuer.js';
import type { SessionManager } from '../services/session-manager.js';
import type { IUserAuthenticator } from '../storage/interfaces/user-authenticator.js';
import { AuthError } from '../errors/auth-error.js';
import { scopeService } from '../services/scope-service.js';
import { HEADER_AUTHORIZATION } from '../config/constants.js';

export interface BearerAuthOptions {
  tokenIssuer: TokenIssuer;
  sessionManager: SessionManager;
  requiredScopes?: string[];
}

/**
 * Extract bearer token from Authorization header
 */
function extractBearerToken(authHeader: string): string | null {
  if (!authHeader.startsWith('Bearer ')) {
    return null;
  }
  return authHeader.slice(7).trim() || null;
}

/**
 * Verify an access token and reject revoked ones
 */
async function verifyBearer(
  authHeader: string,
  tokenIssuer: TokenIssuer,
  sessionManager: SessionManager
): Promise<TokenClaims> {
  const token = extractBearerToken(authHeader);
  if (!token) {
    throw new AuthError({ kind: 'token_invalid', detail: 'invalid authorization header format' });
  }

  const claims = await tokenIssuer.verifyAccessToken(token);
  if (await sessionManager.isRevoked(claims.jti)) {
    throw new AuthError({ kind: 'token_revoked' });
  }
  return claims;
}

/**
 * Middleware to validate bearer tokens (JWT access tokens)
 *
 * Sets `accessToken` in context variables on success
 */
export function bearerAuth(options: BearerAuthOptions): MiddlewareHandler<{
  Variables: AuthVariables;
}> {
  const { tokenIssuer, sessionManager, requiredScopes } = options;

  return async (c, next) => {
    const authHeader = c.req.header(HEADER_AUTHORIZATION);
    if (!authHeader) {
      throw new AuthError({ kind: 'token_invalid', detail: 'missing authorization header' });
    }

    const claims = await verifyBearer(authHeader, tokenIssuer, sessionManager);

    if (requiredScopes && !scopeService.hasAllScopes(claims.scopes, requiredScopes)) {
      throw new AuthError({ kind: 'insufficient_scope', required: requiredScopes });
    }

    c.set('accessToken', claims);
    await next();
  };
}

/**
 * Resolves the resource owner of an authorization request from a bearer
 * access token issued by this service
 */
export class BearerUserAuthenticator implements IUserAuthenticator {
  constructor(
    private readonly tokenIssuer: TokenIssuer,
    private readonly sessionManager: SessionManager
  ) {}

  async authenticate(c: Context): Promise<string | null> {
    const authHeader = c.req.header(HEADER_AUTHORIZATION);
    if (!authHeader) {
      return null;
    }

    const claims = await verifyBearer(authHeader, this.tokenIssuer, this.sessionManager);
    return claims.sub;
  }
}

/**
 * Claims set by `bearerAuth`; throws when the middleware did not run
 */
export function requireAccessToken(claims: TokenClaims | undefined): TokenClaims {
  if (!claims) {
    throw new AuthError({ kind: 'token_invalid', detail: 'missing access token' });
  }
  return claims;
}
