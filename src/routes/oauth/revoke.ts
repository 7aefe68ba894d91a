import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { AuthVariables } from '../../types/hono.js';
import type { TokenClaims } from '../../types/token.js';
import type { AuthCore } from '../../core.js';
import { isAuthError } from '../../errors/auth-error.js';
import { rateLimit } from '../../middleware/rate-limiter.js';
import { rejectInvalid } from '../../middleware/validation.js';

const revokeRequestSchema = z.object({
  token: z.string({ required_error: 'Missing token parameter' }).min(1, 'Missing token parameter'),
  token_type_hint: z
    .enum(['access_token', 'refresh_token'], {
      errorMap: () => ({ message: 'token_type_hint must be access_token or refresh_token' }),
    })
    .optional(),
  client_id: z.string().optional(),
});

type TokenHint = z.infer<typeof revokeRequestSchema>['token_type_hint'];

/**
 * Create token revocation endpoint routes
 *
 * RFC 7009
 */
export function createRevokeRoutes(core: AuthCore) {
  const { tokenIssuer, sessionManager, logger } = core;

  const router = new Hono<{ Variables: AuthVariables }>();

  const verifyAccess = (token: string) => tokenIssuer.verifyAccessToken(token);
  const verifyRefresh = (token: string) => tokenIssuer.verifyRefreshToken(token);

  /**
   * Access verification is tried first unless the client hints at a refresh
   * token. Null when the token is neither.
   */
  const identify = async (token: string, hint?: TokenHint): Promise<TokenClaims | null> => {
    const order = hint === 'refresh_token' ? [verifyRefresh, verifyAccess] : [verifyAccess, verifyRefresh];

    for (const verify of order) {
      try {
        return await verify(token);
      } catch (error) {
        if (!isAuthError(error, 'token_invalid') && !isAuthError(error, 'token_expired')) {
          throw error;
        }
      }
    }
    return null;
  };

  // POST /auth/revoke
  router.post(
    '/',
    rateLimit(core.rateLimiter, 'revoke'),
    zValidator('form', revokeRequestSchema, rejectInvalid),
    async (c) => {
      const { token, token_type_hint: hint, client_id: clientId } = c.req.valid('form');

      // RFC 7009: invalid tokens answer 200 too, which prevents token fishing
      const claims = await identify(token, hint);
      if (!claims) {
        return c.json({});
      }

      // Don't reveal that the token belongs to a different client
      if (clientId && claims.client_id && claims.client_id !== clientId) {
        return c.json({});
      }

      const revoked = await sessionManager.revoke(claims.jti, tokenIssuer.remainingLifetime(claims));
      if (revoked) {
        logger.info('Token revoked', { tokenUse: claims.token_use, userId: claims.sub });
      }

      return c.json({});
    }
  );

  return router;
}
