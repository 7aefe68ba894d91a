import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { AuthVariables } from '../../types/hono.js';
import type { AuthCore } from '../../core.js';
import { AuthError, isAuthError } from '../../errors/auth-error.js';
import { rateLimit } from '../../middleware/rate-limiter.js';
import { rejectInvalid } from '../../middleware/validation.js';

const authorizeQuerySchema = z.object({
  client_id: z.string().optional(),
  redirect_uri: z.string().optional(),
  response_type: z.string().optional(),
  scope: z.string().optional(),
  state: z.string().optional(),
  code_challenge: z.string().optional(),
  code_challenge_method: z.string().optional(),
});

/**
 * Create authorization endpoint routes
 *
 * Errors about the client or redirect URI are answered directly; every later
 * error is sent back to the validated redirect URI.
 */
export function createAuthorizeRoutes(core: AuthCore) {
  const { grants, userAuthenticator } = core;

  const router = new Hono<{ Variables: AuthVariables }>();

  // GET /auth/authorize
  router.get(
    '/',
    rateLimit(core.rateLimiter, 'authorize'),
    zValidator('query', authorizeQuerySchema, rejectInvalid),
    async (c) => {
      const query = c.req.valid('query');

      const { client, redirectUri } = await grants.authorize.resolveClient(
        query.client_id,
        query.redirect_uri
      );

      const userId = await userAuthenticator.authenticate(c);
      if (!userId) {
        if (userAuthenticator.loginUrl) {
          return c.redirect(userAuthenticator.loginUrl(c.req.url));
        }
        throw new AuthError({ kind: 'token_invalid', detail: 'authentication required' });
      }

      try {
        const result = await grants.authorize.authorize(
          client,
          {
            clientId: client.clientId,
            redirectUri,
            responseType: query.response_type,
            scope: query.scope,
            state: query.state,
            codeChallenge: query.code_challenge,
            codeChallengeMethod: query.code_challenge_method,
          },
          userId
        );

        const target = new URL(redirectUri);
        target.searchParams.set('code', result.code);
        target.searchParams.set('state', result.state);
        return c.redirect(target.toString());
      } catch (error) {
        if (isAuthError(error) && !error.isInternal) {
          const target = new URL(redirectUri);
          for (const [key, value] of new URLSearchParams(error.toOAuthError(query.state).toQueryString())) {
            target.searchParams.set(key, value);
          }
          return c.redirect(target.toString());
        }
        throw error;
      }
    }
  );

  return router;
}
