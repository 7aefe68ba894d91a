import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { AuthVariables } from '../../types/hono.js';
import type { TokenResponse } from '../../types/oauth.js';
import type { AuthCore } from '../../core.js';
import { AuthError } from '../../errors/auth-error.js';
import { rateLimit } from '../../middleware/rate-limiter.js';
import { rejectInvalid } from '../../middleware/validation.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_REFRESH_TOKEN,
  GRANT_TYPE_DEVICE_CODE,
} from '../../config/constants.js';

const tokenRequestSchema = z.object({
  grant_type: z
    .string({ required_error: 'Missing grant_type parameter' })
    .min(1, 'Missing grant_type parameter'),
  client_id: z.string().optional(),
  code: z.string().optional(),
  code_verifier: z.string().optional(),
  redirect_uri: z.string().optional(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
  device_code: z.string().optional(),
});

/**
 * Create token endpoint routes
 */
export function createTokenRoutes(core: AuthCore) {
  const { grants } = core;

  const router = new Hono<{ Variables: AuthVariables }>();

  // POST /auth/token
  router.post(
    '/',
    rateLimit(core.rateLimiter, 'token'),
    zValidator('form', tokenRequestSchema, rejectInvalid),
    async (c) => {
      // Set cache control headers
      c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
      c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

      const body = c.req.valid('form');
      let response: TokenResponse;

      switch (body.grant_type) {
        case GRANT_TYPE_AUTHORIZATION_CODE:
          response = await grants.authorizationCode({
            code: body.code,
            codeVerifier: body.code_verifier,
            redirectUri: body.redirect_uri,
            clientId: body.client_id,
          });
          break;

        case GRANT_TYPE_REFRESH_TOKEN:
          response = await grants.refreshToken({
            refreshToken: body.refresh_token,
            clientId: body.client_id,
            scope: body.scope,
          });
          break;

        case GRANT_TYPE_DEVICE_CODE:
          response = await grants.deviceCode({
            deviceCode: body.device_code,
            clientId: body.client_id,
          });
          break;

        default:
          throw new AuthError({ kind: 'unsupported_grant_type', grantType: body.grant_type });
      }

      return c.json(response);
    }
  );

  return router;
}
