import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { AuthVariables } from '../../types/hono.js';
import type { AuthCore } from '../../core.js';
import { rateLimit } from '../../middleware/rate-limiter.js';
import { bearerAuth, requireAccessToken } from '../../middleware/bearer-auth.js';
import { rejectInvalid } from '../../middleware/validation.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
} from '../../config/constants.js';

const deviceRequestSchema = z.object({
  client_id: z.string().optional(),
  scope: z.string().optional(),
});

const decisionSchema = z.object({
  user_code: z.string({ required_error: 'Missing user_code parameter' }).min(1, 'Missing user_code parameter'),
});

const pollQuerySchema = z.object({
  device_code: z.string({ required_error: 'Missing device_code parameter' }).min(1, 'Missing device_code parameter'),
  client_id: z.string().optional(),
});

/**
 * Create device authorization routes
 * RFC 8628
 */
export function createDeviceRoutes(core: AuthCore) {
  const { grants, tokenIssuer, sessionManager } = core;

  const router = new Hono<{ Variables: AuthVariables }>();
  const authenticated = bearerAuth({ tokenIssuer, sessionManager });

  // POST /auth/device
  router.post(
    '/',
    rateLimit(core.rateLimiter, 'device'),
    zValidator('form', deviceRequestSchema, rejectInvalid),
    async (c) => {
      const body = c.req.valid('form');

      c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
      c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

      const response = await grants.deviceAuthorization({
        clientId: body.client_id,
        scope: body.scope,
      });
      return c.json(response);
    }
  );

  // POST /auth/device/approve
  router.post('/approve', authenticated, zValidator('json', decisionSchema, rejectInvalid), async (c) => {
    const claims = requireAccessToken(c.get('accessToken'));
    const { user_code: userCode } = c.req.valid('json');

    await grants.deviceDecisions.approve(userCode, claims.sub);
    return c.json({ status: 'approved' });
  });

  // POST /auth/device/deny
  router.post('/deny', authenticated, zValidator('json', decisionSchema, rejectInvalid), async (c) => {
    const claims = requireAccessToken(c.get('accessToken'));
    const { user_code: userCode } = c.req.valid('json');

    await grants.deviceDecisions.deny(userCode, claims.sub);
    return c.json({ status: 'denied' });
  });

  // GET /auth/device/poll
  router.get('/poll', zValidator('query', pollQuerySchema, rejectInvalid), async (c) => {
    const query = c.req.valid('query');

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    const response = await grants.deviceCode({
      deviceCode: query.device_code,
      clientId: query.client_id,
    });
    return c.json(response);
  });

  return router;
}
