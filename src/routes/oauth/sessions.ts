import { Hono } from 'hono';
import type { AuthVariables } from '../../types/hono.js';
import type { AuthCore } from '../../core.js';
import { bearerAuth, requireAccessToken } from '../../middleware/bearer-auth.js';

/**
 * Session listing and "log out everywhere" for the bearer's user
 */
export function createSessionRoutes(core: AuthCore) {
  const { tokenIssuer, sessionManager } = core;

  const router = new Hono<{ Variables: AuthVariables }>();
  router.use('*', bearerAuth({ tokenIssuer, sessionManager }));

  // GET /auth/sessions
  router.get('/', async (c) => {
    const claims = requireAccessToken(c.get('accessToken'));
    const sessions = await sessionManager.listSessions(claims.sub);

    return c.json({
      sessions: sessions.map((session) => ({
        id: session.jti,
        device_label: session.deviceLabel ?? null,
        created_at: new Date(session.createdAt).toISOString(),
      })),
    });
  });

  // DELETE /auth/sessions[?except=<session id>]
  router.delete('/', async (c) => {
    const claims = requireAccessToken(c.get('accessToken'));
    const revoked = await sessionManager.invalidateAllSessions(claims.sub, c.req.query('except'));

    return c.json({ revoked });
  });

  return router;
}
