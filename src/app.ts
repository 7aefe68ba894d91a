import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AuthVariables } from './types/hono.js';
import type { AuthCore } from './core.js';
import { createErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import {
  createAuthorizeRoutes,
  createTokenRoutes,
  createRevokeRoutes,
  createDeviceRoutes,
  createSessionRoutes,
} from './routes/oauth/index.js';

export interface AuthServerOptions {
  enableCors?: boolean;
  enableLogging?: boolean;
}

/**
 * Create the HTTP application for the authorization core
 */
export function createAuthServer(
  core: AuthCore,
  options: AuthServerOptions = {}
): Hono<{ Variables: AuthVariables }> {
  const { enableCors = true, enableLogging = true } = options;
  const { logger, store } = core;

  const app = new Hono<{ Variables: AuthVariables }>();

  // Global error handler
  app.onError(createErrorHandler(logger));

  // Security headers
  app.use('*', securityHeaders(core.config.server.nodeEnv === 'production'));

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger(logger));
  }

  // CORS (needed for token endpoint from SPAs)
  if (enableCors) {
    app.use(
      '/auth/*',
      cors({
        origin: '*',
        allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
        allowHeaders: ['Authorization', 'Content-Type', 'X-Client-ID'],
        exposeHeaders: ['WWW-Authenticate', 'X-RateLimit-Limit', 'X-RateLimit-Remaining', 'Retry-After'],
        maxAge: 86400,
      })
    );
  }

  // Health check
  app.get('/health', async (c) => {
    const healthy = await store.isHealthy();
    return c.json(
      { status: healthy ? 'ok' : 'degraded', store: healthy ? 'ok' : 'unavailable' },
      healthy ? 200 : 503
    );
  });

  app.route('/auth/authorize', createAuthorizeRoutes(core));
  app.route('/auth/token', createTokenRoutes(core));
  app.route('/auth/revoke', createRevokeRoutes(core));
  app.route('/auth/device', createDeviceRoutes(core));
  app.route('/auth/sessions', createSessionRoutes(core));

  return app;
}
