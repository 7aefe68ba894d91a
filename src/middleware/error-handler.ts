import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { AuthVariables } from '../types/hono.js';
import type { Logger } from '../utils/logger.js';
import { OAuthError } from '../errors/oauth-error.js';
import { AuthError, describeFailure } from '../errors/auth-error.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  HEADER_WWW_AUTHENTICATE,
  HEADER_RATE_LIMIT_LIMIT,
  HEADER_RATE_LIMIT_REMAINING,
  HEADER_RETRY_AFTER,
} from '../config/constants.js';

/**
 * Global error handler
 *
 * Transforms errors into RFC-compliant OAuth error responses. Backing-service
 * detail is logged, never returned.
 */
export function createErrorHandler(logger: Logger): ErrorHandler<{ Variables: AuthVariables }> {
  return (err, c) => {
    // Set no-cache headers for error responses
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    if (err instanceof AuthError) {
      const { failure } = err;
      const { status } = describeFailure(failure);

      if (err.isInternal) {
        logger.error(err.message, { kind: failure.kind, path: c.req.path, cause: err.cause });
      } else {
        logger.debug('Request rejected', { kind: failure.kind, path: c.req.path });
      }

      if (failure.kind === 'rate_limited') {
        c.header(HEADER_RATE_LIMIT_LIMIT, String(failure.limit));
        c.header(HEADER_RATE_LIMIT_REMAINING, '0');
        c.header(HEADER_RETRY_AFTER, String(failure.retryAfter));
      }

      if (status === 401) {
        c.header(HEADER_WWW_AUTHENTICATE, 'Bearer error="invalid_token"');
      }

      return c.json(err.toOAuthError().toJSON(), status);
    }

    if (err instanceof OAuthError) {
      return c.json(err.toJSON(), err.statusCode);
    }

    // Malformed bodies rejected by Hono itself
    if (err instanceof HTTPException && err.status < 500) {
      return c.json({ error: 'invalid_request', error_description: err.message }, 400);
    }

    logger.error('Unhandled error', { path: c.req.path, error: err });

    const serverError = new AuthError({ kind: 'internal', detail: err.message }).toOAuthError();
    return c.json(serverError.toJSON(), 500);
  };
}

/**
 * Security headers middleware
 */
export function securityHeaders(production: boolean): MiddlewareHandler<{ Variables: AuthVariables }> {
  return async (c, next) => {
    await next();

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    // Referrer policy
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    // Strict Transport Security (enable in production with HTTPS)
    if (production) {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(logger: Logger): MiddlewareHandler<{ Variables: AuthVariables }> {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    // Don't log sensitive data (query strings carry codes)
    logger.info('Request completed', {
      method,
      path,
      status: c.res.status,
      duration: Date.now() - start,
    });
  };
}
