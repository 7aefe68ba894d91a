export { createErrorHandler, securityHeaders, requestLogger } from './error-handler.js';
export { rateLimit, clientKey } from './rate-limiter.js';
export { bearerAuth, BearerUserAuthenticator, requireAccessToken } from './bearer-auth.js';
export { rejectInvalid } from './validation.js';
