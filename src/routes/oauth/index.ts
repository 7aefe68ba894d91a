export { createAuthorizeRoutes } from './authorize.js';
export { createTokenRoutes } from './token.js';
export { createRevokeRoutes } from './revoke.js';
export { createDeviceRoutes } from './device.js';
export { createSessionRoutes } from './sessions.js';
