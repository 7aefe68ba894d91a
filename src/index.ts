// Application
export { createAuthServer, type AuthServerOptions } from './app.js';
export { createAuthCore, type AuthCore, type AuthCoreOptions } from './core.js';

// Configuration
export { loadConfig, getConfig, type Config } from './config/index.js';
export { loadClients } from './config/clients.js';

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Storage
export type * from './storage/interfaces/index.js';
export { MemoryCredentialStore, MemoryClientRegistry, MemoryUserDirectory } from './storage/memory/index.js';
export { RedisCredentialStore } from './storage/redis/credential-store.js';

export {
  PkceStorage,
  AuthorizationCodeStorage,
  DeviceCodeStorage,
  type Versioned,
} from './storage/records/index.js';

// Middleware for services that accept this core's access tokens
export * from './middleware/index.js';

// PKCE, user codes and token signing
export * from './crypto/index.js';

// Services
export { TokenIssuer } from './services/token-issuer.js';
export { SessionManager } from './services/session-manager.js';
export { RateLimiter } from './services/rate-limiter.js';

// Utilities
export { createLogger, silentLogger, type Logger } from './utils/logger.js';
