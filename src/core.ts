import type { Config } from './config/index.js';
import type { ICredentialStore } from './storage/interfaces/credential-store.js';
import type { IClientRegistry } from './storage/interfaces/client-registry.js';
import type { IUserDirectory } from './storage/interfaces/user-directory.js';
import type { IUserAuthenticator } from './storage/interfaces/user-authenticator.js';
import type { Logger } from './utils/logger.js';
import { createLogger } from './utils/logger.js';
import { MemoryUserDirectory } from './storage/memory/user-directory.js';
import { PkceStorage } from './storage/records/pkce-storage.js';
import { AuthorizationCodeStorage } from './storage/records/authorization-code-storage.js';
import { DeviceCodeStorage } from './storage/records/device-code-storage.js';
import { TokenIssuer } from './services/token-issuer.js';
import { SessionManager } from './services/session-manager.js';
import { TokenService } from './services/token-service.js';
import { RateLimiter } from './services/rate-limiter.js';
import { ClientService } from './services/client-service.js';
import { BearerUserAuthenticator } from './middleware/bearer-auth.js';
import { createAuthorizeHandler } from './grants/authorization-code/authorize.js';
import { createAuthorizationCodeHandler } from './grants/authorization-code/handler.js';
import { createDeviceAuthorizationHandler } from './grants/device-code/device-authorization.js';
import { createDeviceDecisionHandlers } from './grants/device-code/approve.js';
import { createDeviceCodeHandler } from './grants/device-code/handler.js';
import { createRefreshTokenHandler } from './grants/refresh-token/handler.js';

export interface AuthCoreOptions {
  config: Config;
  store: ICredentialStore;
  clients: IClientRegistry;
  users?: IUserDirectory;
  userAuthenticator?: IUserAuthenticator;
  logger?: Logger;
  /**
   * Clock in epoch milliseconds
   */
  now?: () => number;
}

/**
 * Wire every component of the authorization core around one credential store
 */
export function createAuthCore(options: AuthCoreOptions) {
  const { config, store, clients } = options;
  const logger = options.logger ?? createLogger(config.logging.level);
  const now = options.now ?? Date.now;

  const tokenIssuer = new TokenIssuer({
    secret: config.secrets.jwtSecret,
    issuer: config.server.issuer,
    accessTokenTtl: config.tokens.accessTokenTtl,
    refreshTokenTtl: config.tokens.refreshTokenTtl,
    now,
  });

  const sessionManager = new SessionManager(store, {
    refreshTokenTtl: config.tokens.refreshTokenTtl,
    logger,
    now,
  });

  const userAuthenticator: IUserAuthenticator =
    options.userAuthenticator ?? new BearerUserAuthenticator(tokenIssuer, sessionManager);

  const tokenService = new TokenService(
    tokenIssuer,
    sessionManager,
    options.users ?? new MemoryUserDirectory()
  );

  const rateLimiter = new RateLimiter(store, {
    limits: config.rateLimit,
    bypassSecret: config.secrets.internalServiceSecret,
  });

  const clientService = new ClientService(clients);
  const pkceStorage = new PkceStorage(store);
  const authorizationCodeStorage = new AuthorizationCodeStorage(store, { now });
  const deviceCodeStorage = new DeviceCodeStorage(store, { now });

  const grants = {
    authorize: createAuthorizeHandler({
      clientService,
      pkceStorage,
      authorizationCodeStorage,
      now,
    }),
    authorizationCode: createAuthorizationCodeHandler({
      clientService,
      authorizationCodeStorage,
      pkceStorage,
      tokenService,
      sessionManager,
      accessTokenTtl: config.tokens.accessTokenTtl,
      refreshTokenTtl: config.tokens.refreshTokenTtl,
      logger,
      now,
    }),
    refreshToken: createRefreshTokenHandler({
      tokenIssuer,
      tokenService,
      sessionManager,
      logger,
    }),
    deviceAuthorization: createDeviceAuthorizationHandler({
      clientService,
      deviceCodeStorage,
      verificationUri: config.server.verificationUri,
      interval: config.tokens.deviceCodeInterval,
      logger,
    }),
    deviceDecisions: createDeviceDecisionHandlers({ deviceCodeStorage, logger, now }),
    deviceCode: createDeviceCodeHandler({
      clientService,
      deviceCodeStorage,
      tokenService,
      logger,
      now,
    }),
  };

  return {
    config,
    store,
    logger,
    tokenIssuer,
    sessionManager,
    tokenService,
    rateLimiter,
    userAuthenticator,
    grants,
  };
}

export type AuthCore = ReturnType<typeof createAuthCore>;
