import type { AuthorizationCode } from '../../types/token.js';
import type { AuthorizationCodeTokenRequest, TokenResponse } from '../../types/oauth.js';
import type { ClientService } from '../../services/client-service.js';
import type { TokenService } from '../../services/token-service.js';
import type { SessionManager } from '../../services/session-manager.js';
import type { PkceStorage } from '../../storage/records/pkce-storage.js';
import type { AuthorizationCodeStorage } from '../../storage/records/authorization-code-storage.js';
import type { Logger } from '../../utils/logger.js';
import { AuthError } from '../../errors/auth-error.js';
import { verifyCodeChallenge, isValidCodeVerifier } from '../../crypto/pkce.js';
import { generateJti } from '../../crypto/random.js';
import { GRANT_TYPE_AUTHORIZATION_CODE } from '../../config/constants.js';

export interface AuthorizationCodeHandlerOptions {
  clientService: ClientService;
  authorizationCodeStorage: AuthorizationCodeStorage;
  pkceStorage: PkceStorage;
  tokenService: TokenService;
  sessionManager: SessionManager;
  accessTokenTtl: number;
  refreshTokenTtl: number;
  logger: Logger;
  now?: () => number;
}

/**
 * Handle authorization code token exchange
 *
 * Every check runs before the code is marked used, and marking it used is a
 * compare-and-swap on the exact record that was checked: of any number of
 * concurrent exchanges of one code, exactly one mints tokens. The ids of
 * those tokens go into the same write, so a replay that arrives while they
 * are still being minted can already revoke them.
 */
export function createAuthorizationCodeHandler(options: AuthorizationCodeHandlerOptions) {
  const {
    clientService,
    authorizationCodeStorage,
    pkceStorage,
    tokenService,
    sessionManager,
    accessTokenTtl,
    refreshTokenTtl,
  } = options;
  const now = options.now ?? Date.now;
  const logger = options.logger.child({ grant: GRANT_TYPE_AUTHORIZATION_CODE });

  // A replayed code means it leaked; tokens minted from it are revoked
  const rejectReuse = async (record: AuthorizationCode): Promise<never> => {
    logger.error('Authorization code reuse detected', {
      securityEvent: 'authorization_code_reuse',
      clientId: record.clientId,
      userId: record.userId,
    });

    if (record.issuedJtis) {
      await sessionManager.revoke(record.issuedJtis.access, accessTokenTtl);
      await sessionManager.revoke(record.issuedJtis.refresh, refreshTokenTtl);
    }

    throw new AuthError({ kind: 'code_reused' });
  };

  return async (request: AuthorizationCodeTokenRequest): Promise<TokenResponse> => {
    const { code, codeVerifier, redirectUri, clientId } = request;

    if (!code) {
      throw new AuthError({ kind: 'invalid_request', detail: 'Missing code parameter' });
    }
    if (!redirectUri) {
      throw new AuthError({ kind: 'invalid_request', detail: 'Missing redirect_uri parameter' });
    }
    if (!codeVerifier) {
      throw new AuthError({
        kind: 'invalid_request',
        detail: 'Missing code_verifier parameter (PKCE required)',
      });
    }
    if (!clientId) {
      throw new AuthError({ kind: 'invalid_request', detail: 'Missing client_id parameter' });
    }

    const current = await authorizationCodeStorage.find(code);
    if (!current) {
      throw new AuthError({ kind: 'invalid_code' });
    }

    const authCode = current.record;

    // Reuse is detected whoever presents the code
    if (authCode.used) {
      return rejectReuse(authCode);
    }

    await clientService.requireClient(clientId, GRANT_TYPE_AUTHORIZATION_CODE);

    if (now() >= authCode.expiresAt) {
      await authorizationCodeStorage.delete(code);
      throw new AuthError({ kind: 'code_expired' });
    }

    if (
      !isValidCodeVerifier(codeVerifier) ||
      !verifyCodeChallenge(codeVerifier, authCode.codeChallenge, authCode.codeChallengeMethod)
    ) {
      throw new AuthError({ kind: 'invalid_pkce_verifier' });
    }

    if (authCode.clientId !== clientId || authCode.redirectUri !== redirectUri) {
      throw new AuthError({ kind: 'client_mismatch' });
    }

    const jtis = { access: generateJti(), refresh: generateJti() };
    const consumed = await authorizationCodeStorage.markUsed(current, jtis);
    if (!consumed) {
      // Lost the race: someone else changed or removed the record
      const latest = await authorizationCodeStorage.find(code);
      if (latest?.record.used) {
        return rejectReuse(latest.record);
      }
      throw new AuthError({ kind: 'invalid_code' });
    }

    const { response } = await tokenService.generateTokenResponse({
      userId: consumed.userId,
      scopes: consumed.scopes,
      clientId: consumed.clientId,
      jtis,
    });

    await pkceStorage.delete(consumed.state);

    logger.info('Authorization code exchanged', {
      clientId: consumed.clientId,
      userId: consumed.userId,
    });

    return response;
  };
}
