import type { RefreshTokenRequest, TokenResponse } from '../../types/oauth.js';
import type { TokenIssuer } from '../../services/token-issuer.js';
import type { TokenService } from '../../services/token-service.js';
import type { SessionManager } from '../../services/session-manager.js';
import type { Logger } from '../../utils/logger.js';
import { AuthError } from '../../errors/auth-error.js';
import { scopeService } from '../../services/scope-service.js';
import { GRANT_TYPE_REFRESH_TOKEN } from '../../config/constants.js';

export interface RefreshTokenHandlerOptions {
  tokenIssuer: TokenIssuer;
  tokenService: TokenService;
  sessionManager: SessionManager;
  logger: Logger;
}

/**
 * Handle refresh token grant
 *
 * RFC 6749 Section 6
 *
 * Implements refresh token rotation:
 * - Each refresh token can only be used once
 * - The old jti is revoked before the new pair is minted
 * - Of two concurrent refreshes with one token, only one gets new tokens
 */
export function createRefreshTokenHandler(options: RefreshTokenHandlerOptions) {
  const { tokenIssuer, tokenService, sessionManager } = options;
  const logger = options.logger.child({ grant: GRANT_TYPE_REFRESH_TOKEN });

  return async (request: RefreshTokenRequest): Promise<TokenResponse> => {
    if (!request.refreshToken) {
      throw new AuthError({ kind: 'invalid_request', detail: 'Missing refresh_token parameter' });
    }

    const claims = await tokenIssuer.verifyRefreshToken(request.refreshToken);

    if (request.clientId && claims.client_id && claims.client_id !== request.clientId) {
      throw new AuthError({ kind: 'client_mismatch' });
    }

    // Checked before revoking so a bad scope request keeps the token usable
    const scopes = scopeService.downscope(
      claims.scopes,
      scopeService.parseScopes(request.scope)
    );

    const revoked = await sessionManager.revoke(
      claims.jti,
      tokenIssuer.remainingLifetime(claims)
    );
    if (!revoked) {
      logger.error('Revoked refresh token presented', {
        securityEvent: 'refresh_token_reuse',
        userId: claims.sub,
        jti: claims.jti,
      });
      throw new AuthError({ kind: 'token_revoked' });
    }

    const { response } = await tokenService.generateTokenResponse({
      userId: claims.sub,
      scopes,
      clientId: claims.client_id,
    });

    return response;
  };
}
