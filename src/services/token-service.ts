import type { TokenResponse } from '../types/oauth.js';
import type { TokenClaims, IssuedJtis } from '../types/token.js';
import type { IUserDirectory } from '../storage/interfaces/user-directory.js';
import type { TokenIssuer } from './token-issuer.js';
import type { SessionManager } from './session-manager.js';
import { scopeService } from './scope-service.js';
import { TOKEN_TYPE_BEARER, DEFAULT_ROLES } from '../config/constants.js';

export interface TokenGenerationOptions {
  userId: string;
  scopes: string[];
  clientId?: string;
  deviceLabel?: string;
  /**
   * Token ids reserved before minting; fresh ones otherwise
   */
  jtis?: IssuedJtis;
}

export interface IssuedTokens {
  response: TokenResponse;
  accessClaims: TokenClaims;
  refreshClaims: TokenClaims;
}

/**
 * Service for token generation
 */
export class TokenService {
  constructor(
    private readonly issuer: TokenIssuer,
    private readonly sessions: SessionManager,
    private readonly users: IUserDirectory
  ) {}

  /**
   * Mint an access/refresh pair for a user and register the refresh jti
   */
  async generateTokenResponse(options: TokenGenerationOptions): Promise<IssuedTokens> {
    const { userId, scopes, clientId, deviceLabel, jtis } = options;

    const user = await this.users.findById(userId);
    const subject = {
      subject: userId,
      email: user?.email,
      roles: user?.roles ?? [...DEFAULT_ROLES],
      scopes,
      clientId,
    };

    const access = await this.issuer.createAccessToken(subject, jtis?.access);
    const refresh = await this.issuer.createRefreshToken(subject, jtis?.refresh);

    await this.sessions.createSession(userId, refresh.claims.jti, deviceLabel);

    return {
      response: {
        access_token: access.token,
        refresh_token: refresh.token,
        token_type: TOKEN_TYPE_BEARER,
        expires_in: this.issuer.accessTokenTtl,
        scope: scopeService.formatScopes(scopes),
      },
      accessClaims: access.claims,
      refreshClaims: refresh.claims,
    };
  }
}
