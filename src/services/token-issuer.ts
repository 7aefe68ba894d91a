import type { TokenClaims, TokenSubject, TokenUse, SignedToken } from '../types/token.js';
import { signToken, verifyToken, secretKey } from '../crypto/jwt.js';
import { generateJti } from '../crypto/random.js';

export interface TokenIssuerOptions {
  secret: string;
  issuer: string;
  accessTokenTtl: number; // seconds
  refreshTokenTtl: number; // seconds
  now?: () => number; // epoch ms
}

/**
 * Mints and verifies signed access and refresh tokens.
 * Holds nothing but the signing key.
 */
export class TokenIssuer {
  private readonly key: Uint8Array;
  private readonly now: () => number;

  constructor(private readonly options: TokenIssuerOptions) {
    this.key = secretKey(options.secret);
    this.now = options.now ?? Date.now;
  }

  get accessTokenTtl(): number {
    return this.options.accessTokenTtl;
  }

  get refreshTokenTtl(): number {
    return this.options.refreshTokenTtl;
  }

  private async mint(
    subject: TokenSubject,
    use: TokenUse,
    ttl: number,
    jti: string
  ): Promise<SignedToken> {
    const iat = Math.floor(this.now() / 1000);
    const claims: TokenClaims = {
      iss: this.options.issuer,
      sub: subject.subject,
      roles: subject.roles,
      scopes: subject.scopes,
      jti,
      iat,
      exp: iat + ttl,
      token_use: use,
    };

    if (subject.email !== undefined) {
      claims.email = subject.email;
    }
    if (subject.clientId !== undefined) {
      claims.client_id = subject.clientId;
    }

    return { token: await signToken(claims, this.key), claims };
  }

  async createAccessToken(subject: TokenSubject, jti = generateJti()): Promise<SignedToken> {
    return this.mint(subject, 'access', this.options.accessTokenTtl, jti);
  }

  async createRefreshToken(subject: TokenSubject, jti = generateJti()): Promise<SignedToken> {
    return this.mint(subject, 'refresh', this.options.refreshTokenTtl, jti);
  }

  async verifyAccessToken(token: string): Promise<TokenClaims> {
    return this.verify(token, 'access');
  }

  async verifyRefreshToken(token: string): Promise<TokenClaims> {
    return this.verify(token, 'refresh');
  }

  private verify(token: string, expectedUse: TokenUse): Promise<TokenClaims> {
    return verifyToken(token, this.key, {
      issuer: this.options.issuer,
      expectedUse,
      currentDate: new Date(this.now()),
    });
  }

  /**
   * Seconds until a token expires, never less than one
   */
  remainingLifetime(claims: TokenClaims): number {
    return Math.max(1, claims.exp - Math.floor(this.now() / 1000));
  }
}
