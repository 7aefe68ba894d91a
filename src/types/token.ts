import type { CodeChallengeMethod } from './oauth.js';

/**
 * Which of the two token kinds a JWT is
 */
export type TokenUse = 'access' | 'refresh';

/**
 * Claims carried by access and refresh tokens
 */
export interface TokenClaims {
  iss: string; // Issuer
  sub: string; // Subject (user ID)
  email?: string;
  roles: string[];
  scopes: string[];
  jti: string; // Unit of revocation
  iat: number; // Issued at
  exp: number; // Expiration time
  token_use: TokenUse;
  client_id?: string;
}

/**
 * Input for minting a token pair
 */
export interface TokenSubject {
  subject: string;
  email?: string;
  roles: string[];
  scopes: string[];
  clientId?: string;
}

/**
 * Token ids chosen before a token pair is minted
 */
export interface IssuedJtis {
  access: string;
  refresh: string;
}

/**
 * A freshly signed token together with its claims
 */
export interface SignedToken {
  token: string;
  claims: TokenClaims;
}

/**
 * PKCE session, keyed by the authorization request's state
 * RFC 7636
 */
export interface PkceChallenge {
  codeChallenge: string;
  codeChallengeMethod: CodeChallengeMethod;
  state: string;
  clientId: string;
  redirectUri: string;
  createdAt: number; // epoch ms
}

/**
 * Authorization Code (stored in the credential store)
 */
export interface AuthorizationCode {
  code: string;
  clientId: string;
  redirectUri: string;
  userId: string;
  scopes: string[];
  codeChallenge: string;
  codeChallengeMethod: CodeChallengeMethod;
  state: string;
  used: boolean;
  issuedJtis?: IssuedJtis; // Set by the exchange that consumed the code
  createdAt: number; // epoch ms
  expiresAt: number; // epoch ms
}

export interface CreateAuthorizationCodeInput {
  clientId: string;
  redirectUri: string;
  userId: string;
  scopes: string[];
  codeChallenge: string;
  codeChallengeMethod: CodeChallengeMethod;
  state: string;
}

/**
 * Device Code status
 * RFC 8628
 */
export type DeviceCodeStatus = 'pending' | 'approved' | 'denied' | 'expired';

/**
 * Device Code (stored in the credential store)
 */
export interface DeviceCode {
  deviceCode: string;
  userCode: string;
  clientId: string;
  scopes: string[];
  status: DeviceCodeStatus;
  userId?: string; // Set only once approved
  verificationUri: string;
  interval: number; // Minimum polling interval in seconds
  createdAt: number; // epoch ms
  expiresAt: number; // epoch ms
}

export interface CreateDeviceCodeInput {
  clientId: string;
  scopes: string[];
  verificationUri: string;
  interval: number;
}

/**
 * Session bound to one refresh token
 */
export interface Session {
  jti: string;
  userId: string;
  deviceLabel?: string;
  createdAt: number; // epoch ms
}
