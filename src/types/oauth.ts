/**
 * OAuth 2.0 Grant Types
 * RFC 6749, RFC 8628
 */
export type GrantType =
  | 'authorization_code'
  | 'refresh_token'
  | 'urn:ietf:params:oauth:grant-type:device_code';

/**
 * PKCE Code Challenge Methods
 * RFC 9700 requires S256 only
 */
export type CodeChallengeMethod = 'S256';

/**
 * Token types
 */
export type TokenType = 'Bearer';

/**
 * Authorization Request (GET /auth/authorize)
 * RFC 6749 Section 4.1.1, RFC 7636 Section 4.3
 */
export interface AuthorizationRequest {
  clientId: string;
  redirectUri: string;
  responseType?: string;
  scope?: string;
  state?: string;
  codeChallenge?: string;
  codeChallengeMethod?: string;
}

/**
 * Authorization Response
 * RFC 6749 Section 4.1.2
 */
export interface AuthorizationResponse {
  code: string;
  state: string;
  redirectUri: string;
}

/**
 * Authorization Code Token Request
 * RFC 6749 Section 4.1.3
 */
export interface AuthorizationCodeTokenRequest {
  code?: string;
  codeVerifier?: string;
  redirectUri?: string;
  clientId?: string;
}

/**
 * Refresh Token Request
 * RFC 6749 Section 6
 */
export interface RefreshTokenRequest {
  refreshToken?: string;
  clientId?: string;
  scope?: string;
}

/**
 * Device Code Token Request
 * RFC 8628 Section 3.4
 */
export interface DeviceCodeTokenRequest {
  deviceCode?: string;
  clientId?: string;
}

/**
 * Token Response
 * RFC 6749 Section 5.1
 */
export interface TokenResponse {
  access_token: string;
  refresh_token: string;
  token_type: TokenType;
  expires_in: number;
  scope: string;
}

/**
 * Device Authorization Request
 * RFC 8628 Section 3.1
 */
export interface DeviceAuthorizationRequest {
  clientId?: string;
  scope?: string;
}

/**
 * Device Authorization Response
 * RFC 8628 Section 3.2
 */
export interface DeviceAuthorizationResponse {
  device_code: string;
  user_code: string;
  verification_uri: string;
  verification_uri_complete: string;
  expires_in: number;
  interval: number;
}
