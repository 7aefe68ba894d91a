import {
  type OAuthErrorCode,
  type ErrorStatusCode,
  ERROR_INVALID_REQUEST,
  ERROR_INVALID_CLIENT,
  ERROR_INVALID_GRANT,
  ERROR_UNAUTHORIZED_CLIENT,
  ERROR_ACCESS_DENIED,
  ERROR_UNSUPPORTED_RESPONSE_TYPE,
  ERROR_INVALID_SCOPE,
  ERROR_UNSUPPORTED_GRANT_TYPE,
  ERROR_SERVER_ERROR,
  ERROR_AUTHORIZATION_PENDING,
  ERROR_EXPIRED_TOKEN,
  ERROR_INVALID_TOKEN,
  ERROR_INSUFFICIENT_SCOPE,
  ERROR_RATE_LIMIT_EXCEEDED,
} from './error-codes.js';
import { OAuthError } from './oauth-error.js';

/**
 * Every way an operation of the authorization core can fail.
 *
 * The union is closed: adding a variant breaks `describeFailure` until the
 * new case is mapped to a status and an OAuth error code.
 */
export type AuthFailure =
  // Malformed requests
  | { kind: 'invalid_request'; detail: string }
  | { kind: 'unsupported_grant_type'; grantType: string }
  | { kind: 'unsupported_response_type'; responseType: string }
  // Clients
  | { kind: 'invalid_client' }
  | { kind: 'unauthorized_client'; grantType: string }
  | { kind: 'invalid_redirect_uri' }
  | { kind: 'invalid_scope'; scopes: string[] }
  // Authorization codes
  | { kind: 'invalid_code' }
  | { kind: 'code_expired' }
  | { kind: 'code_reused' }
  | { kind: 'invalid_pkce_verifier' }
  | { kind: 'client_mismatch' }
  // Tokens
  | { kind: 'token_invalid'; detail: string }
  | { kind: 'token_expired' }
  | { kind: 'token_revoked' }
  | { kind: 'insufficient_scope'; required: string[] }
  // Device authorization
  | { kind: 'device_code_not_found' }
  | { kind: 'authorization_pending' }
  | { kind: 'access_denied' }
  | { kind: 'device_code_expired' }
  | { kind: 'invalid_user_code' }
  | { kind: 'device_already_decided' }
  // Infrastructure
  | { kind: 'rate_limited'; limit: number; count: number; retryAfter: number }
  | { kind: 'store_unavailable'; detail: string }
  | { kind: 'internal'; detail: string }
  | { kind: 'config_invalid'; detail: string };

export type AuthFailureKind = AuthFailure['kind'];

/**
 * Transport-level rendering of a failure
 */
export interface FailureDescription {
  status: ErrorStatusCode;
  code: OAuthErrorCode;
  description: string;
  extra?: Record<string, string | number>;
}

/**
 * Map a failure to its HTTP status and OAuth error code.
 *
 * Backing-service failures collapse to a generic description; their detail
 * only ever reaches the log.
 */
export function describeFailure(failure: AuthFailure): FailureDescription {
  switch (failure.kind) {
    case 'invalid_request':
      return { status: 400, code: ERROR_INVALID_REQUEST, description: failure.detail };
    case 'unsupported_grant_type':
      return {
        status: 400,
        code: ERROR_UNSUPPORTED_GRANT_TYPE,
        description: `Unsupported grant type: ${failure.grantType}`,
      };
    case 'unsupported_response_type':
      return {
        status: 400,
        code: ERROR_UNSUPPORTED_RESPONSE_TYPE,
        description: `Unsupported response type: ${failure.responseType}`,
      };
    case 'invalid_client':
      return { status: 401, code: ERROR_INVALID_CLIENT, description: 'Invalid client ID' };
    case 'unauthorized_client':
      return {
        status: 400,
        code: ERROR_UNAUTHORIZED_CLIENT,
        description: `Client is not authorized for grant type ${failure.grantType}`,
      };
    case 'invalid_redirect_uri':
      return { status: 400, code: ERROR_INVALID_REQUEST, description: 'Invalid redirect URI' };
    case 'invalid_scope':
      return {
        status: 400,
        code: ERROR_INVALID_SCOPE,
        description: `Invalid scope: ${failure.scopes.join(' ')}`,
      };
    case 'invalid_code':
      return { status: 400, code: ERROR_INVALID_GRANT, description: 'Invalid authorization code' };
    case 'code_expired':
      return { status: 400, code: ERROR_INVALID_GRANT, description: 'Authorization code expired' };
    case 'code_reused':
      return {
        status: 400,
        code: ERROR_INVALID_GRANT,
        description: 'Authorization code already used',
      };
    case 'invalid_pkce_verifier':
      return { status: 400, code: ERROR_INVALID_GRANT, description: 'Invalid code verifier' };
    case 'client_mismatch':
      return {
        status: 400,
        code: ERROR_INVALID_GRANT,
        description: 'Grant was issued to a different client or redirect URI',
      };
    case 'token_invalid':
      return { status: 401, code: ERROR_INVALID_TOKEN, description: `Invalid token: ${failure.detail}` };
    case 'token_expired':
      return { status: 401, code: ERROR_INVALID_TOKEN, description: 'Token expired' };
    case 'token_revoked':
      return { status: 401, code: ERROR_INVALID_TOKEN, description: 'Token revoked' };
    case 'insufficient_scope':
      return {
        status: 403,
        code: ERROR_INSUFFICIENT_SCOPE,
        description: `Required scopes: ${failure.required.join(' ')}`,
      };
    case 'device_code_not_found':
      return { status: 400, code: ERROR_INVALID_GRANT, description: 'Device code not found' };
    case 'authorization_pending':
      return {
        status: 400,
        code: ERROR_AUTHORIZATION_PENDING,
        description: 'User has not yet completed authorization',
      };
    case 'access_denied':
      return { status: 400, code: ERROR_ACCESS_DENIED, description: 'User denied authorization' };
    case 'device_code_expired':
      return { status: 400, code: ERROR_EXPIRED_TOKEN, description: 'Device code expired' };
    case 'invalid_user_code':
      return { status: 400, code: ERROR_INVALID_GRANT, description: 'Invalid or expired user code' };
    case 'device_already_decided':
      return {
        status: 400,
        code: ERROR_INVALID_GRANT,
        description: 'Device authorization was already decided',
      };
    case 'rate_limited':
      return {
        status: 429,
        code: ERROR_RATE_LIMIT_EXCEEDED,
        description: `Rate limit exceeded. Try again in ${failure.retryAfter} seconds.`,
        extra: {
          limit: failure.limit,
          current_count: failure.count,
          retry_after: failure.retryAfter,
        },
      };
    case 'store_unavailable':
      return { status: 503, code: ERROR_SERVER_ERROR, description: 'Service temporarily unavailable' };
    case 'internal':
    case 'config_invalid':
      return { status: 500, code: ERROR_SERVER_ERROR, description: 'Internal server error' };
  }
}

/**
 * Error thrown by every component of the authorization core
 */
export class AuthError extends Error {
  public readonly failure: AuthFailure;

  constructor(failure: AuthFailure, options?: { cause?: unknown }) {
    super(failureMessage(failure));
    this.name = 'AuthError';
    this.failure = failure;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  get kind(): AuthFailureKind {
    return this.failure.kind;
  }

  /**
   * True for failures whose detail must stay out of client responses
   */
  get isInternal(): boolean {
    return describeFailure(this.failure).status >= 500;
  }

  /**
   * Render as the transport-level error
   */
  toOAuthError(state?: string): OAuthError {
    const { status, code, description, extra } = describeFailure(this.failure);
    return new OAuthError(code, status, description, { state, extra, cause: this });
  }
}

function failureMessage(failure: AuthFailure): string {
  switch (failure.kind) {
    case 'store_unavailable':
      return `Credential store unavailable: ${failure.detail}`;
    case 'internal':
      return `Internal error: ${failure.detail}`;
    case 'config_invalid':
      return `Configuration error: ${failure.detail}`;
    default:
      return describeFailure(failure).description;
  }
}

/**
 * Narrow an unknown thrown value to an AuthError of the given kind
 */
export function isAuthError(error: unknown, kind?: AuthFailureKind): error is AuthError {
  return error instanceof AuthError && (kind === undefined || error.kind === kind);
}
