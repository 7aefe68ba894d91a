import type { OAuthErrorCode, ErrorStatusCode } from './error-codes.js';

/**
 * OAuth 2.0 Error Response
 * RFC 6749 Section 5.2
 */
export interface OAuthErrorResponse {
  error: OAuthErrorCode;
  error_description?: string;
  state?: string;
  [extra: string]: string | number | undefined;
}

/**
 * OAuth 2.0 Error class
 * Transport-level representation of a failure: machine code, HTTP status and body
 */
export class OAuthError extends Error {
  public readonly code: OAuthErrorCode;
  public readonly statusCode: ErrorStatusCode;
  public readonly description: string;
  public readonly state?: string;
  public readonly extra: Record<string, string | number>;

  constructor(
    code: OAuthErrorCode,
    statusCode: ErrorStatusCode,
    description: string,
    options?: {
      state?: string;
      extra?: Record<string, string | number>;
      cause?: unknown;
    }
  ) {
    super(description);
    this.name = 'OAuthError';
    this.code = code;
    this.statusCode = statusCode;
    this.description = description;
    this.extra = options?.extra ?? {};

    if (options?.state) {
      this.state = options.state;
    }
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): OAuthErrorResponse {
    const response: OAuthErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    if (this.state) {
      response.state = this.state;
    }

    return Object.assign(response, this.extra);
  }

  /**
   * Convert to URL query string for redirect errors
   */
  toQueryString(): string {
    const params = new URLSearchParams();
    params.set('error', this.code);

    if (this.description) {
      params.set('error_description', this.description);
    }

    if (this.state) {
      params.set('state', this.state);
    }

    return params.toString();
  }
}
