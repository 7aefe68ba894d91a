/**
 * OAuth 2.0 Constants
 */

// Grant type URIs
export const GRANT_TYPE_AUTHORIZATION_CODE = 'authorization_code' as const;
export const GRANT_TYPE_REFRESH_TOKEN = 'refresh_token' as const;
export const GRANT_TYPE_DEVICE_CODE = 'urn:ietf:params:oauth:grant-type:device_code' as const;

// All supported grant types
export const SUPPORTED_GRANT_TYPES = [
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_REFRESH_TOKEN,
  GRANT_TYPE_DEVICE_CODE,
] as const;

// Response types
export const RESPONSE_TYPE_CODE = 'code' as const;

// Code challenge methods (RFC 9700: S256 only)
export const CODE_CHALLENGE_METHOD_S256 = 'S256' as const;

// Token types
export const TOKEN_TYPE_BEARER = 'Bearer' as const;

// Signing
export const SIGNING_ALGORITHM = 'HS256' as const;
export const DEFAULT_ISSUER = 'http://localhost:3000';

// Default TTLs (in seconds)
export const DEFAULT_ACCESS_TOKEN_TTL = 3600; // 1 hour
export const DEFAULT_REFRESH_TOKEN_TTL = 2592000; // 30 days
export const PKCE_TTL = 600; // 10 minutes
export const AUTHORIZATION_CODE_TTL = 300; // 5 minutes
export const DEVICE_CODE_TTL = 900; // 15 minutes
export const DEFAULT_DEVICE_CODE_INTERVAL = 5; // 5 seconds

// Token/code lengths
export const AUTHORIZATION_CODE_LENGTH = 32; // bytes
export const DEVICE_CODE_LENGTH = 32; // bytes
export const STATE_LENGTH = 16; // bytes
export const USER_CODE_LENGTH = 8; // characters (e.g., BCDF-GHJK)

// User code charset (easy to type, avoid ambiguous chars)
export const USER_CODE_CHARSET = 'BCDFGHJKLMNPQRSTVWXZ'; // No vowels, no 0/O, no 1/I

// Roles given to a user the directory knows nothing about
export const DEFAULT_ROLES = ['free_user'];

// Credential store key namespaces
export const KEY_PREFIX_PKCE = 'pkce:';
export const KEY_PREFIX_AUTH_CODE = 'authcode:';
export const KEY_PREFIX_DEVICE_CODE = 'devicecode:';
export const KEY_PREFIX_DEVICE_USER_CODE = 'devicecode:user:';
export const KEY_PREFIX_SESSION = 'session:';
export const KEY_PREFIX_USER_SESSIONS = 'session:user:';
export const KEY_PREFIX_REVOKED = 'revoked:';
export const KEY_PREFIX_RATE_LIMIT = 'rate_limit:';

// Store operations
export const DEFAULT_STORE_TIMEOUT_MS = 2000;

// Rate limiting defaults (fixed window)
export const DEFAULT_RATE_LIMIT_WINDOW_SECONDS = 60;
export const DEFAULT_TOKEN_ENDPOINT_LIMIT = 10;
export const DEFAULT_DEVICE_ENDPOINT_LIMIT = 5;
export const DEFAULT_AUTHORIZE_ENDPOINT_LIMIT = 20;
export const DEFAULT_REVOKE_ENDPOINT_LIMIT = 10;

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';
export const HEADER_CLIENT_ID = 'X-Client-ID';
export const HEADER_INTERNAL_SERVICE = 'X-Internal-Service';
export const HEADER_RATE_LIMIT_LIMIT = 'X-RateLimit-Limit';
export const HEADER_RATE_LIMIT_REMAINING = 'X-RateLimit-Remaining';
export const HEADER_RETRY_AFTER = 'Retry-After';

// Cache control for token responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';
