import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import * as constants from './constants.js';
import { AuthError } from '../errors/auth-error.js';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(env: NodeJS.ProcessEnv, name: string): string | undefined {
  // Check for file-based secret first (Docker secrets pattern)
  const filePath = env[`${name}_FILE`];

  if (filePath) {
    if (!existsSync(filePath)) {
      throw new AuthError({
        kind: 'config_invalid',
        detail: `${name}_FILE points to a missing file: ${filePath}`,
      });
    }
    return readFileSync(filePath, 'utf-8').trim();
  }

  // Fall back to direct environment variable
  return env[name];
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const envSchema = z.object({
  PORT: positiveInt(3000),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: logLevelSchema.default('info'),
  ISSUER: z.string().url().default(constants.DEFAULT_ISSUER),
  VERIFICATION_URI: z.string().url().optional(),
  JWT_SECRET: z.string().min(16).optional(),
  ACCESS_TOKEN_TTL: positiveInt(constants.DEFAULT_ACCESS_TOKEN_TTL),
  REFRESH_TOKEN_TTL: positiveInt(constants.DEFAULT_REFRESH_TOKEN_TTL),
  UPSTASH_REDIS_REST_URL: z.string().url().optional(),
  UPSTASH_REDIS_REST_TOKEN: z.string().min(1).optional(),
  STORE_TIMEOUT_MS: positiveInt(constants.DEFAULT_STORE_TIMEOUT_MS),
  RATE_LIMIT_WINDOW_SECONDS: positiveInt(constants.DEFAULT_RATE_LIMIT_WINDOW_SECONDS),
  RATE_LIMIT_TOKEN: positiveInt(constants.DEFAULT_TOKEN_ENDPOINT_LIMIT),
  RATE_LIMIT_DEVICE: positiveInt(constants.DEFAULT_DEVICE_ENDPOINT_LIMIT),
  RATE_LIMIT_AUTHORIZE: positiveInt(constants.DEFAULT_AUTHORIZE_ENDPOINT_LIMIT),
  RATE_LIMIT_REVOKE: positiveInt(constants.DEFAULT_REVOKE_ENDPOINT_LIMIT),
  INTERNAL_SERVICE_SECRET: z.string().min(1).optional(),
  DEVICE_CODE_INTERVAL: positiveInt(constants.DEFAULT_DEVICE_CODE_INTERVAL),
  CLIENTS_FILE: z.string().default('clients.json'),
});

export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Rate limit for one endpoint class
 */
export interface EndpointLimit {
  maxRequests: number;
  windowSeconds: number;
}

export type RateLimitedEndpoint = 'token' | 'device' | 'authorize' | 'revoke';

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: 'development' | 'production' | 'test';
    issuer: string;
    verificationUri: string;
  };
  secrets: {
    jwtSecret: string;
    internalServiceSecret: string | undefined;
  };
  store: {
    redisUrl: string | undefined;
    redisToken: string | undefined;
    timeoutMs: number;
  };
  logging: {
    level: LogLevel;
  };
  rateLimit: Record<RateLimitedEndpoint, EndpointLimit>;
  tokens: {
    accessTokenTtl: number;
    refreshTokenTtl: number;
    deviceCodeInterval: number;
  };
  clientsFile: string;
}

// Used only outside production when JWT_SECRET is unset
const DEVELOPMENT_JWT_SECRET = 'development-only-signing-secret';

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse({
    ...env,
    JWT_SECRET: readSecret(env, 'JWT_SECRET'),
    UPSTASH_REDIS_REST_TOKEN: readSecret(env, 'UPSTASH_REDIS_REST_TOKEN'),
    INTERNAL_SERVICE_SECRET: readSecret(env, 'INTERNAL_SERVICE_SECRET'),
  });

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new AuthError({ kind: 'config_invalid', detail });
  }

  const vars = parsed.data;

  if (vars.NODE_ENV === 'production' && !vars.JWT_SECRET) {
    throw new AuthError({
      kind: 'config_invalid',
      detail: 'JWT_SECRET is required in production',
    });
  }

  if (Boolean(vars.UPSTASH_REDIS_REST_URL) !== Boolean(vars.UPSTASH_REDIS_REST_TOKEN)) {
    throw new AuthError({
      kind: 'config_invalid',
      detail: 'UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN must be set together',
    });
  }

  const windowSeconds = vars.RATE_LIMIT_WINDOW_SECONDS;

  return {
    server: {
      port: vars.PORT,
      host: vars.HOST,
      nodeEnv: vars.NODE_ENV,
      issuer: vars.ISSUER,
      verificationUri: vars.VERIFICATION_URI ?? `${vars.ISSUER}/device`,
    },
    secrets: {
      jwtSecret: vars.JWT_SECRET ?? DEVELOPMENT_JWT_SECRET,
      internalServiceSecret: vars.INTERNAL_SERVICE_SECRET,
    },
    store: {
      redisUrl: vars.UPSTASH_REDIS_REST_URL,
      redisToken: vars.UPSTASH_REDIS_REST_TOKEN,
      timeoutMs: vars.STORE_TIMEOUT_MS,
    },
    logging: {
      level: vars.LOG_LEVEL,
    },
    rateLimit: {
      token: { maxRequests: vars.RATE_LIMIT_TOKEN, windowSeconds },
      device: { maxRequests: vars.RATE_LIMIT_DEVICE, windowSeconds },
      authorize: { maxRequests: vars.RATE_LIMIT_AUTHORIZE, windowSeconds },
      revoke: { maxRequests: vars.RATE_LIMIT_REVOKE, windowSeconds },
    },
    tokens: {
      accessTokenTtl: vars.ACCESS_TOKEN_TTL,
      refreshTokenTtl: vars.REFRESH_TOKEN_TTL,
      deviceCodeInterval: vars.DEVICE_CODE_INTERVAL,
    },
    clientsFile: vars.CLIENTS_FILE,
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

// Re-export constants
export { constants };
