import * as jose from 'jose';
import { z } from 'zod';
import type { TokenClaims, TokenUse } from '../types/token.js';
import { SIGNING_ALGORITHM } from '../config/constants.js';
import { AuthError } from '../errors/auth-error.js';

/**
 * JWT signing and verification utilities using jose library
 */

const encoder = new TextEncoder();

/**
 * Shape every verified payload must have
 */
const tokenClaimsSchema = z.object({
  iss: z.string(),
  sub: z.string().min(1),
  email: z.string().optional(),
  roles: z.array(z.string()),
  scopes: z.array(z.string()),
  jti: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
  token_use: z.enum(['access', 'refresh']),
  client_id: z.string().optional(),
});

/**
 * Turn the shared signing secret into an HMAC key
 */
export function secretKey(secret: string): Uint8Array {
  return encoder.encode(secret);
}

/**
 * Sign a set of claims with HS256
 */
export async function signToken(claims: TokenClaims, key: Uint8Array): Promise<string> {
  const payload: jose.JWTPayload = {
    roles: claims.roles,
    scopes: claims.scopes,
    token_use: claims.token_use,
  };

  if (claims.email !== undefined) {
    payload['email'] = claims.email;
  }
  if (claims.client_id !== undefined) {
    payload['client_id'] = claims.client_id;
  }

  return new jose.SignJWT(payload)
    .setProtectedHeader({ alg: SIGNING_ALGORITHM, typ: 'JWT' })
    .setIssuer(claims.iss)
    .setSubject(claims.sub)
    .setJti(claims.jti)
    .setIssuedAt(claims.iat)
    .setExpirationTime(claims.exp)
    .sign(key);
}

/**
 * Verify a token's signature, issuer, expiry and kind.
 *
 * Expiry is reported as `token_expired`; every other problem as
 * `token_invalid`.
 */
export async function verifyToken(
  token: string,
  key: Uint8Array,
  options: {
    issuer: string;
    expectedUse: TokenUse;
    currentDate?: Date;
  }
): Promise<TokenClaims> {
  let payload: jose.JWTPayload;

  try {
    const result = await jose.jwtVerify(token, key, {
      algorithms: [SIGNING_ALGORITHM],
      issuer: options.issuer,
      currentDate: options.currentDate,
    });
    payload = result.payload;
  } catch (error) {
    if (error instanceof jose.errors.JWTExpired) {
      throw new AuthError({ kind: 'token_expired' }, { cause: error });
    }
    const detail = error instanceof jose.errors.JOSEError ? error.code : 'malformed token';
    throw new AuthError({ kind: 'token_invalid', detail }, { cause: error });
  }

  const parsed = tokenClaimsSchema.safeParse(payload);
  if (!parsed.success) {
    throw new AuthError({ kind: 'token_invalid', detail: 'unexpected claims' });
  }

  if (parsed.data.token_use !== options.expectedUse) {
    throw new AuthError({
      kind: 'token_invalid',
      detail: `expected ${options.expectedUse} token`,
    });
  }

  return parsed.data;
}
