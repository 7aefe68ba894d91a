import { z } from 'zod';

/**
 * Schemas for records persisted in the credential store.
 * Every read goes through one of these so a corrupt value never reaches a grant.
 */

export const pkceChallengeSchema = z.object({
  codeChallenge: z.string(),
  codeChallengeMethod: z.literal('S256'),
  state: z.string(),
  clientId: z.string(),
  redirectUri: z.string(),
  createdAt: z.number(),
});

export const authorizationCodeSchema = z.object({
  code: z.string(),
  clientId: z.string(),
  redirectUri: z.string(),
  userId: z.string(),
  scopes: z.array(z.string()),
  codeChallenge: z.string(),
  codeChallengeMethod: z.literal('S256'),
  state: z.string(),
  used: z.boolean(),
  issuedJtis: z.object({ access: z.string(), refresh: z.string() }).optional(),
  createdAt: z.number(),
  expiresAt: z.number(),
});

export const deviceCodeSchema = z.object({
  deviceCode: z.string(),
  userCode: z.string(),
  clientId: z.string(),
  scopes: z.array(z.string()),
  status: z.enum(['pending', 'approved', 'denied', 'expired']),
  userId: z.string().optional(),
  verificationUri: z.string(),
  interval: z.number(),
  createdAt: z.number(),
  expiresAt: z.number(),
});

export const sessionSchema = z.object({
  jti: z.string(),
  userId: z.string(),
  deviceLabel: z.string().optional(),
  createdAt: z.number(),
});

/**
 * A record together with the exact stored string it was parsed from.
 * The raw value is what compare-and-swap must match.
 */
export interface Versioned<T> {
  record: T;
  raw: string;
}

/**
 * Parse a stored JSON value, or null when it does not match the schema
 */
export function parseRecord<T>(raw: string, schema: z.ZodType<T>): T | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
