import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import type { OAuthClient } from '../types/client.js';
import { AuthError } from '../errors/auth-error.js';
import { SUPPORTED_GRANT_TYPES } from './constants.js';

const clientSchema = z.object({
  clientId: z.string().min(1),
  name: z.string().min(1),
  redirectUris: z.array(z.string().url()).default([]),
  allowedGrants: z.array(z.enum(SUPPORTED_GRANT_TYPES)).min(1),
  allowedScopes: z.array(z.string().min(1)).default([]),
  defaultScopes: z.array(z.string().min(1)).optional(),
});

const clientsFileSchema = z.object({
  clients: z.array(clientSchema),
});

/**
 * Load pre-registered clients from a JSON file
 */
export function loadClients(path: string): OAuthClient[] {
  if (!existsSync(path)) {
    throw new AuthError({ kind: 'config_invalid', detail: `clients file not found: ${path}` });
  }

  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new AuthError(
      { kind: 'config_invalid', detail: `clients file is not valid JSON: ${path}` },
      { cause: error }
    );
  }

  const parsed = clientsFileSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new AuthError({ kind: 'config_invalid', detail: `${path}: ${detail}` });
  }

  const ids = new Set<string>();
  for (const client of parsed.data.clients) {
    if (ids.has(client.clientId)) {
      throw new AuthError({
        kind: 'config_invalid',
        detail: `${path}: duplicate clientId ${client.clientId}`,
      });
    }
    ids.add(client.clientId);
  }

  return parsed.data.clients;
}
