import type { GrantType } from './oauth.js';

/**
 * Pre-registered OAuth 2.0 client
 *
 * Clients are registered outside this service; the core only reads them.
 */
export interface OAuthClient {
  clientId: string; // Public identifier
  name: string;
  redirectUris: string[]; // Registered redirect URIs (exact match required)
  allowedGrants: GrantType[];
  allowedScopes: string[];
  defaultScopes?: string[];
}
