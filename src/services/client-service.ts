import type { OAuthClient } from '../types/client.js';
import type { GrantType } from '../types/oauth.js';
import type { IClientRegistry } from '../storage/interfaces/client-registry.js';
import { AuthError } from '../errors/auth-error.js';

/**
 * Client lookups shared by every grant
 */
export class ClientService {
  constructor(private readonly registry: IClientRegistry) {}

  /**
   * Resolve a client that may use the given grant
   */
  async requireClient(clientId: string, grantType: GrantType): Promise<OAuthClient> {
    const client = await this.registry.findByClientId(clientId);
    if (!client) {
      throw new AuthError({ kind: 'invalid_client' });
    }

    if (!client.allowedGrants.includes(grantType)) {
      throw new AuthError({ kind: 'unauthorized_client', grantType });
    }

    return client;
  }

  /**
   * Redirect URIs must match a registered value exactly
   */
  isRegisteredRedirectUri(client: OAuthClient, redirectUri: string): boolean {
    return client.redirectUris.includes(redirectUri);
  }
}
