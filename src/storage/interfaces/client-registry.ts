import type { OAuthClient } from '../../types/client.js';

/**
 * Read-only registry of pre-registered clients
 */
export interface IClientRegistry {
  findByClientId(clientId: string): Promise<OAuthClient | null>;
}
