import type { OAuthClient } from '../../types/client.js';
import type { IClientRegistry } from '../interfaces/client-registry.js';

/**
 * In-memory client registry
 */
export class MemoryClientRegistry implements IClientRegistry {
  private clients = new Map<string, OAuthClient>();

  constructor(clients: OAuthClient[] = []) {
    for (const client of clients) {
      this.register(client);
    }
  }

  register(client: OAuthClient): void {
    this.clients.set(client.clientId, client);
  }

  async findByClientId(clientId: string): Promise<OAuthClient | null> {
    return this.clients.get(clientId) ?? null;
  }
}
