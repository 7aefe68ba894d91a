import type { PkceChallenge } from '../../types/token.js';
import type { ICredentialStore } from '../interfaces/credential-store.js';
import { KEY_PREFIX_PKCE, PKCE_TTL } from '../../config/constants.js';
import { pkceChallengeSchema, parseRecord } from './schemas.js';

/**
 * PKCE sessions keyed by the authorization request's state
 */
export class PkceStorage {
  constructor(private readonly store: ICredentialStore) {}

  private key(state: string): string {
    return `${KEY_PREFIX_PKCE}${state}`;
  }

  async save(challenge: PkceChallenge): Promise<void> {
    await this.store.put(this.key(challenge.state), JSON.stringify(challenge), PKCE_TTL);
  }

  async find(state: string): Promise<PkceChallenge | null> {
    const raw = await this.store.get(this.key(state));
    return raw === null ? null : parseRecord(raw, pkceChallengeSchema);
  }

  async delete(state: string): Promise<void> {
    await this.store.delete(this.key(state));
  }
}
