import type { AuthorizationCode, CreateAuthorizationCodeInput, IssuedJtis } from '../../types/token.js';
import type { ICredentialStore } from '../interfaces/credential-store.js';
import { KEY_PREFIX_AUTH_CODE, AUTHORIZATION_CODE_TTL } from '../../config/constants.js';
import { generateAuthorizationCode } from '../../crypto/random.js';
import { authorizationCodeSchema, parseRecord, type Versioned } from './schemas.js';

/**
 * Authorization codes under `authcode:{code}`
 */
export class AuthorizationCodeStorage {
  private readonly now: () => number;

  constructor(
    private readonly store: ICredentialStore,
    options: { now?: () => number } = {}
  ) {
    this.now = options.now ?? Date.now;
  }

  private key(code: string): string {
    return `${KEY_PREFIX_AUTH_CODE}${code}`;
  }

  async create(input: CreateAuthorizationCodeInput): Promise<AuthorizationCode> {
    const createdAt = this.now();
    const record: AuthorizationCode = {
      ...input,
      code: generateAuthorizationCode(),
      used: false,
      createdAt,
      expiresAt: createdAt + AUTHORIZATION_CODE_TTL * 1000,
    };

    await this.store.put(this.key(record.code), JSON.stringify(record), AUTHORIZATION_CODE_TTL);
    return record;
  }

  async find(code: string): Promise<Versioned<AuthorizationCode> | null> {
    const raw = await this.store.get(this.key(code));
    if (raw === null) return null;

    const record = parseRecord(raw, authorizationCodeSchema);
    return record ? { record, raw } : null;
  }

  /**
   * Flip `used` to true only if the record is still exactly the one read,
   * together with the ids of the tokens the winner is about to mint.
   * Exactly one concurrent caller wins.
   */
  async markUsed(
    current: Versioned<AuthorizationCode>,
    issuedJtis: IssuedJtis
  ): Promise<AuthorizationCode | null> {
    const next: AuthorizationCode = { ...current.record, used: true, issuedJtis };
    const swapped = await this.store.compareAndSwap(
      this.key(next.code),
      current.raw,
      JSON.stringify(next)
    );
    return swapped ? next : null;
  }

  async delete(code: string): Promise<void> {
    await this.store.delete(this.key(code));
  }
}
