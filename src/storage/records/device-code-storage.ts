import type { DeviceCode, CreateDeviceCodeInput } from '../../types/token.js';
import type { ICredentialStore } from '../interfaces/credential-store.js';
import {
  KEY_PREFIX_DEVICE_CODE,
  KEY_PREFIX_DEVICE_USER_CODE,
  DEVICE_CODE_TTL,
} from '../../config/constants.js';
import { generateDeviceCode, generateUserCode } from '../../crypto/random.js';
import { AuthError } from '../../errors/auth-error.js';
import { deviceCodeSchema, parseRecord, type Versioned } from './schemas.js';

const MAX_USER_CODE_ATTEMPTS = 5;

/**
 * Device codes, stored under two keys:
 * `devicecode:{device_code}` holds the record and
 * `devicecode:user:{user_code}` maps back to the device code.
 *
 * Only the primary key is trusted; the reverse key just resolves user codes.
 */
export class DeviceCodeStorage {
  private readonly now: () => number;

  constructor(
    private readonly store: ICredentialStore,
    options: { now?: () => number } = {}
  ) {
    this.now = options.now ?? Date.now;
  }

  private primaryKey(deviceCode: string): string {
    return `${KEY_PREFIX_DEVICE_CODE}${deviceCode}`;
  }

  private reverseKey(userCode: string): string {
    return `${KEY_PREFIX_DEVICE_USER_CODE}${userCode}`;
  }

  private async unusedUserCode(): Promise<string> {
    for (let attempt = 0; attempt < MAX_USER_CODE_ATTEMPTS; attempt++) {
      const userCode = generateUserCode();
      if ((await this.store.get(this.reverseKey(userCode))) === null) {
        return userCode;
      }
    }
    throw new AuthError({ kind: 'internal', detail: 'could not allocate a unique user code' });
  }

  async create(input: CreateDeviceCodeInput): Promise<DeviceCode> {
    const createdAt = this.now();
    const record: DeviceCode = {
      deviceCode: generateDeviceCode(),
      userCode: await this.unusedUserCode(),
      clientId: input.clientId,
      scopes: input.scopes,
      status: 'pending',
      verificationUri: input.verificationUri,
      interval: input.interval,
      createdAt,
      expiresAt: createdAt + DEVICE_CODE_TTL * 1000,
    };

    await this.store.putMany([
      {
        key: this.primaryKey(record.deviceCode),
        value: JSON.stringify(record),
        ttlSeconds: DEVICE_CODE_TTL,
      },
      {
        key: this.reverseKey(record.userCode),
        value: record.deviceCode,
        ttlSeconds: DEVICE_CODE_TTL,
      },
    ]);

    return record;
  }

  async find(deviceCode: string): Promise<Versioned<DeviceCode> | null> {
    const raw = await this.store.get(this.primaryKey(deviceCode));
    if (raw === null) return null;

    const record = parseRecord(raw, deviceCodeSchema);
    return record ? { record, raw } : null;
  }

  /**
   * Resolve a normalized user code to its device code
   */
  async resolveUserCode(userCode: string): Promise<string | null> {
    return this.store.get(this.reverseKey(userCode));
  }

  /**
   * Move a record to a new state if nobody changed it since it was read
   */
  async transition(
    current: Versioned<DeviceCode>,
    next: DeviceCode
  ): Promise<boolean> {
    return this.store.compareAndSwap(
      this.primaryKey(current.record.deviceCode),
      current.raw,
      JSON.stringify(next)
    );
  }

  /**
   * Delete the primary record if it is unchanged. The single winner of
   * this call is the only poll allowed to issue tokens.
   */
  async claim(current: Versioned<DeviceCode>): Promise<boolean> {
    return this.store.compareAndSwap(
      this.primaryKey(current.record.deviceCode),
      current.raw,
      null
    );
  }

  /**
   * Delete both keys of a device record in one operation
   */
  async delete(deviceCode: string, userCode: string): Promise<void> {
    await this.store.delete(this.primaryKey(deviceCode), this.reverseKey(userCode));
  }

  async deleteUserCode(userCode: string): Promise<void> {
    await this.store.delete(this.reverseKey(userCode));
  }
}
