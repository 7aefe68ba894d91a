import type { DeviceCode } from '../../types/token.js';
import type { DeviceCodeStorage } from '../../storage/records/device-code-storage.js';
import type { Versioned } from '../../storage/records/schemas.js';
import type { Logger } from '../../utils/logger.js';
import { AuthError } from '../../errors/auth-error.js';
import { normalizeUserCode } from '../../crypto/random.js';

export interface DeviceDecisionOptions {
  deviceCodeStorage: DeviceCodeStorage;
  logger: Logger;
  now?: () => number;
}

type Decision = 'approved' | 'denied';

/**
 * User-side decisions on a pending device authorization
 *
 * Unknown, dangling and expired user codes all surface as generic
 * "invalid or expired" failures. A second decision on the same code is
 * rejected, not ignored.
 */
export function createDeviceDecisionHandlers(options: DeviceDecisionOptions) {
  const { deviceCodeStorage, logger } = options;
  const now = options.now ?? Date.now;

  const lookup = async (userCode: string): Promise<Versioned<DeviceCode>> => {
    if (!userCode.trim()) {
      throw new AuthError({ kind: 'invalid_request', detail: 'Missing user_code parameter' });
    }

    const normalized = normalizeUserCode(userCode);
    const deviceCode = await deviceCodeStorage.resolveUserCode(normalized);
    if (!deviceCode) {
      throw new AuthError({ kind: 'invalid_user_code' });
    }

    const current = await deviceCodeStorage.find(deviceCode);
    if (!current) {
      // Reverse key outlived its record
      await deviceCodeStorage.deleteUserCode(normalized);
      throw new AuthError({ kind: 'invalid_user_code' });
    }

    const record = current.record;
    if (record.status === 'expired' || now() >= record.expiresAt) {
      await deviceCodeStorage.delete(record.deviceCode, record.userCode);
      throw new AuthError({ kind: 'device_code_expired' });
    }

    if (record.status !== 'pending') {
      throw new AuthError({ kind: 'device_already_decided' });
    }

    return current;
  };

  const decide = async (userCode: string, userId: string, decision: Decision): Promise<DeviceCode> => {
    const current = await lookup(userCode);

    const next: DeviceCode =
      decision === 'approved'
        ? { ...current.record, status: 'approved', userId }
        : { ...current.record, status: 'denied' };

    if (!(await deviceCodeStorage.transition(current, next))) {
      throw new AuthError({ kind: 'device_already_decided' });
    }

    logger.info(`Device authorization ${decision}`, {
      clientId: next.clientId,
      userId,
    });
    return next;
  };

  return {
    approve: (userCode: string, userId: string) => decide(userCode, userId, 'approved'),
    deny: (userCode: string, userId: string) => decide(userCode, userId, 'denied'),
  };
}
