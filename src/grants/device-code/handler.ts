import type { DeviceCodeTokenRequest, TokenResponse } from '../../types/oauth.js';
import type { ClientService } from '../../services/client-service.js';
import type { TokenService } from '../../services/token-service.js';
import type { DeviceCodeStorage } from '../../storage/records/device-code-storage.js';
import type { Logger } from '../../utils/logger.js';
import { AuthError } from '../../errors/auth-error.js';
import { GRANT_TYPE_DEVICE_CODE } from '../../config/constants.js';

export interface DeviceCodeHandlerOptions {
  clientService: ClientService;
  deviceCodeStorage: DeviceCodeStorage;
  tokenService: TokenService;
  logger: Logger;
  now?: () => number;
}

/**
 * Handle device code token request (polling)
 *
 * RFC 8628 Section 3.4-3.5
 */
export function createDeviceCodeHandler(options: DeviceCodeHandlerOptions) {
  const { clientService, deviceCodeStorage, tokenService } = options;
  const now = options.now ?? Date.now;
  const logger = options.logger.child({ grant: GRANT_TYPE_DEVICE_CODE });

  return async (request: DeviceCodeTokenRequest): Promise<TokenResponse> => {
    if (!request.deviceCode) {
      throw new AuthError({ kind: 'invalid_request', detail: 'Missing device_code parameter' });
    }

    if (request.clientId) {
      await clientService.requireClient(request.clientId, GRANT_TYPE_DEVICE_CODE);
    }

    const current = await deviceCodeStorage.find(request.deviceCode);
    if (!current) {
      throw new AuthError({ kind: 'device_code_not_found' });
    }

    const deviceCode = current.record;

    if (request.clientId && deviceCode.clientId !== request.clientId) {
      throw new AuthError({ kind: 'client_mismatch' });
    }

    if (deviceCode.status === 'expired' || now() >= deviceCode.expiresAt) {
      await deviceCodeStorage.delete(deviceCode.deviceCode, deviceCode.userCode);
      throw new AuthError({ kind: 'device_code_expired' });
    }

    switch (deviceCode.status) {
      case 'pending':
        throw new AuthError({ kind: 'authorization_pending' });

      case 'denied':
        // Kept until its TTL so later polls keep seeing the denial
        throw new AuthError({ kind: 'access_denied' });

      case 'approved': {
        const userId = deviceCode.userId;
        if (!userId) {
          throw new AuthError({ kind: 'internal', detail: 'approved device code without user' });
        }

        // Only one poll can delete the unchanged record
        if (!(await deviceCodeStorage.claim(current))) {
          throw new AuthError({ kind: 'device_code_not_found' });
        }
        await deviceCodeStorage.deleteUserCode(deviceCode.userCode);

        const { response } = await tokenService.generateTokenResponse({
          userId,
          scopes: deviceCode.scopes,
          clientId: deviceCode.clientId,
          deviceLabel: `device:${deviceCode.clientId}`,
        });

        logger.info('Device code exchanged', { clientId: deviceCode.clientId, userId });
        return response;
      }
    }
  };
}
