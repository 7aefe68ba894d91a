import type {
  DeviceAuthorizationRequest,
  DeviceAuthorizationResponse,
} from '../../types/oauth.js';
import type { ClientService } from '../../services/client-service.js';
import type { DeviceCodeStorage } from '../../storage/records/device-code-storage.js';
import type { Logger } from '../../utils/logger.js';
import { AuthError } from '../../errors/auth-error.js';
import { scopeService } from '../../services/scope-service.js';
import { GRANT_TYPE_DEVICE_CODE, DEVICE_CODE_TTL } from '../../config/constants.js';

export interface DeviceAuthorizationHandlerOptions {
  clientService: ClientService;
  deviceCodeStorage: DeviceCodeStorage;
  verificationUri: string;
  interval: number;
  logger: Logger;
}

/**
 * Handle device authorization request
 * RFC 8628 Section 3.1-3.2
 */
export function createDeviceAuthorizationHandler(options: DeviceAuthorizationHandlerOptions) {
  const { clientService, deviceCodeStorage, verificationUri, interval, logger } = options;

  return async (request: DeviceAuthorizationRequest): Promise<DeviceAuthorizationResponse> => {
    if (!request.clientId) {
      throw new AuthError({ kind: 'invalid_request', detail: 'Missing client_id parameter' });
    }

    const client = await clientService.requireClient(request.clientId, GRANT_TYPE_DEVICE_CODE);
    const scopes = scopeService.validateScopes(scopeService.parseScopes(request.scope), client);

    const deviceCode = await deviceCodeStorage.create({
      clientId: client.clientId,
      scopes,
      verificationUri,
      interval,
    });

    logger.info('Device authorization started', { clientId: client.clientId });

    const complete = new URL(verificationUri);
    complete.searchParams.set('user_code', deviceCode.userCode);

    return {
      device_code: deviceCode.deviceCode,
      user_code: deviceCode.userCode,
      verification_uri: verificationUri,
      verification_uri_complete: complete.toString(),
      expires_in: DEVICE_CODE_TTL,
      interval,
    };
  };
}
