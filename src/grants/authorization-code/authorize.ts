import type { OAuthClient } from '../../types/client.js';
import type { AuthorizationRequest, AuthorizationResponse } from '../../types/oauth.js';
import type { ClientService } from '../../services/client-service.js';
import type { PkceStorage } from '../../storage/records/pkce-storage.js';
import type { AuthorizationCodeStorage } from '../../storage/records/authorization-code-storage.js';
import { AuthError } from '../../errors/auth-error.js';
import { scopeService } from '../../services/scope-service.js';
import { isValidCodeChallenge } from '../../crypto/pkce.js';
import { generateState } from '../../crypto/random.js';
import {
  RESPONSE_TYPE_CODE,
  CODE_CHALLENGE_METHOD_S256,
  GRANT_TYPE_AUTHORIZATION_CODE,
} from '../../config/constants.js';

export interface AuthorizeHandlerOptions {
  clientService: ClientService;
  pkceStorage: PkceStorage;
  authorizationCodeStorage: AuthorizationCodeStorage;
  now?: () => number;
}

/**
 * Authorization endpoint logic
 *
 * 1. Resolve the client and its redirect URI (errors here must not redirect)
 * 2. Validate response type, PKCE challenge and scopes
 * 3. Store the PKCE session and a fresh authorization code
 */
export function createAuthorizeHandler(options: AuthorizeHandlerOptions) {
  const { clientService, pkceStorage, authorizationCodeStorage } = options;
  const now = options.now ?? Date.now;

  /**
   * Validate the client/redirect pair.
   * Failures are reported to the user agent, never to the redirect URI.
   */
  const resolveClient = async (
    clientId: string | undefined,
    redirectUri: string | undefined
  ): Promise<{ client: OAuthClient; redirectUri: string }> => {
    if (!clientId) {
      throw new AuthError({ kind: 'invalid_request', detail: 'Missing client_id parameter' });
    }

    const client = await clientService.requireClient(clientId, GRANT_TYPE_AUTHORIZATION_CODE);

    if (!redirectUri || !clientService.isRegisteredRedirectUri(client, redirectUri)) {
      throw new AuthError({ kind: 'invalid_redirect_uri' });
    }

    return { client, redirectUri };
  };

  /**
   * Issue a code for an authenticated user
   */
  const authorize = async (
    client: OAuthClient,
    request: AuthorizationRequest,
    userId: string
  ): Promise<AuthorizationResponse> => {
    if (request.responseType !== RESPONSE_TYPE_CODE) {
      throw new AuthError({
        kind: 'unsupported_response_type',
        responseType: request.responseType ?? '',
      });
    }

    // RFC 9700: PKCE with S256 is mandatory
    const { codeChallenge } = request;
    if (!codeChallenge) {
      throw new AuthError({ kind: 'invalid_request', detail: 'code_challenge is required' });
    }
    if (request.codeChallengeMethod !== CODE_CHALLENGE_METHOD_S256) {
      throw new AuthError({
        kind: 'invalid_request',
        detail: 'code_challenge_method must be S256',
      });
    }
    if (!isValidCodeChallenge(codeChallenge)) {
      throw new AuthError({ kind: 'invalid_request', detail: 'Invalid code_challenge format' });
    }

    const scopes = scopeService.validateScopes(scopeService.parseScopes(request.scope), client);
    const state = request.state || generateState();

    await pkceStorage.save({
      codeChallenge,
      codeChallengeMethod: CODE_CHALLENGE_METHOD_S256,
      state,
      clientId: client.clientId,
      redirectUri: request.redirectUri,
      createdAt: now(),
    });

    const authCode = await authorizationCodeStorage.create({
      clientId: client.clientId,
      redirectUri: request.redirectUri,
      userId,
      scopes,
      codeChallenge,
      codeChallengeMethod: CODE_CHALLENGE_METHOD_S256,
      state,
    });

    return { code: authCode.code, state, redirectUri: request.redirectUri };
  };

  return { resolveClient, authorize };
}
