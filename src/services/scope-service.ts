import type { OAuthClient } from '../types/client.js';
import { AuthError } from '../errors/auth-error.js';

/**
 * Service for OAuth scope validation and manipulation
 */
export class ScopeService {
  /**
   * Parse a space-delimited scope string into an array (duplicates removed)
   */
  parseScopes(scopeString: string | undefined): string[] {
    if (!scopeString) {
      return [];
    }
    const scopes = scopeString
      .split(' ')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
    return [...new Set(scopes)];
  }

  /**
   * Convert scope array to space-delimited string
   */
  formatScopes(scopes: string[]): string {
    return scopes.join(' ');
  }

  /**
   * Validate requested scopes against the client's allowed scopes
   *
   * @returns The granted scopes (client defaults when none were requested)
   */
  validateScopes(requestedScopes: string[], client: OAuthClient): string[] {
    if (requestedScopes.length === 0) {
      return client.defaultScopes ?? [];
    }

    const invalidScopes = requestedScopes.filter(
      (scope) => !client.allowedScopes.includes(scope)
    );
    if (invalidScopes.length > 0) {
      throw new AuthError({ kind: 'invalid_scope', scopes: invalidScopes });
    }

    return requestedScopes;
  }

  /**
   * Narrow a grant to a requested subset; widening is rejected
   */
  downscope(granted: string[], requested: string[]): string[] {
    if (requested.length === 0) {
      return granted;
    }

    const extra = requested.filter((scope) => !granted.includes(scope));
    if (extra.length > 0) {
      throw new AuthError({ kind: 'invalid_scope', scopes: extra });
    }
    return requested;
  }

  /**
   * Check that every required scope is present
   */
  hasAllScopes(scopes: string[], required: string[]): boolean {
    return required.every((scope) => scopes.includes(scope));
  }
}

// Singleton instance
export const scopeService = new ScopeService();
