import type { OAuthClient } from '../types/client.js';
import { OAuthError } from '../errors/oauth-error.js';

/**
 * Service for OAuth scope validation and manipulation
 */
export class ScopeService {
  /**
   * Parse a space-delimited scope string into an array without duplicates
   */
  parseScopes(scopeString: string | null | undefined): string[] {
    if (!scopeString) {
      return [];
    }
    const scopes = scopeString
      .split(/\s+/)
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
    return Array.from(new Set(scopes));
  }

  /**
   * Convert scope array to space-delimited string
   */
  formatScopes(scopes: string[]): string {
    return scopes.join(' ');
  }

  /**
   * Validate requested scopes against the client's registered scopes
   *
   * An empty request grants every scope registered for the client.
   */
  validateScopes(
    requestedScopes: string[],
    client: Pick<OAuthClient, 'allowedScopes'>,
    state?: string
  ): string[] {
    if (requestedScopes.length === 0) {
      return [...client.allowedScopes];
    }

    const invalidScopes = requestedScopes.filter((scope) => !client.allowedScopes.includes(scope));

    if (invalidScopes.length > 0) {
      throw OAuthError.invalidScope(
        `Invalid or unauthorized scopes: ${invalidScopes.join(', ')}`,
        state
      );
    }

    return requestedScopes;
  }

  /**
   * Narrow a previously granted scope set
   * Used during refresh; a request may drop scopes but never add them
   */
  narrowScopes(requestedScopes: string[], grantedScopes: string[]): string[] {
    if (requestedScopes.length === 0) {
      return grantedScopes;
    }

    const invalidScopes = requestedScopes.filter((scope) => !grantedScopes.includes(scope));

    if (invalidScopes.length > 0) {
      throw OAuthError.invalidScope(
        `Cannot request scopes not in original grant: ${invalidScopes.join(', ')}`
      );
    }

    return requestedScopes;
  }

  hasScope(scopes: string[], scope: string): boolean {
    return scopes.includes(scope);
  }

  /**
   * Check if a scope set includes all required scopes
   */
  hasAllScopes(scopes: string[], requiredScopes: string[]): boolean {
    return requiredScopes.every((scope) => scopes.includes(scope));
  }
}

// Singleton instance
export const scopeService = new ScopeService();
