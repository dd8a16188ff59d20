import type { TokenResponse } from '@tenant-oauth/shared';
import type { OAuthContext } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { TokenService } from '../../services/token-service.js';
import type { User } from '../../types/user.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { scopeService } from '../../services/scope-service.js';
import { isGrantAllowed } from '../../services/client-policy.js';
import { parseForm } from '../../utils/form.js';
import { GRANT_TYPE_REFRESH_TOKEN } from '../../config/constants.js';

export interface RefreshTokenHandlerOptions {
  storage: IStorage;
  tokenService: TokenService;
}

/**
 * Handle refresh token grant
 *
 * RFC 6749 Section 6
 *
 * Implements refresh token rotation with replay detection:
 * - Each refresh token can only be used once
 * - A new pair is issued with each refresh, in the same family
 * - Presenting a revoked refresh token revokes the entire family
 */
export function createRefreshTokenHandler(options: RefreshTokenHandlerOptions) {
  const { storage, tokenService } = options;

  return async (c: OAuthContext): Promise<TokenResponse> => {
    const tenant = c.get('tenant');
    const { client } = c.get('client');

    const body = await parseForm(c);
    const refreshTokenValue = body['refresh_token'];

    if (!refreshTokenValue) {
      throw OAuthError.invalidRequest('Missing refresh_token parameter');
    }

    if (!isGrantAllowed(client, GRANT_TYPE_REFRESH_TOKEN)) {
      throw OAuthError.unauthorizedClient('Client is not authorized for refresh token grant');
    }

    const current = await storage.tokens.findByRefreshToken(tenant.id, refreshTokenValue);

    if (!current) {
      throw OAuthError.invalidGrant('Invalid refresh token');
    }

    if (current.clientId !== client.clientId) {
      throw OAuthError.invalidGrant('Refresh token was issued to a different client');
    }

    // A revoked refresh token coming back means it leaked
    if (current.refreshRevokedAt) {
      await storage.tokens.revokeFamily(tenant.id, current.familyId);
      throw OAuthError.invalidGrant('Refresh token has been revoked');
    }

    if (!current.refreshExpiresAt || current.refreshExpiresAt.getTime() <= Date.now()) {
      throw OAuthError.invalidGrant('Refresh token has expired');
    }

    const scopes = scopeService.narrowScopes(
      scopeService.parseScopes(body['scope']),
      scopeService.parseScopes(current.scope)
    );

    let user: User | null = null;
    if (current.userId) {
      user = await storage.users.findById(tenant.id, current.userId);
      if (!user || !user.active) {
        throw OAuthError.invalidGrant('Resource owner is no longer active');
      }
    }

    return storage.transaction(async (tx) => {
      const rotated = await tx.tokens.rotate(tenant.id, current.id);
      if (!rotated) {
        throw OAuthError.invalidGrant('Refresh token has been revoked');
      }

      return tokenService.issue({
        tokenStorage: tx.tokens,
        tenant,
        client,
        user,
        scopes,
        grantType: GRANT_TYPE_REFRESH_TOKEN,
        familyId: current.familyId,
        parentTokenId: current.id,
      });
    });
  };
}
