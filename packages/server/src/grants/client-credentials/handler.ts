import type { TokenResponse } from '@tenant-oauth/shared';
import type { OAuthContext } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { TokenService } from '../../services/token-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { scopeService } from '../../services/scope-service.js';
import { isGrantAllowed, isPublicClient } from '../../services/client-policy.js';
import { parseForm } from '../../utils/form.js';
import { GRANT_TYPE_CLIENT_CREDENTIALS } from '../../config/constants.js';

export interface ClientCredentialsHandlerOptions {
  storage: IStorage;
  tokenService: TokenService;
}

/**
 * Handle client credentials grant
 *
 * RFC 6749 Section 4.4. The token carries no user and no refresh token.
 */
export function createClientCredentialsHandler(options: ClientCredentialsHandlerOptions) {
  const { storage, tokenService } = options;

  return async (c: OAuthContext): Promise<TokenResponse> => {
    const tenant = c.get('tenant');
    const { client } = c.get('client');

    if (isPublicClient(client)) {
      throw OAuthError.unauthorizedClient('Public clients cannot use client credentials grant');
    }

    if (!isGrantAllowed(client, GRANT_TYPE_CLIENT_CREDENTIALS)) {
      throw OAuthError.unauthorizedClient('Client is not authorized for client credentials grant');
    }

    const body = await parseForm(c);
    const scopes = scopeService.validateScopes(scopeService.parseScopes(body['scope']), client);

    return tokenService.issue({
      tokenStorage: storage.tokens,
      tenant,
      client,
      user: null,
      scopes,
      grantType: GRANT_TYPE_CLIENT_CREDENTIALS,
    });
  };
}
