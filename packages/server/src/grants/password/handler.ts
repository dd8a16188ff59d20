import type { TokenResponse } from '@tenant-oauth/shared';
import type { OAuthContext } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { TokenService } from '../../services/token-service.js';
import type { CredentialService } from '../../services/credential-service.js';
import type { User } from '../../types/user.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { ERROR_AUTH_FAILED } from '../../errors/error-codes.js';
import { scopeService } from '../../services/scope-service.js';
import { isGrantAllowed, isPublicClient } from '../../services/client-policy.js';
import { parseForm } from '../../utils/form.js';
import { GRANT_TYPE_PASSWORD } from '../../config/constants.js';

export interface PasswordHandlerOptions {
  storage: IStorage;
  tokenService: TokenService;
  credentialService: CredentialService;
}

/**
 * Handle resource owner password credentials grant
 *
 * RFC 6749 Section 4.3. Confidential clients only.
 */
export function createPasswordHandler(options: PasswordHandlerOptions) {
  const { storage, tokenService, credentialService } = options;

  return async (c: OAuthContext): Promise<TokenResponse> => {
    const tenant = c.get('tenant');
    const { client } = c.get('client');

    if (isPublicClient(client)) {
      throw OAuthError.unauthorizedClient('Public clients cannot use the password grant');
    }

    if (!isGrantAllowed(client, GRANT_TYPE_PASSWORD)) {
      throw OAuthError.unauthorizedClient('Client is not authorized for password grant');
    }

    const body = await parseForm(c);
    const username = body['username'];
    const password = body['password'];

    if (!username || !password) {
      throw OAuthError.invalidRequest('Missing username or password parameter');
    }

    const scopes = scopeService.validateScopes(scopeService.parseScopes(body['scope']), client);

    let user: User;
    try {
      user = await credentialService.authenticate(tenant.id, username, password);
    } catch (error) {
      if (error instanceof OAuthError && error.code === ERROR_AUTH_FAILED) {
        throw OAuthError.invalidGrant('Invalid resource owner credentials');
      }
      throw error;
    }

    return tokenService.issue({
      tokenStorage: storage.tokens,
      tenant,
      client,
      user,
      scopes,
      grantType: GRANT_TYPE_PASSWORD,
    });
  };
}
