import type { TokenResponse } from '@tenant-oauth/shared';
import type { OAuthContext } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { TokenService } from '../../services/token-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { scopeService } from '../../services/scope-service.js';
import { isGrantAllowed } from '../../services/client-policy.js';
import { verifyCodeChallenge, isValidCodeVerifier } from '../../crypto/pkce.js';
import { parseForm } from '../../utils/form.js';
import { GRANT_TYPE_AUTHORIZATION_CODE } from '../../config/constants.js';

export interface AuthorizationCodeHandlerOptions {
  storage: IStorage;
  tokenService: TokenService;
}

/**
 * Handle authorization code grant
 *
 * RFC 6749 Section 4.1.3, RFC 7636 Section 4.5
 */
export function createAuthorizationCodeHandler(options: AuthorizationCodeHandlerOptions) {
  const { storage, tokenService } = options;

  return async (c: OAuthContext): Promise<TokenResponse> => {
    const tenant = c.get('tenant');
    const { client } = c.get('client');

    const body = await parseForm(c);
    const code = body['code'];
    const redirectUri = body['redirect_uri'];
    const codeVerifier = body['code_verifier'];

    if (!code) {
      throw OAuthError.invalidRequest('Missing code parameter');
    }

    if (!redirectUri) {
      throw OAuthError.invalidRequest('Missing redirect_uri parameter');
    }

    if (!isGrantAllowed(client, GRANT_TYPE_AUTHORIZATION_CODE)) {
      throw OAuthError.unauthorizedClient('Client is not authorized for authorization code grant');
    }

    const authCode = await storage.authorizationCodes.findByValue(tenant.id, code);

    if (!authCode) {
      throw OAuthError.invalidGrant('Invalid authorization code');
    }

    if (authCode.clientId !== client.clientId) {
      throw OAuthError.invalidGrant('Authorization code was issued to a different client');
    }

    if (authCode.usedAt) {
      throw OAuthError.invalidGrant('Authorization code has already been used');
    }

    if (authCode.expiresAt.getTime() <= Date.now()) {
      throw OAuthError.invalidGrant('Authorization code has expired');
    }

    if (authCode.redirectUri !== redirectUri) {
      throw OAuthError.invalidGrant('redirect_uri does not match');
    }

    if (authCode.codeChallenge) {
      if (!codeVerifier) {
        throw OAuthError.invalidGrant('Missing code_verifier');
      }
      if (!isValidCodeVerifier(codeVerifier)) {
        throw OAuthError.invalidGrant('Invalid code_verifier format');
      }
      const method = authCode.codeChallengeMethod ?? '';
      if (!verifyCodeChallenge(codeVerifier, authCode.codeChallenge, method)) {
        throw OAuthError.invalidGrant('Invalid code_verifier');
      }
    } else if (codeVerifier) {
      throw OAuthError.invalidGrant('code_verifier sent for a code issued without code_challenge');
    }

    return storage.transaction(async (tx) => {
      // Of concurrent redemptions only one gets the record back
      const consumed = await tx.authorizationCodes.consume(tenant.id, code);
      if (!consumed) {
        throw OAuthError.invalidGrant('Authorization code has already been used');
      }

      const user = await tx.users.findById(tenant.id, consumed.userId);
      if (!user || !user.active) {
        throw OAuthError.invalidGrant('Resource owner is no longer active');
      }

      return tokenService.issue({
        tokenStorage: tx.tokens,
        tenant,
        client,
        user,
        scopes: scopeService.parseScopes(consumed.scope),
        grantType: GRANT_TYPE_AUTHORIZATION_CODE,
      });
    });
  };
}
