import { Hono } from 'hono';
import type { TokenResponse } from '@tenant-oauth/shared';
import type { OAuthEnv } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { TokenService } from '../../services/token-service.js';
import type { CredentialService } from '../../services/credential-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { parseForm } from '../../utils/form.js';
import { createAuthorizationCodeHandler } from '../../grants/authorization-code/handler.js';
import { createPasswordHandler } from '../../grants/password/handler.js';
import { createClientCredentialsHandler } from '../../grants/client-credentials/handler.js';
import { createRefreshTokenHandler } from '../../grants/refresh-token/handler.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_PASSWORD,
  GRANT_TYPE_CLIENT_CREDENTIALS,
  GRANT_TYPE_REFRESH_TOKEN,
} from '../../config/constants.js';

export interface TokenRouteOptions {
  storage: IStorage;
  tokenService: TokenService;
  credentialService: CredentialService;
}

/**
 * Create token endpoint routes
 */
export function createTokenRoutes(options: TokenRouteOptions) {
  const { storage, tokenService, credentialService } = options;

  const router = new Hono<OAuthEnv>();

  const authorizationCodeHandler = createAuthorizationCodeHandler({ storage, tokenService });
  const passwordHandler = createPasswordHandler({ storage, tokenService, credentialService });
  const clientCredentialsHandler = createClientCredentialsHandler({ storage, tokenService });
  const refreshTokenHandler = createRefreshTokenHandler({ storage, tokenService });

  // POST /token
  router.post(
    '/',
    // Public clients are accepted; grants that need a secret reject them
    clientAuthenticator({
      clientStorage: storage.clients,
      allowPublicClients: true,
    }),
    async (c) => {
      c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
      c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

      const body = await parseForm(c);
      const grantType = body['grant_type'];

      if (!grantType) {
        throw OAuthError.invalidRequest('Missing grant_type parameter');
      }

      let response: TokenResponse;

      switch (grantType) {
        case GRANT_TYPE_AUTHORIZATION_CODE:
          response = await authorizationCodeHandler(c);
          break;

        case GRANT_TYPE_PASSWORD:
          response = await passwordHandler(c);
          break;

        case GRANT_TYPE_CLIENT_CREDENTIALS:
          response = await clientCredentialsHandler(c);
          break;

        case GRANT_TYPE_REFRESH_TOKEN:
          response = await refreshTokenHandler(c);
          break;

        default:
          throw OAuthError.unsupportedGrantType(`Unsupported grant type: ${grantType}`);
      }

      return c.json(response);
    }
  );

  return router;
}
