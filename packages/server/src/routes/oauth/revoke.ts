import { Hono } from 'hono';
import type { OAuthEnv } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { TokenService } from '../../services/token-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { parseForm } from '../../utils/form.js';
import { TOKEN_TYPE_HINT_ACCESS, TOKEN_TYPE_HINT_REFRESH } from '../../config/constants.js';

export interface RevokeRouteOptions {
  storage: IStorage;
  tokenService: TokenService;
}

/**
 * Create token revocation endpoint routes
 *
 * RFC 7009
 */
export function createRevokeRoutes(options: RevokeRouteOptions) {
  const { storage, tokenService } = options;

  const router = new Hono<OAuthEnv>();

  // POST /revoke
  router.post(
    '/',
    clientAuthenticator({
      clientStorage: storage.clients,
      allowPublicClients: true,
    }),
    async (c) => {
      const tenant = c.get('tenant');
      const { client } = c.get('client');

      const body = await parseForm(c);
      const token = body['token'];
      const hint = body['token_type_hint'];

      if (!token) {
        throw OAuthError.invalidRequest('Missing token parameter');
      }

      // Unknown hints are ignored, RFC 7009 Section 2.1
      const typeHint =
        hint === TOKEN_TYPE_HINT_ACCESS || hint === TOKEN_TYPE_HINT_REFRESH ? hint : undefined;

      // 200 whether or not the token was found
      await tokenService.revoke(storage.tokens, tenant.id, client.clientId, token, typeHint);

      return c.json({});
    }
  );

  return router;
}
