import { Hono } from 'hono';
import type { IntrospectionResponse } from '@tenant-oauth/shared';
import type { OAuthEnv } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { Token } from '../../types/token.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { parseForm } from '../../utils/form.js';
import { tenantIssuer } from '../../utils/issuer.js';
import { TOKEN_TYPE_BEARER, TOKEN_TYPE_HINT_REFRESH } from '../../config/constants.js';

export interface IntrospectRouteOptions {
  storage: IStorage;
  issuer: string;
}

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Create token introspection endpoint routes
 *
 * RFC 7662
 */
export function createIntrospectRoutes(options: IntrospectRouteOptions) {
  const { storage, issuer } = options;

  const router = new Hono<OAuthEnv>();

  // POST /introspect
  router.post(
    '/',
    // Resource servers introspect with their own confidential credentials
    clientAuthenticator({
      clientStorage: storage.clients,
      allowPublicClients: false,
    }),
    async (c) => {
      const tenant = c.get('tenant');

      const body = await parseForm(c);
      const value = body['token'];

      if (!value) {
        throw OAuthError.invalidRequest('Missing token parameter');
      }

      const now = Date.now();
      const inactive: IntrospectionResponse = { active: false };

      let token: Token | null = null;
      let expiresAt: Date | null = null;

      if (body['token_type_hint'] === TOKEN_TYPE_HINT_REFRESH) {
        token = await storage.tokens.findByRefreshToken(tenant.id, value);
        if (token && !token.refreshRevokedAt) {
          expiresAt = token.refreshExpiresAt;
        }
      } else {
        token = await storage.tokens.findByAccessToken(tenant.id, value);
        if (token && !token.accessRevokedAt) {
          expiresAt = token.accessExpiresAt;
        }
      }

      if (!token || !expiresAt || expiresAt.getTime() <= now) {
        return c.json(inactive);
      }

      const response: IntrospectionResponse = {
        active: true,
        client_id: token.clientId,
        scope: token.scope,
        token_type: TOKEN_TYPE_BEARER,
        exp: toEpochSeconds(expiresAt),
        iat: toEpochSeconds(token.issuedAt),
        iss: tenantIssuer(issuer, tenant),
      };

      if (token.userId) {
        const user = await storage.users.findById(tenant.id, token.userId);
        if (!user || !user.active) {
          return c.json(inactive);
        }
        response.sub = user.id;
        response.username = user.username;
      }

      return c.json(response);
    }
  );

  return router;
}
