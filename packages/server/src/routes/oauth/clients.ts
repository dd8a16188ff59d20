import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { ClientRegistrationResponse } from '@tenant-oauth/shared';
import type { OAuthEnv } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { CredentialService } from '../../services/credential-service.js';
import { scopeService } from '../../services/scope-service.js';
import { sessionAuth, type SessionOptions } from '../../middleware/session-auth.js';
import { rejectInvalid } from '../../middleware/validation.js';
import { toClientSummary } from '../serializers.js';
import {
  CLIENT_AUTH_BASIC,
  DEFAULT_CLIENT_GRANT_TYPES,
  DEFAULT_CLIENT_REDIRECT_URIS,
  DEFAULT_CLIENT_SCOPE,
  SUPPORTED_CLIENT_AUTH_METHODS,
  SUPPORTED_GRANT_TYPES,
} from '../../config/constants.js';

const redirectUriSchema = z
  .string()
  .url()
  .refine((uri) => !new URL(uri).hash, 'Redirect URI must not contain a fragment');

const registerClientSchema = z.object({
  client_name: z.string().trim().min(1).max(120),
  redirect_uris: z.array(redirectUriSchema).min(1).default(DEFAULT_CLIENT_REDIRECT_URIS),
  grant_types: z.array(z.enum(SUPPORTED_GRANT_TYPES)).min(1).default(DEFAULT_CLIENT_GRANT_TYPES),
  scope: z.string().default(DEFAULT_CLIENT_SCOPE),
  token_endpoint_auth_method: z.enum(SUPPORTED_CLIENT_AUTH_METHODS).default(CLIENT_AUTH_BASIC),
});

export interface ClientRouteOptions {
  storage: IStorage;
  credentialService: CredentialService;
  session: SessionOptions;
}

/**
 * Client registration for logged-in users (POST /client/register, GET /client/list)
 */
export function createClientRoutes(options: ClientRouteOptions) {
  const { storage, credentialService, session } = options;

  const router = new Hono<OAuthEnv>();

  router.use('*', sessionAuth({ userStorage: storage.users, session }));

  router.post('/register', zValidator('json', registerClientSchema, rejectInvalid), async (c) => {
    const tenant = c.get('tenant');
    const owner = c.get('sessionUser');
    const input = c.req.valid('json');

    const { client, clientSecret } = await credentialService.registerClient(tenant, owner, {
      name: input.client_name,
      redirectUris: input.redirect_uris,
      grantTypes: input.grant_types,
      scopes: scopeService.parseScopes(input.scope),
      authMethod: input.token_endpoint_auth_method,
    });

    const response: ClientRegistrationResponse = {
      message: 'Client registered successfully. Store client_secret securely!',
      client_id: client.clientId,
      client_name: client.name,
      redirect_uris: client.redirectUris,
      grant_types: client.allowedGrants,
      scope: scopeService.formatScopes(client.allowedScopes),
      token_endpoint_auth_method: client.authMethod,
      tenant_id: tenant.id,
      tenant_slug: tenant.slug,
    };
    if (clientSecret) {
      response.client_secret = clientSecret;
    }

    return c.json(response, 201);
  });

  router.get('/list', async (c) => {
    const tenant = c.get('tenant');
    const user = c.get('sessionUser');

    const clients = await storage.clients.listByOwner(tenant.id, user.id);

    return c.json({ clients: clients.map(toClientSummary) });
  });

  return router;
}
