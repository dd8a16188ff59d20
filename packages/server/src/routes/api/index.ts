import { Hono } from 'hono';
import type { OAuthEnv } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import { tenantResolver, type TenantResolverOptions } from '../../middleware/tenant-resolver.js';
import { bearerAuth } from '../../middleware/bearer-auth.js';
import { scopeService } from '../../services/scope-service.js';

export interface ApiRouteOptions {
  storage: IStorage;
  tenancy: Omit<TenantResolverOptions, 'tenantStorage'>;
}

/**
 * Resource endpoints behind the bearer guard
 */
export function createApiRoutes(options: ApiRouteOptions) {
  const { storage, tenancy } = options;

  const router = new Hono<OAuthEnv>();

  router.get('/ping', (c) => c.json({ message: 'pong' }));

  router.get(
    '/status',
    tenantResolver({ tenantStorage: storage.tenants, ...tenancy }),
    bearerAuth({ storage }),
    (c) => {
      const { tenant, user, clientId, scopes } = c.get('principal');

      return c.json({
        status: 'running',
        tenant: tenant.slug,
        user: user?.username ?? null,
        client_id: clientId,
        scope: scopeService.formatScopes(scopes),
      });
    }
  );

  return router;
}
