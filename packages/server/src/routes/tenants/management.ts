import { Hono } from 'hono';
import { getCookie } from 'hono/cookie';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { TenantSettingsResponse } from '@tenant-oauth/shared';
import type { OAuthEnv } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { TenantService } from '../../services/tenant-service.js';
import type { CredentialService } from '../../services/credential-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { tenantResolver, type TenantResolverOptions } from '../../middleware/tenant-resolver.js';
import { sessionAuth, requireRole, type SessionOptions } from '../../middleware/session-auth.js';
import { rejectInvalid } from '../../middleware/validation.js';
import { verifySession } from '../../crypto/session.js';
import { registerUserSchema } from '../oauth/account.js';
import { toTenantInfo, toUserSummary } from '../serializers.js';
import { SESSION_COOKIE_NAME, USER_ROLES } from '../../config/constants.js';

const createUserSchema = registerUserSchema.extend({
  role: z.enum(USER_ROLES).default('user'),
});

const updateRoleSchema = z.object({
  role: z.enum(USER_ROLES),
});

const updateSettingsSchema = z.object({
  settings: z.record(z.unknown()),
});

export interface TenantManagementRouteOptions {
  storage: IStorage;
  tenantService: TenantService;
  credentialService: CredentialService;
  tenancy: Omit<TenantResolverOptions, 'tenantStorage'>;
  session: SessionOptions;
}

/**
 * Endpoints acting on the resolved tenant
 *
 * Everything except /info needs a session of an admin or owner.
 */
export function createTenantManagementRoutes(options: TenantManagementRouteOptions) {
  const { storage, tenantService, credentialService, tenancy, session } = options;

  const router = new Hono<OAuthEnv>();

  router.use('*', tenantResolver({ tenantStorage: storage.tenants, ...tenancy }));

  const authenticated = sessionAuth({ userStorage: storage.users, session });
  const adminOnly = requireRole('admin', 'owner');
  const ownerOnly = requireRole('owner');

  // GET /info - public, but a session from another tenant is refused
  router.get('/info', async (c) => {
    const tenant = c.get('tenant');

    const cookie = getCookie(c, SESSION_COOKIE_NAME);
    const claims = cookie ? await verifySession(cookie, session.secret) : null;
    if (claims && claims.tenantId !== tenant.id) {
      throw OAuthError.accessDenied('Session belongs to a different tenant');
    }

    return c.json(toTenantInfo(tenant));
  });

  router.get('/stats', authenticated, adminOnly, async (c) => {
    return c.json(await tenantService.getStats(c.get('tenant')));
  });

  router.get('/users', authenticated, adminOnly, async (c) => {
    const users = await storage.users.listByTenant(c.get('tenant').id);
    return c.json({ users: users.map(toUserSummary), total: users.length });
  });

  router.post(
    '/users',
    authenticated,
    adminOnly,
    zValidator('json', createUserSchema, rejectInvalid),
    async (c) => {
      const tenant = c.get('tenant');
      const input = c.req.valid('json');

      if (input.role === 'owner' && c.get('sessionUser').role !== 'owner') {
        throw OAuthError.accessDenied('Owner access required');
      }

      const user = await credentialService.registerUser(tenant, input);

      return c.json(
        {
          message: 'User created successfully',
          user: { id: user.id, username: user.username, email: user.email, role: user.role },
        },
        201
      );
    }
  );

  router.put(
    '/users/:id/role',
    authenticated,
    ownerOnly,
    zValidator('json', updateRoleSchema, rejectInvalid),
    async (c) => {
      const { role } = c.req.valid('json');

      const user = await tenantService.changeRole(
        c.get('tenant'),
        c.get('sessionUser'),
        c.req.param('id'),
        role
      );

      return c.json({
        message: 'User role updated',
        user: { id: user.id, username: user.username, role: user.role },
      });
    }
  );

  router.get('/settings', authenticated, adminOnly, (c) => {
    const tenant = c.get('tenant');

    const response: TenantSettingsResponse = {
      settings: tenant.settings,
      plan: tenant.plan,
      max_users: tenant.maxUsers,
    };
    return c.json(response);
  });

  router.put(
    '/settings',
    authenticated,
    ownerOnly,
    zValidator('json', updateSettingsSchema, rejectInvalid),
    async (c) => {
      const { settings } = c.req.valid('json');

      const updated = await tenantService.replaceSettings(c.get('tenant'), settings);

      return c.json({ message: 'Settings updated', settings: updated.settings });
    }
  );

  return router;
}
