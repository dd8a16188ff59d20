import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { TenantListResponse, TenantRegistrationResponse } from '@tenant-oauth/shared';
import type { OAuthEnv } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { TenantService } from '../../services/tenant-service.js';
import { rejectInvalid } from '../../middleware/validation.js';
import { toTenantSummary } from '../serializers.js';
import { DEFAULT_TENANT_PLAN, HEADER_TENANT_SLUG, TENANT_PLANS } from '../../config/constants.js';

const registerTenantSchema = z.object({
  tenant_name: z.string().trim().min(1).max(100),
  tenant_slug: z
    .string()
    .trim()
    .toLowerCase()
    .min(1)
    .max(50)
    .regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, 'Invalid slug format. Use lowercase letters, numbers, and hyphens only'),
  admin_username: z.string().trim().min(1).max(80),
  admin_email: z.string().trim().email().max(120),
  admin_password: z.string().min(8),
  domain: z.string().trim().toLowerCase().min(1).max(255).nullish(),
  plan: z.enum(TENANT_PLANS).default(DEFAULT_TENANT_PLAN),
});

export interface TenantDirectoryRouteOptions {
  storage: IStorage;
  tenantService: TenantService;
  baseDomain: string;
}

/**
 * Public tenant endpoints; no tenant context needed
 */
export function createTenantDirectoryRoutes(options: TenantDirectoryRouteOptions) {
  const { storage, tenantService, baseDomain } = options;

  const router = new Hono<OAuthEnv>();

  // POST /register - tenant plus its owner account
  router.post('/register', zValidator('json', registerTenantSchema, rejectInvalid), async (c) => {
    const input = c.req.valid('json');

    const { tenant, owner } = await tenantService.registerTenant({
      name: input.tenant_name,
      slug: input.tenant_slug,
      domain: input.domain ?? null,
      plan: input.plan,
      adminUsername: input.admin_username,
      adminEmail: input.admin_email,
      adminPassword: input.admin_password,
    });

    const response: TenantRegistrationResponse = {
      message: 'Tenant registered successfully',
      tenant: toTenantSummary(tenant),
      admin: {
        id: owner.id,
        username: owner.username,
        email: owner.email,
        role: 'owner',
      },
      access_info: {
        subdomain: `${tenant.slug}.${baseDomain}`,
        header: `${HEADER_TENANT_SLUG}: ${tenant.slug}`,
        path: `/tenants/${tenant.slug}/...`,
      },
    };

    return c.json(response, 201);
  });

  // GET /list - active tenants only
  router.get('/list', async (c) => {
    const tenants = await storage.tenants.listActive();

    const response: TenantListResponse = {
      tenants: tenants.map((tenant) => ({
        slug: tenant.slug,
        name: tenant.name,
        domain: tenant.domain,
      })),
    };

    return c.json(response);
  });

  return router;
}
