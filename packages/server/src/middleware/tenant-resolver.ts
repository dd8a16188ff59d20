import type { MiddlewareHandler } from 'hono';
import type { OAuthEnv } from '../types/hono.js';
import type { Tenant } from '../types/tenant.js';
import type { ITenantStorage } from '../storage/interfaces/index.js';
import { OAuthError } from '../errors/oauth-error.js';
import {
  DEFAULT_RESERVED_SUBDOMAINS,
  HEADER_TENANT_ID,
  HEADER_TENANT_SLUG,
} from '../config/constants.js';

export interface TenantResolverOptions {
  tenantStorage: ITenantStorage;
  /** First host labels that never name a tenant */
  reservedSubdomains?: string[];
  /** Only match custom domains on https requests */
  customDomainHttpsOnly?: boolean;
}

/**
 * The parts of a request tenant resolution looks at
 */
export interface TenantRequest {
  url: string;
  header(name: string): string | undefined;
}

type Strategy = (request: TenantRequest, url: URL) => Promise<Tenant | null>;

/**
 * Resolve the tenant a request is addressed to
 *
 * Tried in order, first match wins:
 * 1. `X-Tenant-Slug` header
 * 2. `X-Tenant-ID` header
 * 3. subdomain (`acme.example.com`), unless the label is reserved
 * 4. custom domain registered on the tenant
 * 5. path prefix `/tenants/<slug>/...`
 */
export async function resolveTenant(
  options: TenantResolverOptions,
  request: TenantRequest
): Promise<Tenant> {
  const {
    tenantStorage,
    reservedSubdomains = DEFAULT_RESERVED_SUBDOMAINS,
    customDomainHttpsOnly = false,
  } = options;

  const strategies: Strategy[] = [
    async (req) => {
      const slug = req.header(HEADER_TENANT_SLUG)?.trim();
      return slug ? tenantStorage.findBySlug(slug) : null;
    },
    async (req) => {
      const id = req.header(HEADER_TENANT_ID)?.trim();
      return id ? tenantStorage.findById(id) : null;
    },
    async (_req, url) => {
      const labels = url.hostname.split('.');
      const subdomain = labels[0]?.toLowerCase();
      if (labels.length < 3 || !subdomain || reservedSubdomains.includes(subdomain)) {
        return null;
      }
      return tenantStorage.findBySlug(subdomain);
    },
    async (_req, url) => {
      if (customDomainHttpsOnly && url.protocol !== 'https:') {
        return null;
      }
      return tenantStorage.findByDomain(url.hostname.toLowerCase());
    },
    async (_req, url) => {
      const segments = url.pathname.split('/');
      const slug = segments[2];
      return segments[1] === 'tenants' && slug ? tenantStorage.findBySlug(slug) : null;
    },
  ];

  const url = new URL(request.url);

  for (const strategy of strategies) {
    const tenant = await strategy(request, url);
    if (!tenant) {
      continue;
    }
    if (!tenant.active) {
      throw OAuthError.tenantInactive();
    }
    return tenant;
  }

  throw OAuthError.tenantNotIdentified();
}

/**
 * Middleware to resolve the tenant and bind it to the request context
 *
 * Sets `tenant` in context variables
 */
export function tenantResolver(options: TenantResolverOptions): MiddlewareHandler<OAuthEnv> {
  return async (c, next) => {
    const tenant = await resolveTenant(options, {
      url: c.req.url,
      header: (name) => c.req.header(name),
    });

    c.set('tenant', tenant);

    await next();
  };
}
