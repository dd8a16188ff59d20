import type { Tenant } from '../types/tenant.js';

/**
 * Issuer identifier of one tenant
 */
export function tenantIssuer(baseIssuer: string, tenant: Pick<Tenant, 'slug'>): string {
  return `${baseIssuer.replace(/\/+$/, '')}/tenants/${tenant.slug}`;
}
