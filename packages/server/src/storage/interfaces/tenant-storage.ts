import type { Tenant, CreateTenantInput, UpdateTenantInput } from '../../types/tenant.js';

/**
 * Storage interface for tenant management
 */
export interface ITenantStorage {
  /**
   * Create a new tenant
   * Throws ConflictError (`tenant.slug` or `tenant.domain`) on duplicates
   */
  create(input: CreateTenantInput): Promise<Tenant>;

  findById(id: string): Promise<Tenant | null>;

  findBySlug(slug: string): Promise<Tenant | null>;

  /**
   * Find a tenant by its registered custom domain
   */
  findByDomain(domain: string): Promise<Tenant | null>;

  /**
   * List active tenants ordered by name
   */
  listActive(): Promise<Tenant[]>;

  update(id: string, input: UpdateTenantInput): Promise<Tenant | null>;
}
