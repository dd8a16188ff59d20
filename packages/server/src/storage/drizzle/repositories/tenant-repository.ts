import { asc, eq } from 'drizzle-orm';
import type { Tenant, CreateTenantInput, UpdateTenantInput } from '../../../types/tenant.js';
import type { ITenantStorage } from '../../interfaces/tenant-storage.js';
import type { Database } from '../client.js';
import { tenants } from '../schema.js';
import { withConflictMapping } from '../errors.js';
import { generateId } from '../../../crypto/random.js';

const TENANT_CONFLICTS = {
  tenants_slug_unique: 'tenant.slug',
  tenants_domain_unique: 'tenant.domain',
};

/**
 * Postgres tenant storage implementation
 */
export class DrizzleTenantStorage implements ITenantStorage {
  constructor(private readonly db: Database) {}

  async create(input: CreateTenantInput): Promise<Tenant> {
    const rows = await withConflictMapping(
      () =>
        this.db
          .insert(tenants)
          .values({
            id: generateId(),
            name: input.name,
            slug: input.slug,
            domain: input.domain ?? null,
            plan: input.plan,
            maxUsers: input.maxUsers,
            settings: input.settings,
          })
          .returning(),
      TENANT_CONFLICTS
    );

    const row = rows[0];
    if (!row) {
      throw new Error('Tenant insert returned no row');
    }
    return row;
  }

  async findById(id: string): Promise<Tenant | null> {
    const rows = await this.db.select().from(tenants).where(eq(tenants.id, id)).limit(1);
    return rows[0] ?? null;
  }

  async findBySlug(slug: string): Promise<Tenant | null> {
    const rows = await this.db.select().from(tenants).where(eq(tenants.slug, slug)).limit(1);
    return rows[0] ?? null;
  }

  async findByDomain(domain: string): Promise<Tenant | null> {
    const rows = await this.db.select().from(tenants).where(eq(tenants.domain, domain)).limit(1);
    return rows[0] ?? null;
  }

  async listActive(): Promise<Tenant[]> {
    return this.db.select().from(tenants).where(eq(tenants.active, true)).orderBy(asc(tenants.name));
  }

  async update(id: string, input: UpdateTenantInput): Promise<Tenant | null> {
    const rows = await withConflictMapping(
      () =>
        this.db
          .update(tenants)
          .set({ ...input, updatedAt: new Date() })
          .where(eq(tenants.id, id))
          .returning(),
      TENANT_CONFLICTS
    );
    return rows[0] ?? null;
  }
}
