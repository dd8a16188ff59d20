import type { Tenant, CreateTenantInput, UpdateTenantInput } from '../../types/tenant.js';
import type { ITenantStorage } from '../interfaces/tenant-storage.js';
import { UndoJournal } from './journal.js';
import { ConflictError } from '../../errors/storage-error.js';
import { generateId } from '../../crypto/random.js';
import { DEFAULT_MAX_USERS, DEFAULT_TENANT_PLAN } from '../../config/constants.js';

/**
 * In-memory tenant storage implementation
 */
export class MemoryTenantStorage implements ITenantStorage {
  private readonly tenants = new Map<string, Tenant>();
  private readonly slugIndex = new Map<string, string>(); // slug -> id
  private readonly domainIndex = new Map<string, string>(); // domain -> id

  constructor(private readonly journal: UndoJournal = new UndoJournal()) {}

  async create(input: CreateTenantInput): Promise<Tenant> {
    const domain = input.domain ?? null;

    if (this.slugIndex.has(input.slug)) {
      throw new ConflictError('tenant.slug');
    }
    if (domain && this.domainIndex.has(domain)) {
      throw new ConflictError('tenant.domain');
    }

    const now = new Date();
    const tenant: Tenant = {
      id: generateId(),
      name: input.name,
      slug: input.slug,
      domain,
      plan: input.plan ?? DEFAULT_TENANT_PLAN,
      maxUsers: input.maxUsers ?? DEFAULT_MAX_USERS,
      active: true,
      settings: input.settings ?? {},
      createdAt: now,
      updatedAt: now,
    };

    this.journal.set(this.tenants, tenant.id, tenant);
    this.journal.set(this.slugIndex, tenant.slug, tenant.id);
    if (domain) {
      this.journal.set(this.domainIndex, domain, tenant.id);
    }

    return tenant;
  }

  async findById(id: string): Promise<Tenant | null> {
    return this.tenants.get(id) ?? null;
  }

  async findBySlug(slug: string): Promise<Tenant | null> {
    const id = this.slugIndex.get(slug);
    if (!id) return null;
    return this.tenants.get(id) ?? null;
  }

  async findByDomain(domain: string): Promise<Tenant | null> {
    const id = this.domainIndex.get(domain);
    if (!id) return null;
    return this.tenants.get(id) ?? null;
  }

  async listActive(): Promise<Tenant[]> {
    return Array.from(this.tenants.values())
      .filter((tenant) => tenant.active)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async update(id: string, input: UpdateTenantInput): Promise<Tenant | null> {
    const existing = this.tenants.get(id);
    if (!existing) return null;

    const domain = input.domain === undefined ? existing.domain : input.domain;
    if (domain && domain !== existing.domain) {
      const owner = this.domainIndex.get(domain);
      if (owner && owner !== id) {
        throw new ConflictError('tenant.domain');
      }
    }

    const updated: Tenant = {
      ...existing,
      name: input.name ?? existing.name,
      domain,
      plan: input.plan ?? existing.plan,
      maxUsers: input.maxUsers ?? existing.maxUsers,
      active: input.active ?? existing.active,
      settings: input.settings ?? existing.settings,
      updatedAt: new Date(),
    };

    if (existing.domain && existing.domain !== domain) {
      this.journal.delete(this.domainIndex, existing.domain);
    }
    if (domain) {
      this.journal.set(this.domainIndex, domain, id);
    }
    this.journal.set(this.tenants, id, updated);

    return updated;
  }
}
