import type { TenantPlan, TenantStatsResponse } from '@tenant-oauth/shared';
import type { Tenant, TenantSettings } from '../types/tenant.js';
import type { User, UserRole } from '../types/user.js';
import type { IStorage } from '../storage/interfaces/index.js';
import { OAuthError } from '../errors/oauth-error.js';
import { ConflictError } from '../errors/storage-error.js';
import { CredentialService } from './credential-service.js';
import { DEFAULT_MAX_USERS, RESERVED_TENANT_SLUGS } from '../config/constants.js';

export interface RegisterTenantInput {
  name: string;
  slug: string;
  domain?: string | null;
  plan?: TenantPlan;
  adminUsername: string;
  adminEmail: string;
  adminPassword: string;
}

/**
 * Tenant lifecycle and reporting
 */
export class TenantService {
  private readonly defaultMaxUsers: number;

  constructor(
    private readonly storage: IStorage,
    options: { defaultMaxUsers?: number } = {}
  ) {
    this.defaultMaxUsers = options.defaultMaxUsers ?? DEFAULT_MAX_USERS;
  }

  /**
   * Create a tenant together with its owner account
   *
   * Both rows are written in one transaction.
   */
  async registerTenant(input: RegisterTenantInput): Promise<{ tenant: Tenant; owner: User }> {
    if (RESERVED_TENANT_SLUGS.includes(input.slug)) {
      throw OAuthError.invalidRequest(`Tenant slug "${input.slug}" is reserved`);
    }

    return this.storage.transaction(async (tx) => {
      let tenant: Tenant;
      try {
        tenant = await tx.tenants.create({
          name: input.name,
          slug: input.slug,
          domain: input.domain ?? null,
          plan: input.plan,
          maxUsers: this.defaultMaxUsers,
        });
      } catch (error) {
        if (error instanceof ConflictError) {
          throw OAuthError.conflict(
            error.target === 'tenant.domain' ? 'Domain already registered' : 'Tenant slug already exists'
          );
        }
        throw error;
      }

      const owner = await new CredentialService(tx).registerUser(tenant, {
        username: input.adminUsername,
        email: input.adminEmail,
        password: input.adminPassword,
        role: 'owner',
      });

      return { tenant, owner };
    });
  }

  async getStats(tenant: Tenant): Promise<TenantStatsResponse> {
    const [totalUsers, activeUsers, totalClients, activeTokens] = await Promise.all([
      this.storage.users.countByTenant(tenant.id),
      this.storage.users.countByTenant(tenant.id, { activeOnly: true }),
      this.storage.clients.countByTenant(tenant.id),
      this.storage.tokens.countActive(tenant.id),
    ]);

    return {
      total_users: totalUsers,
      active_users: activeUsers,
      total_clients: totalClients,
      active_tokens: activeTokens,
      plan: tenant.plan,
      max_users: tenant.maxUsers,
    };
  }

  /**
   * Change a user's role on behalf of `actor`
   *
   * Nobody changes their own role, and the last owner cannot be demoted.
   */
  async changeRole(tenant: Tenant, actor: User, userId: string, role: UserRole): Promise<User> {
    if (actor.id === userId) {
      throw OAuthError.invalidRequest('Cannot change your own role');
    }

    return this.storage.transaction(async (tx) => {
      const target = await tx.users.findById(tenant.id, userId);
      if (!target) {
        throw OAuthError.notFound('User not found in this tenant');
      }

      if (target.role === 'owner' && role !== 'owner') {
        const owners = await tx.users.countByTenant(tenant.id, { role: 'owner' });
        if (owners <= 1) {
          throw OAuthError.invalidRequest('Cannot demote the last owner');
        }
      }

      const updated = await tx.users.updateRole(tenant.id, userId, role);
      if (!updated) {
        throw OAuthError.notFound('User not found in this tenant');
      }
      return updated;
    });
  }

  /**
   * Replace the tenant's settings object
   */
  async replaceSettings(tenant: Tenant, settings: TenantSettings): Promise<Tenant> {
    const updated = await this.storage.tenants.update(tenant.id, { settings });
    if (!updated) {
      throw OAuthError.notFound('Tenant not found');
    }
    return updated;
  }
}
