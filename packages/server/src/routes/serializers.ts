import type { ClientSummary, TenantInfoResponse, TenantSummary, UserSummary } from '@tenant-oauth/shared';
import type { Tenant } from '../types/tenant.js';
import type { User } from '../types/user.js';
import type { OAuthClient } from '../types/client.js';
import { scopeService } from '../services/scope-service.js';

export function toTenantSummary(tenant: Tenant): TenantSummary {
  return {
    id: tenant.id,
    name: tenant.name,
    slug: tenant.slug,
    domain: tenant.domain,
    plan: tenant.plan,
  };
}

export function toTenantInfo(tenant: Tenant): TenantInfoResponse {
  return {
    ...toTenantSummary(tenant),
    max_users: tenant.maxUsers,
    is_active: tenant.active,
    created_at: tenant.createdAt.toISOString(),
  };
}

export function toUserSummary(user: User): UserSummary {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    role: user.role,
    is_active: user.active,
    created_at: user.createdAt.toISOString(),
  };
}

export function toClientSummary(client: OAuthClient): ClientSummary {
  return {
    client_id: client.clientId,
    client_name: client.name,
    redirect_uris: client.redirectUris,
    grant_types: client.allowedGrants,
    scope: scopeService.formatScopes(client.allowedScopes),
    created_at: client.createdAt.toISOString(),
  };
}
