import type { TenantPlan, TenantSettings } from '@tenant-oauth/shared';

export type { TenantPlan, TenantSettings };

/**
 * Tenant (organization) owning users, clients and tokens
 */
export interface Tenant {
  id: string;
  name: string;
  slug: string;
  domain: string | null;
  plan: TenantPlan;
  maxUsers: number;
  active: boolean;
  settings: TenantSettings;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Tenant creation input
 */
export interface CreateTenantInput {
  name: string;
  slug: string;
  domain?: string | null;
  plan?: TenantPlan;
  maxUsers?: number;
  settings?: TenantSettings;
}

/**
 * Tenant update input
 */
export interface UpdateTenantInput {
  name?: string;
  domain?: string | null;
  plan?: TenantPlan;
  maxUsers?: number;
  active?: boolean;
  settings?: TenantSettings;
}
