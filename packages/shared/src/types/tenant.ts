/**
 * Subscription plans a tenant can be on
 */
export type TenantPlan = 'free' | 'basic' | 'premium' | 'enterprise';

export interface TenantSummary {
  id: string;
  name: string;
  slug: string;
  domain: string | null;
  plan: TenantPlan;
}

export interface TenantListResponse {
  tenants: Array<{ slug: string; name: string; domain: string | null }>;
}

/**
 * Response body of POST /tenants/register
 */
export interface TenantRegistrationResponse {
  message: string;
  tenant: TenantSummary;
  admin: {
    id: string;
    username: string;
    email: string;
    role: 'owner';
  };
  access_info: {
    subdomain: string;
    header: string;
    path: string;
  };
}

export interface TenantInfoResponse extends TenantSummary {
  max_users: number;
  is_active: boolean;
  created_at: string;
}

export interface TenantStatsResponse {
  total_users: number;
  active_users: number;
  total_clients: number;
  active_tokens: number;
  plan: TenantPlan;
  max_users: number;
}

export type TenantSettings = Record<string, unknown>;

export interface TenantSettingsResponse {
  settings: TenantSettings;
  plan: TenantPlan;
  max_users: number;
}
