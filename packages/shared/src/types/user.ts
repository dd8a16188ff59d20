/**
 * Roles a user can hold inside a tenant
 */
export type UserRole = 'user' | 'admin' | 'owner';

export interface UserSummary {
  id: string;
  username: string;
  email: string;
  role: UserRole;
  is_active: boolean;
  created_at: string;
}

export interface UserRegistrationResponse {
  message: string;
  user_id: string;
  username: string;
  tenant_id: string;
  tenant_slug: string;
}

export interface LoginResponse {
  message: string;
  user_id: string;
  username: string;
  tenant_id: string;
  tenant_slug: string;
  role: UserRole;
}
