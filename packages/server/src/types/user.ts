import type { UserRole } from '@tenant-oauth/shared';

export type { UserRole };

/**
 * Resource owner registered inside a tenant
 */
export interface User {
  id: string;
  tenantId: string;
  username: string;
  email: string;
  passwordHash: string;
  role: UserRole;
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateUserInput {
  tenantId: string;
  username: string;
  email: string;
  passwordHash: string;
  role?: UserRole;
}
