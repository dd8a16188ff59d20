import type { User, CreateUserInput, UserRole } from '../../types/user.js';

export interface UserCountFilter {
  activeOnly?: boolean;
  role?: UserRole;
}

/**
 * Storage interface for tenant users
 *
 * Every lookup is scoped by tenant; usernames and emails are unique per tenant only.
 */
export interface IUserStorage {
  /**
   * Throws ConflictError (`user.username` or `user.email`) on duplicates
   */
  create(input: CreateUserInput): Promise<User>;

  findById(tenantId: string, id: string): Promise<User | null>;

  findByUsername(tenantId: string, username: string): Promise<User | null>;

  listByTenant(tenantId: string): Promise<User[]>;

  countByTenant(tenantId: string, filter?: UserCountFilter): Promise<number>;

  updateRole(tenantId: string, id: string, role: UserRole): Promise<User | null>;
}
