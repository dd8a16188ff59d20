import { and, asc, count, eq } from 'drizzle-orm';
import type { User, CreateUserInput, UserRole } from '../../../types/user.js';
import type { IUserStorage, UserCountFilter } from '../../interfaces/user-storage.js';
import type { Database } from '../client.js';
import { users } from '../schema.js';
import { withConflictMapping } from '../errors.js';
import { generateId } from '../../../crypto/random.js';

/**
 * Postgres user storage implementation
 */
export class DrizzleUserStorage implements IUserStorage {
  constructor(private readonly db: Database) {}

  async create(input: CreateUserInput): Promise<User> {
    const rows = await withConflictMapping(
      () =>
        this.db
          .insert(users)
          .values({
            id: generateId(),
            tenantId: input.tenantId,
            username: input.username,
            email: input.email,
            passwordHash: input.passwordHash,
            role: input.role,
          })
          .returning(),
      {
        users_tenant_username_unique: 'user.username',
        users_tenant_email_unique: 'user.email',
      }
    );

    const row = rows[0];
    if (!row) {
      throw new Error('User insert returned no row');
    }
    return row;
  }

  async findById(tenantId: string, id: string): Promise<User | null> {
    const rows = await this.db
      .select()
      .from(users)
      .where(and(eq(users.tenantId, tenantId), eq(users.id, id)))
      .limit(1);
    return rows[0] ?? null;
  }

  async findByUsername(tenantId: string, username: string): Promise<User | null> {
    const rows = await this.db
      .select()
      .from(users)
      .where(and(eq(users.tenantId, tenantId), eq(users.username, username)))
      .limit(1);
    return rows[0] ?? null;
  }

  async listByTenant(tenantId: string): Promise<User[]> {
    return this.db
      .select()
      .from(users)
      .where(eq(users.tenantId, tenantId))
      .orderBy(asc(users.createdAt));
  }

  async countByTenant(tenantId: string, filter: UserCountFilter = {}): Promise<number> {
    const condition = and(
      eq(users.tenantId, tenantId),
      filter.activeOnly ? eq(users.active, true) : undefined,
      filter.role ? eq(users.role, filter.role) : undefined
    );

    const rows = await this.db.select({ total: count() }).from(users).where(condition);
    return rows[0]?.total ?? 0;
  }

  async updateRole(tenantId: string, id: string, role: UserRole): Promise<User | null> {
    const rows = await this.db
      .update(users)
      .set({ role, updatedAt: new Date() })
      .where(and(eq(users.tenantId, tenantId), eq(users.id, id)))
      .returning();
    return rows[0] ?? null;
  }
}
