import type { User, CreateUserInput, UserRole } from '../../types/user.js';
import type { IUserStorage, UserCountFilter } from '../interfaces/user-storage.js';
import { UndoJournal } from './journal.js';
import { ConflictError } from '../../errors/storage-error.js';
import { generateId } from '../../crypto/random.js';

/**
 * In-memory user storage implementation
 */
export class MemoryUserStorage implements IUserStorage {
  private readonly users = new Map<string, User>();
  private readonly usernameIndex = new Map<string, string>(); // `${tenantId}:${username}` -> id
  private readonly emailIndex = new Map<string, string>(); // `${tenantId}:${email}` -> id

  constructor(private readonly journal: UndoJournal = new UndoJournal()) {}

  async create(input: CreateUserInput): Promise<User> {
    const usernameKey = `${input.tenantId}:${input.username}`;
    const emailKey = `${input.tenantId}:${input.email}`;

    if (this.usernameIndex.has(usernameKey)) {
      throw new ConflictError('user.username');
    }
    if (this.emailIndex.has(emailKey)) {
      throw new ConflictError('user.email');
    }

    const now = new Date();
    const user: User = {
      id: generateId(),
      tenantId: input.tenantId,
      username: input.username,
      email: input.email,
      passwordHash: input.passwordHash,
      role: input.role ?? 'user',
      active: true,
      createdAt: now,
      updatedAt: now,
    };

    this.journal.set(this.users, user.id, user);
    this.journal.set(this.usernameIndex, usernameKey, user.id);
    this.journal.set(this.emailIndex, emailKey, user.id);

    return user;
  }

  async findById(tenantId: string, id: string): Promise<User | null> {
    const user = this.users.get(id);
    if (!user || user.tenantId !== tenantId) return null;
    return user;
  }

  async findByUsername(tenantId: string, username: string): Promise<User | null> {
    const id = this.usernameIndex.get(`${tenantId}:${username}`);
    if (!id) return null;
    return this.users.get(id) ?? null;
  }

  async listByTenant(tenantId: string): Promise<User[]> {
    return Array.from(this.users.values())
      .filter((user) => user.tenantId === tenantId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  async countByTenant(tenantId: string, filter: UserCountFilter = {}): Promise<number> {
    let count = 0;
    for (const user of this.users.values()) {
      if (
        user.tenantId === tenantId &&
        (!filter.activeOnly || user.active) &&
        (!filter.role || user.role === filter.role)
      ) {
        count++;
      }
    }
    return count;
  }

  async updateRole(tenantId: string, id: string, role: UserRole): Promise<User | null> {
    const existing = await this.findById(tenantId, id);
    if (!existing) return null;

    const updated: User = { ...existing, role, updatedAt: new Date() };
    this.journal.set(this.users, id, updated);
    return updated;
  }
}
