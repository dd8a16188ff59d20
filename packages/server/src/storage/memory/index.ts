import type { IStorage } from '../interfaces/index.js';
import { MemoryTenantStorage } from './tenant-storage.js';
import { MemoryUserStorage } from './user-storage.js';
import { MemoryClientStorage } from './client-storage.js';
import { MemoryTokenStorage } from './token-storage.js';
import { MemoryAuthorizationCodeStorage } from './authorization-code-storage.js';
import { UndoJournal } from './journal.js';

export { MemoryTenantStorage } from './tenant-storage.js';
export { MemoryUserStorage } from './user-storage.js';
export { MemoryClientStorage } from './client-storage.js';
export { MemoryTokenStorage } from './token-storage.js';
export { MemoryAuthorizationCodeStorage } from './authorization-code-storage.js';

/**
 * In-memory storage for tests and local development
 *
 * Transactions are serialized. A failed transaction reverses the writes it
 * made; writes issued outside it in the meantime are kept.
 */
export class MemoryStorage implements IStorage {
  private readonly journal = new UndoJournal();
  private queue: Promise<void> = Promise.resolve();

  readonly tenants = new MemoryTenantStorage(this.journal);
  readonly users = new MemoryUserStorage(this.journal);
  readonly clients = new MemoryClientStorage(this.journal);
  readonly tokens = new MemoryTokenStorage(this.journal);
  readonly authorizationCodes = new MemoryAuthorizationCodeStorage(this.journal);

  transaction<T>(fn: (tx: IStorage) => Promise<T>): Promise<T> {
    // Nested transactions join the outer one
    if (this.journal.active()) {
      return fn(this);
    }

    const result = this.queue.then(() => this.journal.run(() => fn(this)));
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(): MemoryStorage {
  return new MemoryStorage();
}
