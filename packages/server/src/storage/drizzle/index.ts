import type { IStorage } from '../interfaces/index.js';
import type { Database } from './client.js';
import { DrizzleTenantStorage } from './repositories/tenant-repository.js';
import { DrizzleUserStorage } from './repositories/user-repository.js';
import { DrizzleClientStorage } from './repositories/client-repository.js';
import { DrizzleTokenStorage } from './repositories/token-repository.js';
import { DrizzleAuthorizationCodeStorage } from './repositories/authorization-code-repository.js';

export { connectDatabase, type Database, type DatabaseConnection } from './client.js';
export * as schema from './schema.js';

/**
 * Postgres-backed storage
 *
 * Repositories built inside `transaction` share the transaction handle.
 */
export class DrizzleStorage implements IStorage {
  readonly tenants: DrizzleTenantStorage;
  readonly users: DrizzleUserStorage;
  readonly clients: DrizzleClientStorage;
  readonly tokens: DrizzleTokenStorage;
  readonly authorizationCodes: DrizzleAuthorizationCodeStorage;

  constructor(private readonly db: Database) {
    this.tenants = new DrizzleTenantStorage(db);
    this.users = new DrizzleUserStorage(db);
    this.clients = new DrizzleClientStorage(db);
    this.tokens = new DrizzleTokenStorage(db);
    this.authorizationCodes = new DrizzleAuthorizationCodeStorage(db);
  }

  transaction<T>(fn: (tx: IStorage) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(new DrizzleStorage(tx)));
  }
}

export function createDrizzleStorage(db: Database): DrizzleStorage {
  return new DrizzleStorage(db);
}
