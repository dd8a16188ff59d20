export * from './tenant-storage.js';
export * from './user-storage.js';
export * from './client-storage.js';
export * from './token-storage.js';
export * from './authorization-code-storage.js';

import type { ITenantStorage } from './tenant-storage.js';
import type { IUserStorage } from './user-storage.js';
import type { IClientStorage } from './client-storage.js';
import type { ITokenStorage } from './token-storage.js';
import type { IAuthorizationCodeStorage } from './authorization-code-storage.js';

/**
 * Complete storage interface for the authorization server
 */
export interface IStorage {
  tenants: ITenantStorage;
  users: IUserStorage;
  clients: IClientStorage;
  tokens: ITokenStorage;
  authorizationCodes: IAuthorizationCodeStorage;

  /**
   * Run `fn` atomically; every write made through `tx` is rolled back if it throws
   */
  transaction<T>(fn: (tx: IStorage) => Promise<T>): Promise<T>;
}
