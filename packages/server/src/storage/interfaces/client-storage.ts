import type { OAuthClient, CreateClientInput } from '../../types/client.js';

/**
 * Storage interface for OAuth client management
 */
export interface IClientStorage {
  /**
   * Register a new client
   * Returns the client record and, for confidential clients, the plaintext secret
   */
  create(input: CreateClientInput): Promise<{ client: OAuthClient; clientSecret?: string }>;

  findByClientId(tenantId: string, clientId: string): Promise<OAuthClient | null>;

  listByOwner(tenantId: string, ownerUserId: string): Promise<OAuthClient[]>;

  countByTenant(tenantId: string): Promise<number>;
}
