import type { OAuthClient, CreateClientInput } from '../../types/client.js';
import type { IClientStorage } from '../interfaces/client-storage.js';
import { UndoJournal } from './journal.js';
import { generateId, generateClientId, generateClientSecret } from '../../crypto/random.js';
import { hashSecret } from '../../crypto/hash.js';
import { CLIENT_AUTH_NONE } from '../../config/constants.js';

/**
 * In-memory client storage implementation
 */
export class MemoryClientStorage implements IClientStorage {
  private readonly clients = new Map<string, OAuthClient>();
  private readonly clientIdIndex = new Map<string, string>(); // `${tenantId}:${clientId}` -> id

  constructor(private readonly journal: UndoJournal = new UndoJournal()) {}

  async create(input: CreateClientInput): Promise<{ client: OAuthClient; clientSecret?: string }> {
    const isPublic = input.authMethod === CLIENT_AUTH_NONE;
    const clientSecret = isPublic ? undefined : generateClientSecret();
    const clientSecretHash = clientSecret ? await hashSecret(clientSecret) : null;

    const client: OAuthClient = {
      id: generateId(),
      tenantId: input.tenantId,
      clientId: generateClientId(),
      clientSecretHash,
      clientType: isPublic ? 'public' : 'confidential',
      authMethod: input.authMethod,
      ownerUserId: input.ownerUserId ?? null,
      name: input.name,
      redirectUris: [...input.redirectUris],
      allowedGrants: [...input.allowedGrants],
      allowedScopes: [...input.allowedScopes],
      createdAt: new Date(),
    };

    this.journal.set(this.clients, client.id, client);
    this.journal.set(this.clientIdIndex, `${input.tenantId}:${client.clientId}`, client.id);

    return clientSecret ? { client, clientSecret } : { client };
  }

  async findByClientId(tenantId: string, clientId: string): Promise<OAuthClient | null> {
    const id = this.clientIdIndex.get(`${tenantId}:${clientId}`);
    if (!id) return null;
    return this.clients.get(id) ?? null;
  }

  async listByOwner(tenantId: string, ownerUserId: string): Promise<OAuthClient[]> {
    return Array.from(this.clients.values()).filter(
      (client) => client.tenantId === tenantId && client.ownerUserId === ownerUserId
    );
  }

  async countByTenant(tenantId: string): Promise<number> {
    let count = 0;
    for (const client of this.clients.values()) {
      if (client.tenantId === tenantId) count++;
    }
    return count;
  }
}
