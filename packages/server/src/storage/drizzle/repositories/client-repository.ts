import { and, count, eq } from 'drizzle-orm';
import type { OAuthClient, CreateClientInput } from '../../../types/client.js';
import type { IClientStorage } from '../../interfaces/client-storage.js';
import type { Database } from '../client.js';
import { oauthClients } from '../schema.js';
import { generateId, generateClientId, generateClientSecret } from '../../../crypto/random.js';
import { hashSecret } from '../../../crypto/hash.js';
import { CLIENT_AUTH_NONE } from '../../../config/constants.js';

/**
 * Postgres OAuth client storage implementation
 */
export class DrizzleClientStorage implements IClientStorage {
  constructor(private readonly db: Database) {}

  async create(input: CreateClientInput): Promise<{ client: OAuthClient; clientSecret?: string }> {
    const isPublic = input.authMethod === CLIENT_AUTH_NONE;
    const clientSecret = isPublic ? undefined : generateClientSecret();

    const rows = await this.db
      .insert(oauthClients)
      .values({
        id: generateId(),
        tenantId: input.tenantId,
        clientId: generateClientId(),
        clientSecretHash: clientSecret ? await hashSecret(clientSecret) : null,
        clientType: isPublic ? 'public' : 'confidential',
        authMethod: input.authMethod,
        ownerUserId: input.ownerUserId ?? null,
        name: input.name,
        redirectUris: input.redirectUris,
        allowedGrants: input.allowedGrants,
        allowedScopes: input.allowedScopes,
      })
      .returning();

    const client = rows[0];
    if (!client) {
      throw new Error('Client insert returned no row');
    }
    return clientSecret ? { client, clientSecret } : { client };
  }

  async findByClientId(tenantId: string, clientId: string): Promise<OAuthClient | null> {
    const rows = await this.db
      .select()
      .from(oauthClients)
      .where(and(eq(oauthClients.tenantId, tenantId), eq(oauthClients.clientId, clientId)))
      .limit(1);
    return rows[0] ?? null;
  }

  async listByOwner(tenantId: string, ownerUserId: string): Promise<OAuthClient[]> {
    return this.db
      .select()
      .from(oauthClients)
      .where(and(eq(oauthClients.tenantId, tenantId), eq(oauthClients.ownerUserId, ownerUserId)));
  }

  async countByTenant(tenantId: string): Promise<number> {
    const rows = await this.db
      .select({ total: count() })
      .from(oauthClients)
      .where(eq(oauthClients.tenantId, tenantId));
    return rows[0]?.total ?? 0;
  }
}
