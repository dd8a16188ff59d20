import { and, eq, gt, isNull } from 'drizzle-orm';
import type { AuthorizationCode, CreateAuthorizationCodeInput } from '../../../types/token.js';
import type { IAuthorizationCodeStorage } from '../../interfaces/authorization-code-storage.js';
import type { Database } from '../client.js';
import { authorizationCodes } from '../schema.js';
import { generateId, generateAuthorizationCode } from '../../../crypto/random.js';
import { hashToken } from '../../../crypto/hash.js';

/**
 * Postgres authorization code storage implementation
 */
export class DrizzleAuthorizationCodeStorage implements IAuthorizationCodeStorage {
  constructor(private readonly db: Database) {}

  async create(
    input: CreateAuthorizationCodeInput
  ): Promise<{ code: AuthorizationCode; value: string }> {
    const value = generateAuthorizationCode();

    const rows = await this.db
      .insert(authorizationCodes)
      .values({
        id: generateId(),
        tenantId: input.tenantId,
        clientId: input.clientId,
        userId: input.userId,
        codeHash: hashToken(value),
        redirectUri: input.redirectUri,
        scope: input.scope,
        codeChallenge: input.codeChallenge ?? null,
        codeChallengeMethod: input.codeChallengeMethod ?? null,
        expiresAt: input.expiresAt,
      })
      .returning();

    const code = rows[0];
    if (!code) {
      throw new Error('Authorization code insert returned no row');
    }
    return { code, value };
  }

  async findByValue(tenantId: string, value: string): Promise<AuthorizationCode | null> {
    const rows = await this.db
      .select()
      .from(authorizationCodes)
      .where(
        and(
          eq(authorizationCodes.tenantId, tenantId),
          eq(authorizationCodes.codeHash, hashToken(value))
        )
      )
      .limit(1);
    return rows[0] ?? null;
  }

  async consume(tenantId: string, value: string): Promise<AuthorizationCode | null> {
    const now = new Date();

    // Conditional update: only one concurrent caller can match `used_at IS NULL`
    const rows = await this.db
      .update(authorizationCodes)
      .set({ usedAt: now })
      .where(
        and(
          eq(authorizationCodes.tenantId, tenantId),
          eq(authorizationCodes.codeHash, hashToken(value)),
          isNull(authorizationCodes.usedAt),
          gt(authorizationCodes.expiresAt, now)
        )
      )
      .returning();

    return rows[0] ?? null;
  }
}
