import { and, count, eq, gt, isNotNull, isNull, or, sql } from 'drizzle-orm';
import type { Token, CreateTokenInput, IssuedToken } from '../../../types/token.js';
import type { ITokenStorage } from '../../interfaces/token-storage.js';
import type { Database } from '../client.js';
import { tokens } from '../schema.js';
import {
  generateId,
  generateAccessToken,
  generateRefreshToken,
  generateFamilyId,
} from '../../../crypto/random.js';
import { hashToken } from '../../../crypto/hash.js';

const revokeAccessNow = sql`coalesce(${tokens.accessRevokedAt}, now())`;
const revokeRefreshNow = sql`case when ${tokens.refreshTokenHash} is null then null else coalesce(${tokens.refreshRevokedAt}, now()) end`;

/**
 * Postgres token storage implementation
 */
export class DrizzleTokenStorage implements ITokenStorage {
  constructor(private readonly db: Database) {}

  async create(input: CreateTokenInput): Promise<IssuedToken> {
    const accessToken = generateAccessToken();
    const refreshToken = input.refreshExpiresAt ? generateRefreshToken() : undefined;

    const rows = await this.db
      .insert(tokens)
      .values({
        id: generateId(),
        tenantId: input.tenantId,
        clientId: input.clientId,
        userId: input.userId ?? null,
        scope: input.scope,
        accessTokenHash: hashToken(accessToken),
        refreshTokenHash: refreshToken ? hashToken(refreshToken) : null,
        familyId: input.familyId ?? generateFamilyId(),
        parentTokenId: input.parentTokenId ?? null,
        accessExpiresAt: input.accessExpiresAt,
        refreshExpiresAt: refreshToken ? (input.refreshExpiresAt ?? null) : null,
      })
      .returning();

    const token = rows[0];
    if (!token) {
      throw new Error('Token insert returned no row');
    }
    return refreshToken ? { token, accessToken, refreshToken } : { token, accessToken };
  }

  async findByAccessToken(tenantId: string, value: string): Promise<Token | null> {
    const rows = await this.db
      .select()
      .from(tokens)
      .where(and(eq(tokens.tenantId, tenantId), eq(tokens.accessTokenHash, hashToken(value))))
      .limit(1);
    return rows[0] ?? null;
  }

  async findByRefreshToken(tenantId: string, value: string): Promise<Token | null> {
    const rows = await this.db
      .select()
      .from(tokens)
      .where(and(eq(tokens.tenantId, tenantId), eq(tokens.refreshTokenHash, hashToken(value))))
      .limit(1);
    return rows[0] ?? null;
  }

  async revokeAccess(tenantId: string, id: string): Promise<void> {
    await this.db
      .update(tokens)
      .set({ accessRevokedAt: revokeAccessNow })
      .where(and(eq(tokens.tenantId, tenantId), eq(tokens.id, id)));
  }

  async revokeRefresh(tenantId: string, id: string): Promise<void> {
    await this.db
      .update(tokens)
      .set({ accessRevokedAt: revokeAccessNow, refreshRevokedAt: revokeRefreshNow })
      .where(and(eq(tokens.tenantId, tenantId), eq(tokens.id, id)));
  }

  async rotate(tenantId: string, id: string): Promise<Token | null> {
    const rows = await this.db
      .update(tokens)
      .set({ accessRevokedAt: revokeAccessNow, refreshRevokedAt: sql`now()` })
      .where(
        and(
          eq(tokens.tenantId, tenantId),
          eq(tokens.id, id),
          isNotNull(tokens.refreshTokenHash),
          isNull(tokens.refreshRevokedAt)
        )
      )
      .returning();
    return rows[0] ?? null;
  }

  async revokeFamily(tenantId: string, familyId: string): Promise<number> {
    const rows = await this.db
      .update(tokens)
      .set({ accessRevokedAt: revokeAccessNow, refreshRevokedAt: revokeRefreshNow })
      .where(
        and(
          eq(tokens.tenantId, tenantId),
          eq(tokens.familyId, familyId),
          or(
            isNull(tokens.accessRevokedAt),
            and(isNotNull(tokens.refreshTokenHash), isNull(tokens.refreshRevokedAt))
          )
        )
      )
      .returning({ id: tokens.id });
    return rows.length;
  }

  async countActive(tenantId: string): Promise<number> {
    const rows = await this.db
      .select({ total: count() })
      .from(tokens)
      .where(
        and(
          eq(tokens.tenantId, tenantId),
          isNull(tokens.accessRevokedAt),
          gt(tokens.accessExpiresAt, new Date())
        )
      );
    return rows[0]?.total ?? 0;
  }
}
