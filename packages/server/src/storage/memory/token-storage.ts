import type { Token, CreateTokenInput, IssuedToken } from '../../types/token.js';
import type { ITokenStorage } from '../interfaces/token-storage.js';
import { UndoJournal } from './journal.js';
import {
  generateId,
  generateAccessToken,
  generateRefreshToken,
  generateFamilyId,
} from '../../crypto/random.js';
import { hashToken } from '../../crypto/hash.js';

/**
 * In-memory token storage implementation
 */
export class MemoryTokenStorage implements ITokenStorage {
  private readonly tokens = new Map<string, Token>();
  private readonly accessIndex = new Map<string, string>(); // `${tenantId}:${hash}` -> id
  private readonly refreshIndex = new Map<string, string>(); // `${tenantId}:${hash}` -> id
  private readonly familyIndex = new Map<string, string[]>(); // `${tenantId}:${familyId}` -> ids

  constructor(private readonly journal: UndoJournal = new UndoJournal()) {}

  async create(input: CreateTokenInput): Promise<IssuedToken> {
    const accessToken = generateAccessToken();
    const refreshToken = input.refreshExpiresAt ? generateRefreshToken() : undefined;
    const familyId = input.familyId ?? generateFamilyId();

    const token: Token = {
      id: generateId(),
      tenantId: input.tenantId,
      clientId: input.clientId,
      userId: input.userId ?? null,
      scope: input.scope,
      accessTokenHash: hashToken(accessToken),
      refreshTokenHash: refreshToken ? hashToken(refreshToken) : null,
      familyId,
      parentTokenId: input.parentTokenId ?? null,
      issuedAt: new Date(),
      accessExpiresAt: input.accessExpiresAt,
      refreshExpiresAt: refreshToken ? (input.refreshExpiresAt ?? null) : null,
      accessRevokedAt: null,
      refreshRevokedAt: null,
    };

    this.journal.set(this.tokens, token.id, token);
    this.journal.set(this.accessIndex, `${token.tenantId}:${token.accessTokenHash}`, token.id);
    if (token.refreshTokenHash) {
      this.journal.set(this.refreshIndex, `${token.tenantId}:${token.refreshTokenHash}`, token.id);
    }

    const familyKey = `${token.tenantId}:${familyId}`;
    this.journal.set(this.familyIndex, familyKey, [...(this.familyIndex.get(familyKey) ?? []), token.id]);

    return refreshToken ? { token, accessToken, refreshToken } : { token, accessToken };
  }

  async findByAccessToken(tenantId: string, value: string): Promise<Token | null> {
    const id = this.accessIndex.get(`${tenantId}:${hashToken(value)}`);
    if (!id) return null;
    return this.tokens.get(id) ?? null;
  }

  async findByRefreshToken(tenantId: string, value: string): Promise<Token | null> {
    const id = this.refreshIndex.get(`${tenantId}:${hashToken(value)}`);
    if (!id) return null;
    return this.tokens.get(id) ?? null;
  }

  async revokeAccess(tenantId: string, id: string): Promise<void> {
    const token = this.get(tenantId, id);
    if (token && !token.accessRevokedAt) {
      this.journal.set(this.tokens, id, { ...token, accessRevokedAt: new Date() });
    }
  }

  async revokeRefresh(tenantId: string, id: string): Promise<void> {
    const token = this.get(tenantId, id);
    if (token) {
      this.journal.set(this.tokens, id, revokePair(token, new Date()));
    }
  }

  async rotate(tenantId: string, id: string): Promise<Token | null> {
    const token = this.get(tenantId, id);
    if (!token || token.refreshRevokedAt) {
      return null;
    }

    const rotated = revokePair(token, new Date());
    this.journal.set(this.tokens, id, rotated);
    return rotated;
  }

  async revokeFamily(tenantId: string, familyId: string): Promise<number> {
    const ids = this.familyIndex.get(`${tenantId}:${familyId}`) ?? [];
    const now = new Date();
    let count = 0;

    for (const id of ids) {
      const token = this.tokens.get(id);
      if (token && (!token.accessRevokedAt || (token.refreshTokenHash && !token.refreshRevokedAt))) {
        this.journal.set(this.tokens, id, revokePair(token, now));
        count++;
      }
    }

    return count;
  }

  async countActive(tenantId: string): Promise<number> {
    const now = new Date();
    let count = 0;
    for (const token of this.tokens.values()) {
      if (token.tenantId === tenantId && !token.accessRevokedAt && token.accessExpiresAt > now) {
        count++;
      }
    }
    return count;
  }


  private get(tenantId: string, id: string): Token | null {
    const token = this.tokens.get(id);
    if (!token || token.tenantId !== tenantId) return null;
    return token;
  }
}

function revokePair(token: Token, now: Date): Token {
  return {
    ...token,
    accessRevokedAt: token.accessRevokedAt ?? now,
    refreshRevokedAt: token.refreshTokenHash ? (token.refreshRevokedAt ?? now) : token.refreshRevokedAt,
  };
}
