import type { AuthorizationCode, CreateAuthorizationCodeInput } from '../../types/token.js';
import type { IAuthorizationCodeStorage } from '../interfaces/authorization-code-storage.js';
import { UndoJournal } from './journal.js';
import { generateId, generateAuthorizationCode } from '../../crypto/random.js';
import { hashToken } from '../../crypto/hash.js';

/**
 * In-memory authorization code storage implementation
 */
export class MemoryAuthorizationCodeStorage implements IAuthorizationCodeStorage {
  private readonly codes = new Map<string, AuthorizationCode>();
  private readonly hashIndex = new Map<string, string>(); // `${tenantId}:${hash}` -> id

  constructor(private readonly journal: UndoJournal = new UndoJournal()) {}

  async create(
    input: CreateAuthorizationCodeInput
  ): Promise<{ code: AuthorizationCode; value: string }> {
    const value = generateAuthorizationCode();
    const codeHash = hashToken(value);

    const code: AuthorizationCode = {
      id: generateId(),
      tenantId: input.tenantId,
      clientId: input.clientId,
      userId: input.userId,
      codeHash,
      redirectUri: input.redirectUri,
      scope: input.scope,
      codeChallenge: input.codeChallenge ?? null,
      codeChallengeMethod: input.codeChallengeMethod ?? null,
      issuedAt: new Date(),
      expiresAt: input.expiresAt,
      usedAt: null,
    };

    this.journal.set(this.codes, code.id, code);
    this.journal.set(this.hashIndex, `${input.tenantId}:${codeHash}`, code.id);

    return { code, value };
  }

  async findByValue(tenantId: string, value: string): Promise<AuthorizationCode | null> {
    const id = this.hashIndex.get(`${tenantId}:${hashToken(value)}`);
    if (!id) return null;
    return this.codes.get(id) ?? null;
  }

  async consume(tenantId: string, value: string): Promise<AuthorizationCode | null> {
    // Check and mark without yielding in between
    const id = this.hashIndex.get(`${tenantId}:${hashToken(value)}`);
    const code = id ? this.codes.get(id) : undefined;
    const now = new Date();

    if (!code || code.usedAt || code.expiresAt <= now) {
      return null;
    }

    const consumed: AuthorizationCode = { ...code, usedAt: now };
    this.journal.set(this.codes, code.id, consumed);
    return consumed;
  }
}
