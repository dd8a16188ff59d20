import type { AuthorizationCode, CreateAuthorizationCodeInput } from '../../types/token.js';

/**
 * Storage interface for authorization codes
 */
export interface IAuthorizationCodeStorage {
  /**
   * Create a new authorization code
   * Returns the code record and the plaintext code value
   */
  create(input: CreateAuthorizationCodeInput): Promise<{ code: AuthorizationCode; value: string }>;

  findByValue(tenantId: string, value: string): Promise<AuthorizationCode | null>;

  /**
   * Mark a code as used if it is unused and unexpired
   *
   * Atomic: of concurrent callers presenting the same code, exactly one
   * receives the record; the others receive null.
   */
  consume(tenantId: string, value: string): Promise<AuthorizationCode | null>;
}
