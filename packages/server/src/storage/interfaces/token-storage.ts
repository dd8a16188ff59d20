import type { Token, CreateTokenInput, IssuedToken } from '../../types/token.js';

/**
 * Storage interface for access/refresh token pairs
 */
export interface ITokenStorage {
  /**
   * Persist a new token pair
   * Returns the record with the plaintext token values
   */
  create(input: CreateTokenInput): Promise<IssuedToken>;

  findByAccessToken(tenantId: string, value: string): Promise<Token | null>;

  findByRefreshToken(tenantId: string, value: string): Promise<Token | null>;

  /**
   * Revoke the access token only; the refresh token stays usable
   */
  revokeAccess(tenantId: string, id: string): Promise<void>;

  /**
   * Revoke the refresh token and its access token
   */
  revokeRefresh(tenantId: string, id: string): Promise<void>;

  /**
   * Revoke the pair if its refresh token is still unrevoked
   *
   * Returns the revoked record, or null when another caller rotated it first.
   */
  rotate(tenantId: string, id: string): Promise<Token | null>;

  /**
   * Revoke every token in a family (replay detection)
   */
  revokeFamily(tenantId: string, familyId: string): Promise<number>;

  /**
   * Count unrevoked, unexpired access tokens
   */
  countActive(tenantId: string): Promise<number>;
}
