import type { CodeChallengeMethod } from '@tenant-oauth/shared';

/**
 * Authorization code (single use)
 */
export interface AuthorizationCode {
  id: string;
  tenantId: string;
  clientId: string;
  userId: string;
  codeHash: string;
  redirectUri: string;
  scope: string;
  codeChallenge: string | null;
  codeChallengeMethod: CodeChallengeMethod | null;
  issuedAt: Date;
  expiresAt: Date;
  usedAt: Date | null;
}

export interface CreateAuthorizationCodeInput {
  tenantId: string;
  clientId: string;
  userId: string;
  redirectUri: string;
  scope: string;
  codeChallenge?: string | null;
  codeChallengeMethod?: CodeChallengeMethod | null;
  expiresAt: Date;
}

/**
 * Access token with its optional refresh token
 *
 * Only hashes of the token values are stored. Tokens produced by rotating a
 * refresh token share the `familyId` of the original grant.
 */
export interface Token {
  id: string;
  tenantId: string;
  clientId: string;
  userId: string | null;
  scope: string;
  accessTokenHash: string;
  refreshTokenHash: string | null;
  familyId: string;
  parentTokenId: string | null;
  issuedAt: Date;
  accessExpiresAt: Date;
  refreshExpiresAt: Date | null;
  accessRevokedAt: Date | null;
  refreshRevokedAt: Date | null;
}

export interface CreateTokenInput {
  tenantId: string;
  clientId: string;
  userId?: string | null;
  scope: string;
  accessExpiresAt: Date;
  /** Issue a refresh token expiring at this instant */
  refreshExpiresAt?: Date | null;
  familyId?: string;
  parentTokenId?: string | null;
}

export interface IssuedToken {
  token: Token;
  accessToken: string;
  refreshToken?: string;
}
