import type { GrantType, TokenResponse, TokenTypeHint } from '@tenant-oauth/shared';
import type { Tenant } from '../types/tenant.js';
import type { OAuthClient } from '../types/client.js';
import type { User } from '../types/user.js';
import type { IssuedToken, Token } from '../types/token.js';
import type { ITokenStorage } from '../storage/interfaces/index.js';
import { OAuthError } from '../errors/oauth-error.js';
import { scopeService } from './scope-service.js';
import { isGrantAllowed } from './client-policy.js';
import {
  GRANT_TYPE_CLIENT_CREDENTIALS,
  GRANT_TYPE_REFRESH_TOKEN,
  TOKEN_TYPE_BEARER,
  TOKEN_TYPE_HINT_REFRESH,
} from '../config/constants.js';

export interface TokenLifetimes {
  accessTokenTtl: number; // seconds
  refreshTokenTtl: number; // seconds
}

export interface TokenIssueOptions {
  tokenStorage: ITokenStorage;
  tenant: Tenant;
  client: OAuthClient;
  user: User | null;
  scopes: string[];
  grantType: GrantType;
  familyId?: string;
  parentTokenId?: string;
}

/**
 * Service for opaque token issuance
 */
export class TokenService {
  constructor(private readonly lifetimes: TokenLifetimes) {}

  /**
   * Persist a token pair and build the token endpoint response
   *
   * A refresh token is issued when the client may use the refresh grant,
   * except for client_credentials.
   */
  async issue(options: TokenIssueOptions): Promise<TokenResponse> {
    const { tokenStorage, tenant, client, user, scopes, grantType, familyId, parentTokenId } = options;

    // Every referenced row must belong to the tenant the token is issued in
    if (client.tenantId !== tenant.id || (user && user.tenantId !== tenant.id)) {
      throw OAuthError.invalidGrant('Grant does not belong to this tenant');
    }

    const now = Date.now();
    const withRefresh =
      grantType !== GRANT_TYPE_CLIENT_CREDENTIALS && isGrantAllowed(client, GRANT_TYPE_REFRESH_TOKEN);

    const issued = await tokenStorage.create({
      tenantId: tenant.id,
      clientId: client.clientId,
      userId: user?.id ?? null,
      scope: scopeService.formatScopes(scopes),
      accessExpiresAt: new Date(now + this.lifetimes.accessTokenTtl * 1000),
      refreshExpiresAt: withRefresh ? new Date(now + this.lifetimes.refreshTokenTtl * 1000) : null,
      familyId,
      parentTokenId,
    });

    return toTokenResponse(issued);
  }

  /**
   * Revoke a token presented by its owning client
   *
   * RFC 7009 Section 2.1: the hint only decides which lookup runs first.
   * Returns true when the client's token was found, revoked now or earlier.
   * Revoking a refresh token takes its access token with it; revoking an
   * access token leaves the refresh token usable.
   */
  async revoke(
    tokenStorage: ITokenStorage,
    tenantId: string,
    clientId: string,
    value: string,
    hint?: TokenTypeHint
  ): Promise<boolean> {
    const lookups: Array<[TokenTypeHint, (value: string) => Promise<Token | null>]> = [
      ['access_token', (v) => tokenStorage.findByAccessToken(tenantId, v)],
      ['refresh_token', (v) => tokenStorage.findByRefreshToken(tenantId, v)],
    ];
    if (hint === TOKEN_TYPE_HINT_REFRESH) {
      lookups.reverse();
    }

    for (const [kind, lookup] of lookups) {
      const token = await lookup(value);
      if (!token) {
        continue;
      }
      if (token.clientId !== clientId) {
        return false;
      }
      if (kind === TOKEN_TYPE_HINT_REFRESH) {
        await tokenStorage.revokeRefresh(tenantId, token.id);
      } else {
        await tokenStorage.revokeAccess(tenantId, token.id);
      }
      return true;
    }

    return false;
  }
}

/**
 * Serialize an issued token; `expires_in` is derived from the stored expiry
 */
export function toTokenResponse(issued: IssuedToken, now: Date = new Date()): TokenResponse {
  const response: TokenResponse = {
    access_token: issued.accessToken,
    token_type: TOKEN_TYPE_BEARER,
    expires_in: Math.max(0, Math.ceil((issued.token.accessExpiresAt.getTime() - now.getTime()) / 1000)),
    scope: issued.token.scope,
  };

  if (issued.refreshToken) {
    response.refresh_token = issued.refreshToken;
  }

  return response;
}
