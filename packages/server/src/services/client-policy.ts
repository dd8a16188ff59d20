import type { GrantType } from '@tenant-oauth/shared';
import type { OAuthClient } from '../types/client.js';
import { CLIENT_AUTH_NONE, PUBLIC_CLIENT_GRANT_TYPES } from '../config/constants.js';

/**
 * Capability checks over a client record
 */

export function isPublicClient(client: Pick<OAuthClient, 'authMethod'>): boolean {
  return client.authMethod === CLIENT_AUTH_NONE;
}

export function isGrantAllowed(client: Pick<OAuthClient, 'allowedGrants'>, grantType: GrantType): boolean {
  return client.allowedGrants.includes(grantType);
}

/**
 * Exact string comparison; no prefix or wildcard matching
 */
export function isRedirectUriRegistered(client: Pick<OAuthClient, 'redirectUris'>, redirectUri: string): boolean {
  return client.redirectUris.includes(redirectUri);
}

/**
 * Public clients cannot keep a secret, so they must prove possession with PKCE
 */
export function requiresPkce(client: Pick<OAuthClient, 'authMethod'>): boolean {
  return isPublicClient(client);
}

/**
 * Grants a client of the given auth method may register
 */
export function grantsPermittedFor(authMethod: OAuthClient['authMethod']): readonly GrantType[] | null {
  return authMethod === CLIENT_AUTH_NONE ? PUBLIC_CLIENT_GRANT_TYPES : null;
}
