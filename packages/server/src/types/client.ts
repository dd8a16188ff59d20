import type { ClientAuthMethod, ClientType, GrantType } from '@tenant-oauth/shared';

export type { ClientAuthMethod, ClientType };

/**
 * OAuth 2.0 Client, immutable once registered
 */
export interface OAuthClient {
  id: string;
  tenantId: string;
  clientId: string; // Public identifier
  clientSecretHash: string | null; // null for public clients
  clientType: ClientType;
  authMethod: ClientAuthMethod;
  ownerUserId: string | null;
  name: string;
  redirectUris: string[]; // Exact match required
  allowedGrants: GrantType[];
  allowedScopes: string[];
  createdAt: Date;
}

/**
 * Client creation input
 */
export interface CreateClientInput {
  tenantId: string;
  ownerUserId?: string | null;
  name: string;
  authMethod: ClientAuthMethod;
  redirectUris: string[];
  allowedGrants: GrantType[];
  allowedScopes: string[];
}

/**
 * Client authenticated at the token, revocation or introspection endpoint
 */
export interface AuthenticatedClient {
  client: OAuthClient;
  authMethod: ClientAuthMethod;
}
