import type { GrantType } from './oauth.js';

/**
 * Client authentication methods
 * RFC 7591 Section 2
 */
export type ClientAuthMethod = 'client_secret_basic' | 'client_secret_post' | 'none';

/**
 * Client types
 * RFC 6749 Section 2.1
 */
export type ClientType = 'confidential' | 'public';

/**
 * Response body of POST /oauth/client/register
 *
 * `client_secret` is only ever returned here.
 */
export interface ClientRegistrationResponse {
  message: string;
  client_id: string;
  client_secret?: string;
  client_name: string;
  redirect_uris: string[];
  grant_types: GrantType[];
  scope: string;
  token_endpoint_auth_method: ClientAuthMethod;
  tenant_id: string;
  tenant_slug: string;
}

export interface ClientSummary {
  client_id: string;
  client_name: string;
  redirect_uris: string[];
  grant_types: GrantType[];
  scope: string;
  created_at: string;
}
