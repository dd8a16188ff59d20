import type { Context } from 'hono';
import type { Tenant } from './tenant.js';
import type { AuthenticatedClient } from './client.js';
import type { User } from './user.js';
import type { Token } from './token.js';

/**
 * Identity established by the bearer guard
 */
export interface Principal {
  tenant: Tenant;
  user: User | null;
  clientId: string;
  scopes: string[];
  token: Token;
}

/**
 * Request-scoped Hono context variables
 */
export interface OAuthVariables {
  tenant: Tenant;
  client: AuthenticatedClient;
  sessionUser: User;
  principal: Principal;
}

/**
 * OAuth-aware Hono context
 */
export type OAuthContext = Context<{ Variables: OAuthVariables }>;

export type OAuthEnv = { Variables: OAuthVariables };
