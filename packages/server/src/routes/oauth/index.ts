import { Hono } from 'hono';
import type { OAuthEnv } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { TokenService } from '../../services/token-service.js';
import type { CredentialService } from '../../services/credential-service.js';
import type { SessionOptions } from '../../middleware/session-auth.js';
import { tenantResolver, type TenantResolverOptions } from '../../middleware/tenant-resolver.js';
import { createAccountRoutes } from './account.js';
import { createAuthorizeRoutes } from './authorize.js';
import { createTokenRoutes } from './token.js';
import { createRevokeRoutes } from './revoke.js';
import { createIntrospectRoutes } from './introspect.js';
import { createUserInfoRoutes } from './userinfo.js';
import { createClientRoutes } from './clients.js';

export interface OAuthRouteOptions {
  storage: IStorage;
  tokenService: TokenService;
  credentialService: CredentialService;
  tenancy: Omit<TenantResolverOptions, 'tenantStorage'>;
  session: SessionOptions;
  issuer: string;
  authorizationCodeTtl: number;
}

/**
 * Tenant-scoped OAuth endpoints, mounted under /oauth
 */
export function createOAuthRoutes(options: OAuthRouteOptions) {
  const { storage, tokenService, credentialService, tenancy, session, issuer, authorizationCodeTtl } =
    options;

  const router = new Hono<OAuthEnv>();

  router.use('*', tenantResolver({ tenantStorage: storage.tenants, ...tenancy }));

  router.route('/', createAccountRoutes({ credentialService, session }));
  router.route('/authorize', createAuthorizeRoutes({ storage, issuer, authorizationCodeTtl, session }));
  router.route('/token', createTokenRoutes({ storage, tokenService, credentialService }));
  router.route('/revoke', createRevokeRoutes({ storage, tokenService }));
  router.route('/introspect', createIntrospectRoutes({ storage, issuer }));
  router.route('/userinfo', createUserInfoRoutes({ storage }));
  router.route('/client', createClientRoutes({ storage, credentialService, session }));

  return router;
}

export {
  createAccountRoutes,
  createAuthorizeRoutes,
  createTokenRoutes,
  createRevokeRoutes,
  createIntrospectRoutes,
  createUserInfoRoutes,
  createClientRoutes,
};
