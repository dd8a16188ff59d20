import { Hono } from 'hono';
import type { OAuthEnv } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import { createAuthorizeHandler } from '../../grants/authorization-code/authorize.js';
import { sessionAuth, type SessionOptions } from '../../middleware/session-auth.js';

export interface AuthorizeRouteOptions {
  storage: IStorage;
  issuer: string;
  authorizationCodeTtl: number;
  session: SessionOptions;
}

/**
 * Create authorization endpoint routes
 */
export function createAuthorizeRoutes(options: AuthorizeRouteOptions) {
  const { storage, issuer, authorizationCodeTtl, session } = options;

  const router = new Hono<OAuthEnv>();

  const authorizeHandler = createAuthorizeHandler({ storage, issuer, authorizationCodeTtl });

  router.use('*', sessionAuth({ userStorage: storage.users, session }));

  // GET /authorize - consent prompt
  router.get('/', authorizeHandler);

  // POST /authorize - consent decision
  router.post('/', authorizeHandler);

  return router;
}
