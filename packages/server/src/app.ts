import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { OAuthEnv } from './types/hono.js';
import type { IStorage } from './storage/interfaces/index.js';
import type { Logger } from './utils/logger.js';
import { noopLogger } from './utils/logger.js';
import { getConfig, type Config } from './config/index.js';
import { createErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { rateLimiter } from './middleware/rate-limiter.js';
import type { TenantResolverOptions } from './middleware/tenant-resolver.js';
import type { SessionOptions } from './middleware/session-auth.js';
import { TokenService } from './services/token-service.js';
import { CredentialService } from './services/credential-service.js';
import { TenantService } from './services/tenant-service.js';
import { createOAuthRoutes } from './routes/oauth/index.js';
import { createApiRoutes } from './routes/api/index.js';
import { createTenantDirectoryRoutes, createTenantManagementRoutes } from './routes/tenants/index.js';
import { HEADER_TENANT_ID, HEADER_TENANT_SLUG, HEADER_WWW_AUTHENTICATE } from './config/constants.js';

export interface AuthServerOptions {
  storage: IStorage;
  logger?: Logger;
  /** Defaults to the environment configuration */
  config?: Config;
  /** Secret signing login session cookies; falls back to SECRET_KEY */
  sessionSecret?: string;
  rateLimit?: {
    windowMs: number;
    maxRequests: number;
  };
  enableCors?: boolean;
  enableLogging?: boolean;
}

/**
 * Create the multi-tenant OAuth 2.0 authorization server application
 */
export function createAuthServer(options: AuthServerOptions): Hono<OAuthEnv> {
  const {
    storage,
    logger = noopLogger,
    config = getConfig(),
    rateLimit = config.rateLimit,
    enableCors = true,
    enableLogging = true,
  } = options;

  const sessionSecret = options.sessionSecret ?? config.secrets.sessionSecret;
  if (!sessionSecret) {
    throw new Error('A session secret is required (set SECRET_KEY)');
  }

  const session: SessionOptions = {
    secret: sessionSecret,
    ttl: config.defaults.sessionTtl,
    secureCookie: config.server.nodeEnv === 'production',
  };

  const tenancy: Omit<TenantResolverOptions, 'tenantStorage'> = {
    reservedSubdomains: config.tenancy.reservedSubdomains,
    customDomainHttpsOnly: config.tenancy.customDomainHttpsOnly,
  };

  const tokenService = new TokenService({
    accessTokenTtl: config.defaults.accessTokenTtl,
    refreshTokenTtl: config.defaults.refreshTokenTtl,
  });
  const credentialService = new CredentialService(storage);
  const tenantService = new TenantService(storage, { defaultMaxUsers: config.defaults.maxUsers });

  const app = new Hono<OAuthEnv>();

  // Global error handler
  app.onError(createErrorHandler(logger));

  // Security headers
  app.use('*', securityHeaders());

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger(logger));
  }

  if (enableCors) {
    app.use(
      '*',
      cors({
        origin: '*',
        allowMethods: ['GET', 'POST', 'PUT', 'OPTIONS'],
        allowHeaders: ['Authorization', 'Content-Type', HEADER_TENANT_SLUG, HEADER_TENANT_ID],
        exposeHeaders: [HEADER_WWW_AUTHENTICATE],
        maxAge: 86400,
      })
    );
  }

  // Rate limiting
  app.use('*', rateLimiter(rateLimit));

  // Health check and service metadata (no tenant)
  app.get('/health', (c) => c.json({ status: 'healthy', service: 'api' }));

  app.get('/', (c) =>
    c.json({
      message: 'Multi-tenant OAuth 2.0 authorization server',
      version: '0.1.0',
      auth_type: 'OAuth 2.0',
      multi_tenant: true,
      endpoints: {
        authorization: '/oauth/authorize',
        token: '/oauth/token',
        revoke: '/oauth/revoke',
        introspect: '/oauth/introspect',
        userinfo: '/oauth/userinfo',
        register: '/oauth/register',
        login: '/oauth/login',
        tenant_register: '/tenants/register',
        tenant_info: '/tenants/info',
      },
    })
  );

  app.route('/api', createApiRoutes({ storage, tenancy }));

  const oauthRoutes = createOAuthRoutes({
    storage,
    tokenService,
    credentialService,
    tenancy,
    session,
    issuer: config.server.issuer,
    authorizationCodeTtl: config.defaults.authorizationCodeTtl,
  });

  const managementRoutes = createTenantManagementRoutes({
    storage,
    tenantService,
    credentialService,
    tenancy,
    session,
  });

  // Directory routes first: /tenants/register must not resolve a tenant
  app.route(
    '/tenants',
    createTenantDirectoryRoutes({ storage, tenantService, baseDomain: config.tenancy.baseDomain })
  );

  // Tenant from header, host or the path prefix
  app.route('/oauth', oauthRoutes);
  app.route('/tenants/:tenant/oauth', oauthRoutes);
  app.route('/tenants', managementRoutes);
  app.route('/tenants/:tenant', managementRoutes);

  return app;
}
