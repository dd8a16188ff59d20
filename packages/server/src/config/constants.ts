/**
 * OAuth 2.0 and tenancy constants
 */

// Grant types
export const GRANT_TYPE_AUTHORIZATION_CODE = 'authorization_code' as const;
export const GRANT_TYPE_PASSWORD = 'password' as const;
export const GRANT_TYPE_CLIENT_CREDENTIALS = 'client_credentials' as const;
export const GRANT_TYPE_REFRESH_TOKEN = 'refresh_token' as const;

export const SUPPORTED_GRANT_TYPES = [
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_PASSWORD,
  GRANT_TYPE_CLIENT_CREDENTIALS,
  GRANT_TYPE_REFRESH_TOKEN,
] as const;

// Grants a public client may hold
export const PUBLIC_CLIENT_GRANT_TYPES = [
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_REFRESH_TOKEN,
] as const;

// Response types
export const RESPONSE_TYPE_CODE = 'code' as const;

// Code challenge methods
export const CODE_CHALLENGE_METHOD_S256 = 'S256' as const;

// Token types
export const TOKEN_TYPE_BEARER = 'Bearer' as const;
export const TOKEN_TYPE_HINT_ACCESS = 'access_token' as const;
export const TOKEN_TYPE_HINT_REFRESH = 'refresh_token' as const;

// Client authentication methods
export const CLIENT_AUTH_BASIC = 'client_secret_basic' as const;
export const CLIENT_AUTH_POST = 'client_secret_post' as const;
export const CLIENT_AUTH_NONE = 'none' as const;

export const SUPPORTED_CLIENT_AUTH_METHODS = [
  CLIENT_AUTH_BASIC,
  CLIENT_AUTH_POST,
  CLIENT_AUTH_NONE,
] as const;

// Default TTLs (in seconds)
export const DEFAULT_ACCESS_TOKEN_TTL = 3600; // 1 hour
export const DEFAULT_REFRESH_TOKEN_TTL = 2592000; // 30 days
export const DEFAULT_AUTHORIZATION_CODE_TTL = 600; // 10 minutes
export const DEFAULT_SESSION_TTL = 86400; // 1 day

// Token/code lengths
export const AUTHORIZATION_CODE_LENGTH = 32; // bytes
export const ACCESS_TOKEN_LENGTH = 32; // bytes
export const REFRESH_TOKEN_LENGTH = 48; // bytes
export const CLIENT_ID_LENGTH = 18; // bytes
export const CLIENT_SECRET_LENGTH = 36; // bytes

// Rate limiting defaults
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 60000; // 1 minute
export const DEFAULT_RATE_LIMIT_MAX_REQUESTS = 100;

// Scopes
export const EMAIL_SCOPE = 'email' as const;
export const PROFILE_SCOPE = 'profile' as const;

// Client registration defaults
export const DEFAULT_CLIENT_REDIRECT_URIS = ['http://localhost:3000/callback'];
export const DEFAULT_CLIENT_GRANT_TYPES = [GRANT_TYPE_AUTHORIZATION_CODE, GRANT_TYPE_REFRESH_TOKEN];
export const DEFAULT_CLIENT_SCOPE = 'read write';

// Tenancy
export const TENANT_PLANS = ['free', 'basic', 'premium', 'enterprise'] as const;
export const DEFAULT_TENANT_PLAN = 'free' as const;
export const DEFAULT_MAX_USERS = 10;
export const DEFAULT_BASE_DOMAIN = 'example.com';
export const DEFAULT_RESERVED_SUBDOMAINS = ['www', 'api', 'admin'];

// Slugs that collide with /tenants/* routes
export const RESERVED_TENANT_SLUGS = ['register', 'list', 'info', 'stats', 'users', 'settings'];

export const USER_ROLES = ['user', 'admin', 'owner'] as const;

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';
export const HEADER_TENANT_SLUG = 'X-Tenant-Slug';
export const HEADER_TENANT_ID = 'X-Tenant-ID';

// Cache control for token responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';

// Session cookie
export const SESSION_COOKIE_NAME = 'session';
