import { readFileSync, existsSync } from 'node:fs';
import * as constants from './constants.js';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(envVar: string): string | undefined {
  const fileEnvVar = `${envVar}_FILE`;
  const filePath = process.env[fileEnvVar];

  if (filePath && existsSync(filePath)) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch (error) {
      console.warn(`Warning: Could not read secret from ${filePath}`, error);
    }
  }

  return process.env[envVar];
}

function readInt(envVar: string, fallback: number): number {
  const parsed = parseInt(process.env[envVar] ?? String(fallback), 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function readList(envVar: string, fallback: string[]): string[] {
  const raw = process.env[envVar];
  if (!raw) {
    return fallback;
  }
  return raw
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
    issuer: string;
  };
  database: {
    url: string | undefined;
  };
  secrets: {
    sessionSecret: string | undefined;
  };
  logging: {
    level: string;
  };
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
  tenancy: {
    baseDomain: string;
    reservedSubdomains: string[];
    customDomainHttpsOnly: boolean;
  };
  defaults: {
    accessTokenTtl: number;
    refreshTokenTtl: number;
    authorizationCodeTtl: number;
    sessionTtl: number;
    maxUsers: number;
  };
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  const port = readInt('PORT', 5000);

  return {
    server: {
      port,
      host: process.env['HOST'] ?? '0.0.0.0',
      nodeEnv: process.env['NODE_ENV'] ?? 'development',
      issuer: process.env['OAUTH2_ISSUER'] ?? `http://localhost:${port}`,
    },
    database: {
      url: process.env['DATABASE_URL'],
    },
    secrets: {
      sessionSecret: readSecret('SECRET_KEY'),
    },
    logging: {
      level: process.env['LOG_LEVEL'] ?? 'info',
    },
    rateLimit: {
      windowMs: readInt('RATE_LIMIT_WINDOW_MS', constants.DEFAULT_RATE_LIMIT_WINDOW_MS),
      maxRequests: readInt('RATE_LIMIT_MAX_REQUESTS', constants.DEFAULT_RATE_LIMIT_MAX_REQUESTS),
    },
    tenancy: {
      baseDomain: process.env['TENANT_BASE_DOMAIN'] ?? constants.DEFAULT_BASE_DOMAIN,
      reservedSubdomains: readList('TENANT_RESERVED_SUBDOMAINS', constants.DEFAULT_RESERVED_SUBDOMAINS),
      customDomainHttpsOnly: process.env['TENANT_CUSTOM_DOMAIN_HTTPS_ONLY'] === 'true',
    },
    defaults: {
      accessTokenTtl: readInt('OAUTH2_ACCESS_TOKEN_EXPIRES', constants.DEFAULT_ACCESS_TOKEN_TTL),
      refreshTokenTtl: readInt('OAUTH2_REFRESH_TOKEN_EXPIRES', constants.DEFAULT_REFRESH_TOKEN_TTL),
      authorizationCodeTtl: readInt(
        'OAUTH2_AUTHORIZATION_CODE_EXPIRES',
        constants.DEFAULT_AUTHORIZATION_CODE_TTL
      ),
      sessionTtl: readInt('SESSION_TTL', constants.DEFAULT_SESSION_TTL),
      maxUsers: readInt('TENANT_DEFAULT_MAX_USERS', constants.DEFAULT_MAX_USERS),
    },
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}
