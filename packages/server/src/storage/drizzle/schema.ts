import {
  pgTable,
  text,
  integer,
  boolean,
  timestamp,
  jsonb,
  index,
  uniqueIndex,
  unique,
  foreignKey,
} from 'drizzle-orm/pg-core';
import type { TenantSettings } from '../../types/tenant.js';
import {
  TENANT_PLANS,
  USER_ROLES,
  SUPPORTED_GRANT_TYPES,
  SUPPORTED_CLIENT_AUTH_METHODS,
  CODE_CHALLENGE_METHOD_S256,
  DEFAULT_MAX_USERS,
  DEFAULT_TENANT_PLAN,
} from '../../config/constants.js';

const CLIENT_TYPES = ['confidential', 'public'] as const;
const CODE_CHALLENGE_METHODS = [CODE_CHALLENGE_METHOD_S256] as const;

// ============================================
// TENANTS
// ============================================
export const tenants = pgTable(
  'tenants',
  {
    id: text('id').primaryKey(),
    name: text('name').notNull(),
    slug: text('slug').notNull(),
    domain: text('domain'),
    plan: text('plan', { enum: TENANT_PLANS }).notNull().default(DEFAULT_TENANT_PLAN),
    maxUsers: integer('max_users').notNull().default(DEFAULT_MAX_USERS),
    active: boolean('is_active').notNull().default(true),
    settings: jsonb('settings').$type<TenantSettings>().notNull().default({}),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('tenants_slug_unique').on(table.slug),
    uniqueIndex('tenants_domain_unique').on(table.domain),
  ]
);

// ============================================
// USERS (unique per tenant, never globally)
// ============================================
export const users = pgTable(
  'users',
  {
    id: text('id').primaryKey(),
    tenantId: text('tenant_id')
      .notNull()
      .references(() => tenants.id),
    username: text('username').notNull(),
    email: text('email').notNull(),
    passwordHash: text('password_hash').notNull(),
    role: text('role', { enum: USER_ROLES }).notNull().default('user'),
    active: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('users_tenant_username_unique').on(table.tenantId, table.username),
    uniqueIndex('users_tenant_email_unique').on(table.tenantId, table.email),
    unique('users_tenant_id_unique').on(table.tenantId, table.id),
  ]
);

// ============================================
// OAUTH CLIENTS
// ============================================
export const oauthClients = pgTable(
  'oauth_clients',
  {
    id: text('id').primaryKey(),
    tenantId: text('tenant_id')
      .notNull()
      .references(() => tenants.id),
    clientId: text('client_id').notNull(),
    clientSecretHash: text('client_secret_hash'),
    clientType: text('client_type', { enum: CLIENT_TYPES }).notNull(),
    authMethod: text('token_endpoint_auth_method', { enum: SUPPORTED_CLIENT_AUTH_METHODS }).notNull(),
    ownerUserId: text('owner_user_id'),
    name: text('client_name').notNull(),
    redirectUris: text('redirect_uris').array().notNull(),
    allowedGrants: text('grant_types', { enum: SUPPORTED_GRANT_TYPES }).array().notNull(),
    allowedScopes: text('scopes').array().notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    unique('oauth_clients_tenant_client_unique').on(table.tenantId, table.clientId),
    index('oauth_clients_owner').on(table.tenantId, table.ownerUserId),
    foreignKey({
      name: 'oauth_clients_owner_fk',
      columns: [table.tenantId, table.ownerUserId],
      foreignColumns: [users.tenantId, users.id],
    }),
  ]
);

// ============================================
// AUTHORIZATION CODES
// ============================================
export const authorizationCodes = pgTable(
  'authorization_codes',
  {
    id: text('id').primaryKey(),
    tenantId: text('tenant_id')
      .notNull()
      .references(() => tenants.id),
    clientId: text('client_id').notNull(),
    userId: text('user_id').notNull(),
    codeHash: text('code_hash').notNull(),
    redirectUri: text('redirect_uri').notNull(),
    scope: text('scope').notNull(),
    codeChallenge: text('code_challenge'),
    codeChallengeMethod: text('code_challenge_method', { enum: CODE_CHALLENGE_METHODS }),
    issuedAt: timestamp('issued_at', { withTimezone: true }).notNull().defaultNow(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    usedAt: timestamp('used_at', { withTimezone: true }),
  },
  (table) => [
    uniqueIndex('authorization_codes_tenant_hash_unique').on(table.tenantId, table.codeHash),
    foreignKey({
      name: 'authorization_codes_user_fk',
      columns: [table.tenantId, table.userId],
      foreignColumns: [users.tenantId, users.id],
    }),
    foreignKey({
      name: 'authorization_codes_client_fk',
      columns: [table.tenantId, table.clientId],
      foreignColumns: [oauthClients.tenantId, oauthClients.clientId],
    }),
  ]
);

// ============================================
// TOKENS (access + refresh pair)
// ============================================
export const tokens = pgTable(
  'oauth_tokens',
  {
    id: text('id').primaryKey(),
    tenantId: text('tenant_id')
      .notNull()
      .references(() => tenants.id),
    clientId: text('client_id').notNull(),
    userId: text('user_id'),
    scope: text('scope').notNull(),
    accessTokenHash: text('access_token_hash').notNull(),
    refreshTokenHash: text('refresh_token_hash'),
    familyId: text('family_id').notNull(),
    parentTokenId: text('parent_token_id'),
    issuedAt: timestamp('issued_at', { withTimezone: true }).notNull().defaultNow(),
    accessExpiresAt: timestamp('access_expires_at', { withTimezone: true }).notNull(),
    refreshExpiresAt: timestamp('refresh_expires_at', { withTimezone: true }),
    accessRevokedAt: timestamp('access_revoked_at', { withTimezone: true }),
    refreshRevokedAt: timestamp('refresh_revoked_at', { withTimezone: true }),
  },
  (table) => [
    uniqueIndex('oauth_tokens_tenant_access_unique').on(table.tenantId, table.accessTokenHash),
    uniqueIndex('oauth_tokens_tenant_refresh_unique').on(table.tenantId, table.refreshTokenHash),
    index('oauth_tokens_family').on(table.tenantId, table.familyId),
    foreignKey({
      name: 'oauth_tokens_user_fk',
      columns: [table.tenantId, table.userId],
      foreignColumns: [users.tenantId, users.id],
    }),
    foreignKey({
      name: 'oauth_tokens_client_fk',
      columns: [table.tenantId, table.clientId],
      foreignColumns: [oauthClients.tenantId, oauthClients.clientId],
    }),
  ]
);
