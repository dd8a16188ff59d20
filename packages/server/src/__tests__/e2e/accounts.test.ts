import { describe, it, expect, beforeEach } from 'vitest';
import type {
  ClientRegistrationResponse,
  ClientSummary,
  LoginResponse,
  TenantSettingsResponse,
  TenantStatsResponse,
  UserRegistrationResponse,
  UserSummary,
} from '@tenant-oauth/shared';
import {
  setupTestContext,
  login,
  tenantHeader,
  JSON_BODY,
  PASSWORDS,
  type TestContext,
  type ErrorResponse,
} from '../test-setup.js';

describe('Accounts', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await setupTestContext();
  });

  function postJson(path: string, body: unknown, headers: Record<string, string> = {}): Response | Promise<Response> {
    return ctx.app.request(path, {
      method: 'POST',
      headers: { ...tenantHeader('acme'), ...JSON_BODY, ...headers },
      body: JSON.stringify(body),
    });
  }

  describe('POST /oauth/register', () => {
    it('should register a user in the tenant', async () => {
      const res = await postJson('/oauth/register', {
        username: 'bob',
        email: 'bob@acme.test',
        password: 'bob-password',
      });

      expect(res.status).toBe(201);
      const body = (await res.json()) as UserRegistrationResponse;
      expect(body).toMatchObject({
        message: 'User registered successfully',
        username: 'bob',
        tenant_id: ctx.acme.id,
        tenant_slug: 'acme',
      });

      const stored = await ctx.storage.users.findById(ctx.acme.id, body.user_id);
      expect(stored?.role).toBe('user');
    });

    it('should allow the same username in another tenant', async () => {
      const res = await ctx.app.request('/tenants/beta/oauth/register', {
        method: 'POST',
        headers: JSON_BODY,
        body: JSON.stringify({ username: 'alice', email: 'alice@acme.test', password: 'other-password' }),
      });

      expect(res.status).toBe(201);
      const body = (await res.json()) as UserRegistrationResponse;
      expect(body.tenant_slug).toBe('beta');
    });

    it('should reject a duplicate username within the tenant', async () => {
      const res = await postJson('/oauth/register', {
        username: 'alice',
        email: 'other@acme.test',
        password: 'other-password',
      });

      expect(res.status).toBe(409);
      const body = (await res.json()) as ErrorResponse;
      expect(body).toEqual({
        error: 'duplicate_user',
        error_description: 'Username or email is already registered in this tenant.',
      });
    });

    it('should reject a short password', async () => {
      const res = await postJson('/oauth/register', { username: 'bob', email: 'bob@acme.test', password: 'short' });

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorResponse;
      expect(body.error).toBe('invalid_request');
    });

    it('should enforce the tenant user limit', async () => {
      ctx = await setupTestContext({ acmeMaxUsers: 2 });

      const res = await postJson('/oauth/register', {
        username: 'bob',
        email: 'bob@acme.test',
        password: 'bob-password',
      });

      expect(res.status).toBe(403);
      const body = (await res.json()) as ErrorResponse;
      expect(body).toEqual({ error: 'user_limit_reached', error_description: 'User limit reached (2 users)' });
    });
  });

  describe('Sessions', () => {
    it('should log in and set the session cookie', async () => {
      const res = await postJson('/oauth/login', { username: 'alice', password: PASSWORDS.alice });

      expect(res.status).toBe(200);
      const body = (await res.json()) as LoginResponse;
      expect(body).toEqual({
        message: 'Login successful',
        user_id: ctx.alice.id,
        username: 'alice',
        tenant_id: ctx.acme.id,
        tenant_slug: 'acme',
        role: 'user',
      });

      const cookie = res.headers.get('Set-Cookie') ?? '';
      expect(cookie).toMatch(/^session=/);
      expect(cookie).toContain('HttpOnly');
      expect(cookie).toContain('SameSite=Lax');
    });

    it('should reject wrong credentials', async () => {
      const res = await postJson('/oauth/login', { username: 'alice', password: 'wrong-password' });

      expect(res.status).toBe(401);
      const body = (await res.json()) as ErrorResponse;
      expect(body).toEqual({ error: 'auth_failed', error_description: 'Invalid credentials' });
    });

    it('should not log in with credentials from another tenant', async () => {
      const res = await ctx.app.request('/oauth/login', {
        method: 'POST',
        headers: { ...tenantHeader('beta'), ...JSON_BODY },
        body: JSON.stringify({ username: 'alice', password: PASSWORDS.alice }),
      });

      expect(res.status).toBe(401);
      const body = (await res.json()) as ErrorResponse;
      expect(body.error).toBe('auth_failed');
    });

    it('should clear the cookie on logout', async () => {
      const res = await ctx.app.request('/oauth/logout', { method: 'POST', headers: tenantHeader('acme') });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ message: 'Logged out successfully' });
      expect(res.headers.get('Set-Cookie')).toContain('Max-Age=0');
    });
  });

  describe('Client registration', () => {
    let cookie: string;

    beforeEach(async () => {
      cookie = await login(ctx, 'acme', 'alice', PASSWORDS.alice);
    });

    it('should register a confidential client with defaults', async () => {
      const res = await postJson('/oauth/client/register', { client_name: 'Alice App' }, { Cookie: cookie });

      expect(res.status).toBe(201);
      const body = (await res.json()) as ClientRegistrationResponse;
      expect(body).toMatchObject({
        message: 'Client registered successfully. Store client_secret securely!',
        client_name: 'Alice App',
        redirect_uris: ['http://localhost:3000/callback'],
        grant_types: ['authorization_code', 'refresh_token'],
        scope: 'read write',
        token_endpoint_auth_method: 'client_secret_basic',
        tenant_id: ctx.acme.id,
        tenant_slug: 'acme',
      });
      expect(body.client_secret).toBeTruthy();

      const stored = await ctx.storage.clients.findByClientId(ctx.acme.id, body.client_id);
      expect(stored?.clientSecretHash).not.toBe(body.client_secret);
    });

    it('should register a public client without a secret', async () => {
      const res = await postJson(
        '/oauth/client/register',
        { client_name: 'Alice SPA', token_endpoint_auth_method: 'none' },
        { Cookie: cookie }
      );

      expect(res.status).toBe(201);
      const body = (await res.json()) as ClientRegistrationResponse;
      expect(body.client_secret).toBeUndefined();
    });

    it('should refuse secret-based grants for public clients', async () => {
      const res = await postJson(
        '/oauth/client/register',
        { client_name: 'Alice SPA', token_endpoint_auth_method: 'none', grant_types: ['client_credentials'] },
        { Cookie: cookie }
      );

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorResponse;
      expect(body).toEqual({
        error: 'invalid_request',
        error_description: 'Public clients cannot use grant types: client_credentials',
      });
    });

    it('should reject redirect URIs with a fragment', async () => {
      const res = await postJson(
        '/oauth/client/register',
        { client_name: 'Alice App', redirect_uris: ['http://localhost:3000/cb#frag'] },
        { Cookie: cookie }
      );

      expect(res.status).toBe(400);
    });

    it('should require a session', async () => {
      const res = await postJson('/oauth/client/register', { client_name: 'Alice App' });

      expect(res.status).toBe(401);
      const body = (await res.json()) as ErrorResponse;
      expect(body.error).toBe('login_required');
    });

    it('should list only the clients the user owns', async () => {
      await postJson('/oauth/client/register', { client_name: 'Alice App' }, { Cookie: cookie });

      const res = await ctx.app.request('/oauth/client/list', {
        headers: { ...tenantHeader('acme'), Cookie: cookie },
      });

      expect(res.status).toBe(200);
      const body = (await res.json()) as { clients: ClientSummary[] };
      expect(body.clients.map((client) => client.client_name)).toEqual(['Alice App']);
    });
  });
});

describe('Tenant management', () => {
  let ctx: TestContext;
  let ownerCookie: string;

  beforeEach(async () => {
    ctx = await setupTestContext();
    ownerCookie = await login(ctx, 'acme', 'admin', PASSWORDS.acmeOwner);
  });

  function request(
    method: string,
    path: string,
    cookie: string | null,
    body?: unknown
  ): Response | Promise<Response> {
    const headers: Record<string, string> = { ...tenantHeader('acme'), ...JSON_BODY };
    if (cookie) {
      headers['Cookie'] = cookie;
    }
    return ctx.app.request(path, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  it('should report tenant stats to the owner', async () => {
    const res = await request('GET', '/tenants/stats', ownerCookie);

    expect(res.status).toBe(200);
    const body = (await res.json()) as TenantStatsResponse;
    expect(body).toEqual({
      total_users: 2,
      active_users: 2,
      total_clients: 2,
      active_tokens: 0,
      plan: 'premium',
      max_users: 10,
    });
  });

  it('should refuse stats to regular users', async () => {
    const aliceCookie = await login(ctx, 'acme', 'alice', PASSWORDS.alice);

    const res = await request('GET', '/tenants/stats', aliceCookie);

    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorResponse;
    expect(body).toEqual({ error: 'access_denied', error_description: 'Admin access required' });
  });

  it('should require a session for stats', async () => {
    const res = await request('GET', '/tenants/stats', null);

    expect(res.status).toBe(401);
  });

  it('should list the tenant users', async () => {
    const res = await request('GET', '/tenants/users', ownerCookie);

    expect(res.status).toBe(200);
    const body = (await res.json()) as { users: UserSummary[]; total: number };
    expect(body.total).toBe(2);
    expect(body.users.map((user) => user.username)).toEqual(['admin', 'alice']);
  });

  it('should create users with a role', async () => {
    const res = await request('POST', '/tenants/users', ownerCookie, {
      username: 'carol',
      email: 'carol@acme.test',
      password: 'carol-password',
      role: 'admin',
    });

    expect(res.status).toBe(201);
    const body = (await res.json()) as { message: string; user: { username: string; role: string } };
    expect(body.message).toBe('User created successfully');
    expect(body.user).toMatchObject({ username: 'carol', email: 'carol@acme.test', role: 'admin' });
  });

  it('should only let owners create owners', async () => {
    await ctx.storage.users.updateRole(ctx.acme.id, ctx.alice.id, 'admin');
    const adminCookie = await login(ctx, 'acme', 'alice', PASSWORDS.alice);

    const res = await request('POST', '/tenants/users', adminCookie, {
      username: 'dave',
      email: 'dave@acme.test',
      password: 'dave-password',
      role: 'owner',
    });

    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorResponse;
    expect(body.error_description).toBe('Owner access required');
  });

  it('should update a user role', async () => {
    const res = await request('PUT', `/tenants/users/${ctx.alice.id}/role`, ownerCookie, { role: 'admin' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      message: 'User role updated',
      user: { id: ctx.alice.id, username: 'alice', role: 'admin' },
    });
  });

  it('should not update users of another tenant', async () => {
    const res = await request('PUT', `/tenants/users/${ctx.betaOwner.id}/role`, ownerCookie, { role: 'user' });

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorResponse;
    expect(body).toEqual({ error: 'not_found', error_description: 'User not found in this tenant' });
  });

  it('should reject unknown roles', async () => {
    const res = await request('PUT', `/tenants/users/${ctx.alice.id}/role`, ownerCookie, { role: 'root' });

    expect(res.status).toBe(400);
  });

  it("should refuse a change to the caller's own role", async () => {
    const res = await request('PUT', `/tenants/users/${ctx.acmeOwner.id}/role`, ownerCookie, { role: 'user' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'invalid_request', error_description: 'Cannot change your own role' });
    expect((await ctx.storage.users.findById(ctx.acme.id, ctx.acmeOwner.id))?.role).toBe('owner');
  });

  it('should demote an owner while another owner remains', async () => {
    await ctx.storage.users.updateRole(ctx.acme.id, ctx.alice.id, 'owner');

    const res = await request('PUT', `/tenants/users/${ctx.alice.id}/role`, ownerCookie, { role: 'user' });

    expect(res.status).toBe(200);
    expect((await ctx.storage.users.findById(ctx.acme.id, ctx.alice.id))?.role).toBe('user');
  });

  it('should read and replace settings', async () => {
    const initial = await request('GET', '/tenants/settings', ownerCookie);
    expect(await initial.json()).toEqual({ settings: {}, plan: 'premium', max_users: 10 });

    const update = await request('PUT', '/tenants/settings', ownerCookie, { settings: { theme: 'dark' } });
    expect(update.status).toBe(200);
    expect(await update.json()).toEqual({ message: 'Settings updated', settings: { theme: 'dark' } });

    const after = await request('GET', '/tenants/settings', ownerCookie);
    const body = (await after.json()) as TenantSettingsResponse;
    expect(body.settings).toEqual({ theme: 'dark' });
  });

  it('should refuse a session from another tenant', async () => {
    const betaCookie = await login(ctx, 'beta', 'admin', PASSWORDS.betaOwner);

    const res = await request('GET', '/tenants/users', betaCookie);

    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorResponse;
    expect(body).toEqual({ error: 'access_denied', error_description: 'Session belongs to a different tenant' });
  });

  it('should serve management under the path prefix', async () => {
    const res = await ctx.app.request('/tenants/acme/stats', { headers: { Cookie: ownerCookie } });

    expect(res.status).toBe(200);
  });
});
