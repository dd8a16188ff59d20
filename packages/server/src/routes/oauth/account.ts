import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { LoginResponse, UserRegistrationResponse } from '@tenant-oauth/shared';
import type { OAuthEnv } from '../../types/hono.js';
import type { CredentialService } from '../../services/credential-service.js';
import { startSession, endSession, type SessionOptions } from '../../middleware/session-auth.js';
import { rejectInvalid } from '../../middleware/validation.js';

export const registerUserSchema = z.object({
  username: z.string().trim().min(1).max(80),
  email: z.string().trim().email().max(120),
  password: z.string().min(8),
});

const loginSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export interface AccountRouteOptions {
  credentialService: CredentialService;
  session: SessionOptions;
}

/**
 * User registration and session login/logout within the resolved tenant
 */
export function createAccountRoutes(options: AccountRouteOptions) {
  const { credentialService, session } = options;

  const router = new Hono<OAuthEnv>();

  // POST /register
  router.post('/register', zValidator('json', registerUserSchema, rejectInvalid), async (c) => {
    const tenant = c.get('tenant');
    const input = c.req.valid('json');

    const user = await credentialService.registerUser(tenant, input);

    const response: UserRegistrationResponse = {
      message: 'User registered successfully',
      user_id: user.id,
      username: user.username,
      tenant_id: tenant.id,
      tenant_slug: tenant.slug,
    };
    return c.json(response, 201);
  });

  // POST /login
  router.post('/login', zValidator('json', loginSchema, rejectInvalid), async (c) => {
    const tenant = c.get('tenant');
    const { username, password } = c.req.valid('json');

    const user = await credentialService.authenticate(tenant.id, username, password);
    await startSession(c, user, session);

    const response: LoginResponse = {
      message: 'Login successful',
      user_id: user.id,
      username: user.username,
      tenant_id: tenant.id,
      tenant_slug: tenant.slug,
      role: user.role,
    };
    return c.json(response);
  });

  // POST /logout
  router.post('/logout', (c) => {
    endSession(c);
    return c.json({ message: 'Logged out successfully' });
  });

  return router;
}
