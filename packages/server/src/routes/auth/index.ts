import { Hono } from 'hono';
import type { AuthVariables } from '../../types/hono.js';
import { createSessionRoutes, type SessionRoutesOptions } from './session.js';
import { createPasswordRoutes, type PasswordRoutesOptions } from './password.js';
import { createAccountRoutes } from './account.js';

export { createSessionRoutes } from './session.js';
export { createPasswordRoutes } from './password.js';
export { createAccountRoutes } from './account.js';

export type AuthRoutesOptions = SessionRoutesOptions & PasswordRoutesOptions;

/**
 * Mount every /auth endpoint
 */
export function createAuthRoutes(options: AuthRoutesOptions) {
  const router = new Hono<{ Variables: AuthVariables }>();

  router.route('/', createSessionRoutes(options));
  router.route('/', createPasswordRoutes(options));
  router.route('/', createAccountRoutes(options));

  return router;
}
