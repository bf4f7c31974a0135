import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { LoginResponseData, RefreshResponseData } from '@pharmacy-auth/shared';
import type { AuthVariables } from '../../types/hono.js';
import type { AuthService } from '../../services/auth-service.js';
import { AuthError } from '../../errors/auth-error.js';
import { onValidationError } from '../../middleware/error-handler.js';
import { credentialEndpointRateLimiter } from '../../middleware/rate-limiter.js';
import { failureStatus, noStore, operationContext } from './context.js';

const loginSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
  tenantId: z.string().min(1).optional(),
});

const refreshSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1),
});

const logoutSchema = z.object({
  refreshToken: z.string().min(1),
});

export interface SessionRoutesOptions {
  authService: AuthService;
  rateLimit: { windowMs: number; maxRequests: number };
}

/**
 * Create session endpoints
 *
 * POST /auth/login
 * POST /auth/refresh
 * POST /auth/logout
 */
export function createSessionRoutes(options: SessionRoutesOptions) {
  const { authService, rateLimit } = options;
  const router = new Hono<{ Variables: AuthVariables }>();

  router.post(
    '/login',
    credentialEndpointRateLimiter('login', rateLimit.windowMs, rateLimit.maxRequests),
    zValidator('json', loginSchema, onValidationError),
    async (c) => {
      const { email, password, tenantId } = c.req.valid('json');
      noStore(c);

      const result = await authService.login(email, password, { tenantId }, operationContext(c));
      if (!result.success) {
        return c.json(result, failureStatus(result));
      }

      const data: LoginResponseData = {
        accessToken: result.data.accessToken,
        refreshToken: result.data.refreshToken,
        expiresAt: result.data.expiresAt.toISOString(),
        user: result.data.user,
      };
      return c.json({ success: true, message: result.message, data });
    }
  );

  router.post(
    '/refresh',
    credentialEndpointRateLimiter('refresh', rateLimit.windowMs, rateLimit.maxRequests),
    zValidator('json', refreshSchema, onValidationError),
    async (c) => {
      const { accessToken, refreshToken } = c.req.valid('json');
      noStore(c);

      const result = await authService.refresh(accessToken, refreshToken, operationContext(c));
      if (!result.success) {
        return c.json(result, failureStatus(result));
      }

      const data: RefreshResponseData = {
        accessToken: result.data.accessToken,
        refreshToken: result.data.refreshToken,
        expiresAt: result.data.expiresAt.toISOString(),
      };
      return c.json({ success: true, message: result.message, data });
    }
  );

  router.post('/logout', zValidator('json', logoutSchema, onValidationError), async (c) => {
    const { refreshToken } = c.req.valid('json');

    if (!(await authService.logout(refreshToken, operationContext(c)))) {
      throw AuthError.temporarilyUnavailable();
    }
    return c.body(null, 204);
  });

  return router;
}
