import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { AuthUser, RegisterResponseData } from '@pharmacy-auth/shared';
import type { AuthVariables } from '../../types/hono.js';
import type { AuthService } from '../../services/auth-service.js';
import type { TokenSigner } from '../../services/token-signer.js';
import type { TokenBlacklistService } from '../../services/token-blacklist-service.js';
import { AuthError } from '../../errors/auth-error.js';
import { bearerAuth } from '../../middleware/bearer-auth.js';
import { onValidationError } from '../../middleware/error-handler.js';
import { failureStatus, operationContext } from './context.js';

const registerSchema = z.object({
  tenantId: z.string().min(1),
  branchId: z.string().min(1).optional(),
  firstName: z.string().min(1).max(100),
  lastName: z.string().min(1).max(100),
  email: z.string().email(),
  phoneNumber: z.string().min(1).max(32).optional(),
  userName: z.string().min(3).max(64),
  password: z.string().min(1),
  roleName: z.string().min(1).optional(),
});

export interface AccountRoutesOptions {
  authService: AuthService;
  tokenSigner: TokenSigner;
  blacklist: TokenBlacklistService;
}

/**
 * Create account endpoints
 *
 * POST /auth/register
 * GET  /auth/me (bearer)
 * POST /auth/logout-all (bearer)
 */
export function createAccountRoutes(options: AccountRoutesOptions) {
  const { authService, tokenSigner, blacklist } = options;
  const router = new Hono<{ Variables: AuthVariables }>();
  const authenticated = bearerAuth({ tokenSigner, blacklist });

  router.post('/register', zValidator('json', registerSchema, onValidationError), async (c) => {
    const input = c.req.valid('json');

    const result = await authService.register(input, operationContext(c));
    if (!result.success) {
      return c.json(result, failureStatus(result));
    }

    const data: RegisterResponseData = result.data;
    return c.json({ success: true, message: result.message, data }, 201);
  });

  router.get('/me', authenticated, (c) => {
    const token = c.get('accessToken');
    if (!token) {
      throw AuthError.invalidToken();
    }

    const user: AuthUser = {
      id: token.sub,
      email: token.email,
      firstName: token.given_name,
      lastName: token.family_name,
      tenantId: token.tenant_id,
      roles: token.roles,
      permissions: token.permissions,
    };
    if (token.branch_id) {
      user.branchId = token.branch_id;
    }

    return c.json({ success: true, message: 'OK', data: user });
  });

  router.post('/logout-all', authenticated, async (c) => {
    const token = c.get('accessToken');
    if (!token) {
      throw AuthError.invalidToken();
    }

    if (!(await authService.logoutEverywhere(token.sub, operationContext(c)))) {
      throw AuthError.temporarilyUnavailable();
    }
    return c.body(null, 204);
  });

  return router;
}
