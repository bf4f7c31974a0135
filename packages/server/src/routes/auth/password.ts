import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { AuthVariables } from '../../types/hono.js';
import type { AuthService } from '../../services/auth-service.js';
import type { TokenSigner } from '../../services/token-signer.js';
import type { TokenBlacklistService } from '../../services/token-blacklist-service.js';
import { AuthError } from '../../errors/auth-error.js';
import { ERROR_PASSWORD_CHANGE_FAILED, ERROR_PASSWORD_RESET_FAILED } from '../../errors/error-codes.js';
import { bearerAuth } from '../../middleware/bearer-auth.js';
import { onValidationError } from '../../middleware/error-handler.js';
import { credentialEndpointRateLimiter } from '../../middleware/rate-limiter.js';
import { operationContext } from './context.js';

const forgotPasswordSchema = z.object({
  email: z.string().email(),
});

const resetPasswordSchema = z.object({
  token: z.string().min(1),
  newPassword: z.string().min(1),
});

const changePasswordSchema = z.object({
  currentPassword: z.string().min(1),
  newPassword: z.string().min(1),
});

export interface PasswordRoutesOptions {
  authService: AuthService;
  tokenSigner: TokenSigner;
  blacklist: TokenBlacklistService;
  rateLimit: { windowMs: number; maxRequests: number };
}

// Same body whether or not the address is known
const FORGOT_PASSWORD_MESSAGE = 'If the email is registered, a password reset link has been sent.';

/**
 * Create password endpoints
 *
 * POST /auth/forgot-password
 * POST /auth/reset-password
 * POST /auth/change-password (bearer)
 */
export function createPasswordRoutes(options: PasswordRoutesOptions) {
  const { authService, tokenSigner, blacklist, rateLimit } = options;
  const router = new Hono<{ Variables: AuthVariables }>();

  router.post(
    '/forgot-password',
    credentialEndpointRateLimiter('forgot-password', rateLimit.windowMs, rateLimit.maxRequests),
    zValidator('json', forgotPasswordSchema, onValidationError),
    async (c) => {
      const { email } = c.req.valid('json');
      await authService.forgotPassword(email, operationContext(c));

      return c.json({ success: true, message: FORGOT_PASSWORD_MESSAGE, data: null });
    }
  );

  router.post(
    '/reset-password',
    credentialEndpointRateLimiter('reset-password', rateLimit.windowMs, rateLimit.maxRequests),
    zValidator('json', resetPasswordSchema, onValidationError),
    async (c) => {
      const { token, newPassword } = c.req.valid('json');

      if (!(await authService.resetPassword(token, newPassword, operationContext(c)))) {
        throw new AuthError(ERROR_PASSWORD_RESET_FAILED);
      }
      return c.json({ success: true, message: 'Password has been reset', data: null });
    }
  );

  router.post(
    '/change-password',
    bearerAuth({ tokenSigner, blacklist }),
    zValidator('json', changePasswordSchema, onValidationError),
    async (c) => {
      const token = c.get('accessToken');
      if (!token) {
        throw AuthError.invalidToken();
      }

      const { currentPassword, newPassword } = c.req.valid('json');
      const changed = await authService.changePassword(
        token.sub,
        currentPassword,
        newPassword,
        operationContext(c)
      );

      if (!changed) {
        throw new AuthError(
          ERROR_PASSWORD_CHANGE_FAILED,
          'Current password is incorrect or the new password does not meet requirements'
        );
      }
      return c.json({ success: true, message: 'Password changed', data: null });
    }
  );

  return router;
}
