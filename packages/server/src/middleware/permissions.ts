import type { MiddlewareHandler } from 'hono';
import type { AuthVariables } from '../types/hono.js';
import type { KnownPermission, Permission } from '../types/permission.js';
import { AuthError } from '../errors/auth-error.js';
import { permissionService } from '../services/permission-service.js';

/**
 * Require every listed permission on the verified token. Must run after
 * `bearerAuth`.
 */
export function requirePermission(
  ...required: Array<KnownPermission | Permission>
): MiddlewareHandler<{ Variables: AuthVariables }> {
  const permissions: Permission[] = required.map((permission) =>
    typeof permission === 'string' ? { kind: 'known', name: permission } : permission
  );

  return async (c, next) => {
    const token = c.get('accessToken');
    if (!token) {
      throw AuthError.invalidToken('Missing access token');
    }

    if (!permissionService.hasAll(token.permissions, permissions)) {
      throw AuthError.insufficientPermission(
        `Required permissions: ${permissions.map((p) => permissionService.formatPermission(p)).join(', ')}`
      );
    }

    await next();
  };
}

/**
 * Require at least one of the listed roles (case-insensitive)
 */
export function requireRole(...roles: string[]): MiddlewareHandler<{ Variables: AuthVariables }> {
  const wanted = new Set(roles.map((role) => role.toLowerCase()));

  return async (c, next) => {
    const token = c.get('accessToken');
    if (!token) {
      throw AuthError.invalidToken('Missing access token');
    }

    if (!token.roles.some((role) => wanted.has(role.toLowerCase()))) {
      throw AuthError.insufficientPermission(`Required role: ${roles.join(' or ')}`);
    }

    await next();
  };
}
