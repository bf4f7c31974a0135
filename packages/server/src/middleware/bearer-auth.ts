import type { MiddlewareHandler } from 'hono';
import type { AuthVariables } from '../types/hono.js';
import type { TokenSigner } from '../services/token-signer.js';
import type { TokenBlacklistService } from '../services/token-blacklist-service.js';
import { AuthError } from '../errors/auth-error.js';
import { createLogger, type Logger } from '../logging/logger.js';
import {
  HEADER_AUTHORIZATION,
  HEADER_WWW_AUTHENTICATE,
  DEFAULT_JWT_ISSUER,
} from '../config/constants.js';

export interface BearerAuthOptions {
  tokenSigner: TokenSigner;
  blacklist: TokenBlacklistService;
  realm?: string;
  logger?: Logger;
}

/**
 * Extract bearer token from Authorization header
 */
function extractBearerToken(authHeader: string): string | null {
  const match = /^Bearer\s+(\S+)$/i.exec(authHeader.trim());
  return match?.[1] ?? null;
}

/**
 * Middleware to validate bearer tokens (JWT access tokens)
 *
 * Verifies the signature and lifetime, then always consults the blacklist;
 * a blacklisted jti is rejected exactly like a bad signature. Sets
 * `accessToken` in context variables on success.
 */
export function bearerAuth(options: BearerAuthOptions): MiddlewareHandler<{
  Variables: AuthVariables;
}> {
  const { tokenSigner, blacklist, realm = DEFAULT_JWT_ISSUER } = options;
  const logger = options.logger ?? createLogger('bearer-auth');

  return async (c, next) => {
    const authHeader = c.req.header(HEADER_AUTHORIZATION);

    if (!authHeader) {
      c.header(HEADER_WWW_AUTHENTICATE, `Bearer realm="${realm}"`);
      throw AuthError.invalidToken('Missing authorization header');
    }

    const token = extractBearerToken(authHeader);

    if (!token) {
      c.header(HEADER_WWW_AUTHENTICATE, `Bearer realm="${realm}", error="invalid_request"`);
      throw AuthError.invalidToken('Invalid authorization header format');
    }

    const result = await tokenSigner.verifyAccessToken(token);
    if (!result.valid) {
      c.header(HEADER_WWW_AUTHENTICATE, `Bearer realm="${realm}", error="invalid_token"`);
      throw AuthError.invalidToken();
    }

    let revoked: boolean;
    try {
      revoked = await blacklist.isBlacklisted(result.claims.jti);
    } catch (error) {
      // Fail closed: an unverifiable token is not trusted
      throw AuthError.temporarilyUnavailable(error);
    }

    if (revoked) {
      logger.info('Blacklisted token presented', {
        requestId: c.get('requestId'),
        userId: result.claims.sub,
        jti: result.claims.jti,
      });
      c.header(HEADER_WWW_AUTHENTICATE, `Bearer realm="${realm}", error="invalid_token"`);
      throw AuthError.tokenBlacklisted();
    }

    // Set the validated token payload in context
    c.set('accessToken', result.claims);

    await next();
  };
}
