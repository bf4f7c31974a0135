import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { ZodError } from 'zod';
import type { AuthVariables } from '../types/hono.js';
import { AuthError } from '../errors/auth-error.js';
import { createLogger, serializeError, type Logger } from '../logging/logger.js';
import { generateId } from '../crypto/random.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  HEADER_REQUEST_ID,
} from '../config/constants.js';

/**
 * Describe zod issues as `path: message` pairs
 */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}

/**
 * zValidator hook: turn a failed parse into an `invalid_request` error so
 * it goes through the global handler like every other failure
 */
export function onValidationError(result: { success: boolean; error?: ZodError }): void {
  if (!result.success) {
    throw AuthError.invalidRequest(result.error ? formatZodError(result.error) : undefined);
  }
}

/**
 * Global error handler
 *
 * Maps every error onto the `{ success: false, message, error }` envelope
 */
export function authErrorHandler(
  logger: Logger = createLogger('http')
): ErrorHandler<{ Variables: AuthVariables }> {
  return (err, c) => {
    // Set no-cache headers for error responses
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    const requestId = c.get('requestId');

    if (err instanceof AuthError) {
      if (err.statusCode >= 500) {
        logger.error('Request failed', { requestId, code: err.code, error: serializeError(err.cause ?? err) });
      }
      return c.json(err.toJSON(), err.statusCode);
    }

    if (err instanceof ZodError) {
      return c.json(AuthError.invalidRequest(formatZodError(err)).toJSON(), 400);
    }

    logger.error('Unhandled error', { requestId, error: serializeError(err) });

    // Handle unexpected errors
    const serverError = AuthError.serverError(
      process.env['NODE_ENV'] === 'production' ? undefined : err.message
    );
    return c.json(serverError.toJSON(), 500);
  };
}

/**
 * Security headers middleware
 */
export function securityHeaders(): MiddlewareHandler<{ Variables: AuthVariables }> {
  return async (c, next) => {
    await next();

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    // Referrer policy
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    // JSON API only
    c.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");

    // Strict Transport Security (enable in production with HTTPS)
    if (process.env['NODE_ENV'] === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

/**
 * Assign a request id (echoing a well-formed inbound `X-Request-Id`) and
 * expose it to handlers and in the response
 */
export function requestId(): MiddlewareHandler<{ Variables: AuthVariables }> {
  return async (c, next) => {
    const inbound = c.req.header(HEADER_REQUEST_ID);
    const id = inbound && REQUEST_ID_PATTERN.test(inbound) ? inbound : generateId();

    c.set('requestId', id);
    c.header(HEADER_REQUEST_ID, id);
    await next();
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(
  logger: Logger = createLogger('http')
): MiddlewareHandler<{ Variables: AuthVariables }> {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    // Don't log bodies; they carry passwords and tokens
    logger.info('Request completed', {
      requestId: c.get('requestId'),
      method,
      path,
      status: c.res.status,
      duration: Date.now() - start,
    });
  };
}
