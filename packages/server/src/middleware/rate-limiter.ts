import type { MiddlewareHandler } from 'hono';
import type { AuthContext, AuthVariables } from '../types/hono.js';
import { AuthError } from '../errors/auth-error.js';
import { AUTH_ENDPOINT_MAX_REQUESTS, DEFAULT_RATE_LIMIT_WINDOW_MS } from '../config/constants.js';

export interface RateLimiterOptions {
  windowMs: number; // Time window in milliseconds
  maxRequests: number; // Maximum requests per window
  keyGenerator?: (c: AuthContext) => string; // Custom key generator
}

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

/**
 * Simple in-memory rate limiter
 * For multi-instance deployments, front with a shared store
 */
export function rateLimiter(options: RateLimiterOptions): MiddlewareHandler<{
  Variables: AuthVariables;
}> {
  const { windowMs, maxRequests, keyGenerator = defaultKeyGenerator } = options;

  const store = new Map<string, RateLimitEntry>();

  // Cleanup expired entries periodically
  const cleanupInterval = setInterval(() => {
    const now = Date.now();
    for (const [key, entry] of store) {
      if (entry.resetAt <= now) {
        store.delete(key);
      }
    }
  }, windowMs);

  // Prevent the interval from keeping the process alive
  if (cleanupInterval.unref) {
    cleanupInterval.unref();
  }

  return async (c, next) => {
    const key = keyGenerator(c);
    const now = Date.now();

    let entry = store.get(key);

    // Create new entry if doesn't exist or window has passed
    if (!entry || entry.resetAt <= now) {
      entry = {
        count: 0,
        resetAt: now + windowMs,
      };
      store.set(key, entry);
    }

    // Check if over limit
    if (entry.count >= maxRequests) {
      const retryAfter = Math.ceil((entry.resetAt - now) / 1000);
      c.header('Retry-After', String(retryAfter));
      c.header('X-RateLimit-Limit', String(maxRequests));
      c.header('X-RateLimit-Remaining', '0');
      c.header('X-RateLimit-Reset', String(Math.ceil(entry.resetAt / 1000)));

      throw AuthError.rateLimited(`Rate limit exceeded. Try again in ${retryAfter} seconds.`);
    }

    entry.count++;

    // Set rate limit headers
    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(maxRequests - entry.count));
    c.header('X-RateLimit-Reset', String(Math.ceil(entry.resetAt / 1000)));

    await next();
  };
}

/**
 * Default key generator: client IP from proxy headers
 */
function defaultKeyGenerator(c: AuthContext): string {
  return (
    c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ??
    c.req.header('x-real-ip') ??
    'unknown'
  );
}

/**
 * Create endpoint-specific rate limiter
 */
export function endpointRateLimiter(
  endpoint: string,
  options: RateLimiterOptions
): MiddlewareHandler<{ Variables: AuthVariables }> {
  return rateLimiter({
    ...options,
    keyGenerator: (c) => `${endpoint}:${defaultKeyGenerator(c)}`,
  });
}

/**
 * Credential endpoint rate limiter (stricter limits) for login, refresh,
 * forgot-password and reset-password
 */
export function credentialEndpointRateLimiter(
  endpoint: string,
  windowMs: number = DEFAULT_RATE_LIMIT_WINDOW_MS,
  maxRequests: number = AUTH_ENDPOINT_MAX_REQUESTS
): MiddlewareHandler<{ Variables: AuthVariables }> {
  return endpointRateLimiter(endpoint, { windowMs, maxRequests });
}
