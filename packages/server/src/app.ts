import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { HealthResponse } from '@pharmacy-auth/shared';
import type { AuthVariables } from './types/hono.js';
import type { KeyRing } from './crypto/keys.js';
import type { AuthServices } from './services/index.js';
import { authErrorHandler, securityHeaders, requestId, requestLogger } from './middleware/error-handler.js';
import { rateLimiter } from './middleware/rate-limiter.js';
import { createAuthRoutes } from './routes/auth/index.js';
import { createJWKSRoutes } from './routes/discovery/index.js';
import { DEFAULT_RATE_LIMIT_MAX_REQUESTS, DEFAULT_RATE_LIMIT_WINDOW_MS, AUTH_ENDPOINT_MAX_REQUESTS } from './config/constants.js';
import type { Logger } from './logging/logger.js';

export interface AuthServerOptions {
  services: AuthServices;
  keyRing: KeyRing;
  /**
   * Global limit, applied per client IP to every route
   */
  rateLimit?: {
    windowMs: number;
    maxRequests: number;
  };
  /**
   * Stricter limit on login, refresh, forgot-password and reset-password
   */
  credentialRateLimit?: {
    windowMs: number;
    maxRequests: number;
  };
  /**
   * Portal origins allowed to call the API from a browser
   */
  corsOrigins?: string[];
  enableLogging?: boolean;
  logger?: Logger;
}

/**
 * Create the authentication HTTP application
 */
export function createAuthServer(options: AuthServerOptions): Hono<{ Variables: AuthVariables }> {
  const {
    services,
    keyRing,
    rateLimit = { windowMs: DEFAULT_RATE_LIMIT_WINDOW_MS, maxRequests: DEFAULT_RATE_LIMIT_MAX_REQUESTS },
    credentialRateLimit = { windowMs: DEFAULT_RATE_LIMIT_WINDOW_MS, maxRequests: AUTH_ENDPOINT_MAX_REQUESTS },
    corsOrigins = [],
    enableLogging = true,
    logger,
  } = options;

  const app = new Hono<{ Variables: AuthVariables }>();

  // Global error handler
  app.onError(authErrorHandler(logger));

  app.use('*', requestId());

  // Security headers
  app.use('*', securityHeaders());

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger(logger));
  }

  if (corsOrigins.length > 0) {
    app.use(
      '*',
      cors({
        origin: corsOrigins,
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Authorization', 'Content-Type', 'X-Request-Id'],
        exposeHeaders: ['WWW-Authenticate', 'X-Request-Id'],
        maxAge: 86400,
      })
    );
  }

  // Rate limiting
  app.use('*', rateLimiter(rateLimit));

  app.get('/health', (c) => {
    const body: HealthResponse = { status: 'ok' };
    return c.json(body);
  });

  app.route('/.well-known/jwks.json', createJWKSRoutes({ keyRing }));

  app.route(
    '/auth',
    createAuthRoutes({
      authService: services.authService,
      tokenSigner: services.tokenSigner,
      blacklist: services.blacklist,
      rateLimit: credentialRateLimit,
    })
  );

  return app;
}
