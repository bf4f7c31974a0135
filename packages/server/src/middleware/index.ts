export { bearerAuth, type BearerAuthOptions } from './bearer-auth.js';
export { requirePermission, requireRole } from './permissions.js';
export {
  authErrorHandler,
  securityHeaders,
  requestId,
  requestLogger,
  onValidationError,
  formatZodError,
} from './error-handler.js';
export {
  rateLimiter,
  endpointRateLimiter,
  credentialEndpointRateLimiter,
  type RateLimiterOptions,
} from './rate-limiter.js';
