/**
 * Authentication core constants
 */

// Signing
export const SIGNING_ALGORITHM = 'RS256' as const;
export const MIN_RSA_MODULUS_LENGTH = 2048;
export const ACCESS_TOKEN_TYPE_HEADER = 'at+jwt';

// Default TTLs
export const DEFAULT_ACCESS_TOKEN_TTL_MINUTES = 15;
export const DEFAULT_REFRESH_TOKEN_TTL_HOURS = 168; // 7 days
export const DEFAULT_PASSWORD_RESET_TTL_MINUTES = 60;
export const DEFAULT_CLOCK_TOLERANCE_SECONDS = 5;

// Default issuer/audience
export const DEFAULT_JWT_ISSUER = 'pharmacy-auth';
export const DEFAULT_JWT_AUDIENCE = 'pharmacy-portals';

// Lockout
export const DEFAULT_MAX_FAILED_LOGIN_ATTEMPTS = 5;
export const DEFAULT_LOCKOUT_MINUTES = 15;

// Password hashing (PBKDF2-HMAC-SHA256)
export const PBKDF2_DIGEST = 'sha256' as const;
export const MIN_PBKDF2_ITERATIONS = 10000;
export const DEFAULT_PBKDF2_ITERATIONS = 10000;
export const PASSWORD_SALT_LENGTH = 16; // bytes
export const PASSWORD_KEY_LENGTH = 32; // bytes
export const MIN_PASSWORD_LENGTH = 8;

// Token lengths
export const REFRESH_TOKEN_LENGTH = 32; // bytes, 256 bits
export const PASSWORD_RESET_TOKEN_LENGTH = 32; // bytes
export const JTI_LENGTH = 16; // bytes

// Maintenance
export const DEFAULT_CLEANUP_INTERVAL_MS = 3600000; // 1 hour
export const DEFAULT_REFRESH_TOKEN_RETENTION_DAYS = 30;
export const DEFAULT_REFRESH_TOKEN_CACHE_TTL_MS = 30000;
export const REFRESH_TOKEN_CACHE_MAX_ENTRIES = 10000;

// Rate limiting defaults
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 60000; // 1 minute
export const DEFAULT_RATE_LIMIT_MAX_REQUESTS = 100;
export const AUTH_ENDPOINT_MAX_REQUESTS = 20;

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';
export const HEADER_REQUEST_ID = 'X-Request-Id';

// Cache control for token responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';
