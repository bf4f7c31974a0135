import { readFileSync, existsSync } from 'node:fs';
import * as constants from './constants.js';
import { ConfigurationError } from '../errors/auth-error.js';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
export function readSecret(envVar: string): string | undefined {
  const fileEnvVar = `${envVar}_FILE`;
  const filePath = process.env[fileEnvVar];

  if (filePath) {
    if (!existsSync(filePath)) {
      throw new ConfigurationError(`${fileEnvVar} points to a missing file: ${filePath}`);
    }
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch (error) {
      throw new ConfigurationError(`Could not read secret from ${filePath}`, { cause: error });
    }
  }

  // Fall back to direct environment variable. PEM blocks passed inline
  // usually arrive with escaped newlines.
  return process.env[envVar]?.replace(/\\n/g, '\n');
}

/**
 * Parse a positive integer setting, falling back to the default when unset
 */
function positiveInt(envVar: string, fallback: number): number {
  const raw = process.env[envVar];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0 || String(value) !== raw.trim()) {
    throw new ConfigurationError(`${envVar} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseLogLevel(raw: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === raw);
  return level ?? 'info';
}

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
  };
  database: {
    url: string | undefined;
  };
  logging: {
    level: LogLevel;
  };
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
  cors: {
    origins: string[];
  };
  jwt: {
    privateKey: string | undefined;
    retiredPublicKeys: string | undefined;
    issuer: string;
    audience: string;
    accessTokenTtlMinutes: number;
    refreshTokenTtlHours: number;
    clockToleranceSeconds: number;
  };
  security: {
    maxFailedLoginAttempts: number;
    lockoutMinutes: number;
    passwordResetTtlMinutes: number;
    pbkdf2Iterations: number;
  };
  maintenance: {
    cleanupIntervalMs: number;
    refreshTokenRetentionDays: number;
    refreshTokenCacheTtlMs: number;
  };
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  const pbkdf2Iterations = positiveInt('PBKDF2_ITERATIONS', constants.DEFAULT_PBKDF2_ITERATIONS);
  if (pbkdf2Iterations < constants.MIN_PBKDF2_ITERATIONS) {
    throw new ConfigurationError(
      `PBKDF2_ITERATIONS must be at least ${constants.MIN_PBKDF2_ITERATIONS}`
    );
  }

  return {
    server: {
      port: positiveInt('PORT', 3000),
      host: process.env['HOST'] ?? '0.0.0.0',
      nodeEnv: process.env['NODE_ENV'] ?? 'development',
    },
    database: {
      url: process.env['DATABASE_URL'],
    },
    logging: {
      level: parseLogLevel(process.env['LOG_LEVEL']),
    },
    rateLimit: {
      windowMs: positiveInt('RATE_LIMIT_WINDOW_MS', constants.DEFAULT_RATE_LIMIT_WINDOW_MS),
      maxRequests: positiveInt('RATE_LIMIT_MAX_REQUESTS', constants.DEFAULT_RATE_LIMIT_MAX_REQUESTS),
    },
    cors: {
      origins: (process.env['CORS_ORIGINS'] ?? '')
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    },
    jwt: {
      privateKey: readSecret('JWT_PRIVATE_KEY'),
      retiredPublicKeys: readSecret('JWT_RETIRED_PUBLIC_KEYS'),
      issuer: process.env['JWT_ISSUER'] ?? constants.DEFAULT_JWT_ISSUER,
      audience: process.env['JWT_AUDIENCE'] ?? constants.DEFAULT_JWT_AUDIENCE,
      accessTokenTtlMinutes: positiveInt(
        'ACCESS_TOKEN_TTL_MINUTES',
        constants.DEFAULT_ACCESS_TOKEN_TTL_MINUTES
      ),
      refreshTokenTtlHours: positiveInt(
        'REFRESH_TOKEN_TTL_HOURS',
        constants.DEFAULT_REFRESH_TOKEN_TTL_HOURS
      ),
      clockToleranceSeconds: positiveInt(
        'JWT_CLOCK_TOLERANCE_SECONDS',
        constants.DEFAULT_CLOCK_TOLERANCE_SECONDS
      ),
    },
    security: {
      maxFailedLoginAttempts: positiveInt(
        'MAX_FAILED_LOGIN_ATTEMPTS',
        constants.DEFAULT_MAX_FAILED_LOGIN_ATTEMPTS
      ),
      lockoutMinutes: positiveInt('LOCKOUT_MINUTES', constants.DEFAULT_LOCKOUT_MINUTES),
      passwordResetTtlMinutes: positiveInt(
        'PASSWORD_RESET_TTL_MINUTES',
        constants.DEFAULT_PASSWORD_RESET_TTL_MINUTES
      ),
      pbkdf2Iterations,
    },
    maintenance: {
      cleanupIntervalMs: positiveInt('CLEANUP_INTERVAL_MS', constants.DEFAULT_CLEANUP_INTERVAL_MS),
      refreshTokenRetentionDays: positiveInt(
        'REFRESH_TOKEN_RETENTION_DAYS',
        constants.DEFAULT_REFRESH_TOKEN_RETENTION_DAYS
      ),
      refreshTokenCacheTtlMs: process.env['REFRESH_TOKEN_CACHE_TTL_MS'] === '0'
        ? 0
        : positiveInt('REFRESH_TOKEN_CACHE_TTL_MS', constants.DEFAULT_REFRESH_TOKEN_CACHE_TTL_MS),
    },
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
