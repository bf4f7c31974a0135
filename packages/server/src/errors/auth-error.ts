import type { ApiFailure } from '@pharmacy-auth/shared';
import {
  type AuthErrorCode,
  type ErrorStatusCode,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_INVALID_REQUEST,
  ERROR_INVALID_CREDENTIALS,
  ERROR_ACCOUNT_LOCKED,
  ERROR_INVALID_TOKEN,
  ERROR_INVALID_REFRESH_TOKEN,
  ERROR_TOKEN_BLACKLISTED,
  ERROR_INSUFFICIENT_PERMISSION,
  ERROR_RATE_LIMITED,
  ERROR_REQUEST_ABORTED,
  ERROR_TEMPORARILY_UNAVAILABLE,
  ERROR_CONFIGURATION,
  ERROR_SERVER_ERROR,
} from './error-codes.js';

/**
 * Authentication error
 *
 * Thrown by middleware and by startup code. Services never throw it for
 * credential or token failures; those come back as a failed AuthResult.
 */
export class AuthError extends Error {
  public readonly code: AuthErrorCode;
  public readonly statusCode: ErrorStatusCode;
  public readonly description: string;

  constructor(code: AuthErrorCode, description?: string, options?: { cause?: unknown }) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc);
    this.name = 'AuthError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];
    this.description = desc;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): ApiFailure {
    return {
      success: false,
      message: this.description,
      error: this.code,
    };
  }

  // Factory methods for common errors

  static invalidRequest(description?: string): AuthError {
    return new AuthError(ERROR_INVALID_REQUEST, description);
  }

  static invalidCredentials(): AuthError {
    return new AuthError(ERROR_INVALID_CREDENTIALS);
  }

  static accountLocked(): AuthError {
    return new AuthError(ERROR_ACCOUNT_LOCKED);
  }

  static invalidToken(description?: string): AuthError {
    return new AuthError(ERROR_INVALID_TOKEN, description);
  }

  static invalidRefreshToken(description?: string): AuthError {
    return new AuthError(ERROR_INVALID_REFRESH_TOKEN, description);
  }

  static tokenBlacklisted(): AuthError {
    return new AuthError(ERROR_TOKEN_BLACKLISTED);
  }

  static insufficientPermission(description?: string): AuthError {
    return new AuthError(ERROR_INSUFFICIENT_PERMISSION, description);
  }

  static rateLimited(description?: string): AuthError {
    return new AuthError(ERROR_RATE_LIMITED, description);
  }

  static requestAborted(): AuthError {
    return new AuthError(ERROR_REQUEST_ABORTED);
  }

  static temporarilyUnavailable(cause?: unknown): AuthError {
    return new AuthError(ERROR_TEMPORARILY_UNAVAILABLE, undefined, { cause });
  }

  static serverError(description?: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_SERVER_ERROR, description, { cause });
  }
}

/**
 * Fatal misconfiguration detected at startup (missing signing key,
 * unreadable secret, bad numeric setting). Never raised per request.
 */
export class ConfigurationError extends AuthError {
  constructor(description: string, options?: { cause?: unknown }) {
    super(ERROR_CONFIGURATION, description, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Whether an error is the rejection of an aborted AbortSignal
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
