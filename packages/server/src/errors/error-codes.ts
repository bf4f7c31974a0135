import type { AuthErrorCode } from '@pharmacy-auth/shared';

export type { AuthErrorCode };

export const ERROR_INVALID_REQUEST = 'invalid_request' as const;
export const ERROR_INVALID_CREDENTIALS = 'invalid_credentials' as const;
export const ERROR_ACCOUNT_LOCKED = 'account_locked' as const;
export const ERROR_INVALID_TOKEN = 'invalid_token' as const;
export const ERROR_INVALID_REFRESH_TOKEN = 'invalid_refresh_token' as const;
export const ERROR_TOKEN_BLACKLISTED = 'token_blacklisted' as const;
export const ERROR_USER_NOT_FOUND = 'user_not_found' as const;
export const ERROR_USER_INACTIVE = 'user_inactive' as const;
export const ERROR_INSUFFICIENT_PERMISSION = 'insufficient_permission' as const;
export const ERROR_REGISTRATION_FAILED = 'registration_failed' as const;
export const ERROR_PASSWORD_CHANGE_FAILED = 'password_change_failed' as const;
export const ERROR_PASSWORD_RESET_FAILED = 'password_reset_failed' as const;
export const ERROR_RATE_LIMITED = 'rate_limited' as const;
export const ERROR_REQUEST_ABORTED = 'request_aborted' as const;
export const ERROR_TEMPORARILY_UNAVAILABLE = 'temporarily_unavailable' as const;
export const ERROR_CONFIGURATION = 'configuration_error' as const;
export const ERROR_SERVER_ERROR = 'server_error' as const;

export type ErrorStatusCode = 400 | 401 | 403 | 408 | 423 | 429 | 500 | 503;

/**
 * HTTP status codes for auth errors
 */
export const ERROR_STATUS_CODES: Record<AuthErrorCode, ErrorStatusCode> = {
  [ERROR_INVALID_REQUEST]: 400,
  [ERROR_INVALID_CREDENTIALS]: 401,
  [ERROR_ACCOUNT_LOCKED]: 423,
  [ERROR_INVALID_TOKEN]: 401,
  [ERROR_INVALID_REFRESH_TOKEN]: 401,
  [ERROR_TOKEN_BLACKLISTED]: 401,
  [ERROR_USER_NOT_FOUND]: 401,
  [ERROR_USER_INACTIVE]: 401,
  [ERROR_INSUFFICIENT_PERMISSION]: 403,
  [ERROR_REGISTRATION_FAILED]: 400,
  [ERROR_PASSWORD_CHANGE_FAILED]: 400,
  [ERROR_PASSWORD_RESET_FAILED]: 400,
  [ERROR_RATE_LIMITED]: 429,
  [ERROR_REQUEST_ABORTED]: 408,
  [ERROR_TEMPORARILY_UNAVAILABLE]: 503,
  [ERROR_CONFIGURATION]: 500,
  [ERROR_SERVER_ERROR]: 500,
};

/**
 * Default error descriptions. Deliberately generic where detail would help
 * an attacker.
 */
export const ERROR_DESCRIPTIONS: Record<AuthErrorCode, string> = {
  [ERROR_INVALID_REQUEST]: 'The request is missing a required field or is otherwise malformed.',
  [ERROR_INVALID_CREDENTIALS]: 'Invalid email or password',
  [ERROR_ACCOUNT_LOCKED]: 'Account is temporarily locked. Please try again later.',
  [ERROR_INVALID_TOKEN]: 'The access token provided is expired, malformed, or invalid.',
  [ERROR_INVALID_REFRESH_TOKEN]: 'Your session has expired. Please sign in again.',
  [ERROR_TOKEN_BLACKLISTED]: 'The access token has been revoked.',
  [ERROR_USER_NOT_FOUND]: 'User not found',
  [ERROR_USER_INACTIVE]: 'User account is disabled',
  [ERROR_INSUFFICIENT_PERMISSION]: 'You do not have permission to perform this action.',
  [ERROR_REGISTRATION_FAILED]: 'Registration failed',
  [ERROR_PASSWORD_CHANGE_FAILED]: 'Password could not be changed',
  [ERROR_PASSWORD_RESET_FAILED]: 'The reset token is invalid or has expired.',
  [ERROR_RATE_LIMITED]: 'Too many requests.',
  [ERROR_REQUEST_ABORTED]: 'The request was cancelled before it completed.',
  [ERROR_TEMPORARILY_UNAVAILABLE]: 'Authentication is temporarily unavailable',
  [ERROR_CONFIGURATION]: 'The authentication service is misconfigured.',
  [ERROR_SERVER_ERROR]: 'An unexpected error occurred',
};
