import type { ApiSuccess, ApiFailure, AuthUser } from '@pharmacy-auth/shared';

/**
 * Per-call context threaded through every service operation
 */
export interface OperationContext {
  signal?: AbortSignal;
  requestId?: string;
}

/**
 * Outcome of a service operation. Credential and token failures come back
 * here instead of being thrown.
 */
export type AuthResult<T> = ApiSuccess<T> | ApiFailure;

/**
 * A freshly issued access/refresh pair
 */
export interface SessionTokens {
  accessToken: string;
  refreshToken: string;
  expiresAt: Date;
}

export interface LoginSession extends SessionTokens {
  user: AuthUser;
}

export interface RegistrationResult {
  userId: string;
  email: string;
}
