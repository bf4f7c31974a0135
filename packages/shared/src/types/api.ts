/**
 * Error codes returned in the `error` field of a failed response
 */
export type AuthErrorCode =
  | 'invalid_request'
  | 'invalid_credentials'
  | 'account_locked'
  | 'invalid_token'
  | 'invalid_refresh_token'
  | 'token_blacklisted'
  | 'user_not_found'
  | 'user_inactive'
  | 'insufficient_permission'
  | 'registration_failed'
  | 'password_change_failed'
  | 'password_reset_failed'
  | 'rate_limited'
  | 'request_aborted'
  | 'temporarily_unavailable'
  | 'configuration_error'
  | 'server_error';

/**
 * Successful response envelope
 */
export interface ApiSuccess<T> {
  success: true;
  message: string;
  data: T;
}

/**
 * Failed response envelope. Same outer shape as a success so that portals
 * only need one response contract.
 */
export interface ApiFailure {
  success: false;
  message: string;
  error: AuthErrorCode;
}

export type ApiResponse<T> = ApiSuccess<T> | ApiFailure;

export interface HealthResponse {
  status: 'ok';
}
