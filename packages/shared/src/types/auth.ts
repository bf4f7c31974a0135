import type { AuthUser } from './user.js';

/**
 * POST /auth/login
 */
export interface LoginRequest {
  email: string;
  password: string;
  tenantId?: string;
}

export interface LoginResponseData {
  accessToken: string;
  refreshToken: string;
  expiresAt: string; // ISO 8601, access token expiry
  user: AuthUser;
}

/**
 * POST /auth/refresh
 */
export interface RefreshRequest {
  accessToken: string;
  refreshToken: string;
}

export interface RefreshResponseData {
  accessToken: string;
  refreshToken: string;
  expiresAt: string;
}

/**
 * POST /auth/logout
 */
export interface LogoutRequest {
  refreshToken: string;
}

/**
 * POST /auth/register
 */
export interface RegisterRequest {
  tenantId: string;
  branchId?: string;
  firstName: string;
  lastName: string;
  email: string;
  phoneNumber?: string;
  userName: string;
  password: string;
  roleName?: string;
}

export interface RegisterResponseData {
  userId: string;
  email: string;
}

export interface ForgotPasswordRequest {
  email: string;
}

export interface ResetPasswordRequest {
  token: string;
  newPassword: string;
}

export interface ChangePasswordRequest {
  currentPassword: string;
  newPassword: string;
}

/**
 * JSON Web Key Set served at /.well-known/jwks.json
 */
export interface JWKSResponse {
  keys: Array<{
    kty: string;
    kid: string;
    use: 'sig';
    alg: string;
    n?: string;
    e?: string;
  }>;
}
