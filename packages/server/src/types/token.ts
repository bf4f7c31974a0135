/**
 * JWT Access Token Payload
 */
export interface AccessTokenPayload {
  // Standard JWT claims
  iss: string; // Issuer
  sub: string; // Subject (user ID)
  aud: string | string[]; // Audience
  exp: number; // Expiration time
  iat: number; // Issued at
  nbf?: number; // Not before
  jti: string; // JWT ID, the blacklist key

  // Identity claims
  email: string;
  name: string;
  given_name: string;
  family_name: string;

  // Tenancy and authorization claims
  tenant_id: string;
  branch_id?: string;
  roles: string[];
  permissions: string[];
  token_type: 'access_token';
}

/**
 * Refresh Token (stored)
 *
 * Rows are marked used/revoked rather than deleted so the chain can be
 * audited; only retention cleanup removes them.
 */
export interface RefreshToken {
  id: string;
  tenantId: string;
  userId: string;
  tokenHash: string; // SHA-256 of the opaque value
  accessTokenJti?: string; // jti of the access token issued alongside
  accessTokenExpiresAt?: Date;
  issuedAt: Date;
  expiresAt: Date;
  used: boolean;
  usedAt?: Date;
  revoked: boolean;
  revokedAt?: Date;
}

/**
 * Refresh token creation input
 */
export interface CreateRefreshTokenInput {
  tenantId: string;
  userId: string;
  accessTokenJti?: string;
  accessTokenExpiresAt?: Date;
  expiresAt: Date;
}

export type BlacklistedTokenType = 'access_token' | 'refresh_token';

export type BlacklistReason =
  | 'logout'
  | 'token_refreshed'
  | 'session_replaced'
  | 'revoke_all'
  | 'credential_compromise'
  | 'manual';

/**
 * Blacklisted Token
 *
 * `tokenId` is an access-token jti, or the hash of a refresh token value
 * when `tokenType` is `refresh_token`. The row only matters until
 * `expiresAt`, the natural expiry of the underlying token.
 */
export interface BlacklistedToken {
  id: string;
  tenantId?: string;
  tokenId: string;
  tokenType: BlacklistedTokenType;
  reason: BlacklistReason;
  blacklistedAt: Date;
  expiresAt: Date;
}

export interface CreateBlacklistEntryInput {
  tenantId?: string;
  tokenId: string;
  tokenType: BlacklistedTokenType;
  reason: BlacklistReason;
  expiresAt: Date;
}

/**
 * Password reset token (stored). Single use, deleted when consumed.
 */
export interface PasswordResetToken {
  id: string;
  tenantId: string;
  userId: string;
  tokenHash: string;
  createdAt: Date;
  expiresAt: Date;
}

export interface CreatePasswordResetInput {
  tenantId: string;
  userId: string;
  expiresAt: Date;
}
