import type { Tenant } from '../../../types/tenant.js';
import type { User } from '../../../types/user.js';
import type {
  RefreshToken,
  BlacklistedToken,
  BlacklistedTokenType,
  BlacklistReason,
  PasswordResetToken,
} from '../../../types/token.js';

/**
 * Column shapes as returned by node-postgres (timestamptz arrives as Date)
 */

export type TenantRow = {
  id: string;
  name: string;
  is_active: boolean;
  created_at: Date;
};

export type UserRow = {
  id: string;
  tenant_id: string;
  branch_id: string | null;
  email: string;
  user_name: string;
  first_name: string;
  last_name: string;
  phone_number: string | null;
  password_hash: string;
  failed_login_attempts: number;
  lockout_end: Date | null;
  last_login_at: Date | null;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
};

export type RoleClaimRow = {
  id: string;
  tenant_id: string;
  name: string;
  claim_type: string | null;
  claim_value: string | null;
};

export type RefreshTokenRow = {
  id: string;
  tenant_id: string;
  user_id: string;
  token_hash: string;
  access_token_jti: string | null;
  access_token_expires_at: Date | null;
  issued_at: Date;
  expires_at: Date;
  used: boolean;
  used_at: Date | null;
  revoked: boolean;
  revoked_at: Date | null;
};

export type BlacklistRow = {
  id: string;
  tenant_id: string | null;
  token_id: string;
  token_type: BlacklistedTokenType;
  reason: BlacklistReason;
  blacklisted_at: Date;
  expires_at: Date;
};

export type PasswordResetRow = {
  id: string;
  tenant_id: string;
  user_id: string;
  token_hash: string;
  created_at: Date;
  expires_at: Date;
};

export function toTenant(row: TenantRow): Tenant {
  return {
    id: row.id,
    name: row.name,
    isActive: row.is_active,
    createdAt: row.created_at,
  };
}

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    branchId: row.branch_id ?? undefined,
    email: row.email,
    userName: row.user_name,
    firstName: row.first_name,
    lastName: row.last_name,
    phoneNumber: row.phone_number ?? undefined,
    passwordHash: row.password_hash,
    failedLoginAttempts: row.failed_login_attempts,
    lockoutEnd: row.lockout_end ?? undefined,
    lastLoginAt: row.last_login_at ?? undefined,
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toRefreshToken(row: RefreshTokenRow): RefreshToken {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    userId: row.user_id,
    tokenHash: row.token_hash,
    accessTokenJti: row.access_token_jti ?? undefined,
    accessTokenExpiresAt: row.access_token_expires_at ?? undefined,
    issuedAt: row.issued_at,
    expiresAt: row.expires_at,
    used: row.used,
    usedAt: row.used_at ?? undefined,
    revoked: row.revoked,
    revokedAt: row.revoked_at ?? undefined,
  };
}

export function toBlacklistedToken(row: BlacklistRow): BlacklistedToken {
  return {
    id: row.id,
    tenantId: row.tenant_id ?? undefined,
    tokenId: row.token_id,
    tokenType: row.token_type,
    reason: row.reason,
    blacklistedAt: row.blacklisted_at,
    expiresAt: row.expires_at,
  };
}

export function toPasswordResetToken(row: PasswordResetRow): PasswordResetToken {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    userId: row.user_id,
    tokenHash: row.token_hash,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
  };
}
