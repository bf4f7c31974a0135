import type {
  RefreshToken,
  CreateRefreshTokenInput,
  BlacklistedToken,
  CreateBlacklistEntryInput,
  PasswordResetToken,
  CreatePasswordResetInput,
} from '../../types/token.js';

/**
 * Storage interface for refresh token management
 */
export interface IRefreshTokenStorage {
  /**
   * Create a new refresh token
   * Returns the token record and the plaintext token value
   */
  create(input: CreateRefreshTokenInput, now: Date): Promise<{ token: RefreshToken; value: string }>;

  /**
   * Find a refresh token by its hash
   */
  findByHash(tokenHash: string): Promise<RefreshToken | null>;

  /**
   * Find a refresh token by plaintext value
   */
  findByValue(tokenValue: string): Promise<RefreshToken | null>;

  /**
   * Refresh tokens of a user that have not expired, whatever their state
   */
  findUnexpiredByUser(userId: string, now: Date): Promise<RefreshToken[]>;

  /**
   * Mark one token revoked. Returns the updated record only if this call
   * changed it; an already revoked token yields null.
   */
  revoke(id: string, now: Date): Promise<RefreshToken | null>;

  /**
   * Revoke every active (neither used nor revoked) token of a user.
   * Returns the records this call revoked.
   */
  revokeActiveByUser(userId: string, now: Date): Promise<RefreshToken[]>;

  /**
   * Compare-and-set: mark the token used only if it is still active.
   * Returns null when another caller got there first.
   */
  consume(id: string, now: Date): Promise<RefreshToken | null>;

  /**
   * Delete tokens that expired before the cutoff (retention cleanup)
   */
  deleteExpired(before: Date): Promise<number>;
}

/**
 * Storage interface for the token blacklist
 * Access tokens are stateless JWTs, so revocation is tracked here by jti
 */
export interface ITokenBlacklistStorage {
  /**
   * Blacklist a token id. Idempotent: an existing entry keeps the later expiry.
   */
  add(input: CreateBlacklistEntryInput, now: Date): Promise<BlacklistedToken>;

  /**
   * Find the entry for a token id, expired or not
   */
  find(tokenId: string): Promise<BlacklistedToken | null>;

  /**
   * Whether a token id has an unexpired entry
   */
  isBlacklisted(tokenId: string, now: Date): Promise<boolean>;

  /**
   * Delete entries whose expiry is at or before now
   */
  deleteExpired(now: Date): Promise<number>;
}

/**
 * Storage interface for password reset tokens
 */
export interface IPasswordResetStorage {
  /**
   * Create a reset token
   * Returns the record and the plaintext token value
   */
  create(
    input: CreatePasswordResetInput,
    now: Date
  ): Promise<{ token: PasswordResetToken; value: string }>;

  /**
   * Find a reset token by plaintext value
   */
  findByValue(tokenValue: string): Promise<PasswordResetToken | null>;

  /**
   * Delete a reset token. Returns false if it was already gone.
   */
  consume(id: string): Promise<boolean>;

  /**
   * Delete every reset token of a user
   */
  deleteByUser(userId: string): Promise<number>;

  /**
   * Delete tokens whose expiry is at or before now
   */
  deleteExpired(now: Date): Promise<number>;
}
