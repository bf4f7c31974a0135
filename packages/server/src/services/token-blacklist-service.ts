import type { IStorage, StorageSession } from '../storage/interfaces/index.js';
import type { BlacklistReason, BlacklistedTokenType, RefreshToken } from '../types/token.js';
import { decodeExpiry, decodeJti, isCompactJwt } from '../crypto/jwt.js';
import { hashToken } from '../crypto/hash.js';
import { createLogger, type Logger } from '../logging/logger.js';

export interface TokenBlacklistServiceOptions {
  storage: IStorage;
  /**
   * Lifetime of an entry for a bare jti given without an expiry; the access
   * token lifetime, past which the token is dead anyway
   */
  defaultTtlSeconds: number;
  now?: () => Date;
  logger?: Logger;
}

export interface BlacklistOptions {
  expiresAt?: Date;
  tenantId?: string;
  tokenType?: BlacklistedTokenType;
  /**
   * Write through a transaction's session instead of the top-level storage
   */
  session?: StorageSession;
}

/**
 * Deny-list of revoked access tokens (by jti) and refresh tokens (by hash)
 */
export class TokenBlacklistService {
  private readonly storage: IStorage;
  private readonly defaultTtlMs: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: TokenBlacklistServiceOptions) {
    this.storage = options.storage;
    this.defaultTtlMs = options.defaultTtlSeconds * 1000;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('token-blacklist');
  }

  /**
   * Accepts either a compact JWT or a bare jti. Tokens whose jti cannot be
   * decoded are reported as not blacklisted; signature checks reject them.
   */
  async isBlacklisted(tokenOrJti: string): Promise<boolean> {
    const jti = isCompactJwt(tokenOrJti) ? decodeJti(tokenOrJti) : tokenOrJti;
    if (!jti) {
      return false;
    }
    return this.storage.blacklist.isBlacklisted(jti, this.now());
  }

  /**
   * Idempotently blacklist a token. A JWT without an explicit expiry is kept
   * until its own `exp`. Returns false when no jti can be determined.
   */
  async blacklist(
    tokenOrJti: string,
    reason: BlacklistReason,
    options: BlacklistOptions = {}
  ): Promise<boolean> {
    const isJwt = isCompactJwt(tokenOrJti);
    const tokenId = isJwt ? decodeJti(tokenOrJti) : tokenOrJti;
    if (!tokenId) {
      return false;
    }

    const now = this.now();
    const expiresAt =
      options.expiresAt ??
      (isJwt ? decodeExpiry(tokenOrJti) : null) ??
      new Date(now.getTime() + this.defaultTtlMs);

    const store = (options.session ?? this.storage).blacklist;
    await store.add(
      {
        tenantId: options.tenantId,
        tokenId,
        tokenType: options.tokenType ?? 'access_token',
        reason,
        expiresAt,
      },
      now
    );
    return true;
  }

  /**
   * Blacklist the access token paired with a refresh record, if it is still
   * alive. Returns whether an entry was written.
   */
  async blacklistPairedAccessToken(
    record: RefreshToken,
    reason: BlacklistReason,
    session?: StorageSession
  ): Promise<boolean> {
    if (!record.accessTokenJti) {
      return false;
    }

    const expiresAt = record.accessTokenExpiresAt ?? record.expiresAt;
    if (expiresAt <= this.now()) {
      return false;
    }

    return this.blacklist(record.accessTokenJti, reason, {
      expiresAt,
      tenantId: record.tenantId,
      session,
    });
  }

  /**
   * For every unexpired refresh token of the user, blacklist its access
   * token jti and the refresh token hash itself. Returns the entry count.
   */
  async blacklistAllForUser(
    userId: string,
    reason: BlacklistReason,
    session?: StorageSession
  ): Promise<number> {
    const store = session ?? this.storage;
    const now = this.now();
    const records = await store.refreshTokens.findUnexpiredByUser(userId, now);

    let count = 0;
    for (const record of records) {
      if (await this.blacklistPairedAccessToken(record, reason, session)) {
        count++;
      }

      await store.blacklist.add(
        {
          tenantId: record.tenantId,
          tokenId: record.tokenHash,
          tokenType: 'refresh_token',
          reason,
          expiresAt: record.expiresAt,
        },
        now
      );
      count++;
    }

    this.logger.info('Blacklisted all tokens for user', { userId, reason, entries: count });
    return count;
  }

  /**
   * Whether a refresh token value has been blacklisted by hash
   */
  async isRefreshTokenBlacklisted(tokenValue: string): Promise<boolean> {
    return this.storage.blacklist.isBlacklisted(hashToken(tokenValue), this.now());
  }

  /**
   * Delete entries whose underlying token has expired
   */
  async cleanupExpired(): Promise<number> {
    const deleted = await this.storage.blacklist.deleteExpired(this.now());
    if (deleted > 0) {
      this.logger.info('Removed expired blacklist entries', { deleted });
    }
    return deleted;
  }
}
