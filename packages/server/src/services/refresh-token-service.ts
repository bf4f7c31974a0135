import { LRUCache } from 'lru-cache';
import type { IStorage, StorageSession } from '../storage/interfaces/index.js';
import type { RefreshToken } from '../types/token.js';
import type { OperationContext } from '../types/auth.js';
import { hashToken } from '../crypto/hash.js';
import { REFRESH_TOKEN_CACHE_MAX_ENTRIES } from '../config/constants.js';
import { createLogger, type Logger } from '../logging/logger.js';
import type { TokenBlacklistService } from './token-blacklist-service.js';

export interface RefreshTokenServiceOptions {
  storage: IStorage;
  blacklist: TokenBlacklistService;
  refreshTokenTtlHours: number;
  /**
   * Lifetime of cached lookups; 0 disables the cache
   */
  cacheTtlMs: number;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Access token paired with a refresh token
 */
export interface PairedAccessToken {
  jti: string;
  expiresAt: Date;
}

export interface IssuedRefreshToken {
  record: RefreshToken;
  value: string;
}

/**
 * Refresh token lifecycle: creation, lookup, validation, revocation and the
 * single-use rotation exchange.
 *
 * Only the SHA-256 hash of a token is stored. Persistence errors propagate;
 * the auth service decides how they surface.
 */
export class RefreshTokenService {
  private readonly storage: IStorage;
  private readonly blacklist: TokenBlacklistService;
  private readonly ttlMs: number;
  private readonly cache: LRUCache<string, RefreshToken> | null;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: RefreshTokenServiceOptions) {
    this.storage = options.storage;
    this.blacklist = options.blacklist;
    this.ttlMs = options.refreshTokenTtlHours * 60 * 60 * 1000;
    this.cache =
      options.cacheTtlMs > 0
        ? new LRUCache<string, RefreshToken>({
            max: REFRESH_TOKEN_CACHE_MAX_ENTRIES,
            ttl: options.cacheTtlMs,
          })
        : null;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('refresh-tokens');
  }

  /**
   * Issue a refresh token for a new session. Every other active token of the
   * user is revoked and its access token blacklisted in the same transaction.
   */
  async create(
    userId: string,
    tenantId: string,
    access: PairedAccessToken,
    ctx: OperationContext = {}
  ): Promise<IssuedRefreshToken> {
    const { issued, replaced } = await this.storage.transaction(
      (session) => this.createWithin(session, userId, tenantId, access),
      { signal: ctx.signal }
    );
    this.evict(replaced);
    return issued;
  }

  /**
   * Look up a token by value. The cache is only a read-through in front of
   * the store; every mutation made here evicts what it touches.
   */
  async get(tokenValue: string): Promise<RefreshToken | null> {
    const tokenHash = hashToken(tokenValue);

    const cached = this.cache?.get(tokenHash);
    if (cached) {
      return cached;
    }

    const record = await this.storage.refreshTokens.findByHash(tokenHash);
    if (record) {
      this.cache?.set(tokenHash, record);
    }
    return record;
  }

  /**
   * The record behind a value if it can still be exchanged, otherwise null
   */
  async findValid(tokenValue: string): Promise<RefreshToken | null> {
    const record = await this.get(tokenValue);
    if (!record || record.used || record.revoked || record.expiresAt <= this.now()) {
      return null;
    }

    if (await this.blacklist.isRefreshTokenBlacklisted(tokenValue)) {
      return null;
    }
    return record;
  }

  async validate(tokenValue: string): Promise<boolean> {
    return (await this.findValid(tokenValue)) !== null;
  }

  /**
   * Revoke a single token and blacklist its access token. Returns false only
   * when the token does not exist; revoking twice is a no-op.
   */
  async revoke(tokenValue: string, ctx: OperationContext = {}): Promise<boolean> {
    const tokenHash = hashToken(tokenValue);

    const found = await this.storage.transaction(
      async (session) => {
        const record = await session.refreshTokens.findByHash(tokenHash);
        if (!record) {
          return false;
        }

        const revoked = await session.refreshTokens.revoke(record.id, this.now());
        if (revoked) {
          await this.blacklist.blacklistPairedAccessToken(revoked, 'logout', session);
          this.logger.info('Refresh token revoked', {
            requestId: ctx.requestId,
            tokenId: record.id,
            userId: record.userId,
          });
        }
        return true;
      },
      { signal: ctx.signal }
    );

    // Evict after commit so a concurrent read cannot re-cache the old state
    this.cache?.delete(tokenHash);
    return found;
  }

  /**
   * Revoke every active token of a user and blacklist their access tokens
   */
  async revokeAllForUser(userId: string, ctx: OperationContext = {}): Promise<boolean> {
    const revoked = await this.storage.transaction(
      (session) => this.revokeActive(session, userId, 'revoke_all'),
      { signal: ctx.signal }
    );
    this.evict(revoked);

    this.logger.info('Revoked all refresh tokens for user', {
      requestId: ctx.requestId,
      userId,
      revoked: revoked.length,
    });
    return true;
  }

  /**
   * The refresh exchange. Marks the presented token used only if it is still
   * active (compare-and-set), then blacklists its access token and issues the
   * successor, all in one transaction. Returns null when the CAS loses.
   */
  async rotate(
    record: RefreshToken,
    access: PairedAccessToken,
    ctx: OperationContext = {}
  ): Promise<IssuedRefreshToken | null> {
    const rotated = await this.storage.transaction(
      async (session) => {
        const consumed = await session.refreshTokens.consume(record.id, this.now());
        if (!consumed) {
          this.logger.warn('Refresh token reuse rejected', {
            requestId: ctx.requestId,
            tokenId: record.id,
            userId: record.userId,
          });
          return null;
        }

        await this.blacklist.blacklistPairedAccessToken(consumed, 'token_refreshed', session);
        return this.createWithin(session, record.userId, record.tenantId, access);
      },
      { signal: ctx.signal }
    );

    this.cache?.delete(record.tokenHash);
    if (!rotated) {
      return null;
    }
    this.evict(rotated.replaced);
    return rotated.issued;
  }

  /**
   * Delete tokens that expired more than `retentionDays` ago
   */
  async deleteExpired(retentionDays: number): Promise<number> {
    const cutoff = new Date(this.now().getTime() - retentionDays * 24 * 60 * 60 * 1000);
    const deleted = await this.storage.refreshTokens.deleteExpired(cutoff);
    if (deleted > 0) {
      this.logger.info('Deleted expired refresh tokens', { deleted, retentionDays });
    }
    return deleted;
  }

  private async createWithin(
    session: StorageSession,
    userId: string,
    tenantId: string,
    access: PairedAccessToken
  ): Promise<{ issued: IssuedRefreshToken; replaced: RefreshToken[] }> {
    const replaced = await this.revokeActive(session, userId, 'session_replaced');

    const now = this.now();
    const { token, value } = await session.refreshTokens.create(
      {
        tenantId,
        userId,
        accessTokenJti: access.jti,
        accessTokenExpiresAt: access.expiresAt,
        expiresAt: new Date(now.getTime() + this.ttlMs),
      },
      now
    );
    return { issued: { record: token, value }, replaced };
  }

  private async revokeActive(
    session: StorageSession,
    userId: string,
    reason: 'session_replaced' | 'revoke_all'
  ): Promise<RefreshToken[]> {
    const revoked = await session.refreshTokens.revokeActiveByUser(userId, this.now());
    for (const record of revoked) {
      await this.blacklist.blacklistPairedAccessToken(record, reason, session);
    }
    return revoked;
  }

  /**
   * Drop cached revoked tokens. Only call after the revoking transaction has
   * committed.
   */
  private evict(records: RefreshToken[]): void {
    for (const record of records) {
      this.cache?.delete(record.tokenHash);
    }
  }
}
