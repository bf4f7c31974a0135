import type {
  RefreshToken,
  CreateRefreshTokenInput,
  BlacklistedToken,
  CreateBlacklistEntryInput,
  PasswordResetToken,
  CreatePasswordResetInput,
} from '../../types/token.js';
import type {
  IRefreshTokenStorage,
  ITokenBlacklistStorage,
  IPasswordResetStorage,
} from '../interfaces/token-storage.js';
import {
  generateId,
  generateRefreshToken,
  generatePasswordResetToken,
  hashToken,
} from '../../crypto/index.js';
import { LockedRepository } from './snapshot.js';

function isActive(token: RefreshToken): boolean {
  return !token.used && !token.revoked;
}

/**
 * In-memory refresh token storage implementation
 */
export class MemoryRefreshTokenStorage extends LockedRepository implements IRefreshTokenStorage {
  private tokens = new Map<string, RefreshToken>();
  private hashIndex = new Map<string, string>(); // hash -> id

  async create(
    input: CreateRefreshTokenInput,
    now: Date
  ): Promise<{ token: RefreshToken; value: string }> {
    return this.lock.run(async () => {
      const tokenValue = generateRefreshToken();
      const token: RefreshToken = {
        id: generateId(),
        tenantId: input.tenantId,
        userId: input.userId,
        tokenHash: hashToken(tokenValue),
        accessTokenJti: input.accessTokenJti,
        accessTokenExpiresAt: input.accessTokenExpiresAt,
        issuedAt: now,
        expiresAt: input.expiresAt,
        used: false,
        revoked: false,
      };

      this.tokens.set(token.id, token);
      this.hashIndex.set(token.tokenHash, token.id);

      return { token, value: tokenValue };
    });
  }

  async findByHash(tokenHash: string): Promise<RefreshToken | null> {
    return this.lock.run(async () => {
      const id = this.hashIndex.get(tokenHash);
      if (!id) return null;
      return this.tokens.get(id) ?? null;
    });
  }

  async findByValue(tokenValue: string): Promise<RefreshToken | null> {
    return this.findByHash(hashToken(tokenValue));
  }

  async findUnexpiredByUser(userId: string, now: Date): Promise<RefreshToken[]> {
    return this.lock.run(async () => {
      return [...this.tokens.values()].filter(
        (token) => token.userId === userId && token.expiresAt > now
      );
    });
  }

  async revoke(id: string, now: Date): Promise<RefreshToken | null> {
    return this.lock.run(async () => {
      const token = this.tokens.get(id);
      if (!token || token.revoked) return null;

      const revoked = { ...token, revoked: true, revokedAt: now };
      this.tokens.set(id, revoked);
      return revoked;
    });
  }

  async revokeActiveByUser(userId: string, now: Date): Promise<RefreshToken[]> {
    return this.lock.run(async () => {
      const revoked: RefreshToken[] = [];
      for (const token of this.tokens.values()) {
        if (token.userId === userId && isActive(token)) {
          const updated = { ...token, revoked: true, revokedAt: now };
          this.tokens.set(token.id, updated);
          revoked.push(updated);
        }
      }
      return revoked;
    });
  }

  async consume(id: string, now: Date): Promise<RefreshToken | null> {
    return this.lock.run(async () => {
      const token = this.tokens.get(id);
      if (!token || !isActive(token)) return null;

      const consumed = { ...token, used: true, usedAt: now };
      this.tokens.set(id, consumed);
      return consumed;
    });
  }

  async deleteExpired(before: Date): Promise<number> {
    return this.lock.run(async () => {
      let deleted = 0;
      for (const [id, token] of this.tokens) {
        if (token.expiresAt < before) {
          this.tokens.delete(id);
          this.hashIndex.delete(token.tokenHash);
          deleted++;
        }
      }
      return deleted;
    });
  }

  snapshot(): () => void {
    const savedTokens = new Map(this.tokens);
    const savedIndex = new Map(this.hashIndex);
    return () => {
      this.tokens = savedTokens;
      this.hashIndex = savedIndex;
    };
  }
}

/**
 * In-memory token blacklist implementation
 */
export class MemoryTokenBlacklistStorage extends LockedRepository implements ITokenBlacklistStorage {
  private entries = new Map<string, BlacklistedToken>(); // tokenId -> entry

  async add(input: CreateBlacklistEntryInput, now: Date): Promise<BlacklistedToken> {
    return this.lock.run(async () => {
      const existing = this.entries.get(input.tokenId);
      if (existing) {
        if (input.expiresAt > existing.expiresAt) {
          const extended = { ...existing, expiresAt: input.expiresAt };
          this.entries.set(input.tokenId, extended);
          return extended;
        }
        return existing;
      }

      const entry: BlacklistedToken = {
        id: generateId(),
        tenantId: input.tenantId,
        tokenId: input.tokenId,
        tokenType: input.tokenType,
        reason: input.reason,
        blacklistedAt: now,
        expiresAt: input.expiresAt,
      };

      this.entries.set(entry.tokenId, entry);
      return entry;
    });
  }

  async find(tokenId: string): Promise<BlacklistedToken | null> {
    return this.lock.run(async () => this.entries.get(tokenId) ?? null);
  }

  async isBlacklisted(tokenId: string, now: Date): Promise<boolean> {
    return this.lock.run(async () => {
      const entry = this.entries.get(tokenId);
      return entry !== undefined && entry.expiresAt > now;
    });
  }

  async deleteExpired(now: Date): Promise<number> {
    return this.lock.run(async () => {
      let deleted = 0;
      for (const [tokenId, entry] of this.entries) {
        if (entry.expiresAt <= now) {
          this.entries.delete(tokenId);
          deleted++;
        }
      }
      return deleted;
    });
  }

  snapshot(): () => void {
    const saved = new Map(this.entries);
    return () => {
      this.entries = saved;
    };
  }
}

/**
 * In-memory password reset token storage implementation
 */
export class MemoryPasswordResetStorage extends LockedRepository implements IPasswordResetStorage {
  private tokens = new Map<string, PasswordResetToken>();

  async create(
    input: CreatePasswordResetInput,
    now: Date
  ): Promise<{ token: PasswordResetToken; value: string }> {
    return this.lock.run(async () => {
      const tokenValue = generatePasswordResetToken();
      const token: PasswordResetToken = {
        id: generateId(),
        tenantId: input.tenantId,
        userId: input.userId,
        tokenHash: hashToken(tokenValue),
        createdAt: now,
        expiresAt: input.expiresAt,
      };

      this.tokens.set(token.id, token);
      return { token, value: tokenValue };
    });
  }

  async findByValue(tokenValue: string): Promise<PasswordResetToken | null> {
    return this.lock.run(async () => {
      const tokenHash = hashToken(tokenValue);
      for (const token of this.tokens.values()) {
        if (token.tokenHash === tokenHash) {
          return token;
        }
      }
      return null;
    });
  }

  async consume(id: string): Promise<boolean> {
    return this.lock.run(async () => this.tokens.delete(id));
  }

  async deleteByUser(userId: string): Promise<number> {
    return this.lock.run(async () => {
      let deleted = 0;
      for (const [id, token] of this.tokens) {
        if (token.userId === userId) {
          this.tokens.delete(id);
          deleted++;
        }
      }
      return deleted;
    });
  }

  async deleteExpired(now: Date): Promise<number> {
    return this.lock.run(async () => {
      let deleted = 0;
      for (const [id, token] of this.tokens) {
        if (token.expiresAt <= now) {
          this.tokens.delete(id);
          deleted++;
        }
      }
      return deleted;
    });
  }

  snapshot(): () => void {
    const saved = new Map(this.tokens);
    return () => {
      this.tokens = saved;
    };
  }
}
