import type {
  RefreshToken,
  CreateRefreshTokenInput,
  BlacklistedToken,
  CreateBlacklistEntryInput,
  PasswordResetToken,
  CreatePasswordResetInput,
} from '../../../types/token.js';
import type {
  IRefreshTokenStorage,
  ITokenBlacklistStorage,
  IPasswordResetStorage,
} from '../../interfaces/token-storage.js';
import {
  generateId,
  generateRefreshToken,
  generatePasswordResetToken,
  hashToken,
} from '../../../crypto/index.js';
import type { Queryable } from '../client.js';
import {
  type RefreshTokenRow,
  type BlacklistRow,
  type PasswordResetRow,
  toRefreshToken,
  toBlacklistedToken,
  toPasswordResetToken,
} from './rows.js';

/**
 * PostgreSQL refresh token storage implementation
 */
export class PostgresRefreshTokenStorage implements IRefreshTokenStorage {
  constructor(private readonly db: Queryable) {}

  async create(
    input: CreateRefreshTokenInput,
    now: Date
  ): Promise<{ token: RefreshToken; value: string }> {
    const tokenValue = generateRefreshToken();
    const { rows } = await this.db.query<RefreshTokenRow>(
      `INSERT INTO refresh_tokens (
         id, tenant_id, user_id, token_hash, access_token_jti, access_token_expires_at,
         issued_at, expires_at, used, revoked
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, false, false)
       RETURNING *`,
      [
        generateId(),
        input.tenantId,
        input.userId,
        hashToken(tokenValue),
        input.accessTokenJti ?? null,
        input.accessTokenExpiresAt ?? null,
        now,
        input.expiresAt,
      ]
    );

    const [row] = rows;
    if (!row) {
      throw new Error('INSERT INTO refresh_tokens returned no row');
    }
    return { token: toRefreshToken(row), value: tokenValue };
  }

  async findByHash(tokenHash: string): Promise<RefreshToken | null> {
    const { rows } = await this.db.query<RefreshTokenRow>(
      'SELECT * FROM refresh_tokens WHERE token_hash = $1',
      [tokenHash]
    );
    const [row] = rows;
    return row ? toRefreshToken(row) : null;
  }

  async findByValue(tokenValue: string): Promise<RefreshToken | null> {
    return this.findByHash(hashToken(tokenValue));
  }

  async findUnexpiredByUser(userId: string, now: Date): Promise<RefreshToken[]> {
    const { rows } = await this.db.query<RefreshTokenRow>(
      'SELECT * FROM refresh_tokens WHERE user_id = $1 AND expires_at > $2 ORDER BY issued_at',
      [userId, now]
    );
    return rows.map(toRefreshToken);
  }

  async revoke(id: string, now: Date): Promise<RefreshToken | null> {
    const { rows } = await this.db.query<RefreshTokenRow>(
      `UPDATE refresh_tokens SET revoked = true, revoked_at = $2
       WHERE id = $1 AND NOT revoked
       RETURNING *`,
      [id, now]
    );
    const [row] = rows;
    return row ? toRefreshToken(row) : null;
  }

  async revokeActiveByUser(userId: string, now: Date): Promise<RefreshToken[]> {
    // The user row serializes session changes even when there is no active
    // token to lock yet, so two first logins cannot both leave a chain behind
    await this.db.query('SELECT 1 FROM users WHERE id = $1 FOR UPDATE', [userId]);

    // Lock the tokens so a concurrent rotation either finishes before us or
    // sees its token revoked
    await this.db.query(
      'SELECT id FROM refresh_tokens WHERE user_id = $1 AND NOT used AND NOT revoked FOR UPDATE',
      [userId]
    );

    const { rows } = await this.db.query<RefreshTokenRow>(
      `UPDATE refresh_tokens SET revoked = true, revoked_at = $2
       WHERE user_id = $1 AND NOT used AND NOT revoked
       RETURNING *`,
      [userId, now]
    );
    return rows.map(toRefreshToken);
  }

  async consume(id: string, now: Date): Promise<RefreshToken | null> {
    const { rows } = await this.db.query<RefreshTokenRow>(
      `UPDATE refresh_tokens SET used = true, used_at = $2
       WHERE id = $1 AND NOT used AND NOT revoked
       RETURNING *`,
      [id, now]
    );
    const [row] = rows;
    return row ? toRefreshToken(row) : null;
  }

  async deleteExpired(before: Date): Promise<number> {
    const result = await this.db.query('DELETE FROM refresh_tokens WHERE expires_at < $1', [before]);
    return result.rowCount ?? 0;
  }
}

/**
 * PostgreSQL token blacklist implementation
 */
export class PostgresTokenBlacklistStorage implements ITokenBlacklistStorage {
  constructor(private readonly db: Queryable) {}

  async add(input: CreateBlacklistEntryInput, now: Date): Promise<BlacklistedToken> {
    const { rows } = await this.db.query<BlacklistRow>(
      `INSERT INTO token_blacklist (
         id, tenant_id, token_id, token_type, reason, blacklisted_at, expires_at
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (token_id)
       DO UPDATE SET expires_at = GREATEST(token_blacklist.expires_at, EXCLUDED.expires_at)
       RETURNING *`,
      [
        generateId(),
        input.tenantId ?? null,
        input.tokenId,
        input.tokenType,
        input.reason,
        now,
        input.expiresAt,
      ]
    );

    const [row] = rows;
    if (!row) {
      throw new Error('INSERT INTO token_blacklist returned no row');
    }
    return toBlacklistedToken(row);
  }

  async find(tokenId: string): Promise<BlacklistedToken | null> {
    const { rows } = await this.db.query<BlacklistRow>(
      'SELECT * FROM token_blacklist WHERE token_id = $1',
      [tokenId]
    );
    const [row] = rows;
    return row ? toBlacklistedToken(row) : null;
  }

  async isBlacklisted(tokenId: string, now: Date): Promise<boolean> {
    const { rows } = await this.db.query<{ found: number }>(
      'SELECT 1 AS found FROM token_blacklist WHERE token_id = $1 AND expires_at > $2 LIMIT 1',
      [tokenId, now]
    );
    return rows.length > 0;
  }

  async deleteExpired(now: Date): Promise<number> {
    const result = await this.db.query('DELETE FROM token_blacklist WHERE expires_at <= $1', [now]);
    return result.rowCount ?? 0;
  }
}

/**
 * PostgreSQL password reset token storage implementation
 */
export class PostgresPasswordResetStorage implements IPasswordResetStorage {
  constructor(private readonly db: Queryable) {}

  async create(
    input: CreatePasswordResetInput,
    now: Date
  ): Promise<{ token: PasswordResetToken; value: string }> {
    const tokenValue = generatePasswordResetToken();
    const { rows } = await this.db.query<PasswordResetRow>(
      `INSERT INTO password_reset_tokens (id, tenant_id, user_id, token_hash, created_at, expires_at)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING *`,
      [generateId(), input.tenantId, input.userId, hashToken(tokenValue), now, input.expiresAt]
    );

    const [row] = rows;
    if (!row) {
      throw new Error('INSERT INTO password_reset_tokens returned no row');
    }
    return { token: toPasswordResetToken(row), value: tokenValue };
  }

  async findByValue(tokenValue: string): Promise<PasswordResetToken | null> {
    const { rows } = await this.db.query<PasswordResetRow>(
      'SELECT * FROM password_reset_tokens WHERE token_hash = $1',
      [hashToken(tokenValue)]
    );
    const [row] = rows;
    return row ? toPasswordResetToken(row) : null;
  }

  async consume(id: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM password_reset_tokens WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async deleteByUser(userId: string): Promise<number> {
    const result = await this.db.query('DELETE FROM password_reset_tokens WHERE user_id = $1', [
      userId,
    ]);
    return result.rowCount ?? 0;
  }

  async deleteExpired(now: Date): Promise<number> {
    const result = await this.db.query('DELETE FROM password_reset_tokens WHERE expires_at <= $1', [
      now,
    ]);
    return result.rowCount ?? 0;
  }
}
