import { describe, it, expect, vi } from 'vitest';
import { createPostgresStorage } from '../../storage/postgres/index.js';
import {
  PostgresRefreshTokenStorage,
  PostgresTokenBlacklistStorage,
} from '../../storage/postgres/repositories/token-repository.js';
import {
  PostgresUserStorage,
  PostgresRoleStorage,
} from '../../storage/postgres/repositories/user-repository.js';
import type { ConnectionSource, Queryable } from '../../storage/postgres/client.js';
import type { RefreshTokenRow, UserRow } from '../../storage/postgres/repositories/rows.js';
import { hashToken } from '../../crypto/hash.js';

/**
 * In-process stand-in for a pg pool: every query is recorded and answered
 * from the queued results
 */
function fakeDb() {
  const query = vi.fn();
  const db: Queryable = { query };
  const respond = (rows: object[]) => query.mockResolvedValueOnce({ rows, rowCount: rows.length });
  return { db, query, respond };
}

function fakePool() {
  const clientQuery = vi.fn().mockResolvedValue({ rows: [], rowCount: 0 });
  const release = vi.fn();
  const connect = vi.fn().mockResolvedValue({ query: clientQuery, release });
  const end = vi.fn().mockResolvedValue(undefined);
  const source: ConnectionSource = { query: vi.fn(), connect, end };
  const statements = () => clientQuery.mock.calls.map((call) => String(call[0]));
  return { source, clientQuery, release, connect, end, statements };
}

const now = new Date('2026-01-15T08:00:00.000Z');

const refreshRow: RefreshTokenRow = {
  id: 'rt-1',
  tenant_id: 'tenant-north',
  user_id: 'user-001',
  token_hash: 'hash-1',
  access_token_jti: 'jti-1',
  access_token_expires_at: new Date('2026-01-15T08:15:00.000Z'),
  issued_at: now,
  expires_at: new Date('2026-01-22T08:00:00.000Z'),
  used: true,
  used_at: now,
  revoked: false,
  revoked_at: null,
};

const userRow: UserRow = {
  id: 'user-001',
  tenant_id: 'tenant-north',
  branch_id: null,
  email: 'amina.diallo@example.com',
  user_name: 'adiallo',
  first_name: 'Amina',
  last_name: 'Diallo',
  phone_number: null,
  password_hash: '10000.c2FsdA==.a2V5',
  failed_login_attempts: 5,
  lockout_end: new Date('2026-01-15T08:15:00.000Z'),
  last_login_at: null,
  is_active: true,
  created_at: now,
  updated_at: now,
};

describe('PostgreSQL storage', () => {
  describe('refresh tokens', () => {
    it('should insert the hash of the generated value', async () => {
      const { db, query, respond } = fakeDb();
      respond([{ ...refreshRow, used: false, used_at: null }]);
      const repository = new PostgresRefreshTokenStorage(db);

      const { value } = await repository.create(
        {
          tenantId: 'tenant-north',
          userId: 'user-001',
          accessTokenJti: 'jti-1',
          expiresAt: new Date('2026-01-22T08:00:00.000Z'),
        },
        now
      );

      const values: unknown[] = query.mock.calls[0]?.[1];
      expect(values[3]).toBe(hashToken(value));
      expect(values).not.toContain(value);
    });

    it('should consume with a single conditional update', async () => {
      const { db, query, respond } = fakeDb();
      respond([refreshRow]);
      const repository = new PostgresRefreshTokenStorage(db);

      const consumed = await repository.consume('rt-1', now);

      expect(query).toHaveBeenCalledTimes(1);
      expect(query).toHaveBeenCalledWith(expect.stringContaining('WHERE id = $1 AND NOT used AND NOT revoked'), [
        'rt-1',
        now,
      ]);
      expect(consumed).toEqual({
        id: 'rt-1',
        tenantId: 'tenant-north',
        userId: 'user-001',
        tokenHash: 'hash-1',
        accessTokenJti: 'jti-1',
        accessTokenExpiresAt: new Date('2026-01-15T08:15:00.000Z'),
        issuedAt: now,
        expiresAt: new Date('2026-01-22T08:00:00.000Z'),
        used: true,
        usedAt: now,
        revoked: false,
        revokedAt: undefined,
      });
    });

    it('should return null when the exchange loses the race', async () => {
      const { db, respond } = fakeDb();
      respond([]);

      expect(await new PostgresRefreshTokenStorage(db).consume('rt-1', now)).toBeNull();
    });

    it('should lock the user and token rows before a bulk revoke', async () => {
      const { db, query, respond } = fakeDb();
      respond([{ '?column?': 1 }]);
      respond([{ id: 'rt-1' }]);
      respond([{ ...refreshRow, used: false, revoked: true, revoked_at: now }]);

      const revoked = await new PostgresRefreshTokenStorage(db).revokeActiveByUser('user-001', now);

      expect(query.mock.calls[0]).toEqual(['SELECT 1 FROM users WHERE id = $1 FOR UPDATE', ['user-001']]);
      expect(String(query.mock.calls[1]?.[0])).toContain('FROM refresh_tokens');
      expect(String(query.mock.calls[1]?.[0])).toContain('FOR UPDATE');
      expect(String(query.mock.calls[2]?.[0])).toContain('UPDATE refresh_tokens SET revoked = true');
      expect(revoked.map((token) => token.id)).toEqual(['rt-1']);
    });

    it('should lock the user row even when no token is active yet', async () => {
      const { db, query, respond } = fakeDb();
      respond([{ '?column?': 1 }]);
      respond([]);
      respond([]);

      expect(await new PostgresRefreshTokenStorage(db).revokeActiveByUser('user-001', now)).toEqual([]);
      expect(String(query.mock.calls[0]?.[0])).toBe('SELECT 1 FROM users WHERE id = $1 FOR UPDATE');
    });
  });

  describe('blacklist', () => {
    it('should keep the later expiry on conflict', async () => {
      const { db, query, respond } = fakeDb();
      respond([
        {
          id: 'bl-1',
          tenant_id: null,
          token_id: 'jti-1',
          token_type: 'access_token',
          reason: 'logout',
          blacklisted_at: now,
          expires_at: new Date('2026-01-15T08:15:00.000Z'),
        },
      ]);

      const entry = await new PostgresTokenBlacklistStorage(db).add(
        {
          tokenId: 'jti-1',
          tokenType: 'access_token',
          reason: 'logout',
          expiresAt: new Date('2026-01-15T08:15:00.000Z'),
        },
        now
      );

      expect(String(query.mock.calls[0]?.[0])).toContain(
        'GREATEST(token_blacklist.expires_at, EXCLUDED.expires_at)'
      );
      expect(entry.tenantId).toBeUndefined();
      expect(entry.tokenId).toBe('jti-1');
    });

    it('should only count unexpired entries', async () => {
      const { db, query, respond } = fakeDb();
      respond([]);

      expect(await new PostgresTokenBlacklistStorage(db).isBlacklisted('jti-1', now)).toBe(false);
      expect(query).toHaveBeenCalledWith(expect.stringContaining('expires_at > $2'), ['jti-1', now]);
    });
  });

  describe('users', () => {
    it('should record a login failure atomically', async () => {
      const { db, query, respond } = fakeDb();
      respond([userRow]);
      const lockoutEnd = new Date('2026-01-15T08:15:00.000Z');

      const user = await new PostgresUserStorage(db).recordLoginFailure('user-001', {
        now,
        maxFailedAttempts: 5,
        lockoutEnd,
      });

      expect(query).toHaveBeenCalledTimes(1);
      expect(query.mock.calls[0]?.[1]).toEqual(['user-001', now, 5, lockoutEnd]);
      expect(user?.failedLoginAttempts).toBe(5);
      expect(user?.lockoutEnd).toEqual(lockoutEnd);
      expect(user?.branchId).toBeUndefined();
    });

    it('should scope email lookups to a tenant when given one', async () => {
      const { db, query, respond } = fakeDb();
      respond([]);

      expect(await new PostgresUserStorage(db).findByEmail('amina.diallo@example.com', 'tenant-north')).toBeNull();
      expect(query.mock.calls[0]?.[1]).toEqual(['amina.diallo@example.com', 'tenant-north']);
    });
  });

  describe('roles', () => {
    it('should fold joined claim rows into roles', async () => {
      const { db, respond } = fakeDb();
      respond([
        { id: 'role-1', tenant_id: 'tenant-north', name: 'Cashier', claim_type: 'sales', claim_value: 'write' },
        { id: 'role-1', tenant_id: 'tenant-north', name: 'Cashier', claim_type: 'sales', claim_value: 'read' },
        { id: 'role-2', tenant_id: 'tenant-north', name: 'Viewer', claim_type: null, claim_value: null },
      ]);

      expect(await new PostgresRoleStorage(db).findByUser('user-001')).toEqual([
        {
          id: 'role-1',
          tenantId: 'tenant-north',
          name: 'Cashier',
          claims: [
            { claimType: 'sales', claimValue: 'write' },
            { claimType: 'sales', claimValue: 'read' },
          ],
        },
        { id: 'role-2', tenantId: 'tenant-north', name: 'Viewer', claims: [] },
      ]);
    });
  });

  describe('transaction', () => {
    it('should commit on one pooled connection', async () => {
      const pool = fakePool();
      const storage = createPostgresStorage(pool.source);

      const result = await storage.transaction(async (session) => {
        await session.passwordResets.deleteByUser('user-001');
        return 'done';
      });

      expect(result).toBe('done');
      expect(pool.statements()).toEqual([
        'BEGIN',
        'DELETE FROM password_reset_tokens WHERE user_id = $1',
        'COMMIT',
      ]);
      expect(pool.release).toHaveBeenCalledWith(false);
    });

    it('should roll back and rethrow when the callback fails', async () => {
      const pool = fakePool();
      const storage = createPostgresStorage(pool.source);

      await expect(
        storage.transaction(async () => {
          throw new Error('constraint violated');
        })
      ).rejects.toThrow('constraint violated');

      expect(pool.statements()).toEqual(['BEGIN', 'ROLLBACK']);
      expect(pool.release).toHaveBeenCalledWith(false);
    });

    it('should discard the connection when rollback fails', async () => {
      const pool = fakePool();
      pool.clientQuery.mockImplementation(async (text: string) => {
        if (text === 'ROLLBACK') {
          throw new Error('connection terminated');
        }
        return { rows: [], rowCount: 0 };
      });
      const storage = createPostgresStorage(pool.source);

      await expect(
        storage.transaction(async () => {
          throw new Error('constraint violated');
        })
      ).rejects.toThrow('constraint violated');

      expect(pool.release).toHaveBeenCalledWith(true);
    });

    it('should roll back when the signal aborts before commit', async () => {
      const pool = fakePool();
      const storage = createPostgresStorage(pool.source);
      const controller = new AbortController();

      await expect(
        storage.transaction(
          async () => {
            controller.abort();
          },
          { signal: controller.signal }
        )
      ).rejects.toThrow();

      expect(pool.statements()).toEqual(['BEGIN', 'ROLLBACK']);
    });

    it('should not connect for an already aborted signal', async () => {
      const pool = fakePool();
      const storage = createPostgresStorage(pool.source);

      await expect(
        storage.transaction(async () => 'never', { signal: AbortSignal.abort() })
      ).rejects.toThrow();

      expect(pool.connect).not.toHaveBeenCalled();
    });

    it('should end the pool on close', async () => {
      const pool = fakePool();

      await createPostgresStorage(pool.source).close();

      expect(pool.end).toHaveBeenCalledTimes(1);
    });
  });
});
