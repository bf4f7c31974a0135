import type { IStorage, StorageSession, TransactionOptions } from '../interfaces/index.js';
import { createLogger, serializeError } from '../../logging/logger.js';
import type { ConnectionSource, Queryable } from './client.js';
import { PostgresTenantStorage } from './repositories/tenant-repository.js';
import { PostgresUserStorage, PostgresRoleStorage } from './repositories/user-repository.js';
import {
  PostgresRefreshTokenStorage,
  PostgresTokenBlacklistStorage,
  PostgresPasswordResetStorage,
} from './repositories/token-repository.js';

export { createPool, fromPool } from './client.js';
export type { Queryable, PooledConnection, ConnectionSource } from './client.js';
export { PostgresTenantStorage } from './repositories/tenant-repository.js';
export { PostgresUserStorage, PostgresRoleStorage } from './repositories/user-repository.js';
export {
  PostgresRefreshTokenStorage,
  PostgresTokenBlacklistStorage,
  PostgresPasswordResetStorage,
} from './repositories/token-repository.js';

function createSession(db: Queryable): StorageSession {
  return {
    tenants: new PostgresTenantStorage(db),
    users: new PostgresUserStorage(db),
    roles: new PostgresRoleStorage(db),
    refreshTokens: new PostgresRefreshTokenStorage(db),
    blacklist: new PostgresTokenBlacklistStorage(db),
    passwordResets: new PostgresPasswordResetStorage(db),
  };
}

/**
 * Create a complete PostgreSQL storage implementation
 */
export function createPostgresStorage(source: ConnectionSource): IStorage {
  const logger = createLogger('storage:postgres');

  return {
    ...createSession(source),

    async transaction<T>(
      fn: (session: StorageSession) => Promise<T>,
      options: TransactionOptions = {}
    ): Promise<T> {
      options.signal?.throwIfAborted();

      const client = await source.connect();
      let destroy = false;
      try {
        await client.query('BEGIN');
        const result = await fn(createSession(client));
        options.signal?.throwIfAborted();
        await client.query('COMMIT');
        return result;
      } catch (error) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          // The connection state is unknown; do not hand it back to the pool
          destroy = true;
          logger.error('Rollback failed', {
            error: serializeError(rollbackError),
            originalError: serializeError(error),
          });
        }
        throw error;
      } finally {
        client.release(destroy);
      }
    },

    close: () => source.end(),
  };
}
