import type { IStorage, StorageSession, TransactionOptions } from '../interfaces/index.js';
import { MemoryTenantStorage } from './tenant-storage.js';
import { MemoryUserStorage, MemoryRoleStorage } from './user-storage.js';
import {
  MemoryRefreshTokenStorage,
  MemoryTokenBlacklistStorage,
  MemoryPasswordResetStorage,
} from './token-storage.js';
import { Mutex } from './snapshot.js';

export { MemoryTenantStorage } from './tenant-storage.js';
export { MemoryUserStorage, MemoryRoleStorage } from './user-storage.js';
export {
  MemoryRefreshTokenStorage,
  MemoryTokenBlacklistStorage,
  MemoryPasswordResetStorage,
} from './token-storage.js';

export interface MemoryStorage extends IStorage {
  tenants: MemoryTenantStorage;
  users: MemoryUserStorage;
  roles: MemoryRoleStorage;
  refreshTokens: MemoryRefreshTokenStorage;
  blacklist: MemoryTokenBlacklistStorage;
  passwordResets: MemoryPasswordResetStorage;
}

/**
 * Create a complete in-memory storage implementation.
 *
 * One lock guards every repository call. Transactions hold it from BEGIN to
 * COMMIT and roll every repository back to its state at BEGIN when `fn`
 * throws or the signal aborts before commit.
 */
export function createMemoryStorage(): MemoryStorage {
  const mutex = new Mutex();
  const roles = new MemoryRoleStorage(mutex);
  const session = {
    tenants: new MemoryTenantStorage(mutex),
    users: new MemoryUserStorage(mutex, roles),
    roles,
    refreshTokens: new MemoryRefreshTokenStorage(mutex),
    blacklist: new MemoryTokenBlacklistStorage(mutex),
    passwordResets: new MemoryPasswordResetStorage(mutex),
  };

  return {
    ...session,

    transaction<T>(
      fn: (tx: StorageSession) => Promise<T>,
      options: TransactionOptions = {}
    ): Promise<T> {
      return mutex.run(async () => {
        options.signal?.throwIfAborted();

        const restores = [
          session.tenants.snapshot(),
          session.users.snapshot(),
          session.roles.snapshot(),
          session.refreshTokens.snapshot(),
          session.blacklist.snapshot(),
          session.passwordResets.snapshot(),
        ];

        try {
          const result = await fn(session);
          options.signal?.throwIfAborted();
          return result;
        } catch (error) {
          for (const restore of restores) {
            restore();
          }
          throw error;
        }
      });
    },

    async close(): Promise<void> {
      // Nothing to release
    },
  };
}
