export * from './tenant-storage.js';
export * from './user-storage.js';
export * from './token-storage.js';

import type { ITenantStorage } from './tenant-storage.js';
import type { IUserStorage, IRoleStorage } from './user-storage.js';
import type {
  IRefreshTokenStorage,
  ITokenBlacklistStorage,
  IPasswordResetStorage,
} from './token-storage.js';

/**
 * Repositories available inside and outside a transaction
 */
export interface StorageSession {
  tenants: ITenantStorage;
  users: IUserStorage;
  roles: IRoleStorage;
  refreshTokens: IRefreshTokenStorage;
  blacklist: ITokenBlacklistStorage;
  passwordResets: IPasswordResetStorage;
}

export interface TransactionOptions {
  /**
   * Aborting before commit rolls the transaction back
   */
  signal?: AbortSignal;
}

/**
 * Complete storage interface for the auth core
 */
export interface IStorage extends StorageSession {
  /**
   * Run `fn` atomically. Repositories on the passed session take part in the
   * transaction; the top-level ones do not.
   */
  transaction<T>(fn: (session: StorageSession) => Promise<T>, options?: TransactionOptions): Promise<T>;

  /**
   * Release connections
   */
  close(): Promise<void>;
}
