import { createLogger, serializeError, type Logger } from '../logging/logger.js';
import type { IPasswordResetStorage } from '../storage/interfaces/token-storage.js';
import type { TokenBlacklistService } from './token-blacklist-service.js';
import type { RefreshTokenService } from './refresh-token-service.js';

export interface CleanupJobOptions {
  blacklist: TokenBlacklistService;
  refreshTokens: RefreshTokenService;
  passwordResets: IPasswordResetStorage;
  intervalMs: number;
  retentionDays: number;
  now?: () => Date;
  logger?: Logger;
}

export interface CleanupJob {
  /**
   * Run one sweep now. Resolves even when a step fails.
   */
  runOnce(): Promise<void>;
  stop(): void;
}

/**
 * Periodically purge expired blacklist entries, expired password reset
 * tokens and refresh tokens past their retention window
 */
export function startCleanupJob(options: CleanupJobOptions): CleanupJob {
  const logger = options.logger ?? createLogger('cleanup-job');
  const now = options.now ?? (() => new Date());
  let running = false;

  const runOnce = async (): Promise<void> => {
    // Skip if the previous sweep is still going
    if (running) return;
    running = true;
    try {
      await options.blacklist.cleanupExpired();
      await options.refreshTokens.deleteExpired(options.retentionDays);

      const resets = await options.passwordResets.deleteExpired(now());
      if (resets > 0) {
        logger.info('Deleted expired password reset tokens', { deleted: resets });
      }
    } catch (error) {
      logger.error('Cleanup sweep failed', { error: serializeError(error) });
    } finally {
      running = false;
    }
  };

  const interval = setInterval(() => {
    void runOnce();
  }, options.intervalMs);

  // Don't prevent process from exiting
  if (interval.unref) {
    interval.unref();
  }

  return {
    runOnce,
    stop: () => clearInterval(interval),
  };
}
