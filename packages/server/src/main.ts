import { serve } from '@hono/node-server';
import { createAuthServer } from './app.js';
import { createAuthServices, startCleanupJob } from './services/index.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { createPostgresStorage, fromPool, createPool } from './storage/postgres/index.js';
import type { IStorage } from './storage/interfaces/index.js';
import { getConfig } from './config/index.js';
import { loadKeyRing } from './crypto/keys.js';
import { createLogger, serializeError } from './logging/logger.js';

const logger = createLogger('server');

async function main(): Promise<void> {
  // Load configuration
  const config = getConfig();
  const keyRing = await loadKeyRing(config.jwt);

  const storage: IStorage = config.database.url
    ? createPostgresStorage(fromPool(createPool(config.database.url)))
    : createMemoryStorage();

  const services = createAuthServices({
    storage,
    keyRing,
    jwt: config.jwt,
    security: config.security,
    refreshTokenCacheTtlMs: config.maintenance.refreshTokenCacheTtlMs,
    onPasswordResetRequested: ({ user, expiresAt }) => {
      // Delivery is wired by the host; the token value is never logged
      logger.info('Password reset requested', { userId: user.id, tenantId: user.tenantId, expiresAt });
    },
  });

  const cleanup = startCleanupJob({
    blacklist: services.blacklist,
    refreshTokens: services.refreshTokens,
    passwordResets: storage.passwordResets,
    intervalMs: config.maintenance.cleanupIntervalMs,
    retentionDays: config.maintenance.refreshTokenRetentionDays,
  });

  const app = createAuthServer({
    services,
    keyRing,
    rateLimit: config.rateLimit,
    corsOrigins: config.cors.origins,
  });

  const server = serve(
    {
      fetch: app.fetch,
      port: config.server.port,
      hostname: config.server.host,
    },
    (info) => {
      logger.info('Authentication server listening', {
        address: info.address,
        port: info.port,
        kid: keyRing.current.kid,
        retiredKeys: keyRing.verificationKeys.length - 1,
      });
      if (!config.database.url) {
        logger.warn('Running with in-memory storage. Data will be lost on restart.');
      }
    }
  );

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    cleanup.stop();
    server.close(() => {
      storage.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Failed to close storage', { error: serializeError(error) });
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.error('Startup failed', { error: serializeError(error) });
  process.exit(1);
});
