import type { IStorage } from '../storage/interfaces/index.js';
import type { KeyRing } from '../crypto/keys.js';
import { PasswordHasher } from '../crypto/password.js';
import type { Config } from '../config/index.js';
import { TokenSigner } from './token-signer.js';
import { TokenBlacklistService } from './token-blacklist-service.js';
import { RefreshTokenService } from './refresh-token-service.js';
import { AuthService, type PasswordResetRequestedEvent } from './auth-service.js';

export { TokenSigner } from './token-signer.js';
export { TokenBlacklistService } from './token-blacklist-service.js';
export { RefreshTokenService } from './refresh-token-service.js';
export { AuthService } from './auth-service.js';
export { PermissionService, permissionService } from './permission-service.js';
export { startCleanupJob, type CleanupJob } from './cleanup-job.js';
export type { PasswordResetRequestedEvent, RegisterInput, LoginOptions } from './auth-service.js';

export interface AuthServices {
  passwordHasher: PasswordHasher;
  tokenSigner: TokenSigner;
  blacklist: TokenBlacklistService;
  refreshTokens: RefreshTokenService;
  authService: AuthService;
}

export interface CreateAuthServicesOptions {
  storage: IStorage;
  keyRing: KeyRing;
  jwt: Config['jwt'];
  security: Config['security'];
  refreshTokenCacheTtlMs: number;
  onPasswordResetRequested?: (event: PasswordResetRequestedEvent) => Promise<void> | void;
  now?: () => Date;
}

/**
 * Wire the services around one storage and key ring
 */
export function createAuthServices(options: CreateAuthServicesOptions): AuthServices {
  const { storage, keyRing, jwt, security, now } = options;

  const passwordHasher = new PasswordHasher(security.pbkdf2Iterations);
  const tokenSigner = new TokenSigner({
    keyRing,
    issuer: jwt.issuer,
    audience: jwt.audience,
    accessTokenTtlMinutes: jwt.accessTokenTtlMinutes,
    clockToleranceSeconds: jwt.clockToleranceSeconds,
    now,
  });
  const blacklist = new TokenBlacklistService({
    storage,
    defaultTtlSeconds: jwt.accessTokenTtlMinutes * 60,
    now,
  });
  const refreshTokens = new RefreshTokenService({
    storage,
    blacklist,
    refreshTokenTtlHours: jwt.refreshTokenTtlHours,
    cacheTtlMs: options.refreshTokenCacheTtlMs,
    now,
  });
  const authService = new AuthService({
    storage,
    passwordHasher,
    tokenSigner,
    refreshTokens,
    blacklist,
    security,
    onPasswordResetRequested: options.onPasswordResetRequested,
    now,
  });

  return { passwordHasher, tokenSigner, blacklist, refreshTokens, authService };
}
