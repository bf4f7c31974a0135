import type { ApiFailure, ApiSuccess, AuthErrorCode, AuthUser } from '@pharmacy-auth/shared';
import type { IStorage } from '../storage/interfaces/index.js';
import type { User } from '../types/user.js';
import type {
  AuthResult,
  LoginSession,
  OperationContext,
  RegistrationResult,
  SessionTokens,
} from '../types/auth.js';
import type { PasswordHasher } from '../crypto/password.js';
import { ERROR_DESCRIPTIONS } from '../errors/error-codes.js';
import { isAbortError } from '../errors/auth-error.js';
import { createLogger, serializeError, type Logger } from '../logging/logger.js';
import type { TokenSigner } from './token-signer.js';
import type { RefreshTokenService } from './refresh-token-service.js';
import type { TokenBlacklistService } from './token-blacklist-service.js';
import { permissionService } from './permission-service.js';

export interface PasswordResetRequestedEvent {
  user: User;
  token: string;
  expiresAt: Date;
}

export interface AuthServiceOptions {
  storage: IStorage;
  passwordHasher: PasswordHasher;
  tokenSigner: TokenSigner;
  refreshTokens: RefreshTokenService;
  blacklist: TokenBlacklistService;
  security: {
    maxFailedLoginAttempts: number;
    lockoutMinutes: number;
    passwordResetTtlMinutes: number;
  };
  /**
   * Delivers the reset token (e-mail, SMS). Failures are logged, never
   * surfaced to the caller.
   */
  onPasswordResetRequested?: (event: PasswordResetRequestedEvent) => Promise<void> | void;
  now?: () => Date;
  logger?: Logger;
}

export interface LoginOptions {
  tenantId?: string;
}

export interface RegisterInput {
  tenantId: string;
  branchId?: string;
  firstName: string;
  lastName: string;
  email: string;
  phoneNumber?: string;
  userName: string;
  password: string;
  roleName?: string;
}

// Verified against when the e-mail is unknown, so the response takes as long
// as a real password check
const DUMMY_PASSWORD = 'not-a-real-password';

function success<T>(message: string, data: T): ApiSuccess<T> {
  return { success: true, message, data };
}

function failure(error: AuthErrorCode, message: string = ERROR_DESCRIPTIONS[error]): ApiFailure {
  return { success: false, error, message };
}

function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === '23505';
}

/**
 * Login, refresh, logout and password flows.
 *
 * This is the recovery boundary: credential and token problems come back as
 * failed results, persistence faults as `temporarily_unavailable` (or false
 * for the boolean operations) after being logged with the request id.
 */
export class AuthService {
  private readonly storage: IStorage;
  private readonly hasher: PasswordHasher;
  private readonly signer: TokenSigner;
  private readonly refreshTokens: RefreshTokenService;
  private readonly blacklist: TokenBlacklistService;
  private readonly security: AuthServiceOptions['security'];
  private readonly onPasswordResetRequested: AuthServiceOptions['onPasswordResetRequested'];
  private readonly now: () => Date;
  private readonly logger: Logger;
  private dummyHash: Promise<string> | null = null;

  constructor(options: AuthServiceOptions) {
    this.storage = options.storage;
    this.hasher = options.passwordHasher;
    this.signer = options.tokenSigner;
    this.refreshTokens = options.refreshTokens;
    this.blacklist = options.blacklist;
    this.security = options.security;
    this.onPasswordResetRequested = options.onPasswordResetRequested;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('auth-service');
  }

  async login(
    email: string,
    password: string,
    options: LoginOptions = {},
    ctx: OperationContext = {}
  ): Promise<AuthResult<LoginSession>> {
    return this.recover('login', ctx, async () => {
      ctx.signal?.throwIfAborted();

      const user = await this.storage.users.findByEmail(email, options.tenantId);
      if (!user || !user.isActive) {
        await this.hasher.verify(password, await this.getDummyHash());
        this.logger.info('Login failed', { requestId: ctx.requestId, reason: 'unknown_user' });
        return failure('invalid_credentials');
      }

      const now = this.now();
      if (user.lockoutEnd && user.lockoutEnd > now) {
        this.logger.info('Login rejected during lockout', {
          requestId: ctx.requestId,
          userId: user.id,
          tenantId: user.tenantId,
        });
        return failure('account_locked');
      }

      if (!(await this.hasher.verify(password, user.passwordHash))) {
        const lockoutEnd = new Date(now.getTime() + this.security.lockoutMinutes * 60 * 1000);
        const updated = await this.storage.users.recordLoginFailure(user.id, {
          now,
          maxFailedAttempts: this.security.maxFailedLoginAttempts,
          lockoutEnd,
        });

        if (updated?.lockoutEnd && updated.lockoutEnd > now) {
          this.logger.warn('Account locked after repeated failures', {
            requestId: ctx.requestId,
            userId: user.id,
            tenantId: user.tenantId,
            failedLoginAttempts: updated.failedLoginAttempts,
          });
        }
        return failure('invalid_credentials');
      }

      await this.storage.users.recordLoginSuccess(user.id, now);
      const session = await this.issueSession(user, ctx);

      this.logger.info('Login succeeded', {
        requestId: ctx.requestId,
        userId: user.id,
        tenantId: user.tenantId,
      });
      return success('Login successful', session);
    });
  }

  /**
   * Exchange an (expired) access token and its refresh token for a new pair.
   * A refresh token can be exchanged once; the loser of a concurrent
   * exchange gets `invalid_refresh_token`.
   */
  async refresh(
    accessToken: string,
    refreshToken: string,
    ctx: OperationContext = {}
  ): Promise<AuthResult<SessionTokens>> {
    return this.recover('refresh', ctx, async () => {
      ctx.signal?.throwIfAborted();

      const parsed = await this.signer.parseExpiredToken(accessToken);
      if (!parsed.valid) {
        this.logger.info('Refresh rejected', { requestId: ctx.requestId, reason: parsed.reason });
        return failure('invalid_token');
      }
      const { claims } = parsed;

      const record = await this.refreshTokens.findValid(refreshToken);
      if (!record || record.userId !== claims.sub || record.tenantId !== claims.tenant_id) {
        this.logger.info('Refresh rejected', {
          requestId: ctx.requestId,
          userId: claims.sub,
          reason: record ? 'subject_mismatch' : 'invalid_refresh_token',
        });
        return failure('invalid_refresh_token');
      }

      const user = await this.storage.users.findById(claims.sub);
      if (!user) {
        return failure('user_not_found');
      }
      if (!user.isActive) {
        return failure('user_inactive');
      }

      const { access } = await this.signAccess(user);
      const rotated = await this.refreshTokens.rotate(
        record,
        { jti: access.jti, expiresAt: access.expiresAt },
        ctx
      );
      if (!rotated) {
        return failure('invalid_refresh_token');
      }

      this.logger.info('Session refreshed', {
        requestId: ctx.requestId,
        userId: user.id,
        tenantId: user.tenantId,
        jti: access.jti,
      });
      return success('Token refreshed', {
        accessToken: access.token,
        refreshToken: rotated.value,
        expiresAt: access.expiresAt,
      });
    });
  }

  /**
   * Revoke one refresh token. Unknown and already revoked tokens count as
   * logged out; false means the revocation could not be recorded.
   */
  async logout(refreshToken: string, ctx: OperationContext = {}): Promise<boolean> {
    return this.recoverBoolean('logout', ctx, async () => {
      await this.refreshTokens.revoke(refreshToken, ctx);
      return true;
    });
  }

  /**
   * Revoke every session of a user and blacklist all of their live tokens
   */
  async logoutEverywhere(userId: string, ctx: OperationContext = {}): Promise<boolean> {
    return this.recoverBoolean('logoutEverywhere', ctx, async () => {
      await this.refreshTokens.revokeAllForUser(userId, ctx);
      await this.blacklist.blacklistAllForUser(userId, 'revoke_all');
      return true;
    });
  }

  /**
   * Existing sessions stay valid; callers wanting a forced re-login follow up
   * with `logoutEverywhere`.
   */
  async changePassword(
    userId: string,
    currentPassword: string,
    newPassword: string,
    ctx: OperationContext = {}
  ): Promise<boolean> {
    return this.recoverBoolean('changePassword', ctx, async () => {
      ctx.signal?.throwIfAborted();

      const user = await this.storage.users.findById(userId);
      if (!user || !user.isActive) {
        return false;
      }

      if (!(await this.hasher.verify(currentPassword, user.passwordHash))) {
        this.logger.info('Password change rejected', {
          requestId: ctx.requestId,
          userId,
          reason: 'wrong_password',
        });
        return false;
      }

      if (!this.hasher.isValidPassword(newPassword)) {
        return false;
      }

      const passwordHash = await this.hasher.hash(newPassword);
      ctx.signal?.throwIfAborted();
      await this.storage.users.updatePassword(userId, passwordHash, this.now());

      this.logger.info('Password changed', { requestId: ctx.requestId, userId });
      return true;
    });
  }

  /**
   * Always true, whether or not the e-mail belongs to anyone
   */
  async forgotPassword(email: string, ctx: OperationContext = {}): Promise<boolean> {
    try {
      ctx.signal?.throwIfAborted();

      const user = await this.storage.users.findByEmail(email);
      if (!user || !user.isActive) {
        return true;
      }

      const now = this.now();
      const expiresAt = new Date(now.getTime() + this.security.passwordResetTtlMinutes * 60 * 1000);

      const { value } = await this.storage.transaction(
        async (session) => {
          await session.passwordResets.deleteByUser(user.id);
          return session.passwordResets.create(
            { tenantId: user.tenantId, userId: user.id, expiresAt },
            now
          );
        },
        { signal: ctx.signal }
      );

      this.logger.info('Password reset requested', {
        requestId: ctx.requestId,
        userId: user.id,
        tenantId: user.tenantId,
      });

      if (this.onPasswordResetRequested) {
        await this.onPasswordResetRequested({ user, token: value, expiresAt });
      }
    } catch (error) {
      this.logger.error('Password reset request failed', {
        requestId: ctx.requestId,
        error: serializeError(error),
      });
    }
    return true;
  }

  /**
   * Set a new password with a reset token. The token is consumed in the same
   * transaction as the password update.
   */
  async resetPassword(
    token: string,
    newPassword: string,
    ctx: OperationContext = {}
  ): Promise<boolean> {
    return this.recoverBoolean('resetPassword', ctx, async () => {
      ctx.signal?.throwIfAborted();

      if (!this.hasher.isValidPassword(newPassword)) {
        return false;
      }

      const reset = await this.storage.passwordResets.findByValue(token);
      if (!reset) {
        return false;
      }
      if (reset.expiresAt <= this.now()) {
        await this.storage.passwordResets.consume(reset.id);
        return false;
      }

      const passwordHash = await this.hasher.hash(newPassword);

      const updated = await this.storage.transaction(
        async (session) => {
          if (!(await session.passwordResets.consume(reset.id))) {
            return false;
          }
          const user = await session.users.updatePassword(reset.userId, passwordHash, this.now());
          if (!user) {
            throw new Error(`Reset token ${reset.id} references missing user ${reset.userId}`);
          }
          return true;
        },
        { signal: ctx.signal }
      );

      if (updated) {
        this.logger.info('Password reset completed', {
          requestId: ctx.requestId,
          userId: reset.userId,
          tenantId: reset.tenantId,
        });
      }
      return updated;
    });
  }

  async register(
    input: RegisterInput,
    ctx: OperationContext = {}
  ): Promise<AuthResult<RegistrationResult>> {
    return this.recover('register', ctx, async () => {
      ctx.signal?.throwIfAborted();

      if (!this.hasher.isValidPassword(input.password)) {
        return failure(
          'registration_failed',
          'Password must be at least 8 characters and contain uppercase, lowercase, digit and symbol characters'
        );
      }

      const tenant = await this.storage.tenants.findById(input.tenantId);
      if (!tenant || !tenant.isActive) {
        return failure('registration_failed', 'Tenant not found or inactive');
      }

      if (await this.storage.users.findByEmail(input.email)) {
        return failure('registration_failed', 'Email is already registered');
      }
      if (await this.storage.users.findByUserName(input.userName)) {
        return failure('registration_failed', 'User name is already taken');
      }

      const roleIds: string[] = [];
      if (input.roleName) {
        const role = await this.storage.roles.findByName(input.tenantId, input.roleName);
        if (!role) {
          return failure('registration_failed', `Role "${input.roleName}" does not exist`);
        }
        roleIds.push(role.id);
      }

      const passwordHash = await this.hasher.hash(input.password);

      let user: User;
      try {
        user = await this.storage.transaction(
          (session) =>
            session.users.create({
              tenantId: input.tenantId,
              branchId: input.branchId,
              email: input.email,
              userName: input.userName,
              firstName: input.firstName,
              lastName: input.lastName,
              phoneNumber: input.phoneNumber,
              passwordHash,
              roleIds,
            }),
          { signal: ctx.signal }
        );
      } catch (error) {
        // Lost a race with a concurrent registration of the same identity
        if (isUniqueViolation(error)) {
          return failure('registration_failed', 'Email or user name is already registered');
        }
        throw error;
      }

      this.logger.info('User registered', {
        requestId: ctx.requestId,
        userId: user.id,
        tenantId: user.tenantId,
      });
      return success('Registration successful', { userId: user.id, email: user.email });
    });
  }

  private async issueSession(user: User, ctx: OperationContext): Promise<LoginSession> {
    const { access, roles, permissions } = await this.signAccess(user);

    const { value } = await this.refreshTokens.create(
      user.id,
      user.tenantId,
      { jti: access.jti, expiresAt: access.expiresAt },
      ctx
    );

    const projection: AuthUser = {
      id: user.id,
      email: user.email,
      firstName: user.firstName,
      lastName: user.lastName,
      tenantId: user.tenantId,
      roles,
      permissions,
    };
    if (user.branchId) {
      projection.branchId = user.branchId;
    }

    return {
      accessToken: access.token,
      refreshToken: value,
      expiresAt: access.expiresAt,
      user: projection,
    };
  }

  /**
   * Sign an access token carrying the user's current roles and permissions
   */
  private async signAccess(user: User) {
    const assigned = await this.storage.roles.findByUser(user.id);
    const roles = assigned.map((role) => role.name);
    const permissions = permissionService.flattenRolePermissions(assigned);

    const access = await this.signer.issueAccessToken({
      user,
      roles,
      permissions,
      tenantId: user.tenantId,
      branchId: user.branchId,
    });
    return { access, roles, permissions };
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = this.hasher.hash(DUMMY_PASSWORD);
    }
    return this.dummyHash;
  }

  private async recover<T>(
    operation: string,
    ctx: OperationContext,
    fn: () => Promise<AuthResult<T>>
  ): Promise<AuthResult<T>> {
    try {
      return await fn();
    } catch (error) {
      if (ctx.signal?.aborted || isAbortError(error)) {
        this.logger.info('Operation aborted', { requestId: ctx.requestId, operation });
        return failure('request_aborted');
      }

      this.logger.error('Operation failed', {
        requestId: ctx.requestId,
        operation,
        error: serializeError(error),
      });
      return failure('temporarily_unavailable');
    }
  }

  private async recoverBoolean(
    operation: string,
    ctx: OperationContext,
    fn: () => Promise<boolean>
  ): Promise<boolean> {
    const result = await this.recover(operation, ctx, async () => success('', await fn()));
    return result.success && result.data;
  }
}
