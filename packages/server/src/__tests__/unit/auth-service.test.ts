import { describe, it, expect, beforeEach, vi } from 'vitest';
import * as jose from 'jose';
import {
  setupTestContext,
  createTestUser,
  expectSuccess,
  TEST_PASSWORD,
  TEST_TENANT_ID,
  TEST_BRANCH_ID,
  MINUTE,
  type TestContext,
} from '../test-setup.js';
import type { RegisterInput } from '../../services/index.js';

const NEW_PASSWORD = 'N3w!Passw0rd';

describe('AuthService', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await setupTestContext();
  });

  const login = (password = TEST_PASSWORD, email = 'amina.diallo@example.com') =>
    ctx.services.authService.login(email, password);

  describe('login', () => {
    it('should issue a session with the user projection', async () => {
      const result = await login();

      expect(result.success).toBe(true);
      const session = expectSuccess(result);
      expect(session.expiresAt).toEqual(new Date('2026-01-15T08:15:00.000Z'));
      expect(session.user).toEqual({
        id: ctx.user.id,
        email: 'amina.diallo@example.com',
        firstName: 'Amina',
        lastName: 'Diallo',
        tenantId: TEST_TENANT_ID,
        branchId: TEST_BRANCH_ID,
        roles: ['Pharmacist'],
        permissions: ['inventory:read', 'prescriptions:dispense'],
      });

      const claims = jose.decodeJwt(session.accessToken);
      expect(claims.sub).toBe(ctx.user.id);
      expect(claims['tenant_id']).toBe(TEST_TENANT_ID);
      expect(await ctx.services.refreshTokens.validate(session.refreshToken)).toBe(true);
    });

    it('should record the successful login', async () => {
      await login();

      const user = await ctx.storage.users.findById(ctx.user.id);
      expect(user?.lastLoginAt).toEqual(new Date('2026-01-15T08:00:00.000Z'));
      expect(user?.failedLoginAttempts).toBe(0);
    });

    it('should match the email case-insensitively', async () => {
      expect((await login(TEST_PASSWORD, 'AMINA.DIALLO@example.com')).success).toBe(true);
    });

    it('should reject a wrong password and count the failure', async () => {
      const result = await login('Wr0ng!pass');

      expect(result).toEqual({
        success: false,
        error: 'invalid_credentials',
        message: 'Invalid email or password',
      });
      expect((await ctx.storage.users.findById(ctx.user.id))?.failedLoginAttempts).toBe(1);
    });

    it('should answer an unknown email exactly like a wrong password', async () => {
      const verify = vi.spyOn(ctx.services.passwordHasher, 'verify');

      const result = await login(TEST_PASSWORD, 'nobody@example.com');

      expect(result).toEqual({
        success: false,
        error: 'invalid_credentials',
        message: 'Invalid email or password',
      });
      expect(verify).toHaveBeenCalledTimes(1);
    });

    it('should treat an inactive user as unknown', async () => {
      await ctx.storage.users.setActive(ctx.user.id, false);

      const result = await login();

      expect(result.success).toBe(false);
      expect(result.success ? undefined : result.error).toBe('invalid_credentials');
    });

    it('should restrict the lookup to the requested tenant', async () => {
      const result = await ctx.services.authService.login('amina.diallo@example.com', TEST_PASSWORD, {
        tenantId: 'tenant-south',
      });

      expect(result.success ? undefined : result.error).toBe('invalid_credentials');
    });

    it('should lock the account after five failures', async () => {
      for (let i = 0; i < 5; i++) {
        await login('Wr0ng!pass');
      }

      const user = await ctx.storage.users.findById(ctx.user.id);
      expect(user?.failedLoginAttempts).toBe(5);
      expect(user?.lockoutEnd).toEqual(new Date('2026-01-15T08:15:00.000Z'));

      expect(await login()).toEqual({
        success: false,
        error: 'account_locked',
        message: 'Account is temporarily locked. Please try again later.',
      });
    });

    it('should let the user back in once the lockout has elapsed', async () => {
      for (let i = 0; i < 5; i++) {
        await login('Wr0ng!pass');
      }
      ctx.clock.advance(15 * MINUTE);

      expect((await login()).success).toBe(true);
      const user = await ctx.storage.users.findById(ctx.user.id);
      expect(user?.failedLoginAttempts).toBe(0);
      expect(user?.lockoutEnd).toBeUndefined();
    });

    it('should restart the failure count after an elapsed lockout', async () => {
      for (let i = 0; i < 5; i++) {
        await login('Wr0ng!pass');
      }
      ctx.clock.advance(16 * MINUTE);

      await login('Wr0ng!pass');

      const user = await ctx.storage.users.findById(ctx.user.id);
      expect(user?.failedLoginAttempts).toBe(1);
      expect(user?.lockoutEnd).toBeUndefined();
    });

    it('should end the previous session of the user', async () => {
      const first = expectSuccess(await login());
      const second = expectSuccess(await login());

      expect(await ctx.services.refreshTokens.validate(first.refreshToken)).toBe(false);
      expect(await ctx.services.blacklist.isBlacklisted(first.accessToken)).toBe(true);
      expect(await ctx.services.refreshTokens.validate(second.refreshToken)).toBe(true);
      expect(await ctx.services.blacklist.isBlacklisted(second.accessToken)).toBe(false);
    });

    it('should report storage failures as temporarily unavailable', async () => {
      vi.spyOn(ctx.storage.users, 'findByEmail').mockRejectedValueOnce(new Error('connection refused'));

      expect(await login()).toEqual({
        success: false,
        error: 'temporarily_unavailable',
        message: 'Authentication is temporarily unavailable',
      });
    });

    it('should report an aborted request', async () => {
      const result = await ctx.services.authService.login(
        'amina.diallo@example.com',
        TEST_PASSWORD,
        {},
        { signal: AbortSignal.abort() }
      );

      expect(result.success ? undefined : result.error).toBe('request_aborted');
    });
  });

  describe('refresh', () => {
    it('should exchange an expired access token and its refresh token', async () => {
      const session = expectSuccess(await login());
      ctx.clock.advance(20 * MINUTE);

      const result = await ctx.services.authService.refresh(session.accessToken, session.refreshToken);

      expect(result.success ? result.message : result.error).toBe('Token refreshed');
      const tokens = expectSuccess(result);
      expect(tokens.expiresAt).toEqual(new Date('2026-01-15T08:35:00.000Z'));
      expect(tokens.refreshToken).not.toBe(session.refreshToken);
      expect((await ctx.services.tokenSigner.verifyAccessToken(tokens.accessToken)).valid).toBe(true);
    });

    it('should blacklist the previous access token', async () => {
      const session = expectSuccess(await login());

      expectSuccess(await ctx.services.authService.refresh(session.accessToken, session.refreshToken));

      expect(await ctx.services.blacklist.isBlacklisted(session.accessToken)).toBe(true);
    });

    it('should refuse a second exchange of the same refresh token', async () => {
      const session = expectSuccess(await login());
      expectSuccess(await ctx.services.authService.refresh(session.accessToken, session.refreshToken));

      expect(await ctx.services.authService.refresh(session.accessToken, session.refreshToken)).toEqual({
        success: false,
        error: 'invalid_refresh_token',
        message: 'Your session has expired. Please sign in again.',
      });
    });

    it('should let exactly one of two concurrent exchanges win', async () => {
      const session = expectSuccess(await login());

      const results = await Promise.all([
        ctx.services.authService.refresh(session.accessToken, session.refreshToken),
        ctx.services.authService.refresh(session.accessToken, session.refreshToken),
      ]);

      expect(results.filter((result) => result.success)).toHaveLength(1);
      expect(results.filter((result) => !result.success && result.error === 'invalid_refresh_token')).toHaveLength(1);
    });

    it('should reject a refresh token belonging to someone else', async () => {
      const mine = expectSuccess(await login());
      await createTestUser(ctx, { email: 'kwame.mensah@example.com', userName: 'kmensah' });
      const theirs = expectSuccess(await login(TEST_PASSWORD, 'kwame.mensah@example.com'));

      const result = await ctx.services.authService.refresh(mine.accessToken, theirs.refreshToken);

      expect(result.success ? undefined : result.error).toBe('invalid_refresh_token');
      expect(await ctx.services.refreshTokens.validate(theirs.refreshToken)).toBe(true);
    });

    it('should reject an access token that does not verify', async () => {
      const session = expectSuccess(await login());

      const result = await ctx.services.authService.refresh('not.a.jwt', session.refreshToken);

      expect(result.success ? undefined : result.error).toBe('invalid_token');
    });

    it('should reject a refresh for a deactivated user', async () => {
      const session = expectSuccess(await login());
      await ctx.storage.users.setActive(ctx.user.id, false);

      const result = await ctx.services.authService.refresh(session.accessToken, session.refreshToken);

      expect(result).toEqual({ success: false, error: 'user_inactive', message: 'User account is disabled' });
    });

    it('should reject a refresh token past its lifetime', async () => {
      const session = expectSuccess(await login());
      ctx.clock.advance(168 * 60 * MINUTE);

      const result = await ctx.services.authService.refresh(session.accessToken, session.refreshToken);

      expect(result.success ? undefined : result.error).toBe('invalid_refresh_token');
    });
  });

  describe('logout', () => {
    it('should revoke the session and blacklist its access token', async () => {
      const session = expectSuccess(await login());

      expect(await ctx.services.authService.logout(session.refreshToken)).toBe(true);

      expect(await ctx.services.refreshTokens.validate(session.refreshToken)).toBe(false);
      expect(await ctx.services.blacklist.isBlacklisted(session.accessToken)).toBe(true);
      const result = await ctx.services.authService.refresh(session.accessToken, session.refreshToken);
      expect(result.success ? undefined : result.error).toBe('invalid_refresh_token');
    });

    it('should treat unknown tokens as logged out', async () => {
      expect(await ctx.services.authService.logout('unknown-value')).toBe(true);
    });

    it('should return false when the revocation cannot be stored', async () => {
      const session = expectSuccess(await login());
      vi.spyOn(ctx.storage, 'transaction').mockRejectedValueOnce(new Error('connection refused'));

      expect(await ctx.services.authService.logout(session.refreshToken)).toBe(false);
    });
  });

  describe('logoutEverywhere', () => {
    it('should revoke and blacklist every live token of the user', async () => {
      const session = expectSuccess(await login());

      expect(await ctx.services.authService.logoutEverywhere(ctx.user.id)).toBe(true);

      expect(await ctx.services.blacklist.isBlacklisted(session.accessToken)).toBe(true);
      expect(await ctx.services.blacklist.isRefreshTokenBlacklisted(session.refreshToken)).toBe(true);
      expect(await ctx.services.refreshTokens.validate(session.refreshToken)).toBe(false);
    });
  });

  describe('changePassword', () => {
    it('should change the password after verifying the current one', async () => {
      expect(await ctx.services.authService.changePassword(ctx.user.id, TEST_PASSWORD, NEW_PASSWORD)).toBe(true);

      expect((await login()).success).toBe(false);
      expect((await login(NEW_PASSWORD)).success).toBe(true);
    });

    it('should reject a wrong current password', async () => {
      expect(await ctx.services.authService.changePassword(ctx.user.id, 'Wr0ng!pass', NEW_PASSWORD)).toBe(false);
      expect((await login()).success).toBe(true);
    });

    it('should reject a new password that fails the policy', async () => {
      expect(await ctx.services.authService.changePassword(ctx.user.id, TEST_PASSWORD, 'weakpass')).toBe(false);
    });

    it('should reject unknown users', async () => {
      expect(await ctx.services.authService.changePassword('missing', TEST_PASSWORD, NEW_PASSWORD)).toBe(false);
    });
  });

  describe('forgotPassword and resetPassword', () => {
    it('should always succeed without revealing unknown emails', async () => {
      expect(await ctx.services.authService.forgotPassword('nobody@example.com')).toBe(true);
      expect(ctx.resetRequests).toHaveLength(0);
    });

    it('should hand a reset token to the delivery hook', async () => {
      expect(await ctx.services.authService.forgotPassword('amina.diallo@example.com')).toBe(true);

      expect(ctx.resetRequests).toHaveLength(1);
      expect(ctx.resetRequests[0]?.user.id).toBe(ctx.user.id);
      expect(ctx.resetRequests[0]?.expiresAt).toEqual(new Date('2026-01-15T09:00:00.000Z'));
    });

    it('should reset the password once per token', async () => {
      await ctx.services.authService.forgotPassword('amina.diallo@example.com');
      const token = ctx.resetRequests[0]?.token ?? '';

      expect(await ctx.services.authService.resetPassword(token, NEW_PASSWORD)).toBe(true);
      expect(await ctx.services.authService.resetPassword(token, 'An0ther!Pass')).toBe(false);
      expect((await login(NEW_PASSWORD)).success).toBe(true);
    });

    it('should invalidate older reset tokens when a new one is requested', async () => {
      await ctx.services.authService.forgotPassword('amina.diallo@example.com');
      await ctx.services.authService.forgotPassword('amina.diallo@example.com');
      const [first, second] = ctx.resetRequests;

      expect(await ctx.services.authService.resetPassword(first?.token ?? '', NEW_PASSWORD)).toBe(false);
      expect(await ctx.services.authService.resetPassword(second?.token ?? '', NEW_PASSWORD)).toBe(true);
    });

    it('should reject and discard an expired reset token', async () => {
      await ctx.services.authService.forgotPassword('amina.diallo@example.com');
      const token = ctx.resetRequests[0]?.token ?? '';
      ctx.clock.advance(60 * MINUTE);

      expect(await ctx.services.authService.resetPassword(token, NEW_PASSWORD)).toBe(false);
      expect(await ctx.storage.passwordResets.findByValue(token)).toBeNull();
    });

    it('should keep the token usable when the new password fails the policy', async () => {
      await ctx.services.authService.forgotPassword('amina.diallo@example.com');
      const token = ctx.resetRequests[0]?.token ?? '';

      expect(await ctx.services.authService.resetPassword(token, 'weakpass')).toBe(false);
      expect(await ctx.services.authService.resetPassword(token, NEW_PASSWORD)).toBe(true);
    });

    it('should still succeed when delivery fails', async () => {
      const failing = await setupTestContext({
        onPasswordResetRequested: () => {
          throw new Error('mail relay down');
        },
      });

      expect(await failing.services.authService.forgotPassword('amina.diallo@example.com')).toBe(true);
    });
  });

  describe('register', () => {
    const input: RegisterInput = {
      tenantId: TEST_TENANT_ID,
      branchId: TEST_BRANCH_ID,
      firstName: 'Kwame',
      lastName: 'Mensah',
      email: 'kwame.mensah@example.com',
      userName: 'kmensah',
      password: NEW_PASSWORD,
      roleName: 'pharmacist',
    };

    it('should create a user who can log in with the assigned role', async () => {
      const result = await ctx.services.authService.register(input);

      expect(result.success ? result.message : result.error).toBe('Registration successful');
      expect(expectSuccess(result).email).toBe('kwame.mensah@example.com');

      const session = expectSuccess(await login(NEW_PASSWORD, 'kwame.mensah@example.com'));
      expect(session.user.roles).toEqual(['Pharmacist']);
    });

    it.each<[string, Partial<RegisterInput>, string]>([
      [
        'a weak password',
        { password: 'weakpass' },
        'Password must be at least 8 characters and contain uppercase, lowercase, digit and symbol characters',
      ],
      ['an unknown tenant', { tenantId: 'tenant-south' }, 'Tenant not found or inactive'],
      ['a taken email', { email: 'AMINA.DIALLO@example.com' }, 'Email is already registered'],
      ['a taken user name', { userName: 'ADiallo' }, 'User name is already taken'],
      ['an unknown role', { roleName: 'Courier' }, 'Role "Courier" does not exist'],
    ])('should refuse %s', async (_label, overrides, message) => {
      expect(await ctx.services.authService.register({ ...input, ...overrides })).toEqual({
        success: false,
        error: 'registration_failed',
        message,
      });
    });

    it('should refuse an inactive tenant', async () => {
      await ctx.storage.tenants.create({ id: 'tenant-closed', name: 'Closed Branches', isActive: false });

      const result = await ctx.services.authService.register({ ...input, tenantId: 'tenant-closed' });

      expect(result.success ? undefined : result.message).toBe('Tenant not found or inactive');
    });

    it('should map a lost uniqueness race to a registration failure', async () => {
      vi.spyOn(ctx.storage.users, 'create').mockRejectedValueOnce(
        Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505' })
      );

      expect(await ctx.services.authService.register(input)).toEqual({
        success: false,
        error: 'registration_failed',
        message: 'Email or user name is already registered',
      });
    });
  });
});
