import { describe, it, expect, beforeAll, beforeEach } from 'vitest';
import * as jose from 'jose';
import { TokenSigner } from '../../services/token-signer.js';
import { createKeyRing, type KeyRing } from '../../crypto/keys.js';
import type { User } from '../../types/user.js';
import {
  TestClock,
  testKeyPair,
  testKeyRing,
  TEST_AUDIENCE,
  TEST_ISSUER,
  TEST_TENANT_ID,
  TEST_BRANCH_ID,
  MINUTE,
} from '../test-setup.js';

const user: User = {
  id: 'user-001',
  tenantId: TEST_TENANT_ID,
  branchId: TEST_BRANCH_ID,
  email: 'amina.diallo@example.com',
  userName: 'adiallo',
  firstName: 'Amina',
  lastName: 'Diallo',
  passwordHash: 'unused',
  failedLoginAttempts: 0,
  isActive: true,
  createdAt: new Date('2025-06-01T00:00:00.000Z'),
  updatedAt: new Date('2025-06-01T00:00:00.000Z'),
};

describe('TokenSigner', () => {
  let keyRing: KeyRing;
  let clock: TestClock;
  let signer: TokenSigner;

  const createSigner = (ring: KeyRing, issuer = TEST_ISSUER) =>
    new TokenSigner({
      keyRing: ring,
      issuer,
      audience: TEST_AUDIENCE,
      accessTokenTtlMinutes: 15,
      clockToleranceSeconds: 5,
      now: clock.now,
    });

  const issue = (s: TokenSigner = signer) =>
    s.issueAccessToken({
      user,
      roles: ['Pharmacist'],
      permissions: ['inventory:read', 'prescriptions:dispense', 'inventory:read'],
      tenantId: TEST_TENANT_ID,
      branchId: TEST_BRANCH_ID,
    });

  beforeAll(async () => {
    keyRing = await testKeyRing();
  });

  beforeEach(() => {
    clock = new TestClock();
    signer = createSigner(keyRing);
  });

  describe('issueAccessToken', () => {
    it('should sign the identity, tenancy and permission claims', async () => {
      const issued = await issue();
      const claims = jose.decodeJwt(issued.token);
      const iat = Math.floor(clock.now().getTime() / 1000);

      expect(claims).toEqual({
        iss: TEST_ISSUER,
        sub: 'user-001',
        aud: TEST_AUDIENCE,
        iat,
        exp: iat + 900,
        jti: issued.jti,
        email: 'amina.diallo@example.com',
        name: 'Amina Diallo',
        given_name: 'Amina',
        family_name: 'Diallo',
        tenant_id: TEST_TENANT_ID,
        branch_id: TEST_BRANCH_ID,
        roles: ['Pharmacist'],
        permissions: ['inventory:read', 'prescriptions:dispense'],
        token_type: 'access_token',
      });
    });

    it('should use the current key and the access token type header', async () => {
      const { token } = await issue();

      expect(jose.decodeProtectedHeader(token)).toEqual({
        alg: 'RS256',
        kid: keyRing.current.kid,
        typ: 'at+jwt',
      });
    });

    it('should report issue and expiry times', async () => {
      const issued = await issue();

      expect(issued.issuedAt).toEqual(new Date('2026-01-15T08:00:00.000Z'));
      expect(issued.expiresAt).toEqual(new Date('2026-01-15T08:15:00.000Z'));
    });

    it('should omit branch_id for users without a branch', async () => {
      const { token } = await signer.issueAccessToken({
        user,
        roles: [],
        permissions: [],
        tenantId: TEST_TENANT_ID,
      });

      expect(jose.decodeJwt(token)).not.toHaveProperty('branch_id');
    });

    it('should give every token a distinct jti', async () => {
      const first = await issue();
      const second = await issue();

      expect(first.jti).not.toBe(second.jti);
    });
  });

  describe('verifyAccessToken', () => {
    it('should accept a fresh token', async () => {
      const { token, jti } = await issue();
      const result = await signer.verifyAccessToken(token);

      expect(result.valid).toBe(true);
      if (result.valid) {
        expect(result.claims.jti).toBe(jti);
        expect(result.claims.permissions).toEqual(['inventory:read', 'prescriptions:dispense']);
      }
    });

    it('should tolerate small clock skew past expiry', async () => {
      const { token } = await issue();
      clock.advance(15 * MINUTE + 3000);

      expect((await signer.verifyAccessToken(token)).valid).toBe(true);
    });

    it('should reject an expired token', async () => {
      const { token } = await issue();
      clock.advance(15 * MINUTE + 6000);

      expect(await signer.verifyAccessToken(token)).toEqual({
        valid: false,
        error: 'invalid_token',
        reason: 'token expired',
      });
    });

    it('should reject a token from another issuer', async () => {
      const { token } = await issue(createSigner(keyRing, 'someone-else'));

      expect((await signer.verifyAccessToken(token)).valid).toBe(false);
    });

    it('should reject a token signed by an unknown key', async () => {
      const otherRing = await testKeyRing(1);
      const { token } = await issue(createSigner(otherRing));

      expect(await signer.verifyAccessToken(token)).toEqual({
        valid: false,
        error: 'invalid_token',
        reason: `unknown signing key "${otherRing.current.kid}"`,
      });
    });

    it('should reject a tampered payload', async () => {
      const { token } = await issue();
      const [header, , signature] = token.split('.');
      const claims = jose.decodeJwt(token);
      const forged = Buffer.from(JSON.stringify({ ...claims, roles: ['Admin'] })).toString('base64url');

      expect(await signer.verifyAccessToken(`${header}.${forged}.${signature}`)).toEqual({
        valid: false,
        error: 'invalid_token',
        reason: 'signature verification failed',
      });
    });

    it('should reject garbage', async () => {
      expect((await signer.verifyAccessToken('not-a-token')).valid).toBe(false);
    });

    it('should accept tokens signed before a key rotation', async () => {
      const { token } = await issue();
      const { privateKey } = await testKeyPair(1);
      const { publicKey: retired } = await testKeyPair(0);
      const rotated = createSigner(await createKeyRing(privateKey, retired));

      expect((await rotated.verifyAccessToken(token)).valid).toBe(true);
    });
  });

  describe('parseExpiredToken', () => {
    it('should recover claims of an expired token', async () => {
      const { token, jti } = await issue();
      clock.advance(60 * MINUTE);

      const result = await signer.parseExpiredToken(token);
      expect(result.valid).toBe(true);
      if (result.valid) {
        expect(result.claims.jti).toBe(jti);
        expect(result.claims.sub).toBe('user-001');
      }
    });

    it('should still enforce the issuer', async () => {
      const { token } = await issue(createSigner(keyRing, 'someone-else'));

      expect(await signer.parseExpiredToken(token)).toEqual({
        valid: false,
        error: 'invalid_token',
        reason: 'claim "iss" check failed',
      });
    });

    it('should still enforce the signature', async () => {
      const otherRing = await testKeyRing(1);
      const { token } = await issue(createSigner(otherRing));

      expect((await signer.parseExpiredToken(token)).valid).toBe(false);
    });
  });

  it('should issue opaque refresh token values', () => {
    const value = signer.issueRefreshToken();

    expect(value).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(signer.issueRefreshToken()).not.toBe(value);
  });
});
