import { describe, it, expect, beforeAll } from 'vitest';
import { generateKeyPairSync } from 'node:crypto';
import * as jose from 'jose';
import { createKeyRing, loadKeyRing } from '../../crypto/keys.js';
import { ConfigurationError } from '../../errors/auth-error.js';
import { testKeyPair } from '../test-setup.js';

describe('Key ring', () => {
  let first: { publicKey: string; privateKey: string };
  let second: { publicKey: string; privateKey: string };

  beforeAll(async () => {
    first = await testKeyPair(0);
    second = await testKeyPair(1);
  });

  it('should derive the kid from the RFC 7638 thumbprint', async () => {
    const ring = await createKeyRing(first.privateKey);
    const expected = await jose.calculateJwkThumbprint(
      await jose.exportJWK(await jose.importSPKI(first.publicKey, 'RS256')),
      'sha256'
    );

    expect(ring.current.kid).toBe(expected);
  });

  it('should publish only public material in the JWKS', async () => {
    const ring = await createKeyRing(first.privateKey);
    const jwks = ring.toJWKS();

    expect(jwks.keys).toHaveLength(1);
    const [key] = jwks.keys;
    expect(key?.kty).toBe('RSA');
    expect(key?.alg).toBe('RS256');
    expect(key?.use).toBe('sig');
    expect(key?.kid).toBe(ring.current.kid);
    expect(key?.n).toBeDefined();
    expect(key?.d).toBeUndefined();
  });

  it('should keep retired public keys for verification', async () => {
    const previous = await createKeyRing(first.privateKey);
    const ring = await createKeyRing(second.privateKey, first.publicKey);

    expect(ring.verificationKeys).toHaveLength(2);
    expect(ring.find(previous.current.kid)?.kid).toBe(previous.current.kid);
    expect(ring.current.kid).not.toBe(previous.current.kid);
    expect(ring.toJWKS().keys.map((key) => key.kid)).toEqual([
      ring.current.kid,
      previous.current.kid,
    ]);
  });

  it('should not find an unknown or missing kid', async () => {
    const ring = await createKeyRing(first.privateKey);

    expect(ring.find('unknown')).toBeUndefined();
    expect(ring.find(undefined)).toBeUndefined();
  });

  it('should reject a malformed private key', async () => {
    await expect(createKeyRing('not a pem')).rejects.toThrow(ConfigurationError);
  });

  it('should reject an RSA key under 2048 bits', async () => {
    const { privateKey } = generateKeyPairSync('rsa', {
      modulusLength: 1024,
      privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
      publicKeyEncoding: { type: 'spki', format: 'pem' },
    });

    await expect(createKeyRing(privateKey)).rejects.toThrow(ConfigurationError);
  });

  it('should reject a malformed retired key block', async () => {
    const broken = '-----BEGIN PUBLIC KEY-----\nAAAA\n-----END PUBLIC KEY-----';

    await expect(createKeyRing(first.privateKey, broken)).rejects.toThrow(
      'JWT_RETIRED_PUBLIC_KEYS contains an invalid SPKI PEM block'
    );
  });

  it('should fail startup without a private key', async () => {
    await expect(
      loadKeyRing({ privateKey: undefined, retiredPublicKeys: undefined })
    ).rejects.toThrow('JWT_PRIVATE_KEY or JWT_PRIVATE_KEY_FILE must be set');
  });
});
