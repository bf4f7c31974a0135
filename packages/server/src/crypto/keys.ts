import { createPublicKey, type KeyObject } from 'node:crypto';
import * as jose from 'jose';
import { SIGNING_ALGORITHM, MIN_RSA_MODULUS_LENGTH } from '../config/constants.js';
import { ConfigurationError } from '../errors/auth-error.js';

/**
 * Public half of a key pair, usable for verification only
 */
export interface VerificationKey {
  kid: string;
  publicKey: KeyObject;
  jwk: jose.JWK;
}

/**
 * Current signing key
 */
export interface SigningKey extends VerificationKey {
  privateKey: jose.KeyLike;
}

export interface JWKS {
  keys: jose.JWK[];
}

const PUBLIC_KEY_PEM_PATTERN = /-----BEGIN PUBLIC KEY-----[\s\S]+?-----END PUBLIC KEY-----/g;

/**
 * Build the verification half of a key. The kid is the RFC 7638 thumbprint,
 * so it stays stable across restarts without being configured.
 */
async function toVerificationKey(publicKey: KeyObject, label: string): Promise<VerificationKey> {
  if (publicKey.asymmetricKeyType !== 'rsa') {
    throw new ConfigurationError(`${label} must be an RSA key`);
  }

  const modulusLength = publicKey.asymmetricKeyDetails?.modulusLength ?? 0;
  if (modulusLength < MIN_RSA_MODULUS_LENGTH) {
    throw new ConfigurationError(
      `${label} must be at least ${MIN_RSA_MODULUS_LENGTH} bits, got ${modulusLength}`
    );
  }

  const exported = await jose.exportJWK(publicKey);
  const kid = await jose.calculateJwkThumbprint(exported, 'sha256');

  return {
    kid,
    publicKey,
    jwk: { ...exported, kid, alg: SIGNING_ALGORITHM, use: 'sig' },
  };
}

/**
 * Holds the current signing key and any recently retired public keys.
 * Retired keys verify tokens issued before a rotation until those expire.
 */
export class KeyRing {
  private readonly byKid: Map<string, VerificationKey>;

  constructor(
    readonly current: SigningKey,
    readonly retired: readonly VerificationKey[] = []
  ) {
    this.byKid = new Map();
    for (const key of [current, ...retired]) {
      this.byKid.set(key.kid, key);
    }
  }

  find(kid: string | undefined): VerificationKey | undefined {
    if (kid === undefined) {
      return undefined;
    }
    return this.byKid.get(kid);
  }

  get verificationKeys(): VerificationKey[] {
    return [...this.byKid.values()];
  }

  toJWKS(): JWKS {
    return { keys: this.verificationKeys.map((key) => key.jwk) };
  }
}

/**
 * Create a key ring from PEM material: a PKCS#8 private key and optionally a
 * concatenation of SPKI public keys for retired signing keys
 */
export async function createKeyRing(privateKeyPem: string, retiredPublicKeysPem?: string): Promise<KeyRing> {
  let privateKey: jose.KeyLike;
  let publicKey: KeyObject;
  try {
    privateKey = await jose.importPKCS8(privateKeyPem, SIGNING_ALGORITHM);
    publicKey = createPublicKey(privateKeyPem);
  } catch (error) {
    throw new ConfigurationError('JWT_PRIVATE_KEY is not a valid PKCS#8 PEM RSA private key', {
      cause: error,
    });
  }

  const current: SigningKey = {
    ...(await toVerificationKey(publicKey, 'JWT_PRIVATE_KEY')),
    privateKey,
  };

  const retired: VerificationKey[] = [];
  for (const block of retiredPublicKeysPem?.match(PUBLIC_KEY_PEM_PATTERN) ?? []) {
    let retiredKey: KeyObject;
    try {
      retiredKey = createPublicKey(block);
    } catch (error) {
      throw new ConfigurationError('JWT_RETIRED_PUBLIC_KEYS contains an invalid SPKI PEM block', {
        cause: error,
      });
    }
    retired.push(await toVerificationKey(retiredKey, 'JWT_RETIRED_PUBLIC_KEYS'));
  }

  return new KeyRing(current, retired);
}

/**
 * Load the key ring from configuration. A missing key fails startup.
 */
export async function loadKeyRing(jwt: {
  privateKey: string | undefined;
  retiredPublicKeys: string | undefined;
}): Promise<KeyRing> {
  if (!jwt.privateKey) {
    throw new ConfigurationError('JWT_PRIVATE_KEY or JWT_PRIVATE_KEY_FILE must be set');
  }
  return createKeyRing(jwt.privateKey, jwt.retiredPublicKeys);
}

/**
 * Generate a new RSA key pair as PEM strings
 */
export async function generateRsaKeyPair(): Promise<{ publicKey: string; privateKey: string }> {
  const { publicKey, privateKey } = await jose.generateKeyPair(SIGNING_ALGORITHM, {
    modulusLength: MIN_RSA_MODULUS_LENGTH,
    extractable: true,
  });

  return {
    publicKey: await jose.exportSPKI(publicKey),
    privateKey: await jose.exportPKCS8(privateKey),
  };
}
