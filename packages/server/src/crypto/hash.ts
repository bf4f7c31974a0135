import { createHash } from 'node:crypto';

/**
 * Hash a value using SHA-256 (for opaque tokens)
 * Used for storing refresh tokens and password reset tokens
 */
export function sha256(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

/**
 * Hash for token lookup (quick hash, not for passwords)
 * Tokens are random and high-entropy, so a plain digest is enough
 */
export function hashToken(token: string): string {
  return sha256(token);
}
