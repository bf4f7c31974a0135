import { randomBytes } from 'node:crypto';
import {
  REFRESH_TOKEN_LENGTH,
  PASSWORD_RESET_TOKEN_LENGTH,
  JTI_LENGTH,
} from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Generate a secure refresh token (256 bits by default)
 */
export function generateRefreshToken(length: number = REFRESH_TOKEN_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a single-use password reset token
 */
export function generatePasswordResetToken(length: number = PASSWORD_RESET_TOKEN_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a unique JWT ID (jti)
 */
export function generateJti(): string {
  return generateRandomBase64Url(JTI_LENGTH);
}

/**
 * Generate a unique ID for database records
 */
export function generateId(): string {
  return generateRandomBase64Url(16);
}
