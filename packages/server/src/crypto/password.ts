import { pbkdf2 as pbkdf2Callback, randomBytes, randomInt, timingSafeEqual } from 'node:crypto';
import {
  PBKDF2_DIGEST,
  DEFAULT_PBKDF2_ITERATIONS,
  MIN_PBKDF2_ITERATIONS,
  PASSWORD_SALT_LENGTH,
  PASSWORD_KEY_LENGTH,
  MIN_PASSWORD_LENGTH,
} from '../config/constants.js';

/**
 * Promisified pbkdf2 function
 */
function pbkdf2Async(
  password: string,
  salt: Buffer,
  iterations: number,
  keyLength: number
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    pbkdf2Callback(password, salt, iterations, keyLength, PBKDF2_DIGEST, (err, derivedKey) => {
      if (err) reject(err);
      else resolve(derivedKey);
    });
  });
}

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const ITERATIONS_PATTERN = /^[1-9][0-9]*$/;

// Upper bound on a stored iteration count, so a tampered hash cannot pin a CPU
const MAX_PBKDF2_ITERATIONS = 10_000_000;

function decodeBase64(value: string): Buffer | null {
  if (value.length === 0 || !BASE64_PATTERN.test(value)) {
    return null;
  }
  return Buffer.from(value, 'base64');
}

const UPPERCASE = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const LOWERCASE = 'abcdefghijklmnopqrstuvwxyz';
const DIGITS = '0123456789';
const SYMBOLS = '!@#$%^&*()-_=+[]{};:,.?';
const ALL_CHARACTERS = UPPERCASE + LOWERCASE + DIGITS + SYMBOLS;

function pick(alphabet: string): string {
  return alphabet.charAt(randomInt(alphabet.length));
}

/**
 * PBKDF2-HMAC-SHA256 password hasher.
 *
 * Stored format is `iterations.base64(salt).base64(key)`, so hashes created
 * with an older iteration count keep verifying after the default is raised.
 */
export class PasswordHasher {
  private readonly iterations: number;

  constructor(iterations: number = DEFAULT_PBKDF2_ITERATIONS) {
    if (!Number.isInteger(iterations) || iterations < MIN_PBKDF2_ITERATIONS) {
      throw new RangeError(`PBKDF2 iterations must be an integer >= ${MIN_PBKDF2_ITERATIONS}`);
    }
    this.iterations = iterations;
  }

  async hash(password: string): Promise<string> {
    const salt = randomBytes(PASSWORD_SALT_LENGTH);
    const key = await pbkdf2Async(password, salt, this.iterations, PASSWORD_KEY_LENGTH);

    return `${this.iterations}.${salt.toString('base64')}.${key.toString('base64')}`;
  }

  /**
   * Malformed hashes verify as false rather than throwing
   */
  async verify(password: string, hash: string): Promise<boolean> {
    const parts = hash.split('.');
    if (parts.length !== 3) {
      return false;
    }

    const [iterationsPart = '', saltPart = '', keyPart = ''] = parts;
    if (!ITERATIONS_PATTERN.test(iterationsPart)) {
      return false;
    }

    const iterations = parseInt(iterationsPart, 10);
    if (iterations > MAX_PBKDF2_ITERATIONS) {
      return false;
    }

    const salt = decodeBase64(saltPart);
    const storedKey = decodeBase64(keyPart);
    if (!salt || !storedKey || salt.length === 0 || storedKey.length === 0) {
      return false;
    }

    const derivedKey = await pbkdf2Async(password, salt, iterations, storedKey.length);

    return timingSafeEqual(storedKey, derivedKey);
  }

  /**
   * Password policy: at least 8 characters with an uppercase letter, a
   * lowercase letter, a digit and a non-alphanumeric character
   */
  isValidPassword(password: string): boolean {
    return (
      password.length >= MIN_PASSWORD_LENGTH &&
      /[A-Z]/.test(password) &&
      /[a-z]/.test(password) &&
      /[0-9]/.test(password) &&
      /[^A-Za-z0-9]/.test(password)
    );
  }

  /**
   * Generate a random password that satisfies the password policy
   */
  generateRandomPassword(length: number = 12): string {
    if (length < MIN_PASSWORD_LENGTH) {
      throw new RangeError(`Generated passwords must be at least ${MIN_PASSWORD_LENGTH} characters`);
    }

    const characters = [pick(UPPERCASE), pick(LOWERCASE), pick(DIGITS), pick(SYMBOLS)];
    while (characters.length < length) {
      characters.push(pick(ALL_CHARACTERS));
    }

    // Fisher-Yates so the guaranteed classes are not always up front
    for (let i = characters.length - 1; i > 0; i--) {
      const j = randomInt(i + 1);
      const current = characters[i] ?? '';
      characters[i] = characters[j] ?? '';
      characters[j] = current;
    }

    return characters.join('');
  }
}
