/**
 * Password hashing, verification and strength rules.
 * Hashes are stored as `scrypt$<cost>$<salt>$<key>`.
 */
import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';
import {
  DEFAULT_PASSWORD_HASH_COST,
  DEFAULT_PASSWORD_MIN_LENGTH,
  MAX_PASSWORD_HASH_COST,
  MIN_PASSWORD_HASH_COST,
  PASSWORD_KEY_LENGTH,
  PASSWORD_SALT_BYTES,
} from './constants.js';
import { PasswordTooWeakError } from './errors.js';

const HASH_SCHEME = 'scrypt';
const SCRYPT_BLOCK_SIZE = 8;

// Fixed salt for the dummy derivation run against malformed hashes
const DUMMY_SALT = Buffer.alloc(PASSWORD_SALT_BYTES, 0x5a);

export interface PasswordPolicy {
  minLength: number;
  requireUppercase: boolean;
  requireLowercase: boolean;
  requireDigit: boolean;
  requireSpecial: boolean;
}

export const DEFAULT_PASSWORD_POLICY: PasswordPolicy = {
  minLength: DEFAULT_PASSWORD_MIN_LENGTH,
  requireUppercase: true,
  requireLowercase: true,
  requireDigit: true,
  requireSpecial: true,
};

export interface PasswordHasherOptions {
  cost?: number;
  policy?: Partial<PasswordPolicy>;
}

function deriveKey(
  password: string,
  salt: Buffer,
  keyLength: number,
  cost: number
): Promise<Buffer> {
  const N = 2 ** cost;
  return new Promise((resolve, reject) => {
    scrypt(
      password,
      salt,
      keyLength,
      // Default maxmem (32 MiB) is below what cost 15+ needs
      { N, r: SCRYPT_BLOCK_SIZE, p: 1, maxmem: 256 * N * SCRYPT_BLOCK_SIZE },
      (error, derivedKey) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(derivedKey);
      }
    );
  });
}

function isValidCost(cost: number): boolean {
  return (
    Number.isInteger(cost) && cost >= MIN_PASSWORD_HASH_COST && cost <= MAX_PASSWORD_HASH_COST
  );
}

interface ParsedHash {
  cost: number;
  salt: Buffer;
  key: Buffer;
}

function parseHash(encoded: string): ParsedHash | null {
  const parts = encoded.split('$');
  if (parts.length !== 4 || parts[0] !== HASH_SCHEME) {
    return null;
  }

  const [, costStr = '', saltB64 = '', keyB64 = ''] = parts;
  if (!/^\d+$/.test(costStr) || !saltB64 || !keyB64) {
    return null;
  }

  const cost = Number.parseInt(costStr, 10);
  if (!isValidCost(cost)) {
    return null;
  }

  const salt = Buffer.from(saltB64, 'base64');
  const key = Buffer.from(keyB64, 'base64');
  if (salt.length === 0 || key.length === 0) {
    return null;
  }

  return { cost, salt, key };
}

/**
 * Adaptive password hashing with a configurable work factor and strength policy.
 *
 * Hashes are self-describing (`scrypt$<cost>$<salt>$<key>`), so raising the
 * cost later does not invalidate stored hashes.
 */
export class PasswordHasher {
  readonly cost: number;
  readonly policy: PasswordPolicy;

  constructor(options: PasswordHasherOptions = {}) {
    const cost = options.cost ?? DEFAULT_PASSWORD_HASH_COST;
    if (!isValidCost(cost)) {
      throw new RangeError(
        `Password hash cost must be an integer between ${MIN_PASSWORD_HASH_COST} and ${MAX_PASSWORD_HASH_COST}`
      );
    }
    this.cost = cost;
    this.policy = { ...DEFAULT_PASSWORD_POLICY, ...options.policy };
  }

  async hash(password: string): Promise<string> {
    const salt = randomBytes(PASSWORD_SALT_BYTES);
    const key = await deriveKey(password, salt, PASSWORD_KEY_LENGTH, this.cost);
    return `${HASH_SCHEME}$${this.cost}$${salt.toString('base64')}$${key.toString('base64')}`;
  }

  /**
   * Constant-time comparison against a stored hash.
   * Malformed hashes (including the empty string) still pay for one
   * derivation at this hasher's cost and then report a mismatch.
   */
  async verify(password: string, hashedPassword: string): Promise<boolean> {
    const parsed = parseHash(hashedPassword);
    if (!parsed) {
      await deriveKey(password, DUMMY_SALT, PASSWORD_KEY_LENGTH, this.cost);
      return false;
    }

    const derived = await deriveKey(password, parsed.salt, parsed.key.length, parsed.cost);
    return timingSafeEqual(parsed.key, derived);
  }

  /**
   * Returns every failed rule at once, or null when the password is acceptable.
   */
  checkStrength(password: string): PasswordTooWeakError | null {
    const reasons: string[] = [];
    const { minLength, requireUppercase, requireLowercase, requireDigit, requireSpecial } =
      this.policy;

    if (password.length < minLength) {
      reasons.push(`password must be at least ${minLength} characters long`);
    }
    if (requireUppercase && !/[A-Z]/.test(password)) {
      reasons.push('password must contain at least one uppercase letter');
    }
    if (requireLowercase && !/[a-z]/.test(password)) {
      reasons.push('password must contain at least one lowercase letter');
    }
    if (requireDigit && !/[0-9]/.test(password)) {
      reasons.push('password must contain at least one number');
    }
    // Printable ASCII that is neither a letter nor a digit
    if (requireSpecial && !/[!-/:-@[-`{-~]/.test(password)) {
      reasons.push('password must contain at least one special character');
    }

    return reasons.length > 0 ? new PasswordTooWeakError(reasons) : null;
  }
}
