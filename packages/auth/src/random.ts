import { randomBytes, randomInt } from 'node:crypto';

const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

function assertLength(length: number): void {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`Random length must be a non-negative integer, received ${length}`);
  }
}

export function generateRandomBytes(length: number): Buffer {
  assertLength(length);
  return randomBytes(length);
}

/**
 * URL-safe random string of exactly `length` characters
 */
export function generateRandomString(length: number): string {
  assertLength(length);
  return randomBytes(length).toString('base64url').slice(0, length);
}

/**
 * Hex string of exactly `length` characters
 */
export function generateRandomHex(length: number): string {
  assertLength(length);
  return randomBytes(Math.ceil(length / 2)).toString('hex').slice(0, length);
}

/**
 * Alphanumeric string drawn without modulo bias
 */
export function generateSecureToken(length: number): string {
  assertLength(length);
  let token = '';
  for (let i = 0; i < length; i += 1) {
    token += ALPHANUMERIC.charAt(randomInt(ALPHANUMERIC.length));
  }
  return token;
}
