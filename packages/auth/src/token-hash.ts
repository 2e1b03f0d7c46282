import crypto from 'node:crypto';
import { OPAQUE_TOKEN_SECRET_LENGTH } from './constants.js';
import { generateRandomString } from './random.js';

const OPAQUE_TOKEN_PREFIX_DELIMITER = '_';
const OPAQUE_TOKEN_PATTERN = /^([a-z]+)_([A-Za-z0-9_-]{16,})$/;
const MIN_REFERENCE_SECRET_LENGTH = 16;

/**
 * Keyed references for bearer secrets that must be looked up but never stored.
 *
 * Refresh tokens and verification tokens are persisted only as
 * HMAC-SHA256(secret, token); a database leak does not yield usable tokens.
 */
export class TokenReferenceHasher {
  private readonly secret: string;

  constructor(secret: string) {
    if (secret.length < MIN_REFERENCE_SECRET_LENGTH) {
      throw new Error(
        `Token hash secret must be at least ${MIN_REFERENCE_SECRET_LENGTH} characters long`
      );
    }
    this.secret = secret;
  }

  reference(token: string): string {
    return crypto.createHmac('sha256', this.secret).update(token).digest('hex');
  }

  matches(token: string, reference: string): boolean {
    const computed = Buffer.from(this.reference(token), 'hex');
    const stored = Buffer.from(reference, 'hex');
    if (computed.length !== stored.length) {
      return false;
    }
    return crypto.timingSafeEqual(computed, stored);
  }
}

/**
 * Fixed-width SHA-256 fingerprint used for cache keys
 */
export function fingerprintToken(token: string): string {
  return crypto.createHash('sha256').update(token).digest('hex');
}

export interface OpaqueToken {
  value: string;
  prefix: string;
  secret: string;
}

export function createOpaqueToken(
  prefix: string,
  options?: { secretLength?: number }
): OpaqueToken {
  if (!/^[a-z]+$/.test(prefix)) {
    throw new Error(`Opaque token prefix must be lowercase letters, received "${prefix}"`);
  }
  const secret = generateRandomString(options?.secretLength ?? OPAQUE_TOKEN_SECRET_LENGTH);
  return {
    value: `${prefix}${OPAQUE_TOKEN_PREFIX_DELIMITER}${secret}`,
    prefix,
    secret,
  };
}

export function parseOpaqueToken(
  token: string,
  expectedPrefix?: string | readonly string[]
): { prefix: string; secret: string } | null {
  const match = OPAQUE_TOKEN_PATTERN.exec(token);
  if (!match) {
    return null;
  }

  const [, prefix, secret] = match;
  if (!prefix || !secret) {
    return null;
  }

  if (expectedPrefix !== undefined) {
    const allowed = typeof expectedPrefix === 'string' ? [expectedPrefix] : expectedPrefix;
    if (!allowed.includes(prefix)) {
      return null;
    }
  }

  return { prefix, secret };
}
