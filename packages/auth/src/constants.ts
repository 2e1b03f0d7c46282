/**
 * Authentication constants
 * Single source of truth for auth defaults
 */

// Token lifetimes
export const DEFAULT_ACCESS_TOKEN_TTL_SECONDS = 60 * 60; // 1 hour
export const DEFAULT_REFRESH_TOKEN_TTL_SECONDS = 7 * 24 * 60 * 60; // 7 days
export const DEFAULT_VERIFICATION_TOKEN_TTL_SECONDS = 24 * 60 * 60;
export const DEFAULT_PASSWORD_RESET_TTL_SECONDS = 60 * 60;

// Password hashing (scrypt work factor is N = 2^cost)
export const DEFAULT_PASSWORD_HASH_COST = 12;
export const MIN_PASSWORD_HASH_COST = 4;
export const MAX_PASSWORD_HASH_COST = 16;
export const PASSWORD_SALT_BYTES = 16;
export const PASSWORD_KEY_LENGTH = 64;
export const DEFAULT_PASSWORD_MIN_LENGTH = 8;

// Opaque verification token prefixes
export const EMAIL_VERIFICATION_TOKEN_PREFIX = 'ev';
export const PASSWORD_RESET_TOKEN_PREFIX = 'pr';
export const OPAQUE_TOKEN_SECRET_LENGTH = 43; // 256 bits of base64url

// Revocation cache keys
export const TOKEN_BLACKLIST_KEY_PREFIX = 'token:blacklist:';
export const USER_BLACKLIST_KEY_PREFIX = 'user:blacklist:';
