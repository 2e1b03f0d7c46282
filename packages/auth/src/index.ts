/**
 * @warden/auth
 *
 * Authentication primitives
 * - Password hashing, verification and strength rules
 * - Secure random values, opaque tokens and keyed token references
 * - Auth events and the error taxonomy shared by every package
 *
 * Token issuance and revocation live in @warden/auth-core.
 */

// Password utilities
export { PasswordHasher, DEFAULT_PASSWORD_POLICY } from './password.js';
export type { PasswordPolicy, PasswordHasherOptions } from './password.js';

// Random values
export {
  generateRandomBytes,
  generateRandomString,
  generateRandomHex,
  generateSecureToken,
} from './random.js';

// Token references and opaque tokens
export {
  TokenReferenceHasher,
  fingerprintToken,
  createOpaqueToken,
  parseOpaqueToken,
} from './token-hash.js';
export type { OpaqueToken } from './token-hash.js';

// Events
export { AuthEventEmitter } from './events.js';
export type { AuthEvent, AuthEventInput, AuthEventType, AuthEventHandler } from './events.js';

// Constants
export {
  DEFAULT_ACCESS_TOKEN_TTL_SECONDS,
  DEFAULT_REFRESH_TOKEN_TTL_SECONDS,
  DEFAULT_VERIFICATION_TOKEN_TTL_SECONDS,
  DEFAULT_PASSWORD_RESET_TTL_SECONDS,
  DEFAULT_PASSWORD_HASH_COST,
  MIN_PASSWORD_HASH_COST,
  MAX_PASSWORD_HASH_COST,
  DEFAULT_PASSWORD_MIN_LENGTH,
  EMAIL_VERIFICATION_TOKEN_PREFIX,
  PASSWORD_RESET_TOKEN_PREFIX,
  TOKEN_BLACKLIST_KEY_PREFIX,
  USER_BLACKLIST_KEY_PREFIX,
} from './constants.js';

// Errors
export {
  AuthError,
  InvalidCredentialsError,
  TokenExpiredError,
  TokenInvalidError,
  SessionExpiredError,
  SessionNotFoundError,
  TokenAlreadyUsedError,
  TokenNotFoundError,
  PasswordTooWeakError,
  UserInactiveError,
  UserNotVerifiedError,
  UserAlreadyExistsError,
  UserNotFoundError,
  ValidationError,
  InfrastructureError,
  isAuthError,
} from './errors.js';
export type { AuthErrorCode, ValidationIssue } from './errors.js';
