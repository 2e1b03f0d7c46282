/**
 * Verification Domain
 *
 * Exports for email verification and password reset tokens
 */

export { VerificationTokenService } from './verification-service.js';
export type { VerificationServiceDependencies } from './verification-service.js';
export { PgVerificationRepository } from './verification-repository.js';
export type { VerificationTokenRecordStore } from './verification-repository.js';
export type {
  ConsumedVerificationToken,
  IssuedVerificationToken,
  VerificationTokenRecord,
  VerificationTokenType,
} from './verification-types.js';
