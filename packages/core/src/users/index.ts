/**
 * Users Domain
 *
 * Exports for user record access
 */

export { PgUserRepository } from './user-repository.js';
export type { UserRecordStore } from './user-repository.js';
export { toPublicUser, normalizeEmail } from './user-types.js';
export type { CreateUserData, PublicUser, UserRecord, UserRole } from './user-types.js';
