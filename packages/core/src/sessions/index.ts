/**
 * Sessions Domain
 */

export { SessionService } from './session-service.js';
export type { SessionStore, SessionServiceDependencies } from './session-service.js';
export { PgSessionRepository } from './session-repository.js';
export type { SessionRecordStore } from './session-repository.js';
export { toSessionSummary } from './session-types.js';
export type {
  CreateSessionParams,
  DeactivateAllResult,
  Session,
  SessionDevice,
  SessionSummary,
} from './session-types.js';
