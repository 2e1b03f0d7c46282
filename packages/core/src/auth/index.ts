export { AuthOrchestrator, type AuthOrchestratorDependencies } from './auth-orchestrator.js';
export { createAuthCore, type AuthCore, type CreateAuthCoreOptions } from './create-auth-core.js';
export { MAIL_DISABLED, mailVia } from './mail.js';
export type { AuthEmailMessage, MailDelivery, MailSender } from './mail.js';
export type {
  ActiveSession,
  AuthOrchestratorOptions,
  AuthResult,
  PurgeResult,
  RefreshResult,
  RequestContext,
  VerifyEmailResult,
} from './auth-types.js';
export { toListSessionsResponse, toTokenPairResponse, toUserResponse } from './auth-responses.js';
