/**
 * @warden/core
 *
 * Account workflows over the auth primitives: user records, device sessions,
 * single-use verification tokens, the auth orchestrator and audit logging.
 */

export * from './users/index.js';
export * from './sessions/index.js';
export * from './verification/index.js';
export * from './auth/index.js';
export * from './audit/index.js';
