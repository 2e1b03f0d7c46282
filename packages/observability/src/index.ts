/**
 * @warden/observability
 *
 * Structured logging for the auth core. Every module logs through the pino
 * instance created here so secrets and bearer tokens are masked in one place.
 */

export { createLogger, logger, redactSecrets } from './logger.js';
export type { Logger } from './logger.js';
