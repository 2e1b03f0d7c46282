import type { AuthEvent, AuthEventEmitter, AuthEventType } from '@warden/auth';
import type { Logger } from '@warden/observability';

const EVENT_MESSAGES: Record<AuthEventType, string> = {
  'user.registered': 'User registered successfully',
  'user.login.success': 'User login successful',
  'user.login.failed': 'User login failed',
  'user.logout': 'User logged out',
  'user.logout_all': 'User logged out of all sessions',
  'user.password_changed': 'User password changed',
  'user.password_reset': 'User password reset',
  'user.email_verified': 'User email verified',
  'token.refreshed': 'Access token refreshed',
  'session.revoked': 'Session revoked',
  'verification.token_created': 'Verification token created',
};

const WARNING_EVENTS = new Set<AuthEventType>(['user.login.failed']);

/**
 * Initialize audit logging for authentication events
 * Logs all authentication events to the structured logger
 * Sensitive values are masked by the logger's redaction
 */
export function initializeAuditLogging(events: AuthEventEmitter, logger: Logger): () => void {
  const unsubscribe = events.on((event) => handleAuthEvent(event, logger));
  logger.info('Audit logging initialized for authentication events');
  return unsubscribe;
}

function handleAuthEvent(event: AuthEvent, logger: Logger): void {
  const { type, userId, email, ip, timestamp, metadata } = event;

  const logEntry = {
    event: type,
    userId: userId ?? 'unknown',
    email: email ?? 'unknown',
    ip: ip ?? 'unknown',
    timestamp: timestamp.toISOString(),
    success: !WARNING_EVENTS.has(type),
    ...(metadata && { metadata }),
  };

  if (WARNING_EVENTS.has(type)) {
    logger.warn(logEntry, EVENT_MESSAGES[type]);
    return;
  }
  logger.info(logEntry, EVENT_MESSAGES[type]);
}
