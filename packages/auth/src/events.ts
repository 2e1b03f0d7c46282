/**
 * Authentication event emitter for audit logging and monitoring
 * Events are fire-and-forget to avoid blocking the authentication flow
 */
import { logger as defaultLogger, type Logger } from '@warden/observability';

export type AuthEventType =
  | 'user.registered'
  | 'user.login.success'
  | 'user.login.failed'
  | 'user.logout'
  | 'user.logout_all'
  | 'user.password_changed'
  | 'user.password_reset'
  | 'user.email_verified'
  | 'token.refreshed'
  | 'session.revoked'
  | 'verification.token_created';

/**
 * Base authentication event structure
 */
export interface AuthEvent {
  type: AuthEventType;
  userId?: string;
  email?: string;
  ip?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export type AuthEventInput = Omit<AuthEvent, 'timestamp'>;

export type AuthEventHandler = (event: AuthEvent) => void | Promise<void>;

export class AuthEventEmitter {
  private handlers: AuthEventHandler[] = [];

  constructor(
    private readonly logger: Logger = defaultLogger,
    private readonly now: () => Date = () => new Date()
  ) {}

  on(handler: AuthEventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((existing) => existing !== handler);
    };
  }

  emit(event: AuthEventInput): void {
    const fullEvent: AuthEvent = {
      ...event,
      timestamp: this.now(),
    };

    // Fire and forget - each handler runs on its own so one failure does not skip the rest
    for (const handler of this.handlers) {
      void Promise.resolve()
        .then(() => handler(fullEvent))
        .catch((err: unknown) => {
          this.logger.error({ err, eventType: fullEvent.type }, 'Auth event handler error');
        });
    }
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers(): void {
    this.handlers = [];
  }
}
