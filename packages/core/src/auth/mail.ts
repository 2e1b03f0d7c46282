/**
 * Outbound auth mail
 *
 * Delivery itself happens outside this package; the orchestrator only hands
 * a freshly issued token to whatever sender the host application provides.
 */

export interface AuthEmailMessage {
  to: string;
  name: string;
  /** Raw single-use token (ev_... or pr_...) */
  token: string;
  expiresAt: Date;
}

export interface MailSender {
  sendVerificationEmail(message: AuthEmailMessage): Promise<void>;
  sendPasswordResetEmail(message: AuthEmailMessage): Promise<void>;
}

export type MailDelivery = { kind: 'disabled' } | { kind: 'enabled'; sender: MailSender };

export const MAIL_DISABLED: MailDelivery = { kind: 'disabled' };

export function mailVia(sender: MailSender): MailDelivery {
  return { kind: 'enabled', sender };
}
