/**
 * Verification Domain Types
 *
 * Type definitions for verification service layer
 */

export type VerificationTokenType = 'email_verification' | 'password_reset';

export interface VerificationTokenRecord {
  id: string;
  userId: string;
  /** Keyed reference of the raw token */
  tokenReference: string;
  type: VerificationTokenType;
  expiresAt: Date;
  isUsed: boolean;
  usedAt: Date | null;
  createdAt: Date;
}

export interface IssuedVerificationToken {
  /** Full token value to send by email (ev_<secret> or pr_<secret>); returned once */
  token: string;
  expiresAt: Date;
}

export interface ConsumedVerificationToken {
  userId: string;
  type: VerificationTokenType;
}
