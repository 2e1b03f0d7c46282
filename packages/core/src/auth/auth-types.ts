/**
 * Auth Domain Types
 */

import type { TokenPair } from '@warden/auth-core';
import type { SessionSummary } from '../sessions/session-types.js';
import type { PublicUser } from '../users/user-types.js';

/** Where a request came from; recorded on the session and in audit events */
export interface RequestContext {
  userAgent?: string | undefined;
  ipAddress?: string | undefined;
}

export interface AuthResult {
  user: PublicUser;
  tokens: TokenPair;
  sessionId: string;
}

export interface RefreshResult {
  accessToken: string;
  accessTokenExpiresAt: Date;
  sessionId: string;
}

export interface VerifyEmailResult {
  userId: string;
}

export interface ActiveSession extends SessionSummary {
  isCurrent: boolean;
}

export interface PurgeResult {
  sessions: number;
  verificationTokens: number;
}

export interface AuthOrchestratorOptions {
  /** Reject logins until the email address has been verified */
  requireVerifiedEmail?: boolean;
  /** End every session after a password change (default true) */
  invalidateSessionsOnPasswordChange?: boolean;
  verificationTokenTtlSeconds?: number;
  passwordResetTtlSeconds?: number;
}
