/**
 * Session Domain Types
 */

export interface Session {
  id: string;
  userId: string;
  /** Keyed reference of the refresh token; the raw token is never stored */
  refreshTokenReference: string;
  userAgent: string | null;
  ipAddress: string | null;
  isActive: boolean;
  expiresAt: Date;
  createdAt: Date;
  updatedAt: Date;
}

/** What an "active devices" view shows; never includes the token reference */
export interface SessionSummary {
  id: string;
  userAgent: string | null;
  ipAddress: string | null;
  createdAt: Date;
  expiresAt: Date;
}

export interface SessionDevice {
  userAgent?: string | undefined;
  ipAddress?: string | undefined;
}

export interface CreateSessionParams {
  userId: string;
  refreshToken: string;
  device?: SessionDevice;
  ttlSeconds?: number;
}

export interface DeactivateAllResult {
  sessionsDeactivated: number;
  revokedAt: Date;
}

export function toSessionSummary(session: Session): SessionSummary {
  return {
    id: session.id,
    userAgent: session.userAgent,
    ipAddress: session.ipAddress,
    createdAt: session.createdAt,
    expiresAt: session.expiresAt,
  };
}
