/**
 * Session Service
 *
 * Tracks one session per device login. Sessions are found by id or by the
 * keyed reference of their refresh token.
 */

import { randomUUID } from 'node:crypto';
import {
  DEFAULT_REFRESH_TOKEN_TTL_SECONDS,
  SessionExpiredError,
  SessionNotFoundError,
  type TokenReferenceHasher,
} from '@warden/auth';
import type { TokenIssuer } from '@warden/auth-core';
import { logger as defaultLogger, type Logger } from '@warden/observability';
import type { SessionRecordStore } from './session-repository.js';
import {
  type CreateSessionParams,
  type DeactivateAllResult,
  type Session,
  type SessionSummary,
  toSessionSummary,
} from './session-types.js';

export interface SessionStore {
  create(params: CreateSessionParams): Promise<Session>;
  getActive(sessionId: string): Promise<Session>;
  getActiveByRefreshToken(refreshToken: string): Promise<Session>;
  listActive(userId: string): Promise<SessionSummary[]>;
  deactivate(sessionId: string): Promise<void>;
  revokeForUser(userId: string, sessionId: string): Promise<void>;
  deactivateAll(userId: string, ttlSeconds?: number): Promise<DeactivateAllResult>;
  purgeExpired(): Promise<number>;
}

export type SessionServiceDependencies = {
  repo: SessionRecordStore;
  references: TokenReferenceHasher;
  tokens: Pick<TokenIssuer, 'revokeAllForUser'>;
  sessionTtlSeconds?: number;
  logger?: Logger;
  now?: () => Date;
  idFactory?: () => string;
};

export class SessionService implements SessionStore {
  private readonly repo: SessionRecordStore;
  private readonly references: TokenReferenceHasher;
  private readonly tokens: Pick<TokenIssuer, 'revokeAllForUser'>;
  private readonly sessionTtlSeconds: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  constructor(dependencies: SessionServiceDependencies) {
    this.repo = dependencies.repo;
    this.references = dependencies.references;
    this.tokens = dependencies.tokens;
    this.sessionTtlSeconds = dependencies.sessionTtlSeconds ?? DEFAULT_REFRESH_TOKEN_TTL_SECONDS;
    this.logger = dependencies.logger ?? defaultLogger;
    this.now = dependencies.now ?? (() => new Date());
    this.idFactory = dependencies.idFactory ?? randomUUID;
  }

  async create(params: CreateSessionParams): Promise<Session> {
    const now = this.now();
    const ttlSeconds = params.ttlSeconds ?? this.sessionTtlSeconds;

    const session = await this.repo.insert({
      id: this.idFactory(),
      userId: params.userId,
      refreshTokenReference: this.references.reference(params.refreshToken),
      userAgent: params.device?.userAgent ?? null,
      ipAddress: params.device?.ipAddress ?? null,
      isActive: true,
      expiresAt: new Date(now.getTime() + ttlSeconds * 1000),
      createdAt: now,
      updatedAt: now,
    });

    this.logger.debug({ sessionId: session.id, userId: session.userId }, 'Session created');
    return session;
  }

  async getActive(sessionId: string): Promise<Session> {
    return this.assertActive(await this.repo.findById(sessionId));
  }

  async getActiveByRefreshToken(refreshToken: string): Promise<Session> {
    const reference = this.references.reference(refreshToken);
    return this.assertActive(await this.repo.findByRefreshTokenReference(reference));
  }

  async listActive(userId: string): Promise<SessionSummary[]> {
    const sessions = await this.repo.listActiveForUser(userId, this.now());
    return sessions.map(toSessionSummary);
  }

  /**
   * Idempotent: deactivating an inactive session succeeds.
   */
  async deactivate(sessionId: string): Promise<void> {
    const found = await this.repo.deactivate(sessionId, this.now());
    if (!found) {
      throw new SessionNotFoundError();
    }
  }

  /**
   * Deactivates a session only if it belongs to the user.
   * Another user's session id is reported as not found.
   */
  async revokeForUser(userId: string, sessionId: string): Promise<void> {
    const session = await this.repo.findById(sessionId);
    if (!session || session.userId !== userId) {
      throw new SessionNotFoundError();
    }
    await this.repo.deactivate(sessionId, this.now());
  }

  /**
   * Ends every session of the user and revokes every token issued so far.
   */
  async deactivateAll(userId: string, ttlSeconds?: number): Promise<DeactivateAllResult> {
    const sessionsDeactivated = await this.repo.deactivateAllForUser(userId, this.now());
    const revokedAt = await this.tokens.revokeAllForUser(userId, ttlSeconds);

    this.logger.info({ userId, sessionsDeactivated }, 'All sessions deactivated');
    return { sessionsDeactivated, revokedAt };
  }

  async purgeExpired(): Promise<number> {
    const deleted = await this.repo.deleteExpired(this.now());
    this.logger.info({ deleted }, 'Purged expired sessions');
    return deleted;
  }

  private assertActive(session: Session | null): Session {
    if (!session) {
      throw new SessionNotFoundError();
    }
    if (!session.isActive || session.expiresAt.getTime() <= this.now().getTime()) {
      throw new SessionExpiredError();
    }
    return session;
  }
}
