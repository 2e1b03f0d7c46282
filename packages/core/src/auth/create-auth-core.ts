/**
 * Composition root
 *
 * Wires configuration, the pg pool, the Upstash revocation cache and the
 * services into a ready AuthOrchestrator. Every collaborator can be passed
 * in, which is how tests and alternative hosts swap out the infrastructure.
 */

import { AuthEventEmitter, PasswordHasher, TokenReferenceHasher } from '@warden/auth';
import {
  InfrastructureGuard,
  TokenIssuer,
  createUpstashRevocationStore,
  loadAuthCoreConfig,
  type AuthCoreConfig,
  type RevocationStore,
} from '@warden/auth-core';
import { createPool, type Queryable } from '@warden/database';
import { logger as defaultLogger, type Logger } from '@warden/observability';
import { initializeAuditLogging } from '../audit/audit-logger.js';
import { PgSessionRepository } from '../sessions/session-repository.js';
import { SessionService } from '../sessions/session-service.js';
import { PgUserRepository } from '../users/user-repository.js';
import { PgVerificationRepository } from '../verification/verification-repository.js';
import { VerificationTokenService } from '../verification/verification-service.js';
import { AuthOrchestrator } from './auth-orchestrator.js';
import type { MailDelivery } from './mail.js';

export type CreateAuthCoreOptions = {
  config?: AuthCoreConfig;
  /** Defaults to a pool built from DATABASE_URL; the caller owns one passed in */
  db?: Queryable;
  /** Defaults to Upstash Redis from UPSTASH_REDIS_REST_URL/TOKEN */
  revocationStore?: RevocationStore;
  mail?: MailDelivery;
  logger?: Logger;
  /** Write auth events to the logger (default true) */
  auditLogging?: boolean;
  now?: () => Date;
};

export interface AuthCore {
  auth: AuthOrchestrator;
  tokens: TokenIssuer;
  sessions: SessionService;
  verification: VerificationTokenService;
  events: AuthEventEmitter;
  config: AuthCoreConfig;
  /** Stops audit logging and ends the pool if this function created it */
  close(): Promise<void>;
}

export function createAuthCore(options: CreateAuthCoreOptions = {}): AuthCore {
  const config = options.config ?? loadAuthCoreConfig();
  const logger = options.logger ?? defaultLogger;
  const now = options.now ?? (() => new Date());

  const { db, ownedPool } = resolveDatabase(options.db);

  const revocationStore = options.revocationStore ?? createDefaultRevocationStore(config);
  const guard = new InfrastructureGuard({ timeoutMs: config.cacheTimeoutMs, logger });
  const references = new TokenReferenceHasher(config.tokenHashSecret);
  const events = new AuthEventEmitter(logger, now);

  const users = new PgUserRepository(db, guard);

  const tokens = new TokenIssuer({
    secret: config.jwtSecret,
    issuer: config.issuer,
    revocationStore,
    userClaims: users,
    accessTokenTtlSeconds: config.accessTokenTtlSeconds,
    refreshTokenTtlSeconds: config.refreshTokenTtlSeconds,
    clockToleranceSeconds: config.clockToleranceSeconds,
    userRevocationTtlSeconds: config.userRevocationTtlSeconds,
    revocationFailurePolicy: config.revocationFailurePolicy,
    guard,
    logger,
    now,
  });

  const sessions = new SessionService({
    repo: new PgSessionRepository(db, guard),
    references,
    tokens,
    sessionTtlSeconds: config.sessionTtlSeconds,
    logger,
    now,
  });

  const verification = new VerificationTokenService({
    repo: new PgVerificationRepository(db, guard),
    references,
    events,
    defaultTtlSeconds: config.verificationTokenTtlSeconds,
    logger,
    now,
  });

  const auth = new AuthOrchestrator({
    users,
    passwords: new PasswordHasher({ cost: config.passwordHashCost, policy: config.passwordPolicy }),
    tokens,
    sessions,
    verification,
    events,
    mail: options.mail,
    options: {
      requireVerifiedEmail: config.requireVerifiedEmail,
      verificationTokenTtlSeconds: config.verificationTokenTtlSeconds,
      passwordResetTtlSeconds: config.passwordResetTtlSeconds,
    },
    logger,
    now,
  });

  const stopAuditLogging =
    options.auditLogging === false ? null : initializeAuditLogging(events, logger);

  return {
    auth,
    tokens,
    sessions,
    verification,
    events,
    config,
    async close() {
      stopAuditLogging?.();
      if (ownedPool) {
        await ownedPool.end();
      }
    },
  };
}

function resolveDatabase(db?: Queryable): {
  db: Queryable;
  ownedPool: ReturnType<typeof createPool> | null;
} {
  if (db) {
    return { db, ownedPool: null };
  }
  const pool = createPool();
  return { db: pool, ownedPool: pool };
}

function createDefaultRevocationStore(config: AuthCoreConfig): RevocationStore {
  if (!config.redis) {
    throw new Error(
      'UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN are required for token revocation'
    );
  }
  return createUpstashRevocationStore(config.redis);
}
