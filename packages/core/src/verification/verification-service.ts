/**
 * Verification Service
 *
 * Single-use, time-bound tokens for email verification and password reset.
 * The raw token leaves this service exactly once; only its keyed reference
 * is stored.
 */

import { randomUUID } from 'node:crypto';
import {
  DEFAULT_VERIFICATION_TOKEN_TTL_SECONDS,
  EMAIL_VERIFICATION_TOKEN_PREFIX,
  PASSWORD_RESET_TOKEN_PREFIX,
  TokenAlreadyUsedError,
  TokenExpiredError,
  TokenNotFoundError,
  createOpaqueToken,
  parseOpaqueToken,
  type AuthEventEmitter,
  type TokenReferenceHasher,
} from '@warden/auth';
import { logger as defaultLogger, type Logger } from '@warden/observability';
import type { VerificationTokenRecordStore } from './verification-repository.js';
import type {
  ConsumedVerificationToken,
  IssuedVerificationToken,
  VerificationTokenType,
} from './verification-types.js';

const PREFIX_BY_TYPE: Record<VerificationTokenType, string> = {
  email_verification: EMAIL_VERIFICATION_TOKEN_PREFIX,
  password_reset: PASSWORD_RESET_TOKEN_PREFIX,
};

export type VerificationServiceDependencies = {
  repo: VerificationTokenRecordStore;
  references: TokenReferenceHasher;
  events?: Pick<AuthEventEmitter, 'emit'>;
  defaultTtlSeconds?: number;
  logger?: Logger;
  now?: () => Date;
  idFactory?: () => string;
};

export class VerificationTokenService {
  private readonly repo: VerificationTokenRecordStore;
  private readonly references: TokenReferenceHasher;
  private readonly events: Pick<AuthEventEmitter, 'emit'> | null;
  private readonly defaultTtlSeconds: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  constructor(dependencies: VerificationServiceDependencies) {
    this.repo = dependencies.repo;
    this.references = dependencies.references;
    this.events = dependencies.events ?? null;
    this.defaultTtlSeconds = dependencies.defaultTtlSeconds ?? DEFAULT_VERIFICATION_TOKEN_TTL_SECONDS;
    this.logger = dependencies.logger ?? defaultLogger;
    this.now = dependencies.now ?? (() => new Date());
    this.idFactory = dependencies.idFactory ?? randomUUID;
  }

  async issue(
    userId: string,
    type: VerificationTokenType,
    ttlSeconds: number = this.defaultTtlSeconds
  ): Promise<IssuedVerificationToken> {
    const now = this.now();
    const opaque = createOpaqueToken(PREFIX_BY_TYPE[type]);
    const expiresAt = new Date(now.getTime() + ttlSeconds * 1000);

    await this.repo.insert({
      id: this.idFactory(),
      userId,
      tokenReference: this.references.reference(opaque.value),
      type,
      expiresAt,
      isUsed: false,
      usedAt: null,
      createdAt: now,
    });

    this.events?.emit({
      type: 'verification.token_created',
      userId,
      metadata: { tokenType: type, expiresAt: expiresAt.toISOString() },
    });

    return { token: opaque.value, expiresAt };
  }

  /**
   * Invalidates the user's outstanding tokens of this type, then issues a new one.
   */
  async reissue(
    userId: string,
    type: VerificationTokenType,
    ttlSeconds?: number
  ): Promise<IssuedVerificationToken> {
    const invalidated = await this.repo.invalidateOutstanding(userId, type, this.now());
    if (invalidated > 0) {
      this.logger.debug({ userId, type, invalidated }, 'Invalidated outstanding verification tokens');
    }
    return this.issue(userId, type, ttlSeconds);
  }

  /**
   * Marks a token used and returns its owner. At most one caller ever succeeds
   * for a given token, however many race.
   */
  async consume(
    rawToken: string,
    expectedType?: VerificationTokenType
  ): Promise<ConsumedVerificationToken> {
    const prefixes = expectedType
      ? [PREFIX_BY_TYPE[expectedType]]
      : Object.values(PREFIX_BY_TYPE);
    if (!parseOpaqueToken(rawToken, prefixes)) {
      throw new TokenNotFoundError();
    }

    const tokenReference = this.references.reference(rawToken);
    const record = await this.repo.findByReference(tokenReference);

    // A token of another type is reported exactly like a missing one
    if (!record || (expectedType && record.type !== expectedType)) {
      throw new TokenNotFoundError();
    }
    if (record.isUsed) {
      throw new TokenAlreadyUsedError();
    }

    const now = this.now();
    if (record.expiresAt.getTime() <= now.getTime()) {
      throw new TokenExpiredError('Verification token has expired');
    }

    const consumed = await this.repo.consume(tokenReference, now);
    if (!consumed) {
      // Lost the race, or the token expired between the read and the update
      if (record.expiresAt.getTime() <= this.now().getTime()) {
        throw new TokenExpiredError('Verification token has expired');
      }
      throw new TokenAlreadyUsedError();
    }

    return { userId: consumed.userId, type: consumed.type };
  }

  async purgeExpired(): Promise<number> {
    const deleted = await this.repo.deleteExpired(this.now());
    this.logger.info({ deleted }, 'Purged expired verification tokens');
    return deleted;
  }
}
