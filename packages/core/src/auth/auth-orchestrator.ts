/**
 * Auth Orchestrator
 *
 * Drives the account workflows (registration, login, refresh, logout,
 * password changes, email verification and password reset) over the user
 * store, password hasher, token issuer, session store and verification
 * service. Inputs arrive unvalidated and are parsed with the shared schemas.
 */

import { randomUUID } from 'node:crypto';
import {
  DEFAULT_PASSWORD_RESET_TTL_SECONDS,
  DEFAULT_VERIFICATION_TOKEN_TTL_SECONDS,
  InfrastructureError,
  InvalidCredentialsError,
  SessionExpiredError,
  SessionNotFoundError,
  TokenInvalidError,
  UserAlreadyExistsError,
  UserInactiveError,
  UserNotFoundError,
  UserNotVerifiedError,
  ValidationError,
  type AuthEventEmitter,
  type PasswordHasher,
} from '@warden/auth';
import {
  extractBearerToken,
  type AccessTokenClaims,
  type TokenIssuer,
  type TokenPair,
  type TokenUse,
} from '@warden/auth-core';
import { logger as defaultLogger, type Logger } from '@warden/observability';
import {
  ChangePasswordSchema,
  DeviceInfoSchema,
  EmailOnlySchema,
  LoginSchema,
  LogoutSchema,
  PasswordResetSchema,
  RefreshSchema,
  RegisterSchema,
  VerifyEmailQuerySchema,
} from '@warden/types';
import type { z } from 'zod';
import type { DeactivateAllResult, Session } from '../sessions/session-types.js';
import type { SessionStore } from '../sessions/session-service.js';
import type { UserRecordStore } from '../users/user-repository.js';
import { toPublicUser, type UserRecord } from '../users/user-types.js';
import type { VerificationTokenService } from '../verification/verification-service.js';
import type { MailDelivery, MailSender } from './mail.js';
import type {
  ActiveSession,
  AuthOrchestratorOptions,
  AuthResult,
  PurgeResult,
  RefreshResult,
  RequestContext,
  VerifyEmailResult,
} from './auth-types.js';

export type AuthOrchestratorDependencies = {
  users: UserRecordStore;
  passwords: PasswordHasher;
  tokens: Pick<TokenIssuer, 'generate' | 'refresh' | 'revoke' | 'validateAccessToken'>;
  sessions: SessionStore;
  verification: Pick<VerificationTokenService, 'reissue' | 'consume' | 'purgeExpired'>;
  events: Pick<AuthEventEmitter, 'emit'>;
  mail?: MailDelivery;
  options?: AuthOrchestratorOptions;
  logger?: Logger;
  now?: () => Date;
  idFactory?: () => string;
};

function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
  return result.data;
}

export class AuthOrchestrator {
  private readonly users: UserRecordStore;
  private readonly passwords: PasswordHasher;
  private readonly tokens: AuthOrchestratorDependencies['tokens'];
  private readonly sessions: SessionStore;
  private readonly verification: AuthOrchestratorDependencies['verification'];
  private readonly events: Pick<AuthEventEmitter, 'emit'>;
  private readonly mail: MailDelivery;
  private readonly requireVerifiedEmail: boolean;
  private readonly invalidateSessionsOnPasswordChange: boolean;
  private readonly verificationTokenTtlSeconds: number;
  private readonly passwordResetTtlSeconds: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  constructor(dependencies: AuthOrchestratorDependencies) {
    const options = dependencies.options ?? {};

    this.users = dependencies.users;
    this.passwords = dependencies.passwords;
    this.tokens = dependencies.tokens;
    this.sessions = dependencies.sessions;
    this.verification = dependencies.verification;
    this.events = dependencies.events;
    this.mail = dependencies.mail ?? { kind: 'disabled' };
    this.requireVerifiedEmail = options.requireVerifiedEmail ?? false;
    this.invalidateSessionsOnPasswordChange = options.invalidateSessionsOnPasswordChange ?? true;
    this.verificationTokenTtlSeconds =
      options.verificationTokenTtlSeconds ?? DEFAULT_VERIFICATION_TOKEN_TTL_SECONDS;
    this.passwordResetTtlSeconds =
      options.passwordResetTtlSeconds ?? DEFAULT_PASSWORD_RESET_TTL_SECONDS;
    this.logger = dependencies.logger ?? defaultLogger;
    this.now = dependencies.now ?? (() => new Date());
    this.idFactory = dependencies.idFactory ?? randomUUID;
  }

  /**
   * Create an unverified account and sign it in.
   *
   * The verification email goes out in the background; a delivery failure is
   * logged and never fails the registration.
   *
   * @throws ValidationError, UserAlreadyExistsError, PasswordTooWeakError
   */
  async register(input: unknown, context: RequestContext = {}): Promise<AuthResult> {
    const { email, password, name } = parseInput(RegisterSchema, input);
    const device = parseInput(DeviceInfoSchema, context);

    if (await this.users.findByEmail(email)) {
      throw new UserAlreadyExistsError();
    }

    const weakness = this.passwords.checkStrength(password);
    if (weakness) {
      throw weakness;
    }

    const passwordHash = await this.passwords.hash(password);
    const user = await this.users.create({
      id: this.idFactory(),
      email,
      passwordHash,
      name,
      role: 'user',
      createdAt: this.now(),
    });

    const { tokens, session } = await this.startSession(user, device);

    this.events.emit({ type: 'user.registered', userId: user.id, email, ip: device.ipAddress });
    this.sendInBackground(user, 'verification');

    return { user: toPublicUser(user), tokens, sessionId: session.id };
  }

  /**
   * Unknown emails and wrong passwords fail identically.
   *
   * @throws ValidationError, InvalidCredentialsError, UserInactiveError, UserNotVerifiedError
   */
  async login(input: unknown, context: RequestContext = {}): Promise<AuthResult> {
    const { email, password } = parseInput(LoginSchema, input);
    const device = parseInput(DeviceInfoSchema, context);

    const user = await this.users.findByEmail(email);
    if (!user) {
      // Pay for one derivation so response time does not reveal unknown emails
      await this.passwords.verify(password, '');
      this.emitLoginFailed(email, device, 'unknown_email');
      throw new InvalidCredentialsError();
    }

    if (!(await this.passwords.verify(password, user.passwordHash))) {
      this.emitLoginFailed(email, device, 'invalid_password', user.id);
      throw new InvalidCredentialsError();
    }

    if (!user.isActive) {
      this.emitLoginFailed(email, device, 'inactive', user.id);
      throw new UserInactiveError();
    }
    if (this.requireVerifiedEmail && !user.isVerified) {
      this.emitLoginFailed(email, device, 'unverified', user.id);
      throw new UserNotVerifiedError();
    }

    await this.users.recordLogin(user.id, this.now());
    const { tokens, session } = await this.startSession(user, device);

    this.events.emit({
      type: 'user.login.success',
      userId: user.id,
      email,
      ip: device.ipAddress,
      metadata: { sessionId: session.id },
    });

    return { user: toPublicUser(user), tokens, sessionId: session.id };
  }

  /**
   * Mint a new access token. The refresh token is not rotated.
   *
   * @throws SessionNotFoundError, SessionExpiredError, TokenInvalidError, TokenExpiredError
   */
  async refresh(input: unknown): Promise<RefreshResult> {
    const { refreshToken } = parseInput(RefreshSchema, input);

    const session = await this.sessions.getActiveByRefreshToken(refreshToken);
    const refreshed = await this.tokens.refresh(refreshToken);

    if (refreshed.claims.userId !== session.userId) {
      this.logger.warn(
        { sessionId: session.id, sessionUserId: session.userId, tokenUserId: refreshed.claims.userId },
        'Refresh token does not match its session'
      );
      throw new TokenInvalidError('Refresh token does not belong to this session');
    }

    this.events.emit({
      type: 'token.refreshed',
      userId: session.userId,
      metadata: { sessionId: session.id },
    });

    return {
      accessToken: refreshed.accessToken,
      accessTokenExpiresAt: refreshed.accessTokenExpiresAt,
      sessionId: session.id,
    };
  }

  /**
   * End the session behind a refresh token. Unknown or already-ended
   * sessions are a no-op, and the session is deactivated even when the
   * revocation cache is unreachable.
   */
  async logout(input: unknown): Promise<void> {
    const { refreshToken, accessToken } = parseInput(LogoutSchema, input);

    let session: Session;
    try {
      session = await this.sessions.getActiveByRefreshToken(refreshToken);
    } catch (error) {
      if (error instanceof SessionNotFoundError || error instanceof SessionExpiredError) {
        this.logger.debug('Logout for unknown or ended session ignored');
        return;
      }
      throw error;
    }

    await this.revokeForLogout(refreshToken, 'refresh', session.userId);
    if (accessToken) {
      await this.revokeForLogout(accessToken, 'access', session.userId);
    }

    await this.sessions.deactivate(session.id);

    this.events.emit({
      type: 'user.logout',
      userId: session.userId,
      metadata: { sessionId: session.id },
    });
  }

  async logoutAll(userId: string): Promise<DeactivateAllResult> {
    const result = await this.sessions.deactivateAll(userId);

    this.events.emit({
      type: 'user.logout_all',
      userId,
      metadata: { sessionsDeactivated: result.sessionsDeactivated },
    });

    return result;
  }

  /**
   * @throws ValidationError, UserNotFoundError, InvalidCredentialsError, PasswordTooWeakError
   */
  async changePassword(userId: string, input: unknown): Promise<void> {
    const { currentPassword, newPassword } = parseInput(ChangePasswordSchema, input);

    const user = await this.users.findById(userId);
    if (!user) {
      throw new UserNotFoundError();
    }

    if (!(await this.passwords.verify(currentPassword, user.passwordHash))) {
      throw new InvalidCredentialsError('Current password is incorrect');
    }

    const weakness = this.passwords.checkStrength(newPassword);
    if (weakness) {
      throw weakness;
    }

    const passwordHash = await this.passwords.hash(newPassword);

    // Sessions end before the new hash is stored: a failed revocation must
    // leave the old password in place
    let sessionsDeactivated = 0;
    if (this.invalidateSessionsOnPasswordChange) {
      ({ sessionsDeactivated } = await this.sessions.deactivateAll(userId));
    }

    await this.users.updatePasswordHash(userId, passwordHash, this.now());

    this.events.emit({
      type: 'user.password_changed',
      userId,
      email: user.email,
      metadata: { sessionsDeactivated },
    });
  }

  /**
   * @throws TokenNotFoundError, TokenExpiredError, TokenAlreadyUsedError, UserNotFoundError
   */
  async verifyEmail(input: unknown): Promise<VerifyEmailResult> {
    const { token } = parseInput(VerifyEmailQuerySchema, input);

    const { userId } = await this.verification.consume(token, 'email_verification');
    const user = await this.users.findById(userId);
    if (!user) {
      throw new UserNotFoundError();
    }

    await this.users.markVerified(userId, this.now());
    this.events.emit({ type: 'user.email_verified', userId, email: user.email });

    return { userId };
  }

  /**
   * Unknown and already-verified addresses are ignored so the response does
   * not reveal which accounts exist.
   */
  async resendVerification(input: unknown): Promise<void> {
    const { email } = parseInput(EmailOnlySchema, input);

    const user = await this.users.findByEmail(email);
    if (!user || user.isVerified) {
      this.logger.debug('Verification resend skipped');
      return;
    }

    this.sendInBackground(user, 'verification');
  }

  async requestPasswordReset(input: unknown): Promise<void> {
    const { email } = parseInput(EmailOnlySchema, input);

    const user = await this.users.findByEmail(email);
    if (!user || !user.isActive) {
      this.logger.debug('Password reset request skipped');
      return;
    }

    this.sendInBackground(user, 'password_reset');
  }

  /**
   * The new password is rated before the token is spent, so a weak choice
   * leaves the reset link usable.
   *
   * @throws ValidationError, PasswordTooWeakError, TokenNotFoundError, TokenExpiredError, TokenAlreadyUsedError
   */
  async resetPassword(input: unknown): Promise<void> {
    const { token, newPassword } = parseInput(PasswordResetSchema, input);

    const weakness = this.passwords.checkStrength(newPassword);
    if (weakness) {
      throw weakness;
    }

    const { userId } = await this.verification.consume(token, 'password_reset');
    const user = await this.users.findById(userId);
    if (!user) {
      throw new UserNotFoundError();
    }

    const passwordHash = await this.passwords.hash(newPassword);
    const { sessionsDeactivated } = await this.sessions.deactivateAll(userId);
    await this.users.updatePasswordHash(userId, passwordHash, this.now());

    this.events.emit({
      type: 'user.password_reset',
      userId,
      email: user.email,
      metadata: { sessionsDeactivated },
    });
  }

  /**
   * Resolve an `Authorization` header to validated access-token claims.
   */
  async authenticate(authorizationHeader: string | null | undefined): Promise<AccessTokenClaims> {
    return this.tokens.validateAccessToken(extractBearerToken(authorizationHeader));
  }

  async listSessions(userId: string, currentSessionId?: string): Promise<ActiveSession[]> {
    const sessions = await this.sessions.listActive(userId);
    return sessions.map((session) => ({ ...session, isCurrent: session.id === currentSessionId }));
  }

  async revokeSession(userId: string, sessionId: string): Promise<void> {
    await this.sessions.revokeForUser(userId, sessionId);
    this.events.emit({ type: 'session.revoked', userId, metadata: { sessionId } });
  }

  async purgeExpired(): Promise<PurgeResult> {
    const sessions = await this.sessions.purgeExpired();
    const verificationTokens = await this.verification.purgeExpired();
    return { sessions, verificationTokens };
  }

  private async startSession(
    user: UserRecord,
    context: RequestContext
  ): Promise<{ tokens: TokenPair; session: Session }> {
    const tokens = await this.tokens.generate({
      userId: user.id,
      email: user.email,
      role: user.role,
      name: user.name,
    });

    const session = await this.sessions.create({
      userId: user.id,
      refreshToken: tokens.refreshToken,
      device: { userAgent: context.userAgent, ipAddress: context.ipAddress },
    });

    return { tokens, session };
  }

  private async revokeForLogout(token: string, tokenUse: TokenUse, userId: string): Promise<void> {
    try {
      await this.tokens.revoke(token, undefined, userId);
    } catch (error) {
      if (error instanceof InfrastructureError) {
        this.logger.warn({ err: error, userId, tokenUse }, 'Token revocation failed during logout');
        return;
      }
      if (error instanceof TokenInvalidError) {
        this.logger.debug(
          { userId, tokenUse, reason: error.message },
          'Invalid token not revoked during logout'
        );
        return;
      }
      throw error;
    }
  }

  private sendInBackground(user: UserRecord, kind: 'verification' | 'password_reset'): void {
    if (this.mail.kind === 'disabled') {
      this.logger.debug({ userId: user.id, kind }, 'Mail delivery disabled, no token sent');
      return;
    }

    const sender = this.mail.sender;
    void this.deliver(sender, user, kind).catch((err: unknown) => {
      this.logger.error({ err, userId: user.id, kind }, 'Failed to send auth email');
    });
  }

  private async deliver(
    sender: MailSender,
    user: UserRecord,
    kind: 'verification' | 'password_reset'
  ): Promise<void> {
    if (kind === 'verification') {
      const issued = await this.verification.reissue(
        user.id,
        'email_verification',
        this.verificationTokenTtlSeconds
      );
      await sender.sendVerificationEmail({ to: user.email, name: user.name, ...issued });
      return;
    }

    const issued = await this.verification.reissue(
      user.id,
      'password_reset',
      this.passwordResetTtlSeconds
    );
    await sender.sendPasswordResetEmail({ to: user.email, name: user.name, ...issued });
  }

  private emitLoginFailed(
    email: string,
    context: RequestContext,
    reason: string,
    userId?: string
  ): void {
    this.events.emit({
      type: 'user.login.failed',
      userId,
      email,
      ip: context.ipAddress,
      metadata: { reason },
    });
  }
}
