import { randomUUID } from 'node:crypto';
import {
  DEFAULT_ACCESS_TOKEN_TTL_SECONDS,
  DEFAULT_REFRESH_TOKEN_TTL_SECONDS,
  InfrastructureError,
  TokenExpiredError,
  TokenInvalidError,
  UserInactiveError,
  UserNotFoundError,
  fingerprintToken,
} from '@warden/auth';
import { logger as defaultLogger, type Logger } from '@warden/observability';
import { SignJWT, errors as joseErrors, jwtVerify, type JWTPayload } from 'jose';
import { z } from 'zod';
import { DEFAULT_JWT_ISSUER, type RevocationFailurePolicy } from './config.js';
import { InfrastructureGuard } from './infrastructure.js';
import type { RevocationStore } from './revocation-store.js';
import type {
  AccessTokenClaims,
  RefreshTokenClaims,
  RefreshedAccessToken,
  TokenClaims,
  TokenPair,
  TokenSubject,
  TokenUse,
  UserClaimsSource,
} from './types.js';

const ALGORITHM = 'HS256';

const TokenPayloadSchema = z.object({
  sub: z.string().min(1),
  email: z.string(),
  token_use: z.enum(['access', 'refresh']),
  role: z.string().optional(),
  name: z.string().optional(),
  jti: z.string().min(1),
  iat: z.number().int(),
  iat_ms: z.number().int().nonnegative(),
  nbf: z.number().int(),
  exp: z.number().int(),
  iss: z.string(),
});

type TokenPayload = z.infer<typeof TokenPayloadSchema>;

export type TokenIssuerOptions = {
  secret: string;
  revocationStore: RevocationStore;
  userClaims: UserClaimsSource;
  issuer?: string;
  accessTokenTtlSeconds?: number;
  refreshTokenTtlSeconds?: number;
  clockToleranceSeconds?: number;
  /** How long a user-wide revocation is remembered; defaults to the refresh-token TTL */
  userRevocationTtlSeconds?: number;
  revocationFailurePolicy?: RevocationFailurePolicy;
  guard?: InfrastructureGuard;
  logger?: Logger;
  now?: () => Date;
};

/**
 * Issues and validates HS256 access/refresh token pairs.
 *
 * Validation order: signature, expiry and not-before (jose), claim shape,
 * then the revocation store. A user-wide revocation only rejects tokens
 * issued strictly before it, so logging out everywhere and then logging in
 * again yields working tokens.
 */
export class TokenIssuer {
  private readonly key: Uint8Array;
  private readonly revocationStore: RevocationStore;
  private readonly userClaims: UserClaimsSource;
  private readonly issuer: string;
  private readonly accessTokenTtlSeconds: number;
  private readonly refreshTokenTtlSeconds: number;
  private readonly clockToleranceSeconds: number;
  private readonly userRevocationTtlSeconds: number;
  private readonly revocationFailurePolicy: RevocationFailurePolicy;
  private readonly guard: InfrastructureGuard;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: TokenIssuerOptions) {
    if (!options.secret) {
      throw new Error('TokenIssuer requires a signing secret');
    }

    this.key = new TextEncoder().encode(options.secret);
    this.revocationStore = options.revocationStore;
    this.userClaims = options.userClaims;
    this.issuer = options.issuer ?? DEFAULT_JWT_ISSUER;
    this.accessTokenTtlSeconds = options.accessTokenTtlSeconds ?? DEFAULT_ACCESS_TOKEN_TTL_SECONDS;
    this.refreshTokenTtlSeconds =
      options.refreshTokenTtlSeconds ?? DEFAULT_REFRESH_TOKEN_TTL_SECONDS;
    this.clockToleranceSeconds = options.clockToleranceSeconds ?? 0;
    this.userRevocationTtlSeconds =
      options.userRevocationTtlSeconds ?? this.refreshTokenTtlSeconds;
    this.revocationFailurePolicy = options.revocationFailurePolicy ?? 'fail-closed';
    this.logger = options.logger ?? defaultLogger;
    this.guard = options.guard ?? new InfrastructureGuard({ logger: this.logger });
    this.now = options.now ?? (() => new Date());
  }

  async generate(subject: TokenSubject): Promise<TokenPair> {
    const issuedAt = this.now();

    const [access, refresh] = await Promise.all([
      this.signAccessToken(subject, issuedAt),
      this.signToken(
        { sub: subject.userId, email: subject.email, token_use: 'refresh' },
        issuedAt,
        this.refreshTokenTtlSeconds
      ),
    ]);

    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      accessTokenExpiresAt: access.claims.expiresAt,
      refreshTokenExpiresAt: refresh.expiresAt,
    };
  }

  async validate(token: string): Promise<TokenClaims> {
    const claims = await this.verify(token);
    await this.assertNotRevoked(token, claims);
    return claims;
  }

  async validateAccessToken(token: string): Promise<AccessTokenClaims> {
    const claims = await this.verify(token);
    if (claims.tokenUse !== 'access') {
      throw new TokenInvalidError('Expected an access token');
    }
    await this.assertNotRevoked(token, claims);
    return claims;
  }

  async validateRefreshToken(token: string): Promise<RefreshTokenClaims> {
    const claims = await this.verify(token);
    if (claims.tokenUse !== 'refresh') {
      throw new TokenInvalidError('Expected a refresh token');
    }
    await this.assertNotRevoked(token, claims);
    return claims;
  }

  /**
   * Mints a new access token from a refresh token, re-reading the user's
   * current email, role and name.
   */
  async refresh(refreshToken: string): Promise<RefreshedAccessToken> {
    const claims = await this.validateRefreshToken(refreshToken);

    const user = await this.userClaims.findClaimsById(claims.userId);
    if (!user) {
      throw new UserNotFoundError();
    }
    if (!user.isActive) {
      throw new UserInactiveError();
    }

    const access = await this.signAccessToken(
      { userId: claims.userId, email: user.email, role: user.role, name: user.name },
      this.now()
    );

    return {
      accessToken: access.token,
      accessTokenExpiresAt: access.claims.expiresAt,
      claims: access.claims,
    };
  }

  /**
   * Blacklists one token for at most its remaining lifetime.
   * Revoking an already-expired token is a no-op. With `ownerId`, a token
   * issued to anyone else is refused with TokenInvalidError.
   */
  async revoke(token: string, ttlSeconds?: number, ownerId?: string): Promise<void> {
    let claims: TokenClaims;
    try {
      claims = await this.verify(token);
    } catch (error) {
      if (error instanceof TokenExpiredError) {
        return;
      }
      throw error;
    }

    if (ownerId !== undefined && claims.userId !== ownerId) {
      this.logger.warn(
        { ownerId, tokenUserId: claims.userId, tokenId: claims.tokenId },
        'Refusing to revoke a token issued to another user'
      );
      throw new TokenInvalidError('Token does not belong to this user');
    }

    const remainingSeconds = Math.ceil(
      (claims.expiresAt.getTime() - this.now().getTime()) / 1000
    );
    if (remainingSeconds <= 0) {
      return;
    }

    const ttl = Math.max(1, Math.min(ttlSeconds ?? remainingSeconds, remainingSeconds));
    await this.guard.write('revocation.revokeToken', () =>
      this.revocationStore.revokeToken(fingerprintToken(token), ttl)
    );
  }

  /**
   * Rejects every token issued to the user before now. Returns the cut-off.
   */
  async revokeAllForUser(userId: string, ttlSeconds?: number): Promise<Date> {
    const revokedAt = this.now();
    const ttl = Math.max(1, Math.ceil(ttlSeconds ?? this.userRevocationTtlSeconds));

    await this.guard.write('revocation.revokeUser', () =>
      this.revocationStore.revokeUser(userId, revokedAt.getTime(), ttl)
    );

    return revokedAt;
  }

  private async signAccessToken(
    subject: TokenSubject,
    issuedAt: Date
  ): Promise<{ token: string; claims: AccessTokenClaims }> {
    const signed = await this.signToken(
      {
        sub: subject.userId,
        email: subject.email,
        role: subject.role,
        name: subject.name,
        token_use: 'access',
      },
      issuedAt,
      this.accessTokenTtlSeconds
    );

    return {
      token: signed.token,
      claims: {
        userId: subject.userId,
        email: subject.email,
        role: subject.role,
        name: subject.name,
        tokenUse: 'access',
        issuedAt,
        expiresAt: signed.expiresAt,
        notBefore: signed.notBefore,
        issuer: this.issuer,
        subject: subject.userId,
        tokenId: signed.tokenId,
      },
    };
  }

  private async signToken(
    claims: Pick<TokenPayload, 'sub' | 'email' | 'role' | 'name'> & { token_use: TokenUse },
    issuedAt: Date,
    ttlSeconds: number
  ): Promise<{ token: string; tokenId: string; expiresAt: Date; notBefore: Date }> {
    const issuedAtMs = issuedAt.getTime();
    const iat = Math.floor(issuedAtMs / 1000);
    const exp = iat + ttlSeconds;
    const tokenId = randomUUID();

    const payload: JWTPayload = {
      ...claims,
      jti: tokenId,
      iat,
      iat_ms: issuedAtMs,
      nbf: iat,
      exp,
      iss: this.issuer,
    };

    const token = await new SignJWT(payload)
      .setProtectedHeader({ alg: ALGORITHM, typ: 'JWT' })
      .sign(this.key);

    return {
      token,
      tokenId,
      expiresAt: new Date(exp * 1000),
      notBefore: new Date(iat * 1000),
    };
  }

  private async verify(token: string): Promise<TokenClaims> {
    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(token, this.key, {
        algorithms: [ALGORITHM],
        issuer: this.issuer,
        clockTolerance: this.clockToleranceSeconds,
        currentDate: this.now(),
      }));
    } catch (error) {
      if (error instanceof joseErrors.JWTExpired) {
        throw new TokenExpiredError(undefined, { cause: error });
      }
      throw new TokenInvalidError(undefined, { cause: error });
    }

    return toClaims(payload);
  }

  private async assertNotRevoked(token: string, claims: TokenClaims): Promise<void> {
    let tokenRevoked: boolean;
    let userRevokedAt: number | null;

    try {
      [tokenRevoked, userRevokedAt] = await Promise.all([
        this.guard.read('revocation.isTokenRevoked', () =>
          this.revocationStore.isTokenRevoked(fingerprintToken(token))
        ),
        this.guard.read('revocation.getUserRevokedAt', () =>
          this.revocationStore.getUserRevokedAt(claims.userId)
        ),
      ]);
    } catch (error) {
      if (error instanceof InfrastructureError && this.revocationFailurePolicy === 'fail-open') {
        this.logger.warn(
          { err: error, userId: claims.userId, tokenId: claims.tokenId },
          'Revocation check unavailable, accepting token'
        );
        return;
      }
      throw error;
    }

    if (tokenRevoked) {
      throw new TokenInvalidError('Token has been revoked');
    }
    if (userRevokedAt !== null && claims.issuedAt.getTime() < userRevokedAt) {
      throw new TokenInvalidError('Token has been revoked');
    }
  }
}

function toClaims(payload: JWTPayload): TokenClaims {
  const parsed = TokenPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new TokenInvalidError('Token claims are malformed');
  }

  const claims = parsed.data;
  const base = {
    userId: claims.sub,
    email: claims.email,
    issuedAt: new Date(claims.iat_ms),
    expiresAt: new Date(claims.exp * 1000),
    notBefore: new Date(claims.nbf * 1000),
    issuer: claims.iss,
    subject: claims.sub,
    tokenId: claims.jti,
  };

  if (claims.token_use === 'refresh') {
    return { ...base, tokenUse: 'refresh' };
  }

  if (claims.role === undefined || claims.name === undefined) {
    throw new TokenInvalidError('Token claims are malformed');
  }
  return { ...base, tokenUse: 'access', role: claims.role, name: claims.name };
}
