import {
  InfrastructureError,
  TokenExpiredError,
  TokenInvalidError,
  UserInactiveError,
  UserNotFoundError,
  fingerprintToken,
} from '@warden/auth';
import { createLogger } from '@warden/observability';
import { SignJWT } from 'jose';
import { beforeEach, describe, expect, it } from 'vitest';
import { RedisRevocationStore, tokenBlacklistKey, userBlacklistKey } from '../revocation-store.js';
import { TokenIssuer, type TokenIssuerOptions } from '../token-issuer.js';
import { MockRedis } from '../testing/mock-redis.js';
import type { UserClaimsRecord, UserClaimsSource } from '../types.js';

const SECRET = 'test-secret-for-token-issuer-0000';
const START = Date.parse('2026-03-01T12:00:00.000Z');
const subject = { userId: 'user-1', email: 'ada@example.com', role: 'user', name: 'Ada' };

describe('TokenIssuer', () => {
  let nowMs: number;
  let redis: MockRedis;
  let users: Map<string, UserClaimsRecord>;
  let userClaims: UserClaimsSource;
  const logger = createLogger({ level: 'silent' });

  function createIssuer(overrides: Partial<TokenIssuerOptions> = {}) {
    return new TokenIssuer({
      secret: SECRET,
      revocationStore: new RedisRevocationStore(redis),
      userClaims,
      logger,
      now: () => new Date(nowMs),
      ...overrides,
    });
  }

  function tamperSignature(token: string): string {
    const [header, payload, signature = ''] = token.split('.');
    const first = signature[0] === 'A' ? 'B' : 'A';
    return `${header}.${payload}.${first}${signature.slice(1)}`;
  }

  beforeEach(() => {
    nowMs = START;
    redis = new MockRedis(() => nowMs);
    users = new Map([
      ['user-1', { email: 'ada@example.com', role: 'user', name: 'Ada', isActive: true }],
    ]);
    userClaims = { findClaimsById: async (userId) => users.get(userId) ?? null };
  });

  describe('generate / validate', () => {
    it('round-trips access token claims', async () => {
      const issuer = createIssuer();

      const pair = await issuer.generate(subject);
      const claims = await issuer.validateAccessToken(pair.accessToken);

      expect(claims).toMatchObject({
        userId: 'user-1',
        email: 'ada@example.com',
        role: 'user',
        name: 'Ada',
        tokenUse: 'access',
        issuer: 'warden',
        subject: 'user-1',
      });
      expect(claims.issuedAt).toEqual(new Date(START));
      expect(claims.expiresAt).toEqual(new Date(START + 3600 * 1000));
      expect(claims.notBefore).toEqual(new Date(START));
      expect(pair.accessTokenExpiresAt).toEqual(new Date(START + 3600 * 1000));
      expect(pair.refreshTokenExpiresAt).toEqual(new Date(START + 604800 * 1000));
    });

    it('issues refresh tokens without profile claims', async () => {
      const issuer = createIssuer();

      const pair = await issuer.generate(subject);
      const claims = await issuer.validateRefreshToken(pair.refreshToken);

      expect(claims.tokenUse).toBe('refresh');
      expect(claims.userId).toBe('user-1');
      expect(claims.email).toBe('ada@example.com');
      expect('role' in claims).toBe(false);
      expect(pair.refreshToken).not.toBe(pair.accessToken);
    });

    it('gives every token a unique id', async () => {
      const issuer = createIssuer();

      const first = await issuer.validate((await issuer.generate(subject)).accessToken);
      const second = await issuer.validate((await issuer.generate(subject)).accessToken);

      expect(first.tokenId).not.toBe(second.tokenId);
    });

    it('rejects a token presented for the wrong use', async () => {
      const issuer = createIssuer();
      const pair = await issuer.generate(subject);

      await expect(issuer.validateRefreshToken(pair.accessToken)).rejects.toThrow(
        'Expected a refresh token'
      );
      await expect(issuer.validateAccessToken(pair.refreshToken)).rejects.toBeInstanceOf(
        TokenInvalidError
      );
    });

    it.each([0, -10])('treats a TTL of %i seconds as already expired', async (ttl) => {
      const issuer = createIssuer({ accessTokenTtlSeconds: ttl });
      const pair = await issuer.generate(subject);

      await expect(issuer.validate(pair.accessToken)).rejects.toBeInstanceOf(TokenExpiredError);
    });

    it('expires tokens once the clock reaches exp', async () => {
      const issuer = createIssuer();
      const pair = await issuer.generate(subject);

      nowMs = START + 3600 * 1000 - 1000;
      await expect(issuer.validate(pair.accessToken)).resolves.toMatchObject({ userId: 'user-1' });

      nowMs = START + 3600 * 1000;
      await expect(issuer.validate(pair.accessToken)).rejects.toBeInstanceOf(TokenExpiredError);
    });

    it('honours the configured clock tolerance', async () => {
      const issuer = createIssuer({ accessTokenTtlSeconds: 60, clockToleranceSeconds: 30 });
      const pair = await issuer.generate(subject);

      nowMs = START + 70 * 1000;
      await expect(issuer.validate(pair.accessToken)).resolves.toMatchObject({ userId: 'user-1' });

      nowMs = START + 100 * 1000;
      await expect(issuer.validate(pair.accessToken)).rejects.toBeInstanceOf(TokenExpiredError);
    });

    it('detects a tampered signature', async () => {
      const issuer = createIssuer();
      const pair = await issuer.generate(subject);

      await expect(issuer.validate(tamperSignature(pair.accessToken))).rejects.toBeInstanceOf(
        TokenInvalidError
      );
    });

    it('rejects tokens signed with another secret or issuer', async () => {
      const other = createIssuer({ secret: 'another-test-secret-for-issuer-00' });
      const foreignIssuer = createIssuer({ issuer: 'someone-else' });
      const issuer = createIssuer();

      const fromOtherSecret = await other.generate(subject);
      const fromOtherIssuer = await foreignIssuer.generate(subject);

      await expect(issuer.validate(fromOtherSecret.accessToken)).rejects.toBeInstanceOf(
        TokenInvalidError
      );
      await expect(issuer.validate(fromOtherIssuer.accessToken)).rejects.toBeInstanceOf(
        TokenInvalidError
      );
    });

    it('rejects garbage input', async () => {
      await expect(createIssuer().validate('not-a-jwt')).rejects.toBeInstanceOf(TokenInvalidError);
    });

    it('rejects correctly signed tokens with malformed claims', async () => {
      const iat = Math.floor(START / 1000);
      const token = await new SignJWT({ sub: 'user-1', email: 'ada@example.com', token_use: 'access' })
        .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
        .setIssuedAt(iat)
        .setExpirationTime(iat + 60)
        .setIssuer('warden')
        .sign(new TextEncoder().encode(SECRET));

      await expect(createIssuer().validate(token)).rejects.toThrow('Token claims are malformed');
    });
  });

  describe('revoke', () => {
    it('blacklists a single token for its remaining lifetime', async () => {
      const issuer = createIssuer();
      const pair = await issuer.generate(subject);

      nowMs = START + 600 * 1000;
      await issuer.revoke(pair.accessToken);

      await expect(issuer.validate(pair.accessToken)).rejects.toThrow('Token has been revoked');
      await expect(issuer.validate(pair.refreshToken)).resolves.toMatchObject({
        tokenUse: 'refresh',
      });
      expect(redis.ttl(tokenBlacklistKey(fingerprintToken(pair.accessToken)))).toBe(3000);
    });

    it('uses a shorter requested TTL and caps longer ones', async () => {
      const issuer = createIssuer();
      const pair = await issuer.generate(subject);

      await issuer.revoke(pair.accessToken, 60);
      await issuer.revoke(pair.refreshToken, 10_000_000);

      expect(redis.ttl(tokenBlacklistKey(fingerprintToken(pair.accessToken)))).toBe(60);
      expect(redis.ttl(tokenBlacklistKey(fingerprintToken(pair.refreshToken)))).toBe(604800);
    });

    it('is a no-op for expired tokens', async () => {
      const issuer = createIssuer({ accessTokenTtlSeconds: 0 });
      const pair = await issuer.generate(subject);

      await expect(issuer.revoke(pair.accessToken)).resolves.toBeUndefined();
      expect(redis.commands).toEqual([]);
    });

    it('refuses to revoke tokens it cannot verify', async () => {
      const issuer = createIssuer();
      const pair = await issuer.generate(subject);

      await expect(issuer.revoke(tamperSignature(pair.accessToken))).rejects.toBeInstanceOf(
        TokenInvalidError
      );
    });

    it('only revokes tokens issued to the expected owner', async () => {
      const issuer = createIssuer();
      const pair = await issuer.generate(subject);

      await expect(issuer.revoke(pair.accessToken, undefined, 'user-2')).rejects.toThrow(
        new TokenInvalidError('Token does not belong to this user')
      );
      expect(redis.commands).toEqual([]);
      await expect(issuer.validate(pair.accessToken)).resolves.toMatchObject({ userId: 'user-1' });

      await issuer.revoke(pair.accessToken, undefined, 'user-1');
      await expect(issuer.validate(pair.accessToken)).rejects.toThrow('Token has been revoked');
    });
  });

  describe('revokeAllForUser', () => {
    it('rejects tokens issued before the revocation', async () => {
      const issuer = createIssuer();
      const before = await issuer.generate(subject);

      nowMs = START + 1;
      const revokedAt = await issuer.revokeAllForUser('user-1');

      expect(revokedAt).toEqual(new Date(START + 1));
      await expect(issuer.validate(before.accessToken)).rejects.toThrow('Token has been revoked');
      await expect(issuer.validate(before.refreshToken)).rejects.toBeInstanceOf(TokenInvalidError);
    });

    it('accepts tokens issued at or after the revocation', async () => {
      const issuer = createIssuer();

      nowMs = START + 5000;
      await issuer.revokeAllForUser('user-1');
      const sameInstant = await issuer.generate(subject);
      nowMs += 1;
      const later = await issuer.generate(subject);

      await expect(issuer.validate(sameInstant.accessToken)).resolves.toMatchObject({
        userId: 'user-1',
      });
      await expect(issuer.validate(later.refreshToken)).resolves.toMatchObject({
        userId: 'user-1',
      });
    });

    it('does not affect other users', async () => {
      const issuer = createIssuer();
      const other = await issuer.generate({ ...subject, userId: 'user-2' });

      nowMs += 1000;
      await issuer.revokeAllForUser('user-1');

      await expect(issuer.validate(other.accessToken)).resolves.toMatchObject({
        userId: 'user-2',
      });
    });

    it('remembers the revocation for the refresh-token lifetime by default', async () => {
      const issuer = createIssuer();

      await issuer.revokeAllForUser('user-1');
      await issuer.revokeAllForUser('user-2', 120);

      expect(redis.ttl(userBlacklistKey('user-1'))).toBe(604800);
      expect(redis.ttl(userBlacklistKey('user-2'))).toBe(120);
    });
  });

  describe('refresh', () => {
    it('mints an access token from current user data', async () => {
      const issuer = createIssuer();
      const pair = await issuer.generate(subject);
      users.set('user-1', {
        email: 'ada@example.org',
        role: 'admin',
        name: 'Ada L.',
        isActive: true,
      });

      nowMs = START + 60 * 1000;
      const refreshed = await issuer.refresh(pair.refreshToken);

      expect(refreshed.accessTokenExpiresAt).toEqual(new Date(START + 60 * 1000 + 3600 * 1000));
      expect(refreshed.claims).toMatchObject({
        userId: 'user-1',
        email: 'ada@example.org',
        role: 'admin',
        name: 'Ada L.',
      });
      await expect(issuer.validateAccessToken(refreshed.accessToken)).resolves.toMatchObject({
        role: 'admin',
      });
    });

    it('fails for unknown users', async () => {
      const issuer = createIssuer();
      const pair = await issuer.generate(subject);
      users.clear();

      await expect(issuer.refresh(pair.refreshToken)).rejects.toBeInstanceOf(UserNotFoundError);
    });

    it('fails for inactive users', async () => {
      const issuer = createIssuer();
      const pair = await issuer.generate(subject);
      users.set('user-1', { email: 'ada@example.com', role: 'user', name: 'Ada', isActive: false });

      await expect(issuer.refresh(pair.refreshToken)).rejects.toBeInstanceOf(UserInactiveError);
    });

    it('does not accept access tokens', async () => {
      const issuer = createIssuer();
      const pair = await issuer.generate(subject);

      await expect(issuer.refresh(pair.accessToken)).rejects.toBeInstanceOf(TokenInvalidError);
    });

    it('does not accept revoked refresh tokens', async () => {
      const issuer = createIssuer();
      const pair = await issuer.generate(subject);
      await issuer.revoke(pair.refreshToken);

      await expect(issuer.refresh(pair.refreshToken)).rejects.toBeInstanceOf(TokenInvalidError);
    });
  });

  describe('revocation cache failures', () => {
    it('fails closed by default after one retry per read', async () => {
      const issuer = createIssuer();
      const pair = await issuer.generate(subject);
      redis.failure = new Error('connection reset');

      await expect(issuer.validate(pair.accessToken)).rejects.toBeInstanceOf(InfrastructureError);
      expect(redis.commands.filter((command) => command.startsWith('exists'))).toHaveLength(2);
      expect(redis.commands.filter((command) => command.startsWith('get'))).toHaveLength(2);
    });

    it('accepts the token when configured to fail open', async () => {
      const issuer = createIssuer({ revocationFailurePolicy: 'fail-open' });
      const pair = await issuer.generate(subject);
      redis.failure = new Error('connection reset');

      await expect(issuer.validate(pair.accessToken)).resolves.toMatchObject({
        userId: 'user-1',
      });
    });

    it('does not retry revocation writes', async () => {
      const issuer = createIssuer();
      const pair = await issuer.generate(subject);
      redis.failure = new Error('connection reset');

      await expect(issuer.revoke(pair.accessToken)).rejects.toBeInstanceOf(InfrastructureError);
      expect(redis.commands).toHaveLength(1);
    });
  });
});
