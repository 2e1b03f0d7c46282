/**
 * Session Service Unit Tests
 *
 * Business logic over the in-memory session repository
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { SessionExpiredError, SessionNotFoundError, TokenReferenceHasher } from '@warden/auth';
import { createLogger } from '@warden/observability';
import { SessionService } from '../session-service.js';
import { InMemorySessionRepository } from '../../testing/in-memory-stores.js';

const START = Date.parse('2026-04-10T08:00:00.000Z');
const TTL_SECONDS = 3600;

describe('SessionService', () => {
  let nowMs: number;
  let repo: InMemorySessionRepository;
  let references: TokenReferenceHasher;
  let revokeAllForUser: Mock<(userId: string, ttlSeconds?: number) => Promise<Date>>;
  let service: SessionService;

  beforeEach(() => {
    nowMs = START;
    repo = new InMemorySessionRepository();
    references = new TokenReferenceHasher('test-secret-for-references');
    revokeAllForUser = vi.fn<(userId: string, ttlSeconds?: number) => Promise<Date>>(
      async () => new Date(nowMs)
    );

    let nextId = 0;
    service = new SessionService({
      repo,
      references,
      tokens: { revokeAllForUser },
      sessionTtlSeconds: TTL_SECONDS,
      logger: createLogger({ level: 'silent' }),
      now: () => new Date(nowMs),
      idFactory: () => `session-${++nextId}`,
    });
  });

  describe('create', () => {
    it('should store only the keyed reference of the refresh token', async () => {
      const session = await service.create({
        userId: 'user-1',
        refreshToken: 'refresh-token-1',
        device: { userAgent: 'Firefox', ipAddress: '203.0.113.7' },
      });

      expect(session).toEqual({
        id: 'session-1',
        userId: 'user-1',
        refreshTokenReference: references.reference('refresh-token-1'),
        userAgent: 'Firefox',
        ipAddress: '203.0.113.7',
        isActive: true,
        expiresAt: new Date(START + TTL_SECONDS * 1000),
        createdAt: new Date(START),
        updatedAt: new Date(START),
      });
      expect(session.refreshTokenReference).not.toBe('refresh-token-1');
    });

    it('should honour a per-session TTL', async () => {
      const session = await service.create({
        userId: 'user-1',
        refreshToken: 'refresh-token-1',
        ttlSeconds: 60,
      });

      expect(session.expiresAt).toEqual(new Date(START + 60_000));
      expect(session.userAgent).toBeNull();
      expect(session.ipAddress).toBeNull();
    });
  });

  describe('getActive / getActiveByRefreshToken', () => {
    it('should find a session by its refresh token', async () => {
      const created = await service.create({ userId: 'user-1', refreshToken: 'refresh-token-1' });

      const found = await service.getActiveByRefreshToken('refresh-token-1');

      expect(found.id).toBe(created.id);
    });

    it('should throw SessionNotFoundError for an unknown token or id', async () => {
      await expect(service.getActiveByRefreshToken('unknown')).rejects.toBeInstanceOf(
        SessionNotFoundError
      );
      await expect(service.getActive('session-404')).rejects.toBeInstanceOf(SessionNotFoundError);
    });

    it('should throw SessionExpiredError once the session has expired', async () => {
      const created = await service.create({ userId: 'user-1', refreshToken: 'refresh-token-1' });

      nowMs = START + TTL_SECONDS * 1000;

      await expect(service.getActive(created.id)).rejects.toBeInstanceOf(SessionExpiredError);
    });

    it('should throw SessionExpiredError for a deactivated session', async () => {
      const created = await service.create({ userId: 'user-1', refreshToken: 'refresh-token-1' });

      await service.deactivate(created.id);

      await expect(service.getActive(created.id)).rejects.toBeInstanceOf(SessionExpiredError);
    });
  });

  describe('deactivate', () => {
    it('should be idempotent', async () => {
      const created = await service.create({ userId: 'user-1', refreshToken: 'refresh-token-1' });

      await service.deactivate(created.id);
      await expect(service.deactivate(created.id)).resolves.toBeUndefined();
    });

    it('should throw SessionNotFoundError for an unknown session', async () => {
      await expect(service.deactivate('session-404')).rejects.toBeInstanceOf(SessionNotFoundError);
    });
  });

  describe('revokeForUser', () => {
    it("should refuse another user's session", async () => {
      const created = await service.create({ userId: 'user-1', refreshToken: 'refresh-token-1' });

      await expect(service.revokeForUser('user-2', created.id)).rejects.toBeInstanceOf(
        SessionNotFoundError
      );
      await expect(service.getActive(created.id)).resolves.toMatchObject({ isActive: true });
    });

    it("should deactivate the user's own session", async () => {
      const created = await service.create({ userId: 'user-1', refreshToken: 'refresh-token-1' });

      await service.revokeForUser('user-1', created.id);

      await expect(service.getActive(created.id)).rejects.toBeInstanceOf(SessionExpiredError);
    });
  });

  describe('deactivateAll', () => {
    it('should end every session and revoke all tokens for the user', async () => {
      await service.create({ userId: 'user-1', refreshToken: 'refresh-token-1' });
      await service.create({ userId: 'user-1', refreshToken: 'refresh-token-2' });
      const other = await service.create({ userId: 'user-2', refreshToken: 'refresh-token-3' });

      const result = await service.deactivateAll('user-1', 120);

      expect(result).toEqual({ sessionsDeactivated: 2, revokedAt: new Date(START) });
      expect(revokeAllForUser).toHaveBeenCalledWith('user-1', 120);
      await expect(service.listActive('user-1')).resolves.toEqual([]);
      await expect(service.getActive(other.id)).resolves.toMatchObject({ userId: 'user-2' });
    });

    it('should be idempotent', async () => {
      await service.create({ userId: 'user-1', refreshToken: 'refresh-token-1' });

      await service.deactivateAll('user-1');
      const second = await service.deactivateAll('user-1');

      expect(second.sessionsDeactivated).toBe(0);
      expect(revokeAllForUser).toHaveBeenCalledTimes(2);
    });
  });

  describe('listActive', () => {
    it('should list live sessions newest first without token references', async () => {
      await service.create({ userId: 'user-1', refreshToken: 'refresh-token-1' });
      nowMs += 1000;
      const ended = await service.create({ userId: 'user-1', refreshToken: 'refresh-token-2' });
      nowMs += 1000;
      await service.create({
        userId: 'user-1',
        refreshToken: 'refresh-token-3',
        device: { userAgent: 'Safari' },
      });
      await service.deactivate(ended.id);

      const sessions = await service.listActive('user-1');

      expect(sessions.map((session) => session.id)).toEqual(['session-3', 'session-1']);
      expect(sessions[0]).toEqual({
        id: 'session-3',
        userAgent: 'Safari',
        ipAddress: null,
        createdAt: new Date(START + 2000),
        expiresAt: new Date(START + 2000 + TTL_SECONDS * 1000),
      });
    });
  });

  describe('purgeExpired', () => {
    it('should delete only sessions past their expiry', async () => {
      await service.create({ userId: 'user-1', refreshToken: 'refresh-token-1', ttlSeconds: 10 });
      await service.create({ userId: 'user-1', refreshToken: 'refresh-token-2' });

      nowMs = START + 10_000;

      await expect(service.purgeExpired()).resolves.toBe(1);
      expect(repo.size).toBe(1);
    });
  });
});
