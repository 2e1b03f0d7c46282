import { TOKEN_BLACKLIST_KEY_PREFIX, USER_BLACKLIST_KEY_PREFIX } from '@warden/auth';
import { Redis } from '@upstash/redis';

/**
 * Blacklist of individual tokens plus per-user "revoked before" timestamps.
 * Entries expire on their own; nothing needs to be cleaned up.
 */
export interface RevocationStore {
  revokeToken(tokenFingerprint: string, ttlSeconds: number): Promise<void>;
  isTokenRevoked(tokenFingerprint: string): Promise<boolean>;
  revokeUser(userId: string, revokedAtMs: number, ttlSeconds: number): Promise<void>;
  getUserRevokedAt(userId: string): Promise<number | null>;
}

/**
 * The subset of Redis commands the revocation store issues.
 * Satisfied by the Upstash REST client and by MockRedis in tests.
 */
export interface RevocationCacheClient {
  set(key: string, value: string, options: { ex: number }): Promise<unknown>;
  get(key: string): Promise<unknown>;
  exists(...keys: string[]): Promise<number>;
}

export function tokenBlacklistKey(tokenFingerprint: string): string {
  return `${TOKEN_BLACKLIST_KEY_PREFIX}${tokenFingerprint}`;
}

export function userBlacklistKey(userId: string): string {
  return `${USER_BLACKLIST_KEY_PREFIX}${userId}`;
}

// Upstash deserializes JSON, so a stored "1700000000000" may come back as a number
function parseTimestamp(raw: unknown): number | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }
  if (typeof raw === 'string' && /^\d+$/.test(raw)) {
    return Number.parseInt(raw, 10);
  }
  return null;
}

export class RedisRevocationStore implements RevocationStore {
  constructor(private readonly client: RevocationCacheClient) {}

  async revokeToken(tokenFingerprint: string, ttlSeconds: number): Promise<void> {
    await this.client.set(tokenBlacklistKey(tokenFingerprint), '1', { ex: ttlSeconds });
  }

  async isTokenRevoked(tokenFingerprint: string): Promise<boolean> {
    return (await this.client.exists(tokenBlacklistKey(tokenFingerprint))) > 0;
  }

  async revokeUser(userId: string, revokedAtMs: number, ttlSeconds: number): Promise<void> {
    await this.client.set(userBlacklistKey(userId), String(revokedAtMs), { ex: ttlSeconds });
  }

  async getUserRevokedAt(userId: string): Promise<number | null> {
    return parseTimestamp(await this.client.get(userBlacklistKey(userId)));
  }
}

export function createUpstashRevocationStore(options: {
  url: string;
  token: string;
}): RedisRevocationStore {
  return new RedisRevocationStore(new Redis({ url: options.url, token: options.token }));
}
