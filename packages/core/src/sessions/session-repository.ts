import { InfrastructureGuard } from '@warden/auth-core';
import type { Queryable } from '@warden/database';
import type { Session } from './session-types.js';

export interface SessionRecordStore {
  insert(session: Session): Promise<Session>;
  findById(id: string): Promise<Session | null>;
  findByRefreshTokenReference(reference: string): Promise<Session | null>;
  listActiveForUser(userId: string, now: Date): Promise<Session[]>;
  /** Resolves false when no session has this id */
  deactivate(id: string, at: Date): Promise<boolean>;
  deactivateAllForUser(userId: string, at: Date): Promise<number>;
  deleteExpired(now: Date): Promise<number>;
}

type SessionRow = {
  id: string;
  user_id: string;
  refresh_token_reference: string;
  user_agent: string | null;
  ip_address: string | null;
  is_active: boolean;
  expires_at: Date;
  created_at: Date;
  updated_at: Date;
};

const SESSION_COLUMNS =
  'id, user_id, refresh_token_reference, user_agent, ip_address, is_active, expires_at, created_at, updated_at';

function toSession(row: SessionRow): Session {
  return {
    id: row.id,
    userId: row.user_id,
    refreshTokenReference: row.refresh_token_reference,
    userAgent: row.user_agent,
    ipAddress: row.ip_address,
    isActive: row.is_active,
    expiresAt: row.expires_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class PgSessionRepository implements SessionRecordStore {
  constructor(
    private readonly db: Queryable,
    private readonly guard: InfrastructureGuard = new InfrastructureGuard()
  ) {}

  async insert(session: Session): Promise<Session> {
    const { rows } = await this.guard.write('sessions.insert', () =>
      this.db.query<SessionRow>(
        `INSERT INTO auth_sessions (${SESSION_COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         RETURNING ${SESSION_COLUMNS}`,
        [
          session.id,
          session.userId,
          session.refreshTokenReference,
          session.userAgent,
          session.ipAddress,
          session.isActive,
          session.expiresAt,
          session.createdAt,
          session.updatedAt,
        ]
      )
    );
    const [row] = rows;
    return row ? toSession(row) : session;
  }

  async findById(id: string): Promise<Session | null> {
    const { rows } = await this.guard.read('sessions.findById', () =>
      this.db.query<SessionRow>(`SELECT ${SESSION_COLUMNS} FROM auth_sessions WHERE id = $1`, [id])
    );
    const [row] = rows;
    return row ? toSession(row) : null;
  }

  async findByRefreshTokenReference(reference: string): Promise<Session | null> {
    const { rows } = await this.guard.read('sessions.findByRefreshTokenReference', () =>
      this.db.query<SessionRow>(
        `SELECT ${SESSION_COLUMNS} FROM auth_sessions WHERE refresh_token_reference = $1`,
        [reference]
      )
    );
    const [row] = rows;
    return row ? toSession(row) : null;
  }

  async listActiveForUser(userId: string, now: Date): Promise<Session[]> {
    const { rows } = await this.guard.read('sessions.listActiveForUser', () =>
      this.db.query<SessionRow>(
        `SELECT ${SESSION_COLUMNS} FROM auth_sessions
         WHERE user_id = $1 AND is_active AND expires_at > $2
         ORDER BY created_at DESC`,
        [userId, now]
      )
    );
    return rows.map(toSession);
  }

  async deactivate(id: string, at: Date): Promise<boolean> {
    const { rowCount } = await this.guard.write('sessions.deactivate', () =>
      this.db.query(
        'UPDATE auth_sessions SET is_active = FALSE, updated_at = $2 WHERE id = $1',
        [id, at]
      )
    );
    return (rowCount ?? 0) > 0;
  }

  async deactivateAllForUser(userId: string, at: Date): Promise<number> {
    const { rowCount } = await this.guard.write('sessions.deactivateAllForUser', () =>
      this.db.query(
        'UPDATE auth_sessions SET is_active = FALSE, updated_at = $2 WHERE user_id = $1 AND is_active',
        [userId, at]
      )
    );
    return rowCount ?? 0;
  }

  async deleteExpired(now: Date): Promise<number> {
    const { rowCount } = await this.guard.write('sessions.deleteExpired', () =>
      this.db.query('DELETE FROM auth_sessions WHERE expires_at <= $1', [now])
    );
    return rowCount ?? 0;
  }
}
