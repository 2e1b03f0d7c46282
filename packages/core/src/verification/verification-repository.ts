/**
 * Verification Repository
 *
 * Data access layer for verification tokens
 * Pure SQL over pg with no business logic
 */

import { InfrastructureGuard } from '@warden/auth-core';
import type { Queryable } from '@warden/database';
import type { VerificationTokenRecord, VerificationTokenType } from './verification-types.js';

export interface VerificationTokenRecordStore {
  insert(record: VerificationTokenRecord): Promise<void>;
  findByReference(tokenReference: string): Promise<VerificationTokenRecord | null>;
  /**
   * Atomically marks an unused, unexpired token as used.
   * Resolves null when another consumer got there first or the token expired.
   */
  consume(tokenReference: string, now: Date): Promise<VerificationTokenRecord | null>;
  /** Marks every outstanding token of the type as used */
  invalidateOutstanding(userId: string, type: VerificationTokenType, now: Date): Promise<number>;
  deleteExpired(now: Date): Promise<number>;
}

type VerificationTokenRow = {
  id: string;
  user_id: string;
  token_reference: string;
  type: VerificationTokenType;
  expires_at: Date;
  is_used: boolean;
  used_at: Date | null;
  created_at: Date;
};

const TOKEN_COLUMNS = 'id, user_id, token_reference, type, expires_at, is_used, used_at, created_at';

function toRecord(row: VerificationTokenRow): VerificationTokenRecord {
  return {
    id: row.id,
    userId: row.user_id,
    tokenReference: row.token_reference,
    type: row.type,
    expiresAt: row.expires_at,
    isUsed: row.is_used,
    usedAt: row.used_at,
    createdAt: row.created_at,
  };
}

export class PgVerificationRepository implements VerificationTokenRecordStore {
  constructor(
    private readonly db: Queryable,
    private readonly guard: InfrastructureGuard = new InfrastructureGuard()
  ) {}

  async insert(record: VerificationTokenRecord): Promise<void> {
    await this.guard.write('verification.insert', () =>
      this.db.query(
        `INSERT INTO verification_tokens (${TOKEN_COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
        [
          record.id,
          record.userId,
          record.tokenReference,
          record.type,
          record.expiresAt,
          record.isUsed,
          record.usedAt,
          record.createdAt,
        ]
      )
    );
  }

  async findByReference(tokenReference: string): Promise<VerificationTokenRecord | null> {
    const { rows } = await this.guard.read('verification.findByReference', () =>
      this.db.query<VerificationTokenRow>(
        `SELECT ${TOKEN_COLUMNS} FROM verification_tokens WHERE token_reference = $1`,
        [tokenReference]
      )
    );
    const [row] = rows;
    return row ? toRecord(row) : null;
  }

  async consume(tokenReference: string, now: Date): Promise<VerificationTokenRecord | null> {
    // Single conditional UPDATE: concurrent consumers race on the row lock, one wins
    const { rows } = await this.guard.write('verification.consume', () =>
      this.db.query<VerificationTokenRow>(
        `UPDATE verification_tokens
         SET is_used = TRUE, used_at = $2
         WHERE token_reference = $1 AND is_used = FALSE AND expires_at > $2
         RETURNING ${TOKEN_COLUMNS}`,
        [tokenReference, now]
      )
    );
    const [row] = rows;
    return row ? toRecord(row) : null;
  }

  async invalidateOutstanding(
    userId: string,
    type: VerificationTokenType,
    now: Date
  ): Promise<number> {
    const { rowCount } = await this.guard.write('verification.invalidateOutstanding', () =>
      this.db.query(
        `UPDATE verification_tokens
         SET is_used = TRUE, used_at = $3
         WHERE user_id = $1 AND type = $2 AND is_used = FALSE`,
        [userId, type, now]
      )
    );
    return rowCount ?? 0;
  }

  async deleteExpired(now: Date): Promise<number> {
    const { rowCount } = await this.guard.write('verification.deleteExpired', () =>
      this.db.query('DELETE FROM verification_tokens WHERE expires_at <= $1 OR is_used', [now])
    );
    return rowCount ?? 0;
  }
}
