/**
 * User Repository
 *
 * Data access layer for user records
 * Pure SQL over pg with no business logic
 */

import { UserAlreadyExistsError } from '@warden/auth';
import { InfrastructureGuard, type UserClaimsRecord, type UserClaimsSource } from '@warden/auth-core';
import type { Queryable } from '@warden/database';
import { UserRoleSchema } from '@warden/types';
import type { CreateUserData, UserRecord, UserRole } from './user-types.js';

export interface UserRecordStore extends UserClaimsSource {
  /** Throws UserAlreadyExistsError when the email is taken */
  create(data: CreateUserData): Promise<UserRecord>;
  findById(id: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  updatePasswordHash(id: string, passwordHash: string, at: Date): Promise<void>;
  markVerified(id: string, at: Date): Promise<void>;
  recordLogin(id: string, at: Date): Promise<void>;
}

type UserRow = {
  id: string;
  email: string;
  password_hash: string;
  name: string;
  role: string;
  is_active: boolean;
  is_verified: boolean;
  last_login_at: Date | null;
  created_at: Date;
  updated_at: Date;
};

const USER_COLUMNS =
  'id, email, password_hash, name, role, is_active, is_verified, last_login_at, created_at, updated_at';

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}

function toRole(row: UserRow): UserRole {
  const parsed = UserRoleSchema.safeParse(row.role);
  if (!parsed.success) {
    throw new Error(`User ${row.id} has unknown role "${row.role}"`);
  }
  return parsed.data;
}

function toUserRecord(row: UserRow): UserRecord {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    name: row.name,
    role: toRole(row),
    isActive: row.is_active,
    isVerified: row.is_verified,
    lastLoginAt: row.last_login_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class PgUserRepository implements UserRecordStore {
  constructor(
    private readonly db: Queryable,
    private readonly guard: InfrastructureGuard = new InfrastructureGuard()
  ) {}

  async create(data: CreateUserData): Promise<UserRecord> {
    const { rows } = await this.guard.write('users.create', async () => {
      try {
        return await this.db.query<UserRow>(
          `INSERT INTO users (id, email, password_hash, name, role, created_at, updated_at)
           VALUES ($1, $2, $3, $4, $5, $6, $6)
           RETURNING ${USER_COLUMNS}`,
          [data.id, data.email, data.passwordHash, data.name, data.role, data.createdAt]
        );
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new UserAlreadyExistsError();
        }
        throw error;
      }
    });

    const [row] = rows;
    if (!row) {
      throw new Error('INSERT INTO users returned no row');
    }
    return toUserRecord(row);
  }

  async findById(id: string): Promise<UserRecord | null> {
    const { rows } = await this.guard.read('users.findById', () =>
      this.db.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id])
    );
    const [row] = rows;
    return row ? toUserRecord(row) : null;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const { rows } = await this.guard.read('users.findByEmail', () =>
      this.db.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE email = $1`, [
        email.toLowerCase(),
      ])
    );
    const [row] = rows;
    return row ? toUserRecord(row) : null;
  }

  async findClaimsById(userId: string): Promise<UserClaimsRecord | null> {
    const user = await this.findById(userId);
    if (!user) {
      return null;
    }
    return { email: user.email, role: user.role, name: user.name, isActive: user.isActive };
  }

  async updatePasswordHash(id: string, passwordHash: string, at: Date): Promise<void> {
    await this.guard.write('users.updatePasswordHash', () =>
      this.db.query('UPDATE users SET password_hash = $2, updated_at = $3 WHERE id = $1', [
        id,
        passwordHash,
        at,
      ])
    );
  }

  async markVerified(id: string, at: Date): Promise<void> {
    await this.guard.write('users.markVerified', () =>
      this.db.query('UPDATE users SET is_verified = TRUE, updated_at = $2 WHERE id = $1', [id, at])
    );
  }

  async recordLogin(id: string, at: Date): Promise<void> {
    await this.guard.write('users.recordLogin', () =>
      this.db.query('UPDATE users SET last_login_at = $2, updated_at = $2 WHERE id = $1', [id, at])
    );
  }
}
