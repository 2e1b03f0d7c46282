import pg from 'pg';
import type { Pool, QueryResult, QueryResultRow } from 'pg';
import { z } from 'zod';

/**
 * The one method repositories need. A pg Pool, a checked-out PoolClient and
 * test doubles all satisfy it.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>>;
}

export interface TransactionClient extends Queryable {
  release(err?: Error | boolean): void;
}

/**
 * A database that can hand out a dedicated connection for a transaction.
 */
export interface TransactionalDatabase extends Queryable {
  connect(): Promise<TransactionClient>;
}

export type DatabaseConfig = {
  connectionString: string;
  maxConnections: number;
};

const DatabaseEnvSchema = z.object({
  DATABASE_URL: z
    .string({ required_error: 'DATABASE_URL is required' })
    .regex(/^postgres(ql)?:\/\//, 'DATABASE_URL must be a postgres:// connection string'),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),
});

export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const result = DatabaseEnvSchema.safeParse({
    DATABASE_URL: env.DATABASE_URL,
    DATABASE_POOL_MAX: env.DATABASE_POOL_MAX || undefined,
  });
  if (!result.success) {
    const details = result.error.issues.map((issue) => issue.message).join('; ');
    throw new Error(`Invalid database configuration: ${details}`);
  }

  return {
    connectionString: result.data.DATABASE_URL,
    maxConnections: result.data.DATABASE_POOL_MAX,
  };
}

export function createPool(config: DatabaseConfig = loadDatabaseConfig()): Pool {
  return new pg.Pool({
    connectionString: config.connectionString,
    max: config.maxConnections,
  });
}

/**
 * Runs `work` inside BEGIN/COMMIT on a dedicated connection, rolling back on error.
 */
export async function withTransaction<T>(
  db: TransactionalDatabase,
  work: (client: Queryable) => Promise<T>
): Promise<T> {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}
