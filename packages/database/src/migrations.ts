import { readdir, readFile } from 'node:fs/promises';
import { logger as defaultLogger, type Logger } from '@warden/observability';
import { type TransactionalDatabase, withTransaction } from './client.js';

const MIGRATIONS_DIR = new URL('../sql/', import.meta.url);

const CREATE_MIGRATIONS_TABLE = `CREATE TABLE IF NOT EXISTS schema_migrations (
  name        TEXT PRIMARY KEY,
  applied_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
)`;

export type Migration = {
  name: string;
  sql: string;
};

export async function loadMigrations(directory: URL = MIGRATIONS_DIR): Promise<Migration[]> {
  const entries = await readdir(directory);
  const names = entries.filter((entry) => entry.endsWith('.sql')).sort();

  return Promise.all(
    names.map(async (name) => ({
      name,
      sql: await readFile(new URL(name, directory), 'utf8'),
    }))
  );
}

/**
 * Applies every migration not yet recorded in schema_migrations, in file-name
 * order, each in its own transaction. Returns the names applied.
 */
export async function runMigrations(
  db: TransactionalDatabase,
  options: { migrations?: Migration[]; logger?: Logger } = {}
): Promise<string[]> {
  const log = options.logger ?? defaultLogger;
  const migrations = options.migrations ?? (await loadMigrations());

  await db.query(CREATE_MIGRATIONS_TABLE);
  const { rows } = await db.query<{ name: string }>('SELECT name FROM schema_migrations');
  const applied = new Set(rows.map((row) => row.name));

  const executed: string[] = [];
  for (const migration of migrations) {
    if (applied.has(migration.name)) {
      continue;
    }

    await withTransaction(db, async (client) => {
      await client.query(migration.sql);
      await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [migration.name]);
    });
    log.info({ migration: migration.name }, 'Applied database migration');
    executed.push(migration.name);
  }

  return executed;
}
