export {
  createPool,
  loadDatabaseConfig,
  withTransaction,
  type DatabaseConfig,
  type Queryable,
  type TransactionClient,
  type TransactionalDatabase,
} from './client.js';
export { loadMigrations, runMigrations, type Migration } from './migrations.js';
export type { QueryResult, QueryResultRow } from 'pg';
