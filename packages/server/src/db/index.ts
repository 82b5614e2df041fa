/**
 * SQLite connection for accounts, credentials and refresh tokens.
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.sqlite.js';
import { runMigrations } from './migrate.js';

export type SqliteDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

/** Credential and refresh-token rows cascade with their account only under foreign_keys. */
const CONNECTION_PRAGMAS = [
  'journal_mode = WAL',
  'synchronous = NORMAL',
  'busy_timeout = 5000',
  'foreign_keys = ON',
] as const;

export interface OpenDbOptions {
  /** File path, or ':memory:' */
  path: string;
  /** Create missing tables and indexes (default: true) */
  migrate?: boolean;
}

export function openDb({ path, migrate = true }: OpenDbOptions): SqliteDb {
  const sqlite = new Database(path);
  for (const pragma of CONNECTION_PRAGMAS) sqlite.pragma(pragma);
  const db = drizzle(sqlite, { schema });
  if (migrate) runMigrations(db);
  return db;
}

/** Fresh in-memory database with the schema applied. */
export function createTestDb(): SqliteDb {
  return openDb({ path: ':memory:' });
}

/** Second and later calls do nothing. */
export function closeDb(db: SqliteDb): void {
  if (db.$client.open) db.$client.close();
}
