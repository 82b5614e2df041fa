/**
 * Database migration runner.
 *
 * CREATE ... IF NOT EXISTS for idempotent startup on an embedded database.
 * Keep in step with schema.sqlite.ts.
 */

import { sql } from 'drizzle-orm';
import type { SqliteDb } from './index.js';

export function runMigrations(db: SqliteDb): void {
  db.run(sql`
    CREATE TABLE IF NOT EXISTS account (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      username TEXT NOT NULL,
      email TEXT NOT NULL,
      firstname TEXT NOT NULL,
      lastname TEXT NOT NULL,
      role TEXT NOT NULL DEFAULT 'standard' CHECK (role IN ('admin', 'standard')),
      status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('active', 'pending', 'inactive')),
      confirmation_code TEXT,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    )
  `);
  db.run(sql`CREATE UNIQUE INDEX IF NOT EXISTS idx_account_username ON account(username)`);

  db.run(sql`
    CREATE TABLE IF NOT EXISTS password (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL REFERENCES account(id) ON DELETE CASCADE,
      password TEXT NOT NULL,
      last_password TEXT,
      updated_at INTEGER NOT NULL
    )
  `);
  db.run(sql`CREATE UNIQUE INDEX IF NOT EXISTS idx_password_user_id ON password(user_id)`);

  db.run(sql`
    CREATE TABLE IF NOT EXISTS refresh_token (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      token TEXT NOT NULL,
      account_id INTEGER NOT NULL REFERENCES account(id) ON DELETE CASCADE,
      expires_at INTEGER NOT NULL,
      created_at INTEGER NOT NULL,
      last_used_at INTEGER,
      revoked INTEGER NOT NULL DEFAULT 0
    )
  `);
  db.run(sql`CREATE UNIQUE INDEX IF NOT EXISTS idx_refresh_token_token ON refresh_token(token)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_refresh_token_account_id ON refresh_token(account_id)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_refresh_token_expires_at ON refresh_token(expires_at)`);
}
