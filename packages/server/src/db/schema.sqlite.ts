/**
 * SQLite schema — defined with Drizzle ORM.
 *
 * Tables: account, password, refresh_token.
 * Timestamps are epoch milliseconds and surface as Date.
 */

import { sqliteTable, text, integer, index, uniqueIndex } from 'drizzle-orm/sqlite-core';

export const ACCOUNT_ROLES = ['admin', 'standard'] as const;
export const ACCOUNT_STATUSES = ['active', 'pending', 'inactive'] as const;

// ─── Account Table ────────────────────────────────────────
export const accounts = sqliteTable(
  'account',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    username: text('username').notNull(),
    email: text('email').notNull(),
    firstname: text('firstname').notNull(),
    lastname: text('lastname').notNull(),
    role: text('role', { enum: ACCOUNT_ROLES }).notNull().default('standard'),
    status: text('status', { enum: ACCOUNT_STATUSES }).notNull().default('pending'),
    confirmationCode: text('confirmation_code'),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [uniqueIndex('idx_account_username').on(table.username)],
);

// ─── Password Table (one credential per account) ──────────
export const passwords = sqliteTable(
  'password',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    userId: integer('user_id')
      .notNull()
      .references(() => accounts.id, { onDelete: 'cascade' }),
    password: text('password').notNull(),
    lastPassword: text('last_password'),
    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [uniqueIndex('idx_password_user_id').on(table.userId)],
);

// ─── Refresh Token Table ──────────────────────────────────
export const refreshTokens = sqliteTable(
  'refresh_token',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    token: text('token').notNull(),
    accountId: integer('account_id')
      .notNull()
      .references(() => accounts.id, { onDelete: 'cascade' }),
    expiresAt: integer('expires_at', { mode: 'timestamp_ms' }).notNull(),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    lastUsedAt: integer('last_used_at', { mode: 'timestamp_ms' }),
    revoked: integer('revoked', { mode: 'boolean' }).notNull().default(false),
  },
  (table) => [
    uniqueIndex('idx_refresh_token_token').on(table.token),
    index('idx_refresh_token_account_id').on(table.accountId),
    index('idx_refresh_token_expires_at').on(table.expiresAt),
  ],
);

export type AccountRow = typeof accounts.$inferSelect;
export type RefreshTokenRow = typeof refreshTokens.$inferSelect;
