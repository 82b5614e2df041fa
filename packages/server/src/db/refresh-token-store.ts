/**
 * SQLite-backed RefreshTokenStore.
 *
 * better-sqlite3 runs each statement synchronously, so cancellation is
 * checked before the statement starts; a statement in flight completes.
 */

import { eq, lt } from 'drizzle-orm';
import {
  NotFoundError,
  StoreError,
  generateRefreshToken,
  refreshTokenLifetimeSeconds,
  systemClock,
  type Clock,
  type QueryOptions,
  type RefreshTokenRecord,
  type RefreshTokenStore,
  type TokenLifetimePolicy,
} from '@packroom/auth';
import type { SqliteDb } from './index.js';
import { refreshTokens, type RefreshTokenRow } from './schema.sqlite.js';

function toRecord(row: RefreshTokenRow): RefreshTokenRecord {
  return {
    id: row.id,
    token: row.token,
    accountId: row.accountId,
    expiresAt: row.expiresAt,
    createdAt: row.createdAt,
    lastUsedAt: row.lastUsedAt,
    revoked: row.revoked,
  };
}

/** Run a statement, wrapping driver failures with the operation that failed. */
function guarded<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof NotFoundError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new StoreError(`${operation}: ${reason}`, { cause: err });
  }
}

export class SqliteRefreshTokenStore implements RefreshTokenStore {
  private readonly clock: Clock;

  constructor(
    private readonly db: SqliteDb,
    private readonly policy: TokenLifetimePolicy,
    opts: { clock?: Clock } = {},
  ) {
    this.clock = opts.clock ?? systemClock;
  }

  async create(accountId: number, extended: boolean, opts?: QueryOptions): Promise<RefreshTokenRecord> {
    opts?.signal?.throwIfAborted();
    const now = this.clock();
    const lifetimeMs = refreshTokenLifetimeSeconds(extended, this.policy) * 1000;

    const row = guarded('create refresh token', () =>
      this.db
        .insert(refreshTokens)
        .values({
          token: generateRefreshToken(),
          accountId,
          expiresAt: new Date(now + lifetimeMs),
          createdAt: new Date(now),
          revoked: false,
        })
        .returning()
        .get(),
    );
    return toRecord(row);
  }

  async get(token: string, opts?: QueryOptions): Promise<RefreshTokenRecord> {
    opts?.signal?.throwIfAborted();
    const row = guarded('get refresh token', () =>
      this.db.select().from(refreshTokens).where(eq(refreshTokens.token, token)).get(),
    );
    if (!row) throw new NotFoundError('refresh token not found');
    return toRecord(row);
  }

  async touch(id: number, opts?: QueryOptions): Promise<void> {
    opts?.signal?.throwIfAborted();
    guarded('update refresh token last_used_at', () =>
      this.db
        .update(refreshTokens)
        .set({ lastUsedAt: new Date(this.clock()) })
        .where(eq(refreshTokens.id, id))
        .run(),
    );
  }

  async revoke(token: string, opts?: QueryOptions): Promise<void> {
    opts?.signal?.throwIfAborted();
    const result = guarded('revoke refresh token', () =>
      this.db.delete(refreshTokens).where(eq(refreshTokens.token, token)).run(),
    );
    if (result.changes === 0) throw new NotFoundError('refresh token not found');
  }

  async sweep(opts?: QueryOptions): Promise<number> {
    opts?.signal?.throwIfAborted();
    const cutoff = new Date(this.clock());
    const result = guarded('sweep expired refresh tokens', () =>
      this.db.delete(refreshTokens).where(lt(refreshTokens.expiresAt, cutoff)).run(),
    );
    return result.changes;
  }
}
