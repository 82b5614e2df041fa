/**
 * Account and credential queries.
 *
 * Implements the CredentialLookup consumed by TokenPairService and the role
 * lookup behind the admin gate.
 */

import { randomBytes } from 'node:crypto';
import { and, asc, eq } from 'drizzle-orm';
import {
  StoreError,
  systemClock,
  type AccountRole,
  type AccountStatus,
  type Clock,
  type CredentialLookup,
  type QueryOptions,
  type StoredCredential,
} from '@packroom/auth';
import type { SqliteDb } from './index.js';
import { accounts, passwords, type AccountRow } from './schema.sqlite.js';

const CONFIRMATION_CODE_LENGTH = 30;

/** Account fields that are safe to return to clients. */
export interface AccountView {
  id: number;
  username: string;
  email: string;
  firstname: string;
  lastname: string;
  role: AccountRole;
  status: AccountStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewAccount {
  username: string;
  email: string;
  firstname: string;
  lastname: string;
  passwordHash: string;
  role?: AccountRole;
}

export class DuplicateUsernameError extends Error {
  constructor(username: string) {
    super(`Username '${username}' is already taken`);
    this.name = 'DuplicateUsernameError';
  }
}

function toView(row: AccountRow): AccountView {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    firstname: row.firstname,
    lastname: row.lastname,
    role: row.role,
    status: row.status,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function wrap(operation: string, err: unknown): StoreError {
  const reason = err instanceof Error ? err.message : String(err);
  return new StoreError(`${operation}: ${reason}`, { cause: err });
}

export function generateConfirmationCode(): string {
  return randomBytes(CONFIRMATION_CODE_LENGTH).toString('base64url').slice(0, CONFIRMATION_CODE_LENGTH);
}

export class AccountStore implements CredentialLookup {
  private readonly clock: Clock;

  constructor(
    private readonly db: SqliteDb,
    opts: { clock?: Clock } = {},
  ) {
    this.clock = opts.clock ?? systemClock;
  }

  async findByUsername(username: string, opts?: QueryOptions): Promise<StoredCredential | null> {
    opts?.signal?.throwIfAborted();
    try {
      const row = this.db
        .select({
          accountId: accounts.id,
          status: accounts.status,
          passwordHash: passwords.password,
        })
        .from(accounts)
        .innerJoin(passwords, eq(passwords.userId, accounts.id))
        .where(eq(accounts.username, username))
        .get();
      return row ?? null;
    } catch (err) {
      throw wrap('find credential by username', err);
    }
  }

  async findRole(accountId: number, opts?: QueryOptions): Promise<AccountRole | null> {
    opts?.signal?.throwIfAborted();
    try {
      const row = this.db
        .select({ role: accounts.role })
        .from(accounts)
        .where(eq(accounts.id, accountId))
        .get();
      return row?.role ?? null;
    } catch (err) {
      throw wrap('find account role', err);
    }
  }

  async findById(accountId: number, opts?: QueryOptions): Promise<AccountView | null> {
    opts?.signal?.throwIfAborted();
    try {
      const row = this.db.select().from(accounts).where(eq(accounts.id, accountId)).get();
      return row ? toView(row) : null;
    } catch (err) {
      throw wrap('find account', err);
    }
  }

  async list(opts?: QueryOptions): Promise<AccountView[]> {
    opts?.signal?.throwIfAborted();
    try {
      return this.db.select().from(accounts).orderBy(asc(accounts.id)).all().map(toView);
    } catch (err) {
      throw wrap('list accounts', err);
    }
  }

  /**
   * Create a pending account with its credential. Returns the new account and
   * the code that confirms it.
   *
   * @throws DuplicateUsernameError when the username is taken
   */
  async register(
    input: NewAccount,
    opts?: QueryOptions,
  ): Promise<{ account: AccountView; confirmationCode: string }> {
    opts?.signal?.throwIfAborted();
    const now = new Date(this.clock());
    const confirmationCode = generateConfirmationCode();

    try {
      const row = this.db.transaction((tx) => {
        const existing = tx
          .select({ id: accounts.id })
          .from(accounts)
          .where(eq(accounts.username, input.username))
          .get();
        if (existing) throw new DuplicateUsernameError(input.username);

        const account = tx
          .insert(accounts)
          .values({
            username: input.username,
            email: input.email,
            firstname: input.firstname,
            lastname: input.lastname,
            role: input.role ?? 'standard',
            status: 'pending',
            confirmationCode,
            createdAt: now,
            updatedAt: now,
          })
          .returning()
          .get();

        tx.insert(passwords)
          .values({ userId: account.id, password: input.passwordHash, updatedAt: now })
          .run();

        return account;
      });
      return { account: toView(row), confirmationCode };
    } catch (err) {
      if (err instanceof DuplicateUsernameError) throw err;
      throw wrap('register account', err);
    }
  }

  /**
   * Activate a pending account. Resolves false when the id/code pair does not
   * match a pending account.
   */
  async confirm(accountId: number, code: string, opts?: QueryOptions): Promise<boolean> {
    opts?.signal?.throwIfAborted();
    try {
      const result = this.db
        .update(accounts)
        .set({ status: 'active', confirmationCode: null, updatedAt: new Date(this.clock()) })
        .where(
          and(
            eq(accounts.id, accountId),
            eq(accounts.status, 'pending'),
            eq(accounts.confirmationCode, code),
          ),
        )
        .run();
      return result.changes > 0;
    } catch (err) {
      throw wrap('confirm account', err);
    }
  }

  async getPasswordHash(accountId: number, opts?: QueryOptions): Promise<string | null> {
    opts?.signal?.throwIfAborted();
    try {
      const row = this.db
        .select({ password: passwords.password })
        .from(passwords)
        .where(eq(passwords.userId, accountId))
        .get();
      return row?.password ?? null;
    } catch (err) {
      throw wrap('read credential', err);
    }
  }

  /** Replace the credential, keeping the previous hash in last_password. */
  async updatePassword(accountId: number, passwordHash: string, opts?: QueryOptions): Promise<boolean> {
    opts?.signal?.throwIfAborted();
    try {
      const changed = this.db.transaction((tx) => {
        const current = tx
          .select({ password: passwords.password })
          .from(passwords)
          .where(eq(passwords.userId, accountId))
          .get();
        if (!current) return false;
        tx.update(passwords)
          .set({ password: passwordHash, lastPassword: current.password, updatedAt: new Date(this.clock()) })
          .where(eq(passwords.userId, accountId))
          .run();
        return true;
      });
      return changed;
    } catch (err) {
      throw wrap('update credential', err);
    }
  }

  /** Resolves false when no account has this id. */
  async setStatus(accountId: number, status: AccountStatus, opts?: QueryOptions): Promise<boolean> {
    opts?.signal?.throwIfAborted();
    try {
      const result = this.db
        .update(accounts)
        .set({ status, updatedAt: new Date(this.clock()) })
        .where(eq(accounts.id, accountId))
        .run();
      return result.changes > 0;
    } catch (err) {
      throw wrap('update account status', err);
    }
  }
}
