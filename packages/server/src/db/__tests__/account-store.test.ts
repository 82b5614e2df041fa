import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { eq } from 'drizzle-orm';
import { StoreError } from '@packroom/auth';
import { closeDb, createTestDb, type SqliteDb } from '../index.js';
import { AccountStore, DuplicateUsernameError, generateConfirmationCode, type NewAccount } from '../account-store.js';
import { passwords } from '../schema.sqlite.js';

const T0 = Date.UTC(2026, 3, 1, 9, 0, 0);

function newAccount(username: string, extra: Partial<NewAccount> = {}): NewAccount {
  return {
    username,
    email: `${username}@example.test`,
    firstname: 'Test',
    lastname: 'User',
    passwordHash: `hash-of-${username}`,
    ...extra,
  };
}

describe('AccountStore', () => {
  let db: SqliteDb;
  let now: number;
  let accounts: AccountStore;

  beforeEach(() => {
    db = createTestDb();
    now = T0;
    accounts = new AccountStore(db, { clock: () => now });
  });

  afterEach(() => {
    closeDb(db);
  });

  it('generates 30-character URL-safe confirmation codes', () => {
    expect(generateConfirmationCode()).toMatch(/^[A-Za-z0-9_-]{30}$/);
  });

  describe('register', () => {
    it('creates a pending standard account with its credential', async () => {
      const { account, confirmationCode } = await accounts.register(newAccount('alice'));

      expect(account).toEqual({
        id: 1,
        username: 'alice',
        email: 'alice@example.test',
        firstname: 'Test',
        lastname: 'User',
        role: 'standard',
        status: 'pending',
        createdAt: new Date(T0),
        updatedAt: new Date(T0),
      });
      expect(confirmationCode).toHaveLength(30);
      await expect(accounts.findByUsername('alice')).resolves.toEqual({
        accountId: 1,
        status: 'pending',
        passwordHash: 'hash-of-alice',
      });
    });

    it('rejects a taken username and leaves the first account intact', async () => {
      await accounts.register(newAccount('alice'));
      await expect(accounts.register(newAccount('alice', { email: 'other@example.test' }))).rejects.toBeInstanceOf(
        DuplicateUsernameError,
      );
      await expect(accounts.list()).resolves.toHaveLength(1);
    });

    it('stores the requested role', async () => {
      const { account } = await accounts.register(newAccount('root', { role: 'admin' }));
      await expect(accounts.findRole(account.id)).resolves.toBe('admin');
    });
  });

  describe('confirm', () => {
    it('activates a pending account once', async () => {
      const { account, confirmationCode } = await accounts.register(newAccount('alice'));

      await expect(accounts.confirm(account.id, 'wrong-code')).resolves.toBe(false);
      await expect(accounts.confirm(account.id, confirmationCode)).resolves.toBe(true);
      await expect(accounts.confirm(account.id, confirmationCode)).resolves.toBe(false);

      const found = await accounts.findById(account.id);
      expect(found?.status).toBe('active');
    });

    it('does not match a code against another account', async () => {
      const { confirmationCode } = await accounts.register(newAccount('alice'));
      const { account: bob } = await accounts.register(newAccount('bob'));
      await expect(accounts.confirm(bob.id, confirmationCode)).resolves.toBe(false);
    });
  });

  it('findByUsername and findRole resolve null for unknown accounts', async () => {
    await expect(accounts.findByUsername('nobody')).resolves.toBeNull();
    await expect(accounts.findRole(42)).resolves.toBeNull();
    await expect(accounts.findById(42)).resolves.toBeNull();
  });

  it('lists accounts in id order', async () => {
    await accounts.register(newAccount('carol'));
    await accounts.register(newAccount('alice'));
    const list = await accounts.list();
    expect(list.map((a) => a.username)).toEqual(['carol', 'alice']);
  });

  describe('updatePassword', () => {
    it('replaces the hash and keeps the previous one', async () => {
      const { account } = await accounts.register(newAccount('alice'));
      now += 60_000;

      await expect(accounts.updatePassword(account.id, 'new-hash')).resolves.toBe(true);
      await expect(accounts.getPasswordHash(account.id)).resolves.toBe('new-hash');

      const row = db.select().from(passwords).where(eq(passwords.userId, account.id)).get();
      expect(row?.lastPassword).toBe('hash-of-alice');
      expect(row?.updatedAt).toEqual(new Date(T0 + 60_000));
    });

    it('resolves false for an unknown account', async () => {
      await expect(accounts.updatePassword(42, 'new-hash')).resolves.toBe(false);
      await expect(accounts.getPasswordHash(42)).resolves.toBeNull();
    });
  });

  it('setStatus updates the status and timestamp', async () => {
    const { account } = await accounts.register(newAccount('alice'));
    now += 1_000;

    await expect(accounts.setStatus(account.id, 'inactive')).resolves.toBe(true);
    const found = await accounts.findById(account.id);
    expect(found?.status).toBe('inactive');
    expect(found?.updatedAt).toEqual(new Date(T0 + 1_000));
    await expect(accounts.setStatus(42, 'active')).resolves.toBe(false);
  });

  it('wraps driver failures in StoreError', async () => {
    db.$client.close();
    await expect(accounts.findByUsername('alice')).rejects.toBeInstanceOf(StoreError);
    await expect(accounts.list()).rejects.toBeInstanceOf(StoreError);
  });
});
