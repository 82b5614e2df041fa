import { describe, it, expect, beforeAll, beforeEach, vi } from 'vitest';
import { AccessTokenCodec } from '../jwt.js';
import { hashPassword } from '../passwords.js';
import { AuthError, NotFoundError } from '../errors.js';
import {
  generateRefreshToken,
  isRefreshTokenUsable,
  refreshTokenLifetimeSeconds,
  type RefreshTokenRecord,
  type RefreshTokenStore,
} from '../refresh-tokens.js';
import { TokenPairService, type CredentialLookup, type StoredCredential } from '../token-pair.js';
import { DEFAULT_TOKEN_POLICY } from '../types.js';

const T0 = Date.UTC(2026, 2, 1, 12);
const DAY_MS = 86_400_000;

let now: number;
const clock = () => now;

// ── In-memory refresh token store ────────────────────────────────────
function memStore(): RefreshTokenStore & { rows: Map<string, RefreshTokenRecord> } {
  const rows = new Map<string, RefreshTokenRecord>();
  let nextId = 1;
  return {
    rows,
    async create(accountId, extended) {
      const lifetimeMs = refreshTokenLifetimeSeconds(extended, DEFAULT_TOKEN_POLICY) * 1000;
      const record: RefreshTokenRecord = {
        id: nextId++,
        token: generateRefreshToken(),
        accountId,
        createdAt: new Date(now),
        expiresAt: new Date(now + lifetimeMs),
        lastUsedAt: null,
        revoked: false,
      };
      rows.set(record.token, record);
      return { ...record };
    },
    async get(token) {
      const row = rows.get(token);
      if (!row) throw new NotFoundError('refresh token not found');
      return { ...row };
    },
    async touch(id) {
      for (const row of rows.values()) {
        if (row.id === id) row.lastUsedAt = new Date(now);
      }
    },
    async revoke(token) {
      if (!rows.delete(token)) throw new NotFoundError('refresh token not found');
    },
    async sweep() {
      let removed = 0;
      for (const [token, row] of rows) {
        if (row.expiresAt.getTime() < now) {
          rows.delete(token);
          removed++;
        }
      }
      return removed;
    },
  };
}

let activeHash: string;

function credentials(accounts: Record<string, StoredCredential>): CredentialLookup {
  return {
    async findByUsername(username) {
      return accounts[username] ?? null;
    },
  };
}

let store: ReturnType<typeof memStore>;
let codec: AccessTokenCodec;
let service: TokenPairService;

beforeAll(async () => {
  activeHash = await hashPassword('password-123');
});

beforeEach(() => {
  now = T0;
  store = memStore();
  codec = new AccessTokenCodec(() => 'test-secret', { lifetimeSeconds: 900, clock });
  service = new TokenPairService({
    credentials: credentials({
      alice: { accountId: 7, passwordHash: activeHash, status: 'active' },
      bob: { accountId: 8, passwordHash: activeHash, status: 'pending' },
      carol: { accountId: 9, passwordHash: 'corrupt', status: 'active' },
    }),
    refreshTokens: store,
    codec,
    policy: DEFAULT_TOKEN_POLICY,
    clock,
  });
});

describe('TokenPairService.login', () => {
  it('issues a pair with a one-day refresh token', async () => {
    const pair = await service.login('alice', 'password-123', false);

    expect(pair.accountId).toBe(7);
    expect(pair.token).toBe(pair.accessToken);
    expect(pair.accessExpiresIn).toBe(900);
    expect(pair.refreshExpiresIn).toBe(86_400);
    await expect(codec.extractSubjectId(pair.accessToken)).resolves.toBe(7);

    const row = store.rows.get(pair.refreshToken);
    expect(row?.accountId).toBe(7);
    expect(row?.expiresAt.getTime()).toBe(T0 + DAY_MS);
  });

  it('extends the refresh token with remember-me', async () => {
    const pair = await service.login('alice', 'password-123', true);
    expect(pair.refreshExpiresIn).toBe(30 * 86_400);
    expect(store.rows.get(pair.refreshToken)?.expiresAt.getTime()).toBe(T0 + 30 * DAY_MS);
  });

  it('issues a distinct refresh token per login', async () => {
    const a = await service.login('alice', 'password-123', false);
    const b = await service.login('alice', 'password-123', false);
    expect(a.refreshToken).not.toBe(b.refreshToken);
    expect(store.rows.size).toBe(2);
  });

  it('rejects a wrong password and names the account', async () => {
    await expect(service.login('alice', 'wrong-password', false)).rejects.toMatchObject({
      code: 'invalid_credentials',
      accountId: 7,
    });
    expect(store.rows.size).toBe(0);
  });

  it('rejects an unknown username the same way', async () => {
    const err = await service.login('mallory', 'password-123', false).catch((e: unknown) => e);
    expect(err).toMatchObject({ code: 'invalid_credentials', message: 'Invalid username or password' });
    expect(err).toBeInstanceOf(AuthError);
    expect(err).toHaveProperty('accountId', undefined);
  });

  it('treats an unreadable stored hash as a credential failure', async () => {
    await expect(service.login('carol', 'password-123', false)).rejects.toMatchObject({
      code: 'invalid_credentials',
      accountId: 9,
    });
  });

  it('refuses accounts that are not active', async () => {
    await expect(service.login('bob', 'password-123', false)).rejects.toMatchObject({
      code: 'pending_activation',
      accountId: 8,
    });
  });

  it('checks the password before the account status', async () => {
    await expect(service.login('bob', 'wrong-password', false)).rejects.toMatchObject({
      code: 'invalid_credentials',
    });
  });
});

describe('TokenPairService.refresh', () => {
  it('mints a new access token and keeps the refresh token valid', async () => {
    const pair = await service.login('alice', 'password-123', false);

    now = T0 + 60_000;
    const first = await service.refresh(pair.refreshToken);
    expect(first.accountId).toBe(7);
    expect(first.expiresIn).toBe(900);
    expect(first.accessToken).not.toBe(pair.accessToken);
    await expect(codec.extractSubjectId(first.accessToken)).resolves.toBe(7);
    expect(store.rows.get(pair.refreshToken)?.lastUsedAt?.getTime()).toBe(T0 + 60_000);

    now = T0 + 120_000;
    const second = await service.refresh(pair.refreshToken);
    expect(second.accessToken).not.toBe(first.accessToken);
  });

  it('rejects an unknown refresh token', async () => {
    await expect(service.refresh('no-such-token')).rejects.toMatchObject({
      code: 'token_invalid',
      message: 'Invalid refresh token',
    });
  });

  it('rejects a revoked refresh token', async () => {
    const pair = await service.login('alice', 'password-123', false);
    const row = store.rows.get(pair.refreshToken);
    if (row) row.revoked = true;
    await expect(service.refresh(pair.refreshToken)).rejects.toMatchObject({
      code: 'token_revoked',
      message: 'Refresh token has been revoked',
      accountId: 7,
    });
  });

  it('rejects a refresh token at its expiry instant', async () => {
    const pair = await service.login('alice', 'password-123', false);
    now = T0 + DAY_MS - 1;
    await expect(service.refresh(pair.refreshToken)).resolves.toMatchObject({ accountId: 7 });
    now = T0 + DAY_MS;
    await expect(service.refresh(pair.refreshToken)).rejects.toMatchObject({
      code: 'token_expired',
      message: 'Refresh token has expired',
    });
  });

  it('still answers when the last-used update fails', async () => {
    const onTouchError = vi.fn();
    const failing = memStore();
    const touchFailure = new Error('disk full');
    failing.touch = async () => {
      throw touchFailure;
    };
    const svc = new TokenPairService({
      credentials: credentials({ alice: { accountId: 7, passwordHash: activeHash, status: 'active' } }),
      refreshTokens: failing,
      codec,
      policy: DEFAULT_TOKEN_POLICY,
      clock,
      onTouchError,
    });

    const pair = await svc.login('alice', 'password-123', false);
    await expect(svc.refresh(pair.refreshToken)).resolves.toMatchObject({ accountId: 7 });
    await new Promise((resolve) => setImmediate(resolve));
    expect(onTouchError).toHaveBeenCalledWith(touchFailure, 1);
  });
});

describe('TokenPairService.logout', () => {
  it('revokes the refresh token and returns the owner', async () => {
    const pair = await service.login('alice', 'password-123', false);
    await expect(service.logout(pair.refreshToken)).resolves.toBe(7);
    expect(store.rows.size).toBe(0);
    await expect(service.refresh(pair.refreshToken)).rejects.toMatchObject({ code: 'token_invalid' });
  });

  it('reports a second logout as not found', async () => {
    const pair = await service.login('alice', 'password-123', false);
    await service.logout(pair.refreshToken);
    await expect(service.logout(pair.refreshToken)).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('isRefreshTokenUsable', () => {
  const base: RefreshTokenRecord = {
    id: 1,
    token: 't',
    accountId: 1,
    createdAt: new Date(T0),
    expiresAt: new Date(T0 + 1000),
    lastUsedAt: null,
    revoked: false,
  };

  it('is usable strictly before expiry', () => {
    expect(isRefreshTokenUsable(base, T0 + 999)).toBe(true);
    expect(isRefreshTokenUsable(base, T0 + 1000)).toBe(false);
  });

  it('is never usable once revoked', () => {
    expect(isRefreshTokenUsable({ ...base, revoked: true }, T0)).toBe(false);
  });
});

describe('generateRefreshToken', () => {
  it('produces 32 random bytes as base64url', () => {
    const token = generateRefreshToken();
    expect(token).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(Buffer.from(token, 'base64url')).toHaveLength(32);
    expect(generateRefreshToken()).not.toBe(token);
  });
});
