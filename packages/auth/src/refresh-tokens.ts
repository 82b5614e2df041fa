// @packroom/auth — Refresh-token contract
import { randomBytes } from 'node:crypto';
import type { QueryOptions, TokenLifetimePolicy } from './types.js';

const REFRESH_TOKEN_BYTES = 32;
const SECONDS_PER_DAY = 24 * 3600;

// ── Refresh-token record (what the store must persist / return) ──────
export interface RefreshTokenRecord {
  id: number;
  /** Opaque, unique, URL-safe */
  token: string;
  accountId: number;
  expiresAt: Date;
  createdAt: Date;
  lastUsedAt: Date | null;
  revoked: boolean;
}

// ── Store adapter — caller injects this ──────────────────────────────
/**
 * Every method rejects with the signal's reason when `opts.signal` is
 * already aborted. `get` and `revoke` reject with NotFoundError when no row
 * matches; I/O failures reject with StoreError.
 */
export interface RefreshTokenStore {
  create(accountId: number, extended: boolean, opts?: QueryOptions): Promise<RefreshTokenRecord>;
  get(token: string, opts?: QueryOptions): Promise<RefreshTokenRecord>;
  /** Sets last_used_at to now. */
  touch(id: number, opts?: QueryOptions): Promise<void>;
  /** Deletes the row. */
  revoke(token: string, opts?: QueryOptions): Promise<void>;
  /** Deletes every row with expires_at < now, revoked or not. Returns the count. */
  sweep(opts?: QueryOptions): Promise<number>;
}

/** 256 bits of entropy, base64url. */
export function generateRefreshToken(): string {
  return randomBytes(REFRESH_TOKEN_BYTES).toString('base64url');
}

export function refreshTokenLifetimeSeconds(extended: boolean, policy: TokenLifetimePolicy): number {
  const days = extended ? policy.refreshTokenRememberMeDays : policy.refreshTokenDays;
  return days * SECONDS_PER_DAY;
}

/** A token can mint an access token iff it is not revoked and now < expiresAt. */
export function isRefreshTokenUsable(record: RefreshTokenRecord, now: number): boolean {
  return !record.revoked && now < record.expiresAt.getTime();
}
