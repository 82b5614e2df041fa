// @packroom/auth — Hono middleware

import type { Context } from 'hono';
import { createMiddleware } from 'hono/factory';
import { AuthError } from '../errors.js';
import type { AccessTokenCodec } from '../jwt.js';
import { extractToken, type TokenRequest, type TokenSource } from '../token-source.js';
import { systemClock, type Clock, type QueryOptions } from '../types.js';

/**
 * Type augmentation for Hono context variables.
 */
export type AuthVariables = {
  /** Verified subject of the access token */
  accountId: number;
};

export interface RequireAuthOptions {
  codec: AccessTokenCodec;
  /** Extraction chain (default: `?token=` then `Authorization: Bearer`) */
  sources?: readonly TokenSource[];
}

export interface RequireAdminOptions extends RequireAuthOptions {
  /** Look up an account's role. Resolve null when the account does not exist. */
  resolveRole: (accountId: number, opts?: QueryOptions) => Promise<string | null>;
  /** Role that passes the gate (default: 'admin') */
  adminRole?: string;
  /** Cache granted admin roles for this long; 0 disables caching (default: 0) */
  cacheTtlMs?: number;
  /** Called with lookup failures before answering 500 */
  onError?: (err: unknown) => void;
  clock?: Clock;
}

function tokenRequest(c: Context): TokenRequest {
  return {
    query: (name) => c.req.query(name),
    header: (name) => c.req.header(name),
  };
}

/**
 * Standard gate: a valid, unexpired access token is required.
 * Sets `c.var.accountId` for downstream handlers.
 */
export function requireAuth(opts: RequireAuthOptions) {
  return createMiddleware<{ Variables: AuthVariables }>(async (c, next) => {
    const token = extractToken(tokenRequest(c), opts.sources);
    try {
      c.set('accountId', await opts.codec.extractSubjectId(token));
    } catch (err) {
      if (err instanceof AuthError) return c.text('Unauthorized', 401);
      throw err;
    }
    return next();
  });
}

interface CachedRole {
  role: string;
  expiresAt: number;
}

/**
 * Admin gate: the standard check, then the caller's role is read from the
 * store. Unknown account or non-admin role → 401; lookup failure → 500.
 */
export function requireAdmin(opts: RequireAdminOptions) {
  const adminRole = opts.adminRole ?? 'admin';
  const ttl = opts.cacheTtlMs ?? 0;
  const clock = opts.clock ?? systemClock;
  const cache = new Map<number, CachedRole>();

  async function roleOf(accountId: number, signal: AbortSignal): Promise<string | null> {
    if (ttl > 0) {
      const hit = cache.get(accountId);
      if (hit && hit.expiresAt > clock()) return hit.role;
      cache.delete(accountId);
    }
    const role = await opts.resolveRole(accountId, { signal });
    if (ttl > 0 && role === adminRole) {
      cache.set(accountId, { role, expiresAt: clock() + ttl });
    }
    return role;
  }

  return createMiddleware<{ Variables: AuthVariables }>(async (c, next) => {
    const token = extractToken(tokenRequest(c), opts.sources);
    if (!token) return c.text('Unauthorized', 401);

    try {
      await opts.codec.verify(token);
    } catch (err) {
      if (err instanceof AuthError) return c.text('Unauthorized', 401);
      throw err;
    }

    let accountId: number;
    try {
      accountId = await opts.codec.extractSubjectId(token);
    } catch (err) {
      if (err instanceof AuthError) return c.text('Invalid Token', 401);
      throw err;
    }

    let role: string | null;
    try {
      role = await roleOf(accountId, c.req.raw.signal);
    } catch (err) {
      opts.onError?.(err);
      return c.text('Something went wrong', 500);
    }

    if (role === null || role !== adminRole) {
      return c.text('Unauthorized', 401);
    }

    c.set('accountId', accountId);
    return next();
  });
}
