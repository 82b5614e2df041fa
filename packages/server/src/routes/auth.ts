/**
 * Session endpoints
 *
 * POST /login         — verify credentials, issue access + refresh tokens
 * POST /auth/refresh  — mint a new access token (rate limited per client IP)
 * POST /logout        — revoke a refresh token
 */

import { Hono } from 'hono';
import { NotFoundError, isAuthError, type TokenPairService } from '@packroom/auth';
import { createLogger } from '../lib/logger.js';
import { requestInfo, type AuditLogger } from '../lib/audit.js';
import type { ClientIpResolver } from '../lib/client-ip.js';
import type { TokenBucketRateLimiter } from '../lib/rate-limiter.js';
import { clientRateLimit } from '../middleware/rate-limit.js';
import { readJsonBody } from '../middleware/validation.js';
import { loginSchema, refreshTokenBodySchema } from '../schemas/auth.js';

const log = createLogger('AuthRoutes');

export interface AuthRoutesDeps {
  tokens: TokenPairService;
  audit: AuditLogger;
  clientIp: ClientIpResolver;
  refreshLimiter: TokenBucketRateLimiter;
}

export function authRoutes(deps: AuthRoutesDeps) {
  const { tokens, audit, clientIp } = deps;
  const app = new Hono();

  // ── POST /login ────────────────────────────────────────
  app.post('/login', async (c) => {
    const info = requestInfo(c, clientIp);
    const body = await readJsonBody(c, loginSchema);
    if (!body.ok) {
      return c.json({ error: 'Invalid request' }, 400);
    }
    const { username, password, remember_me: rememberMe } = body.data;

    try {
      const pair = await tokens.login(username, password, rememberMe, { signal: c.req.raw.signal });
      audit.loginSuccess(info, pair.accountId, username, rememberMe);
      return c.json({
        token: pair.token,
        access_token: pair.accessToken,
        refresh_token: pair.refreshToken,
        access_expires_in: pair.accessExpiresIn,
        refresh_expires_in: pair.refreshExpiresIn,
      });
    } catch (err) {
      if (isAuthError(err, 'invalid_credentials')) {
        audit.loginFailed(info, username, 'Invalid credentials', err.accountId);
        return c.json({ error: 'credentials are incorrect' }, 401);
      }
      if (isAuthError(err, 'pending_activation')) {
        audit.loginFailed(info, username, 'Account not yet confirmed', err.accountId);
        return c.json({ error: 'account not yet confirmed' }, 401);
      }
      log.error('Login failed', { username, error: err });
      audit.loginFailed(info, username, 'Authentication error');
      return c.json({ error: 'authentication failed' }, 500);
    }
  });

  // ── POST /auth/refresh ─────────────────────────────────
  app.post(
    '/auth/refresh',
    clientRateLimit(deps.refreshLimiter, audit, clientIp),
    async (c) => {
      const info = requestInfo(c, clientIp);
      const body = await readJsonBody(c, refreshTokenBodySchema);
      if (!body.ok) {
        audit.refreshFailed(info, 'Invalid request');
        return c.json({ error: 'Invalid request' }, 400);
      }

      try {
        const result = await tokens.refresh(body.data.refresh_token, { signal: c.req.raw.signal });
        audit.refreshSuccess(info, result.accountId);
        return c.json({ access_token: result.accessToken, expires_in: result.expiresIn });
      } catch (err) {
        if (
          isAuthError(err, 'token_invalid') ||
          isAuthError(err, 'token_revoked') ||
          isAuthError(err, 'token_expired')
        ) {
          audit.refreshFailed(info, err.message, err.accountId);
          return c.json({ error: err.message }, 401);
        }
        log.error('Token refresh failed', err);
        audit.refreshFailed(info, 'Internal error');
        return c.json({ error: 'Internal server error' }, 500);
      }
    },
  );

  // ── POST /logout ───────────────────────────────────────
  app.post('/logout', async (c) => {
    const info = requestInfo(c, clientIp);
    const body = await readJsonBody(c, refreshTokenBodySchema);
    if (!body.ok) {
      return c.json({ error: 'Invalid request' }, 400);
    }

    try {
      const accountId = await tokens.logout(body.data.refresh_token, { signal: c.req.raw.signal });
      audit.logout(info, accountId ?? undefined);
      return c.json({ message: 'Logged out successfully' });
    } catch (err) {
      if (err instanceof NotFoundError) {
        return c.json({ error: 'Refresh token not found' }, 404);
      }
      log.error('Logout failed', err);
      return c.json({ error: 'Internal server error' }, 500);
    }
  });

  return app;
}
