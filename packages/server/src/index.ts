/**
 * @packroom/server — Hono HTTP API for account login, token refresh and logout
 *
 * Exports:
 * - createApp(options) — factory that returns a configured Hono app
 * - startServer() — standalone entry point that opens the DB and starts listening
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { secureHeaders } from 'hono/secure-headers';
import { serve } from '@hono/node-server';
import {
  AccessTokenCodec,
  TokenPairService,
  requireAdmin,
  requireAuth,
  type AuthVariables,
  type Clock,
} from '@packroom/auth';
import { getConfig, tokenPolicy, validateConfig, type ServerConfig } from './config.js';
import { createLogger } from './lib/logger.js';
import { createAuditLogger, type AuditLogger } from './lib/audit.js';
import { createClientIpResolver } from './lib/client-ip.js';
import { toErrorResponse } from './lib/error-sanitizer.js';
import { LogMailSender, type MailSender } from './lib/mailer.js';
import { TokenBucketRateLimiter } from './lib/rate-limiter.js';
import { RefreshTokenSweeper } from './lib/sweeper.js';
import { closeDb, openDb, type SqliteDb } from './db/index.js';
import { AccountStore } from './db/account-store.js';
import { SqliteRefreshTokenStore } from './db/refresh-token-store.js';
import { authRoutes } from './routes/auth.js';
import { accountRoutes } from './routes/accounts.js';
import { adminRoutes } from './routes/admin.js';

// Re-export everything consumers may need
export { getConfig, validateConfig, tokenPolicy } from './config.js';
export type { ServerConfig } from './config.js';
export { openDb, closeDb, createTestDb } from './db/index.js';
export type { OpenDbOptions, SqliteDb } from './db/index.js';
export { runMigrations } from './db/migrate.js';
export { AccountStore, DuplicateUsernameError } from './db/account-store.js';
export type { AccountView, NewAccount } from './db/account-store.js';
export { SqliteRefreshTokenStore } from './db/refresh-token-store.js';
export { createAuditLogger, logAuditSink } from './lib/audit.js';
export type { AuditEvent, AuditEventType, AuditLogger, AuditSink } from './lib/audit.js';
export { TokenBucketRateLimiter } from './lib/rate-limiter.js';
export { RefreshTokenSweeper } from './lib/sweeper.js';
export { LogMailSender } from './lib/mailer.js';
export type { MailMessage, MailSender } from './lib/mailer.js';
export { createLogger } from './lib/logger.js';
export { ClientError, toErrorResponse } from './lib/error-sanitizer.js';

const log = createLogger('Server');
const httpLog = createLogger('Http');

export interface CreateAppOptions {
  db: SqliteDb;
  /** Partial override of the environment config */
  config?: Partial<ServerConfig>;
  mailer?: MailSender;
  audit?: AuditLogger;
  /** Limiter guarding /api/auth/refresh (default: built from config) */
  refreshLimiter?: TokenBucketRateLimiter;
  clock?: Clock;
}

export function createRefreshLimiter(config: ServerConfig, clock?: Clock): TokenBucketRateLimiter {
  return new TokenBucketRateLimiter({
    requestsPerWindow: config.refreshRateLimitRequests,
    windowMs: config.refreshRateLimitWindowSeconds * 1000,
    burst: config.refreshRateLimitBurst,
    idleWindows: config.rateLimitIdleWindows,
    clock,
  });
}

/**
 * Create a configured Hono app with all routes and middleware.
 */
export function createApp(options: CreateAppOptions) {
  const config: ServerConfig = { ...getConfig(), ...options.config };
  const { db, clock } = options;
  const policy = tokenPolicy(config);

  const codec = new AccessTokenCodec(() => config.apiSecret, {
    lifetimeSeconds: config.accessTokenMinutes * 60,
    clock,
  });
  const accounts = new AccountStore(db, { clock });
  const refreshTokens = new SqliteRefreshTokenStore(db, policy, { clock });
  const tokens = new TokenPairService({
    credentials: accounts,
    refreshTokens,
    codec,
    policy,
    clock,
    onTouchError: (err, refreshTokenId) => {
      log.warn('Failed to record refresh token use', { refreshTokenId, error: err });
    },
  });
  const audit = options.audit ?? createAuditLogger();
  const clientIp = createClientIpResolver(config.trustProxy);
  const refreshLimiter = options.refreshLimiter ?? createRefreshLimiter(config, clock);

  const app = new Hono<{ Variables: AuthVariables }>();

  // ─── Global error handler ──────────────────────────────
  app.onError((err, c) => {
    const { status, message } = toErrorResponse(err);
    if (status === 500) log.error('Unhandled error', { path: c.req.path, error: err });
    else log.debug('Request rejected', { path: c.req.path, status, error: err });
    return c.json({ error: message }, status);
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  // ─── Middleware on /api/* ──────────────────────────────
  app.use('*', secureHeaders());
  app.use('/api/*', cors({ origin: config.corsOrigin }));
  app.use('/api/*', logger((message) => httpLog.info(message)));

  // ─── Auth gates ────────────────────────────────────────
  app.use('/api/v1/*', requireAuth({ codec }));
  app.use(
    '/api/admin/*',
    requireAdmin({
      codec,
      resolveRole: (accountId, opts) => accounts.findRole(accountId, opts),
      cacheTtlMs: config.adminRoleCacheSeconds * 1000,
      clock,
      onError: (err) => log.error('Role lookup failed', err),
    }),
  );

  // ─── Routes ────────────────────────────────────────────
  app.get('/api/health', (c) => c.json({ status: 'ok' }));
  app.route('/api', authRoutes({ tokens, audit, clientIp, refreshLimiter }));
  app.route(
    '/api',
    accountRoutes({ accounts, mailer: options.mailer ?? new LogMailSender(), publicUrl: config.publicUrl }),
  );
  app.route('/api/admin', adminRoutes(accounts));

  return app;
}

/**
 * Start the server as a standalone process.
 * Opens (and migrates) the database, starts the background sweeps and listens.
 */
export async function startServer() {
  const config = getConfig();
  validateConfig(config);

  const db = openDb({ path: config.dbPath });

  const refreshLimiter = createRefreshLimiter(config);
  refreshLimiter.start();

  const sweeper = new RefreshTokenSweeper(new SqliteRefreshTokenStore(db, tokenPolicy(config)), {
    intervalMs: config.refreshTokenCleanupHours * 3_600_000,
  });
  sweeper.start();

  const app = createApp({ db, config, refreshLimiter });

  log.info('Server starting', {
    port: config.port,
    stage: config.stage,
    database: config.dbPath,
    corsOrigin: config.corsOrigin,
  });

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info(`Listening on http://localhost:${info.port}`);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    log.info('Shutting down', { signal });
    sweeper.stop();
    refreshLimiter.stop();
    server.close((err) => {
      if (err) log.error('Error while closing the HTTP server', err);
      closeDb(db);
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return app;
}
