/**
 * Server configuration — reads from environment variables with sensible defaults.
 */

import type { TokenLifetimePolicy } from '@packroom/auth';
import { createLogger } from './lib/logger.js';
import { MAX_TIMER_DELAY_MS } from './lib/rate-limiter.js';

const log = createLogger('Config');

export const DEFAULT_API_SECRET = 'defaultApiSecret';

/** Stages where the built-in signing secret is tolerated without a warning. */
const DEVELOPMENT_STAGES = new Set(['local', 'dev']);

export interface ServerConfig {
  /** Port to listen on (default: 8080) */
  port: number;
  /** Deployment stage: 'local', 'dev', 'prod', ... (default: 'local') */
  stage: string;
  /** SQLite database path (default: './packroom.db') */
  dbPath: string;
  /** HMAC secret for access tokens */
  apiSecret: string;
  /** Base URL used in confirmation links (default: http://localhost:<port>) */
  publicUrl: string;
  /** CORS allowed origin (default: http://localhost:8080) */
  corsOrigin: string;
  /** Take the client IP from X-Forwarded-For / X-Real-IP (default: false) */
  trustProxy: boolean;

  // ─── Token lifetimes ───────────────────────────────────
  /** Access-token lifetime (default: 15) */
  accessTokenMinutes: number;
  /** Refresh-token lifetime without remember-me (default: 1) */
  refreshTokenDays: number;
  /** Refresh-token lifetime with remember-me (default: 30) */
  refreshTokenRememberMeDays: number;
  /** Interval of the expired refresh-token sweep (default: 24) */
  refreshTokenCleanupHours: number;

  // ─── Refresh endpoint rate limit ───────────────────────
  /** Requests allowed per window and client IP (default: 10) */
  refreshRateLimitRequests: number;
  /** Window length (default: 60) */
  refreshRateLimitWindowSeconds: number;
  /** Bucket capacity (default: same as refreshRateLimitRequests) */
  refreshRateLimitBurst: number;
  /** Buckets idle for this many windows are dropped (default: 10) */
  rateLimitIdleWindows: number;

  /** Cache admin role lookups this long; 0 reads the store on every request (default: 0) */
  adminRoleCacheSeconds: number;
}

type Env = Record<string, string | undefined>;

function positiveInt(env: Env, name: string, fallback: number): number {
  const parsed = parseInt(env[name] ?? '', 10);
  return isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

function nonNegativeInt(env: Env, name: string, fallback: number): number {
  const parsed = parseInt(env[name] ?? '', 10);
  return isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

/**
 * Read configuration from environment variables.
 */
export function getConfig(env: Env = process.env): ServerConfig {
  const port = positiveInt(env, 'PORT', 8080);
  const refreshRateLimitRequests = positiveInt(env, 'REFRESH_RATE_LIMIT_REQUESTS', 10);
  return {
    port,
    stage: env['STAGE'] || 'local',
    dbPath: env['DB_PATH'] ?? './packroom.db',
    apiSecret: env['API_SECRET'] || DEFAULT_API_SECRET,
    publicUrl: (env['PUBLIC_URL'] || `http://localhost:${port}`).replace(/\/+$/, ''),
    corsOrigin: env['CORS_ORIGIN'] ?? 'http://localhost:8080',
    trustProxy: env['TRUST_PROXY'] === 'true',

    accessTokenMinutes: positiveInt(env, 'ACCESS_TOKEN_MINUTES', 15),
    refreshTokenDays: positiveInt(env, 'REFRESH_TOKEN_DAYS', 1),
    refreshTokenRememberMeDays: positiveInt(env, 'REFRESH_TOKEN_REMEMBER_ME_DAYS', 30),
    refreshTokenCleanupHours: positiveInt(env, 'REFRESH_TOKEN_CLEANUP_HOURS', 24),

    refreshRateLimitRequests,
    refreshRateLimitWindowSeconds: positiveInt(env, 'REFRESH_RATE_LIMIT_WINDOW_SECONDS', 60),
    refreshRateLimitBurst: positiveInt(env, 'REFRESH_RATE_LIMIT_BURST', refreshRateLimitRequests),
    rateLimitIdleWindows: positiveInt(env, 'RATE_LIMIT_IDLE_WINDOWS', 10),

    adminRoleCacheSeconds: nonNegativeInt(env, 'ADMIN_ROLE_CACHE_SECONDS', 0),
  };
}

/**
 * Validate config at startup. Logs warnings and throws on fatal misconfigurations.
 */
export function validateConfig(config: ServerConfig): void {
  if (config.apiSecret === DEFAULT_API_SECRET) {
    if (config.stage === 'prod') {
      throw new Error('FATAL: API_SECRET must be set in the prod stage.');
    }
    if (!DEVELOPMENT_STAGES.has(config.stage)) {
      log.warn('API_SECRET is not set; access tokens are signed with the built-in development secret.', {
        stage: config.stage,
      });
    }
  }

  if (config.refreshTokenCleanupHours * 3_600_000 > MAX_TIMER_DELAY_MS) {
    throw new Error(
      `FATAL: REFRESH_TOKEN_CLEANUP_HOURS must be at most ${Math.floor(MAX_TIMER_DELAY_MS / 3_600_000)}.`,
    );
  }
  if (config.refreshRateLimitWindowSeconds * 1_000 > MAX_TIMER_DELAY_MS) {
    throw new Error(
      `FATAL: REFRESH_RATE_LIMIT_WINDOW_SECONDS must be at most ${Math.floor(MAX_TIMER_DELAY_MS / 1_000)}.`,
    );
  }

  if (config.corsOrigin === '*') {
    log.warn('CORS_ORIGIN=* lets any site call the login endpoints from a browser.');
  }

  if (config.refreshTokenRememberMeDays < config.refreshTokenDays) {
    log.warn('REFRESH_TOKEN_REMEMBER_ME_DAYS is shorter than REFRESH_TOKEN_DAYS.', {
      refreshTokenDays: config.refreshTokenDays,
      refreshTokenRememberMeDays: config.refreshTokenRememberMeDays,
    });
  }
}

export function tokenPolicy(config: ServerConfig): TokenLifetimePolicy {
  return {
    accessTokenMinutes: config.accessTokenMinutes,
    refreshTokenDays: config.refreshTokenDays,
    refreshTokenRememberMeDays: config.refreshTokenRememberMeDays,
  };
}
