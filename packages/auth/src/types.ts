// @packroom/auth — Core types

export type AccountRole = 'admin' | 'standard';

export type AccountStatus = 'active' | 'pending' | 'inactive';

/** Returns the signing secret. Called on every mint/verify so rotation takes effect. */
export type SecretProvider = () => string;

/** Wall-clock source in epoch milliseconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/** Cancellation for storage calls. */
export interface QueryOptions {
  signal?: AbortSignal;
}

export interface TokenLifetimePolicy {
  /** Access-token lifetime in minutes (default 15) */
  accessTokenMinutes: number;
  /** Refresh-token lifetime in days without "remember me" (default 1) */
  refreshTokenDays: number;
  /** Refresh-token lifetime in days with "remember me" (default 30) */
  refreshTokenRememberMeDays: number;
}

export const DEFAULT_TOKEN_POLICY: TokenLifetimePolicy = {
  accessTokenMinutes: 15,
  refreshTokenDays: 1,
  refreshTokenRememberMeDays: 30,
};

export interface TokenPair {
  /** Same value as accessToken, kept for older clients */
  token: string;
  accessToken: string;
  refreshToken: string;
  /** Seconds */
  accessExpiresIn: number;
  /** Seconds */
  refreshExpiresIn: number;
  accountId: number;
}

export interface RefreshResult {
  accessToken: string;
  /** Seconds */
  expiresIn: number;
  accountId: number;
}
