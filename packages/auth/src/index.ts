// @packroom/auth — Barrel export
export type {
  AccountRole,
  AccountStatus,
  Clock,
  QueryOptions,
  RefreshResult,
  SecretProvider,
  TokenLifetimePolicy,
  TokenPair,
} from './types.js';
export { DEFAULT_TOKEN_POLICY, systemClock } from './types.js';

export {
  AuthError,
  isAuthError,
  MalformedHashError,
  NotFoundError,
  PasswordMismatchError,
  StoreError,
} from './errors.js';
export type { AuthErrorCode } from './errors.js';

export { hashPassword, verifyPassword, validatePasswordComplexity } from './passwords.js';

export { AccessTokenCodec, HMAC_ALGORITHMS } from './jwt.js';
export type { AccessTokenClaims, AccessTokenCodecOptions } from './jwt.js';

export {
  extractToken,
  queryParamSource,
  bearerHeaderSource,
  DEFAULT_TOKEN_SOURCES,
} from './token-source.js';
export type { TokenRequest, TokenSource } from './token-source.js';

export {
  generateRefreshToken,
  refreshTokenLifetimeSeconds,
  isRefreshTokenUsable,
} from './refresh-tokens.js';
export type { RefreshTokenRecord, RefreshTokenStore } from './refresh-tokens.js';

export { TokenPairService } from './token-pair.js';
export type { CredentialLookup, StoredCredential, TokenPairServiceOptions } from './token-pair.js';

export { requireAuth, requireAdmin } from './middleware/hono.js';
export type { AuthVariables, RequireAuthOptions, RequireAdminOptions } from './middleware/hono.js';
