// @packroom/auth — Error taxonomy

export type AuthErrorCode =
  | 'invalid_credentials'
  | 'pending_activation'
  | 'token_invalid'
  | 'token_expired'
  | 'token_revoked';

/**
 * Domain error raised by the codec and the token-pair service.
 * `accountId` is set when the failure can be attributed to a known account
 * (used for audit only, never sent to the client).
 */
export class AuthError extends Error {
  constructor(
    public readonly code: AuthErrorCode,
    message: string,
    public readonly accountId?: number,
  ) {
    super(message);
    this.name = 'AuthError';
  }
}

export function isAuthError(err: unknown, code?: AuthErrorCode): err is AuthError {
  return err instanceof AuthError && (code === undefined || err.code === code);
}

/**
 * Thrown when a lookup or delete by key matches no row.
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Wraps an I/O failure from a record store with the operation that failed.
 */
export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
  }
}

/** Plaintext does not match the stored hash. */
export class PasswordMismatchError extends Error {
  constructor() {
    super('Password does not match');
    this.name = 'PasswordMismatchError';
  }
}

/** Stored hash cannot be parsed. */
export class MalformedHashError extends Error {
  constructor(message = 'Malformed password hash') {
    super(message);
    this.name = 'MalformedHashError';
  }
}
