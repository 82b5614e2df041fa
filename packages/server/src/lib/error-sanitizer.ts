/**
 * Maps errors that escape a route handler onto a safe JSON response.
 */

import { NotFoundError, isAuthError } from '@packroom/auth';

export type ClientErrorStatus = 400 | 401 | 403 | 404 | 409 | 429;

/**
 * Deliberate client-facing failure. Its message is shown to the client
 * unless it contains something from the redaction list.
 */
export class ClientError extends Error {
  constructor(
    readonly statusCode: ClientErrorStatus,
    message: string,
  ) {
    super(message);
    this.name = 'ClientError';
  }
}

/** Driver errors, stored secrets, stack frames and file paths. */
const REDACTED = [
  /SQLITE_[A-Z_]+/,
  /no such (?:table|column)/i,
  /scrypt\$\d+\$/,
  /eyJ[A-Za-z0-9_-]{10,}\./,
  /\bat\s+\S+\s+\(.*:\d+:\d+\)/,
  /(?:\/[\w.-]+)+\.(?:ts|js|db)\b/,
];

export interface ErrorResponse {
  status: ClientErrorStatus | 500;
  message: string;
}

export function isRedacted(message: string): boolean {
  return REDACTED.some((pattern) => pattern.test(message));
}

export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof ClientError) {
    return { status: err.statusCode, message: isRedacted(err.message) ? 'Bad request' : err.message };
  }
  if (err instanceof NotFoundError) return { status: 404, message: 'Not found' };
  if (isAuthError(err)) return { status: 401, message: 'Unauthorized' };
  return { status: 500, message: 'Internal server error' };
}
