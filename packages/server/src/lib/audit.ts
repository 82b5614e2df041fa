/**
 * Security audit events.
 *
 * Fire-and-forget: a failing sink never affects the request that produced
 * the event. Failures go to the diagnostic sink (stderr by default).
 * Events never carry password or token values.
 */

import type { Context } from 'hono';
import { createLogger } from './logger.js';
import type { ClientIpResolver } from './client-ip.js';

export type AuditEventType =
  | 'login_success'
  | 'login_failed'
  | 'refresh_success'
  | 'refresh_failed'
  | 'logout'
  | 'rate_limit_exceeded';

export interface AuditEvent {
  /** UTC, ISO 8601 */
  timestamp: string;
  event_type: AuditEventType;
  account_id?: number;
  username?: string;
  client_ip: string;
  user_agent?: string;
  message: string;
  remember_me?: boolean;
}

/** Who made the request, derived once per request. */
export interface AuditRequestInfo {
  ip: string;
  userAgent?: string;
}

export type AuditSink = (event: AuditEvent) => void;
export type DiagnosticSink = (message: string, err: unknown) => void;

export interface AuditLogger {
  loginSuccess(info: AuditRequestInfo, accountId: number, username: string, rememberMe: boolean): void;
  loginFailed(info: AuditRequestInfo, username: string, reason: string, accountId?: number): void;
  refreshSuccess(info: AuditRequestInfo, accountId: number): void;
  refreshFailed(info: AuditRequestInfo, reason: string, accountId?: number): void;
  logout(info: AuditRequestInfo, accountId?: number): void;
  rateLimitExceeded(info: AuditRequestInfo, path: string): void;
}

const WARN_EVENTS: ReadonlySet<AuditEventType> = new Set([
  'login_failed',
  'refresh_failed',
  'rate_limit_exceeded',
]);

/**
 * Default sink: one structured line per event through the `Audit` logger.
 */
export function logAuditSink(): AuditSink {
  const log = createLogger('Audit');
  return (event) => {
    const data = { audit: true, ...event };
    if (WARN_EVENTS.has(event.event_type)) log.warn(event.message, data);
    else log.info(event.message, data);
  };
}

const stderrDiagnostics: DiagnosticSink = (message, err) => {
  console.error(message, err);
};

export function requestInfo(c: Context, clientIp: ClientIpResolver): AuditRequestInfo {
  const userAgent = c.req.header('User-Agent');
  return userAgent ? { ip: clientIp(c), userAgent } : { ip: clientIp(c) };
}

export function createAuditLogger(
  sink: AuditSink = logAuditSink(),
  diagnostics: DiagnosticSink = stderrDiagnostics,
): AuditLogger {
  const emit = (
    type: AuditEventType,
    info: AuditRequestInfo,
    message: string,
    fields: Pick<AuditEvent, 'account_id' | 'username' | 'remember_me'> = {},
  ): void => {
    try {
      const event: AuditEvent = {
        timestamp: new Date().toISOString(),
        event_type: type,
        client_ip: info.ip,
        message,
      };
      if (fields.account_id !== undefined) event.account_id = fields.account_id;
      if (fields.username !== undefined) event.username = fields.username;
      if (info.userAgent !== undefined) event.user_agent = info.userAgent;
      if (fields.remember_me !== undefined) event.remember_me = fields.remember_me;
      sink(event);
    } catch (err) {
      try {
        diagnostics('[Audit] Failed to write audit event:', err);
      } catch {
        process.stderr.write('[Audit] Failed to write audit event and diagnostic sink failed\n');
      }
    }
  };

  return {
    loginSuccess(info, accountId, username, rememberMe) {
      emit('login_success', info, 'User logged in successfully', {
        account_id: accountId,
        username,
        remember_me: rememberMe,
      });
    },
    loginFailed(info, username, reason, accountId) {
      emit('login_failed', info, reason, { account_id: accountId, username });
    },
    refreshSuccess(info, accountId) {
      emit('refresh_success', info, 'Access token refreshed successfully', { account_id: accountId });
    },
    refreshFailed(info, reason, accountId) {
      emit('refresh_failed', info, reason, { account_id: accountId });
    },
    logout(info, accountId) {
      emit('logout', info, 'User logged out', { account_id: accountId });
    },
    rateLimitExceeded(info, path) {
      emit('rate_limit_exceeded', info, `Rate limit exceeded for ${path}`);
    },
  };
}
