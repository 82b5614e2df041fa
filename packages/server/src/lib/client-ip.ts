import type { Context } from 'hono';
import { getConnInfo } from '@hono/node-server/conninfo';

export type ClientIpResolver = (c: Context) => string;

/** getConnInfo needs the Node request, which app.request() in tests does not provide. */
function hasNodeIncoming(env: unknown): boolean {
  return typeof env === 'object' && env !== null && 'incoming' in env;
}

function socketAddress(c: Context): string | undefined {
  if (!hasNodeIncoming(c.env)) return undefined;
  return getConnInfo(c).remote.address;
}

/**
 * Client address for rate limiting and audit.
 *
 * With `trustProxy` the first `X-Forwarded-For` hop (then `X-Real-IP`) wins;
 * otherwise only the socket address counts, since clients control headers.
 * Falls back to 'unknown'.
 */
export function createClientIpResolver(trustProxy: boolean): ClientIpResolver {
  return (c) => {
    if (trustProxy) {
      const forwarded = c.req.header('X-Forwarded-For')?.split(',')[0]?.trim();
      if (forwarded) return forwarded;
      const realIp = c.req.header('X-Real-IP')?.trim();
      if (realIp) return realIp;
    }
    return socketAddress(c) ?? 'unknown';
  };
}
