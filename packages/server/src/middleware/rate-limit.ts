/**
 * Per-client rate limiting for the refresh endpoint.
 *
 * @module middleware/rate-limit
 */

import { createMiddleware } from 'hono/factory';
import { createLogger } from '../lib/logger.js';
import { requestInfo, type AuditLogger } from '../lib/audit.js';
import type { ClientIpResolver } from '../lib/client-ip.js';
import type { TokenBucketRateLimiter } from '../lib/rate-limiter.js';

const log = createLogger('RateLimit');

/**
 * Gate a route on the limiter. A denied request gets
 * `429 { error, retry_after }` plus a `Retry-After` header and one
 * `rate_limit_exceeded` audit event.
 */
export function clientRateLimit(
  limiter: TokenBucketRateLimiter,
  audit: AuditLogger,
  clientIp: ClientIpResolver,
) {
  return createMiddleware(async (c, next) => {
    const info = requestInfo(c, clientIp);
    if (limiter.allow(info.ip)) return next();

    const retryAfter = Math.max(1, limiter.retryAfterSeconds(info.ip));
    const route = c.req.path;
    log.warn('Rate limit exceeded', { ip: info.ip, route });
    audit.rateLimitExceeded(info, route);

    c.header('Retry-After', String(retryAfter));
    return c.json({ error: 'Rate limit exceeded', retry_after: retryAfter }, 429);
  });
}
