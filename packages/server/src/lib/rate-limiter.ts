/**
 * Token-bucket rate limiter, keyed by client IP.
 *
 * Capacity = burst; tokens refill continuously at requestsPerWindow per
 * window. Buckets are created lazily and dropped once idle for
 * `idleWindows` windows. Single-process, in-memory.
 */

import type { Clock } from '@packroom/auth';
import { createLogger } from './logger.js';

const log = createLogger('RateLimit');

/** Largest delay `setInterval` honours; longer ones fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface TokenBucketOptions {
  /** Sustained rate: requests per window */
  requestsPerWindow: number;
  /** Window length in milliseconds */
  windowMs: number;
  /** Bucket capacity (default: requestsPerWindow) */
  burst?: number;
  /** Drop buckets not seen for this many windows (default: 10) */
  idleWindows?: number;
  clock?: Clock;
}

interface Bucket {
  tokens: number;
  lastRefill: number;
}

export class TokenBucketRateLimiter {
  private readonly buckets = new Map<string, Bucket>();
  private readonly clock: Clock;
  private readonly msPerToken: number;
  private readonly idleMs: number;
  private readonly windowMs: number;
  private timer: ReturnType<typeof setInterval> | null = null;

  readonly capacity: number;

  constructor(opts: TokenBucketOptions) {
    const burst = opts.burst ?? opts.requestsPerWindow;
    if (opts.requestsPerWindow <= 0 || opts.windowMs <= 0 || burst <= 0) {
      throw new RangeError('Rate limit, window and burst must be positive');
    }
    if (opts.windowMs > MAX_TIMER_DELAY_MS) {
      throw new RangeError(`Rate limit window must not exceed ${MAX_TIMER_DELAY_MS}ms`);
    }
    this.capacity = burst;
    this.windowMs = opts.windowMs;
    this.msPerToken = opts.windowMs / opts.requestsPerWindow;
    this.idleMs = opts.windowMs * (opts.idleWindows ?? 10);
    this.clock = opts.clock ?? Date.now;
  }

  /** Number of tracked clients. */
  get size(): number {
    return this.buckets.size;
  }

  /**
   * Take one token from `key`'s bucket. Returns false when the bucket is
   * empty; other keys are unaffected.
   */
  allow(key: string): boolean {
    const bucket = this.refill(key, this.clock());
    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return true;
    }
    return false;
  }

  /** Whole seconds until `key` has a token again (0 when it has one now). */
  retryAfterSeconds(key: string): number {
    const bucket = this.buckets.get(key);
    if (!bucket) return 0;
    this.refill(key, this.clock());
    const missing = 1 - bucket.tokens;
    if (missing <= 0) return 0;
    return Math.ceil((missing * this.msPerToken) / 1000);
  }

  /**
   * Drop buckets untouched for longer than the idle period. A dropped
   * bucket would have refilled to capacity anyway, so this never changes a
   * later decision.
   */
  sweepIdle(): number {
    const cutoff = this.clock() - Math.max(this.idleMs, this.capacity * this.msPerToken);
    let removed = 0;
    for (const [key, bucket] of this.buckets) {
      if (bucket.lastRefill < cutoff) {
        this.buckets.delete(key);
        removed++;
      }
    }
    if (removed > 0) log.debug('Dropped idle rate-limit buckets', { removed, remaining: this.buckets.size });
    return removed;
  }

  /** Sweep idle buckets once per window. */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.sweepIdle(), this.windowMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  reset(): void {
    this.buckets.clear();
  }

  private refill(key: string, now: number): Bucket {
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = { tokens: this.capacity, lastRefill: now };
      this.buckets.set(key, bucket);
      return bucket;
    }
    const elapsed = Math.max(0, now - bucket.lastRefill);
    bucket.tokens = Math.min(this.capacity, bucket.tokens + elapsed / this.msPerToken);
    bucket.lastRefill = now;
    return bucket;
  }
}
