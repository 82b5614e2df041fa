/**
 * Periodic purge of expired refresh tokens.
 *
 * Runs on its own timer, decoupled from request handling. Failures are
 * logged and the next tick tries again.
 */

import type { RefreshTokenStore } from '@packroom/auth';
import { createLogger } from './logger.js';
import { MAX_TIMER_DELAY_MS } from './rate-limiter.js';

const log = createLogger('Sweeper');

export interface SweeperOptions {
  intervalMs: number;
  /** Abort a single sweep after this long (default: 30s) */
  timeoutMs?: number;
}

export class RefreshTokenSweeper {
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly timeoutMs: number;

  constructor(
    private readonly store: Pick<RefreshTokenStore, 'sweep'>,
    private readonly opts: SweeperOptions,
  ) {
    if (opts.intervalMs <= 0) throw new RangeError('Sweep interval must be positive');
    if (opts.intervalMs > MAX_TIMER_DELAY_MS) {
      throw new RangeError(`Sweep interval must not exceed ${MAX_TIMER_DELAY_MS}ms`);
    }
    this.timeoutMs = opts.timeoutMs ?? 30_000;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.opts.intervalMs);
    this.timer.unref();
    log.info('Refresh token sweep scheduled', { intervalMs: this.opts.intervalMs });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** One sweep. Resolves with the number of rows removed; 0 when it failed. */
  async runOnce(): Promise<number> {
    try {
      const removed = await this.store.sweep({ signal: AbortSignal.timeout(this.timeoutMs) });
      log.info('Expired refresh tokens removed', { removed });
      return removed;
    } catch (err) {
      log.error('Refresh token sweep failed', err);
      return 0;
    }
  }
}
