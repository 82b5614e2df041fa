import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TokenBucketRateLimiter } from '../rate-limiter.js';

describe('TokenBucketRateLimiter', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1_000_000;
  });

  function tenPerMinute(): TokenBucketRateLimiter {
    return new TokenBucketRateLimiter({ requestsPerWindow: 10, windowMs: 60_000, clock });
  }

  it('allows exactly the bucket capacity back to back', () => {
    const limiter = tenPerMinute();
    for (let i = 0; i < 10; i++) {
      expect(limiter.allow('198.51.100.1')).toBe(true);
    }
    expect(limiter.allow('198.51.100.1')).toBe(false);
  });

  it('keeps buckets independent per key', () => {
    const limiter = tenPerMinute();
    for (let i = 0; i < 10; i++) limiter.allow('198.51.100.1');

    expect(limiter.allow('198.51.100.1')).toBe(false);
    expect(limiter.allow('198.51.100.2')).toBe(true);
    expect(limiter.size).toBe(2);
  });

  it('refills one token per window / rate', () => {
    const limiter = tenPerMinute();
    for (let i = 0; i < 10; i++) {
      limiter.allow('a');
      limiter.allow('b');
    }

    now += 5_999;
    expect(limiter.allow('a')).toBe(false);
    now += 1;
    expect(limiter.allow('b')).toBe(true);
    expect(limiter.allow('b')).toBe(false);
  });

  it('never refills above capacity', () => {
    const limiter = tenPerMinute();
    limiter.allow('a');
    now += 3_600_000;

    let allowed = 0;
    while (limiter.allow('a')) allowed++;
    expect(allowed).toBe(10);
  });

  it('honours a burst larger than the sustained rate', () => {
    const limiter = new TokenBucketRateLimiter({ requestsPerWindow: 2, windowMs: 1_000, burst: 5, clock });
    for (let i = 0; i < 5; i++) expect(limiter.allow('a')).toBe(true);
    expect(limiter.allow('a')).toBe(false);
    expect(limiter.capacity).toBe(5);

    now += 500;
    expect(limiter.allow('a')).toBe(true);
    expect(limiter.allow('a')).toBe(false);
  });

  describe('retryAfterSeconds', () => {
    it('is 0 for an unseen key or a key with tokens left', () => {
      const limiter = tenPerMinute();
      expect(limiter.retryAfterSeconds('a')).toBe(0);
      limiter.allow('a');
      expect(limiter.retryAfterSeconds('a')).toBe(0);
    });

    it('reports the time until the next token, rounded up', () => {
      const limiter = tenPerMinute();
      for (let i = 0; i < 10; i++) limiter.allow('a');
      expect(limiter.retryAfterSeconds('a')).toBe(6);

      now += 3_000;
      expect(limiter.retryAfterSeconds('a')).toBe(3);

      now += 2_500;
      expect(limiter.retryAfterSeconds('a')).toBe(1);
    });
  });

  describe('sweepIdle', () => {
    it('drops buckets idle longer than idleWindows windows', () => {
      const limiter = tenPerMinute();
      limiter.allow('old');
      now += 300_000;
      limiter.allow('recent');

      now += 300_000;
      expect(limiter.sweepIdle()).toBe(0);

      now += 1;
      expect(limiter.sweepIdle()).toBe(1);
      expect(limiter.size).toBe(1);
    });

    it('waits at least until a bucket could have refilled', () => {
      const limiter = new TokenBucketRateLimiter({
        requestsPerWindow: 1,
        windowMs: 1_000,
        burst: 100,
        idleWindows: 1,
        clock,
      });
      limiter.allow('a');

      now += 50_000;
      expect(limiter.sweepIdle()).toBe(0);
      now += 50_001;
      expect(limiter.sweepIdle()).toBe(1);
    });

    it('does not change later decisions for a swept key', () => {
      const limiter = tenPerMinute();
      for (let i = 0; i < 10; i++) limiter.allow('a');
      now += 600_001;
      limiter.sweepIdle();

      let allowed = 0;
      while (limiter.allow('a')) allowed++;
      expect(allowed).toBe(10);
    });
  });

  describe('start / stop', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('sweeps idle buckets on a timer until stopped', () => {
      vi.useFakeTimers();
      const limiter = new TokenBucketRateLimiter({
        requestsPerWindow: 10,
        windowMs: 60_000,
        idleWindows: 1,
        clock: () => Date.now(),
      });
      limiter.allow('a');
      limiter.start();

      vi.advanceTimersByTime(120_000);
      expect(limiter.size).toBe(0);

      limiter.stop();
      limiter.allow('b');
      vi.advanceTimersByTime(600_000);
      expect(limiter.size).toBe(1);
    });
  });

  it('rejects non-positive settings', () => {
    expect(() => new TokenBucketRateLimiter({ requestsPerWindow: 0, windowMs: 1_000 })).toThrow(RangeError);
    expect(() => new TokenBucketRateLimiter({ requestsPerWindow: 1, windowMs: 0 })).toThrow(RangeError);
    expect(() => new TokenBucketRateLimiter({ requestsPerWindow: 1, windowMs: 1_000, burst: -1 })).toThrow(
      RangeError,
    );
  });

  it('rejects a window longer than a timer can wait', () => {
    expect(() => new TokenBucketRateLimiter({ requestsPerWindow: 10, windowMs: 2_147_484_000 })).toThrow(
      'Rate limit window must not exceed 2147483647ms',
    );
  });

  it('reset forgets every bucket', () => {
    const limiter = tenPerMinute();
    for (let i = 0; i < 10; i++) limiter.allow('a');
    limiter.reset();
    expect(limiter.size).toBe(0);
    expect(limiter.allow('a')).toBe(true);
  });
});
