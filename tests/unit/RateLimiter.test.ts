// tests/unit/RateLimiter.test.ts

import { describe, it, expect } from 'vitest';
import { SlidingWindowRateLimiter } from '../../src/webhook/RateLimiter';

describe('SlidingWindowRateLimiter', () => {
  it('should allow up to the limit within the window', () => {
    let now = 0;
    const limiter = new SlidingWindowRateLimiter({ requests: 2, windowSeconds: 60 }, () => now);

    expect(limiter.tryAcquire('+15550001111')).toBe(true);
    now = 1000;
    expect(limiter.tryAcquire('+15550001111')).toBe(true);
    now = 2000;
    expect(limiter.tryAcquire('+15550001111')).toBe(false);
  });

  it('should free capacity as old hits leave the window', () => {
    let now = 0;
    const limiter = new SlidingWindowRateLimiter({ requests: 2, windowSeconds: 60 }, () => now);

    limiter.tryAcquire('a');
    now = 30_000;
    limiter.tryAcquire('a');
    now = 59_000;
    expect(limiter.tryAcquire('a')).toBe(false);
    now = 60_001;
    expect(limiter.tryAcquire('a')).toBe(true);
  });

  it('should not count rejected attempts', () => {
    let now = 0;
    const limiter = new SlidingWindowRateLimiter({ requests: 1, windowSeconds: 10 }, () => now);

    limiter.tryAcquire('a');
    now = 5000;
    expect(limiter.tryAcquire('a')).toBe(false);
    now = 10_001;
    expect(limiter.tryAcquire('a')).toBe(true);
  });

  it('should track senders separately', () => {
    const limiter = new SlidingWindowRateLimiter({ requests: 1, windowSeconds: 60 }, () => 0);

    expect(limiter.tryAcquire('a')).toBe(true);
    expect(limiter.tryAcquire('b')).toBe(true);
    expect(limiter.tryAcquire('a')).toBe(false);
    expect(limiter.trackedKeys).toBe(2);
  });

  it('should forget senders whose window has emptied', () => {
    let now = 0;
    const limiter = new SlidingWindowRateLimiter({ requests: 5, windowSeconds: 60 }, () => now);

    limiter.tryAcquire('a');
    limiter.tryAcquire('b');
    expect(limiter.trackedKeys).toBe(2);

    now = 60_001;
    limiter.tryAcquire('c');

    expect(limiter.trackedKeys).toBe(1);
  });

  it('should keep senders still inside the window', () => {
    let now = 0;
    const limiter = new SlidingWindowRateLimiter({ requests: 5, windowSeconds: 60 }, () => now);

    limiter.tryAcquire('a');
    now = 30_000;
    limiter.tryAcquire('b');
    now = 61_000;
    limiter.tryAcquire('c');

    expect(limiter.trackedKeys).toBe(2);
  });
});
