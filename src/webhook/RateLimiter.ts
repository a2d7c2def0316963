// src/webhook/RateLimiter.ts

export interface SlidingWindowConfig {
  requests: number;
  windowSeconds: number;
}

/**
 * Per-key sliding window: at most `requests` accepted within any
 * `windowSeconds`. Rejected attempts are not recorded.
 */
export class SlidingWindowRateLimiter {
  private hits: Map<string, number[]> = new Map();
  private lastSweep = 0;

  constructor(
    private config: SlidingWindowConfig,
    private now: () => number = Date.now
  ) {}

  /** Records the attempt and returns true when it is within the limit. */
  tryAcquire(key: string): boolean {
    const now = this.now();
    const windowMs = this.config.windowSeconds * 1000;
    const windowStart = now - windowMs;
    if (now - this.lastSweep >= windowMs) {
      this.sweep(windowStart);
      this.lastSweep = now;
    }

    const recent = (this.hits.get(key) ?? []).filter((t) => t > windowStart);

    if (recent.length >= this.config.requests) {
      this.hits.set(key, recent);
      return false;
    }

    recent.push(now);
    this.hits.set(key, recent);
    return true;
  }

  /** Drops senders with no hit inside the window. */
  private sweep(windowStart: number): void {
    for (const [key, times] of this.hits) {
      if (!times.some((t) => t > windowStart)) {
        this.hits.delete(key);
      }
    }
  }

  get trackedKeys(): number {
    return this.hits.size;
  }
}
