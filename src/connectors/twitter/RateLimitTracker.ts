// src/connectors/twitter/RateLimitTracker.ts

/** Bookmarks endpoint allowance: 180 requests per 15-minute window. */
export const BOOKMARKS_RATE_LIMIT = 180;

/**
 * Remaining-request count and reset time from `x-rate-limit-*` headers.
 */
export class RateLimitTracker {
  private remaining: number;
  private resetAtSeconds: number | null = null;

  constructor(
    private ceiling = BOOKMARKS_RATE_LIMIT,
    private now: () => number = Date.now
  ) {
    this.remaining = ceiling;
  }

  update(headers: Record<string, string>): void {
    const remaining = Number.parseInt(headers['x-rate-limit-remaining'] ?? '', 10);
    if (!Number.isNaN(remaining)) this.remaining = remaining;

    const reset = Number.parseFloat(headers['x-rate-limit-reset'] ?? '');
    if (!Number.isNaN(reset)) this.resetAtSeconds = reset;
  }

  /** Milliseconds to wait before the next request; 0 when none. Includes one second of slack. */
  msUntilReady(): number {
    if (this.remaining > 1 || this.resetAtSeconds === null) return 0;

    const untilReset = this.resetAtSeconds * 1000 - this.now();
    return untilReset > 0 ? untilReset + 1000 : 0;
  }

  /** After waiting out a window the full allowance is assumed. */
  restore(): void {
    this.remaining = this.ceiling;
  }

  get snapshot(): { remaining: number; resetAtSeconds: number | null } {
    return { remaining: this.remaining, resetAtSeconds: this.resetAtSeconds };
  }
}
