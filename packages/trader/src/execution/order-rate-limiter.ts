/**
 * Sliding 60-second window of dispatched-order timestamps.
 *
 * allow() only checks; record() appends. Callers record right after an
 * order is actually dispatched so check-only calls never count.
 */

export const RATE_WINDOW_MS = 60_000;

export class OrderRateLimiter {
  private readonly timestamps: number[] = [];

  constructor(
    readonly maxPerMinute: number,
    private readonly now: () => number = Date.now
  ) {
    if (!Number.isInteger(maxPerMinute) || maxPerMinute <= 0) {
      throw new RangeError(`maxPerMinute must be a positive integer, got ${maxPerMinute}`);
    }
  }

  /**
   * True while fewer than maxPerMinute orders were recorded in the last 60s
   */
  allow(): boolean {
    this.evict();
    return this.timestamps.length < this.maxPerMinute;
  }

  record(): void {
    this.timestamps.push(this.now());
  }

  /** Orders recorded in the current window */
  get windowCount(): number {
    this.evict();
    return this.timestamps.length;
  }

  // Timestamps are non-decreasing, so expired entries form a prefix
  private evict(): void {
    const now = this.now();
    while (this.timestamps.length > 0 && now - this.timestamps[0] > RATE_WINDOW_MS) {
      this.timestamps.shift();
    }
  }
}
