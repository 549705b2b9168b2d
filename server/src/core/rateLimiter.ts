/** Per-connection cap on inbound events within a trailing time window. */
export class SlidingWindowRateLimiter {
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly accepted: number[] = [];

  constructor(limit: number, windowMs: number) {
    this.limit = Math.max(1, limit);
    this.windowMs = windowMs;
  }

  tryAcquire(nowMs: number = Date.now()): boolean {
    this.evictBefore(nowMs - this.windowMs);

    if (this.accepted.length >= this.limit) {
      return false;
    }

    this.accepted.push(nowMs);
    return true;
  }

  /** Milliseconds until the next event would be accepted; 0 when one would be now. */
  retryAfterMs(nowMs: number = Date.now()): number {
    this.evictBefore(nowMs - this.windowMs);

    if (this.accepted.length < this.limit) {
      return 0;
    }
    return this.accepted[0] + this.windowMs - nowMs + 1;
  }

  private evictBefore(threshold: number): void {
    while (this.accepted.length > 0 && this.accepted[0] < threshold) {
      this.accepted.shift();
    }
  }
}
