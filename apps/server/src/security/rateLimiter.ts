export interface SlidingWindowRateLimiterOptions {
  readonly windowSeconds: number;
  readonly maxAttempts: number;
}

/**
 * Counts attempts per key over a trailing window. Each key keeps the timestamps of its recent
 * attempts, so capacity frees up one attempt at a time as old entries age out.
 */
export class SlidingWindowRateLimiter {
  private readonly windowMs: number;
  private readonly maxAttempts: number;
  private readonly attempts = new Map<string, number[]>();

  constructor(options: SlidingWindowRateLimiterOptions) {
    this.windowMs = options.windowSeconds * 1000;
    this.maxAttempts = options.maxAttempts;
  }

  /**
   * Records the attempt and returns true when it fits in the window. Rejected attempts are not
   * recorded.
   */
  allow(key: string, now: number = Date.now()): boolean {
    this.evictExpired(now);

    const recent = this.attempts.get(key) ?? [];
    if (recent.length >= this.maxAttempts) {
      return false;
    }
    recent.push(now);
    this.attempts.set(key, recent);
    return true;
  }

  reset(key: string): void {
    this.attempts.delete(key);
  }

  private evictExpired(now: number) {
    const cutoff = now - this.windowMs;
    for (const [key, timestamps] of this.attempts) {
      const live = timestamps.filter((timestamp) => timestamp > cutoff);
      if (live.length === 0) {
        this.attempts.delete(key);
      } else if (live.length !== timestamps.length) {
        this.attempts.set(key, live);
      }
    }
  }
}
