import { logger } from '../observability/logger';

interface RateBucket {
  count: number;
  resetAt: number;
}

export interface RateCheck {
  allowed: boolean;
  remaining: number;
  retryAfterMs: number;
}

/**
 * In-memory fixed-window rate limiter.
 * In production with multiple instances, replace with a Redis-backed window.
 */
export class RateLimiter {
  private buckets: Map<string, RateBucket> = new Map();
  private readonly windowMs: number;

  constructor(
    private readonly maxRequests: number,
    windowSeconds: number,
    private readonly now: () => number = Date.now,
  ) {
    this.windowMs = windowSeconds * 1000;
    // Periodic cleanup every 5 minutes
    setInterval(() => this.cleanup(), 5 * 60 * 1000).unref();
  }

  /**
   * Counts one attempt against `key`.
   */
  check(key: string): RateCheck {
    const now = this.now();
    let bucket = this.buckets.get(key);

    if (!bucket || now >= bucket.resetAt) {
      bucket = { count: 0, resetAt: now + this.windowMs };
      this.buckets.set(key, bucket);
    }

    bucket.count++;

    if (bucket.count > this.maxRequests) {
      const retryAfterMs = bucket.resetAt - now;
      logger.warn({ key, count: bucket.count, limit: this.maxRequests }, 'Rate limit exceeded');
      return { allowed: false, remaining: 0, retryAfterMs };
    }

    return {
      allowed: true,
      remaining: this.maxRequests - bucket.count,
      retryAfterMs: 0,
    };
  }

  /** Forget a key, e.g. after a successful login */
  reset(key: string): void {
    this.buckets.delete(key);
  }

  private cleanup(): void {
    const now = this.now();
    for (const [key, bucket] of this.buckets) {
      if (now >= bucket.resetAt) {
        this.buckets.delete(key);
      }
    }
  }
}
