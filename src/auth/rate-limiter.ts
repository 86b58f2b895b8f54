/**
 * Rate Limiter - per-key sliding window kept in process memory.
 *
 * Keys are `user:<id>` for authenticated requests and `login:<username>`
 * for login attempts.
 */

// =============================================================================
// § Types
// =============================================================================

export interface RateLimitConfig {
  /** Maximum requests per window */
  maxRequests: number;
  /** Window duration in milliseconds */
  windowMs: number;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  /** Epoch ms when the oldest request in the window expires */
  resetAt: number;
  limit: number;
}

// =============================================================================
// § Sliding Window
// =============================================================================

export class MemoryRateLimiter {
  private readonly windows = new Map<string, number[]>();
  private checksSinceSweep = 0;

  constructor(
    private readonly config: RateLimitConfig,
    private readonly now: () => number = Date.now,
    private readonly sweepEvery = 100
  ) {}

  /**
   * Record a request for `key` if the window has room.
   */
  check(key: string): RateLimitResult {
    if (++this.checksSinceSweep >= this.sweepEvery) {
      this.checksSinceSweep = 0;
      this.sweep();
    }

    const now = this.now();
    const active = (this.windows.get(key) ?? []).filter((t) => t > now - this.config.windowMs);
    const oldest = active[0];
    const resetAt = (oldest ?? now) + this.config.windowMs;

    if (active.length >= this.config.maxRequests) {
      this.windows.set(key, active);
      return { allowed: false, remaining: 0, resetAt, limit: this.config.maxRequests };
    }

    active.push(now);
    this.windows.set(key, active);
    return {
      allowed: true,
      remaining: this.config.maxRequests - active.length,
      resetAt,
      limit: this.config.maxRequests,
    };
  }

  reset(key: string): void {
    this.windows.delete(key);
  }

  /** Drop keys with no requests left in their window */
  sweep(): void {
    const cutoff = this.now() - this.config.windowMs;
    for (const [key, timestamps] of this.windows) {
      const active = timestamps.filter((t) => t > cutoff);
      if (active.length === 0) {
        this.windows.delete(key);
      } else {
        this.windows.set(key, active);
      }
    }
  }

  get trackedKeys(): number {
    return this.windows.size;
  }
}
