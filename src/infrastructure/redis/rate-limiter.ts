/** The subset of ioredis the limiter needs. */
export interface CounterStore {
  incr(key: string): Promise<number>;
  pexpire(key: string, milliseconds: number): Promise<number>;
}

export interface RateLimitPolicy {
  /** Groups counters per endpoint family, e.g. "webhook". */
  scope: string;
  /** Requests allowed per window. */
  limit: number;
  window_ms: number;
}

export type RateLimitDecision =
  | { readonly allowed: true; readonly remaining: number }
  | { readonly allowed: false; readonly retry_after_seconds: number };

/**
 * Fixed-window request counter kept in Redis.
 *
 * Each (scope, client, window) gets its own key, which expires with the
 * window. The first hit in a window sets the expiry.
 */
export class FixedWindowRateLimiter {
  constructor(
    private readonly store: CounterStore,
    private readonly policy: RateLimitPolicy,
    private readonly now: () => number = Date.now,
  ) {}

  async hit(clientKey: string): Promise<RateLimitDecision> {
    const now = this.now();
    const windowIndex = Math.floor(now / this.policy.window_ms);
    const key = `ratelimit:${this.policy.scope}:${clientKey}:${windowIndex}`;

    const hits = await this.store.incr(key);
    if (hits === 1) {
      await this.store.pexpire(key, this.policy.window_ms);
    }

    if (hits > this.policy.limit) {
      const windowEnd = (windowIndex + 1) * this.policy.window_ms;
      return {
        allowed: false,
        retry_after_seconds: Math.max(1, Math.ceil((windowEnd - now) / 1000)),
      };
    }

    return { allowed: true, remaining: this.policy.limit - hits };
  }
}
