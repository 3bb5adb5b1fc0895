import type { Logger } from 'pino';
import type { ZodType } from 'zod';

const CACHE_KEY = 'stats:current';

/** The subset of ioredis the cache needs. */
export interface CacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
}

/**
 * Short-lived read-through cache for the current stats snapshot.
 *
 * Best-effort: Redis failures are logged and the caller computes the
 * value directly. Entries that no longer match `schema` count as misses.
 * A TTL of 0 disables caching entirely.
 */
export class StatsCache<T> {
  constructor(
    private readonly store: CacheStore,
    private readonly schema: ZodType<T>,
    private readonly ttlSeconds: number,
    private readonly log: Pick<Logger, 'warn' | 'debug'>,
  ) {}

  get enabled(): boolean {
    return this.ttlSeconds > 0;
  }

  async getOrCompute(compute: () => Promise<T>): Promise<T> {
    if (!this.enabled) return compute();

    const cached = await this.read();
    if (cached !== null) {
      this.log.debug({ key: CACHE_KEY }, 'Stats cache hit');
      return cached;
    }

    const value = await compute();
    await this.write(value);
    return value;
  }

  /** Drops the cached snapshot after a write changed the event log. */
  async invalidate(): Promise<void> {
    if (!this.enabled) return;
    try {
      await this.store.del(CACHE_KEY);
    } catch (err: unknown) {
      this.log.warn({ err, key: CACHE_KEY }, 'Failed to invalidate stats cache');
    }
  }

  private async read(): Promise<T | null> {
    try {
      const raw = await this.store.get(CACHE_KEY);
      if (raw === null) return null;
      const parsed = this.schema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch (err: unknown) {
      this.log.warn({ err, key: CACHE_KEY }, 'Stats cache read failed, computing directly');
      return null;
    }
  }

  private async write(value: T): Promise<void> {
    try {
      await this.store.set(CACHE_KEY, JSON.stringify(value), 'EX', this.ttlSeconds);
    } catch (err: unknown) {
      this.log.warn({ err, key: CACHE_KEY }, 'Stats cache write failed');
    }
  }
}
