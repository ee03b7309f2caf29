import type { createClient } from "redis";

/**
 * Minimal key/value contract the metadata cache needs. Implementations must
 * be safe for concurrent use; per-key get/set is the only atomicity assumed.
 */
export interface CacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
}

export type RedisClient = ReturnType<typeof createClient>;

export function createRedisStore(client: RedisClient): CacheStore {
  return {
    async get(key) {
      return client.get(key);
    },
    async set(key, value, ttlSeconds) {
      await client.set(key, value, { EX: ttlSeconds });
    },
  };
}

/**
 * In-process TTL store. Used when Redis is unreachable and in tests.
 */
export class MemoryStore implements CacheStore {
  private entries = new Map<string, { value: string; expiresAt: number }>();

  constructor(private now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  clear(): void {
    this.entries.clear();
  }

  /** Number of entries, including ones that have expired but not been read. */
  get size(): number {
    return this.entries.size;
  }
}
