/**
 * Cache Client
 *
 * TTL-based key/value caching used by the distance provider. The store
 * interface mirrors the string commands of a Redis client so a networked store
 * can replace the in-memory one without touching callers.
 */

import { z } from 'zod';

export interface CacheConfig {
  /** Default TTL in seconds */
  defaultTtlSeconds: number;
  /** Enable cache (can be disabled for testing) */
  enabled: boolean;
  /** Prefix prepended to every key */
  keyPrefix: string;
}

export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  defaultTtlSeconds: 24 * 60 * 60,
  enabled: true,
  keyPrefix: '',
};

/**
 * Minimal async string store
 */
export interface CacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(key: string): Promise<void>;
  delPattern(pattern: string): Promise<number>;
}

/**
 * In-memory store for development and tests
 */
export class InMemoryCacheStore implements CacheStore {
  private cache: Map<string, { value: string; expiresAt: number }> = new Map();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.cache.get(key);
    if (!entry) return null;

    if (this.now() >= entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }

    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const now = this.now();
    this.evictExpired(now);
    this.cache.set(key, {
      value,
      expiresAt: now + ttlSeconds * 1000,
    });
  }

  async del(key: string): Promise<void> {
    this.cache.delete(key);
  }

  async delPattern(pattern: string): Promise<number> {
    const prefix = pattern.replace('*', '');
    let count = 0;
    for (const key of [...this.cache.keys()]) {
      if (key.startsWith(prefix)) {
        this.cache.delete(key);
        count++;
      }
    }
    return count;
  }

  private evictExpired(now: number): void {
    for (const [key, entry] of this.cache) {
      if (now >= entry.expiresAt) this.cache.delete(key);
    }
  }

  size(): number {
    return this.cache.size;
  }
}

const CacheEnvelopeSchema = z.object({
  data: z.unknown(),
  cachedAt: z.string(),
  version: z.string(),
});

/**
 * Typed JSON cache on top of a CacheStore.
 *
 * Values are wrapped in a versioned envelope; entries written under another
 * version, or that fail the caller's schema, read as misses.
 */
export class CacheClient {
  private readonly config: CacheConfig;
  private readonly cacheVersion = '1.0.0';

  constructor(
    private readonly store: CacheStore = new InMemoryCacheStore(),
    config: Partial<CacheConfig> = {}
  ) {
    this.config = { ...DEFAULT_CACHE_CONFIG, ...config };
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  async get<T>(key: string, schema: z.ZodType<T>): Promise<T | null> {
    if (!this.config.enabled) return null;

    const cached = await this.store.get(`${this.config.keyPrefix}${key}`);
    if (cached === null) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(cached);
    } catch {
      return null;
    }

    const envelope = CacheEnvelopeSchema.safeParse(raw);
    if (!envelope.success || envelope.data.version !== this.cacheVersion) {
      return null;
    }

    const value = schema.safeParse(envelope.data.data);
    return value.success ? value.data : null;
  }

  async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    if (!this.config.enabled) return;

    const envelope = {
      data: value,
      cachedAt: new Date().toISOString(),
      version: this.cacheVersion,
    };

    await this.store.set(
      `${this.config.keyPrefix}${key}`,
      JSON.stringify(envelope),
      ttlSeconds ?? this.config.defaultTtlSeconds
    );
  }

  async invalidate(key: string): Promise<void> {
    await this.store.del(`${this.config.keyPrefix}${key}`);
  }

  async invalidatePattern(pattern: string): Promise<number> {
    return this.store.delPattern(`${this.config.keyPrefix}${pattern}`);
  }
}
