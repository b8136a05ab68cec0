import { Redis } from "@upstash/redis";
import { env } from "./env";

/**
 * Cache strategy:
 * - Production: Upstash Redis (if configured).
 * - Local dev / tests: in-memory fallback.
 *
 * Values are strings to keep this layer generic and predictable.
 */
export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
}

type CacheValue = { value: string; expiresAt: number };

export class MemoryCache implements Cache {
  private mem = new Map<string, CacheValue>();

  constructor(private now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const hit = this.mem.get(key);
    if (!hit) return null;

    if (this.now() > hit.expiresAt) {
      this.mem.delete(key);
      return null;
    }

    return hit.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.mem.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }
}

export class RedisCache implements Cache {
  constructor(private redis: Redis) {}

  async get(key: string): Promise<string | null> {
    const v = await this.redis.get<unknown>(key);
    if (v === null || v === undefined) return null;
    // A client with automatic deserialization hands back parsed JSON.
    return typeof v === "string" ? v : JSON.stringify(v);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, value, { ex: ttlSeconds });
  }
}

export function createRedis(
  config: { url?: string; token?: string } = {
    url: env.UPSTASH_REDIS_REST_URL,
    token: env.UPSTASH_REDIS_REST_TOKEN
  }
): Redis | null {
  const { url, token } = config;
  // Values stay raw strings; JSON is handled by cacheGetJson/cacheSetJson.
  return url && token ? new Redis({ url, token, automaticDeserialization: false }) : null;
}

export function createCache(redis: Redis | null = createRedis()): Cache {
  return redis ? new RedisCache(redis) : new MemoryCache();
}

/**
 * JSON helpers. A corrupt entry is a miss, not an error.
 */
export async function cacheGetJson<T>(cache: Cache, key: string, parse: (raw: unknown) => T): Promise<T | null> {
  const cached = await cache.get(key);
  if (!cached) return null;
  try {
    return parse(JSON.parse(cached));
  } catch {
    return null;
  }
}

export async function cacheSetJson(cache: Cache, key: string, value: unknown, ttlSeconds: number): Promise<void> {
  await cache.set(key, JSON.stringify(value), ttlSeconds);
}
