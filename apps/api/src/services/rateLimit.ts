import { Ratelimit } from "@upstash/ratelimit";
import type { Redis } from "@upstash/redis";

export type RateLimitResult = { allowed: boolean; remaining: number };

export type RateLimiter = (key: string) => Promise<RateLimitResult>;

/**
 * Rate limiting:
 * - Production: Upstash Redis-based ratelimit if configured.
 * - Local dev: in-memory fixed window.
 *
 * Keep the middleware minimal: deterministic, low overhead, no noisy try/catch.
 */
export function createRateLimiter(opts: {
  limit: number;
  redis: Redis | null;
  windowMs?: number;
  now?: () => number;
}): RateLimiter {
  const { limit, redis } = opts;

  if (redis) {
    const limiter = new Ratelimit({
      redis,
      limiter: Ratelimit.slidingWindow(limit, "1 m")
    });
    return async (key) => {
      const r = await limiter.limit(key);
      return { allowed: r.success, remaining: r.remaining };
    };
  }

  const windowMs = opts.windowMs ?? 60_000;
  const now = opts.now ?? Date.now;
  const memHits = new Map<string, { count: number; resetAt: number }>();

  return async (key) => {
    const t = now();
    const cur = memHits.get(key);
    if (!cur || t > cur.resetAt) {
      memHits.set(key, { count: 1, resetAt: t + windowMs });
      return { allowed: true, remaining: limit - 1 };
    }

    if (cur.count >= limit) return { allowed: false, remaining: 0 };

    cur.count += 1;
    return { allowed: true, remaining: limit - cur.count };
  };
}
