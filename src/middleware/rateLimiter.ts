import { Ratelimit } from "@upstash/ratelimit";
import { createMiddleware } from "hono/factory";
import type { AppEnv } from "../context";
import { getRedisClient, isRedisConfigured } from "../lib/redis";

// A single limiter instance, lazily initialized once Redis is configured
let ratelimit: Ratelimit | null = null;

const getRatelimit = () => {
  if (ratelimit) return ratelimit;
  if (!isRedisConfigured()) return null;

  ratelimit = new Ratelimit({
    redis: getRedisClient(),
    limiter: Ratelimit.slidingWindow(10, "10 s"), // 10 requests per 10 seconds
    analytics: true,
    // In-memory cache of block decisions
    ephemeralCache: new Map(),
    prefix: "partstream:ratelimit",
  });
  return ratelimit;
};

/**
 * Sliding-window throttle over Redis. Skipped entirely (fail open) when Redis
 * is not configured. Mount after `optionalAuth` to limit by user id.
 */
export const rateLimiter = createMiddleware<AppEnv>(async (c, next) => {
  const limiter = getRatelimit();

  if (!limiter) {
    return next();
  }

  // Identify caller: user id when authenticated, otherwise IP
  const ip =
    c.req.header("CF-Connecting-IP") ||
    c.req.header("X-Forwarded-For")?.split(",")[0]?.trim() ||
    "127.0.0.1";
  const identifier = c.get("user")?.id ?? ip;

  const { success, limit, reset, remaining } = await limiter.limit(identifier);

  c.header("X-RateLimit-Limit", limit.toString());
  c.header("X-RateLimit-Remaining", remaining.toString());
  c.header("X-RateLimit-Reset", reset.toString());

  if (!success) {
    return c.json({ error: { message: "Too Many Requests", code: "rate_limit_exceeded" } }, 429);
  }

  await next();
});
