import { getRedisClient } from "./redis";

export const DEFAULT_TTL = 60 * 5; // 5 minutes

export interface ICacheService {
  /** Resolves null on a miss. */
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
  del(key: string): Promise<void>;
}

/**
 * Generates a consistent cache key from parts.
 * Handles null/undefined by converting them to string "null".
 */
export const generateKey = (...parts: (string | number | null | undefined)[]) => {
  return parts
    .map((p) => (p === null || p === undefined ? "null" : String(p)))
    .join(":");
};

// Upstash parses stored JSON on read, so a bare "123" would come back as 123.
// Values are stored boxed to keep their type.
type Boxed = { v: unknown };

const unbox = (stored: unknown): unknown =>
  stored !== null && typeof stored === "object" && "v" in stored ? stored.v : null;

export const CacheServiceUpstash: ICacheService = {
  get: async (key: string): Promise<unknown> => {
    try {
      const redis = getRedisClient();
      return unbox(await redis.get<unknown>(key));
    } catch (e) {
      // Fail open: log error and treat as a cache miss
      console.error("[Cache Get Error]", e);
      return null;
    }
  },

  set: async (key: string, value: unknown, ttlSeconds: number = DEFAULT_TTL) => {
    try {
      const redis = getRedisClient();
      await redis.set<Boxed>(key, { v: value }, { ex: ttlSeconds });
    } catch (e) {
      console.error("[Cache Set Error]", e);
    }
  },

  del: async (key: string) => {
    try {
      const redis = getRedisClient();
      await redis.del(key);
    } catch (e) {
      console.error("[Cache Del Error]", e);
    }
  },
};

type MemoryEntry = { value: unknown; expiresAt: number };

/**
 * In-process cache used when Redis is not configured, and by tests.
 * Expired entries are dropped when read, and swept on every write.
 */
export class MemoryCache implements ICacheService {
  private entries = new Map<string, MemoryEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<unknown> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: unknown, ttlSeconds: number = DEFAULT_TTL): Promise<void> {
    const now = this.now();
    for (const [existing, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(existing);
    }
    this.entries.set(key, { value, expiresAt: now + ttlSeconds * 1000 });
  }

  async del(key: string): Promise<void> {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
