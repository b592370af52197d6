import { Redis } from "@upstash/redis";

export type RedisConfig = { url: string; token: string };

let redisConfig: RedisConfig | null = null;
let redisClient: Redis | null = null;

export const setRedisConfig = (config: RedisConfig) => {
  // Same credentials: keep the live client and the limiter built on it
  if (redisConfig?.url === config.url && redisConfig.token === config.token) {
    return;
  }

  redisConfig = config;
  redisClient = null; // rebuilt lazily by getRedisClient
};

export const isRedisConfigured = (): boolean => redisConfig !== null;

export const getRedisClient = (): Redis => {
  if (!redisClient) {
    if (!redisConfig) {
      throw new Error("Redis is not configured; set UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN");
    }
    redisClient = new Redis({ url: redisConfig.url, token: redisConfig.token });
  }
  return redisClient;
};
