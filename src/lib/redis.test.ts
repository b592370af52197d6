import { describe, expect, test } from "vitest";
import { getRedisClient, isRedisConfigured, setRedisConfig } from "./redis";

describe("redis client", () => {
  test("should refuse a client before configuration", () => {
    expect(isRedisConfigured()).toBe(false);
    expect(() => getRedisClient()).toThrow("Redis is not configured");
  });

  test("should keep the client while the credentials stay the same", () => {
    setRedisConfig({ url: "https://redis.example.com", token: "test-token" });
    const first = getRedisClient();

    setRedisConfig({ url: "https://redis.example.com", token: "test-token" });
    expect(getRedisClient()).toBe(first);

    setRedisConfig({ url: "https://redis.example.com", token: "other-test-token" });
    expect(getRedisClient()).not.toBe(first);
    expect(isRedisConfigured()).toBe(true);
  });
});
