import { describe, expect, test } from "vitest";
import { InMemoryMetrics, MAX_SAMPLES } from "./metrics";

describe("InMemoryMetrics", () => {
  test("should stamp samples with the clock and default tags to empty", () => {
    const metrics = new InMemoryMetrics(() => Date.parse("2024-05-01T12:00:00.000Z"));

    metrics.record("cache_hit", 1);

    expect(metrics.get("cache_hit")).toEqual([
      { name: "cache_hit", value: 1, tags: {}, timestamp: "2024-05-01T12:00:00.000Z" },
    ]);
  });

  test("should keep only the latest samples of each metric", () => {
    const metrics = new InMemoryMetrics(() => 0);

    for (let i = 0; i < MAX_SAMPLES + 5; i++) metrics.record("response_time", i);
    metrics.record("error_count", 1);

    const values = metrics.get("response_time").map((s) => s.value);
    expect(values).toHaveLength(MAX_SAMPLES);
    expect(values[0]).toBe(5);
    expect(values[MAX_SAMPLES - 1]).toBe(MAX_SAMPLES + 4);
    expect(metrics.get("error_count")).toHaveLength(1);
  });

  test("should return copies callers cannot mutate", () => {
    const metrics = new InMemoryMetrics(() => 0);
    metrics.record("cache_miss", 1);

    metrics.get("cache_miss").pop();

    expect(metrics.get("cache_miss")).toHaveLength(1);
  });

  test("should list every metric in a snapshot", () => {
    const metrics = new InMemoryMetrics(() => 0);
    metrics.record("response_time", 12, { endpoint: "report" });

    expect(metrics.snapshot()).toEqual({
      response_time: [{ name: "response_time", value: 12, tags: { endpoint: "report" }, timestamp: "1970-01-01T00:00:00.000Z" }],
      cache_hit: [],
      cache_miss: [],
      error_count: [],
    });
  });
});
