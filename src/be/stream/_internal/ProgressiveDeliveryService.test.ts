import { describe, expect, test, vi } from "vitest";
import { MemoryCache } from "../../../lib/cache";
import { InMemoryMetrics } from "../../../lib/metrics";
import type { ProgressiveSettings } from "../api";
import { ConfigurationError } from "../errors";
import { Chunker } from "./Chunker";
import { CursorCodec } from "./CursorCodec";
import { KeyAccessor } from "./KeyAccessor";
import { defineEndpoint, ProgressiveDeliveryService } from "./ProgressiveDeliveryService";
import { ResponseAssembler } from "./ResponseAssembler";

const settings: ProgressiveSettings = {
  cursorSecret: "test-secret",
  chunkSize: 2,
  cursorTtl: null,
  maxKeysPerRequest: 10,
  maxCursorSize: 1024,
  concurrency: 4,
  partTimeoutMs: null,
};

type Ctx = { tenant: string };

describe("ProgressiveDeliveryService", () => {
  let now = 0;
  const clock = () => now;
  const metrics = new InMemoryMetrics(clock);
  const cursorCodec = new CursorCodec({ secret: settings.cursorSecret });
  const responseAssembler = new ResponseAssembler({ settings, clock, metrics });
  const service = new ProgressiveDeliveryService({
    chunker: new Chunker({ cursorCodec, settings }),
    responseAssembler,
    keyAccessor: new KeyAccessor({ responseAssembler, settings }),
    partCache: new MemoryCache(clock),
    metrics,
    clock,
  });

  const build = vi.fn();
  const slowTenants = new Set<string>();
  const endpoint = defineEndpoint<Ctx>({
    name: "letters",
    chunkSize: 3,
    maxKeysPerRequest: 2,
    allowedKeys: ["a", "b", "c"],
    carry: (ctx) => ({ tenant: ctx.tenant }),
    parts: (registry, ctx) => {
      build();
      // Advances the clock so delivery time is observable
      if (slowTenants.has(ctx.tenant)) now += 25;
      ["a", "b", "c", "d"].forEach((name) => registry.add(name, () => `${ctx.tenant}:${name}`));
      registry.addCached("total", () => 4, { cacheKey: `total:${ctx.tenant}` });
    },
  });

  test("deliver uses the endpoint chunk size and carries its context", async () => {
    const first = await service.deliver(endpoint, { context: { tenant: "t1" } });

    expect(first.results).toEqual([{ a: "t1:a" }, { b: "t1:b" }, { c: "t1:c" }]);
    expect(cursorCodec.decode(first.cursor ?? "")).toEqual({ tenant: "t1", position: 3 });

    const second = await service.deliver(endpoint, { cursor: first.cursor, context: { tenant: "t1" } });
    expect(second.results).toEqual([{ d: "t1:d" }, { total: 4 }]);
    expect(second.cursor).toBeNull();
  });

  test("deliver lets a request override the chunk size", async () => {
    const page = await service.deliver(endpoint, { chunkSize: 1, context: { tenant: "t1" } });

    expect(page.meta.current_chunk_size).toBe(1);
  });

  test("builds a fresh part list for every request", async () => {
    build.mockClear();

    await service.deliver(endpoint, { context: { tenant: "t1" } });
    await service.manifest(endpoint, { tenant: "t1" });

    expect(build).toHaveBeenCalledTimes(2);
  });

  test("records the delivery time of every request, failed or not", async () => {
    slowTenants.add("t-slow");
    const before = metrics.get("response_time").length;

    await service.deliver(endpoint, { context: { tenant: "t-slow" } });
    await service.deliverKeys(endpoint, { keys: ["a"], context: { tenant: "t-slow" } });
    await expect(
      service.deliverKeys(endpoint, { keys: ["a", "b", "c"], context: { tenant: "t1" } }),
    ).rejects.toThrow();

    const samples = metrics.get("response_time").slice(before);
    expect(samples.map((s) => [s.value, s.tags])).toEqual([
      [25, { endpoint: "letters", method: "cursor" }],
      [25, { endpoint: "letters", method: "keys" }],
      [0, { endpoint: "letters", method: "keys" }],
    ]);
  });

  test("counts cache misses and hits of cached parts", async () => {
    const hitsBefore = metrics.get("cache_hit").length;
    const missesBefore = metrics.get("cache_miss").length;

    await service.deliver(endpoint, { chunkSize: 5, context: { tenant: "t-cache" } });
    await service.deliver(endpoint, { chunkSize: 5, context: { tenant: "t-cache" } });

    expect(metrics.get("cache_miss").slice(missesBefore).map((s) => s.tags)).toEqual([{ part: "total" }]);
    expect(metrics.get("cache_hit").slice(hitsBefore).map((s) => s.tags)).toEqual([{ part: "total" }]);
  });

  test("deliverKeys applies the endpoint limit and allow-list", async () => {
    await expect(service.deliverKeys(endpoint, { keys: ["a", "b", "c"], context: { tenant: "t1" } })).rejects.toThrow(
      "Too many keys requested. Maximum: 2",
    );

    const result = await service.deliverKeys(endpoint, { keys: ["a", "d"], context: { tenant: "t1" } });
    expect(result.results).toEqual({
      a: "t1:a",
      d: { error: "Part 'd' not allowed", type: "not_allowed" },
    });
  });
});

describe("defineEndpoint", () => {
  const parts = () => {};

  test.each([
    [{ name: "", parts }],
    [{ name: "x", parts, chunkSize: 0 }],
    [{ name: "x", parts, chunkSize: 2.5 }],
    [{ name: "x", parts, maxKeysPerRequest: -1 }],
  ])("rejects %j", (endpoint) => {
    expect(() => defineEndpoint(endpoint)).toThrow(ConfigurationError);
  });
});
