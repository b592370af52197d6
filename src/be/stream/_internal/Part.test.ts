import { describe, expect, test, vi } from "vitest";
import { MemoryCache } from "../../../lib/cache";
import { InMemoryMetrics } from "../../../lib/metrics";
import { ConfigurationError } from "../errors";
import { Part } from "./Part";
import { PartRegistry } from "./PartRegistry";

type Ctx = { userId: string | null };

const anon: Ctx = { userId: null };

describe("Part", () => {
  test("static part returns its value and is never lazy", async () => {
    const part = new Part<Ctx>("meta", { kind: "static", value: { version: 1 } }, { lazy: true });

    expect(part.lazy).toBe(false);
    expect(part.kind).toBe("static");
    await expect(part.evaluate(anon)).resolves.toEqual({ version: 1 });
  });

  test("lazy part invokes its producer at most once", async () => {
    const producer = vi.fn(() => 42);
    const part = new Part<Ctx>("answer", { kind: "function", producer });

    await part.evaluate(anon);
    await part.evaluate(anon);
    const value = await part.evaluate(anon);

    expect(value).toBe(42);
    expect(producer).toHaveBeenCalledTimes(1);
  });

  test("concurrent evaluations of a lazy part share one run", async () => {
    const producer = vi.fn(async () => "shared");
    const part = new Part<Ctx>("shared", { kind: "function", producer });

    const values = await Promise.all([part.evaluate(anon), part.evaluate(anon)]);

    expect(values).toEqual(["shared", "shared"]);
    expect(producer).toHaveBeenCalledTimes(1);
  });

  test("non-lazy part recomputes on every evaluation", async () => {
    let calls = 0;
    const part = new Part<Ctx>("counter", { kind: "function", producer: () => ++calls }, { lazy: false });

    await part.evaluate(anon);
    await part.evaluate(anon);

    await expect(part.evaluate(anon)).resolves.toBe(3);
  });

  test("failed evaluation propagates and is not memoised", async () => {
    const producer = vi
      .fn()
      .mockImplementationOnce(() => {
        throw new Error("boom");
      })
      .mockReturnValue("ok");
    const part = new Part<Ctx>("flaky", { kind: "function", producer });

    await expect(part.evaluate(anon)).rejects.toThrow("boom");
    await expect(part.evaluate(anon)).resolves.toBe("ok");
    expect(producer).toHaveBeenCalledTimes(2);
  });

  test("reset discards the memoised value", async () => {
    const producer = vi.fn(() => "value");
    const part = new Part<Ctx>("resettable", { kind: "function", producer });

    await part.evaluate(anon);
    part.reset();
    await part.evaluate(anon);

    expect(producer).toHaveBeenCalledTimes(2);
  });

  test("passes the context and abort signal to the producer", async () => {
    const producer = vi.fn((ctx: Ctx, signal: AbortSignal) => `${ctx.userId}:${signal.aborted}`);
    const part = new Part<Ctx>("ctx", { kind: "function", producer });
    const controller = new AbortController();

    await expect(part.evaluate({ userId: "u1" }, controller.signal)).resolves.toBe("u1:false");
    expect(producer.mock.calls[0][1]).toBe(controller.signal);
  });

  test("defaults to lazy with no dependencies or timeout", () => {
    const part = new Part<Ctx>("plain", { kind: "function", producer: () => null });

    expect(part.lazy).toBe(true);
    expect(part.dependencies).toEqual([]);
    expect(part.timeoutMs).toBeNull();
  });
});

describe("PartRegistry", () => {
  test("keeps parts in declaration order", () => {
    const registry = new PartRegistry<Ctx>(new MemoryCache())
      .addStatic("meta", { v: 1 })
      .add("orders", () => [])
      .addCached("analytics", () => ({}));

    expect(registry.list().map((p) => p.name)).toEqual(["meta", "orders", "analytics"]);
    expect(registry.size).toBe(3);
    expect(registry.get("orders")?.kind).toBe("function");
    expect(registry.get("missing")).toBeUndefined();
  });

  test("rejects duplicate part names", () => {
    const registry = new PartRegistry<Ctx>(new MemoryCache()).add("orders", () => []);

    expect(() => registry.add("orders", () => [])).toThrow(ConfigurationError);
  });

  test("rejects empty names and non-positive timeouts", () => {
    const registry = new PartRegistry<Ctx>(new MemoryCache());

    expect(() => registry.add("", () => null)).toThrow(ConfigurationError);
    expect(() => registry.add("slow", () => null, { timeoutMs: 0 })).toThrow(ConfigurationError);
  });

  test.each([[3_000_000_000], [Infinity], [NaN]])("rejects a timeout of %s that timers cannot honour", (timeoutMs) => {
    const registry = new PartRegistry<Ctx>(new MemoryCache());

    expect(() => registry.add("slow", () => null, { timeoutMs })).toThrow(ConfigurationError);
  });

  test("accepts the longest timeout timers can honour", () => {
    const registry = new PartRegistry<Ctx>(new MemoryCache()).add("slow", () => null, {
      timeoutMs: 2_147_483_647,
    });

    expect(registry.get("slow")?.timeoutMs).toBe(2_147_483_647);
  });

  test("rejects a non-positive cache ttl", () => {
    const registry = new PartRegistry<Ctx>(new MemoryCache());

    expect(() => registry.addCached("stats", () => null, { ttlSeconds: 0 })).toThrow(ConfigurationError);
  });

  test("reset clears every memoised part", async () => {
    const producer = vi.fn(() => 1);
    const registry = new PartRegistry<Ctx>(new MemoryCache()).add("one", producer);
    const [part] = registry.list();

    await part.evaluate(anon);
    registry.reset();
    await part.evaluate(anon);

    expect(producer).toHaveBeenCalledTimes(2);
  });

  describe("addCached", () => {
    test("stores the value under the default key and serves later requests from cache", async () => {
      const cache = new MemoryCache();
      const producer = vi.fn(() => ({ total: 10 }));

      const [first] = new PartRegistry<Ctx>(cache).addCached("analytics", producer, { lazy: false }).list();
      await expect(first.evaluate(anon)).resolves.toEqual({ total: 10 });
      await expect(cache.get("partstream:analytics")).resolves.toEqual({ total: 10 });

      // A later request builds a new registry over the same cache
      const [second] = new PartRegistry<Ctx>(cache).addCached("analytics", producer).list();
      await expect(second.evaluate(anon)).resolves.toEqual({ total: 10 });

      expect(producer).toHaveBeenCalledTimes(1);
    });

    test("recomputes once the entry expires", async () => {
      let now = 1_000_000;
      const cache = new MemoryCache(() => now);
      const producer = vi.fn(() => "fresh");
      const [part] = new PartRegistry<Ctx>(cache)
        .addCached("stats", producer, { ttlSeconds: 60, lazy: false })
        .list();

      await part.evaluate(anon);
      now += 59_000;
      await part.evaluate(anon);
      now += 2_000;
      await part.evaluate(anon);

      expect(producer).toHaveBeenCalledTimes(2);
    });

    test("reports cache misses and hits to the metrics port", async () => {
      const metrics = new InMemoryMetrics(() => 0);
      const registry = new PartRegistry<Ctx>(new MemoryCache(), metrics);
      const [part] = registry.addCached("stats", () => "value", { lazy: false }).list();

      await part.evaluate(anon);
      await part.evaluate(anon);
      await part.evaluate(anon);

      expect(metrics.get("cache_miss").map((s) => s.tags)).toEqual([{ part: "stats" }]);
      expect(metrics.get("cache_hit").map((s) => s.tags)).toEqual([{ part: "stats" }, { part: "stats" }]);
    });

    test("derives the key from the context", async () => {
      const cache = new MemoryCache();
      const [part] = new PartRegistry<Ctx>(cache)
        .addCached("profile", (ctx) => `profile of ${ctx.userId}`, {
          cacheKey: (ctx) => `profile:${ctx.userId}`,
          lazy: false,
        })
        .list();

      await part.evaluate({ userId: "u1" });
      await part.evaluate({ userId: "u2" });

      await expect(cache.get("profile:u1")).resolves.toBe("profile of u1");
      await expect(cache.get("profile:u2")).resolves.toBe("profile of u2");
      expect(cache.size).toBe(2);
    });
  });
});
