import { DEFAULT_TTL, generateKey, type ICacheService } from "../../../lib/cache";
import type { IMetrics } from "../../../lib/metrics";
import { isValidTimeout, MAX_TIMEOUT_MS } from "../../../lib/concurrency";
import { ConfigurationError } from "../errors";
import { Part, type PartOptions, type Producer } from "./Part";

export type CachedPartOptions<TContext> = PartOptions & {
  ttlSeconds?: number;
  /** Defaults to `partstream:<name>`. Derive from the context for per-user data. */
  cacheKey?: string | ((context: TContext) => string);
};

/**
 * Declarative builder for the ordered part list of one response.
 *
 * @example
 * registry
 *   .addStatic("meta", { version: 1 })
 *   .add("orders", (ctx) => loadOrders(ctx.userId))
 *   .addCached("analytics", computeAnalytics, { ttlSeconds: 600 });
 */
export class PartRegistry<TContext> {
  private readonly parts: Part<TContext>[] = [];
  private readonly byName = new Map<string, Part<TContext>>();

  constructor(
    private readonly cache: ICacheService,
    /** Receives cache hit/miss counts from cached parts. */
    private readonly metrics: IMetrics | null = null,
  ) {}

  register(part: Part<TContext>): this {
    if (!part.name) {
      throw new ConfigurationError("Part name cannot be empty");
    }
    if (this.byName.has(part.name)) {
      throw new ConfigurationError(`Duplicate part name: ${part.name}`);
    }
    if (part.timeoutMs !== null && !isValidTimeout(part.timeoutMs)) {
      throw new ConfigurationError(
        `Timeout for part '${part.name}' must be a positive number of at most ${MAX_TIMEOUT_MS}ms`,
      );
    }

    this.parts.push(part);
    this.byName.set(part.name, part);
    return this;
  }

  add(name: string, producer: Producer<TContext>, options?: PartOptions): this {
    return this.register(new Part<TContext>(name, { kind: "function", producer }, options));
  }

  addStatic(name: string, value: unknown, options?: Pick<PartOptions, "dependencies">): this {
    return this.register(new Part<TContext>(name, { kind: "static", value }, { ...options, lazy: false }));
  }

  addCached(
    name: string,
    producer: Producer<TContext>,
    { ttlSeconds = DEFAULT_TTL, cacheKey, ...options }: CachedPartOptions<TContext> = {},
  ): this {
    if (ttlSeconds <= 0) {
      throw new ConfigurationError(`Cache TTL for part '${name}' must be positive`);
    }

    return this.register(
      new Part<TContext>(
        name,
        {
          kind: "cached",
          producer,
          cache: this.cache,
          metrics: this.metrics,
          cacheKey: cacheKey ?? generateKey("partstream", name),
          ttlSeconds,
        },
        options,
      ),
    );
  }

  list(): readonly Part<TContext>[] {
    return this.parts;
  }

  get(name: string): Part<TContext> | undefined {
    return this.byName.get(name);
  }

  get size(): number {
    return this.parts.length;
  }

  reset(): void {
    this.parts.forEach((part) => part.reset());
  }
}
