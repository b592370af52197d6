import type { ICacheService } from "../../../lib/cache";
import type { IMetrics } from "../../../lib/metrics";

/**
 * Computes a part's value. The signal is aborted when the evaluation times out;
 * long-running producers should stop work when it fires.
 */
export type Producer<TContext> = (context: TContext, signal: AbortSignal) => unknown;

export type PartSource<TContext> =
  | { kind: "static"; value: unknown }
  | { kind: "function"; producer: Producer<TContext> }
  | {
      kind: "cached";
      producer: Producer<TContext>;
      cache: ICacheService;
      metrics: IMetrics | null;
      cacheKey: string | ((context: TContext) => string);
      ttlSeconds: number;
    };

export type PartOptions = {
  lazy?: boolean;
  dependencies?: readonly string[];
  timeoutMs?: number;
};

export class Part<TContext> {
  readonly lazy: boolean;
  readonly dependencies: readonly string[];
  readonly timeoutMs: number | null;
  private memo: Promise<unknown> | null = null;

  constructor(
    readonly name: string,
    private readonly source: PartSource<TContext>,
    { lazy = true, dependencies = [], timeoutMs }: PartOptions = {},
  ) {
    this.lazy = source.kind === "static" ? false : lazy;
    this.dependencies = dependencies;
    this.timeoutMs = timeoutMs ?? null;
  }

  get kind(): PartSource<TContext>["kind"] {
    return this.source.kind;
  }

  /**
   * Lazy parts run their producer at most once per instance; a rejected run is
   * forgotten so the next call retries. Errors always propagate.
   */
  evaluate(context: TContext, signal: AbortSignal = new AbortController().signal): Promise<unknown> {
    if (!this.lazy) {
      return this.produce(context, signal);
    }

    if (!this.memo) {
      const pending = this.produce(context, signal);
      this.memo = pending;
      pending.catch(() => {
        if (this.memo === pending) this.memo = null;
      });
    }
    return this.memo;
  }

  reset(): void {
    this.memo = null;
  }

  private async produce(context: TContext, signal: AbortSignal): Promise<unknown> {
    const source = this.source;

    switch (source.kind) {
      case "static":
        return source.value;

      case "function":
        return await source.producer(context, signal);

      case "cached": {
        const key =
          typeof source.cacheKey === "function" ? source.cacheKey(context) : source.cacheKey;

        const hit = await source.cache.get(key);
        if (hit !== null && hit !== undefined) {
          source.metrics?.record("cache_hit", 1, { part: this.name });
          return hit;
        }
        source.metrics?.record("cache_miss", 1, { part: this.name });

        const value = await source.producer(context, signal);
        await source.cache.set(key, value, source.ttlSeconds);
        return value;
      }

      default: {
        const unknownSource: never = source;
        throw new Error(`Unhandled part source: ${JSON.stringify(unknownSource)}`);
      }
    }
  }
}
