import { isValidTimeout, mapWithConcurrency, withTimeout } from "../../../lib/concurrency";
import type { IMetrics } from "../../../lib/metrics";
import type { PartErrorPayload, ProgressiveEnvelope, ProgressiveSettings } from "../api";
import { ConfigurationError, errorMessage, PartTimeoutError } from "../errors";
import { describeChunk, type ChunkWindow } from "./Chunker";
import type { Part } from "./Part";

export type PartOutcome = {
  name: string;
  ok: boolean;
  value: unknown;
};

type ResponseAssemblerDeps = {
  settings: ProgressiveSettings;
  clock: () => number;
  metrics: IMetrics;
};

const toErrorPayload = (name: string, error: unknown): PartErrorPayload => {
  if (error instanceof PartTimeoutError) {
    return { error: error.message, type: "timeout_error" };
  }
  return { error: `Failed to load ${name}: ${errorMessage(error)}`, type: "loading_error" };
};

export class ResponseAssembler {
  private readonly concurrency: number;
  private readonly partTimeoutMs: number | null;
  private readonly clock: () => number;
  private readonly metrics: IMetrics;

  constructor({ settings, clock, metrics }: ResponseAssemblerDeps) {
    if (settings.partTimeoutMs !== null && !isValidTimeout(settings.partTimeoutMs)) {
      throw new ConfigurationError("Default part timeout is out of range");
    }
    this.concurrency = settings.concurrency;
    this.partTimeoutMs = settings.partTimeoutMs;
    this.clock = clock;
    this.metrics = metrics;
  }

  /**
   * Evaluates every part, in a bounded pool, isolating failures to the part's
   * own slot. Outcomes are returned in input order.
   */
  async evaluate<TContext>(
    parts: readonly Part<TContext>[],
    context: TContext,
  ): Promise<PartOutcome[]> {
    return mapWithConcurrency(parts, this.concurrency, async (part) => {
      const timeoutMs = part.timeoutMs ?? this.partTimeoutMs;
      try {
        const value = await withTimeout(
          (signal) => part.evaluate(context, signal),
          timeoutMs,
          () => new PartTimeoutError(part.name, timeoutMs ?? 0),
        );
        return { name: part.name, ok: true, value };
      } catch (error) {
        console.error(`[ProgressiveDelivery] Error processing part '${part.name}':`, error);
        const payload = toErrorPayload(part.name, error);
        this.metrics.record("error_count", 1, { part: part.name, type: payload.type });
        return { name: part.name, ok: false, value: payload };
      }
    });
  }

  async assemble<TContext>(
    window: ChunkWindow<Part<TContext>>,
    context: TContext,
  ): Promise<ProgressiveEnvelope> {
    const outcomes = await this.evaluate(window.items, context);

    return {
      results: outcomes.map(({ name, value }) => ({ [name]: value })),
      cursor: window.cursor,
      meta: {
        total_parts: window.total,
        current_chunk_size: window.items.length,
        has_more: window.cursor !== null,
        timestamp: this.timestamp(),
      },
      chunk_info: describeChunk(window),
    };
  }

  timestamp(): string {
    return new Date(this.clock()).toISOString();
  }
}
