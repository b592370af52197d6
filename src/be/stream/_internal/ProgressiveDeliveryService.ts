import type { ICacheService } from "../../../lib/cache";
import type { IMetrics } from "../../../lib/metrics";
import type {
  IProgressiveDeliveryService,
  KeyedEnvelope,
  Manifest,
  ProgressiveEndpoint,
  ProgressiveEnvelope,
} from "../api";
import { ConfigurationError } from "../errors";
import type { Chunker } from "./Chunker";
import type { KeyAccessor } from "./KeyAccessor";
import type { Part } from "./Part";
import { PartRegistry } from "./PartRegistry";
import type { ResponseAssembler } from "./ResponseAssembler";

type ProgressiveDeliveryServiceDeps = {
  chunker: Chunker;
  responseAssembler: ResponseAssembler;
  keyAccessor: KeyAccessor;
  partCache: ICacheService;
  metrics: IMetrics;
  clock: () => number;
};

const assertPositiveInteger = (value: number | undefined, label: string) => {
  if (value !== undefined && (!Number.isInteger(value) || value <= 0)) {
    throw new ConfigurationError(`${label} must be a positive integer`);
  }
};

/**
 * Validates an endpoint definition at setup time so that misconfiguration
 * fails at startup rather than on the first request.
 */
export const defineEndpoint = <TContext>(
  endpoint: ProgressiveEndpoint<TContext>,
): ProgressiveEndpoint<TContext> => {
  if (!endpoint.name) {
    throw new ConfigurationError("Endpoint name cannot be empty");
  }
  assertPositiveInteger(endpoint.chunkSize, `Chunk size of '${endpoint.name}'`);
  assertPositiveInteger(endpoint.maxKeysPerRequest, `Key limit of '${endpoint.name}'`);
  return endpoint;
};

export class ProgressiveDeliveryService implements IProgressiveDeliveryService {
  private readonly chunker: Chunker;
  private readonly responseAssembler: ResponseAssembler;
  private readonly keyAccessor: KeyAccessor;
  private readonly partCache: ICacheService;
  private readonly metrics: IMetrics;
  private readonly clock: () => number;

  constructor({
    chunker,
    responseAssembler,
    keyAccessor,
    partCache,
    metrics,
    clock,
  }: ProgressiveDeliveryServiceDeps) {
    this.chunker = chunker;
    this.responseAssembler = responseAssembler;
    this.keyAccessor = keyAccessor;
    this.partCache = partCache;
    this.metrics = metrics;
    this.clock = clock;
  }

  async deliver<TContext>(
    endpoint: ProgressiveEndpoint<TContext>,
    { cursor, chunkSize, context }: { cursor?: string | null; chunkSize?: number; context: TContext },
  ): Promise<ProgressiveEnvelope> {
    return this.timed(endpoint.name, "cursor", async () => {
      const parts = await this.buildParts(endpoint, context);
      const window = this.chunker.window(parts, {
        cursor,
        chunkSize,
        defaultChunkSize: endpoint.chunkSize,
        context: endpoint.carry?.(context) ?? {},
      });
      return this.responseAssembler.assemble(window, context);
    });
  }

  async deliverKeys<TContext>(
    endpoint: ProgressiveEndpoint<TContext>,
    { keys, context }: { keys: readonly string[]; context: TContext },
  ): Promise<KeyedEnvelope> {
    return this.timed(endpoint.name, "keys", async () => {
      const parts = await this.buildParts(endpoint, context);
      return this.keyAccessor.getByKeys(parts, keys, context, {
        maxKeys: endpoint.maxKeysPerRequest,
        allowedKeys: endpoint.allowedKeys,
      });
    });
  }

  async manifest<TContext>(endpoint: ProgressiveEndpoint<TContext>, context: TContext): Promise<Manifest> {
    const parts = await this.buildParts(endpoint, context);
    return this.keyAccessor.manifest(parts);
  }

  // Milliseconds, recorded whether the delivery succeeds or fails
  private async timed<T>(endpoint: string, method: "cursor" | "keys", run: () => Promise<T>): Promise<T> {
    const startedAt = this.clock();
    try {
      return await run();
    } finally {
      this.metrics.record("response_time", this.clock() - startedAt, { endpoint, method });
    }
  }

  private async buildParts<TContext>(
    endpoint: ProgressiveEndpoint<TContext>,
    context: TContext,
  ): Promise<readonly Part<TContext>[]> {
    const registry = new PartRegistry<TContext>(this.partCache, this.metrics);
    await endpoint.parts(registry, context);
    return registry.list();
  }
}
