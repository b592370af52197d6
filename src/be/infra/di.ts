import { asValue, createContainer, InjectionMode, type AwilixContainer } from "awilix";
import type { ICacheService } from "../../lib/cache";
import { InMemoryMetrics, type IMetrics } from "../../lib/metrics";
import { registerReportDomain } from "../report";
import type { ISalesRepository } from "../report/api";
import type { Chunker } from "../stream/_internal/Chunker";
import type { CursorCodec } from "../stream/_internal/CursorCodec";
import type { KeyAccessor } from "../stream/_internal/KeyAccessor";
import type { ResponseAssembler } from "../stream/_internal/ResponseAssembler";
import type { IProgressiveDeliveryService, ProgressiveSettings } from "../stream/api";
import { registerStreamDomain } from "../stream";

// Define the shape of our dependencies
export interface Cradle {
  settings: ProgressiveSettings;
  clock: () => number;
  partCache: ICacheService;
  metrics: IMetrics;
  cursorCodec: CursorCodec;
  chunker: Chunker;
  responseAssembler: ResponseAssembler;
  keyAccessor: KeyAccessor;
  progressiveService: IProgressiveDeliveryService;
  salesRepository: ISalesRepository;
}

export type ContainerOptions = {
  settings: ProgressiveSettings;
  partCache: ICacheService;
  metrics?: IMetrics;
  clock?: () => number;
};

export const createAppContainer = ({
  settings,
  partCache,
  clock = Date.now,
  metrics = new InMemoryMetrics(clock),
}: ContainerOptions): AwilixContainer<Cradle> => {
  const container = createContainer<Cradle>({
    injectionMode: InjectionMode.PROXY,
  });

  // 1. Register Infrastructure
  container.register({
    settings: asValue(settings),
    clock: asValue(clock),
    partCache: asValue(partCache),
    metrics: asValue(metrics),
  });

  // 2. Register Domains
  registerStreamDomain(container);
  registerReportDomain(container);

  return container;
};
