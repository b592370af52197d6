import type { PartRegistry } from "./_internal/PartRegistry";

/** Plaintext carried inside a cursor. Must be JSON-serialisable. */
export type CursorPayload = Record<string, unknown>;

/** Caller state carried from one cursor to the next (e.g. `user_id`). */
export type CursorContext = Record<string, unknown>;

export type PartErrorType =
  | "loading_error"
  | "timeout_error"
  | "not_found"
  | "not_allowed";

export type PartErrorPayload = {
  error: string;
  type: PartErrorType;
};

/** Singleton mapping `{ [partName]: value }`, one per evaluated part. */
export type PartResult = Record<string, unknown>;

export type ProgressiveMeta = {
  total_parts: number;
  current_chunk_size: number;
  has_more: boolean;
  timestamp: string;
};

/** Position of the window within the whole part list, at this window's chunk size. */
export type ChunkInfo = {
  /** 1-based; 0 when there is nothing to deliver. */
  current_chunk: number;
  chunk_size: number;
  total_items: number;
  total_chunks: number;
  items_loaded: number;
  items_remaining: number;
  progress_percent: number;
};

export type ProgressiveEnvelope = {
  results: PartResult[];
  cursor: string | null;
  meta: ProgressiveMeta;
  chunk_info: ChunkInfo;
};

export type KeyedEnvelope = {
  results: Record<string, unknown>;
  requested_keys: string[];
  timestamp: string;
};

export type ManifestEntry = {
  key: string;
  index: number;
  type: "lazy" | "static";
  dependencies: string[];
};

export type Manifest = Record<string, ManifestEntry>;

export type ProgressiveSettings = {
  cursorSecret: string;
  chunkSize: number;
  /** Seconds; null means cursors never expire. */
  cursorTtl: number | null;
  maxKeysPerRequest: number;
  maxCursorSize: number;
  concurrency: number;
  partTimeoutMs: number | null;
};

export type ProgressiveEndpoint<TContext> = {
  name: string;
  /** Populates a fresh registry for every request. Order must be stable. */
  parts: (registry: PartRegistry<TContext>, context: TContext) => void | Promise<void>;
  chunkSize?: number;
  maxKeysPerRequest?: number;
  allowedKeys?: readonly string[];
  /** Context written into every cursor issued for this endpoint. */
  carry?: (context: TContext) => CursorContext;
};

export interface IProgressiveDeliveryService {
  deliver<TContext>(
    endpoint: ProgressiveEndpoint<TContext>,
    request: { cursor?: string | null; chunkSize?: number; context: TContext },
  ): Promise<ProgressiveEnvelope>;

  deliverKeys<TContext>(
    endpoint: ProgressiveEndpoint<TContext>,
    request: { keys: readonly string[]; context: TContext },
  ): Promise<KeyedEnvelope>;

  manifest<TContext>(
    endpoint: ProgressiveEndpoint<TContext>,
    context: TContext,
  ): Promise<Manifest>;
}
