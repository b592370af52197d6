import { isDeepStrictEqual } from "node:util";
import type { ChunkInfo, CursorContext, ProgressiveSettings } from "../api";
import { ConfigurationError, InvalidCursorError } from "../errors";
import type { CursorCodec } from "./CursorCodec";

export type ChunkWindow<T> = {
  items: readonly T[];
  /** Half-open range `[start, end)` into the full list. */
  start: number;
  end: number;
  total: number;
  /** Chunk size the window was cut with. */
  size: number;
  cursor: string | null;
  context: CursorContext;
};

export type WindowRequest = {
  cursor?: string | null;
  /** Per-request size; non-positive or missing values fall back to the default. */
  chunkSize?: number;
  /** Per-endpoint default, used in place of the global one. */
  defaultChunkSize?: number;
  /** Fresh caller context to carry into the next cursor. */
  context?: CursorContext;
};

type ChunkerDeps = {
  cursorCodec: CursorCodec;
  settings: ProgressiveSettings;
};

const isPositiveInteger = (n: unknown): n is number =>
  typeof n === "number" && Number.isInteger(n) && n > 0;

export class Chunker {
  private readonly cursorCodec: CursorCodec;
  private readonly defaultChunkSize: number;

  constructor({ cursorCodec, settings }: ChunkerDeps) {
    if (!isPositiveInteger(settings.chunkSize)) {
      throw new ConfigurationError("Chunk size must be a positive integer");
    }
    this.cursorCodec = cursorCodec;
    this.defaultChunkSize = settings.chunkSize;
  }

  resolveChunkSize(requested?: number, fallback: number = this.defaultChunkSize): number {
    if (isPositiveInteger(requested)) return requested;
    return isPositiveInteger(fallback) ? fallback : this.defaultChunkSize;
  }

  /**
   * Selects the slice of `items` to evaluate now and issues the cursor for the
   * rest. The caller must rebuild the same ordered list for every request that
   * carries a cursor for it.
   */
  window<T>(items: readonly T[], request: WindowRequest = {}): ChunkWindow<T> {
    const size = this.resolveChunkSize(request.chunkSize, request.defaultChunkSize);
    const { position, carried } = this.readCursor(request.cursor);
    const context = mergeContext(carried, request.context ?? {});

    const total = items.length;
    const start = position;
    const end = Math.min(start + size, total);

    // A cursor past the end of a shrunk list is a terminal, empty window
    const window = start >= total ? [] : items.slice(start, end);
    const cursor = end < total ? this.cursorCodec.encode({ ...context, position: end }) : null;

    return { items: window, start, end: Math.max(start, end), total, size, cursor, context };
  }

  private readCursor(cursor: string | null | undefined): {
    position: number;
    carried: CursorContext;
  } {
    if (!cursor) {
      return { position: 0, carried: {} };
    }

    const { position = 0, ...carried } = this.cursorCodec.decode(cursor);
    if (typeof position !== "number" || !Number.isInteger(position) || position < 0) {
      throw new InvalidCursorError("Invalid cursor position");
    }
    return { position, carried };
  }
}

export const describeChunk = ({ start, end, total, size }: ChunkWindow<unknown>): ChunkInfo => {
  const totalChunks = Math.ceil(total / size);
  const loaded = Math.min(end, total);

  return {
    current_chunk: Math.min(Math.floor(start / size) + 1, totalChunks),
    chunk_size: size,
    total_items: total,
    total_chunks: totalChunks,
    items_loaded: loaded,
    items_remaining: total - loaded,
    progress_percent: total === 0 ? 100 : Math.round((loaded / total) * 10_000) / 100,
  };
};

const mergeContext = (carried: CursorContext, fresh: CursorContext): CursorContext => {
  for (const [key, value] of Object.entries(fresh)) {
    if (key in carried && !isDeepStrictEqual(carried[key], value)) {
      throw new InvalidCursorError(`Cursor context mismatch on '${key}'`);
    }
  }
  return { ...carried, ...fresh };
};
