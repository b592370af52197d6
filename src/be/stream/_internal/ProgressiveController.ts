import { Hono, type Context, type Env } from "hono";
import { HTTPException } from "hono/http-exception";
import type { IProgressiveDeliveryService, ProgressiveEndpoint } from "../api";
import {
  CursorExpiredError,
  InvalidCursorError,
  InvalidRequestError,
  ProgressiveDeliveryError,
} from "../errors";
import { parseKeys } from "./KeyAccessor";

export type ProgressiveRouterOptions<E extends Env, TContext> = {
  resolveContext: (c: Context<E>) => TContext | Promise<TContext>;
};

// Truncated so tokens never land in logs whole
const sampleCursor = (cursor: string | undefined) =>
  cursor && cursor.length > 20 ? `${cursor.slice(0, 20)}...` : cursor;

const parseChunkSize = (raw: string | undefined): number | undefined => {
  if (raw === undefined) return undefined;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
};

/**
 * Maps classified failures to `{ error: { message, code } }`. Cursor rejections
 * never echo internal detail; anything unclassified is a generic 500.
 */
export const handleProgressiveError = (err: Error, c: Context) => {
  if (err instanceof InvalidCursorError || err instanceof CursorExpiredError) {
    console.warn(`[Cursor] ${err.name}: ${err.message}`, {
      cursor_sample: sampleCursor(c.req.query("cursor")),
      cursor_length: c.req.query("cursor")?.length ?? 0,
    });
    const message = err instanceof InvalidCursorError ? "Invalid cursor" : err.message;
    return c.json({ error: { message, code: err.code } }, 400);
  }

  if (err instanceof ProgressiveDeliveryError && err.status === 400) {
    return c.json({ error: { message: err.message, code: err.code } }, 400);
  }

  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  console.error("[ProgressiveDelivery] Unexpected error:", err);
  return c.json(
    {
      error: {
        message: "An unexpected error occurred during progressive delivery",
        code: "internal_error",
      },
    },
    500,
  );
};

/**
 * Mounts the three access methods for one endpoint:
 * `GET|POST /` (cursor), `GET /parts?keys=` (key-based) and `GET /manifest`.
 */
export const createProgressiveRouter = <E extends Env, TContext>(
  service: IProgressiveDeliveryService,
  endpoint: ProgressiveEndpoint<TContext>,
  { resolveContext }: ProgressiveRouterOptions<E, TContext>,
) => {
  const router = new Hono<E>();

  const deliver = async (c: Context<E>) => {
    const cursor = c.req.query("cursor") || null;
    const chunkSize = parseChunkSize(c.req.query("chunk_size"));
    const context = await resolveContext(c);

    const envelope = await service.deliver(endpoint, { cursor, chunkSize, context });

    console.log(`[ProgressiveDelivery] ${endpoint.name}`, {
      path: c.req.path,
      parts_count: envelope.meta.current_chunk_size,
      cursor_used: cursor !== null,
      has_more: envelope.meta.has_more,
    });
    return c.json(envelope);
  };

  router.get("/", deliver);
  router.post("/", deliver);

  router.get("/parts", async (c) => {
    const keysParam = c.req.query("keys");
    if (!keysParam) {
      throw new InvalidRequestError("Missing 'keys' parameter");
    }

    const keys = parseKeys(keysParam);
    if (keys.length === 0) {
      throw new InvalidRequestError("No valid keys provided");
    }

    const context = await resolveContext(c);
    const result = await service.deliverKeys(endpoint, { keys, context });
    return c.json(result);
  });

  router.get("/manifest", async (c) => {
    const context = await resolveContext(c);
    const parts = await service.manifest(endpoint, context);
    const base = new URL(c.req.url);
    const root = base.pathname.replace(/\/manifest\/?$/, "");

    return c.json({
      parts,
      access_methods: {
        token_based: `${base.origin}${root}`,
        key_based: `${base.origin}${root}/parts`,
        manifest: `${base.origin}${root}/manifest`,
      },
      timestamp: new Date().toISOString(),
    });
  });

  router.onError(handleProgressiveError);

  return router;
};
