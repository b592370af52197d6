import { z } from "zod";
import { MAX_TIMEOUT_MS } from "./lib/concurrency";
import type { ProgressiveSettings } from "./be/stream/api";
import { ConfigurationError } from "./be/stream/errors";

// Unset variables in a .env file arrive as empty strings
const blankToUndefined = (value: unknown) => (value === "" ? undefined : value);

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const optionalString = z.preprocess(blankToUndefined, z.string().optional());

const envSchema = z.object({
  CURSOR_SECRET: z.string({ required_error: "is required" }).min(1, "is required"),
  PROGRESSIVE_CHUNK_SIZE: positiveInt(2),
  // Seconds; "none" or 0 disables expiry
  PROGRESSIVE_CURSOR_TTL: z.preprocess(
    blankToUndefined,
    z.union([z.literal("none"), z.coerce.number().int().nonnegative()]).default(3600),
  ),
  PROGRESSIVE_MAX_KEYS: positiveInt(10),
  PROGRESSIVE_MAX_CURSOR_SIZE: positiveInt(1024),
  PROGRESSIVE_CONCURRENCY: positiveInt(4),
  PROGRESSIVE_PART_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
  ),
  JWT_SECRET: optionalString,
  UPSTASH_REDIS_REST_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  UPSTASH_REDIS_REST_TOKEN: optionalString,
  FRONTEND_URL: optionalString,
  PORT: positiveInt(3000),
});

export type AppConfig = {
  settings: ProgressiveSettings;
  port: number;
  jwtSecret: string | null;
  redis: { url: string; token: string } | null;
  frontendUrl: string | null;
};

/**
 * Reads and validates the environment. Every problem is reported at once, and
 * any problem is fatal: this runs at startup, never per request.
 */
export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")} ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  const url = vars.UPSTASH_REDIS_REST_URL;
  const token = vars.UPSTASH_REDIS_REST_TOKEN;

  if (Boolean(url) !== Boolean(token)) {
    console.warn(
      "[Config] Only one of UPSTASH_REDIS_REST_URL / UPSTASH_REDIS_REST_TOKEN is set; Redis stays disabled",
    );
  }

  const ttl = vars.PROGRESSIVE_CURSOR_TTL;

  return {
    settings: {
      cursorSecret: vars.CURSOR_SECRET,
      chunkSize: vars.PROGRESSIVE_CHUNK_SIZE,
      cursorTtl: ttl === "none" || ttl === 0 ? null : ttl,
      maxKeysPerRequest: vars.PROGRESSIVE_MAX_KEYS,
      maxCursorSize: vars.PROGRESSIVE_MAX_CURSOR_SIZE,
      concurrency: vars.PROGRESSIVE_CONCURRENCY,
      partTimeoutMs: vars.PROGRESSIVE_PART_TIMEOUT_MS ?? null,
    },
    port: vars.PORT,
    jwtSecret: vars.JWT_SECRET ?? null,
    redis: url && token ? { url, token } : null,
    frontendUrl: vars.FRONTEND_URL ?? null,
  };
};
