import type {
  KeyedEnvelope,
  Manifest,
  ManifestEntry,
  PartErrorPayload,
  ProgressiveSettings,
} from "../api";
import { TooManyKeysRequestedError } from "../errors";
import type { Part } from "./Part";
import type { ResponseAssembler } from "./ResponseAssembler";

export type KeyAccessOptions = {
  maxKeys?: number;
  allowedKeys?: readonly string[];
};

type KeyAccessorDeps = {
  responseAssembler: ResponseAssembler;
  settings: ProgressiveSettings;
};

const notFound = (key: string): PartErrorPayload => ({
  error: `Part '${key}' not found`,
  type: "not_found",
});

const notAllowed = (key: string): PartErrorPayload => ({
  error: `Part '${key}' not allowed`,
  type: "not_allowed",
});

/** Splits a `keys=a,b` query value, dropping blanks. */
export const parseKeys = (raw: string): string[] =>
  raw
    .split(",")
    .map((k) => k.trim())
    .filter((k) => k.length > 0);

/**
 * Random access to named parts. Holds no positional state; repeated calls with
 * the same keys are idempotent apart from whatever the parts cache themselves.
 */
export class KeyAccessor {
  private readonly responseAssembler: ResponseAssembler;
  private readonly maxKeysPerRequest: number;

  constructor({ responseAssembler, settings }: KeyAccessorDeps) {
    this.responseAssembler = responseAssembler;
    this.maxKeysPerRequest = settings.maxKeysPerRequest;
  }

  async getByKeys<TContext>(
    parts: readonly Part<TContext>[],
    keys: readonly string[],
    context: TContext,
    { maxKeys = this.maxKeysPerRequest, allowedKeys }: KeyAccessOptions = {},
  ): Promise<KeyedEnvelope> {
    const requested = [...new Set(keys)];
    if (requested.length > maxKeys) {
      throw new TooManyKeysRequestedError(requested.length, maxKeys);
    }

    const byName = new Map(parts.map((part) => [part.name, part]));
    const selected = requested
      .filter((key) => !allowedKeys || allowedKeys.includes(key))
      .flatMap((key) => byName.get(key) ?? []);

    const outcomes = await this.responseAssembler.evaluate(selected, context);
    const values = new Map(outcomes.map(({ name, value }) => [name, value]));

    const results = Object.fromEntries(
      requested.map((key): [string, unknown] => {
        if (!byName.has(key)) return [key, notFound(key)];
        if (!values.has(key)) return [key, notAllowed(key)];
        return [key, values.get(key)];
      }),
    );

    return {
      results,
      requested_keys: requested,
      timestamp: this.responseAssembler.timestamp(),
    };
  }

  /** Describes the part list without evaluating anything. */
  manifest<TContext>(parts: readonly Part<TContext>[]): Manifest {
    return Object.fromEntries(
      parts.map((part, index): [string, ManifestEntry] => [
        part.name,
        {
          key: part.name,
          index,
          type: part.lazy ? "lazy" : "static",
          dependencies: [...part.dependencies],
        },
      ]),
    );
  }
}
