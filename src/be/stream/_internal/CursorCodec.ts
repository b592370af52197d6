import { createCipheriv, createDecipheriv, pbkdf2Sync, randomBytes } from "node:crypto";
import { z } from "zod";
import type { CursorPayload } from "../api";
import { ConfigurationError, CursorExpiredError, InvalidCursorError } from "../errors";

// --- Encryption Parameters ---
const ALGORITHM = "aes-256-gcm";
const SALT = "partstream:cursor:v1"; // Fixed salt so every instance derives the same key from the secret
const DEFAULT_ITERATIONS = 100_000;
const KEY_LENGTH = 32;
const IV_LENGTH = 12;
const TAG_LENGTH = 16;

const DEFAULT_MAX_TOKEN_LENGTH = 1024;

const envelopeSchema = z
  .object({
    d: z.record(z.unknown()),
    iat: z.number().int().nonnegative().optional(),
    ttl: z.number().positive().optional(),
  })
  .strict();

type CursorEnvelope = z.infer<typeof envelopeSchema>;

export type CursorCodecOptions = {
  secret: string;
  /** Seconds. null means cursors never expire. */
  ttlSeconds?: number | null;
  /** Tokens longer than this are rejected before decryption. */
  maxTokenLength?: number;
  iterations?: number;
  now?: () => number;
};

// Sorts plain-object keys so the same payload always serialises identically.
const sortKeys = (_key: string, value: unknown): unknown => {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
};

const isPositive = (n: number) => Number.isFinite(n) && n > 0;

/**
 * Stateless, tamper-evident cursor tokens.
 *
 * A token is `base64url(iv | tag | ciphertext)` where the ciphertext is the
 * AES-256-GCM encryption of `{ d: payload, iat?, ttl? }`. Any server holding the
 * same secret can decode a token issued by any other.
 */
export class CursorCodec {
  private readonly key: Buffer;
  private readonly ttlSeconds: number | null;
  private readonly maxTokenLength: number;
  private readonly now: () => number;

  constructor({
    secret,
    ttlSeconds = null,
    maxTokenLength = DEFAULT_MAX_TOKEN_LENGTH,
    iterations = DEFAULT_ITERATIONS,
    now = Date.now,
  }: CursorCodecOptions) {
    if (!secret) {
      throw new ConfigurationError("A cursor secret is required for cursor encryption");
    }
    if (ttlSeconds !== null && !isPositive(ttlSeconds)) {
      throw new ConfigurationError("Cursor TTL must be positive");
    }
    if (!Number.isInteger(maxTokenLength) || maxTokenLength <= 0) {
      throw new ConfigurationError("Maximum cursor size must be a positive integer");
    }

    this.key = pbkdf2Sync(secret, SALT, iterations, KEY_LENGTH, "sha256");
    this.ttlSeconds = ttlSeconds;
    this.maxTokenLength = maxTokenLength;
    this.now = now;
  }

  encode(payload: CursorPayload, ttlSeconds: number | null = this.ttlSeconds): string {
    if (ttlSeconds !== null && !isPositive(ttlSeconds)) {
      throw new ConfigurationError("Cursor TTL must be positive");
    }

    const envelope: CursorEnvelope =
      ttlSeconds === null ? { d: payload } : { d: payload, iat: this.now(), ttl: ttlSeconds };

    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.key, iv, { authTagLength: TAG_LENGTH });
    const ciphertext = Buffer.concat([
      cipher.update(JSON.stringify(envelope, sortKeys), "utf8"),
      cipher.final(),
    ]);

    return Buffer.concat([iv, cipher.getAuthTag(), ciphertext]).toString("base64url");
  }

  decode(token: string): CursorPayload {
    if (token.length > this.maxTokenLength) {
      throw new InvalidCursorError("Cursor too large");
    }

    const raw = Buffer.from(token, "base64url");
    // Buffer.from skips junk characters and ignores trailing bits, so only the
    // canonical spelling of the bytes is accepted.
    if (raw.length <= IV_LENGTH + TAG_LENGTH || raw.toString("base64url") !== token) {
      throw new InvalidCursorError("Invalid cursor format");
    }

    const iv = raw.subarray(0, IV_LENGTH);
    const tag = raw.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
    const ciphertext = raw.subarray(IV_LENGTH + TAG_LENGTH);

    let plaintext: string;
    try {
      const decipher = createDecipheriv(ALGORITHM, this.key, iv, { authTagLength: TAG_LENGTH });
      decipher.setAuthTag(tag);
      plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString("utf8");
    } catch (error) {
      throw new InvalidCursorError("Cursor authentication failed", { cause: error });
    }

    const envelope = this.parseEnvelope(plaintext);

    if (envelope.iat !== undefined) {
      const ttl = envelope.ttl ?? this.ttlSeconds;
      if (ttl !== null && this.now() - envelope.iat > ttl * 1000) {
        throw new CursorExpiredError();
      }
    }

    return envelope.d;
  }

  isValid(token: string): boolean {
    try {
      this.decode(token);
      return true;
    } catch (error) {
      if (error instanceof InvalidCursorError || error instanceof CursorExpiredError) {
        return false;
      }
      throw error;
    }
  }

  private parseEnvelope(plaintext: string): CursorEnvelope {
    let json: unknown;
    try {
      json = JSON.parse(plaintext);
    } catch (error) {
      throw new InvalidCursorError("Invalid cursor format", { cause: error });
    }

    const parsed = envelopeSchema.safeParse(json);
    if (!parsed.success) {
      throw new InvalidCursorError("Invalid cursor structure", { cause: parsed.error });
    }
    return parsed.data;
  }
}
