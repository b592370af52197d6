export type ErrorStatus = 400 | 500 | 504;

/**
 * Base class for every classified failure of the progressive delivery core.
 * `status` and `code` are what the HTTP layer puts on the wire.
 */
export class ProgressiveDeliveryError extends Error {
  readonly status: ErrorStatus = 500;
  readonly code: string = "progressive_delivery_error";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidCursorError extends ProgressiveDeliveryError {
  override readonly status = 400;
  override readonly code = "invalid_cursor";

  constructor(message = "Invalid cursor provided", options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class CursorExpiredError extends ProgressiveDeliveryError {
  override readonly status = 400;
  override readonly code = "cursor_expired";

  constructor(message = "Cursor has expired") {
    super(message);
  }
}

export class TooManyKeysRequestedError extends ProgressiveDeliveryError {
  override readonly status = 400;
  override readonly code = "too_many_keys";

  constructor(
    readonly requested: number,
    readonly limit: number,
  ) {
    super(`Too many keys requested. Maximum: ${limit}`);
  }
}

export class InvalidRequestError extends ProgressiveDeliveryError {
  override readonly status = 400;
  override readonly code = "validation_error";
}

export class ConfigurationError extends ProgressiveDeliveryError {
  override readonly code = "configuration_error";
}

export class PartEvaluationError extends ProgressiveDeliveryError {
  override readonly code: string = "loading_error";

  constructor(
    readonly partName: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class PartTimeoutError extends PartEvaluationError {
  override readonly status = 504;
  override readonly code = "timeout_error";

  constructor(
    partName: string,
    readonly timeoutMs: number,
  ) {
    super(partName, `Part '${partName}' timed out after ${timeoutMs}ms`);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
