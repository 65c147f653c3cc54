/**
 * Error taxonomy shared by the sync, embedding, matching and scoring paths.
 *
 * - ConfigurationError: missing credentials or settings. Fatal to the
 *   requested operation, never retried.
 * - ProviderError: an embedding or integration API call failed.
 *   Recovered per item (embedding fallback) or skipped during bulk sync.
 * - DataError: a source record is malformed. The item is skipped.
 * - ValidationError: a caller parameter is out of range. Rejected before
 *   any work begins.
 */

export type ErrorCategory =
  | "configuration"
  | "provider"
  | "data"
  | "validation"
  | "internal";

export class ConfigurationError extends Error {
  readonly kind = "configuration" as const;

  constructor(
    message: string,
    readonly setting?: string,
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ProviderError extends Error {
  readonly kind = "provider" as const;
  readonly provider: string;
  readonly status: number | undefined;
  readonly body: string | undefined;

  constructor(
    message: string,
    opts: { provider: string; status?: number; body?: string; cause?: unknown },
  ) {
    super(message, { cause: opts.cause });
    this.name = "ProviderError";
    this.provider = opts.provider;
    this.status = opts.status;
    this.body = opts.body;
  }
}

export class DataError extends Error {
  readonly kind = "data" as const;

  constructor(
    message: string,
    readonly entityId?: string,
  ) {
    super(message);
    this.name = "DataError";
  }
}

export class ValidationError extends Error {
  readonly kind = "validation" as const;

  constructor(
    message: string,
    readonly field: string,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

export type TaskMatchError =
  | ConfigurationError
  | ProviderError
  | DataError
  | ValidationError;

export function isTaskMatchError(error: unknown): error is TaskMatchError {
  return (
    error instanceof ConfigurationError ||
    error instanceof ProviderError ||
    error instanceof DataError ||
    error instanceof ValidationError
  );
}

/**
 * Classify a caught value into one of the error categories.
 * Anything outside the taxonomy is "internal".
 */
export function classifyError(error: unknown): ErrorCategory {
  if (isTaskMatchError(error)) return error.kind;
  return "internal";
}

/** One-line description of a caught value, for `errors` lists and logs. */
export function describeError(error: unknown): string {
  if (error instanceof ProviderError && error.status !== undefined) {
    return `${error.message} (status ${error.status})`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}
