/**
 * Engine Error Types
 *
 * Every failure the engine distinguishes carries a category. Only "fatal"
 * errors are allowed to abort a turn; the rest are absorbed at the
 * component boundary where they occur.
 */

export type ErrorCategory =
  | "transient"
  | "rejected"
  | "malformed"
  | "unknown_reference"
  | "conversion"
  | "fatal";

export abstract class FramewiseError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ============================================
// TRANSIENT
// ============================================

export class EmbeddingRateLimitError extends FramewiseError {
  readonly category = "transient";

  constructor(message: string, readonly retryAfterMs = 0) {
    super(message);
  }
}

export class EmbeddingServerError extends FramewiseError {
  readonly category = "transient";

  constructor(message: string, readonly status: number) {
    super(message);
  }
}

export class GenerationTimeoutError extends FramewiseError {
  readonly category = "transient";

  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

/** HTTP statuses a model or embedding provider may recover from */
export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504, 529]);

/** Non-2xx from a chat provider. Transient or rejected depending on the status. */
export class ProviderError extends FramewiseError {
  readonly category: ErrorCategory;

  constructor(
    readonly provider: string,
    readonly status: number,
    detail: string,
    readonly retryAfterMs = 0,
  ) {
    super(`${provider} API error: ${status} ${detail}`.trim());
    this.category = RETRYABLE_STATUSES.has(status) ? "transient" : "rejected";
  }
}

// ============================================
// NON-RETRYABLE EXTERNAL
// ============================================

/** 4xx from the embedding service other than 429. Not retried. */
export class EmbeddingRequestError extends FramewiseError {
  readonly category = "rejected";

  constructor(message: string, readonly status: number) {
    super(message);
  }
}

/** A snapshot that fails validation. Nothing is restored. */
export class InvalidSnapshotError extends FramewiseError {
  readonly category = "rejected";
}

// ============================================
// LOCAL RECOVERY
// ============================================

export class RoutingParseError extends FramewiseError {
  readonly category = "malformed";

  constructor(message: string, readonly raw: string) {
    super(message);
  }
}

export class FactNotFoundError extends FramewiseError {
  readonly category = "unknown_reference";

  constructor(readonly factId: string) {
    super(`Assumption ${factId} not found`);
  }
}

export class DocumentConversionError extends FramewiseError {
  readonly category = "conversion";

  constructor(readonly filename: string, message: string, options?: { cause?: unknown }) {
    super(`Could not convert ${filename}: ${message}`, options);
  }
}

// ============================================
// FATAL
// ============================================

export class StorageUnavailableError extends FramewiseError {
  readonly category = "fatal";
}

export function isTransientError(error: unknown): boolean {
  return error instanceof FramewiseError && error.category === "transient";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
