export type RagErrorCode =
  | "INVALID_CONFIGURATION"
  | "EMBEDDING_UNAVAILABLE"
  | "DIMENSION_MISMATCH"
  | "TIMEOUT"
  | "DOCUMENT_LOAD_FAILURE"
  | "ANSWER_UNAVAILABLE"
  | "CANCELLED";

/**
 * Base class for every error raised by the indexing / retrieval pipeline.
 * Callers can branch on `code` without importing the concrete subclasses.
 */
export class RagError extends Error {
  constructor(
    message: string,
    public readonly code: RagErrorCode,
    public readonly originalError?: unknown,
  ) {
    const cause = originalError instanceof Error ? originalError : undefined;
    super(cause ? `${message}: ${cause.message}` : message);
    this.name = "RagError";
    if (cause?.stack) this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
  }
}

/** Bad chunk sizes, non-positive `k`, malformed environment values. */
export class InvalidConfigurationError extends RagError {
  constructor(message: string) {
    super(message, "INVALID_CONFIGURATION");
    this.name = "InvalidConfigurationError";
  }
}

/** The embedding model could not be reached or returned malformed output. */
export class EmbeddingUnavailableError extends RagError {
  constructor(message: string, originalError?: unknown) {
    super(message, "EMBEDDING_UNAVAILABLE", originalError);
    this.name = "EmbeddingUnavailableError";
  }
}

/** A vector's length disagrees with the dimensionality already in use. */
export class DimensionMismatchError extends RagError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    context = "Embedding dimension mismatch",
  ) {
    super(`${context}: expected ${expected}, got ${actual}`, "DIMENSION_MISMATCH");
    this.name = "DimensionMismatchError";
  }
}

/** An external call exceeded its deadline. */
export class TimeoutError extends RagError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, "TIMEOUT");
    this.name = "TimeoutError";
  }
}

/** The document could not be read or parsed. */
export class DocumentLoadFailureError extends RagError {
  constructor(
    public readonly source: string,
    originalError?: unknown,
  ) {
    super(`Failed to load document ${source}`, "DOCUMENT_LOAD_FAILURE", originalError);
    this.name = "DocumentLoadFailureError";
  }
}

/** The generative answer service failed. */
export class AnswerUnavailableError extends RagError {
  constructor(message: string, originalError?: unknown) {
    super(message, "ANSWER_UNAVAILABLE", originalError);
    this.name = "AnswerUnavailableError";
  }
}

/** Work was abandoned because the caller's AbortSignal fired. */
export class CancelledError extends RagError {
  constructor(message = "Operation was cancelled") {
    super(message, "CANCELLED");
    this.name = "CancelledError";
  }
}

export function isRagError(error: unknown): error is RagError {
  return error instanceof RagError;
}
