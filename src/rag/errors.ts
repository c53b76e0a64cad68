export type RagErrorCode =
  | "FETCH_ERROR"
  | "EXTRACTION_ERROR"
  | "EMBEDDING_UNAVAILABLE"
  | "INDEX_ERROR"
  | "NO_RELEVANT_CONTENT"
  | "GENERATION_UNAVAILABLE"
  | "INVALID_QUESTION";

export abstract class RagError extends Error {
  abstract readonly code: RagErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type FetchErrorReason = "auth" | "not_found" | "unreachable";

/** The document source refused or could not serve a document. Never retried. */
export class FetchError extends RagError {
  readonly code = "FETCH_ERROR";

  constructor(
    readonly reason: FetchErrorReason,
    readonly target: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type ExtractionErrorReason = "unreadable" | "unsupported_format" | "engine_failure";

export class ExtractionError extends RagError {
  readonly code = "EXTRACTION_ERROR";

  constructor(
    readonly reason: ExtractionErrorReason,
    readonly identity: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class EmbeddingUnavailable extends RagError {
  readonly code = "EMBEDDING_UNAVAILABLE";
}

export type IndexErrorReason = "empty_index" | "dimension_mismatch";

export class IndexError extends RagError {
  readonly code = "INDEX_ERROR";

  constructor(
    readonly reason: IndexErrorReason,
    message: string,
  ) {
    super(message);
  }
}

/** No retrieved chunk cleared the similarity threshold; generation was not attempted. */
export class NoRelevantContent extends RagError {
  readonly code = "NO_RELEVANT_CONTENT";

  constructor(
    readonly bestScore: number | null,
    readonly threshold: number,
  ) {
    super(
      bestScore === null
        ? "No indexed passage matched the question."
        : `Best match scored ${bestScore.toFixed(3)}, below the minimum similarity of ${threshold}.`,
    );
  }
}

export class GenerationUnavailable extends RagError {
  readonly code = "GENERATION_UNAVAILABLE";
}

export class InvalidQuestion extends RagError {
  readonly code = "INVALID_QUESTION";
}

/** HTTP failure from a provider; `status` drives the retry decision. */
export class ProviderHttpError extends Error {
  constructor(
    readonly provider: string,
    readonly status: number,
    message: string,
  ) {
    super(`${provider} request failed (${status}): ${message}`);
    this.name = "ProviderHttpError";
  }

  get retryable(): boolean {
    return this.status === 408 || this.status === 429 || this.status >= 500;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
