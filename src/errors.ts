/**
 * Typed failure outcomes for the retrieval core.
 *
 * Every failure the core raises on purpose is a {@link RagError} carrying a
 * machine-readable `code`; access layers (CLI, HTTP, MCP) translate it into a
 * status + message pair via {@link httpStatusFor} / {@link describeError}.
 */

export type RagErrorCode =
  | "CONFIG"
  | "INVALID_REQUEST"
  | "CORPUS_NOT_FOUND"
  | "EMPTY_CORPUS"
  | "INDEX_NOT_FOUND"
  | "INDEX_CORRUPT"
  | "DIMENSION_MISMATCH"
  | "EMBEDDING_FAILED"
  | "SYNTHESIS_FAILED";

export class RagError extends Error {
  public readonly code: RagErrorCode;

  public constructor(code: RagErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "RagError";
  }
}

/** Invalid chunking parameters, unusable environment values, etc. */
export class ConfigError extends RagError {
  public constructor(message: string) {
    super("CONFIG", message);
    this.name = "ConfigError";
  }
}

/** Caller supplied a malformed query (blank text, bad `k`). */
export class InvalidRequestError extends RagError {
  public constructor(message: string) {
    super("INVALID_REQUEST", message);
    this.name = "InvalidRequestError";
  }
}

export class CorpusNotFoundError extends RagError {
  public constructor(dir: string, options?: { cause?: unknown }) {
    super("CORPUS_NOT_FOUND", `Docs folder not found: ${dir}`, options);
    this.name = "CorpusNotFoundError";
  }
}

export class EmptyCorpusError extends RagError {
  public constructor(dir: string) {
    super(
      "EMPTY_CORPUS",
      `No text chunks found in ${dir}. Add .txt or .md files and rebuild.`,
    );
    this.name = "EmptyCorpusError";
  }
}

/** Raised when a query arrives before any successful build. */
export class IndexNotFoundError extends RagError {
  public constructor(storePath: string) {
    super("INDEX_NOT_FOUND", `Index not found at ${storePath}. Run rebuild first.`);
    this.name = "IndexNotFoundError";
  }
}

export class IndexCorruptError extends RagError {
  public constructor(storePath: string, detail: string, options?: { cause?: unknown }) {
    super("INDEX_CORRUPT", `Persisted index at ${storePath} is unusable: ${detail}`, options);
    this.name = "IndexCorruptError";
  }
}

export class DimensionMismatchError extends RagError {
  public readonly expected: number;
  public readonly actual: number;

  public constructor(expected: number, actual: number) {
    super(
      "DIMENSION_MISMATCH",
      `Embedding dimension mismatch: expected ${expected}, got ${actual}`,
    );
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class EmbeddingError extends RagError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("EMBEDDING_FAILED", message, options);
    this.name = "EmbeddingError";
  }
}

export class SynthesisError extends RagError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("SYNTHESIS_FAILED", message, options);
    this.name = "SynthesisError";
  }
}

/** HTTP status for an error surfaced by the core (anything unknown is a 500). */
export function httpStatusFor(err: unknown): number {
  if (!(err instanceof RagError)) return 500;
  switch (err.code) {
    case "INVALID_REQUEST":
      return 400;
    case "INDEX_NOT_FOUND":
      return 404;
    default:
      return 500;
  }
}

/** Flatten any thrown value into the `{ code, message }` pair access layers report. */
export function describeError(err: unknown): { code: RagErrorCode | "INTERNAL"; message: string } {
  if (err instanceof RagError) return { code: err.code, message: err.message };
  if (err instanceof Error) return { code: "INTERNAL", message: err.message };
  return { code: "INTERNAL", message: String(err) };
}
