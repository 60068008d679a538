/**
 * Shared data shapes used by the chunking, indexing, persistence and query layers.
 */

/** A corpus file as read at build time. Never persisted. */
export interface Document {
  /** Absolute path of the file on disk. */
  readonly path: string;
  /** Full UTF-8 file contents. */
  readonly text: string;
}

/**
 * Metadata half of an index entry. Entry `i` of the index pairs the `i`-th
 * stored vector with the `i`-th chunk.
 */
export interface Chunk {
  /** Basename of the originating document. */
  readonly source: string;
  /** 0-based position of the chunk within its document. */
  readonly chunkIndex: number;
  /** Chunk text, truncated to the configured display length. */
  readonly text: string;
}

/** Raw hit from a vector engine: similarity plus the entry ordinal. */
export interface SearchHit {
  readonly score: number;
  /** Entry ordinal; engines may pad with negative values for "no match". */
  readonly index: number;
}

export interface SearchResult {
  readonly score: number;
  readonly source: string;
  readonly chunkIndex: number;
  readonly text: string;
}

export interface QueryResult {
  readonly query: string;
  /** Language code of the query, or "unknown". */
  readonly detectedLanguage: string;
  readonly results: SearchResult[];
}

export interface BuildInfo {
  readonly entryCount: number;
  readonly dimension: number;
}

/** Chunking / storage policy applied on every build. */
export interface ChunkPolicy {
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  /** Max characters of chunk text kept in the stored metadata. */
  readonly textLimit: number;
}
