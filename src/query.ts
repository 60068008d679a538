import type { EmbeddingProvider } from "./embeddings";
import { InvalidRequestError } from "./errors";
import type { IndexStore } from "./index-store";
import { UNKNOWN_LANGUAGE, type LanguageDetector } from "./language";
import type { QueryResult } from "./types";
import { l2Normalize } from "./vector-index";

export interface QueryPipelineOptions {
  store: IndexStore;
  embeddings: EmbeddingProvider;
  detector: LanguageDetector;
  verbose?: boolean;
}

/**
 * Query path: embed → normalize → top-k search → join with stored chunks,
 * annotated with the query's detected language.
 */
export class QueryPipeline {
  private readonly store: IndexStore;
  private readonly embeddings: EmbeddingProvider;
  private readonly detector: LanguageDetector;
  private readonly verbose: boolean;

  public constructor(opts: QueryPipelineOptions) {
    this.store = opts.store;
    this.embeddings = opts.embeddings;
    this.detector = opts.detector;
    this.verbose = !!opts.verbose;
  }

  /**
   * Rank stored chunks against `text`. Results keep the search order
   * (descending score).
   *
   * @throws {InvalidRequestError} Blank query or `k` not a positive integer.
   * @throws {IndexNotFoundError} No index has been built yet.
   */
  public async query(text: string, k: number): Promise<QueryResult> {
    if (!text.trim()) throw new InvalidRequestError("query required");
    if (!Number.isInteger(k) || k <= 0) {
      throw new InvalidRequestError(`k must be a positive integer (got ${k})`);
    }
    // fail on a missing index before paying for an embedding
    await this.store.ensureLoaded();

    const vector = l2Normalize(await this.embeddings.embed(text));
    const results = this.store.searchChunks(vector, k);
    return { query: text, detectedLanguage: this.detectLanguage(text), results };
  }

  /** Language code for `text`, or "unknown" when detection fails. */
  public detectLanguage(text: string): string {
    try {
      return this.detector.detect(text) || UNKNOWN_LANGUAGE;
    } catch (e) {
      if (this.verbose) console.error(`[RAG][verbose] Language detection failed:`, e);
      return UNKNOWN_LANGUAGE;
    }
  }
}
