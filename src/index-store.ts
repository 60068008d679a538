import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { assertChunkParams, splitChunks } from "./chunker";
import type { EmbeddingProvider } from "./embeddings";
import {
  CorpusNotFoundError,
  EmbeddingError,
  EmptyCorpusError,
  IndexNotFoundError,
} from "./errors";
import type { IndexSnapshot, Persistence } from "./persistence";
import type { StatusManager } from "./status";
import type { BuildInfo, Chunk, ChunkPolicy, Document, SearchHit, SearchResult } from "./types";
import {
  flatIndexFactory,
  l2Normalize,
  type VectorIndex,
  type VectorIndexFactory,
} from "./vector-index";

/** File extensions (no leading dot) picked up from the corpus directory. */
export const CORPUS_EXTENSIONS = ["txt", "md"] as const;

export const DEFAULT_CHUNK_POLICY: ChunkPolicy = {
  chunkSize: 300,
  chunkOverlap: 50,
  textLimit: 600,
};

/**
 * Options required to construct an {@link IndexStore}. `embeddings` and
 * `persistence` are mandatory; everything else has a default.
 */
export interface IndexStoreOptions {
  embeddings: EmbeddingProvider;
  persistence: Persistence;
  policy?: Partial<ChunkPolicy>;
  /** Vector engine to build into (default: exact flat inner-product scan). */
  indexFactory?: VectorIndexFactory;
  /** Receives build progress when supplied. */
  status?: StatusManager;
  verbose?: boolean;
}

/** A live index: engine row `i` belongs to `chunks[i]`. Never mutated once published. */
interface LiveIndex {
  readonly engine: VectorIndex;
  readonly chunks: readonly Chunk[];
  readonly modelName: string;
  readonly policy: ChunkPolicy;
}

/** Truncate to `limit` code points without splitting a surrogate pair. */
function truncateText(text: string, limit: number): string {
  if (text.length <= limit) return text;
  return Array.from(text).slice(0, limit).join("");
}

/**
 * Owns the (vector, chunk) pairing: builds a fresh index from a corpus
 * directory, persists it, reloads it, and answers top-k searches.
 *
 * Builds are serialized. A build publishes its result only after it has been
 * persisted, by swapping the live-index reference; searches always run against
 * whichever index was live when they started.
 */
export class IndexStore {
  private readonly embeddings: EmbeddingProvider;
  private readonly persistence: Persistence;
  private readonly policy: ChunkPolicy;
  private readonly indexFactory: VectorIndexFactory;
  private readonly status?: StatusManager;
  private readonly verbose: boolean;
  private live: LiveIndex | null = null;
  /** Bumped on every publish; a load that straddles a publish must not overwrite it. */
  private generation = 0;
  private buildQueue: Promise<unknown> = Promise.resolve();
  private loading: Promise<BuildInfo> | null = null;

  public constructor(opts: IndexStoreOptions) {
    this.embeddings = opts.embeddings;
    this.persistence = opts.persistence;
    this.policy = { ...DEFAULT_CHUNK_POLICY, ...opts.policy };
    assertChunkParams(this.policy.chunkSize, this.policy.chunkOverlap);
    this.indexFactory = opts.indexFactory ?? flatIndexFactory;
    this.status = opts.status;
    this.verbose = !!opts.verbose;
  }

  /**
   * Read every eligible document directly inside `dir` (non-recursive), in
   * file-name order.
   *
   * @throws {CorpusNotFoundError} If `dir` is missing or not a directory.
   */
  public static async readCorpus(dir: string): Promise<Document[]> {
    let isDir = false;
    try {
      isDir = (await fs.stat(dir)).isDirectory();
    } catch (e) {
      throw new CorpusNotFoundError(dir, { cause: e });
    }
    if (!isDir) throw new CorpusNotFoundError(dir);

    const patterns = CORPUS_EXTENSIONS.map((ext) => `*.${ext}`);
    const files = await fg(patterns, { cwd: dir, absolute: true, onlyFiles: true, dot: false });
    files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    const docs: Document[] = [];
    for (const file of files) {
      docs.push({ path: file, text: await fs.readFile(file, "utf8") });
    }
    return docs;
  }

  /** Whether an index is live in memory. */
  public isLoaded(): boolean {
    return this.live !== null;
  }

  /** Number of entries in the live index (0 when none is live). */
  public size(): number {
    return this.live?.engine.size() ?? 0;
  }

  /** Vector dimension of the live index (0 when none is live). */
  public dimension(): number {
    return this.live?.engine.dimension ?? 0;
  }

  /**
   * Full rebuild from `corpusDir`: chunk every document, embed each full
   * chunk, L2-normalize, persist, then publish as the live index. Calls made
   * while another build runs wait for it to finish first.
   *
   * @throws {CorpusNotFoundError} Missing corpus directory.
   * @throws {EmptyCorpusError} No chunk could be produced.
   * @throws {DimensionMismatchError} The provider changed dimension mid-build.
   */
  public build(corpusDir: string): Promise<BuildInfo> {
    const run = this.buildQueue.then(() => this.runBuild(corpusDir));
    // the caller gets the failure through `run`; the queue itself must stay usable
    this.buildQueue = run.catch(() => undefined);
    return run;
  }

  private async runBuild(corpusDir: string): Promise<BuildInfo> {
    const { chunkSize, chunkOverlap, textLimit } = this.policy;
    this.status?.beginBuild();
    try {
      const docs = await IndexStore.readCorpus(corpusDir);
      console.error(`[RAG] Building index from ${corpusDir} (${docs.length} documents)`);

      const chunks: Chunk[] = [];
      const fullTexts: string[] = [];
      for (const doc of docs) {
        const source = path.basename(doc.path);
        const pieces = splitChunks(doc.text, chunkSize, chunkOverlap);
        pieces.forEach((text, chunkIndex) => {
          chunks.push({ source, chunkIndex, text: truncateText(text, textLimit) });
          fullTexts.push(text);
        });
        if (this.verbose) console.error(`[RAG][verbose] ${source}: ${pieces.length} chunks`);
      }
      if (chunks.length === 0) throw new EmptyCorpusError(corpusDir);
      this.status?.setBuildTotals(docs.length, chunks.length);
      console.error(`[RAG] Created ${chunks.length} chunks. Generating embeddings...`);

      // The first vector fixes the dimension; the engine rejects any other length.
      const first = await this.embeddings.embed(fullTexts[0]);
      if (first.length === 0) throw new EmbeddingError("Embedding provider returned an empty vector");
      const engine = this.indexFactory(first.length);
      engine.add(l2Normalize(first));
      this.status?.incEmbedded();
      for (let i = 1; i < fullTexts.length; i++) {
        if (this.verbose && i % 50 === 0) {
          console.error(`[RAG][verbose] Embedding progress: ${i}/${fullTexts.length}`);
        }
        engine.add(l2Normalize(await this.embeddings.embed(fullTexts[i])));
        this.status?.incEmbedded();
      }

      const next: LiveIndex = {
        engine,
        chunks,
        modelName: this.embeddings.getModelName(),
        policy: this.policy,
      };
      await this.persistence.save(IndexStore.toSnapshot(next));
      this.publish(next);
      this.status?.markIndexLive(engine.size(), engine.dimension);
      console.error(`[RAG] Index ready: ${engine.size()} vectors (dim=${engine.dimension}).`);
      return { entryCount: engine.size(), dimension: engine.dimension };
    } finally {
      this.status?.endBuild();
    }
  }

  /**
   * Write the live index to disk, replacing whatever was there.
   *
   * @throws {IndexNotFoundError} If nothing has been built or loaded.
   */
  public async persist(): Promise<void> {
    const current = this.live;
    if (!current) throw new IndexNotFoundError(this.persistence.getStorePath());
    await this.persistence.save(IndexStore.toSnapshot(current));
  }

  /**
   * Replace the live index with the persisted one. When a build publishes
   * while the file is being read, the build's index stays live and its
   * figures are returned.
   *
   * @throws {IndexNotFoundError} No persisted index exists.
   * @throws {IndexCorruptError} The persisted index fails integrity checks.
   */
  public async load(): Promise<BuildInfo> {
    const startedAt = this.generation;
    const snap = await this.persistence.load();
    if (this.generation !== startedAt && this.live) {
      return { entryCount: this.size(), dimension: this.dimension() };
    }
    if (snap.modelName !== this.embeddings.getModelName()) {
      console.error(
        `[RAG] Persisted index was built with ${snap.modelName}, queries use ${this.embeddings.getModelName()}. Rebuild recommended.`,
      );
    }
    const engine = this.indexFactory(snap.dimension, snap.vectors);
    this.publish({
      engine,
      chunks: snap.chunks,
      modelName: snap.modelName,
      policy: snap.policy,
    });
    this.status?.markIndexLive(engine.size(), engine.dimension);
    return { entryCount: engine.size(), dimension: engine.dimension };
  }

  /** Load from disk unless an index is already live. Concurrent callers share one load. */
  public async ensureLoaded(): Promise<BuildInfo> {
    if (this.live) return { entryCount: this.size(), dimension: this.dimension() };
    if (!this.loading) {
      this.loading = this.load().finally(() => {
        this.loading = null;
      });
    }
    return this.loading;
  }

  /**
   * Up to `k` entries with the highest inner product against `query`
   * (already normalized), highest first. Engine placeholders are dropped.
   *
   * @throws {IndexNotFoundError} If no index is live.
   * @throws {DimensionMismatchError} If `query` has the wrong length.
   */
  public search(query: Float32Array, k: number): SearchHit[] {
    return IndexStore.searchLive(this.requireLive(), query, k);
  }

  /** {@link search} joined with the stored chunks, from one consistent index. */
  public searchChunks(query: Float32Array, k: number): SearchResult[] {
    const current = this.requireLive();
    return IndexStore.searchLive(current, query, k).map((hit) => {
      const chunk = current.chunks[hit.index];
      return {
        score: hit.score,
        source: chunk.source,
        chunkIndex: chunk.chunkIndex,
        text: chunk.text,
      };
    });
  }

  /** Chunk metadata stored at ordinal `index`, if any. */
  public chunkAt(index: number): Chunk | undefined {
    return this.live?.chunks[index];
  }

  private publish(next: LiveIndex): void {
    this.live = next;
    this.generation++;
  }

  private requireLive(): LiveIndex {
    if (!this.live) throw new IndexNotFoundError(this.persistence.getStorePath());
    return this.live;
  }

  private static searchLive(current: LiveIndex, query: Float32Array, k: number): SearchHit[] {
    return current.engine
      .search(query, k)
      .filter((hit) => hit.index >= 0 && hit.index < current.chunks.length);
  }

  private static toSnapshot(current: LiveIndex): IndexSnapshot {
    return {
      dimension: current.engine.dimension,
      vectors: current.engine.vectors(),
      chunks: current.chunks,
      modelName: current.modelName,
      policy: current.policy,
    };
  }
}
