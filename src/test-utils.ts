/**
 * In-process stand-ins used by the test suites: deterministic embedding
 * providers, temp corpora and a fully wired service. Never imported by
 * production code.
 */
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { EmbeddingProvider } from "./embeddings";
import { IndexStore } from "./index-store";
import type { LanguageDetector } from "./language";
import { Persistence } from "./persistence";
import { QueryPipeline } from "./query";
import { RagService } from "./service";
import { StatusManager } from "./status";
import { CitationsOnlySynthesizer, type AnswerSynthesizer } from "./synthesis";
import type { ChunkPolicy } from "./types";
import type { VectorIndexFactory } from "./vector-index";

function fnv1a(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/** Bag-of-words hashing embedder: each lower-cased word bumps one bucket. */
export class HashingEmbeddings implements EmbeddingProvider {
  public readonly calls: string[] = [];

  public constructor(
    private readonly dimension = 16,
    private readonly modelName = "test/hashing",
  ) {}

  public getModelName(): string {
    return this.modelName;
  }

  public async embed(text: string): Promise<Float32Array> {
    this.calls.push(text);
    const v = new Float32Array(this.dimension);
    for (const word of text.toLowerCase().split(/[^a-z0-9]+/)) {
      if (word) v[fnv1a(word) % this.dimension] += 1;
    }
    return v;
  }
}

/** Looks vectors up by exact text; unknown text is an error. */
export class TableEmbeddings implements EmbeddingProvider {
  public readonly calls: string[] = [];
  private readonly table: Map<string, number[]>;

  public constructor(table: Record<string, number[]>) {
    this.table = new Map(Object.entries(table));
  }

  public getModelName(): string {
    return "test/table";
  }

  public async embed(text: string): Promise<Float32Array> {
    this.calls.push(text);
    const v = this.table.get(text);
    if (!v) throw new Error(`no test vector for "${text}"`);
    return Float32Array.from(v);
  }
}

export class FixedLanguageDetector implements LanguageDetector {
  public constructor(private readonly code: string) {}

  public detect(): string {
    return this.code;
  }
}

export async function makeTempDir(prefix = "corpus-rag-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** Write `files` (name -> contents) into `dir`, creating sub-folders as needed. */
export async function writeCorpus(dir: string, files: Record<string, string>): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
  for (const [name, text] of Object.entries(files)) {
    const file = path.join(dir, name);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, text, "utf8");
  }
}

export interface TestServiceOptions {
  root: string;
  embeddings?: EmbeddingProvider;
  detector?: LanguageDetector;
  synthesizer?: AnswerSynthesizer;
  policy?: Partial<ChunkPolicy>;
  indexFactory?: VectorIndexFactory;
  defaultTopK?: number;
}

export interface TestService {
  service: RagService;
  store: IndexStore;
  pipeline: QueryPipeline;
  status: StatusManager;
  corpusDir: string;
  storePath: string;
}

/** Production wiring with test doubles; corpus in `<root>/docs`, index in `<root>/store/index.json`. */
export function createTestService(opts: TestServiceOptions): TestService {
  const embeddings = opts.embeddings ?? new HashingEmbeddings();
  const corpusDir = path.join(opts.root, "docs");
  const storePath = path.join(opts.root, "store", "index.json");
  const status = new StatusManager();
  const store = new IndexStore({
    embeddings,
    persistence: new Persistence(storePath),
    policy: opts.policy,
    indexFactory: opts.indexFactory,
    status,
  });
  const pipeline = new QueryPipeline({
    store,
    embeddings,
    detector: opts.detector ?? new FixedLanguageDetector("eng"),
  });
  const service = new RagService({
    corpusDir,
    store,
    pipeline,
    synthesizer: opts.synthesizer ?? new CitationsOnlySynthesizer(),
    status,
    defaultTopK: opts.defaultTopK,
  });
  return { service, store, pipeline, status, corpusDir, storePath };
}
