import { APP_VERSION } from "./config";

/**
 * Counters for the most recent (or in-flight) build.
 * Reset at the start of each rebuild.
 */
export interface IndexingStatus {
  /** Corpus files matched by the .txt / .md filter. */
  documentsDiscovered: number;
  /** Chunks produced from those documents. */
  chunksTotal: number;
  /** Chunks embedded so far. */
  chunksEmbedded: number;
  /** ISO timestamp of the last successful build or load, if any. */
  lastBuiltAt: string | null;
}

/**
 * Server lifecycle + indexing snapshot, served on GET /health.
 *
 * `ready` flips to true once an index is live (built or loaded) and stays
 * true while a rebuild runs, since queries keep hitting the previous index.
 */
export interface ServerStatus {
  version: string;
  corpusDir: string;
  modelName: string;
  /** 'http' | 'stdio' | 'cli' | 'unknown'. */
  transport: string;
  ready: boolean;
  building: boolean;
  entryCount: number;
  dimension: number;
  startedAt: string;
  indexing: IndexingStatus;
}

/** Owns the mutable status object; callers go through its methods. */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      corpusDir: initial?.corpusDir ?? "",
      modelName: initial?.modelName ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      building: initial?.building ?? false,
      entryCount: initial?.entryCount ?? 0,
      dimension: initial?.dimension ?? 0,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      indexing: initial?.indexing ?? {
        documentsDiscovered: 0,
        chunksTotal: 0,
        chunksEmbedded: 0,
        lastBuiltAt: null,
      },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setCorpusDir(dir: string) {
    this.data.corpusDir = dir;
  }

  public setModelName(name: string) {
    this.data.modelName = name;
  }

  /** Enter build mode and zero the per-build counters. */
  public beginBuild() {
    this.data.building = true;
    this.data.indexing.documentsDiscovered = 0;
    this.data.indexing.chunksTotal = 0;
    this.data.indexing.chunksEmbedded = 0;
  }

  public setBuildTotals(documents: number, chunks: number) {
    this.data.indexing.documentsDiscovered = documents;
    this.data.indexing.chunksTotal = chunks;
  }

  public incEmbedded(count = 1) {
    this.data.indexing.chunksEmbedded += count;
  }

  /** Leave build mode without touching the live index figures (failed build). */
  public endBuild() {
    this.data.building = false;
  }

  /** Record a newly live index (after a build or a load from disk). */
  public markIndexLive(entryCount: number, dimension: number) {
    this.data.entryCount = entryCount;
    this.data.dimension = dimension;
    this.data.ready = true;
    this.data.indexing.lastBuiltAt = new Date().toISOString();
  }

  /** Read-only copy of the current status. */
  public getStatus(): ServerStatus {
    return { ...this.data, indexing: { ...this.data.indexing } };
  }
}
