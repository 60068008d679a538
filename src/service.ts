import type { IndexStore } from "./index-store";
import type { QueryPipeline } from "./query";
import type { ServerStatus, StatusManager } from "./status";
import type { AnswerSynthesizer } from "./synthesis";
import type { BuildInfo, QueryResult } from "./types";

export interface RebuildReport extends BuildInfo {
  /** Seconds, rounded to 2 decimals. */
  readonly elapsedTime: number;
}

export interface QueryReport extends QueryResult {
  readonly elapsedTime: number;
}

export interface AnswerReport extends QueryReport {
  readonly answer: string;
}

export interface RagServiceOptions {
  corpusDir: string;
  store: IndexStore;
  pipeline: QueryPipeline;
  synthesizer: AnswerSynthesizer;
  status: StatusManager;
  defaultTopK?: number;
}

function elapsedSince(t0: number): number {
  return Math.round((performance.now() - t0) / 10) / 100;
}

/**
 * The operations every access layer (CLI, HTTP, MCP) drives: rebuild,
 * query, answer, status. Adds timing on top of the index store and pipeline.
 */
export class RagService {
  private readonly corpusDir: string;
  private readonly store: IndexStore;
  private readonly pipeline: QueryPipeline;
  private readonly synthesizer: AnswerSynthesizer;
  private readonly statusManager: StatusManager;
  public readonly defaultTopK: number;

  public constructor(opts: RagServiceOptions) {
    this.corpusDir = opts.corpusDir;
    this.store = opts.store;
    this.pipeline = opts.pipeline;
    this.synthesizer = opts.synthesizer;
    this.statusManager = opts.status;
    this.defaultTopK = opts.defaultTopK ?? 3;
    this.statusManager.setCorpusDir(this.corpusDir);
  }

  /** Full rebuild of the index from the configured corpus directory. */
  public async rebuild(): Promise<RebuildReport> {
    const t0 = performance.now();
    const info = await this.store.build(this.corpusDir);
    return { ...info, elapsedTime: elapsedSince(t0) };
  }

  public async query(text: string, k: number = this.defaultTopK): Promise<QueryReport> {
    const t0 = performance.now();
    const result = await this.pipeline.query(text, k);
    return { ...result, elapsedTime: elapsedSince(t0) };
  }

  /** {@link query} followed by answer synthesis over the ranked passages. */
  public async answer(text: string, k: number = this.defaultTopK): Promise<AnswerReport> {
    const t0 = performance.now();
    const result = await this.pipeline.query(text, k);
    const answer = await this.synthesizer.synthesize(result.query, result.results);
    return { ...result, answer, elapsedTime: elapsedSince(t0) };
  }

  public status(): ServerStatus {
    return this.statusManager.getStatus();
  }

  public markTransport(t: string): void {
    this.statusManager.markTransport(t);
  }
}
