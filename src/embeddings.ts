import OpenAI from "openai";
import { DEFAULT_EMBEDDING_MODEL } from "./config";
import { EmbeddingError } from "./errors";

/**
 * Narrow capability consumed by the index store and query pipeline:
 * text in, fixed-length vector out. Implementations must return the same
 * dimension for every call.
 */
export interface EmbeddingProvider {
  embed(text: string): Promise<Float32Array>;
  /** Identifier recorded alongside a persisted index. */
  getModelName(): string;
}

export interface EmbeddingsOptions {
  apiKey: string;
  model?: string;
  /** OpenAI-compatible endpoint (a local server, a proxy); defaults to api.openai.com. */
  baseURL?: string;
}

/**
 * Sentence-embedding provider backed by the OpenAI embeddings endpoint.
 * One client is created per process and reused for every build and query.
 */
export class Embeddings implements EmbeddingProvider {
  private readonly client: OpenAI;
  private readonly modelName: string;

  public constructor(opts: EmbeddingsOptions) {
    this.modelName = opts.model?.trim() || DEFAULT_EMBEDDING_MODEL;
    this.client = new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL });
  }

  public getModelName(): string {
    return this.modelName;
  }

  /**
   * Embedding of `text` as returned by the model. Inputs longer than the
   * model's context are rejected by the endpoint.
   *
   * @throws {EmbeddingError} If the call fails or the response holds no vector.
   */
  public async embed(text: string): Promise<Float32Array> {
    let vector: number[] | undefined;
    try {
      const response = await this.client.embeddings.create({
        model: this.modelName,
        input: text,
        encoding_format: "float",
      });
      vector = response.data[0]?.embedding;
    } catch (e) {
      throw new EmbeddingError(`Embedding model ${this.modelName} failed`, { cause: e });
    }
    if (!vector || vector.length === 0) {
      throw new EmbeddingError(`Embedding model ${this.modelName} returned no vector`);
    }
    return Float32Array.from(vector);
  }
}
