import type { Config } from "./config";
import { Embeddings } from "./embeddings";
import { ConfigError } from "./errors";
import { IndexStore } from "./index-store";
import { FrancLanguageDetector } from "./language";
import { Persistence } from "./persistence";
import { QueryPipeline } from "./query";
import { RagService } from "./service";
import { StatusManager } from "./status";
import { createSynthesizer } from "./synthesis";

/**
 * Wire the production service: OpenAI embeddings (one client for the whole
 * process), flat inner-product index persisted at INDEX_STORE_PATH, franc
 * language detection, OpenAI synthesis unless disabled.
 *
 * @throws {ConfigError} If OPENAI_API_KEY is not set.
 */
export async function createService(config: Config): Promise<RagService> {
  if (!config.OPENAI_API_KEY) {
    throw new ConfigError("OPENAI_API_KEY is required to compute embeddings");
  }
  const embeddings = new Embeddings({
    apiKey: config.OPENAI_API_KEY,
    model: config.MODEL_NAME,
    baseURL: config.OPENAI_BASE_URL,
  });
  console.error(`[RAG] Embedding model: ${embeddings.getModelName()}`);

  const status = new StatusManager();
  status.setModelName(embeddings.getModelName());

  const store = new IndexStore({
    embeddings,
    persistence: new Persistence(config.INDEX_STORE_PATH, config.VERBOSE),
    policy: {
      chunkSize: config.CHUNK_SIZE,
      chunkOverlap: config.CHUNK_OVERLAP,
      textLimit: config.CHUNK_TEXT_LIMIT,
    },
    status,
    verbose: config.VERBOSE,
  });

  const pipeline = new QueryPipeline({
    store,
    embeddings,
    detector: new FrancLanguageDetector(),
    verbose: config.VERBOSE,
  });

  return new RagService({
    corpusDir: config.CORPUS_DIR,
    store,
    pipeline,
    synthesizer: createSynthesizer({
      apiKey: config.SYNTHESIS_ENABLED ? config.OPENAI_API_KEY : undefined,
      model: config.OPENAI_MODEL,
      baseURL: config.OPENAI_BASE_URL,
      maxTokens: config.SYNTHESIS_MAX_TOKENS,
    }),
    status,
    defaultTopK: config.DEFAULT_TOP_K,
  });
}
