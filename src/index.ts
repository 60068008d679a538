#!/usr/bin/env tsx
/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load environment configuration (.env at the project root, else the cwd).
 * 2. Parse the command line (rebuild | query | answer | serve).
 * 3. Create the embedding client once (OPENAI_API_KEY is required).
 * 4. Run the command against the shared RagService:
 *      - rebuild : chunk + embed the corpus, persist the index atomically.
 *      - query   : top-k passages with detected language.
 *      - answer  : query + cited answer (citations only when synthesis is disabled).
 *      - serve   : JSON HTTP API, or MCP tools over stdio.
 *
 * ENVIRONMENT VARIABLES (all optional except OPENAI_API_KEY):
 *  - CORPUS_DIR           Directory of .txt / .md documents (default ./docs).
 *  - INDEX_STORE_PATH     Persisted index file (default ./.rag/index.json).
 *  - MODEL_NAME           Embedding model (default text-embedding-3-small).
 *  - CHUNK_SIZE           Tokens per chunk (default 300).
 *  - CHUNK_OVERLAP        Tokens shared by neighbouring chunks (default 50, must be < CHUNK_SIZE).
 *  - CHUNK_TEXT_LIMIT     Stored characters per chunk (default 600).
 *  - DEFAULT_TOP_K        Passages per query when k is omitted (default 3).
 *  - VERBOSE              '1'/'true'/... enables progress logging.
 *  - HOST / PORT          HTTP bind (default 127.0.0.1:5000).
 *  - RAG_TRANSPORT        'http' (default) or 'stdio' for `serve`.
 *  - OPENAI_API_KEY       Key for embeddings and answer synthesis (required).
 *  - OPENAI_BASE_URL      OpenAI-compatible endpoint (default api.openai.com).
 *  - OPENAI_MODEL         Synthesis model (default gpt-4o-mini).
 *  - SYNTHESIS_ENABLED    'false' answers with cited passages only (default true).
 *  - SYNTHESIS_MAX_TOKENS Reply budget (default 200).
 *
 * Reports go to stdout; logs go to stderr.
 */
import { createService } from "./bootstrap";
import { createProgram } from "./cli";
import { getConfig } from "./config";
import { describeError } from "./errors";

const program = createProgram({
  loadConfig: () => getConfig(),
  createService,
  out: (line) => console.log(line),
});

try {
  await program.parseAsync(process.argv);
} catch (e) {
  console.error(`Error: ${describeError(e).message}`);
  process.exitCode = 1;
}
