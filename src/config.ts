import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { assertChunkParams } from "./chunker";
import { ConfigError } from "./errors";
// Version comes straight from package.json (tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Single dotenv.config() call for the whole process.
// Prefer the project-root .env (one level above src/), else the working directory's.
(() => {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const rootEnv = path.resolve(here, "../.env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

export type Transport = "http" | "stdio";

export interface Config {
  CORPUS_DIR: string;
  INDEX_STORE_PATH: string;
  MODEL_NAME: string;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  CHUNK_TEXT_LIMIT: number;
  DEFAULT_TOP_K: number;
  VERBOSE: boolean;
  HOST: string;
  PORT: number;
  RAG_TRANSPORT: Transport;
  OPENAI_API_KEY: string | undefined;
  OPENAI_BASE_URL: string | undefined;
  OPENAI_MODEL: string;
  SYNTHESIS_ENABLED: boolean;
  SYNTHESIS_MAX_TOKENS: number;
}

type Env = Record<string, string | undefined>;

/** Parse an integer >= `min`; anything unparsable falls back to `fallback`. */
function readInt(raw: string | undefined, fallback: number, min: number, max: number): number {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= min ? Math.min(max, Math.floor(n)) : fallback;
}

/** Tolerant truthy parsing ('1', 'true', 'yes', 'on'). */
function readFlag(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

function readTransport(raw: string | undefined): Transport {
  const v = (raw ?? "").trim().toLowerCase();
  if (v === "" || v === "http") return "http";
  if (v === "stdio") return "stdio";
  throw new ConfigError(`RAG_TRANSPORT must be 'http' or 'stdio' (got '${raw}')`);
}

/**
 * Build the runtime configuration from environment variables.
 * Relative paths resolve against the current working directory.
 *
 * @throws {ConfigError} If CHUNK_OVERLAP >= CHUNK_SIZE or RAG_TRANSPORT is unknown.
 */
export function getConfig(env: Env = process.env): Config {
  const CORPUS_DIR = path.resolve(env.CORPUS_DIR?.trim() || "docs");
  const INDEX_STORE_PATH = path.resolve(env.INDEX_STORE_PATH?.trim() || ".rag/index.json");
  const MODEL_NAME = env.MODEL_NAME?.trim() || DEFAULT_EMBEDDING_MODEL;

  // Tokens per window / tokens shared between neighbouring windows.
  const CHUNK_SIZE = readInt(env.CHUNK_SIZE, 300, 1, 8000);
  const CHUNK_OVERLAP = readInt(env.CHUNK_OVERLAP, 50, 0, 4000);
  assertChunkParams(CHUNK_SIZE, CHUNK_OVERLAP);

  // Stored text only; embeddings always see the whole window.
  const CHUNK_TEXT_LIMIT = readInt(env.CHUNK_TEXT_LIMIT, 600, 1, 100_000);
  const DEFAULT_TOP_K = readInt(env.DEFAULT_TOP_K, 3, 1, 100);

  const OPENAI_API_KEY = env.OPENAI_API_KEY?.trim() || undefined;

  return {
    CORPUS_DIR,
    INDEX_STORE_PATH,
    MODEL_NAME,
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    CHUNK_TEXT_LIMIT,
    DEFAULT_TOP_K,
    VERBOSE: readFlag(env.VERBOSE),
    HOST: env.HOST?.trim() || "127.0.0.1",
    PORT: readInt(env.PORT, 5000, 0, 65535),
    RAG_TRANSPORT: readTransport(env.RAG_TRANSPORT),
    OPENAI_API_KEY,
    OPENAI_BASE_URL: env.OPENAI_BASE_URL?.trim() || undefined,
    OPENAI_MODEL: env.OPENAI_MODEL?.trim() || "gpt-4o-mini",
    SYNTHESIS_ENABLED: readFlag(env.SYNTHESIS_ENABLED ?? "true"),
    SYNTHESIS_MAX_TOKENS: readInt(env.SYNTHESIS_MAX_TOKENS, 200, 1, 4096),
  };
}
