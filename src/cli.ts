import { Command, InvalidArgumentError } from "commander";
import path from "node:path";
import { APP_VERSION, type Config } from "./config";
import type { AnswerReport, QueryReport, RagService, RebuildReport } from "./service";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

/** Characters of each passage echoed in the query report. */
const PREVIEW_CHARS = 400;

export interface CliDeps {
  loadConfig: () => Config;
  createService: (config: Config) => Promise<RagService>;
  /** Sink for report lines (stdout in production). */
  out: (line: string) => void;
}

export function formatRebuildReport(r: RebuildReport): string {
  return `Rebuilt index: ${r.entryCount} vectors (dim=${r.dimension}) in ${r.elapsedTime.toFixed(2)}s`;
}

export function formatQueryReport(r: QueryReport): string {
  const lines = [`Detected language: ${r.detectedLanguage}`, `Query: ${r.query}`, ""];
  r.results.forEach((hit, i) => {
    lines.push(`${i + 1}. Source: ${hit.source} (chunk ${hit.chunkIndex}) - score ${hit.score.toFixed(4)}`);
    lines.push(`   "${hit.text.slice(0, PREVIEW_CHARS)}"`);
  });
  if (r.results.length === 0) lines.push("(no matching passages)");
  lines.push("", "--- Report ---", `Elapsed time: ${r.elapsedTime.toFixed(2)}s`);
  return lines.join("\n");
}

export function formatAnswerReport(r: AnswerReport): string {
  return `${formatQueryReport(r)}\n\n--- Answer ---\n${r.answer}`;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function parsePort(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0 || n > 65535) throw new InvalidArgumentError("Expected a port number.");
  return n;
}

function parseTransport(value: string): Config["RAG_TRANSPORT"] {
  if (value === "http" || value === "stdio") return value;
  throw new InvalidArgumentError("Expected 'http' or 'stdio'.");
}

/** Command tree: rebuild | query | answer | serve. */
export function createProgram(deps: CliDeps): Command {
  const program = new Command();

  program
    .name("corpus-rag")
    .description("Chunk, embed and search a folder of .txt / .md documents")
    .version(APP_VERSION);

  program
    .command("rebuild")
    .description("Rebuild the index from the corpus directory")
    .option("--corpus <dir>", "corpus directory (overrides CORPUS_DIR)")
    .action(async (opts: { corpus?: string }) => {
      const config = deps.loadConfig();
      if (opts.corpus) config.CORPUS_DIR = path.resolve(opts.corpus);
      const service = await deps.createService(config);
      service.markTransport("cli");
      deps.out(formatRebuildReport(await service.rebuild()));
    });

  program
    .command("query")
    .description("Search the index and print the best matching passages")
    .argument("<text...>", "query text")
    .option("-k, --top-k <n>", "number of passages to return", parsePositiveInt)
    .action(async (words: string[], opts: { topK?: number }) => {
      const service = await deps.createService(deps.loadConfig());
      service.markTransport("cli");
      deps.out(formatQueryReport(await service.query(words.join(" "), opts.topK)));
    });

  program
    .command("answer")
    .description("Search the index and synthesize a cited answer")
    .argument("<text...>", "question text")
    .option("-k, --top-k <n>", "number of passages to use", parsePositiveInt)
    .action(async (words: string[], opts: { topK?: number }) => {
      const service = await deps.createService(deps.loadConfig());
      service.markTransport("cli");
      deps.out(formatAnswerReport(await service.answer(words.join(" "), opts.topK)));
    });

  program
    .command("serve")
    .description("Serve the index over HTTP (default) or as an MCP stdio server")
    .option("--host <host>", "HTTP bind address (overrides HOST)")
    .option("--port <port>", "HTTP port (overrides PORT)", parsePort)
    .option("--transport <kind>", "http | stdio (overrides RAG_TRANSPORT)", parseTransport)
    .action(
      async (opts: { host?: string; port?: number; transport?: Config["RAG_TRANSPORT"] }) => {
        const config = deps.loadConfig();
        const service = await deps.createService(config);
        const transport = opts.transport ?? config.RAG_TRANSPORT;
        if (transport === "stdio") {
          await startStdioTransport(service);
          return;
        }
        await startHttpTransport(service, {
          host: opts.host ?? config.HOST,
          port: opts.port ?? config.PORT,
        });
      },
    );

  return program;
}
