/**
 * MCP (Model Context Protocol) tool surface over {@link RagService}.
 *
 * Tools:
 *  rag_query
 *    Input:  { query: string, top_k?: number }
 *    Output: JSON text, same payload as POST /query.
 *  rag_answer
 *    Input:  { query: string, top_k?: number }
 *    Output: JSON text, same payload as POST /answer.
 *  rebuild_index
 *    Input:  {}
 *    Output: JSON text, same payload as POST /rebuild.
 *
 * Core failures (missing index, empty corpus, ...) come back as `isError`
 * results so the client can read the message; protocol misuse raises McpError.
 */
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { APP_VERSION } from "./config";
import type { RagService } from "./service";
import { answerPayload, errorPayload, queryPayload, rebuildPayload } from "./wire";

const ragQueryArgs = z.object({
  query: z.string().trim().min(1),
  top_k: z.number().int().min(1).max(50).optional(),
});

const queryInputSchema = {
  type: "object" as const,
  properties: {
    query: {
      type: "string",
      description: "Natural language question. Use concise, specific terms for best matches.",
    },
    top_k: {
      type: "number",
      description: "Maximum number of passages to return (1-50). Defaults to the server's DEFAULT_TOP_K.",
      minimum: 1,
      maximum: 50,
    },
  },
  required: ["query"],
};

export const TOOLS = [
  {
    name: "rag_query",
    description:
      "Semantically search the indexed document corpus and return the best matching passages with source file, chunk index and similarity score.",
    inputSchema: queryInputSchema,
  },
  {
    name: "rag_answer",
    description:
      "Search the corpus and synthesize a short answer citing the matching passages (citations only when no LLM is configured).",
    inputSchema: queryInputSchema,
  },
  {
    name: "rebuild_index",
    description: "Rebuild the whole index from the corpus directory.",
    inputSchema: { type: "object" as const, properties: {} },
  },
];

function jsonResult(payload: unknown, isError = false): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(payload) }],
    ...(isError ? { isError: true } : {}),
  };
}

function parseQueryArgs(args: unknown): z.infer<typeof ragQueryArgs> {
  const parsed = ragQueryArgs.safeParse(args ?? {});
  if (!parsed.success) {
    throw new McpError(
      ErrorCode.InvalidParams,
      `Invalid arguments: ${parsed.error.issues.map((i) => `${i.path.join(".") || "input"}: ${i.message}`).join("; ")}`,
    );
  }
  return parsed.data;
}

/**
 * Execute one tool call against the service.
 *
 * @throws {McpError} MethodNotFound for unknown tools, InvalidParams for bad arguments.
 */
export async function callTool(
  service: RagService,
  name: string,
  args: unknown,
): Promise<CallToolResult> {
  try {
    switch (name) {
      case "rag_query": {
        const { query, top_k } = parseQueryArgs(args);
        return jsonResult(queryPayload(await service.query(query, top_k)));
      }
      case "rag_answer": {
        const { query, top_k } = parseQueryArgs(args);
        return jsonResult(answerPayload(await service.answer(query, top_k)));
      }
      case "rebuild_index":
        return jsonResult(rebuildPayload(await service.rebuild()));
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  } catch (e) {
    if (e instanceof McpError) throw e;
    return jsonResult(errorPayload(e), true);
  }
}

/** A fresh, unconnected MCP server bound to `service`. */
export function createServer(service: RagService): Server {
  const server = new Server(
    { name: "corpus-rag", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));
  server.setRequestHandler(CallToolRequestSchema, async (req) =>
    callTool(service, req.params.name, req.params.arguments),
  );

  return server;
}
