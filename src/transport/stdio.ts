import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from "../mcp";
import type { RagService } from "../service";

/**
 * Serve the MCP tools over stdio. stdout carries the protocol, so all
 * diagnostics stay on stderr.
 *
 * @returns Promise resolving once the server is connected.
 */
export async function startStdioTransport(service: RagService) {
  service.markTransport("stdio");
  const server = createServer(service);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[RAG] MCP server listening on stdio");
}
