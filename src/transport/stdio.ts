import { StdioServerTransport, type Server } from "../mcp-sdk";

/**
 * Serve a single MCP session over stdin/stdout. stdout carries JSON-RPC only;
 * diagnostics stay on stderr.
 */
export async function startStdioTransport(createServer: () => Server): Promise<Server> {
  const server = createServer();
  await server.connect(new StdioServerTransport());
  console.error("[RAG] MCP server ready on stdio");
  return server;
}
