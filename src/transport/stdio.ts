import { type Server, StdioServerTransport } from "../mcp-sdk";

/**
 * Connect a single server over stdin/stdout. Logging stays on stderr so the
 * JSON-RPC stream is not corrupted.
 */
export async function startStdioTransport(createServer: () => Server): Promise<Server> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[MCP] Listening on stdio`);
  return server;
}
