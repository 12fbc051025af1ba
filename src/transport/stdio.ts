import { type Server, StdioServerTransport } from "../mcp-sdk";

/** Serve one MCP session over stdin/stdout until the client disconnects. */
export async function startStdioTransport(server: Server): Promise<void> {
  server.onclose = () => console.error("[RAG] stdio session closed");
  await server.connect(new StdioServerTransport());
  console.error("[RAG] MCP server listening on stdio");
}
