import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { serverLogger as log } from "../logger";

/**
 * Serve a single MCP session over stdin/stdout.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 */
export async function startStdioTransport(createServer: () => Server): Promise<void> {
  const server = createServer();
  await server.connect(new StdioServerTransport());
  log.info("MCP stdio transport connected");
}
