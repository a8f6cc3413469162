import type { Readable, Writable } from "node:stream";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerFactory } from "../core/BraintreeMCP.js";
import type { Logger } from "../types/logger.js";

export interface StdioHandle {
  server: McpServer;
  close(): Promise<void>;
}

export interface StdioStreams {
  /** Defaults to `process.stdin`. */
  stdin?: Readable;
  /** Defaults to `process.stdout`. */
  stdout?: Writable;
}

/**
 * Serve one session over stdin/stdout for the lifetime of the process.
 */
export async function startStdioServer(
  createServer: ServerFactory,
  logger: Logger,
  io: StdioStreams = {}
): Promise<StdioHandle> {
  const server = createServer();
  const transport = new StdioServerTransport(io.stdin, io.stdout);
  transport.onclose = () => logger.info("[stdio] transport closed");

  await server.connect(transport);
  logger.info("[stdio] Braintree MCP server running on stdio");

  return {
    server,
    close: () => server.close(),
  };
}
