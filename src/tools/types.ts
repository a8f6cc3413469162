import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { BaseGraphQLProvider } from "../providers/base.js";
import type { Logger } from "../types/logger.js";

/** What every tool handler is given. Built once per process. */
export interface ToolDeps {
  provider: BaseGraphQLProvider;
  logger: Logger;
}

export type ToolModule = {
  register(server: McpServer, deps: ToolDeps): void;
};
