import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ToolDeps, ToolModule } from "./types.js";
import * as pingMod from "./ping.js";
import * as executeGraphqlMod from "./execute_graphql.js";
import * as legacyIdMod from "./legacy_id.js";

/** Every tool the server exposes, in listing order. */
const TOOL_MODULES: ToolModule[] = [pingMod, executeGraphqlMod, legacyIdMod];

/** Register all tools on one server. Both transports go through here. */
export function registerBraintreeTools(server: McpServer, deps: ToolDeps): void {
  for (const mod of TOOL_MODULES) {
    mod.register(server, deps);
  }
}

export type { ToolDeps } from "./types.js";
