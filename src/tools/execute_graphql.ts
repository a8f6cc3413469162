// GraphQL pass-through.
//
// The query and variables go upstream exactly as the caller sent them and the
// body comes back exactly as Braintree sent it. GraphQL `errors` are part of
// that body and are not inspected here; only transport-level failures
// (network, timeout, non-2xx) become an error result.

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { ToolDeps } from "./types.js";
import type { GraphQLRequest } from "../types/graphql.js";
import { ToolName, QUERY_LOG_LIMIT } from "../utils/constants.js";
import { UpstreamError, describeError } from "../utils/errors.js";
import { truncate } from "../utils/logger.js";
import { EXECUTE_GRAPHQL_DESCRIPTION, executeErrorMessage } from "../utils/messages.js";
import { errorResult, textResult } from "../utils/response.js";

export const inputSchema = {
  query: z.string().describe("The complete GraphQL query or mutation to execute."),
  variables: z
    .record(z.unknown())
    .optional()
    .describe("Variables for the operation, keyed by the names declared in the query."),
};

export async function executeGraphQL(
  { provider, logger }: ToolDeps,
  request: GraphQLRequest
): Promise<CallToolResult> {
  logger.info(`[${ToolName.EXECUTE_GRAPHQL}] ${truncate(request.query.trim(), QUERY_LOG_LIMIT)}`);

  try {
    const response = await provider.execute(request);
    return textResult(response.text);
  } catch (err) {
    if (!(err instanceof UpstreamError)) {
      logger.error(`[${ToolName.EXECUTE_GRAPHQL}] unexpected failure`, err);
    }
    return errorResult(executeErrorMessage(describeError(err)));
  }
}

export function register(server: McpServer, deps: ToolDeps): void {
  server.registerTool(
    ToolName.EXECUTE_GRAPHQL,
    {
      title: "Execute Braintree GraphQL",
      description: EXECUTE_GRAPHQL_DESCRIPTION,
      inputSchema,
      annotations: { destructiveHint: true, openWorldHint: true },
    },
    ({ query, variables }) => executeGraphQL(deps, { query, variables })
  );
}
