// Connectivity check: one trivial authenticated query, no retries.

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { ToolDeps } from "./types.js";
import type { UpstreamResponse } from "../types/graphql.js";
import { ToolName } from "../utils/constants.js";
import { UpstreamError, describeError } from "../utils/errors.js";
import { formatGraphQLErrors, getDataField, getGraphQLErrors } from "../utils/graphql.js";
import { PING_DESCRIPTION, pingErrorMessage, unexpectedResponseMessage } from "../utils/messages.js";
import { errorResult, textResult } from "../utils/response.js";

export const PING_QUERY = `
  query Ping {
    ping
  }
`;

export const PONG = "pong";

export async function ping({ provider, logger }: ToolDeps): Promise<CallToolResult> {
  logger.info(`[${ToolName.PING}] invoked`);

  let response: UpstreamResponse;
  try {
    response = await provider.execute({ query: PING_QUERY });
  } catch (err) {
    if (!(err instanceof UpstreamError)) {
      logger.error(`[${ToolName.PING}] unexpected failure`, err);
    }
    return errorResult(pingErrorMessage(describeError(err)));
  }

  const errors = getGraphQLErrors(response.body);
  if (errors) {
    return errorResult(pingErrorMessage(formatGraphQLErrors(errors)));
  }

  if (getDataField(response.body, "ping") === PONG) {
    return textResult(PONG);
  }

  return errorResult(unexpectedResponseMessage("ping", response.text));
}

export function register(server: McpServer, deps: ToolDeps): void {
  server.registerTool(
    ToolName.PING,
    {
      title: "Ping Braintree",
      description: PING_DESCRIPTION,
      annotations: { readOnlyHint: true, openWorldHint: true },
    },
    () => ping(deps)
  );
}
