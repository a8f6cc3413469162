// Map a legacy (REST-era) Braintree ID to its GraphQL node ID.

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { ToolDeps } from "./types.js";
import type { UpstreamResponse } from "../types/graphql.js";
import { ToolName } from "../utils/constants.js";
import { UpstreamError, describeError } from "../utils/errors.js";
import { formatGraphQLErrors, getDataField, getGraphQLErrors } from "../utils/graphql.js";
import {
  ID_FROM_LEGACY_ID_DESCRIPTION,
  LEGACY_ID_TYPES,
  legacyIdErrorMessage,
  legacyIdNotFoundMessage,
  unexpectedResponseMessage,
} from "../utils/messages.js";
import { errorResult, textResult } from "../utils/response.js";

export const ID_FROM_LEGACY_ID_QUERY = `
  query IdFromLegacyId($legacyId: ID!, $type: LegacyIdType!) {
    idFromLegacyId(legacyId: $legacyId, type: $type)
  }
`;

export const inputSchema = {
  legacy_id: z.string().describe("The legacy identifier (e.g. transaction ID, customer ID)."),
  legacy_id_type: z
    .string()
    .describe(`The type of the legacy ID. Common values: ${LEGACY_ID_TYPES.join(", ")}.`),
};

export async function idFromLegacyId(
  { provider, logger }: ToolDeps,
  legacyId: string,
  legacyIdType: string
): Promise<CallToolResult> {
  logger.info(`[${ToolName.ID_FROM_LEGACY_ID}] ${legacyIdType} ${legacyId}`);

  let response: UpstreamResponse;
  try {
    response = await provider.execute({
      query: ID_FROM_LEGACY_ID_QUERY,
      variables: { legacyId, type: legacyIdType },
    });
  } catch (err) {
    if (!(err instanceof UpstreamError)) {
      logger.error(`[${ToolName.ID_FROM_LEGACY_ID}] unexpected failure`, err);
    }
    return errorResult(legacyIdErrorMessage(describeError(err)));
  }

  const errors = getGraphQLErrors(response.body);
  if (errors) {
    return errorResult(legacyIdErrorMessage(formatGraphQLErrors(errors)));
  }

  const id = getDataField(response.body, "idFromLegacyId");
  if (typeof id === "string" && id) {
    return textResult(id);
  }
  if (id === null || id === "") {
    return textResult(legacyIdNotFoundMessage(legacyId, legacyIdType));
  }

  return errorResult(unexpectedResponseMessage("idFromLegacyId", response.text));
}

export function register(server: McpServer, deps: ToolDeps): void {
  server.registerTool(
    ToolName.ID_FROM_LEGACY_ID,
    {
      title: "GraphQL ID from legacy ID",
      description: ID_FROM_LEGACY_ID_DESCRIPTION,
      inputSchema,
      annotations: { readOnlyHint: true, openWorldHint: true },
    },
    ({ legacy_id, legacy_id_type }) => idFromLegacyId(deps, legacy_id, legacy_id_type)
  );
}
