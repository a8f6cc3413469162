/**
 * Shared constants for the Braintree MCP server.
 *
 * Timings are in milliseconds (Node.js convention).
 */

export const SERVER_NAME = "braintree-mcp";
export const SERVER_VERSION = "0.1.0";

/**
 * Braintree GraphQL endpoints, one per environment.
 * Requests always go to exactly one of these; there is no per-call override.
 */
export const BraintreeEndpoint = {
    sandbox: "https://payments.sandbox.braintree-api.com/graphql",
    production: "https://payments.braintree-api.com/graphql",
} as const;

/** Sent as `Braintree-Version` unless BRAINTREE_API_VERSION overrides it. */
export const DEFAULT_API_VERSION = "2025-04-01";

export const Defaults = {
    /** Loopback only, so the HTTP transport is not reachable through DNS rebinding. */
    HOST: "127.0.0.1",

    PORT: 8001,

    /** Upstream request timeout (30 seconds) */
    TIMEOUT_MS: 30_000,

    LOG_LEVEL: "info",
} as const;

/** Tool names exposed to MCP clients. Identical on every transport. */
export const ToolName = {
    PING: "braintree_ping",
    EXECUTE_GRAPHQL: "braintree_execute_graphql",
    ID_FROM_LEGACY_ID: "braintree_get_graphql_id_from_legacy_id",
} as const;

export type ToolName = typeof ToolName[keyof typeof ToolName];

/** Queries are truncated to this many characters in log lines. */
export const QUERY_LOG_LIMIT = 100;

/** HTTP routes served by the network transport. */
export const HttpRoute = {
    STREAMABLE: "/mcp",
    SSE: "/sse",
    SSE_MESSAGES: "/messages",
    HEALTH: "/healthz",
} as const;

export const SESSION_HEADER = "mcp-session-id";
