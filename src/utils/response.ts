/**
 * Builders for MCP tool results.
 *
 * Every tool returns a `CallToolResult` with a single text item. Failures set
 * `isError` so the client sees a tool-level error instead of a protocol
 * fault; nothing is thrown across the tool boundary.
 */
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

export function textResult(text: string): CallToolResult {
    return { content: [{ type: "text", text }] };
}

export function errorResult(message: string): CallToolResult {
    return { content: [{ type: "text", text: message }], isError: true };
}
