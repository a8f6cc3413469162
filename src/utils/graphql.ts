/**
 * Read-only helpers for looking inside an upstream GraphQL body.
 * Nothing here rewrites the body; tools only use them to pick out a field.
 */
import type { JsonObject, JsonValue } from "../types/graphql.js";

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * The top-level `errors` array, if the body has one.
 */
export function getGraphQLErrors(body: JsonValue | undefined): JsonValue[] | undefined {
    if (!isJsonObject(body)) return undefined;
    const errors = body.errors;
    return Array.isArray(errors) ? errors : undefined;
}

/**
 * `data.<field>` when `data` is an object carrying that key, otherwise
 * undefined. A present-but-null field comes back as `null`.
 */
export function getDataField(body: JsonValue | undefined, field: string): JsonValue | undefined {
    if (!isJsonObject(body)) return undefined;
    const data = body.data;
    if (!isJsonObject(data) || !(field in data)) return undefined;
    return data[field];
}

/**
 * The upstream's own explanation in a failed HTTP body: `errors[0].message`
 * (GraphQL shape) or `error.message`. Undefined for non-JSON or other shapes.
 */
export function upstreamErrorMessage(text: string): string | undefined {
    let body: JsonValue;
    try {
        body = JSON.parse(text);
    } catch {
        return undefined;
    }
    const first = getGraphQLErrors(body)?.[0];
    const holder = first ?? (isJsonObject(body) ? body.error : undefined);
    const message = isJsonObject(holder) ? holder.message : undefined;
    return typeof message === "string" && message !== "" ? message : undefined;
}

/**
 * Join the `message` of every GraphQL error with ", ".
 * Entries without a string message read as "Unknown error".
 */
export function formatGraphQLErrors(errors: JsonValue[]): string {
    return errors
        .map((err) => {
            const message = isJsonObject(err) ? err.message : undefined;
            return typeof message === "string" ? message : "Unknown error";
        })
        .join(", ");
}
