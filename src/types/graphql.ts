export type JsonPrimitive = string | number | boolean | null;
export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

/** Body of a GraphQL POST, exactly as the caller supplied it. */
export interface GraphQLRequest {
  query: string;
  variables?: Record<string, unknown>;
}

/**
 * What came back from a 2xx upstream exchange.
 * `body` is undefined when `text` is not valid JSON.
 */
export interface UpstreamResponse {
  status: number;
  text: string;
  body: JsonValue | undefined;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;
