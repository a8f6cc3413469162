import type { Logger } from "../types/logger.js";
import type {
  FetchLike,
  GraphQLRequest,
  JsonValue,
  UpstreamResponse,
} from "../types/graphql.js";
import { UpstreamError, describeError } from "../utils/errors.js";
import { Defaults, QUERY_LOG_LIMIT } from "../utils/constants.js";
import { truncate } from "../utils/logger.js";
import { upstreamErrorMessage } from "../utils/graphql.js";

export interface ProviderOptions {
  logger?: Logger;
  /** Defaults to the global `fetch`. */
  fetch?: FetchLike;
  timeoutMs?: number;
}

export abstract class BaseGraphQLProvider {
  protected logger: Logger;
  protected timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(opts: ProviderOptions = {}) {
    this.logger = opts.logger ?? console;
    this.timeoutMs = opts.timeoutMs ?? Defaults.TIMEOUT_MS;
    this.fetchImpl = opts.fetch ?? ((url, init) => fetch(url, init));
  }

  /** GraphQL endpoint every request is POSTed to. */
  abstract get endpoint(): string;

  protected abstract buildHeaders(): Record<string, string>;

  protected get tag(): string {
    return `[${this.constructor.name}]`;
  }

  /**
   * POST one GraphQL request and hand back the body untouched.
   *
   * `variables` is only put on the wire when the caller supplied it. GraphQL
   * `errors` in a 2xx body are returned like any other body.
   *
   * @throws UpstreamError on network failure, timeout or a non-2xx status.
   */
  async execute(request: GraphQLRequest): Promise<UpstreamResponse> {
    const payload: GraphQLRequest =
      request.variables === undefined
        ? { query: request.query }
        : { query: request.query, variables: request.variables };

    const url = this.endpoint;
    const init: RequestInit = {
      method: "POST",
      headers: this.buildHeaders(),
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(this.timeoutMs),
    };

    this.logger.debug(`${this.tag} POST ${url}: ${truncate(request.query.trim(), QUERY_LOG_LIMIT)}`);

    let resp: Response;
    let text: string;
    try {
      resp = await this.fetchImpl(url, init);
      text = await resp.text();
    } catch (err) {
      const reason = this.describeFailure(err);
      this.logger.error(`${this.tag} Network error POST ${url}: ${reason}`);
      throw new UpstreamError(reason, { cause: err });
    }

    if (!resp.ok) {
      const status = resp.statusText ? `HTTP ${resp.status} ${resp.statusText}` : `HTTP ${resp.status}`;
      const detail = upstreamErrorMessage(text);
      this.logger.error(`${this.tag} ${status} POST ${url}: ${truncate(text, 200)}`);
      throw new UpstreamError(detail ? `${status} - ${detail}` : status, { status: resp.status, body: text });
    }

    let body: JsonValue | undefined;
    try {
      body = JSON.parse(text);
    } catch (err) {
      this.logger.warn(`${this.tag} Response from ${url} is not JSON (${describeError(err)}); passing raw text through`);
      body = undefined;
    }

    this.logger.debug(`${this.tag} POST ${url} -> ${resp.status}`);
    return { status: resp.status, text, body };
  }

  private describeFailure(err: unknown): string {
    if (typeof err === "object" && err !== null && "name" in err && err.name === "TimeoutError") {
      return `request timed out after ${this.timeoutMs}ms`;
    }
    return describeError(err);
  }
}
