import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { BraintreeMcpConfig } from "../types/config.js";
import type { FetchLike } from "../types/graphql.js";
import type { Logger } from "../types/logger.js";
import type { BaseGraphQLProvider } from "../providers/base.js";
import { createBraintreeProvider } from "../providers/braintree.js";
import { registerBraintreeTools } from "../tools/index.js";
import { SERVER_NAME, SERVER_VERSION } from "../utils/constants.js";

export interface BraintreeMCPOptions {
    provider: BaseGraphQLProvider;
    logger?: Logger;
}

export type ServerFactory = () => McpServer;

/**
 * Shared core behind both transports.
 *
 * Holds the provider and logger, and stamps out a fully registered
 * `McpServer` per session. An `McpServer` serves one transport at a time, so
 * the HTTP transport asks for a new one for every client session while stdio
 * asks exactly once.
 */
export class BraintreeMCP {
    private readonly provider: BaseGraphQLProvider;
    private readonly logger: Logger;

    constructor(opts: BraintreeMCPOptions) {
        this.provider = opts.provider;
        this.logger = opts.logger ?? console;
    }

    createServer(): McpServer {
        const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
        registerBraintreeTools(server, { provider: this.provider, logger: this.logger });
        this.logger.debug(`[BraintreeMCP] server instance created (${this.provider.endpoint})`);
        return server;
    }

    /** `createServer` bound to this instance, for handing to a transport. */
    get serverFactory(): ServerFactory {
        return () => this.createServer();
    }
}

export interface CreateBraintreeMCPOptions {
    logger?: Logger;
    fetch?: FetchLike;
}

export function createBraintreeMCP(
    config: BraintreeMcpConfig,
    opts: CreateBraintreeMCPOptions = {}
): BraintreeMCP {
    const provider = createBraintreeProvider(config, opts);
    return new BraintreeMCP({ provider, logger: opts.logger });
}
