export { BraintreeMCP, createBraintreeMCP } from "./core/BraintreeMCP.js";
export type { BraintreeMCPOptions, CreateBraintreeMCPOptions, ServerFactory } from "./core/BraintreeMCP.js";
export { loadConfig } from "./core/config.js";
export type { EnvLike } from "./core/config.js";
export { BaseGraphQLProvider } from "./providers/index.js";
export type { ProviderOptions } from "./providers/index.js";
export { BraintreeProvider, createBraintreeProvider } from "./providers/index.js";
export type { BraintreeProviderOpts } from "./providers/index.js";
export { registerBraintreeTools } from "./tools/index.js";
export type { ToolDeps } from "./tools/index.js";
export { startStdioServer, type StdioStreams } from "./transports/stdio.js";
export { createHttpApp, startHttpServer } from "./transports/http.js";
export { main } from "./cli.js";
export { ConfigError, UpstreamError } from "./utils/errors.js";
export { createLogger } from "./utils/logger.js";
export { ToolName } from "./utils/constants.js";
export type { BraintreeMcpConfig, BraintreeEnvironment, TransportKind } from "./types/config.js";
export type { GraphQLRequest, UpstreamResponse, JsonValue } from "./types/graphql.js";
export type { Logger, LogLevel } from "./types/logger.js";
