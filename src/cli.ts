import type { BraintreeMcpConfig, TransportKind } from "./types/config.js";
import type { FetchLike } from "./types/graphql.js";
import type { Logger } from "./types/logger.js";
import { loadConfig, type EnvLike } from "./core/config.js";
import { createBraintreeMCP } from "./core/BraintreeMCP.js";
import { startStdioServer } from "./transports/stdio.js";
import { startHttpServer } from "./transports/http.js";
import { ConfigError, describeError } from "./utils/errors.js";
import { createLogger, type LogSink } from "./utils/logger.js";
import { SERVER_NAME, SERVER_VERSION } from "./utils/constants.js";

export interface MainDeps {
  /** Fixed logger; otherwise one is built at the configured level. */
  logger?: Logger;
  sink?: LogSink;
  fetch?: FetchLike;
}

export interface RunningServer {
  transport: TransportKind;
  /** Set for the HTTP transport. */
  url?: string;
  close(): Promise<void>;
}

export interface MainResult {
  exitCode: number;
  running?: RunningServer;
}

const TRANSPORT_ALIASES: Record<string, TransportKind> = {
  stdio: "stdio",
  http: "http",
  sse: "http",
};

/**
 * Start the server. `argv` is the argument list after the script name; its
 * first entry may name the transport and overrides MCP_TRANSPORT.
 *
 * Never throws: configuration problems are logged and reported as exit code 1.
 */
export async function main(argv: string[], env: EnvLike, deps: MainDeps = {}): Promise<MainResult> {
  const bootLogger = deps.logger ?? createLogger("info", deps.sink);

  const requested = argv[0];
  if (requested !== undefined && !Object.hasOwn(TRANSPORT_ALIASES, requested)) {
    bootLogger.error(`[${SERVER_NAME}] Unknown transport "${requested}". Use one of: stdio, http`);
    return { exitCode: 1 };
  }

  let config: BraintreeMcpConfig;
  try {
    config = loadConfig(
      requested === undefined ? env : { ...env, MCP_TRANSPORT: TRANSPORT_ALIASES[requested] }
    );
  } catch (err) {
    if (err instanceof ConfigError) {
      bootLogger.error(`[${SERVER_NAME}] FATAL: cannot start server. ${err.message}`);
      return { exitCode: 1 };
    }
    throw err;
  }

  const logger = deps.logger ?? createLogger(config.logLevel, deps.sink);
  logger.info(
    `[${SERVER_NAME}] v${SERVER_VERSION} merchant ${config.merchantId} on Braintree ${config.environment}`
  );

  const core = createBraintreeMCP(config, { logger, fetch: deps.fetch });

  try {
    if (config.transport === "http") {
      const handle = await startHttpServer({
        createServer: core.serverFactory,
        logger,
        host: config.host,
        port: config.port,
      });
      return { exitCode: 0, running: { transport: "http", url: handle.url, close: handle.close } };
    }

    const handle = await startStdioServer(core.serverFactory, logger);
    return { exitCode: 0, running: { transport: "stdio", close: handle.close } };
  } catch (err) {
    logger.error(`[${SERVER_NAME}] failed to start ${config.transport} transport: ${describeError(err)}`);
    return { exitCode: 1 };
  }
}
