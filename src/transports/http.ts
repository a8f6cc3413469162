/**
 * Network transport: Streamable HTTP at /mcp plus the older HTTP+SSE pair
 * (/sse + /messages) for clients that still speak it.
 *
 * Every client session gets its own `McpServer` from the factory; sessions
 * share nothing but the provider, so they run fully independently.
 */
import { randomUUID } from "node:crypto";
import type { Server as HttpServer } from "node:http";
import express, { type Express, type Request, type Response } from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import type { ServerFactory } from "../core/BraintreeMCP.js";
import type { Logger } from "../types/logger.js";
import { HttpRoute, SESSION_HEADER } from "../utils/constants.js";

export interface HttpAppOptions {
  createServer: ServerFactory;
  logger: Logger;
}

export interface HttpApp {
  app: Express;
  /** Live session count, both flavours. */
  sessionCount(): number;
  /** Close every open session transport. */
  closeSessions(): Promise<void>;
}

export interface HttpHandle {
  app: Express;
  server: HttpServer;
  /** Bound address; useful when listening on port 0. */
  url: string;
  sessionCount(): number;
  close(): Promise<void>;
}

function jsonRpcError(res: Response, httpStatus: number, code: number, message: string): void {
  res.status(httpStatus).json({
    jsonrpc: "2.0",
    error: { code, message },
    id: null,
  });
}

function sessionIdOf(req: Request): string | undefined {
  const value = req.headers[SESSION_HEADER];
  return Array.isArray(value) ? value[0] : value;
}

export function createHttpApp({ createServer, logger }: HttpAppOptions): HttpApp {
  const streamable = new Map<string, StreamableHTTPServerTransport>();
  const sse = new Map<string, SSEServerTransport>();

  const app = express();
  app.use(express.json({ limit: "4mb" }));

  app.get(HttpRoute.HEALTH, (_req, res) => {
    res.json({ status: "ok" });
  });

  // ── Streamable HTTP ──────────────────────────────────────────────

  app.post(HttpRoute.STREAMABLE, async (req, res) => {
    const sessionId = sessionIdOf(req);
    try {
      let transport = sessionId ? streamable.get(sessionId) : undefined;

      if (!transport) {
        if (sessionId || !isInitializeRequest(req.body)) {
          jsonRpcError(res, 400, -32000, "Bad Request: No valid session ID provided");
          return;
        }

        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (id) => {
            streamable.set(id, created);
            logger.info(`[http] session ${id} opened`);
          },
        });
        created.onclose = () => {
          if (created.sessionId && streamable.delete(created.sessionId)) {
            logger.info(`[http] session ${created.sessionId} closed`);
          }
        };

        await createServer().connect(created);
        transport = created;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      logger.error("[http] error handling MCP request", err);
      if (!res.headersSent) {
        jsonRpcError(res, 500, -32603, "Internal server error");
      }
    }
  });

  const handleSessionRequest = async (req: Request, res: Response): Promise<void> => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? streamable.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      logger.error(`[http] error handling ${req.method} for session ${sessionId}`, err);
      if (!res.headersSent) {
        jsonRpcError(res, 500, -32603, "Internal server error");
      }
    }
  };

  app.get(HttpRoute.STREAMABLE, handleSessionRequest);
  app.delete(HttpRoute.STREAMABLE, handleSessionRequest);

  // ── HTTP+SSE ─────────────────────────────────────────────────────

  app.get(HttpRoute.SSE, async (_req, res) => {
    const transport = new SSEServerTransport(HttpRoute.SSE_MESSAGES, res);
    sse.set(transport.sessionId, transport);
    logger.info(`[sse] session ${transport.sessionId} opened`);

    res.on("close", () => {
      if (sse.delete(transport.sessionId)) {
        logger.info(`[sse] session ${transport.sessionId} closed`);
      }
    });

    try {
      await createServer().connect(transport);
    } catch (err) {
      logger.error(`[sse] failed to start session ${transport.sessionId}`, err);
      sse.delete(transport.sessionId);
      if (!res.headersSent) {
        res.status(500).end();
      }
    }
  });

  app.post(HttpRoute.SSE_MESSAGES, async (req, res) => {
    const sessionId = typeof req.query.sessionId === "string" ? req.query.sessionId : undefined;
    const transport = sessionId ? sse.get(sessionId) : undefined;
    if (!transport) {
      res.status(404).send("Session not found");
      return;
    }
    try {
      await transport.handlePostMessage(req, res, req.body);
    } catch (err) {
      logger.error(`[sse] error handling message for session ${sessionId}`, err);
      if (!res.headersSent) {
        jsonRpcError(res, 500, -32603, "Internal server error");
      }
    }
  });

  return {
    app,
    sessionCount: () => streamable.size + sse.size,
    closeSessions: async () => {
      const open = [...streamable.values(), ...sse.values()];
      streamable.clear();
      sse.clear();
      await Promise.all(open.map((t) => t.close()));
    },
  };
}

/**
 * Bind the HTTP app to host:port. Resolves once the socket is listening.
 */
export async function startHttpServer(
  opts: HttpAppOptions & { host: string; port: number }
): Promise<HttpHandle> {
  const { app, sessionCount, closeSessions } = createHttpApp(opts);

  const server = await new Promise<HttpServer>((resolve, reject) => {
    const listening = app.listen(opts.port, opts.host, (err?: Error) => {
      if (err) reject(err);
      else resolve(listening);
    });
  });

  const address = server.address();
  const port = typeof address === "object" && address ? address.port : opts.port;
  const url = `http://${opts.host}:${port}`;
  opts.logger.info(`[http] Braintree MCP server listening on ${url} (${HttpRoute.STREAMABLE}, ${HttpRoute.SSE})`);

  return {
    app,
    server,
    url,
    sessionCount,
    close: async () => {
      await closeSessions();
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      opts.logger.info("[http] server stopped");
    },
  };
}
