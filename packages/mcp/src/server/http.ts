// ============================================
// HTTP Server (SSE, Streamable HTTP and REST)
// ============================================

import http from "node:http";
import type { AddressInfo } from "node:net";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import {
  createLogger,
  errorMessage,
  ToolNotFoundError,
  type ToolRegistry,
  ToolValidationError,
} from "@mcpml/core";
import { isRecord } from "@mcpml/shared";
import express, { type NextFunction, type Request, type Response } from "express";
import { SSE_MESSAGES_PATH, SSE_PATH, STREAMABLE_HTTP_PATH } from "../constants.js";
import { createMcpServer, type McpServerInfo } from "./McpmlServer.js";

export interface HttpAppOptions extends McpServerInfo {
  /** Largest accepted JSON body, in body-parser notation (default "100kb") */
  bodyLimit?: string;
}

export interface HttpApp {
  app: express.Express;
  server: http.Server;
  /** Ends open SSE sessions and stops accepting connections */
  close(): Promise<void>;
}

const JSON_RPC_PARSE_ERROR = -32700;

/** Status and type body-parser attaches to the errors it raises */
function bodyParserFailure(error: unknown): { status: number; parseFailed: boolean } | undefined {
  if (!isRecord(error) || typeof error.status !== "number" || typeof error.type !== "string") {
    return undefined;
  }
  return { status: error.status, parseFailed: error.type === "entity.parse.failed" };
}

/**
 * The HTTP face of a tool registry.
 *
 * - `GET /sse` opens an SSE session; clients post to `/messages/?sessionId=`.
 * - `POST /mcp` is stateless Streamable HTTP: one MCP server per request.
 * - `GET /health`, `GET /tools` and `POST /tools/:name` are plain JSON.
 *
 * @example
 * ```typescript
 * const app = createHttpApp(registry, { version: "1.0.0", logger });
 * const address = await listen(app, "127.0.0.1", 8000);
 * // ...
 * await app.close();
 * ```
 */
export function createHttpApp(registry: ToolRegistry, options: HttpAppOptions): HttpApp {
  const logger = (options.logger ?? createLogger()).child({ component: "http" });
  const serverInfo: McpServerInfo = { version: options.version, logger };
  const sessions = new Map<string, SSEServerTransport>();

  const closeLogged = (what: string, closing: Promise<void>): void => {
    void closing.catch((error: unknown) => {
      logger.debug(`Closing ${what} failed`, { error: errorMessage(error) });
    });
  };

  const app = express();
  app.use(express.json({ limit: options.bodyLimit ?? "100kb" }));

  // Stateless: there is no session to stream to or delete, so only POST is served
  app.post(STREAMABLE_HTTP_PATH, async (req: Request, res: Response) => {
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    const mcp = createMcpServer(registry, serverInfo);
    res.on("close", () => {
      closeLogged("Streamable HTTP transport", transport.close());
      closeLogged("MCP server", mcp.close());
    });
    await mcp.connect(transport);
    await transport.handleRequest(req, res, req.body);
  });
  app.all(STREAMABLE_HTTP_PATH, (_req: Request, res: Response) => {
    res.status(405).json({
      jsonrpc: "2.0",
      error: { code: -32000, message: "Method not allowed." },
      id: null,
    });
  });

  app.get(SSE_PATH, async (_req: Request, res: Response) => {
    const transport = new SSEServerTransport(SSE_MESSAGES_PATH, res);
    const mcp = createMcpServer(registry, serverInfo);
    sessions.set(transport.sessionId, transport);
    res.on("close", () => {
      sessions.delete(transport.sessionId);
      closeLogged("SSE session", mcp.close());
      logger.debug(`SSE session ${transport.sessionId} closed`);
    });
    await mcp.connect(transport);
    logger.debug(`SSE session ${transport.sessionId} opened`);
  });

  app.post([SSE_MESSAGES_PATH, "/messages"], async (req: Request, res: Response) => {
    const sessionId = req.query.sessionId;
    if (typeof sessionId !== "string" || !sessionId) {
      res.status(400).json({ error: "Missing sessionId" });
      return;
    }
    const transport = sessions.get(sessionId);
    if (!transport) {
      res.status(404).json({ error: `Unknown session: ${sessionId}` });
      return;
    }
    await transport.handlePostMessage(req, res, req.body);
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", name: registry.name, tools: registry.size });
  });

  app.get("/tools", (_req: Request, res: Response) => {
    res.json({ tools: registry.list() });
  });

  app.post("/tools/:name", async (req: Request<{ name: string }>, res: Response) => {
    const { name } = req.params;
    const args: unknown = req.body ?? {};
    if (!isRecord(args)) {
      res.status(400).json({ error: "Request body must be a JSON object" });
      return;
    }

    const started = Date.now();
    try {
      const result = await registry.execute(name, args);
      res.json({
        result: result ?? null,
        metadata: {
          tool: name,
          type: registry.get(name)?.type,
          durationMs: Date.now() - started,
        },
      });
    } catch (error) {
      if (error instanceof ToolNotFoundError) {
        res.status(404).json({ error: error.message });
      } else if (error instanceof ToolValidationError) {
        res.status(400).json({ error: error.message, details: { issues: error.issues } });
      } else {
        logger.error(`Tool '${name}' failed`, { error: errorMessage(error) });
        res.status(500).json({ error: errorMessage(error) });
      }
    }
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const failure = bodyParserFailure(error);
    if (res.headersSent) {
      logger.error(`${req.method} ${req.originalUrl} failed`, { error: errorMessage(error) });
      res.end();
      return;
    }
    if (failure?.parseFailed && req.path === STREAMABLE_HTTP_PATH) {
      res.status(400).json({
        jsonrpc: "2.0",
        error: { code: JSON_RPC_PARSE_ERROR, message: `Invalid JSON body: ${errorMessage(error)}` },
        id: null,
      });
      return;
    }
    if (failure?.parseFailed) {
      res.status(400).json({ error: `Invalid JSON body: ${errorMessage(error)}` });
      return;
    }
    if (failure && failure.status < 500) {
      res.status(failure.status).json({ error: errorMessage(error) });
      return;
    }
    logger.error(`${req.method} ${req.originalUrl} failed`, { error: errorMessage(error) });
    res.status(500).json({ error: "Internal server error" });
  });

  const server = http.createServer(app);

  return {
    app,
    server,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const transport of sessions.values()) {
          closeLogged("SSE session", transport.close());
        }
        sessions.clear();
        server.close((error) => {
          // Closing a server that never listened is not a failure here
          if (error && !("code" in error && error.code === "ERR_SERVER_NOT_RUNNING")) {
            reject(error);
            return;
          }
          resolve();
        });
        server.closeAllConnections();
      }),
  };
}

/**
 * Start listening. Port 0 picks a free port; the returned address has the real one.
 */
export function listen(app: HttpApp, host: string, port: number): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => reject(error);
    app.server.once("error", onError);
    app.server.listen(port, host, () => {
      app.server.off("error", onError);
      const address = app.server.address();
      if (address === null || typeof address === "string") {
        reject(new Error(`Server is not listening on a TCP port: ${String(address)}`));
        return;
      }
      resolve(address);
    });
  });
}
