import { randomUUID } from "node:crypto";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { HyperliquidInfoClient } from "./client/client.js";
import type { HyperliquidNetwork } from "./client/types.js";
import { SERVER_INFO, TOOLS } from "./tools/definitions.js";
import { createInfoServer } from "./server.js";

export interface HttpAppOptions {
  client: HyperliquidInfoClient;
  network: HyperliquidNetwork;
  /**
   * Streamable HTTP sessions with no request for this long are closed.
   * Defaults to 30 minutes.
   */
  sessionIdleMs?: number;
}

interface HttpSession {
  transport: StreamableHTTPServerTransport;
  lastSeen: number;
}

const DEFAULT_SESSION_IDLE_MS = 30 * 60_000;

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

// ============================================================================
// EXPRESS SERVER (Standard MCP pattern)
//
// GET  /health               liveness probe
// GET  /sse, POST /messages  legacy SSE transport
// POST|GET|DELETE /mcp       Streamable HTTP transport
// ============================================================================

export function createHttpApp({
  client,
  network,
  sessionIdleMs = DEFAULT_SESSION_IDLE_MS,
}: HttpAppOptions): Express {
  const app = express();
  app.use(express.json());

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      server: SERVER_INFO.name,
      version: SERVER_INFO.version,
      network,
      tools: TOOLS.map((t) => t.name),
    });
  });

  // ==================== SSE ====================

  const sseTransports = new Map<string, SSEServerTransport>();

  app.get(
    "/sse",
    route(async (_req, res) => {
      const transport = new SSEServerTransport("/messages", res);
      sseTransports.set(transport.sessionId, transport);
      console.error(`SSE connection established: ${transport.sessionId}`);

      const server = createInfoServer(client);
      res.on("close", () => {
        console.error(`SSE connection closed: ${transport.sessionId}`);
        sseTransports.delete(transport.sessionId);
        server.close().catch((error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          console.error(`Failed to close SSE session ${transport.sessionId}: ${message}`);
        });
      });

      await server.connect(transport);
    })
  );

  app.post(
    "/messages",
    route(async (req, res) => {
      const sessionId = typeof req.query.sessionId === "string" ? req.query.sessionId : "";
      const transport = sseTransports.get(sessionId);

      if (!transport) {
        res.status(400).json({ error: "No transport found for sessionId" });
        return;
      }
      await transport.handlePostMessage(req, res, req.body);
    })
  );

  // ==================== STREAMABLE HTTP ====================

  const httpSessions = new Map<string, HttpSession>();

  const touch = (sessionId: string): StreamableHTTPServerTransport | undefined => {
    const session = httpSessions.get(sessionId);
    if (session) session.lastSeen = Date.now();
    return session?.transport;
  };

  // Clients may drop a session without sending DELETE
  const sweep = setInterval(() => {
    const cutoff = Date.now() - sessionIdleMs;
    for (const [id, session] of httpSessions) {
      if (session.lastSeen > cutoff) continue;
      console.error(`MCP session expired: ${id}`);
      httpSessions.delete(id);
      session.transport.close().catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`Failed to close MCP session ${id}: ${message}`);
      });
    }
  }, Math.min(sessionIdleMs, 60_000));
  sweep.unref();

  app.post(
    "/mcp",
    route(async (req, res) => {
      const sessionId = req.header("mcp-session-id");
      let transport = sessionId ? touch(sessionId) : undefined;

      if (!transport) {
        if (sessionId || !isInitializeRequest(req.body)) {
          res.status(400).json({ error: "Bad Request: No valid session" });
          return;
        }

        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (id) => {
            console.error(`MCP session initialized: ${id}`);
            httpSessions.set(id, { transport: created, lastSeen: Date.now() });
          },
        });
        created.onclose = () => {
          if (created.sessionId) {
            console.error(`MCP session closed: ${created.sessionId}`);
            httpSessions.delete(created.sessionId);
          }
        };
        await createInfoServer(client).connect(created);
        transport = created;
      }

      await transport.handleRequest(req, res, req.body);
    })
  );

  const handleSessionRequest = route(async (req, res) => {
    const sessionId = req.header("mcp-session-id");
    const transport = sessionId ? touch(sessionId) : undefined;
    if (!transport) {
      res.status(400).json({ error: "No transport found for session" });
      return;
    }
    await transport.handleRequest(req, res);
  });

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const message = error instanceof Error ? error.message : "Unknown error";
    console.error(`HTTP request failed: ${message}`);
    if (!res.headersSent) {
      res.status(500).json({ error: "Internal server error" });
    }
  });

  return app;
}
