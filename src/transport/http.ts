/**
 * Streamable HTTP transport.
 *
 * Session model:
 *  - A client sends a JSON-RPC `initialize` request to POST /mcp without an
 *    `mcp-session-id` header. A new transport + Server pair is created and the
 *    generated session id is returned in the response headers.
 *  - Later requests carry the same `mcp-session-id` and reuse that transport.
 *  - When the transport closes, the session is evicted from the map.
 *
 * Endpoints:
 *  - POST /mcp    : JSON-RPC requests (initial + subsequent).
 *  - GET  /mcp    : streaming channel for an existing session.
 *  - DELETE /mcp  : session teardown.
 *  - GET  /health : status snapshot (index size, watermark, last sync).
 *
 * Environment variables:
 *  MCP_PORT: Port to bind (default 3000)
 *  HOST: Interface to bind (default 127.0.0.1)
 *  ALLOWED_HOSTS: Comma-separated host[:port] whitelist; defaults to local-only.
 *  ENABLE_DNS_REBINDING_PROTECTION: Set to "false" to disable.
 */
import express from "express";
import type { Server as HttpServer } from "node:http";
import { randomUUID } from "node:crypto";
import { type Server, StreamableHTTPServerTransport, isInitializeRequest } from "../mcp-sdk";
import { statusManager } from "../status";

function jsonRpcError(res: express.Response, status: number, code: number, message: string) {
  res.status(status).json({ jsonrpc: "2.0", error: { code, message }, id: null });
}

export async function startHttpTransport(createServer: () => Server): Promise<HttpServer> {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const port = Number(process.env.MCP_PORT ?? 3000);
  const host = (process.env.HOST ?? "127.0.0.1").trim();
  const defaultAllowedHosts = Array.from(
    new Set([
      "127.0.0.1",
      `127.0.0.1:${port}`,
      "localhost",
      `localhost:${port}`,
      host,
      `${host}:${port}`,
    ]),
  );

  /** Active session transports keyed by session id. */
  const transports = new Map<string, StreamableHTTPServerTransport>();

  const openSession = async (): Promise<StreamableHTTPServerTransport> => {
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sid: string) => {
        transports.set(sid, transport);
      },
      enableDnsRebindingProtection:
        (process.env.ENABLE_DNS_REBINDING_PROTECTION ?? "true") !== "false",
      allowedHosts: (process.env.ALLOWED_HOSTS ?? defaultAllowedHosts.join(","))
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean),
    });

    const server = createServer();
    transport.onclose = () => {
      // server.close() closes the transport again; detach first so this runs once.
      transport.onclose = undefined;
      if (transport.sessionId) transports.delete(transport.sessionId);
      void server.close().catch((e) => console.error("[MCP] Failed to close session server:", e));
    };
    await server.connect(transport);
    return transport;
  };

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = req.header("mcp-session-id");
      let transport = sessionId ? transports.get(sessionId) : undefined;
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        transport = await openSession();
      }
      if (!transport) {
        jsonRpcError(res, 400, -32000, "Bad Request: No valid session ID provided");
        return;
      }
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[MCP] HTTP POST error:", err);
      if (!res.headersSent) jsonRpcError(res, 500, -32603, "Internal server error");
    }
  });

  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = req.header("mcp-session-id");
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      console.error(`[MCP] HTTP ${req.method} error:`, err);
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json(statusManager.getStatus());
  });

  return new Promise<HttpServer>((resolve) => {
    const listener = app.listen(port, host, () => {
      console.error(`[MCP] Streamable HTTP listening at http://${host}:${port}/mcp`);
      resolve(listener);
    });
  });
}
