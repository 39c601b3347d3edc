/**
 * HTTP transport bootstrap.
 *
 * Starts an Express application wired to the MCP SDK's
 * `StreamableHTTPServerTransport`, one transport + server pair per session.
 *
 * Session model:
 *  - A client begins by sending a JSON-RPC `initialize` request to POST /mcp
 *    WITHOUT an `mcp-session-id` header; a new transport + server pair is
 *    created and the SDK returns the generated session id in a header.
 *  - Every later request for that session carries the same `mcp-session-id`.
 *  - When the transport or server closes, the session is evicted.
 *
 * Endpoints:
 *  - POST /mcp    : JSON-RPC requests (initial + subsequent).
 *  - GET  /mcp    : Streaming channel for an existing session.
 *  - DELETE /mcp  : Session teardown.
 *  - GET  /health : Indexing / readiness status from the {@link StatusManager}.
 *
 * Security defaults: DNS rebinding protection is on unless
 * `ENABLE_DNS_REBINDING_PROTECTION=false`; allowed hosts default to the
 * loopback names and the bound host/port unless `ALLOWED_HOSTS` overrides them.
 */
import express from "express";
import { randomUUID } from "node:crypto";
import { isInitializeRequest, StreamableHTTPServerTransport, type Server } from "../mcp-sdk";
import type { StatusManager } from "../status";

export interface HttpTransportOptions {
  port: number;
  host: string;
  status: StatusManager;
}

/**
 * Bootstraps the Express HTTP server & per-session MCP transport layer.
 *
 * @param createServer Factory producing a new, unconnected MCP `Server` for each session.
 * @returns Resolves once the HTTP listener is bound.
 */
export async function startHttpTransport(createServer: () => Server, opts: HttpTransportOptions) {
  const { port, host, status } = opts;
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const defaultAllowedHosts = Array.from(
    new Set<string>([
      "127.0.0.1",
      `127.0.0.1:${port}`,
      "localhost",
      `localhost:${port}`,
      host,
      `${host}:${port}`,
    ]),
  );

  /** Active session transports mapped by session id. */
  const transports: Record<string, StreamableHTTPServerTransport> = {};

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = req.header("mcp-session-id");
      let transport: StreamableHTTPServerTransport | undefined = sessionId
        ? transports[sessionId]
        : undefined;

      // Session creation: only without a session header AND for an initialize request.
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports[sid] = created;
          },
          enableDnsRebindingProtection:
            (process.env.ENABLE_DNS_REBINDING_PROTECTION ?? "true") !== "false",
          allowedHosts: (process.env.ALLOWED_HOSTS ?? defaultAllowedHosts.join(","))
            .split(",")
            .map((s) => s.trim())
            .filter(Boolean),
        });

        const server = createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) delete transports[created.sessionId];
          // server.close() closes the transport again, which would re-enter onclose.
          created.onclose = undefined;
          server.close().catch((e: unknown) => console.error("[RAG] Failed to close session:", e));
        };
        await server.connect(created);
        transport = created;
      }

      if (!transport) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[RAG] HTTP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  /**
   * Shared handler for GET /mcp and DELETE /mcp, valid only for an existing
   * session; 400 if the session id is missing or unknown.
   */
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = req.header("mcp-session-id");
    const transport = sessionId ? transports[sessionId] : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    await transport.handleRequest(req, res);
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json(status.getStatus());
  });

  await new Promise<void>((resolve, reject) => {
    const listener = app.listen(port, host, (error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      console.error(`[RAG] Streamable HTTP listening at http://${host}:${port}/mcp`);
      resolve();
    });
    listener.once("error", reject);
  });
}
