/**
 * Streamable HTTP transport.
 *
 *  POST   /mcp     JSON-RPC. A request without `mcp-session-id` must be
 *                  `initialize`; it opens a session whose id comes back in
 *                  the response header.
 *  GET    /mcp     server-to-client stream for an open session.
 *  DELETE /mcp     closes a session.
 *  GET    /health  `statusManager` snapshot.
 *
 * Each session gets its own `Server` from the factory; the services behind
 * it are shared.
 */
import express from "express";
import { randomUUID } from "node:crypto";
import type { Config } from "../config";
import { isInitializeRequest, type Server, StreamableHTTPServerTransport } from "../mcp-sdk";
import { statusManager } from "../status";

export type HttpOptions = Pick<Config, "MCP_PORT" | "HOST" | "ALLOWED_HOSTS" | "DNS_REBINDING_PROTECTION">;

/** Loopback names plus the bind host, each with and without the port. */
export function defaultAllowedHosts(host: string, port: number): string[] {
  const names = new Set(["127.0.0.1", "localhost", host]);
  return [...names].flatMap((name) => [name, `${name}:${port}`]);
}

function sessionIdOf(req: express.Request): string | undefined {
  const raw = req.headers["mcp-session-id"];
  return typeof raw === "string" && raw ? raw : undefined;
}

function jsonRpcError(res: express.Response, status: number, code: number, message: string) {
  res.status(status).json({ jsonrpc: "2.0", error: { code, message }, id: null });
}

export async function startHttpTransport(createServer: () => Server, opts: HttpOptions): Promise<void> {
  const allowedHosts = opts.ALLOWED_HOSTS.length
    ? opts.ALLOWED_HOSTS
    : defaultAllowedHosts(opts.HOST, opts.MCP_PORT);
  const sessions = new Map<string, StreamableHTTPServerTransport>();

  async function openSession(): Promise<StreamableHTTPServerTransport> {
    const server = createServer();
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: randomUUID,
      onsessioninitialized: (sid: string) => {
        sessions.set(sid, transport);
        console.error(`[RAG] Session opened ${sid}`);
      },
      enableDnsRebindingProtection: opts.DNS_REBINDING_PROTECTION,
      allowedHosts,
    });
    let closed = false;
    transport.onclose = () => {
      // server.close() closes the transport again
      if (closed) return;
      closed = true;
      if (transport.sessionId) sessions.delete(transport.sessionId);
      server.close().catch((e: unknown) => console.error("[RAG] Error closing session:", e));
    };
    await server.connect(transport);
    return transport;
  }

  const app = express();
  app.use(express.json({ limit: "2mb" }));

  app.post("/mcp", async (req, res) => {
    try {
      const sid = sessionIdOf(req);
      let transport = sid ? sessions.get(sid) : undefined;
      if (!transport && !sid && isInitializeRequest(req.body)) transport = await openSession();
      if (!transport) {
        jsonRpcError(res, 400, -32000, "Bad Request: No valid session ID provided");
        return;
      }
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[RAG] POST /mcp failed:", err);
      if (!res.headersSent) jsonRpcError(res, 500, -32603, "Internal server error");
    }
  });

  const forwardToSession = async (req: express.Request, res: express.Response) => {
    const sid = sessionIdOf(req);
    const transport = sid ? sessions.get(sid) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      console.error(`[RAG] ${req.method} /mcp failed:`, err);
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };
  app.get("/mcp", forwardToSession);
  app.delete("/mcp", forwardToSession);

  app.get("/health", (_req, res) => {
    res.json(statusManager.getStatus());
  });

  await new Promise<void>((resolve) => {
    app.listen(opts.MCP_PORT, opts.HOST, () => {
      console.error(`[RAG] MCP server listening at http://${opts.HOST}:${opts.MCP_PORT}/mcp`);
      resolve();
    });
  });
}
