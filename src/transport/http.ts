/**
 * Streamable HTTP transport.
 *
 * Each session owns its own MCP Server + transport pair; the pipeline behind
 * them is shared.
 *  - POST /mcp    without `mcp-session-id` and with an `initialize` body opens a session.
 *  - POST/GET/DELETE /mcp with a known `mcp-session-id` are delegated to that session.
 *  - GET /health  reports server status and index stats.
 *
 * Environment:
 *  MCP_PORT (default 3000), HOST (default 127.0.0.1),
 *  ALLOWED_HOSTS (comma list; defaults to local host names),
 *  ENABLE_DNS_REBINDING_PROTECTION ("false" disables).
 */
import express from "express";
import { randomUUID } from "node:crypto";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { serverLogger as log } from "../logger";
import type { StatusManager } from "../status";
import type { IndexStats } from "../types";

export interface HttpTransportOptions {
  createServer: () => Server;
  status: StatusManager;
  stats: () => IndexStats;
  port?: number;
  host?: string;
}

function sessionIdOf(req: express.Request): string | undefined {
  const header = req.headers["mcp-session-id"];
  return typeof header === "string" ? header : undefined;
}

export function allowedHosts(host: string, port: number, env = process.env.ALLOWED_HOSTS): string[] {
  if (env?.trim()) {
    return env
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean);
  }
  return [...new Set(["127.0.0.1", "localhost", host].flatMap((h) => [h, `${h}:${port}`]))];
}

/** Build the express app without binding a port. */
export function createHttpApp(opts: HttpTransportOptions & { port: number; host: string }) {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const transports = new Map<string, StreamableHTTPServerTransport>();
  const hosts = allowedHosts(opts.host, opts.port);
  const dnsRebindingProtection = (process.env.ENABLE_DNS_REBINDING_PROTECTION ?? "true") !== "false";

  app.post("/mcp", async (req, res) => {
    try {
      const sessionId = sessionIdOf(req);
      let transport = sessionId ? transports.get(sessionId) : undefined;

      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid) => {
            transports.set(sid, created);
          },
          enableDnsRebindingProtection: dnsRebindingProtection,
          allowedHosts: hosts,
        });
        const server = opts.createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) transports.delete(created.sessionId);
          // server.close() closes the transport again; detach first.
          created.onclose = undefined;
          server.close().catch((e: unknown) => log.warn({ err: e }, "Error closing MCP session"));
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
      log.error({ err }, "HTTP POST error");
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    await transport.handleRequest(req, res);
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json({ ...opts.status.getStatus(), index: opts.stats() });
  });

  return app;
}

/** Bind the HTTP app; resolves once listening. */
export async function startHttpTransport(opts: HttpTransportOptions): Promise<void> {
  const port = opts.port ?? Number(process.env.MCP_PORT ?? 3000);
  const host = (opts.host ?? process.env.HOST ?? "127.0.0.1").trim();
  const app = createHttpApp({ ...opts, port, host });
  await new Promise<void>((resolve) => {
    app.listen(port, host, () => {
      log.info({ url: `http://${host}:${port}/mcp` }, "Streamable HTTP listening");
      resolve();
    });
  });
}
