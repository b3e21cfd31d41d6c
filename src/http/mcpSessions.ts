import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { describeError } from "../domain/errors.js";
import { readJsonBody, writeJson } from "./api.js";

interface SessionEntry {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

/**
 * Streamable HTTP sessions for the MCP endpoint. POST carries JSON-RPC
 * messages and opens a session on `initialize`; GET opens the session's
 * event stream and DELETE ends it.
 */
export class McpSessionRouter {
  private readonly sessions = new Map<string, SessionEntry>();

  constructor(private readonly createServer: () => McpServer) {}

  get openSessions(): number {
    return this.sessions.size;
  }

  async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    switch (req.method) {
      case "POST":
        await this.handlePost(req, res, await readJsonBody(req));
        return;
      case "GET":
      case "DELETE":
        await this.handleExisting(req, res);
        return;
      default:
        writeJson(res, 405, { error: "Method not allowed" });
    }
  }

  async closeAll(): Promise<void> {
    const entries = [...this.sessions.values()];
    this.sessions.clear();
    for (const entry of entries) {
      await entry.transport.close();
      await entry.server.close();
    }
  }

  private async handlePost(req: IncomingMessage, res: ServerResponse, body: unknown): Promise<void> {
    const sessionId = sessionIdOf(req);
    if (sessionId) {
      const entry = this.sessions.get(sessionId);
      if (!entry) {
        writeRpcError(res, 404, -32001, "Session not found");
        return;
      }
      await entry.transport.handleRequest(req, res, body);
      return;
    }

    if (!isInitializeRequest(body)) {
      writeRpcError(res, 400, -32000, "Initialize request is required when session is not established");
      return;
    }

    const server = this.createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (newSessionId) => {
        this.sessions.set(newSessionId, { server, transport });
      },
    });
    transport.onclose = () => this.forget(transport.sessionId);

    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  }

  private async handleExisting(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const sessionId = sessionIdOf(req);
    const entry = sessionId ? this.sessions.get(sessionId) : undefined;
    if (!entry) {
      res.writeHead(400, { "Content-Type": "text/plain" });
      res.end("Missing or invalid mcp-session-id");
      return;
    }
    await entry.transport.handleRequest(req, res);
  }

  private forget(sessionId: string | undefined): void {
    const entry = sessionId ? this.sessions.get(sessionId) : undefined;
    if (!sessionId || !entry) {
      return;
    }
    this.sessions.delete(sessionId);
    entry.server.close().catch((error: unknown) => {
      console.error(`[mcp] Error closing session ${sessionId}: ${describeError(error)}`);
    });
  }
}

function sessionIdOf(req: IncomingMessage): string | null {
  const header = req.headers["mcp-session-id"];
  if (!header) {
    return null;
  }
  return Array.isArray(header) ? header[0] : header;
}

function writeRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  writeJson(res, status, { jsonrpc: "2.0", error: { code, message }, id: null });
}
