import { createServer } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { createServices, type AppServices } from "./bootstrap.js";
import { loadConfig } from "./config/env.js";
import { describeError } from "./domain/errors.js";
import { handleApiRequest, InvalidJsonError, writeJson } from "./http/api.js";
import { McpSessionRouter } from "./http/mcpSessions.js";
import { registerAskQuestionTool } from "./tools/askQuestion.js";
import { registerBrowseDocumentationTools } from "./tools/browseDocumentation.js";
import { registerIngestNotionDatabaseTool } from "./tools/ingestNotionDatabase.js";
import { registerSearchDocumentationTool } from "./tools/searchDocumentation.js";
import { registerSummarizeSessionTool } from "./tools/summarizeSession.js";

const MCP_PATH = "/mcp";
const API_PATHS = new Set(["/message", "/health"]);

async function main() {
  const config = loadConfig();
  const { services, close } = await createServices(config);
  const shutdownTasks: Array<() => Promise<void>> = [close];

  if (config.transport === "http") {
    const stopHttpServer = await runHttpServer(config.host, config.port, services);
    shutdownTasks.unshift(stopHttpServer);
    console.error(
      `[server] Listening on http://${config.host}:${config.port} (POST /message, GET /health, ${MCP_PATH})`,
    );
  } else {
    await runStdioServer(createMcpServer(services));
  }

  const shutdown = async () => {
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      console.error(`[server] Shutdown failed: ${describeError(error)}`);
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

function createMcpServer(services: AppServices): McpServer {
  const server = new McpServer({
    name: "seller-assist-rag",
    version: "0.1.0",
  });

  registerAskQuestionTool(server, services.orchestrator);
  registerSearchDocumentationTool(server, services.retriever);
  registerBrowseDocumentationTools(server, services.retriever);
  registerSummarizeSessionTool(server, services.conversations);
  registerIngestNotionDatabaseTool(server, services.ingestor, services.documentSource);

  return server;
}

async function runStdioServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

async function runHttpServer(
  host: string,
  port: number,
  services: AppServices,
): Promise<() => Promise<void>> {
  const mcp = new McpSessionRouter(() => createMcpServer(services));

  const httpServer = createServer(async (req, res) => {
    try {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

      if (API_PATHS.has(url.pathname)) {
        await handleApiRequest(services.orchestrator, req, res, url.pathname);
        return;
      }

      if (url.pathname !== MCP_PATH) {
        writeJson(res, 404, { error: "Not found" });
        return;
      }

      await mcp.handle(req, res);
    } catch (error) {
      if (error instanceof InvalidJsonError && !res.headersSent) {
        writeJson(res, 400, { error: error.message });
        return;
      }
      console.error(`[server] Unhandled request error: ${describeError(error)}`);
      if (!res.headersSent) {
        writeJson(res, 500, { error: "Internal server error" });
      }
    }
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.listen(port, host, () => resolve());
    httpServer.once("error", reject);
  });

  return async () => {
    await mcp.closeAll();
    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  };
}

main().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
