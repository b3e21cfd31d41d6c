import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { Retriever } from "../services/retriever.js";

export function registerBrowseDocumentationTools(server: McpServer, retriever: Retriever) {
  server.registerTool(
    "list_documentation_pages",
    {
      title: "List Documentation Pages",
      description: "Lists ingested documentation pages grouped by category.",
      inputSchema: {
        category: z.string().optional().describe("Only pages tagged with this category"),
      },
    },
    async ({ category }) => ({
      content: [{ type: "text", text: await retriever.listDocumentationPages(category) }],
    }),
  );

  server.registerTool(
    "get_page_content",
    {
      title: "Get Page Content",
      description: "Returns every chunk of one documentation page in order.",
      inputSchema: {
        url: z.string().min(1).describe("Page url, e.g. notion://<id>"),
      },
    },
    async ({ url }) => ({
      content: [{ type: "text", text: await retriever.getPageContent(url) }],
    }),
  );

  server.registerTool(
    "get_quick_overview",
    {
      title: "Get Quick Overview",
      description: "Summaries of the newest chunks that mention a topic.",
      inputSchema: {
        topic: z.string().min(2).describe("Topic or keyword"),
      },
    },
    async ({ topic }) => ({
      content: [{ type: "text", text: await retriever.getQuickOverview(topic) }],
    }),
  );
}
