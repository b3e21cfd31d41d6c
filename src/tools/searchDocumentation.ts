import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { CATEGORY_NAMES } from "../domain/taxonomy.js";
import type { Retriever } from "../services/retriever.js";

export function registerSearchDocumentationTool(server: McpServer, retriever: Retriever) {
  server.registerTool(
    "search_documentation",
    {
      title: "Search Documentation",
      description:
        "Retrieves the most relevant documentation chunks for a query, filtered by taxonomy category.",
      inputSchema: {
        query: z.string().min(2).describe("Search query"),
        categories: z
          .array(z.string())
          .optional()
          .describe(`Categories to search; inferred from the query when omitted. One of: ${CATEGORY_NAMES.join(", ")}`),
      },
    },
    async ({ query, categories }) => {
      const text = await retriever.retrieve(query, categories);
      return {
        content: [{ type: "text", text }],
      };
    },
  );
}
