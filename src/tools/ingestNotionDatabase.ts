import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { DocumentSource } from "../domain/document.js";
import type { DocumentIngestor } from "../services/documentIngestor.js";

export function registerIngestNotionDatabaseTool(
  server: McpServer,
  ingestor: DocumentIngestor,
  documentSource: DocumentSource | null,
) {
  server.registerTool(
    "ingest_notion_database",
    {
      title: "Ingest Notion Database",
      description:
        "Re-ingests every page of the configured Notion database, replacing existing chunks per page.",
      inputSchema: {},
    },
    async () => {
      if (!documentSource) {
        return {
          isError: true,
          content: [
            {
              type: "text",
              text: "NOTION_API_KEY and NOTION_DATABASE_ID must be set to ingest documents.",
            },
          ],
        };
      }

      const result = await ingestor.ingestAll(documentSource);
      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(
              {
                processed_count: result.processed,
                skipped_count: result.skipped,
                chunk_count: result.chunkCount,
                failed: result.failed,
              },
              null,
              2,
            ),
          },
        ],
      };
    },
  );
}
