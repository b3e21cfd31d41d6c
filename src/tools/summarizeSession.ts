import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { NotFoundError } from "../domain/errors.js";
import type { ConversationService } from "../services/conversationService.js";

export function registerSummarizeSessionTool(
  server: McpServer,
  conversations: ConversationService,
) {
  server.registerTool(
    "summarize_session",
    {
      title: "Summarize Session",
      description: "Summarizes the latest turns of a user's conversation session.",
      inputSchema: {
        telegram_id: z.number().int().describe("External (Telegram) user id"),
        session_id: z.number().int().describe("Conversation session id"),
        max_turns: z.number().int().min(1).max(50).optional().describe("Turns to include"),
      },
    },
    async ({ telegram_id, session_id, max_turns }) => {
      try {
        const summary = await conversations.summarizeSession(telegram_id, session_id, max_turns);
        return {
          content: [{ type: "text", text: summary }],
        };
      } catch (error) {
        if (!(error instanceof NotFoundError)) {
          throw error;
        }
        return {
          isError: true,
          content: [{ type: "text", text: error.message }],
        };
      }
    },
  );
}
