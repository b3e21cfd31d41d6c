import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { NotFoundError } from "../domain/errors.js";
import type { Orchestrator } from "../services/orchestrator.js";

export function registerAskQuestionTool(server: McpServer, orchestrator: Orchestrator) {
  server.registerTool(
    "ask_question",
    {
      title: "Ask Question",
      description:
        "Answers a seller question through the agent router, storing the turn in the user's session.",
      inputSchema: {
        telegram_id: z.number().int().describe("External (Telegram) user id"),
        session_id: z.number().int().describe("Conversation session id"),
        query: z.string().min(1).describe("User question"),
      },
    },
    async ({ telegram_id, session_id, query }) => {
      try {
        const result = await orchestrator.processMessage({
          telegramId: telegram_id,
          sessionId: session_id,
          query,
        });

        return {
          isError: result.failed,
          content: [
            {
              type: "text",
              text: JSON.stringify(
                {
                  response: result.response,
                  session_id: String(result.sessionId),
                  agent: result.agent,
                  total_tokens: result.totalTokens,
                  execution_time: Number(result.executionTime.toFixed(3)),
                },
                null,
                2,
              ),
            },
          ],
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
