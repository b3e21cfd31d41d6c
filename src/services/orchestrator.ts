import type { AgentRouter } from "../agents/agentRouter.js";
import type { SpecialistKind } from "../agents/types.js";
import { describeError, NotFoundError } from "../domain/errors.js";
import { DEFAULT_HISTORY_LIMIT, type ConversationService } from "./conversationService.js";

export const APOLOGY_MESSAGE = "Lo siento, ocurrió un error al procesar tu mensaje.";

export interface IncomingMessage {
  telegramId: number;
  sessionId: number;
  query: string;
}

export interface OrchestratorReply {
  response: string;
  sessionId: number;
  agent: SpecialistKind | null;
  totalTokens: number;
  /** Seconds. */
  executionTime: number;
  failed: boolean;
}

export interface OrchestratorOptions {
  conversations: ConversationService;
  router: AgentRouter;
  historyLimit?: number;
}

export class Orchestrator {
  private readonly backgroundTasks = new Set<Promise<void>>();

  constructor(private readonly options: OrchestratorOptions) {}

  /** Throws `NotFoundError` for an unknown identity; other failures become an apology. */
  async processMessage(message: IncomingMessage): Promise<OrchestratorReply> {
    const startedAt = performance.now();
    const context = await this.options.conversations.context(
      message.telegramId,
      message.sessionId,
      this.options.historyLimit ?? DEFAULT_HISTORY_LIMIT,
    );

    try {
      let executionTime = 0;
      const reply = await this.options.router.handle(
        message.telegramId,
        message.query,
        context.messages,
        async (routed) => {
          executionTime = (performance.now() - startedAt) / 1000;
          const turn = await this.options.conversations.save({
            externalId: message.telegramId,
            sessionId: message.sessionId,
            question: message.query,
            answer: routed.output,
            totalTokens: routed.totalTokens,
            executionTime,
            metadata: { agent_used: routed.agent, had_handoff: routed.handoff },
          });
          this.analyzeInBackground(turn.id);
        },
      );

      return {
        response: reply.output,
        sessionId: message.sessionId,
        agent: reply.agent,
        totalTokens: reply.totalTokens,
        executionTime,
        failed: false,
      };
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw error;
      }
      console.error(`[orchestrator] Error processing message: ${describeError(error)}`);
      return {
        response: APOLOGY_MESSAGE,
        sessionId: message.sessionId,
        agent: null,
        totalTokens: 0,
        executionTime: (performance.now() - startedAt) / 1000,
        failed: true,
      };
    }
  }

  /** Resolves once every background analysis started so far has settled. */
  async drain(): Promise<void> {
    await Promise.all([...this.backgroundTasks]);
  }

  private analyzeInBackground(turnId: string): void {
    const task = this.options.conversations
      .analyze(turnId)
      .then(() => undefined)
      .catch((error: unknown) => {
        console.error(`[orchestrator] Background analysis failed for ${turnId}: ${describeError(error)}`);
      })
      .finally(() => {
        this.backgroundTasks.delete(task);
      });
    this.backgroundTasks.add(task);
  }
}
