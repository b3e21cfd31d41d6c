import { z } from "zod";
import type { ConversationRepository } from "../domain/conversationRepository.js";
import { describeError } from "../domain/errors.js";
import type {
  ChatMessage,
  ConversationContext,
  ConversationTurn,
  JsonMap,
} from "../domain/types.js";
import { completeJson } from "../infra/ai/structured.js";
import type { LlmClient } from "../infra/ai/types.js";
import { IdentityCache } from "./identityCache.js";

export const DEFAULT_HISTORY_LIMIT = 5;
export const DEFAULT_SUMMARY_TURNS = 10;
export const NO_CONVERSATIONS_TO_SUMMARIZE = "No conversations to summarize.";
export const SESSION_SUMMARY_FAILED = "Sorry, the session summary could not be generated.";

const analysisSchema = z.object({
  sentiment: z.string().default(""),
  summary: z.string().default(""),
  topics: z.array(z.string()).default([]),
  entities: z.array(z.unknown()).default([]),
  intent: z.string().default(""),
});

export type TurnAnalysis = z.infer<typeof analysisSchema>;

export interface SaveTurnInput {
  externalId: number;
  sessionId: number;
  question: string;
  answer: string;
  totalTokens?: number;
  executionTime?: number;
  metadata?: JsonMap;
}

export interface ConversationServiceOptions {
  repository: ConversationRepository;
  client: LlmClient;
  analysisModel?: string;
  now?: () => Date;
}

export class ConversationService {
  private readonly identities: IdentityCache;

  private readonly now: () => Date;

  constructor(private readonly options: ConversationServiceOptions) {
    this.identities = new IdentityCache(options.repository);
    this.now = options.now ?? (() => new Date());
  }

  /** Throws `NotFoundError` when the external id has no account. */
  async save(input: SaveTurnInput): Promise<ConversationTurn> {
    const userId = await this.identities.resolve(input.externalId);
    return this.options.repository.appendTurn({
      userId,
      sessionId: input.sessionId,
      question: input.question,
      answer: input.answer,
      totalTokens: input.totalTokens ?? 0,
      executionTime: input.executionTime ?? 0,
      metadata: input.metadata,
    });
  }

  /** Newest first. */
  async recent(
    externalId: number,
    sessionId: number,
    limit = DEFAULT_HISTORY_LIMIT,
  ): Promise<ConversationTurn[]> {
    const userId = await this.identities.resolve(externalId);
    return this.options.repository.listRecent(userId, sessionId, limit);
  }

  async context(
    externalId: number,
    sessionId: number,
    limit = DEFAULT_HISTORY_LIMIT,
  ): Promise<ConversationContext> {
    const turns = await this.recent(externalId, sessionId, limit);
    const messages = toChatMessages(turns);

    const metadata: JsonMap = {};
    for (const turn of [...turns].sort(bySequence)) {
      Object.assign(metadata, turn.metadata);
    }

    return { messages, hasHistory: messages.length > 0, metadata };
  }

  async getById(id: string): Promise<ConversationTurn | null> {
    return this.options.repository.findById(id);
  }

  /**
   * Enriches a stored turn with sentiment, summary, topics, entities and
   * intent. Never throws; failures are logged and yield null.
   */
  async analyze(turnId: string): Promise<ConversationTurn | null> {
    try {
      const turn = await this.options.repository.findById(turnId);
      if (!turn) {
        console.warn(`[conversations] Turn ${turnId} not found for analysis.`);
        return null;
      }

      const analysis = await this.requestAnalysis(turn);
      return await this.options.repository.updateAnalysis(turnId, {
        sentiment: analysis.sentiment,
        summary: analysis.summary,
        topics: analysis.topics,
        metadata: {
          ...turn.metadata,
          analysis_timestamp: this.now().toISOString(),
          entities: analysis.entities,
          intent: analysis.intent,
        },
      });
    } catch (error) {
      console.error(`[conversations] Error analyzing turn ${turnId}: ${describeError(error)}`);
      return null;
    }
  }

  async summarizeSession(
    externalId: number,
    sessionId: number,
    maxTurns = DEFAULT_SUMMARY_TURNS,
  ): Promise<string> {
    try {
      const turns = await this.recent(externalId, sessionId, maxTurns);
      if (turns.length === 0) {
        return NO_CONVERSATIONS_TO_SUMMARIZE;
      }

      const transcript = [...turns]
        .sort(bySequence)
        .map((turn) => `Usuario: ${turn.question}\nAsistente: ${turn.answer}`)
        .join("\n\n");

      const result = await this.options.client.complete({
        model: this.options.analysisModel,
        temperature: 0.5,
        maxTokens: 250,
        messages: [
          {
            role: "system",
            content: "Eres un asistente especializado en resumir conversaciones.",
          },
          {
            role: "user",
            content: [
              "A continuación se muestra una conversación entre un usuario y un asistente.",
              "Genera un resumen conciso pero informativo de toda la conversación,",
              "destacando los puntos principales, las preguntas clave del usuario y las soluciones proporcionadas.",
              "",
              "Conversación:",
              transcript,
              "",
              "Resumen:",
            ].join("\n"),
          },
        ],
      });
      return result.text.trim();
    } catch (error) {
      console.error(
        `[conversations] Error summarizing session ${sessionId}: ${describeError(error)}`,
      );
      return SESSION_SUMMARY_FAILED;
    }
  }

  private async requestAnalysis(turn: ConversationTurn): Promise<TurnAnalysis> {
    const { value } = await completeJson(
      this.options.client,
      {
        model: this.options.analysisModel,
        temperature: 0.3,
        messages: [
          {
            role: "system",
            content: "Eres un asistente especializado en análisis de conversaciones.",
          },
          {
            role: "user",
            content: [
              "Analiza la siguiente conversación entre un usuario y un asistente:",
              "",
              `Usuario: ${turn.question}`,
              "",
              `Asistente: ${turn.answer}`,
              "",
              "Devuelve un objeto JSON con estas claves:",
              "1. sentiment: el sentimiento general del usuario (positivo, negativo o neutral)",
              "2. summary: un breve resumen de la conversación (máximo 100 caracteres)",
              "3. topics: una lista de hasta 3 temas principales",
              "4. entities: una lista de entidades mencionadas (productos, lugares, personas, etc.)",
              "5. intent: la intención principal del usuario (consulta, queja, solicitud, etc.)",
            ].join("\n"),
          },
        ],
      },
      analysisSchema,
    );
    return value;
  }
}

/** Ascending by sequence; empty questions or answers are skipped. */
export function toChatMessages(turns: readonly ConversationTurn[]): ChatMessage[] {
  const messages: ChatMessage[] = [];
  for (const turn of [...turns].sort(bySequence)) {
    if (turn.question) {
      messages.push({ role: "user", content: turn.question });
    }
    if (turn.answer) {
      messages.push({ role: "assistant", content: turn.answer });
    }
  }
  return messages;
}

function bySequence(a: ConversationTurn, b: ConversationTurn): number {
  return a.messageSequence - b.messageSequence;
}
