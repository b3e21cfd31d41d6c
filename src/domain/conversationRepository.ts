import type { ConversationTurn, JsonMap } from "./types.js";

export interface NewTurnInput {
  userId: string;
  sessionId: number;
  question: string;
  answer: string;
  totalTokens: number;
  executionTime: number;
  metadata?: JsonMap;
}

export interface TurnAnalysisUpdate {
  sentiment: string;
  summary: string;
  topics: string[];
  metadata: JsonMap;
}

export interface ConversationRepository {
  /** Internal user id for an external platform id, or null when no account exists. */
  findUserIdByExternalId(externalId: number): Promise<string | null>;
  /**
   * Inserts the turn with `message_sequence = max + 1` for its
   * (user, session). Implementations make the read and the insert atomic.
   */
  appendTurn(input: NewTurnInput): Promise<ConversationTurn>;
  /** Newest first. */
  listRecent(userId: string, sessionId: number, limit: number): Promise<ConversationTurn[]>;
  findById(id: string): Promise<ConversationTurn | null>;
  updateAnalysis(id: string, update: TurnAnalysisUpdate): Promise<ConversationTurn | null>;
}
