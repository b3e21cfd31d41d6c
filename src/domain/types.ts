export type JsonMap = Record<string, unknown>;

export interface ChunkRecord {
  url: string;
  chunkNumber: number;
  title: string;
  summary: string;
  content: string;
  marketplace: string;
  category: string[];
  sourceName: string[];
  metadata: JsonMap;
  embedding: number[];
  createdAt?: string;
}

export interface ScoredChunk {
  chunk: ChunkRecord;
  similarity: number;
}

export interface ConversationTurn {
  id: string;
  userId: string;
  sessionId: number;
  question: string;
  answer: string;
  messageSequence: number;
  totalTokens: number;
  executionTime: number;
  metadata: JsonMap;
  sentiment: string | null;
  summary: string | null;
  topics: string[] | null;
  createdAt: string;
}

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ConversationContext {
  messages: ChatMessage[];
  hasHistory: boolean;
  metadata: JsonMap;
}
