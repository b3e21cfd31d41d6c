import type { ChatMessage } from "../../domain/types.js";

export interface CompletionRequest {
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Ask the service for a single well-formed JSON object. */
  json?: boolean;
  model?: string;
}

export interface CompletionResult {
  text: string;
  totalTokens: number;
}

export interface LlmClient {
  complete(request: CompletionRequest): Promise<CompletionResult>;
  embed(text: string): Promise<number[]>;
}
