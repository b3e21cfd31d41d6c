import { z } from "zod";
import { ExternalServiceError } from "../../domain/errors.js";
import type { CompletionRequest, CompletionResult, LlmClient } from "./types.js";

interface OpenAiClientOptions {
  apiKey: string;
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  vectorDimension: number;
  timeoutMs: number;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number(),
    }),
  ),
});

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
    }),
  ),
  usage: z
    .object({
      total_tokens: z.number(),
    })
    .optional(),
});

export class OpenAiClient implements LlmClient {
  constructor(private readonly options: OpenAiClientOptions) {}

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedTexts([text]);
    if (!embedding || embedding.length !== this.options.vectorDimension) {
      throw new ExternalServiceError(
        "OpenAI embeddings",
        null,
        `expected ${this.options.vectorDimension} dimensions, got ${embedding?.length ?? 0}`,
      );
    }
    return embedding;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const data = embeddingResponseSchema.parse(
      await this.post("OpenAI embeddings", "/embeddings", {
        model: this.options.embeddingModel,
        input: texts,
      }),
    );
    return data.data
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const data = chatResponseSchema.parse(
      await this.post("OpenAI chat", "/chat/completions", {
        model: request.model ?? this.options.chatModel,
        messages: request.messages,
        ...(request.temperature === undefined ? {} : { temperature: request.temperature }),
        ...(request.maxTokens === undefined ? {} : { max_tokens: request.maxTokens }),
        ...(request.json ? { response_format: { type: "json_object" } } : {}),
      }),
    );

    return {
      text: data.choices[0]?.message.content?.trim() ?? "",
      totalTokens: data.usage?.total_tokens ?? 0,
    };
  }

  private async post(service: string, path: string, body: unknown): Promise<unknown> {
    const response = await fetch(`${this.options.baseUrl}${path}`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.options.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      throw new ExternalServiceError(service, response.status, await response.text());
    }

    return response.json();
  }
}
