import { z } from "zod";
import type { CompletionRequest, LlmClient } from "./types.js";

export interface StructuredCompletion<T> {
  value: T;
  totalTokens: number;
}

export async function completeJson<T>(
  client: LlmClient,
  request: Omit<CompletionRequest, "json">,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<StructuredCompletion<T>> {
  const result = await client.complete({ ...request, json: true });
  const raw: unknown = JSON.parse(stripCodeFence(result.text));
  return { value: schema.parse(raw), totalTokens: result.totalTokens };
}

function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  return fenced ? fenced[1] : trimmed;
}
