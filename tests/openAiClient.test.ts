import { afterEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { ExternalServiceError } from "../src/domain/errors.js";
import { OpenAiClient } from "../src/infra/ai/openAiClient.js";
import { completeJson } from "../src/infra/ai/structured.js";
import { stubFetch } from "./support/fetchStub.js";
import { FakeLlmClient } from "./support/fakes.js";

function createClient() {
  return new OpenAiClient({
    apiKey: "test-key",
    baseUrl: "https://llm.test/v1",
    chatModel: "chat-model",
    embeddingModel: "embedding-model",
    vectorDimension: 3,
    timeoutMs: 1000,
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("OpenAiClient", () => {
  it("sends chat requests and reads the reply and token usage", async () => {
    const requests = stubFetch([
      {
        body: {
          choices: [{ message: { content: '  {"agent": "general"}\n' } }],
          usage: { total_tokens: 57 },
        },
      },
    ]);

    const result = await createClient().complete({
      messages: [{ role: "user", content: "hola" }],
      temperature: 0,
      maxTokens: 100,
      json: true,
    });

    expect(result).toEqual({ text: '{"agent": "general"}', totalTokens: 57 });
    expect(requests[0]).toMatchObject({
      url: "https://llm.test/v1/chat/completions",
      method: "POST",
      body: {
        model: "chat-model",
        messages: [{ role: "user", content: "hola" }],
        temperature: 0,
        max_tokens: 100,
        response_format: { type: "json_object" },
      },
    });
    expect(requests[0].headers.get("Authorization")).toBe("Bearer test-key");
  });

  it("omits optional chat settings and honours a model override", async () => {
    const requests = stubFetch([{ body: { choices: [{ message: { content: null } }] } }]);

    const result = await createClient().complete({
      model: "analysis-model",
      messages: [{ role: "user", content: "hola" }],
    });

    expect(result).toEqual({ text: "", totalTokens: 0 });
    expect(requests[0].body).toEqual({
      model: "analysis-model",
      messages: [{ role: "user", content: "hola" }],
    });
  });

  it("returns embeddings in input order", async () => {
    const requests = stubFetch([
      {
        body: {
          data: [
            { index: 1, embedding: [0, 1, 0] },
            { index: 0, embedding: [1, 0, 0] },
          ],
        },
      },
    ]);

    const embeddings = await createClient().embedTexts(["a", "b"]);

    expect(embeddings).toEqual([
      [1, 0, 0],
      [0, 1, 0],
    ]);
    expect(requests[0].body).toEqual({ model: "embedding-model", input: ["a", "b"] });
  });

  it("rejects an embedding of the wrong size", async () => {
    stubFetch([{ body: { data: [{ index: 0, embedding: [1, 0] }] } }]);

    await expect(createClient().embed("hola")).rejects.toThrow(
      "OpenAI embeddings failed: expected 3 dimensions, got 2",
    );
  });

  it("raises a service error on a failed response", async () => {
    stubFetch([{ status: 429, body: "rate limited" }]);

    const completion = createClient().complete({ messages: [{ role: "user", content: "hola" }] });

    await expect(completion).rejects.toBeInstanceOf(ExternalServiceError);
    await expect(completion).rejects.toThrow("OpenAI chat failed (429): rate limited");
  });
});

describe("completeJson", () => {
  it("asks for JSON and unwraps a fenced reply", async () => {
    const client = new FakeLlmClient({ complete: () => '```json\n{"count": 2}\n```' });

    const result = await completeJson(
      client,
      { messages: [{ role: "user", content: "¿cuántos?" }] },
      z.object({ count: z.number() }),
    );

    expect(result).toEqual({ value: { count: 2 }, totalTokens: 10 });
    expect(client.completions[0].json).toBe(true);
  });

  it("rejects a reply that does not match the schema", async () => {
    const client = new FakeLlmClient({ complete: () => '{"count": "two"}' });

    await expect(
      completeJson(client, { messages: [] }, z.object({ count: z.number() })),
    ).rejects.toBeInstanceOf(z.ZodError);
  });
});
