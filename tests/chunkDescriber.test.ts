import { describe, expect, it } from "vitest";
import { ChunkDescriber, NO_SUMMARY } from "../src/services/chunkDescriber.js";
import { FakeLlmClient, systemPrompt } from "./support/fakes.js";

describe("ChunkDescriber", () => {
  it("uses the document title for the first chunk", async () => {
    const client = new FakeLlmClient({ complete: () => '{"summary": "Resumen corto"}' });

    const description = await new ChunkDescriber(client).describe("contenido", "Guía FBA", 0);

    expect(description).toEqual({ title: "Guía FBA", summary: "Resumen corto" });
    expect(client.completions).toHaveLength(1);
  });

  it("asks for a title for later chunks", async () => {
    const client = new FakeLlmClient({
      complete: (request) =>
        systemPrompt(request).includes("extracts titles")
          ? '{"title": "Costos de envío"}'
          : '{"summary": "Resumen"}',
    });

    await expect(new ChunkDescriber(client).describe("contenido", "Guía FBA", 2)).resolves.toEqual({
      title: "Costos de envío",
      summary: "Resumen",
    });
  });

  it("falls back to a numbered title and a placeholder summary", async () => {
    const description = await new ChunkDescriber(new FakeLlmClient()).describe("contenido", "Guía FBA", 1);

    expect(description).toEqual({ title: "Guía FBA (Part 2)", summary: NO_SUMMARY });
  });
});
