import { describe, expect, it } from "vitest";
import { CATEGORY_NAMES } from "../src/domain/taxonomy.js";
import { Categorizer, DEFAULT_QUERY_CATEGORIES } from "../src/services/categorizer.js";
import { FakeLlmClient, lastUserMessage } from "./support/fakes.js";

describe("Categorizer", () => {
  it("keeps only taxonomy labels, without duplicates", async () => {
    const client = new FakeLlmClient({
      complete: () =>
        JSON.stringify({
          categories: ["Logística", "Made up", "logística", "Logística", "UNCATEGORIZED", 7],
        }),
    });

    await expect(new Categorizer(client).categorize("texto")).resolves.toEqual([
      "Logística",
      "uncategorized",
    ]);
    expect(client.completions[0].json).toBe(true);
    expect(client.completions[0].temperature).toBe(0);
  });

  it("returns uncategorized for empty, malformed or failed answers", async () => {
    const empty = new Categorizer(new FakeLlmClient({ complete: () => '{"categories": ["Nope"]}' }));
    const malformed = new Categorizer(new FakeLlmClient({ complete: () => "not json" }));
    const failed = new Categorizer(new FakeLlmClient());

    await expect(empty.categorize("x")).resolves.toEqual(["uncategorized"]);
    await expect(malformed.categorize("x")).resolves.toEqual(["uncategorized"]);
    await expect(failed.categorize("x")).resolves.toEqual(["uncategorized"]);
  });

  it("sends at most the first 2000 characters of the text", async () => {
    const client = new FakeLlmClient({ complete: () => '{"categories": ["Logística"]}' });

    await new Categorizer(client).categorize("z".repeat(5000));

    expect(lastUserMessage(client.completions[0])).toBe(`Contenido a categorizar:\n${"z".repeat(2000)}`);
  });

  it("never returns a label outside the taxonomy", async () => {
    const answers = [
      ["Marketing y Publicidad", "Otra cosa"],
      ["", " ", null],
      ["Finanzas y Costos", "Finanzas y Costos "],
    ];
    for (const categories of answers) {
      const categorizer = new Categorizer(
        new FakeLlmClient({ complete: () => JSON.stringify({ categories }) }),
      );
      const result = await categorizer.categorize("texto");
      expect(result.length).toBeGreaterThan(0);
      expect(result.every((label) => label === "uncategorized" || CATEGORY_NAMES.includes(label))).toBe(true);
    }
  });

  it("infers at most three query categories and drops uncategorized", async () => {
    const client = new FakeLlmClient({
      complete: () =>
        JSON.stringify({
          categories: [
            "uncategorized",
            "Logística",
            "Regulaciones y Aduanas",
            "Amazon FBA y FBM",
            "Finanzas y Costos",
          ],
        }),
    });

    await expect(new Categorizer(client).inferQueryCategories("¿Cómo envío a USA?")).resolves.toEqual([
      "Logística",
      "Regulaciones y Aduanas",
      "Amazon FBA y FBM",
    ]);
  });

  it("falls back to the default query categories", async () => {
    const unusable = new Categorizer(new FakeLlmClient({ complete: () => '{"categories": []}' }));
    const failed = new Categorizer(new FakeLlmClient());

    await expect(unusable.inferQueryCategories("q")).resolves.toEqual([...DEFAULT_QUERY_CATEGORIES]);
    await expect(failed.inferQueryCategories("q")).resolves.toEqual(["Logística", "Amazon FBA y FBM"]);
  });
});
