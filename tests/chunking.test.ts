import { describe, expect, it } from "vitest";
import { chunkText } from "../src/pipelines/chunking.js";

function paragraphs(lengths: number[]): string {
  return lengths.map((length, index) => String.fromCharCode(97 + index).repeat(length)).join("\n\n");
}

describe("chunkText", () => {
  it("splits a 12,000 character document into three chunks at paragraph breaks", () => {
    const text = paragraphs([...Array<number>(11).fill(998), 1000]);
    expect(text).toHaveLength(12_000);

    const chunks = chunkText(text, 5000);

    expect(chunks).toHaveLength(3);
    expect(chunks[0]).toBe(paragraphs([998, 998, 998, 998, 998]));
    expect(chunks[1]).toBe(["f", "g", "h", "i"].map((letter) => letter.repeat(998)).join("\n\n"));
    expect(chunks[2]).toBe(["j".repeat(998), "k".repeat(998), "l".repeat(1000)].join("\n\n"));
  });

  it("prefers a code fence over an earlier paragraph break", () => {
    const text = `${"a".repeat(20)}\n\n${"b".repeat(10)}\`\`\`${"c".repeat(40)}`;

    expect(chunkText(text, 50)).toEqual([`${"a".repeat(20)}\n\n${"b".repeat(10)}`, `\`\`\`${"c".repeat(40)}`]);
  });

  it("prefers a paragraph break over a later sentence end", () => {
    const text = `${"a".repeat(20)}\n\n${"b".repeat(10)}. ${"c".repeat(40)}`;

    expect(chunkText(text, 50)).toEqual([
      "a".repeat(20),
      `${"b".repeat(10)}. ${"c".repeat(36)}`,
      "cccc",
    ]);
  });

  it("keeps the period with the sentence it ends", () => {
    const text = "Alpha beta gamma delta. Epsilon zeta eta theta iota kappa lambda mu.";

    expect(chunkText(text, 40)[0]).toBe("Alpha beta gamma delta.");
  });

  it("cuts at the hard limit when no boundary lies past 30% of the window", () => {
    expect(chunkText("x".repeat(12), 5)).toEqual(["xxxxx", "xxxxx", "xx"]);
  });

  it("returns nothing for blank text", () => {
    expect(chunkText("", 100)).toEqual([]);
    expect(chunkText(" \n\n \n", 100)).toEqual([]);
  });

  it("never exceeds the chunk size and preserves every non-space character", () => {
    const text = Array.from(
      { length: 60 },
      (_, index) => `Sentence ${index} about FBA shipping.${index % 7 === 0 ? "\n\n" : " "}`,
    ).join("");

    for (const size of [40, 97, 250, 1000]) {
      const chunks = chunkText(text, size);
      expect(chunks.every((chunk) => chunk.length > 0 && chunk.length <= size)).toBe(true);
      expect(chunks.join("").replace(/\s+/g, "")).toBe(text.replace(/\s+/g, ""));
    }
  });

  it("rejects a non-positive chunk size", () => {
    expect(() => chunkText("abc", 0)).toThrow(RangeError);
  });
});
