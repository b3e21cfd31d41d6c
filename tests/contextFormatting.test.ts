import { describe, expect, it } from "vitest";
import {
  formatChunk,
  formatNoResults,
  formatPageContent,
  formatPageListing,
  formatQuickOverview,
  formatRetrievedChunks,
} from "../src/pipelines/contextFormatting.js";
import { makeChunk } from "./support/fakes.js";

describe("context formatting", () => {
  it("formats a chunk with header, summary, content and source", () => {
    const chunk = makeChunk({
      title: "Envíos FBA",
      summary: "Costos de envío",
      content: "El envío cuesta 2 USD por kilo.",
      category: ["Logística", "Amazon FBA y FBM"],
      marketplace: "amazon",
      url: "notion://doc-a",
    });

    expect(formatChunk(chunk)).toBe(
      [
        "# Envíos FBA [Logística, Amazon FBA y FBM] [AMAZON]",
        "**Summary**: Costos de envío",
        "El envío cuesta 2 USD por kilo.",
        "Source: notion://doc-a",
      ].join("\n\n"),
    );
  });

  it("omits the summary line when the chunk has none and separates chunks", () => {
    const first = makeChunk({ title: "A", content: "uno", url: "notion://a", category: [] });
    const second = makeChunk({ title: "B", content: "dos", url: "notion://b", marketplace: "" });

    expect(formatRetrievedChunks([first, second])).toBe(
      "# A [AMAZON]\n\nuno\n\nSource: notion://a\n\n---\n\n# B [Logística]\n\ndos\n\nSource: notion://b",
    );
  });

  it("names the searched categories when nothing was found", () => {
    expect(formatNoResults(["Logística", "Amazon FBA y FBM"])).toBe(
      "No relevant documentation found. I searched in these categories: Logística, Amazon FBA y FBM.",
    );
  });

  it("groups distinct pages by category", () => {
    const listing = formatPageListing([
      makeChunk({ url: "notion://b", title: "Campañas PPC", category: ["Marketing y Publicidad"] }),
      makeChunk({ url: "notion://a", title: "Guía FBA", category: ["Logística"] }),
      makeChunk({ url: "notion://a", chunkNumber: 1, title: "Guía FBA (Part 2)", category: ["Logística"] }),
      makeChunk({ url: "notion://c", title: "Notas", category: [] }),
    ]);

    expect(listing).toBe(
      [
        "# Available Documentation Pages",
        "\n## Logística",
        "- [Guía FBA](notion://a)",
        "\n## Marketing y Publicidad",
        "- [Campañas PPC](notion://b)",
        "\n## Uncategorized",
        "- [Notas](notion://c)",
      ].join("\n"),
    );
    expect(formatPageListing([])).toBe("No documentation pages found.");
  });

  it("renders a page under its first chunk's title", () => {
    const chunks = [
      makeChunk({ title: "Guía FBA - Parte 1", summary: "Intro", content: "uno", category: ["Logística"] }),
      makeChunk({ chunkNumber: 1, title: "Otro", summary: "x", content: "dos" }),
    ];

    expect(formatPageContent("notion://doc-1", chunks)).toBe(
      "# Guía FBA [Logística]\n\n**Summary**: Intro\n\nuno\n\ndos",
    );
    expect(formatPageContent("notion://missing", [])).toBe("No content found for URL: notion://missing");
  });

  it("refuses pages with more than ten chunks", () => {
    const chunks = Array.from({ length: 11 }, (_, index) => makeChunk({ chunkNumber: index }));

    expect(formatPageContent("notion://doc-1", chunks)).toBe(
      "This document is too large (more than 10 chunks). Ask a more focused question or request a specific section.",
    );
  });

  it("lists overview entries with categories and source", () => {
    const overview = formatQuickOverview("aduanas", [
      makeChunk({ title: "Aduanas", summary: "Trámites", url: "notion://x", category: ["Regulaciones y Aduanas"] }),
    ]);

    expect(overview).toBe("# Overview: aduanas\n\n## Aduanas [Regulaciones y Aduanas]\nTrámites\n\nSource: notion://x");
    expect(formatQuickOverview("nada", [])).toBe("No summaries found about 'nada'.");
  });
});
