import type { ChunkRecord } from "../domain/types.js";

export const CHUNK_SEPARATOR = "\n\n---\n\n";
export const MAX_PAGE_CHUNKS = 10;

export function formatNoResults(categories: readonly string[]): string {
  return `No relevant documentation found. I searched in these categories: ${categories.join(", ")}.`;
}

export function formatChunkHeader(chunk: ChunkRecord): string {
  const categoryInfo = chunk.category.length > 0 ? `[${chunk.category.join(", ")}]` : "";
  const marketplaceInfo = chunk.marketplace ? `[${chunk.marketplace.toUpperCase()}]` : "";
  return [chunk.title, categoryInfo, marketplaceInfo].filter(Boolean).join(" ");
}

export function formatChunk(chunk: ChunkRecord): string {
  const parts = [`# ${formatChunkHeader(chunk)}`];
  if (chunk.summary) {
    parts.push(`**Summary**: ${chunk.summary}`);
  }
  parts.push(chunk.content, `Source: ${chunk.url}`);
  return parts.join("\n\n");
}

export function formatRetrievedChunks(chunks: readonly ChunkRecord[]): string {
  return chunks.map(formatChunk).join(CHUNK_SEPARATOR);
}

export function formatPageListing(chunks: readonly ChunkRecord[]): string {
  const seenUrls = new Set<string>();
  const pagesByCategory = new Map<string, string[]>();

  for (const chunk of chunks) {
    if (seenUrls.has(chunk.url)) {
      continue;
    }
    seenUrls.add(chunk.url);

    const link = `- [${chunk.title || "Untitled"}](${chunk.url})`;
    const categories = chunk.category.length > 0 ? chunk.category : ["Uncategorized"];
    for (const category of categories) {
      const pages = pagesByCategory.get(category) ?? [];
      pages.push(link);
      pagesByCategory.set(category, pages);
    }
  }

  if (pagesByCategory.size === 0) {
    return "No documentation pages found.";
  }

  const output = ["# Available Documentation Pages"];
  for (const category of [...pagesByCategory.keys()].sort((a, b) => a.localeCompare(b))) {
    output.push(`\n## ${category}`, ...(pagesByCategory.get(category) ?? []));
  }
  return output.join("\n");
}

/** `chunks` must belong to a single url, ordered by chunk number. */
export function formatPageContent(url: string, chunks: readonly ChunkRecord[]): string {
  if (chunks.length === 0) {
    return `No content found for URL: ${url}`;
  }
  if (chunks.length > MAX_PAGE_CHUNKS) {
    return `This document is too large (more than ${MAX_PAGE_CHUNKS} chunks). Ask a more focused question or request a specific section.`;
  }

  const first = chunks[0];
  const pageTitle = first.title.split(" - ")[0];
  const categoryInfo = first.category.length > 0 ? ` [${first.category.join(", ")}]` : "";
  const sections = [`# ${pageTitle}${categoryInfo}`];
  if (first.summary) {
    sections.push(`**Summary**: ${first.summary}`);
  }
  sections.push(...chunks.map((chunk) => chunk.content));
  return sections.join("\n\n");
}

export function formatQuickOverview(topic: string, chunks: readonly ChunkRecord[]): string {
  if (chunks.length === 0) {
    return `No summaries found about '${topic}'.`;
  }

  const overview = [`# Overview: ${topic}`];
  for (const chunk of chunks) {
    const categories = chunk.category.length > 0 ? ` [${chunk.category.join(", ")}]` : "";
    overview.push(`## ${chunk.title}${categories}\n${chunk.summary}\n\nSource: ${chunk.url}`);
  }
  return overview.join("\n\n");
}
