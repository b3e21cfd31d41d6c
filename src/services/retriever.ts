import type { ChunkStore } from "../domain/chunkStore.js";
import { CategorySearchUnavailableError, describeError } from "../domain/errors.js";
import type { ChunkRecord } from "../domain/types.js";
import {
  formatNoResults,
  formatPageContent,
  formatPageListing,
  formatQuickOverview,
  formatRetrievedChunks,
  MAX_PAGE_CHUNKS,
} from "../pipelines/contextFormatting.js";
import type { Categorizer } from "./categorizer.js";
import type { Embedder } from "./embedder.js";

export const MATCH_COUNT = 5;
export const MATCH_THRESHOLD = 0.5;
export const FALLBACK_MATCH_COUNT = 10;
const OVERVIEW_LIMIT = 5;

export interface RetrievalResult {
  categories: string[];
  chunks: ChunkRecord[];
  mode: "category" | "fallback";
}

export class Retriever {
  constructor(
    private readonly store: ChunkStore,
    private readonly embedder: Embedder,
    private readonly categorizer: Categorizer,
  ) {}

  /**
   * Formatted documentation context for `query`. An empty result is reported
   * as a plain message naming the searched categories, never as an error.
   */
  async retrieve(query: string, categoryHint?: readonly string[]): Promise<string> {
    try {
      const result = await this.retrieveChunks(query, categoryHint);
      if (result.chunks.length === 0) {
        return formatNoResults(result.categories);
      }
      return formatRetrievedChunks(result.chunks);
    } catch (error) {
      console.error(`[retriever] Error retrieving documentation: ${describeError(error)}`);
      return `Error retrieving documentation: ${describeError(error)}`;
    }
  }

  async retrieveChunks(query: string, categoryHint?: readonly string[]): Promise<RetrievalResult> {
    const categories =
      categoryHint && categoryHint.length > 0
        ? [...categoryHint]
        : await this.categorizer.inferQueryCategories(query);
    const queryEmbedding = await this.embedder.embed(query);

    try {
      const hits = await this.store.searchByCategory({
        queryEmbedding,
        categories,
        matchCount: MATCH_COUNT,
        matchThreshold: MATCH_THRESHOLD,
      });
      return { categories, chunks: hits.map((hit) => hit.chunk), mode: "category" };
    } catch (error) {
      if (!(error instanceof CategorySearchUnavailableError)) {
        throw error;
      }
      console.warn(
        `[retriever] Category search unavailable (${error.message}); falling back to unfiltered search.`,
      );
    }

    const wanted = new Set(categories);
    const candidates = await this.store.search({
      queryEmbedding,
      matchCount: FALLBACK_MATCH_COUNT,
    });
    const chunks = candidates
      .map((hit) => hit.chunk)
      .filter((chunk) => chunk.category.some((category) => wanted.has(category)))
      .slice(0, MATCH_COUNT);

    return { categories, chunks, mode: "fallback" };
  }

  async listDocumentationPages(category?: string): Promise<string> {
    try {
      const chunks = await this.store.listChunks(category ? { category } : undefined);
      return formatPageListing(chunks);
    } catch (error) {
      console.error(`[retriever] Error listing documentation pages: ${describeError(error)}`);
      return `Error retrieving documentation pages: ${describeError(error)}`;
    }
  }

  async getPageContent(url: string): Promise<string> {
    try {
      // One row past the limit is enough to refuse the page.
      const chunks = await this.store.listChunks({ url, limit: MAX_PAGE_CHUNKS + 1 });
      return formatPageContent(url, chunks);
    } catch (error) {
      console.error(`[retriever] Error retrieving page content: ${describeError(error)}`);
      return `Error retrieving page content: ${describeError(error)}`;
    }
  }

  async getQuickOverview(topic: string): Promise<string> {
    try {
      const chunks = await this.store.findByText(topic, OVERVIEW_LIMIT);
      return formatQuickOverview(topic, chunks);
    } catch (error) {
      console.error(`[retriever] Error getting overview: ${describeError(error)}`);
      return `Error getting overview: ${describeError(error)}`;
    }
  }
}
