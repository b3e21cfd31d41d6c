import type {
  CategorySearchInput,
  ChunkStore,
  ListChunksInput,
  SimilaritySearchInput,
} from "../../domain/chunkStore.js";
import { CategorySearchUnavailableError } from "../../domain/errors.js";
import type { ChunkRecord, ScoredChunk } from "../../domain/types.js";
import { cosineSimilarity } from "../../utils/vector.js";

export interface InMemoryChunkStoreOptions {
  /** When false, `searchByCategory` reports the path as unavailable. */
  categorySearch?: boolean;
}

export class InMemoryChunkStore implements ChunkStore {
  private readonly chunksByUrl = new Map<string, ChunkRecord[]>();

  private readonly categorySearch: boolean;

  private readonly insertOrder = new Map<string, number>();

  private insertedCount = 0;

  constructor(options: InMemoryChunkStoreOptions = {}) {
    this.categorySearch = options.categorySearch ?? true;
  }

  async searchByCategory(input: CategorySearchInput): Promise<ScoredChunk[]> {
    if (!this.categorySearch) {
      throw new CategorySearchUnavailableError("category search is disabled for this store");
    }

    const wanted = new Set(input.categories);
    return this.rank(input.queryEmbedding)
      .filter((hit) => hit.similarity > input.matchThreshold)
      .filter((hit) => hit.chunk.category.some((category) => wanted.has(category)))
      .slice(0, input.matchCount);
  }

  async search(input: SimilaritySearchInput): Promise<ScoredChunk[]> {
    return this.rank(input.queryEmbedding)
      .filter((hit) => !input.marketplace || hit.chunk.marketplace === input.marketplace)
      .slice(0, input.matchCount);
  }

  async listChunkKeys(url: string): Promise<Array<{ url: string; chunkNumber: number }>> {
    return (this.chunksByUrl.get(url) ?? []).map((chunk) => ({
      url: chunk.url,
      chunkNumber: chunk.chunkNumber,
    }));
  }

  async deleteByUrl(url: string): Promise<number> {
    const chunks = this.chunksByUrl.get(url) ?? [];
    for (const chunk of chunks) {
      this.insertOrder.delete(chunkKey(chunk));
    }
    this.chunksByUrl.delete(url);
    return chunks.length;
  }

  async insert(chunk: ChunkRecord): Promise<void> {
    const chunks = this.chunksByUrl.get(chunk.url) ?? [];
    if (chunks.some((existing) => existing.chunkNumber === chunk.chunkNumber)) {
      throw new Error(`Duplicate chunk ${chunk.chunkNumber} for ${chunk.url}`);
    }

    this.insertedCount += 1;
    this.insertOrder.set(chunkKey(chunk), this.insertedCount);
    chunks.push({
      ...chunk,
      category: [...chunk.category],
      sourceName: [...chunk.sourceName],
      metadata: { ...chunk.metadata },
      embedding: [...chunk.embedding],
      createdAt: chunk.createdAt ?? new Date().toISOString(),
    });
    chunks.sort((a, b) => a.chunkNumber - b.chunkNumber);
    this.chunksByUrl.set(chunk.url, chunks);
  }

  async listChunks(input?: ListChunksInput): Promise<ChunkRecord[]> {
    const urls = input?.url ? [input.url] : [...this.chunksByUrl.keys()].sort();
    const rows: ChunkRecord[] = [];

    for (const url of urls) {
      for (const chunk of this.chunksByUrl.get(url) ?? []) {
        if (input?.category && !chunk.category.includes(input.category)) {
          continue;
        }
        rows.push(chunk);
        if (input?.limit && rows.length >= input.limit) {
          return rows;
        }
      }
    }

    return rows;
  }

  async findByText(topic: string, limit: number): Promise<ChunkRecord[]> {
    const needle = topic.toLowerCase();
    return this.allChunks()
      .filter(
        (chunk) =>
          chunk.title.toLowerCase().includes(needle) ||
          chunk.content.toLowerCase().includes(needle),
      )
      .sort((a, b) => (this.insertOrder.get(chunkKey(b)) ?? 0) - (this.insertOrder.get(chunkKey(a)) ?? 0))
      .slice(0, limit);
  }

  private allChunks(): ChunkRecord[] {
    return [...this.chunksByUrl.values()].flat();
  }

  private rank(queryEmbedding: number[]): ScoredChunk[] {
    return this.allChunks()
      .map((chunk) => ({ chunk, similarity: cosineSimilarity(queryEmbedding, chunk.embedding) }))
      .sort((a, b) => b.similarity - a.similarity);
  }
}

function chunkKey(chunk: ChunkRecord): string {
  return `${chunk.url}#${chunk.chunkNumber}`;
}
