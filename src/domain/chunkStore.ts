import type { ChunkRecord, ScoredChunk } from "./types.js";

export interface CategorySearchInput {
  queryEmbedding: number[];
  categories: string[];
  matchCount: number;
  matchThreshold: number;
}

export interface SimilaritySearchInput {
  queryEmbedding: number[];
  matchCount: number;
  marketplace?: string | null;
}

export interface ListChunksInput {
  category?: string;
  url?: string;
  limit?: number;
}

export interface ChunkStore {
  /** Chunks whose category list intersects `categories`, above the threshold. */
  searchByCategory(input: CategorySearchInput): Promise<ScoredChunk[]>;
  search(input: SimilaritySearchInput): Promise<ScoredChunk[]>;
  listChunkKeys(url: string): Promise<Array<{ url: string; chunkNumber: number }>>;
  deleteByUrl(url: string): Promise<number>;
  insert(chunk: ChunkRecord): Promise<void>;
  /** Ordered by url, then chunk number. */
  listChunks(input?: ListChunksInput): Promise<ChunkRecord[]>;
  /** Newest first; matches title or content, case-insensitive. */
  findByText(topic: string, limit: number): Promise<ChunkRecord[]>;
}
