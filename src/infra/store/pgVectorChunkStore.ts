import type { Pool } from "pg";
import type {
  CategorySearchInput,
  ChunkStore,
  ListChunksInput,
  SimilaritySearchInput,
} from "../../domain/chunkStore.js";
import { CategorySearchUnavailableError } from "../../domain/errors.js";
import type { ChunkRecord, JsonMap, ScoredChunk } from "../../domain/types.js";
import { toVectorLiteral } from "../../utils/vector.js";
import { isUndefinedFunctionError } from "../db/postgres.js";

interface PgChunkRow {
  url: string;
  chunk_number: number;
  title: string;
  summary: string;
  content: string;
  marketplace: string;
  category: string[] | null;
  source_name: string[] | null;
  metadata: JsonMap | null;
  embedding: string | null;
  created_at: Date;
}

interface PgScoredChunkRow extends PgChunkRow {
  similarity: number;
}

const CHUNK_COLUMNS = `url, chunk_number, title, summary, content, marketplace, category,
  source_name, metadata, embedding::text AS embedding, created_at`;

export interface PgVectorChunkStoreOptions {
  vectorDimension: number;
  /** Install `match_documents_by_category`; without it the category path is unavailable. */
  installCategorySearch?: boolean;
}

export class PgVectorChunkStore implements ChunkStore {
  private initialized = false;

  constructor(
    private readonly pool: Pool,
    private readonly options: PgVectorChunkStoreOptions,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    const dimension = this.options.vectorDimension;
    await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS site_pages (
        id BIGSERIAL PRIMARY KEY,
        url VARCHAR NOT NULL,
        chunk_number INTEGER NOT NULL,
        title VARCHAR NOT NULL,
        summary VARCHAR NOT NULL,
        content TEXT NOT NULL,
        marketplace VARCHAR NOT NULL DEFAULT 'general',
        category TEXT[] NOT NULL DEFAULT ARRAY['uncategorized'],
        source_name TEXT[] NOT NULL DEFAULT ARRAY['notion'],
        source_id TEXT,
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
        embedding VECTOR(${dimension}),
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        UNIQUE (url, chunk_number)
      )
    `);
    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_site_pages_embedding
      ON site_pages USING ivfflat (embedding vector_cosine_ops)
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_site_pages_metadata ON site_pages USING gin (metadata)`,
    );
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_site_pages_category ON site_pages USING gin (category)`,
    );
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_site_pages_marketplace ON site_pages (marketplace)`,
    );
    await this.pool.query(`
      CREATE OR REPLACE FUNCTION match_site_pages (
        query_embedding VECTOR(${dimension}),
        match_count INT DEFAULT 10,
        marketplace_filter VARCHAR DEFAULT NULL
      ) RETURNS TABLE (id BIGINT, similarity FLOAT)
      LANGUAGE sql STABLE AS $$
        SELECT p.id, 1 - (p.embedding <=> query_embedding) AS similarity
        FROM site_pages p
        WHERE marketplace_filter IS NULL OR p.marketplace = marketplace_filter
        ORDER BY p.embedding <=> query_embedding
        LIMIT match_count
      $$
    `);

    if (this.options.installCategorySearch ?? true) {
      await this.pool.query(`
        CREATE OR REPLACE FUNCTION match_documents_by_category (
          query_embedding VECTOR(${dimension}),
          categories TEXT[],
          match_count INT DEFAULT 5,
          match_threshold FLOAT DEFAULT 0.5
        ) RETURNS TABLE (id BIGINT, similarity FLOAT)
        LANGUAGE sql STABLE AS $$
          SELECT p.id, 1 - (p.embedding <=> query_embedding) AS similarity
          FROM site_pages p
          WHERE p.category && categories
            AND 1 - (p.embedding <=> query_embedding) > match_threshold
          ORDER BY p.embedding <=> query_embedding
          LIMIT match_count
        $$
      `);
    }

    this.initialized = true;
  }

  async searchByCategory(input: CategorySearchInput): Promise<ScoredChunk[]> {
    await this.initialize();
    try {
      const result = await this.pool.query<PgScoredChunkRow>(
        `
          SELECT ${prefixed("p")}, m.similarity
          FROM match_documents_by_category($1::vector, $2::text[], $3, $4) m
          JOIN site_pages p ON p.id = m.id
          ORDER BY m.similarity DESC
        `,
        [
          toVectorLiteral(input.queryEmbedding),
          input.categories,
          input.matchCount,
          input.matchThreshold,
        ],
      );
      return result.rows.map(toScoredChunk);
    } catch (error) {
      if (isUndefinedFunctionError(error)) {
        throw new CategorySearchUnavailableError("match_documents_by_category is not installed", {
          cause: error,
        });
      }
      throw error;
    }
  }

  async search(input: SimilaritySearchInput): Promise<ScoredChunk[]> {
    await this.initialize();
    const result = await this.pool.query<PgScoredChunkRow>(
      `
        SELECT ${prefixed("p")}, m.similarity
        FROM match_site_pages($1::vector, $2, $3) m
        JOIN site_pages p ON p.id = m.id
        ORDER BY m.similarity DESC
      `,
      [toVectorLiteral(input.queryEmbedding), input.matchCount, input.marketplace ?? null],
    );
    return result.rows.map(toScoredChunk);
  }

  async listChunkKeys(url: string): Promise<Array<{ url: string; chunkNumber: number }>> {
    await this.initialize();
    const result = await this.pool.query<{ url: string; chunk_number: number }>(
      `SELECT url, chunk_number FROM site_pages WHERE url = $1 ORDER BY chunk_number`,
      [url],
    );
    return result.rows.map((row) => ({ url: row.url, chunkNumber: row.chunk_number }));
  }

  async deleteByUrl(url: string): Promise<number> {
    await this.initialize();
    const result = await this.pool.query(`DELETE FROM site_pages WHERE url = $1`, [url]);
    return result.rowCount ?? 0;
  }

  async insert(chunk: ChunkRecord): Promise<void> {
    await this.initialize();
    const docId = chunk.metadata.doc_id;
    await this.pool.query(
      `
        INSERT INTO site_pages (
          url, chunk_number, title, summary, content, marketplace,
          category, source_name, source_id, metadata, embedding
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7::text[], $8::text[], $9, $10::jsonb, $11::vector)
      `,
      [
        chunk.url,
        chunk.chunkNumber,
        chunk.title,
        chunk.summary,
        chunk.content,
        chunk.marketplace,
        chunk.category,
        chunk.sourceName,
        typeof docId === "string" ? docId : null,
        JSON.stringify(chunk.metadata),
        toVectorLiteral(chunk.embedding),
      ],
    );
  }

  async listChunks(input?: ListChunksInput): Promise<ChunkRecord[]> {
    await this.initialize();
    const limit = input?.limit && input.limit > 0 ? Math.floor(input.limit) : 100000;
    const result = await this.pool.query<PgChunkRow>(
      `
        SELECT ${CHUNK_COLUMNS}
        FROM site_pages
        WHERE ($1::text IS NULL OR url = $1)
          AND ($2::text IS NULL OR category @> ARRAY[$2::text])
        ORDER BY url ASC, chunk_number ASC
        LIMIT $3
      `,
      [input?.url ?? null, input?.category ?? null, limit],
    );
    return result.rows.map(toChunkRecord);
  }

  async findByText(topic: string, limit: number): Promise<ChunkRecord[]> {
    await this.initialize();
    const result = await this.pool.query<PgChunkRow>(
      `
        SELECT ${CHUNK_COLUMNS}
        FROM site_pages
        WHERE title ILIKE $1 OR content ILIKE $1
        ORDER BY created_at DESC
        LIMIT $2
      `,
      [`%${escapeLike(topic)}%`, limit],
    );
    return result.rows.map(toChunkRecord);
  }
}

function prefixed(alias: string): string {
  return CHUNK_COLUMNS.split(",")
    .map((column) => `${alias}.${column.trim()}`)
    .join(", ");
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

function parseVector(literal: string | null): number[] {
  if (!literal) {
    return [];
  }
  return literal
    .replace(/^\[|\]$/g, "")
    .split(",")
    .filter(Boolean)
    .map(Number);
}

function toChunkRecord(row: PgChunkRow): ChunkRecord {
  return {
    url: row.url,
    chunkNumber: row.chunk_number,
    title: row.title,
    summary: row.summary,
    content: row.content,
    marketplace: row.marketplace,
    category: row.category ?? [],
    sourceName: row.source_name ?? [],
    metadata: row.metadata ?? {},
    embedding: parseVector(row.embedding),
    createdAt: row.created_at.toISOString(),
  };
}

function toScoredChunk(row: PgScoredChunkRow): ScoredChunk {
  return { chunk: toChunkRecord(row), similarity: Number(row.similarity) };
}
