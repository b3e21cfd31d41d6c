import type { ChunkStore } from "../domain/chunkStore.js";
import type {
  DocumentProperty,
  DocumentSource,
  SourceDocument,
  SourceDocumentHeader,
} from "../domain/document.js";
import { describeError } from "../domain/errors.js";
import { toTaxonomyCategory, UNCATEGORIZED } from "../domain/taxonomy.js";
import type { ChunkRecord } from "../domain/types.js";
import { extractBlockContent } from "../pipelines/blockContent.js";
import { chunkText, DEFAULT_CHUNK_SIZE } from "../pipelines/chunking.js";
import { mapWithConcurrency } from "../utils/concurrency.js";
import type { Categorizer } from "./categorizer.js";
import type { ChunkDescriber } from "./chunkDescriber.js";
import type { Embedder } from "./embedder.js";

export const DEFAULT_DOCUMENT_TITLE = "Untitled Document";
export const DEFAULT_MARKETPLACE = "general";
export const DEFAULT_SOURCE_NAME = "notion";

export interface DocumentMetadata {
  docId: string;
  url: string;
  title: string;
  marketplace: string;
  declaredCategory: string;
  sourceName: string[];
}

export interface DocumentIngestorOptions {
  store: ChunkStore;
  describer: ChunkDescriber;
  embedder: Embedder;
  categorizer: Categorizer;
  chunkSize?: number;
  concurrency?: number;
  now?: () => Date;
}

export interface IngestAllResult {
  processed: number;
  skipped: number;
  failed: Array<{ id: string; reason: string }>;
  chunkCount: number;
}

export class DocumentIngestor {
  private readonly chunkSize: number;

  private readonly concurrency: number;

  private readonly now: () => Date;

  constructor(private readonly options: DocumentIngestorOptions) {
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.concurrency = options.concurrency ?? 4;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Replaces every stored chunk of `document` with freshly processed ones.
   * Returns the records that were persisted; an empty document is skipped and
   * leaves existing chunks untouched.
   */
  async ingest(document: SourceDocument): Promise<ChunkRecord[]> {
    const metadata = extractDocumentMetadata(document);
    const content = extractBlockContent(document.blocks);

    if (!content.trim()) {
      console.warn(
        `[ingest] No content extracted from page ${metadata.title} (${metadata.docId})`,
      );
      return [];
    }

    await this.removeExisting(metadata);

    const chunks = chunkText(content, this.chunkSize);
    console.error(`[ingest] Processing ${chunks.length} chunks for document: ${metadata.title}`);

    const records = await mapWithConcurrency(chunks, this.concurrency, (chunk, index) =>
      this.processChunk(chunk, index, metadata),
    );

    const inserted = await mapWithConcurrency(records, this.concurrency, async (record) => {
      try {
        await this.options.store.insert(record);
        return record;
      } catch (error) {
        console.error(
          `[ingest] Error inserting chunk ${record.chunkNumber} for ${record.url}: ${describeError(error)}`,
        );
        return null;
      }
    });

    const persisted = inserted.filter((record): record is ChunkRecord => record !== null);
    console.error(
      `[ingest] Stored ${persisted.length}/${records.length} chunks for ${metadata.title} (${metadata.docId})`,
    );
    return persisted;
  }

  /** Walks every page of `source`, ingesting documents one at a time. */
  async ingestAll(source: DocumentSource): Promise<IngestAllResult> {
    const result: IngestAllResult = { processed: 0, skipped: 0, failed: [], chunkCount: 0 };
    let cursor: string | null = null;

    do {
      const page = await source.listDocuments(cursor);
      for (const header of page.documents) {
        try {
          const blocks = await source.loadBlocks(header.id);
          const stored = await this.ingest({ ...header, blocks });
          if (stored.length === 0) {
            result.skipped += 1;
          } else {
            result.processed += 1;
            result.chunkCount += stored.length;
          }
        } catch (error) {
          console.error(`[ingest] Error processing page ${header.id}: ${describeError(error)}`);
          result.failed.push({ id: header.id, reason: describeError(error) });
        }
      }
      cursor = page.nextCursor;
    } while (cursor);

    return result;
  }

  private async removeExisting(metadata: DocumentMetadata): Promise<void> {
    const existing = await this.options.store.listChunkKeys(metadata.url);
    if (existing.length === 0) {
      return;
    }
    console.error(
      `[ingest] Document ${metadata.docId} already exists with ${existing.length} chunks. Replacing...`,
    );
    const deleted = await this.options.store.deleteByUrl(metadata.url);
    console.error(`[ingest] Deleted ${deleted} existing chunks for document ${metadata.docId}`);
  }

  private async processChunk(
    chunk: string,
    chunkNumber: number,
    metadata: DocumentMetadata,
  ): Promise<ChunkRecord> {
    const [description, embedding, aiCategories] = await Promise.all([
      this.options.describer.describe(chunk, metadata.title, chunkNumber),
      this.options.embedder.embed(chunk),
      this.options.categorizer.categorize(chunk),
    ]);

    return {
      url: metadata.url,
      chunkNumber,
      title: description.title,
      summary: description.summary,
      content: chunk,
      marketplace: metadata.marketplace,
      category: resolveCategories(aiCategories, metadata.declaredCategory),
      sourceName: metadata.sourceName,
      metadata: {
        source: DEFAULT_SOURCE_NAME,
        doc_id: metadata.docId,
        processed_at: this.now().toISOString(),
      },
      embedding,
    };
  }
}

/** AI categories win unless they carry nothing but the uncategorized sentinel. */
export function resolveCategories(aiCategories: readonly string[], declaredCategory: string): string[] {
  const usable = aiCategories.filter((category) => category !== UNCATEGORIZED);
  return usable.length > 0 ? usable : [declaredCategory];
}

export function documentUrl(docId: string): string {
  return `notion://${docId}`;
}

export function extractDocumentMetadata(document: SourceDocumentHeader): DocumentMetadata {
  const properties = document.properties;

  let title = DEFAULT_DOCUMENT_TITLE;
  for (const property of Object.values(properties)) {
    if (property.kind === "title" && property.text.trim()) {
      title = property.text.trim();
      break;
    }
  }

  const marketplaceProperty = properties.Marketplace;
  const marketplace =
    marketplaceProperty?.kind === "select" && marketplaceProperty.name
      ? marketplaceProperty.name.toLowerCase()
      : DEFAULT_MARKETPLACE;

  const declaredName = firstOptionName(properties.Category);
  const declaredCategory = declaredName ? toTaxonomyCategory(declaredName) : UNCATEGORIZED;

  const sourceProperty = properties.source_name;
  const sourceNames =
    sourceProperty?.kind === "multi_select"
      ? sourceProperty.names.map((name) => name.toLowerCase()).filter(Boolean)
      : [];

  const idProperty = properties.ID;
  const docId =
    idProperty?.kind === "number" && idProperty.value !== null
      ? `custom-${idProperty.value}`
      : document.id;

  return {
    docId,
    url: documentUrl(docId),
    title,
    marketplace,
    declaredCategory,
    sourceName: sourceNames.length > 0 ? sourceNames : [DEFAULT_SOURCE_NAME],
  };
}

function firstOptionName(property: DocumentProperty | undefined): string | null {
  if (property?.kind === "multi_select") {
    return property.names[0] || null;
  }
  if (property?.kind === "select") {
    return property.name || null;
  }
  return null;
}
