import { z } from "zod";
import type {
  ContentBlock,
  DocumentListPage,
  DocumentProperty,
  DocumentSource,
  SourceDocumentHeader,
} from "../../domain/document.js";
import { ExternalServiceError } from "../../domain/errors.js";

const NOTION_VERSION = "2022-06-28";
const PAGE_SIZE = 100;
const MAX_BLOCK_DEPTH = 5;

export interface NotionDocumentSourceOptions {
  apiKey: string;
  databaseId: string;
  timeoutMs: number;
  baseUrl?: string;
}

const richTextSchema = z.array(z.object({ plain_text: z.string() })).default([]);

const paginatedSchema = z.object({
  results: z.array(z.unknown()),
  has_more: z.boolean().default(false),
  next_cursor: z.string().nullable().default(null),
});

const pageSchema = z.object({
  id: z.string(),
  properties: z.record(z.unknown()).default({}),
});

const propertySchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("title"), title: richTextSchema }),
  z.object({
    type: z.literal("select"),
    select: z.object({ name: z.string() }).nullable(),
  }),
  z.object({
    type: z.literal("multi_select"),
    multi_select: z.array(z.object({ name: z.string() })),
  }),
  z.object({ type: z.literal("number"), number: z.number().nullable() }),
]);

const blockSchema = z.object({ type: z.string() }).passthrough();

const nestingSchema = z.object({
  id: z.string(),
  has_children: z.boolean().default(false),
});

const blockBodySchema = z.object({
  rich_text: richTextSchema,
  language: z.string().optional(),
  checked: z.boolean().optional(),
});

export class NotionDocumentSource implements DocumentSource {
  private readonly baseUrl: string;

  constructor(private readonly options: NotionDocumentSourceOptions) {
    this.baseUrl = (options.baseUrl ?? "https://api.notion.com/v1").replace(/\/+$/, "");
  }

  async listDocuments(cursor: string | null): Promise<DocumentListPage> {
    const page = paginatedSchema.parse(
      await this.request(`/databases/${this.options.databaseId}/query`, {
        method: "POST",
        body: JSON.stringify({
          page_size: PAGE_SIZE,
          ...(cursor ? { start_cursor: cursor } : {}),
        }),
      }),
    );

    return {
      documents: page.results.map(parsePage),
      nextCursor: page.has_more ? page.next_cursor : null,
    };
  }

  /** Follows `has_children` down to {@link MAX_BLOCK_DEPTH} levels below the page. */
  async loadBlocks(documentId: string): Promise<ContentBlock[]> {
    return this.loadChildren(documentId, 0);
  }

  private async loadChildren(parentId: string, depth: number): Promise<ContentBlock[]> {
    const blocks: ContentBlock[] = [];
    let cursor: string | null = null;

    do {
      const query = new URLSearchParams({ page_size: String(PAGE_SIZE) });
      if (cursor) {
        query.set("start_cursor", cursor);
      }
      const page = paginatedSchema.parse(
        await this.request(`/blocks/${parentId}/children?${query.toString()}`, { method: "GET" }),
      );
      for (const raw of page.results) {
        const block = parseBlock(raw);
        const nesting = nestingSchema.safeParse(raw);
        if (nesting.success && nesting.data.has_children && depth < MAX_BLOCK_DEPTH) {
          block.children = await this.loadChildren(nesting.data.id, depth + 1);
        }
        blocks.push(block);
      }
      cursor = page.has_more ? page.next_cursor : null;
    } while (cursor);

    return blocks;
  }

  private async request(path: string, init: { method: string; body?: string }): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      ...init,
      headers: {
        Authorization: `Bearer ${this.options.apiKey}`,
        "Notion-Version": NOTION_VERSION,
        "Content-Type": "application/json",
      },
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      throw new ExternalServiceError("Notion", response.status, await response.text());
    }

    return response.json();
  }
}

export function parsePage(raw: unknown): SourceDocumentHeader {
  const page = pageSchema.parse(raw);
  const properties: Record<string, DocumentProperty> = {};
  for (const [name, value] of Object.entries(page.properties)) {
    properties[name] = parseProperty(value);
  }
  return { id: page.id, properties };
}

export function parseProperty(raw: unknown): DocumentProperty {
  const parsed = propertySchema.safeParse(raw);
  if (!parsed.success) {
    const type = z.object({ type: z.string() }).safeParse(raw);
    return { kind: "other", type: type.success ? type.data.type : "unknown" };
  }

  const property = parsed.data;
  switch (property.type) {
    case "title":
      return { kind: "title", text: joinRichText(property.title) };
    case "select":
      return { kind: "select", name: property.select?.name ?? null };
    case "multi_select":
      return { kind: "multi_select", names: property.multi_select.map((option) => option.name) };
    case "number":
      return { kind: "number", value: property.number };
  }
}

export function parseBlock(raw: unknown): ContentBlock {
  const block = blockSchema.parse(raw);
  const body = blockBodySchema.safeParse(block[block.type]);
  if (!body.success) {
    return { type: block.type, text: "" };
  }

  return {
    type: block.type,
    text: joinRichText(body.data.rich_text),
    ...(body.data.language === undefined ? {} : { language: body.data.language }),
    ...(body.data.checked === undefined ? {} : { checked: body.data.checked }),
  };
}

function joinRichText(parts: ReadonlyArray<{ plain_text: string }>): string {
  return parts.map((part) => part.plain_text).join("");
}
