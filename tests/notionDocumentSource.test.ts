import { afterEach, describe, expect, it, vi } from "vitest";
import { ExternalServiceError } from "../src/domain/errors.js";
import {
  NotionDocumentSource,
  parseBlock,
  parsePage,
  parseProperty,
} from "../src/infra/notion/notionDocumentSource.js";
import { stubFetch } from "./support/fetchStub.js";

function createSource() {
  return new NotionDocumentSource({
    apiKey: "test-notion",
    databaseId: "db-1",
    timeoutMs: 1000,
    baseUrl: "https://notion.test/v1/",
  });
}

function paragraph(text: string) {
  return { type: "paragraph", paragraph: { rich_text: [{ plain_text: text }] } };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("NotionDocumentSource", () => {
  it("queries the database one page at a time", async () => {
    const requests = stubFetch([
      {
        body: {
          results: [{ id: "page-1", properties: { Name: { type: "title", title: [{ plain_text: "FBA" }] } } }],
          has_more: true,
          next_cursor: "cursor-2",
        },
      },
      { body: { results: [], has_more: false, next_cursor: null } },
    ]);
    const source = createSource();

    const first = await source.listDocuments(null);
    const second = await source.listDocuments("cursor-2");

    expect(first).toEqual({
      documents: [{ id: "page-1", properties: { Name: { kind: "title", text: "FBA" } } }],
      nextCursor: "cursor-2",
    });
    expect(second).toEqual({ documents: [], nextCursor: null });
    expect(requests[0]).toMatchObject({
      url: "https://notion.test/v1/databases/db-1/query",
      method: "POST",
      body: { page_size: 100 },
    });
    expect(requests[0].headers.get("Authorization")).toBe("Bearer test-notion");
    expect(requests[0].headers.get("Notion-Version")).toBe("2022-06-28");
    expect(requests[1].body).toEqual({ page_size: 100, start_cursor: "cursor-2" });
  });

  it("follows block cursors until the last page", async () => {
    const requests = stubFetch([
      { body: { results: [paragraph("uno")], has_more: true, next_cursor: "b2" } },
      { body: { results: [paragraph("dos")], has_more: false, next_cursor: null } },
    ]);

    const blocks = await createSource().loadBlocks("page-1");

    expect(blocks).toEqual([
      { type: "paragraph", text: "uno" },
      { type: "paragraph", text: "dos" },
    ]);
    expect(requests.map((request) => request.url)).toEqual([
      "https://notion.test/v1/blocks/page-1/children?page_size=100",
      "https://notion.test/v1/blocks/page-1/children?page_size=100&start_cursor=b2",
    ]);
  });

  it("loads the children of nested blocks after their parent", async () => {
    const requests = stubFetch([
      {
        body: {
          results: [
            {
              id: "toggle-1",
              has_children: true,
              type: "toggle",
              toggle: { rich_text: [{ plain_text: "Requisitos" }] },
            },
            { id: "para-1", has_children: false, ...paragraph("Fin") },
          ],
          has_more: false,
          next_cursor: null,
        },
      },
      { body: { results: [paragraph("Cuenta profesional")], has_more: false, next_cursor: null } },
    ]);

    const blocks = await createSource().loadBlocks("page-1");

    expect(blocks).toEqual([
      { type: "toggle", text: "Requisitos", children: [{ type: "paragraph", text: "Cuenta profesional" }] },
      { type: "paragraph", text: "Fin" },
    ]);
    expect(requests.map((request) => request.url)).toEqual([
      "https://notion.test/v1/blocks/page-1/children?page_size=100",
      "https://notion.test/v1/blocks/toggle-1/children?page_size=100",
    ]);
  });

  it("raises a service error on a failed response", async () => {
    stubFetch([
      { status: 401, body: "unauthorized" },
      { status: 401, body: "unauthorized" },
    ]);
    const source = createSource();

    await expect(source.listDocuments(null)).rejects.toBeInstanceOf(ExternalServiceError);
    await expect(source.loadBlocks("page-1")).rejects.toThrow("Notion failed (401): unauthorized");
  });
});

describe("Notion payload parsing", () => {
  it("reads the supported property types", () => {
    expect(
      parseProperty({ type: "title", title: [{ plain_text: "Guía " }, { plain_text: "FBA" }] }),
    ).toEqual({ kind: "title", text: "Guía FBA" });
    expect(parseProperty({ type: "select", select: null })).toEqual({ kind: "select", name: null });
    expect(
      parseProperty({ type: "multi_select", multi_select: [{ name: "Notion" }, { name: "Blog" }] }),
    ).toEqual({ kind: "multi_select", names: ["Notion", "Blog"] });
    expect(parseProperty({ type: "number", number: 7 })).toEqual({ kind: "number", value: 7 });
    expect(parseProperty({ type: "date", date: { start: "2024-01-01" } })).toEqual({
      kind: "other",
      type: "date",
    });
  });

  it("defaults missing page properties", () => {
    expect(parsePage({ id: "page-2" })).toEqual({ id: "page-2", properties: {} });
  });

  it("reads block text, code language and checkbox state", () => {
    expect(
      parseBlock({
        type: "code",
        code: { rich_text: [{ plain_text: "npm install" }], language: "shell" },
      }),
    ).toEqual({ type: "code", text: "npm install", language: "shell" });
    expect(
      parseBlock({ type: "to_do", to_do: { rich_text: [{ plain_text: "Registrar marca" }], checked: true } }),
    ).toEqual({ type: "to_do", text: "Registrar marca", checked: true });
    expect(parseBlock({ type: "divider" })).toEqual({ type: "divider", text: "" });
  });
});
