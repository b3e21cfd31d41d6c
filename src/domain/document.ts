export type DocumentProperty =
  | { kind: "title"; text: string }
  | { kind: "select"; name: string | null }
  | { kind: "multi_select"; names: string[] }
  | { kind: "number"; value: number | null }
  | { kind: "other"; type: string };

export type BlockType =
  | "paragraph"
  | "heading_1"
  | "heading_2"
  | "heading_3"
  | "bulleted_list_item"
  | "numbered_list_item"
  | "code"
  | "to_do"
  | "toggle"
  | "quote";

export interface ContentBlock {
  /** Block types outside {@link BlockType} are carried through and ignored on extraction. */
  type: BlockType | (string & {});
  text: string;
  language?: string;
  checked?: boolean;
  /** Nested blocks, e.g. the body of a toggle or the items under a list entry. */
  children?: ContentBlock[];
}

export interface SourceDocumentHeader {
  id: string;
  properties: Record<string, DocumentProperty>;
}

export interface SourceDocument extends SourceDocumentHeader {
  blocks: ContentBlock[];
}

export interface DocumentListPage {
  documents: SourceDocumentHeader[];
  nextCursor: string | null;
}

export interface DocumentSource {
  listDocuments(cursor: string | null): Promise<DocumentListPage>;
  loadBlocks(documentId: string): Promise<ContentBlock[]>;
}
