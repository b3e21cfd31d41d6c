import type { ContentBlock } from "../domain/document.js";

/**
 * Renders a document's block list as markdown, one block per paragraph.
 * Nested blocks follow their parent in document order. Empty blocks and
 * unsupported block types are skipped, but their children still render.
 */
export function extractBlockContent(blocks: readonly ContentBlock[]): string {
  const lines: string[] = [];
  collectLines(blocks, lines);
  return lines.join("\n\n");
}

function collectLines(blocks: readonly ContentBlock[], lines: string[]): void {
  for (const block of blocks) {
    const line = renderBlock(block);
    if (line) {
      lines.push(line);
    }
    if (block.children) {
      collectLines(block.children, lines);
    }
  }
}

function renderBlock(block: ContentBlock): string | null {
  const text = block.text;
  if (!text) {
    return null;
  }

  switch (block.type) {
    case "paragraph":
      return text;
    case "heading_1":
      return `# ${text}`;
    case "heading_2":
      return `## ${text}`;
    case "heading_3":
      return `### ${text}`;
    case "bulleted_list_item":
      return `- ${text}`;
    case "numbered_list_item":
      return `1. ${text}`;
    case "code":
      return `\`\`\`${block.language ?? ""}\n${text}\n\`\`\``;
    case "to_do":
      return `- ${block.checked ? "[x]" : "[ ]"} ${text}`;
    case "toggle":
      return `**${text}**`;
    case "quote":
      return `> ${text}`;
    default:
      return null;
  }
}
