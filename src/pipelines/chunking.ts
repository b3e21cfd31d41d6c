export const DEFAULT_CHUNK_SIZE = 5000;

const CODE_FENCE = "```";
const PARAGRAPH_BREAK = "\n\n";
const SENTENCE_END = ". ";
const MIN_BOUNDARY_RATIO = 0.3;

/**
 * Splits `text` into trimmed, non-empty chunks of at most `maxChunkSize`
 * characters, preferring to cut at a code fence, then a paragraph break,
 * then a sentence end. A boundary is only used when it lies past 30% of the
 * window so chunks do not get too small.
 */
export function chunkText(text: string, maxChunkSize: number = DEFAULT_CHUNK_SIZE): string[] {
  if (!Number.isInteger(maxChunkSize) || maxChunkSize < 1) {
    throw new RangeError(`maxChunkSize must be a positive integer, got ${maxChunkSize}`);
  }

  const chunks: string[] = [];
  const minBoundary = maxChunkSize * MIN_BOUNDARY_RATIO;
  let start = 0;

  while (start < text.length) {
    let end = start + maxChunkSize;

    if (end >= text.length) {
      const tail = text.slice(start).trim();
      if (tail) {
        chunks.push(tail);
      }
      break;
    }

    end = findBoundary(text.slice(start, end), minBoundary, start, end);

    const chunk = text.slice(start, end).trim();
    if (chunk) {
      chunks.push(chunk);
    }

    start = Math.max(start + 1, end);
  }

  return chunks;
}

function findBoundary(
  window: string,
  minBoundary: number,
  start: number,
  hardEnd: number,
): number {
  const codeFence = window.lastIndexOf(CODE_FENCE);
  if (codeFence > minBoundary) {
    return start + codeFence;
  }

  const paragraphBreak = window.lastIndexOf(PARAGRAPH_BREAK);
  if (paragraphBreak > minBoundary) {
    return start + paragraphBreak;
  }

  // Keep the period with the sentence it ends.
  const sentenceEnd = window.lastIndexOf(SENTENCE_END);
  if (sentenceEnd > minBoundary) {
    return start + sentenceEnd + 1;
  }

  return hardEnd;
}
