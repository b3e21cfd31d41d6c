import { z } from "zod";
import { describeError } from "../domain/errors.js";
import { completeJson } from "../infra/ai/structured.js";
import type { LlmClient } from "../infra/ai/types.js";

const TITLE_PREVIEW_CHARS = 1000;
const SUMMARY_PREVIEW_CHARS = 1500;

export const NO_SUMMARY = "No summary available";

const titleSchema = z.object({ title: z.string().min(1) });
const summarySchema = z.object({ summary: z.string().min(1) });

export interface ChunkDescription {
  title: string;
  summary: string;
}

/** Derives a display title and a short summary for each chunk of a document. */
export class ChunkDescriber {
  constructor(
    private readonly client: LlmClient,
    private readonly model?: string,
  ) {}

  async describe(chunk: string, documentTitle: string, chunkNumber: number): Promise<ChunkDescription> {
    const [title, summary] = await Promise.all([
      chunkNumber === 0 && documentTitle
        ? Promise.resolve(documentTitle)
        : this.extractTitle(chunk, documentTitle, chunkNumber),
      this.extractSummary(chunk),
    ]);
    return { title, summary };
  }

  private async extractTitle(chunk: string, documentTitle: string, chunkNumber: number): Promise<string> {
    const fallback = `${documentTitle} (Part ${chunkNumber + 1})`;
    try {
      const { value } = await completeJson(
        this.client,
        {
          model: this.model,
          messages: [
            {
              role: "system",
              content:
                "You are an AI that extracts titles from documentation chunks. Return a JSON object with a 'title' key. Create a concise, descriptive title for this chunk of content.",
            },
            { role: "user", content: `Content:\n${chunk.slice(0, TITLE_PREVIEW_CHARS)}` },
          ],
        },
        titleSchema,
      );
      return value.title.trim() || fallback;
    } catch (error) {
      console.error(`[describer] Error getting title: ${describeError(error)}`);
      return fallback;
    }
  }

  private async extractSummary(chunk: string): Promise<string> {
    try {
      const { value } = await completeJson(
        this.client,
        {
          model: this.model,
          messages: [
            {
              role: "system",
              content:
                "You are an AI that creates summaries from documentation chunks. Return a JSON object with a 'summary' key. Create a concise summary of the main points in this chunk.",
            },
            { role: "user", content: `Content:\n${chunk.slice(0, SUMMARY_PREVIEW_CHARS)}` },
          ],
        },
        summarySchema,
      );
      return value.summary.trim() || NO_SUMMARY;
    } catch (error) {
      console.error(`[describer] Error getting summary: ${describeError(error)}`);
      return NO_SUMMARY;
    }
  }
}
