import { z } from "zod";
import { describeError } from "../domain/errors.js";
import {
  CATEGORY_DESCRIPTIONS,
  UNCATEGORIZED,
  describeTaxonomy,
  validateCategories,
} from "../domain/taxonomy.js";
import { completeJson } from "../infra/ai/structured.js";
import type { LlmClient } from "../infra/ai/types.js";

const CHUNK_PREVIEW_CHARS = 2000;
const MAX_QUERY_CATEGORIES = 3;

export const DEFAULT_QUERY_CATEGORIES: readonly string[] = ["Logística", "Amazon FBA y FBM"];

const categoriesSchema = z.object({
  categories: z.array(z.unknown()).default([]),
});

export class Categorizer {
  constructor(
    private readonly client: LlmClient,
    private readonly model?: string,
  ) {}

  /** Taxonomy labels for a chunk; `["uncategorized"]` when nothing valid comes back. */
  async categorize(text: string): Promise<string[]> {
    const systemPrompt = [
      "Eres un agente especializado en analizar contenido relacionado con Amazon Seller.",
      "Tu tarea es identificar las categorías más relevantes para el texto proporcionado.",
      "",
      "CATEGORÍAS DISPONIBLES:",
      describeTaxonomy(),
      "",
      "INSTRUCCIONES:",
      "1. Lee cuidadosamente el contenido proporcionado.",
      "2. Identifica las categorías que mejor representan el tema principal del contenido.",
      "3. Puedes seleccionar una o varias categorías, pero solo de la lista proporcionada.",
      '4. Devuelve un objeto JSON con una clave "categories" que contenga un array de las categorías seleccionadas.',
      `5. Si no encuentras ninguna categoría relevante, incluye "${UNCATEGORIZED}" en el array.`,
      "",
      'Ejemplo de respuesta: {"categories": ["Logística", "Amazon FBA y FBM"]}',
    ].join("\n");

    try {
      const { value } = await completeJson(
        this.client,
        {
          model: this.model,
          temperature: 0,
          messages: [
            { role: "system", content: systemPrompt },
            {
              role: "user",
              content: `Contenido a categorizar:\n${text.slice(0, CHUNK_PREVIEW_CHARS)}`,
            },
          ],
        },
        categoriesSchema,
      );

      const valid = validateCategories(value.categories);
      return valid.length > 0 ? valid : [UNCATEGORIZED];
    } catch (error) {
      console.error(`[categorizer] Error extracting categories: ${describeError(error)}`);
      return [UNCATEGORIZED];
    }
  }

  /** One to three taxonomy categories relevant to a user query. */
  async inferQueryCategories(query: string): Promise<string[]> {
    const systemPrompt = [
      "Identifica las categorías más relevantes para esta consulta sobre Amazon.",
      "Categorías disponibles con descripciones:",
      JSON.stringify(CATEGORY_DESCRIPTIONS, null, 2),
      "",
      `Devuelve un objeto JSON con una clave "categories" con los nombres de las 1-${MAX_QUERY_CATEGORIES} categorías más relevantes.`,
      'Ejemplo: {"categories": ["Logística", "Amazon FBA y FBM"]}',
    ].join("\n");

    try {
      const { value } = await completeJson(
        this.client,
        {
          model: this.model,
          temperature: 0,
          messages: [
            { role: "system", content: systemPrompt },
            { role: "user", content: query },
          ],
        },
        categoriesSchema,
      );

      const valid = validateCategories(value.categories)
        .filter((category) => category !== UNCATEGORIZED)
        .slice(0, MAX_QUERY_CATEGORIES);
      if (valid.length > 0) {
        return valid;
      }
      console.warn("[categorizer] No valid categories inferred for query; using defaults.");
    } catch (error) {
      console.error(`[categorizer] Error identifying query categories: ${describeError(error)}`);
    }
    return [...DEFAULT_QUERY_CATEGORIES];
  }
}
