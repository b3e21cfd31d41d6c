import { describeError } from "../domain/errors.js";
import type { LlmClient } from "../infra/ai/types.js";
import { zeroVector } from "../utils/vector.js";

export class Embedder {
  constructor(
    private readonly client: LlmClient,
    private readonly dimension: number,
  ) {}

  /**
   * Never rejects. A failed or malformed embedding becomes a zero vector, which
   * keeps the chunk storable but leaves it unreachable by similarity search.
   */
  async embed(text: string): Promise<number[]> {
    try {
      const embedding = await this.client.embed(text);
      if (embedding.length !== this.dimension || embedding.some((value) => !Number.isFinite(value))) {
        throw new Error(
          `embedding has ${embedding.length} dimensions, expected ${this.dimension}`,
        );
      }
      return embedding;
    } catch (error) {
      console.error(`[embedder] Error getting embedding: ${describeError(error)}`);
      return zeroVector(this.dimension);
    }
  }
}
