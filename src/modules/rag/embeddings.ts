import { getOpenAIClient, type EmbeddingResponse } from "../../clients/openai.js";
import { recordModelLatency } from "../../observability/metrics.js";
import type { EmbeddingProvider } from "./types.js";

export class EmbeddingProviderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbeddingProviderError";
  }
}

export interface OpenAIEmbeddingProviderDependencies {
  now?: () => number;
  getOpenAIClient?: typeof getOpenAIClient;
  recordModelLatency?: typeof recordModelLatency;
}

const resolveDependencies = (dependencies?: OpenAIEmbeddingProviderDependencies) => ({
  now: dependencies?.now ?? Date.now,
  getOpenAIClient: dependencies?.getOpenAIClient ?? getOpenAIClient,
  recordModelLatency: dependencies?.recordModelLatency ?? recordModelLatency
});

/**
 * Embeddings through the OpenAI embeddings endpoint. Vectors come back in input order
 * regardless of the order of `data` in the response.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly dependencies: ReturnType<typeof resolveDependencies>;
  private dimensions: number | null = null;

  constructor(model: string, dependencies?: OpenAIEmbeddingProviderDependencies) {
    this.model = model;
    this.dependencies = resolveDependencies(dependencies);
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    if (!vector) {
      throw new EmbeddingProviderError("Embedding response missing vector payload.");
    }
    return vector;
  }

  async embedBatch(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const startedAt = this.dependencies.now();
    let response: EmbeddingResponse;
    try {
      const { client } = await this.dependencies.getOpenAIClient();
      response = await client.embeddings.create({ model: this.model, input: [...texts] });
    } catch (error) {
      const message = error instanceof Error ? error.message : "unknown embedding error";
      throw new EmbeddingProviderError(`Embedding request failed: ${message}`, { cause: error });
    } finally {
      this.dependencies.recordModelLatency(this.dependencies.now() - startedAt);
    }

    const vectors: number[][] = new Array<number[]>(texts.length);
    for (const item of response.data) {
      if (Number.isInteger(item.index) && item.index >= 0 && item.index < texts.length) {
        vectors[item.index] = item.embedding;
      }
    }

    for (let index = 0; index < texts.length; index += 1) {
      const vector = vectors[index];
      if (!Array.isArray(vector) || vector.length === 0) {
        throw new EmbeddingProviderError(`Embedding response missing vector for input ${index}.`);
      }
      if (this.dimensions === null) {
        this.dimensions = vector.length;
      } else if (vector.length !== this.dimensions) {
        throw new EmbeddingProviderError(
          `Embedding dimensionality changed from ${this.dimensions} to ${vector.length}.`
        );
      }
    }

    return vectors;
  }
}
