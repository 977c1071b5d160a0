import type { EmbeddingProvider } from "../../src/modules/rag/types.js";

/**
 * One dimension per vocabulary word holding its occurrence count, plus a constant
 * last dimension so no text maps to the zero vector.
 */
export class KeywordEmbeddings implements EmbeddingProvider {
  readonly model = "keyword-test";
  readonly batches: string[][] = [];
  readonly queries: string[] = [];

  constructor(private readonly vocabulary: readonly string[]) {}

  vectorFor(text: string): number[] {
    const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
    const vector = this.vocabulary.map((term) => words.filter((word) => word === term).length);
    vector.push(0.01);
    return vector;
  }

  async embed(text: string): Promise<number[]> {
    this.queries.push(text);
    return this.vectorFor(text);
  }

  async embedBatch(texts: readonly string[]): Promise<number[][]> {
    this.batches.push([...texts]);
    return texts.map((text) => this.vectorFor(text));
  }
}

/** Returns the queued vectors in order, for tests that need exact geometry. */
export class FixedEmbeddings implements EmbeddingProvider {
  readonly model = "fixed-test";
  readonly batchCalls: string[][] = [];

  constructor(
    private readonly batchVectors: number[][],
    private readonly queryVector: number[] = batchVectors[0] ?? []
  ) {}

  async embed(): Promise<number[]> {
    return this.queryVector;
  }

  async embedBatch(texts: readonly string[]): Promise<number[][]> {
    this.batchCalls.push([...texts]);
    return this.batchVectors.slice(0, texts.length);
  }
}
