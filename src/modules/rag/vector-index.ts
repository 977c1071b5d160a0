import type { Chunk } from "../policies/types.js";
import type { EmbeddedChunk, EmbeddingProvider, RetrievalResult, Vector } from "./types.js";

export class IndexNotReadyError extends Error {
  constructor(message = "Vector index queried before a successful build.") {
    super(message);
    this.name = "IndexNotReadyError";
  }
}

export class VectorIndexError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VectorIndexError";
  }
}

const NORM_EPSILON = 1e-12;

export const l2Normalize = (vector: Vector): Float64Array => {
  const normalized = Float64Array.from(vector);
  let sumOfSquares = 0;
  for (const value of normalized) {
    if (!Number.isFinite(value)) {
      throw new VectorIndexError("Vector contains a non-finite component.");
    }
    sumOfSquares += value * value;
  }
  const norm = Math.sqrt(sumOfSquares);
  if (norm < NORM_EPSILON) {
    return normalized;
  }
  for (let i = 0; i < normalized.length; i += 1) {
    normalized[i] /= norm;
  }
  return normalized;
};

const euclideanDistance = (a: Float64Array, b: Float64Array): number => {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    const delta = a[i] - b[i];
    sum += delta * delta;
  }
  return Math.sqrt(sum);
};

/** Maps the distance between two unit vectors (0..2) onto a similarity in [0, 1]. */
export const similarityFromDistance = (distance: number): number =>
  Math.min(1, Math.max(0, 1 - distance / 2));

/**
 * Exact nearest-neighbour index over the chunks of one policy document.
 * Built once; a rebuilt document gets a new instance.
 */
export class VectorIndex {
  private readonly embeddings: EmbeddingProvider;
  private entries: readonly EmbeddedChunk[] | null = null;
  private dimensions = 0;
  private buildStarted = false;

  constructor(embeddings: EmbeddingProvider) {
    this.embeddings = embeddings;
  }

  get ready(): boolean {
    return this.entries !== null;
  }

  get size(): number {
    return this.entries?.length ?? 0;
  }

  async build(chunks: readonly Chunk[]): Promise<void> {
    if (this.buildStarted) {
      throw new VectorIndexError("Vector index is immutable; build a new instance instead.");
    }
    this.buildStarted = true;

    const vectors = chunks.length > 0 ? await this.embeddings.embedBatch(chunks.map((chunk) => chunk.text)) : [];
    if (vectors.length !== chunks.length) {
      throw new VectorIndexError(`Expected ${chunks.length} embeddings, received ${vectors.length}.`);
    }

    const entries: EmbeddedChunk[] = [];
    let dimensions = 0;
    chunks.forEach((chunk, position) => {
      const vector = vectors[position] ?? [];
      if (vector.length === 0) {
        throw new VectorIndexError(`Embedding for chunk ${position} is empty.`);
      }
      if (position === 0) {
        dimensions = vector.length;
      } else if (vector.length !== dimensions) {
        throw new VectorIndexError(
          `Embedding for chunk ${position} has ${vector.length} dimensions, expected ${dimensions}.`
        );
      }
      entries.push(Object.freeze({ chunk, vector: l2Normalize(vector), position }));
    });

    this.dimensions = dimensions;
    this.entries = Object.freeze(entries);
  }

  search(queryVector: Vector, k: number): RetrievalResult[] {
    if (this.entries === null) {
      throw new IndexNotReadyError();
    }
    if (!Number.isFinite(k) || k <= 0 || this.entries.length === 0) {
      return [];
    }
    if (queryVector.length !== this.dimensions) {
      throw new VectorIndexError(
        `Query vector has ${queryVector.length} dimensions, index expects ${this.dimensions}.`
      );
    }

    const query = l2Normalize(queryVector);
    return this.entries
      .map((entry) => ({ entry, similarity: similarityFromDistance(euclideanDistance(entry.vector, query)) }))
      .sort((a, b) => b.similarity - a.similarity || a.entry.position - b.entry.position)
      .slice(0, Math.floor(k))
      .map(({ entry, similarity }) => Object.freeze({ ...entry.chunk, similarity }));
  }
}

export const buildVectorIndex = async (
  embeddings: EmbeddingProvider,
  chunks: readonly Chunk[]
): Promise<VectorIndex> => {
  const index = new VectorIndex(embeddings);
  await index.build(chunks);
  return index;
};
