import type { Chunk, ClauseCategory, PolicyType, UserPolicies } from "../policies/types.js";

export type Vector = readonly number[];

export type EmbeddedChunk = Readonly<{
  chunk: Chunk;
  vector: Float64Array;
  position: number;
}>;

/** A chunk's fields plus its similarity to the query, in [0, 1]. */
export type RetrievalResult = Chunk & Readonly<{ similarity: number }>;

export type ScenarioFields = {
  asset?: string | null;
  event?: string | null;
  location?: string | null;
};

export type RetrievalInput = {
  userId: string;
  question: string;
  userPolicies: UserPolicies;
  policyTypes: readonly PolicyType[];
  scenario?: ScenarioFields;
  topK?: number;
  clauseCategories?: readonly ClauseCategory[];
  requestId?: string;
};

export interface EmbeddingProvider {
  readonly model: string;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: readonly string[]): Promise<number[][]>;
}
