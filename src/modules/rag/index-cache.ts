import type { PolicyType } from "../policies/types.js";
import type { VectorIndex } from "./vector-index.js";

export type IndexCacheKey = Readonly<{
  userId: string;
  policyType: PolicyType;
  documentId: string;
}>;

export type IndexBuilder = () => Promise<VectorIndex>;

/**
 * Hands out built indices. Implementations may share indices across requests but
 * must only ever swap whole entries, never mutate an index a reader holds.
 */
export interface IndexCache {
  getOrBuild(key: IndexCacheKey, build: IndexBuilder): Promise<VectorIndex>;
}

/** Builds a fresh index on every call. */
export class RequestScopedIndexCache implements IndexCache {
  async getOrBuild(_key: IndexCacheKey, build: IndexBuilder): Promise<VectorIndex> {
    return build();
  }
}

export const indexCacheKeyToString = (key: IndexCacheKey): string =>
  JSON.stringify([key.userId, key.policyType, key.documentId]);

/**
 * Process-wide cache of built indices. Concurrent callers for the same key share the
 * pending build; a failed build is evicted so the next caller retries.
 */
export class InMemoryIndexCache implements IndexCache {
  private readonly entries = new Map<string, Promise<VectorIndex>>();

  get size(): number {
    return this.entries.size;
  }

  getOrBuild(key: IndexCacheKey, build: IndexBuilder): Promise<VectorIndex> {
    const cacheKey = indexCacheKeyToString(key);
    const existing = this.entries.get(cacheKey);
    if (existing) {
      return existing;
    }

    const pending = build();
    this.entries.set(cacheKey, pending);
    void pending.catch(() => {
      if (this.entries.get(cacheKey) === pending) {
        this.entries.delete(cacheKey);
      }
    });
    return pending;
  }

  replace(key: IndexCacheKey, index: VectorIndex): void {
    this.entries.set(indexCacheKeyToString(key), Promise.resolve(index));
  }

  invalidate(key: IndexCacheKey): boolean {
    return this.entries.delete(indexCacheKeyToString(key));
  }
}
