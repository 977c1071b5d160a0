import { describe, expect, it, vi } from "vitest";
import type { Chunk } from "../../src/modules/policies/types.js";
import {
  InMemoryIndexCache,
  RequestScopedIndexCache,
  indexCacheKeyToString,
  type IndexCacheKey
} from "../../src/modules/rag/index-cache.js";
import { buildVectorIndex, type VectorIndex } from "../../src/modules/rag/vector-index.js";
import { FixedEmbeddings } from "../../tests/helpers/keyword-embeddings.js";

const KEY: IndexCacheKey = { userId: "carol", policyType: "auto", documentId: "auto_policy_2.md" };

const chunk: Chunk = {
  text: "## Collision\nWe will pay.",
  policy_type: "auto",
  source_document: "auto_policy_2.md",
  section_name: "Collision",
  clause_category: "coverage"
};

const makeIndex = (): Promise<VectorIndex> => buildVectorIndex(new FixedEmbeddings([[1, 0]]), [chunk]);

describe("modules/rag/index-cache", () => {
  it("request-scoped cache builds on every call", async () => {
    const cache = new RequestScopedIndexCache();
    const build = vi.fn(makeIndex);

    const first = await cache.getOrBuild(KEY, build);
    const second = await cache.getOrBuild(KEY, build);

    expect(build).toHaveBeenCalledTimes(2);
    expect(first).not.toBe(second);
  });

  it("in-memory cache shares one build across concurrent callers", async () => {
    const cache = new InMemoryIndexCache();
    const build = vi.fn(makeIndex);

    const [first, second] = await Promise.all([cache.getOrBuild(KEY, build), cache.getOrBuild(KEY, build)]);

    expect(build).toHaveBeenCalledTimes(1);
    expect(first).toBe(second);
    expect(cache.size).toBe(1);
  });

  it("keys entries by user, policy type and document", async () => {
    const cache = new InMemoryIndexCache();
    const build = vi.fn(makeIndex);

    await cache.getOrBuild(KEY, build);
    await cache.getOrBuild({ ...KEY, userId: "alice" }, build);
    await cache.getOrBuild({ ...KEY, documentId: "auto_policy_1.md" }, build);

    expect(build).toHaveBeenCalledTimes(3);
    expect(indexCacheKeyToString(KEY)).toBe('["carol","auto","auto_policy_2.md"]');
  });

  it("evicts failed builds so the next caller retries", async () => {
    const cache = new InMemoryIndexCache();
    const failing = vi.fn().mockRejectedValue(new Error("embedding service down"));

    await expect(cache.getOrBuild(KEY, failing)).rejects.toThrow("embedding service down");
    expect(cache.size).toBe(0);

    const build = vi.fn(makeIndex);
    await cache.getOrBuild(KEY, build);
    expect(build).toHaveBeenCalledTimes(1);
  });

  it("replaces and invalidates whole entries", async () => {
    const cache = new InMemoryIndexCache();
    const original = await cache.getOrBuild(KEY, makeIndex);
    const replacement = await makeIndex();

    cache.replace(KEY, replacement);
    const afterReplace = await cache.getOrBuild(KEY, vi.fn(makeIndex));

    expect(afterReplace).toBe(replacement);
    expect(afterReplace).not.toBe(original);
    expect(original.ready).toBe(true);
    expect(cache.invalidate(KEY)).toBe(true);
    expect(cache.invalidate(KEY)).toBe(false);
  });
});
