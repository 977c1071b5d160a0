import { logDebug, logInfo } from "../../observability/logger.js";
import { recordRetrievalLatency } from "../../observability/metrics.js";
import { loadPolicyChunks } from "../policies/policy-loader.js";
import type { ClauseCategory, ClauseCategoryRules, PolicyDocumentSource, PolicyType } from "../policies/types.js";
import { RequestScopedIndexCache, type IndexCache } from "./index-cache.js";
import type { EmbeddingProvider, RetrievalInput, RetrievalResult, ScenarioFields } from "./types.js";
import { buildVectorIndex } from "./vector-index.js";

export const DEFAULT_TOP_K = 5;
export const QUERY_PART_SEPARATOR = " | ";

const UNKNOWN_FIELD = "unknown";

export interface RetrievalEngineDependencies {
  embeddings: EmbeddingProvider;
  documents: PolicyDocumentSource;
  indexCache?: IndexCache;
  clauseRules?: ClauseCategoryRules;
  defaultTopK?: number;
  now?: () => number;
  logInfo?: typeof logInfo;
  logDebug?: typeof logDebug;
  recordRetrievalLatency?: typeof recordRetrievalLatency;
}

const resolveDependencies = (dependencies: RetrievalEngineDependencies) => ({
  embeddings: dependencies.embeddings,
  documents: dependencies.documents,
  indexCache: dependencies.indexCache ?? new RequestScopedIndexCache(),
  clauseRules: dependencies.clauseRules,
  defaultTopK: dependencies.defaultTopK ?? DEFAULT_TOP_K,
  now: dependencies.now ?? Date.now,
  logInfo: dependencies.logInfo ?? logInfo,
  logDebug: dependencies.logDebug ?? logDebug,
  recordRetrievalLatency: dependencies.recordRetrievalLatency ?? recordRetrievalLatency
});

const isInformative = (value: string | null | undefined): value is string => {
  if (typeof value !== "string") {
    return false;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 && trimmed.toLowerCase() !== UNKNOWN_FIELD;
};

/** The question followed by every known scenario field, e.g. `q | Asset: car | Event: theft`. */
export const buildEnhancedQuery = (question: string, scenario?: ScenarioFields): string => {
  const parts = [question.trim()];
  if (scenario) {
    if (isInformative(scenario.asset)) {
      parts.push(`Asset: ${scenario.asset.trim()}`);
    }
    if (isInformative(scenario.event)) {
      parts.push(`Event: ${scenario.event.trim()}`);
    }
    if (isInformative(scenario.location)) {
      parts.push(`Location: ${scenario.location.trim()}`);
    }
  }
  return parts.join(QUERY_PART_SEPARATOR);
};

/** Keeps the wanted clause categories; returns the input unchanged if that would leave nothing. */
export const filterByClauseCategory = (
  results: readonly RetrievalResult[],
  categories: readonly ClauseCategory[] | undefined
): RetrievalResult[] => {
  if (!categories || categories.length === 0) {
    return [...results];
  }
  const wanted = new Set(categories);
  const filtered = results.filter((result) => wanted.has(result.clause_category));
  return filtered.length > 0 ? filtered : [...results];
};

export const mergeRetrievalResults = (
  perTypeResults: ReadonlyArray<readonly RetrievalResult[]>,
  topK: number
): RetrievalResult[] => {
  if (topK <= 0) {
    return [];
  }
  // Array#sort is stable, so equal scores keep policy-type then rank order.
  return perTypeResults
    .flat()
    .sort((a, b) => b.similarity - a.similarity)
    .slice(0, topK);
};

const uniqueTypes = (types: readonly PolicyType[]): PolicyType[] => Array.from(new Set(types));

/**
 * Searches a user's own policy documents, one index per policy type, and merges the
 * hits by similarity.
 */
export class RetrievalEngine {
  private readonly dependencies: ReturnType<typeof resolveDependencies>;

  constructor(dependencies: RetrievalEngineDependencies) {
    this.dependencies = resolveDependencies(dependencies);
  }

  async retrieve(input: RetrievalInput): Promise<RetrievalResult[]> {
    const resolved = this.dependencies;
    const startedAt = resolved.now();
    const topK = Math.floor(input.topK ?? resolved.defaultTopK);
    const context = { requestId: input.requestId ?? null, userId: input.userId };

    const searchable = uniqueTypes(input.policyTypes).flatMap((policyType) => {
      const documentId = input.userPolicies[policyType];
      return documentId ? [{ policyType, documentId }] : [];
    });
    const skippedTypes = uniqueTypes(input.policyTypes).filter(
      (policyType) => !searchable.some((entry) => entry.policyType === policyType)
    );

    if (searchable.length === 0 || topK <= 0) {
      resolved.logInfo("rag.retrieve.skipped", context, {
        requested_types: input.policyTypes,
        skipped_types: skippedTypes,
        top_k: topK
      });
      return [];
    }

    const query = buildEnhancedQuery(input.question, input.scenario);
    resolved.logDebug("rag.retrieve.query", context, { enhanced_query: query });
    const queryVector = await resolved.embeddings.embed(query);

    const perTypeResults: RetrievalResult[][] = [];
    for (const { policyType, documentId } of searchable) {
      const index = await resolved.indexCache.getOrBuild(
        { userId: input.userId, policyType, documentId },
        async () => {
          const chunks = await loadPolicyChunks(resolved.documents, {
            documentId,
            policyType,
            rules: resolved.clauseRules
          });
          return buildVectorIndex(resolved.embeddings, chunks);
        }
      );
      perTypeResults.push(index.search(queryVector, topK));
    }

    const merged = mergeRetrievalResults(perTypeResults, topK);
    const results = filterByClauseCategory(merged, input.clauseCategories);
    const latencyMs = resolved.now() - startedAt;
    resolved.recordRetrievalLatency(latencyMs);

    resolved.logInfo("rag.retrieve.complete", context, {
      latency_ms: latencyMs,
      searched_types: searchable.map((entry) => entry.policyType),
      skipped_types: skippedTypes,
      candidate_count: perTypeResults.reduce((total, list) => total + list.length, 0),
      result_count: results.length,
      top_similarity: results[0]?.similarity ?? null
    });

    return results;
  }
}
