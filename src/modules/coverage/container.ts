import { getConfig, type Config } from "../../config/index.js";
import { OpenAIAnswerSynthesizer, type AnswerSynthesizer } from "../agents/answer-synthesizer.js";
import { OpenAIIntentClassifier, type IntentClassifier } from "../agents/intent-classifier.js";
import { PolicySelector } from "../agents/policy-selector.js";
import { OpenAIScenarioInterpreter, type ScenarioInterpreter } from "../agents/scenario-interpreter.js";
import { FileSystemPolicySource } from "../policies/policy-loader.js";
import type { ClauseCategoryRules, PolicyDocumentSource, UserPolicyDirectory } from "../policies/types.js";
import { loadUserDirectory } from "../policies/user-directory.js";
import { OpenAIEmbeddingProvider } from "../rag/embeddings.js";
import { InMemoryIndexCache, RequestScopedIndexCache, type IndexCache } from "../rag/index-cache.js";
import { RetrievalEngine } from "../rag/retriever.js";
import type { EmbeddingProvider } from "../rag/types.js";
import { CoverageOrchestrator } from "./coverage-orchestrator.js";

export interface CoverageServices {
  users: UserPolicyDirectory;
  orchestrator: CoverageOrchestrator;
  indexCache: IndexCache;
}

/** What a request handler needs: who the user is, and the pipeline to run. */
export interface CoverageRequestServices {
  users: UserPolicyDirectory;
  orchestrator: Pick<CoverageOrchestrator, "run">;
}

export interface CoverageServiceOverrides {
  users?: UserPolicyDirectory;
  documents?: PolicyDocumentSource;
  embeddings?: EmbeddingProvider;
  indexCache?: IndexCache;
  clauseRules?: ClauseCategoryRules;
  classifier?: IntentClassifier;
  interpreter?: ScenarioInterpreter;
  synthesizer?: AnswerSynthesizer;
}

/** Wires every collaborator of the coverage pipeline from configuration. */
export async function createCoverageServices(
  config: Config,
  overrides: CoverageServiceOverrides = {}
): Promise<CoverageServices> {
  const users = overrides.users ?? (await loadUserDirectory({ filePath: config.USERS_FILE }));
  const documents = overrides.documents ?? new FileSystemPolicySource({ directory: config.POLICIES_DIR });
  const embeddings = overrides.embeddings ?? new OpenAIEmbeddingProvider(config.EMBEDDING_MODEL);
  const indexCache =
    overrides.indexCache ?? (config.INDEX_CACHE_ENABLED ? new InMemoryIndexCache() : new RequestScopedIndexCache());

  const retrieval = new RetrievalEngine({
    embeddings,
    documents,
    indexCache,
    clauseRules: overrides.clauseRules,
    defaultTopK: config.RETRIEVAL_TOP_K
  });
  const selector = new PolicySelector({
    classifier: overrides.classifier ?? new OpenAIIntentClassifier(config.OPENAI_CLASSIFIER_MODEL)
  });
  const orchestrator = new CoverageOrchestrator({
    interpreter: overrides.interpreter ?? new OpenAIScenarioInterpreter(config.OPENAI_INTERPRETER_MODEL),
    selector,
    retrieval,
    synthesizer: overrides.synthesizer ?? new OpenAIAnswerSynthesizer(config.OPENAI_SYNTHESIS_MODEL)
  });

  return { users, orchestrator, indexCache };
}

let shared: Promise<CoverageServices> | null = null;

export function getCoverageServices(): Promise<CoverageServices> {
  if (!shared) {
    const pending = createCoverageServices(getConfig());
    shared = pending;
    void pending.catch(() => {
      if (shared === pending) {
        shared = null;
      }
    });
  }
  return shared;
}

export function resetCoverageServicesForTests(): void {
  shared = null;
}
