import { logDebug, type CorrelationContext } from "../../observability/logger.js";
import type { PolicyType } from "../policies/types.js";
import { classificationOrDefault, type IntentClassifier } from "./intent-classifier.js";
import type { ClassificationResult, SelectionResult } from "./types.js";

export class NoPolicyAvailableError extends Error {
  constructor(message = "Policy selection requires at least one available policy type.") {
    super(message);
    this.name = "NoPolicyAvailableError";
  }
}

const capitalize = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1);

export const buildClarificationQuestion = (availableTypes: readonly PolicyType[]): string =>
  `Your question could relate to either ${availableTypes.map(capitalize).join(" or ")} insurance. ` +
  "Are you asking about your vehicle or your home/property?";

export const singleTypeClassification = (policyType: PolicyType): ClassificationResult => ({
  classification: policyType,
  confidence: "high",
  reasoning: `User only has ${capitalize(policyType)} policy`
});

const dedupe = (types: readonly PolicyType[]): PolicyType[] => Array.from(new Set(types));

/**
 * Decides which policy types to search for a classified question. Unrecognised labels
 * fall through to the ambiguous branch.
 */
export const resolveSelection = (
  availableTypes: readonly PolicyType[],
  classification: ClassificationResult
): SelectionResult => {
  const available = dedupe(availableTypes);
  if (available.length === 0) {
    throw new NoPolicyAvailableError();
  }

  const select = (policies: readonly PolicyType[], clarify = false): SelectionResult => ({
    policies_to_query: policies,
    needs_clarification: clarify,
    clarification_question: clarify ? buildClarificationQuestion(available) : null,
    classification
  });

  const label = classification.classification.trim().toLowerCase();
  switch (label) {
    case "auto":
    case "property":
      return available.includes(label) ? select([label]) : select(available);
    case "both":
      return select(available);
    default:
      return select(available, available.length > 1);
  }
};

export interface PolicySelectorDependencies {
  classifier: IntentClassifier;
  logDebug?: typeof logDebug;
}

export class PolicySelector {
  private readonly classifier: IntentClassifier;
  private readonly logDebug: typeof logDebug;

  constructor(dependencies: PolicySelectorDependencies) {
    this.classifier = dependencies.classifier;
    this.logDebug = dependencies.logDebug ?? logDebug;
  }

  async select(
    question: string,
    availableTypes: readonly PolicyType[],
    context: CorrelationContext = {}
  ): Promise<SelectionResult> {
    const available = dedupe(availableTypes);
    if (available.length === 0) {
      throw new NoPolicyAvailableError();
    }

    const [onlyType] = available;
    if (available.length === 1 && onlyType) {
      this.logDebug("agents.policy_selector.short_circuit", context, { policy_type: onlyType });
      return resolveSelection(available, singleTypeClassification(onlyType));
    }

    const classification = classificationOrDefault(await this.classifier.classify(question, context));
    const selection = resolveSelection(available, classification);
    this.logDebug("agents.policy_selector.selected", context, {
      classification: classification.classification,
      confidence: classification.confidence,
      policies_to_query: selection.policies_to_query,
      needs_clarification: selection.needs_clarification
    });
    return selection;
  }
}
