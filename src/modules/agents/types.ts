import type { PolicyType } from "../policies/types.js";

export type Confidence = "high" | "medium" | "low";

export type PolicyTypeGuess = PolicyType | "ambiguous";

export type ClassificationResult = Readonly<{
  classification: string;
  confidence: Confidence;
  reasoning: string;
}>;

export type ScenarioDetails = Readonly<{
  asset: string;
  event: string;
  location: string;
  policy_type_guess: PolicyTypeGuess;
  confidence: Confidence;
  reasoning: string;
  needs_clarification: boolean;
}>;

export type SelectionResult = Readonly<{
  policies_to_query: readonly PolicyType[];
  needs_clarification: boolean;
  clarification_question: string | null;
  classification: ClassificationResult;
}>;

export type CoverageResult = "Yes" | "No" | "ItDepends";

export type SynthesisOutput = Readonly<{
  coverage_result: CoverageResult;
  explanation: string;
}>;
