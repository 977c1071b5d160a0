import type { CoverageResult, ScenarioDetails } from "../agents/types.js";
import type { UserPolicies } from "../policies/types.js";
import type { RetrievalResult } from "../rag/types.js";

export type PolicyApplied = "Auto" | "Property" | "Both Auto & Property" | "Unknown";

export type PipelineStage =
  | "interpreting"
  | "selecting"
  | "clarification_needed"
  | "retrieving"
  | "empty_result"
  | "synthesizing"
  | "done"
  | "failed";

export type TerminalState = Extract<PipelineStage, "clarification_needed" | "empty_result" | "done" | "failed"> | "no_policy";

export type PipelineResponse = {
  selected_user: string;
  policy_applied: PolicyApplied;
  coverage_result: CoverageResult;
  explanation: string;
  policy_references: string[];
  disclaimer: string;
  needs_clarification: boolean;
  clarification_question: string | null;
  scenario_details: ScenarioDetails | null;
  retrieved_chunks: RetrievalResult[];
  terminal_state: TerminalState;
  trace: string[];
};

export type CoverageQuestion = {
  userId: string;
  question: string;
  userPolicies: UserPolicies;
  topK?: number;
  requestId?: string;
};
