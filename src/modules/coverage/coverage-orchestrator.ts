import { logError, logInfo, logTrace, logWarn, serializeError } from "../../observability/logger.js";
import { recordErrorRate, recordPipelineLatency, recordPipelineOutcome } from "../../observability/metrics.js";
import type { AnswerSynthesizer } from "../agents/answer-synthesizer.js";
import type { PolicySelector } from "../agents/policy-selector.js";
import { UNCERTAIN_SCENARIO, scenarioOrUncertain, type ScenarioInterpreter } from "../agents/scenario-interpreter.js";
import type { ScenarioDetails } from "../agents/types.js";
import type { PolicyType } from "../policies/types.js";
import { listAvailablePolicyTypes } from "../policies/user-directory.js";
import type { RetrievalEngine } from "../rag/retriever.js";
import type { RetrievalResult } from "../rag/types.js";
import {
  CLARIFICATION_EXPLANATION,
  COVERAGE_DISCLAIMER,
  EMPTY_RESULT_EXPLANATION,
  NO_POLICY_EXPLANATION,
  SAFE_FAILURE_EXPLANATION,
  SYNTHESIS_FALLBACK_EXPLANATION
} from "./messages.js";
import type { CoverageQuestion, PipelineResponse, PipelineStage, PolicyApplied } from "./types.js";

const MAX_POLICY_REFERENCES = 5;

const capitalize = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1);

export const determinePolicyApplied = (chunks: readonly RetrievalResult[]): PolicyApplied => {
  const types = new Set(chunks.map((chunk) => chunk.policy_type));
  if (types.has("auto") && types.has("property")) {
    return "Both Auto & Property";
  }
  if (types.has("auto")) {
    return "Auto";
  }
  if (types.has("property")) {
    return "Property";
  }
  return "Unknown";
};

/** `"{Type} Policy - {section}"` for the best five chunks, first occurrence wins. */
export const extractPolicyReferences = (chunks: readonly RetrievalResult[]): string[] =>
  Array.from(
    new Set(
      chunks
        .slice(0, MAX_POLICY_REFERENCES)
        .map((chunk) => `${capitalize(chunk.policy_type)} Policy - ${chunk.section_name}`)
    )
  );

export const buildNoPolicyResponse = (userId: string): PipelineResponse => ({
  selected_user: userId,
  policy_applied: "Unknown",
  coverage_result: "ItDepends",
  explanation: NO_POLICY_EXPLANATION,
  policy_references: [],
  disclaimer: COVERAGE_DISCLAIMER,
  needs_clarification: false,
  clarification_question: null,
  scenario_details: null,
  retrieved_chunks: [],
  terminal_state: "no_policy",
  trace: ["No policy on file: nothing to search"]
});

const describeScenario = (scenario: ScenarioDetails): string =>
  `asset=${scenario.asset}, event=${scenario.event}, location=${scenario.location} ` +
  `(${scenario.policy_type_guess}, ${scenario.confidence} confidence)`;

const describeTypes = (types: readonly PolicyType[]): string => types.map(capitalize).join(", ");

export interface CoverageOrchestratorDependencies {
  interpreter: ScenarioInterpreter;
  selector: Pick<PolicySelector, "select">;
  retrieval: Pick<RetrievalEngine, "retrieve">;
  synthesizer: AnswerSynthesizer;
  now?: () => number;
  logInfo?: typeof logInfo;
  logTrace?: typeof logTrace;
  logWarn?: typeof logWarn;
  logError?: typeof logError;
  recordPipelineLatency?: typeof recordPipelineLatency;
  recordPipelineOutcome?: typeof recordPipelineOutcome;
  recordErrorRate?: typeof recordErrorRate;
}

const resolveDependencies = (dependencies: CoverageOrchestratorDependencies) => ({
  ...dependencies,
  now: dependencies.now ?? Date.now,
  logInfo: dependencies.logInfo ?? logInfo,
  logTrace: dependencies.logTrace ?? logTrace,
  logWarn: dependencies.logWarn ?? logWarn,
  logError: dependencies.logError ?? logError,
  recordPipelineLatency: dependencies.recordPipelineLatency ?? recordPipelineLatency,
  recordPipelineOutcome: dependencies.recordPipelineOutcome ?? recordPipelineOutcome,
  recordErrorRate: dependencies.recordErrorRate ?? recordErrorRate
});

/**
 * Runs one coverage question through interpretation, policy selection, retrieval and
 * synthesis. Holds no per-request state; every call returns a complete response.
 */
export class CoverageOrchestrator {
  private readonly dependencies: ReturnType<typeof resolveDependencies>;

  constructor(dependencies: CoverageOrchestratorDependencies) {
    this.dependencies = resolveDependencies(dependencies);
  }

  async run(input: CoverageQuestion): Promise<PipelineResponse> {
    const deps = this.dependencies;
    const startedAt = deps.now();
    const context = { requestId: input.requestId ?? null, userId: input.userId };
    const question = input.question.trim();
    const trace: string[] = [];
    let stage: PipelineStage = "interpreting";
    let scenario: ScenarioDetails | null = null;

    const enter = (nextStage: PipelineStage, line: string, fields: Record<string, unknown> = {}): void => {
      stage = nextStage;
      trace.push(line);
      deps.logTrace("coverage.pipeline.stage", context, { stage: nextStage, ...fields });
    };

    const finish = (response: Omit<PipelineResponse, "selected_user" | "disclaimer" | "trace">): PipelineResponse => {
      const latencyMs = deps.now() - startedAt;
      deps.recordPipelineLatency(latencyMs);
      deps.recordPipelineOutcome(response.terminal_state);
      deps.logInfo("coverage.pipeline.complete", context, {
        terminal_state: response.terminal_state,
        coverage_result: response.coverage_result,
        policy_applied: response.policy_applied,
        chunk_count: response.retrieved_chunks.length,
        latency_ms: latencyMs
      });
      return { selected_user: input.userId, disclaimer: COVERAGE_DISCLAIMER, trace, ...response };
    };

    try {
      scenario = await this.interpret(question, context);
      enter("interpreting", `Interpreting: ${describeScenario(scenario)}`);

      stage = "selecting";
      const availableTypes = listAvailablePolicyTypes(input.userPolicies);
      const selection = await deps.selector.select(question, availableTypes, context);
      enter(
        "selecting",
        `Selecting: classification=${selection.classification.classification} ` +
          `(${selection.classification.confidence}); querying ${describeTypes(selection.policies_to_query)}`,
        { policies_to_query: selection.policies_to_query }
      );

      if (selection.needs_clarification) {
        enter("clarification_needed", `Clarification needed: ${selection.clarification_question ?? ""}`);
        return finish({
          policy_applied: "Unknown",
          coverage_result: "ItDepends",
          explanation: CLARIFICATION_EXPLANATION,
          policy_references: [],
          needs_clarification: true,
          clarification_question: selection.clarification_question,
          scenario_details: scenario,
          retrieved_chunks: [],
          terminal_state: "clarification_needed"
        });
      }

      enter("retrieving", `Retrieving: searching ${describeTypes(selection.policies_to_query)} policy documents`);
      const chunks = await deps.retrieval.retrieve({
        userId: input.userId,
        question,
        userPolicies: input.userPolicies,
        policyTypes: selection.policies_to_query,
        scenario,
        topK: input.topK,
        requestId: input.requestId
      });

      if (chunks.length === 0) {
        enter("empty_result", "Empty result: no relevant policy sections found");
        return finish({
          policy_applied: "Unknown",
          coverage_result: "ItDepends",
          explanation: EMPTY_RESULT_EXPLANATION,
          policy_references: [],
          needs_clarification: false,
          clarification_question: null,
          scenario_details: scenario,
          retrieved_chunks: [],
          terminal_state: "empty_result"
        });
      }

      const policyApplied = determinePolicyApplied(chunks);
      const policyReferences = extractPolicyReferences(chunks);
      enter("synthesizing", `Synthesizing: ${chunks.length} chunks, policy applied ${policyApplied}`, {
        chunk_count: chunks.length
      });
      const synthesis = await deps.synthesizer.synthesize({
        question,
        chunks,
        policyApplied,
        scenario,
        context
      });

      const verdict =
        synthesis.status === "ok"
          ? synthesis.value
          : { coverage_result: "ItDepends" as const, explanation: SYNTHESIS_FALLBACK_EXPLANATION };
      enter(
        "done",
        synthesis.status === "ok"
          ? `Done: coverage_result=${verdict.coverage_result}`
          : `Done: synthesis output unusable (${synthesis.reason}); using fallback verdict`
      );

      return finish({
        policy_applied: policyApplied,
        coverage_result: verdict.coverage_result,
        explanation: verdict.explanation,
        policy_references: policyReferences,
        needs_clarification: false,
        clarification_question: null,
        scenario_details: scenario,
        retrieved_chunks: chunks,
        terminal_state: "done"
      });
    } catch (error) {
      const failedStage = stage;
      deps.recordErrorRate("coverage_pipeline_error");
      deps.logError("coverage.pipeline.error", context, {
        failed_stage: failedStage,
        ...serializeError(error)
      });
      const errorName = error instanceof Error ? error.name : "UnknownError";
      enter("failed", `Failed while ${failedStage}: ${errorName}`);
      return finish({
        policy_applied: "Unknown",
        coverage_result: "ItDepends",
        explanation: SAFE_FAILURE_EXPLANATION,
        policy_references: [],
        needs_clarification: false,
        clarification_question: null,
        scenario_details: scenario,
        retrieved_chunks: [],
        terminal_state: "failed"
      });
    }
  }

  private async interpret(
    question: string,
    context: { requestId: string | null; userId: string }
  ): Promise<ScenarioDetails> {
    try {
      return scenarioOrUncertain(await this.dependencies.interpreter.interpret(question, context));
    } catch (error) {
      this.dependencies.logWarn("coverage.pipeline.interpret_failed", context, serializeError(error));
      return UNCERTAIN_SCENARIO;
    }
  }
}
