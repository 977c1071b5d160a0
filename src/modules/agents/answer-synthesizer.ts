import { z } from "zod";
import type { CorrelationContext } from "../../observability/logger.js";
import { ANSWER_SYNTHESIS_SYSTEM_PROMPT, buildAnswerSynthesisUserPrompt } from "../../prompts/index.js";
import type { RetrievalResult } from "../rag/types.js";
import { requestStructuredCompletion, type CompletionDependencies } from "./completion.js";
import type { DecodeResult } from "./structured-output.js";
import type { CoverageResult, ScenarioDetails, SynthesisOutput } from "./types.js";

const COVERAGE_RESULTS: ReadonlyMap<string, CoverageResult> = new Map<string, CoverageResult>([
  ["yes", "Yes"],
  ["no", "No"],
  ["itdepends", "ItDepends"]
]);

/** Accepts "Yes", "no", "It depends", "it_depends" and similar spellings. */
export const coverageResultSchema = z.string().transform((value, ctx): CoverageResult => {
  const normalized = COVERAGE_RESULTS.get(value.toLowerCase().replace(/[^a-z]/g, ""));
  if (!normalized) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown coverage_result "${value}"` });
    return z.NEVER;
  }
  return normalized;
});

export const synthesisSchema = z.object({
  coverage_result: coverageResultSchema,
  explanation: z.string().trim().min(1)
});

export interface SynthesisInput {
  question: string;
  chunks: readonly RetrievalResult[];
  policyApplied: string;
  scenario?: ScenarioDetails;
  context?: CorrelationContext;
}

export interface AnswerSynthesizer {
  synthesize(input: SynthesisInput): Promise<DecodeResult<SynthesisOutput>>;
}

const summarizeScenario = (scenario: ScenarioDetails | undefined): string | undefined => {
  if (!scenario) {
    return undefined;
  }
  return `asset=${scenario.asset}, event=${scenario.event}, location=${scenario.location}`;
};

export class OpenAIAnswerSynthesizer implements AnswerSynthesizer {
  constructor(
    private readonly model: string,
    private readonly dependencies?: CompletionDependencies
  ) {}

  synthesize(input: SynthesisInput): Promise<DecodeResult<SynthesisOutput>> {
    return requestStructuredCompletion(
      {
        service: "answer_synthesizer",
        model: this.model,
        systemPrompt: ANSWER_SYNTHESIS_SYSTEM_PROMPT,
        userPrompt: buildAnswerSynthesisUserPrompt({
          question: input.question,
          chunks: input.chunks,
          policyApplied: input.policyApplied,
          scenarioSummary: summarizeScenario(input.scenario)
        }),
        schema: synthesisSchema,
        temperature: 0.2,
        maxTokens: 1500,
        context: input.context
      },
      this.dependencies
    );
  }
}
