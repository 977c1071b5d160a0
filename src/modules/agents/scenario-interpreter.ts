import { z } from "zod";
import type { CorrelationContext } from "../../observability/logger.js";
import { SCENARIO_INTERPRETER_SYSTEM_PROMPT, buildScenarioInterpreterUserPrompt } from "../../prompts/index.js";
import { requestStructuredCompletion, type CompletionDependencies } from "./completion.js";
import { confidenceSchema } from "./intent-classifier.js";
import { lowerCasedString, type DecodeResult } from "./structured-output.js";
import type { ScenarioDetails } from "./types.js";

export const UNKNOWN = "unknown";

export const UNCERTAIN_SCENARIO: ScenarioDetails = Object.freeze({
  asset: UNKNOWN,
  event: UNKNOWN,
  location: UNKNOWN,
  policy_type_guess: "ambiguous",
  confidence: "low",
  reasoning: "Unable to parse interpretation response",
  needs_clarification: true
});

const scenarioFieldSchema = z.string().trim().min(1).catch(UNKNOWN);

const policyTypeGuessSchema = z
  .preprocess(lowerCasedString, z.enum(["auto", "property", "ambiguous"]))
  .catch("ambiguous");

const clarificationFlagSchema = z
  .preprocess((value) => {
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      return normalized === "true" ? true : normalized === "false" ? false : value;
    }
    return value;
  }, z.boolean())
  .catch(true);

export const scenarioSchema = z
  .object({
    asset: scenarioFieldSchema,
    event: scenarioFieldSchema,
    location: scenarioFieldSchema,
    policy_type: z.unknown().optional(),
    policy_type_guess: z.unknown().optional(),
    confidence: confidenceSchema,
    reasoning: z.string().catch(""),
    needs_clarification: clarificationFlagSchema
  })
  .transform(
    (value): ScenarioDetails => ({
      asset: value.asset,
      event: value.event,
      location: value.location,
      policy_type_guess: policyTypeGuessSchema.parse(value.policy_type_guess ?? value.policy_type),
      confidence: value.confidence,
      reasoning: value.reasoning,
      needs_clarification: value.needs_clarification
    })
  );

export interface ScenarioInterpreter {
  interpret(question: string, context?: CorrelationContext): Promise<DecodeResult<ScenarioDetails>>;
}

export class OpenAIScenarioInterpreter implements ScenarioInterpreter {
  constructor(
    private readonly model: string,
    private readonly dependencies?: CompletionDependencies
  ) {}

  interpret(question: string, context?: CorrelationContext): Promise<DecodeResult<ScenarioDetails>> {
    return requestStructuredCompletion(
      {
        service: "scenario_interpreter",
        model: this.model,
        systemPrompt: SCENARIO_INTERPRETER_SYSTEM_PROMPT,
        userPrompt: buildScenarioInterpreterUserPrompt(question),
        schema: scenarioSchema,
        temperature: 0.1,
        maxTokens: 400,
        context
      },
      this.dependencies
    );
  }
}

export const scenarioOrUncertain = (result: DecodeResult<ScenarioDetails>): ScenarioDetails =>
  result.status === "ok" ? result.value : UNCERTAIN_SCENARIO;
