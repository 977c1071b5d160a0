import { z } from "zod";
import type { CorrelationContext } from "../../observability/logger.js";
import { INTENT_CLASSIFIER_SYSTEM_PROMPT, buildIntentClassifierUserPrompt } from "../../prompts/index.js";
import { requestStructuredCompletion, type CompletionDependencies } from "./completion.js";
import { lowerCasedString, type DecodeResult } from "./structured-output.js";
import type { ClassificationResult } from "./types.js";

export const confidenceSchema = z
  .preprocess(lowerCasedString, z.enum(["high", "medium", "low"]))
  .catch("low");

export const classificationSchema = z.object({
  classification: z.preprocess(lowerCasedString, z.string().min(1)),
  confidence: confidenceSchema,
  reasoning: z.string().catch("")
});

export const DEFAULT_CLASSIFICATION: ClassificationResult = Object.freeze({
  classification: "ambiguous",
  confidence: "low",
  reasoning: "Unable to parse classification response"
});

export interface IntentClassifier {
  classify(question: string, context?: CorrelationContext): Promise<DecodeResult<ClassificationResult>>;
}

export class OpenAIIntentClassifier implements IntentClassifier {
  constructor(
    private readonly model: string,
    private readonly dependencies?: CompletionDependencies
  ) {}

  classify(question: string, context?: CorrelationContext): Promise<DecodeResult<ClassificationResult>> {
    return requestStructuredCompletion(
      {
        service: "intent_classifier",
        model: this.model,
        systemPrompt: INTENT_CLASSIFIER_SYSTEM_PROMPT,
        userPrompt: buildIntentClassifierUserPrompt(question),
        schema: classificationSchema,
        temperature: 0.1,
        maxTokens: 300,
        context
      },
      this.dependencies
    );
  }
}

export const classificationOrDefault = (result: DecodeResult<ClassificationResult>): ClassificationResult =>
  result.status === "ok" ? result.value : DEFAULT_CLASSIFICATION;
