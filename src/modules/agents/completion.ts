import type { z } from "zod";
import { getOpenAIClient, type ChatCompletionResponse } from "../../clients/openai.js";
import { logDebug, logWarn, type CorrelationContext } from "../../observability/logger.js";
import { recordModelLatency, recordModelUsage, recordServiceFallback } from "../../observability/metrics.js";
import { decodeStructuredOutput, malformed, type DecodeResult } from "./structured-output.js";

export interface StructuredCompletionInput<Schema extends z.ZodTypeAny> {
  service: string;
  model: string;
  systemPrompt: string;
  userPrompt: string;
  schema: Schema;
  temperature?: number;
  maxTokens?: number;
  context?: CorrelationContext;
}

export interface CompletionDependencies {
  now?: () => number;
  getOpenAIClient?: typeof getOpenAIClient;
  logDebug?: typeof logDebug;
  logWarn?: typeof logWarn;
  recordModelLatency?: typeof recordModelLatency;
  recordModelUsage?: typeof recordModelUsage;
  recordServiceFallback?: typeof recordServiceFallback;
}

export const resolveCompletionDependencies = (dependencies?: CompletionDependencies) => ({
  now: dependencies?.now ?? Date.now,
  getOpenAIClient: dependencies?.getOpenAIClient ?? getOpenAIClient,
  logDebug: dependencies?.logDebug ?? logDebug,
  logWarn: dependencies?.logWarn ?? logWarn,
  recordModelLatency: dependencies?.recordModelLatency ?? recordModelLatency,
  recordModelUsage: dependencies?.recordModelUsage ?? recordModelUsage,
  recordServiceFallback: dependencies?.recordServiceFallback ?? recordServiceFallback
});

/**
 * One JSON-mode chat completion decoded against `schema`. Transport failures come
 * back as malformed results, so callers only ever branch on the tag.
 */
export const requestStructuredCompletion = async <Schema extends z.ZodTypeAny>(
  input: StructuredCompletionInput<Schema>,
  dependencies?: CompletionDependencies
): Promise<DecodeResult<z.output<Schema>>> => {
  const resolved = resolveCompletionDependencies(dependencies);
  const context = input.context ?? {};
  const startedAt = resolved.now();

  let response: ChatCompletionResponse;
  try {
    const { client } = await resolved.getOpenAIClient();
    response = await client.chat.completions.create({
      model: input.model,
      temperature: input.temperature ?? 0.1,
      max_tokens: input.maxTokens,
      response_format: { type: "json_object" },
      messages: [
        { role: "system", content: input.systemPrompt },
        { role: "user", content: input.userPrompt }
      ]
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown model error";
    resolved.recordServiceFallback(input.service);
    resolved.logWarn(`agents.${input.service}.request_failed`, context, {
      model: input.model,
      latency_ms: resolved.now() - startedAt,
      error: message
    });
    return malformed("", `request failed: ${message}`);
  }

  const latencyMs = resolved.now() - startedAt;
  resolved.recordModelLatency(latencyMs);
  resolved.recordModelUsage({
    promptTokens: response.usage?.prompt_tokens,
    completionTokens: response.usage?.completion_tokens,
    totalTokens: response.usage?.total_tokens
  });

  const decoded = decodeStructuredOutput(response.choices?.[0]?.message?.content, input.schema);
  if (decoded.status === "malformed") {
    resolved.recordServiceFallback(input.service);
    resolved.logWarn(`agents.${input.service}.malformed_output`, context, {
      model: input.model,
      latency_ms: latencyMs,
      reason: decoded.reason,
      raw_length: decoded.raw.length
    });
    return decoded;
  }

  resolved.logDebug(`agents.${input.service}.complete`, context, {
    model: input.model,
    latency_ms: latencyMs
  });
  return decoded;
};
