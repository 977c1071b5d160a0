import type { z } from "zod";

export type DecodeResult<T> =
  | { status: "ok"; value: T }
  | { status: "malformed"; raw: string; reason: string };

export const ok = <T>(value: T): DecodeResult<T> => ({ status: "ok", value });

export const malformed = <T>(raw: string, reason: string): DecodeResult<T> => ({
  status: "malformed",
  raw,
  reason
});

export const normalizeCompletionContent = (value: unknown): string => {
  if (typeof value === "string") {
    return value;
  }

  if (Array.isArray(value)) {
    return value
      .map((part: unknown) => {
        if (typeof part === "string") {
          return part;
        }
        if (part && typeof part === "object" && "text" in part && typeof part.text === "string") {
          return part.text;
        }
        return "";
      })
      .join("");
  }

  return "";
};

/** zod preprocess step for enum-like fields models tend to capitalise. */
export const lowerCasedString = (value: unknown): unknown =>
  typeof value === "string" ? value.trim().toLowerCase() : value;

const REASONING_BLOCK = /<think>[\s\S]*?<\/think>/gi;
const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Pulls the JSON object out of a model reply: drops reasoning blocks, prefers a
 * fenced block, and otherwise takes the outermost braces.
 */
export const extractJsonPayload = (content: string): string => {
  const withoutReasoning = content.replace(REASONING_BLOCK, "").trim();
  const fenced = FENCED_BLOCK.exec(withoutReasoning);
  const candidate = fenced?.[1] !== undefined ? fenced[1].trim() : withoutReasoning;

  if (candidate.startsWith("{")) {
    return candidate;
  }
  const start = candidate.indexOf("{");
  const end = candidate.lastIndexOf("}");
  if (start >= 0 && end > start) {
    return candidate.slice(start, end + 1);
  }
  return candidate;
};

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`).join("; ");

export const decodeStructuredOutput = <Schema extends z.ZodTypeAny>(
  rawContent: unknown,
  schema: Schema
): DecodeResult<z.output<Schema>> => {
  const raw = normalizeCompletionContent(rawContent);
  if (raw.trim().length === 0) {
    return malformed(raw, "empty content");
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(extractJsonPayload(raw));
  } catch (error) {
    const message = error instanceof Error ? error.message : "invalid json";
    return malformed(raw, `invalid JSON: ${message}`);
  }

  const parsed = schema.safeParse(parsedJson);
  if (!parsed.success) {
    return malformed(raw, `schema validation failed: ${describeIssues(parsed.error)}`);
  }
  return ok(parsed.data);
};
