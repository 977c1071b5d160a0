import { describe, expect, it, vi } from "vitest";
import type { IntentClassifier } from "../../src/modules/agents/intent-classifier.js";
import {
  NoPolicyAvailableError,
  PolicySelector,
  buildClarificationQuestion,
  resolveSelection
} from "../../src/modules/agents/policy-selector.js";
import type { ClassificationResult } from "../../src/modules/agents/types.js";
import type { PolicyType } from "../../src/modules/policies/types.js";

const classified = (classification: string): ClassificationResult => ({
  classification,
  confidence: "medium",
  reasoning: "test"
});

const makeClassifier = (classification: string | null): IntentClassifier => ({
  classify: vi.fn(async () =>
    classification === null
      ? { status: "malformed" as const, raw: "???", reason: "invalid JSON: Unexpected token" }
      : { status: "ok" as const, value: classified(classification) }
  )
});

describe("modules/agents/policy-selector", () => {
  it("never invokes the classifier for a single-policy user", async () => {
    const classifier = makeClassifier("property");
    const selector = new PolicySelector({ classifier, logDebug: vi.fn() });

    const selection = await selector.select("Is my roof covered?", ["auto"]);

    expect(selection.policies_to_query).toEqual(["auto"]);
    expect(selection.needs_clarification).toBe(false);
    expect(selection.classification).toEqual({
      classification: "auto",
      confidence: "high",
      reasoning: "User only has Auto policy"
    });
    expect(classifier.classify).not.toHaveBeenCalled();
  });

  it("selects the property policy for a house fire question", async () => {
    const classifier = makeClassifier("property");
    const selector = new PolicySelector({ classifier, logDebug: vi.fn() });

    const selection = await selector.select("What if my house catches fire?", ["auto", "property"], {
      requestId: "req-1"
    });

    expect(selection.policies_to_query).toEqual(["property"]);
    expect(selection.needs_clarification).toBe(false);
    expect(classifier.classify).toHaveBeenCalledWith("What if my house catches fire?", { requestId: "req-1" });
  });

  it("asks for clarification on an ambiguous flood question", async () => {
    const selector = new PolicySelector({ classifier: makeClassifier("ambiguous"), logDebug: vi.fn() });

    const selection = await selector.select("Is flood damage covered?", ["auto", "property"]);

    expect(selection.policies_to_query).toEqual(["auto", "property"]);
    expect(selection.needs_clarification).toBe(true);
    expect(selection.clarification_question).toContain("Auto");
    expect(selection.clarification_question).toContain("Property");
  });

  it("treats malformed classifier output as ambiguous", async () => {
    const selector = new PolicySelector({ classifier: makeClassifier(null), logDebug: vi.fn() });

    const selection = await selector.select("Hmm?", ["auto", "property"]);

    expect(selection.needs_clarification).toBe(true);
    expect(selection.classification.classification).toBe("ambiguous");
  });

  it("rejects an empty policy set", async () => {
    const selector = new PolicySelector({ classifier: makeClassifier("auto"), logDebug: vi.fn() });

    await expect(selector.select("q", [])).rejects.toThrowError(NoPolicyAvailableError);
    expect(() => resolveSelection([], classified("auto"))).toThrowError(NoPolicyAvailableError);
  });

  describe("resolveSelection", () => {
    const both: PolicyType[] = ["auto", "property"];

    it("degrades to every available type when the named type is missing", () => {
      expect(resolveSelection(["property"], classified("auto")).policies_to_query).toEqual(["property"]);
      expect(resolveSelection(["auto"], classified("property")).policies_to_query).toEqual(["auto"]);
    });

    it("selects everything for both without clarification", () => {
      expect(resolveSelection(both, classified("both"))).toMatchObject({
        policies_to_query: both,
        needs_clarification: false,
        clarification_question: null
      });
    });

    it("never returns an empty selection and gates clarification on multiple types", () => {
      const labels = ["auto", "property", "both", "ambiguous", "", "boat", "AUTO", "  property "];
      const typeSets: PolicyType[][] = [["auto"], ["property"], both];

      for (const label of labels) {
        for (const available of typeSets) {
          const selection = resolveSelection(available, classified(label));
          const recognised = ["auto", "property", "both"].includes(label.trim().toLowerCase());

          expect(selection.policies_to_query.length).toBeGreaterThan(0);
          expect(selection.needs_clarification).toBe(!recognised && available.length > 1);
        }
      }
    });

    it("does not mutate its input", () => {
      const available: PolicyType[] = ["auto", "property"];
      const selection = resolveSelection(available, classified("ambiguous"));

      expect(available).toEqual(["auto", "property"]);
      expect(selection.policies_to_query).not.toBe(available);
    });
  });

  it("builds the clarification question from the available types", () => {
    expect(buildClarificationQuestion(["auto", "property"])).toBe(
      "Your question could relate to either Auto or Property insurance. Are you asking about your vehicle or your home/property?"
    );
  });
});
