import { describe, expect, it } from "vitest";
import {
  DEFAULT_CLAUSE_CATEGORY_RULES,
  POLICY_HEADER_SECTION,
  chunkPolicyDocument,
  classifyClause,
  extendClauseCategoryRules,
  inferPolicyType
} from "../../src/modules/policies/chunker.js";

const SAMPLE_POLICY = [
  "Policy number: T-1",
  "",
  "## Definitions",
  "Words mean things.",
  "",
  "## Part D - Physical Damage Coverage",
  "Intro text.",
  "",
  "### Collision",
  "We will pay for collision loss.",
  "",
  "### Exclusions",
  "Racing is excluded.",
  "",
  "## General Provisions",
  "We do not cover war."
].join("\n");

describe("modules/policies/chunker", () => {
  it("splits on top-level and sub-level headings with hierarchical section names", () => {
    const chunks = chunkPolicyDocument(SAMPLE_POLICY, { sourceDocument: "auto_policy_test.md" });

    expect(chunks.map((chunk) => [chunk.section_name, chunk.clause_category])).toEqual([
      [POLICY_HEADER_SECTION, "general"],
      ["Definitions", "general"],
      ["Part D - Physical Damage Coverage", "coverage"],
      ["Part D - Physical Damage Coverage - Collision", "coverage"],
      ["Part D - Physical Damage Coverage - Exclusions", "exclusion"],
      ["General Provisions", "exclusion"]
    ]);
    expect(chunks.map((chunk) => chunk.text)).toEqual([
      "Policy number: T-1",
      "## Definitions\nWords mean things.",
      "## Part D - Physical Damage Coverage\nIntro text.",
      "### Collision\nWe will pay for collision loss.",
      "### Exclusions\nRacing is excluded.",
      "## General Provisions\nWe do not cover war."
    ]);
    expect(new Set(chunks.map((chunk) => chunk.policy_type))).toEqual(new Set(["auto"]));
    expect(new Set(chunks.map((chunk) => chunk.source_document))).toEqual(new Set(["auto_policy_test.md"]));
  });

  it("maps every heading to exactly one chunk", () => {
    const chunks = chunkPolicyDocument(SAMPLE_POLICY, { sourceDocument: "doc.md" });
    const headingLines = SAMPLE_POLICY.split("\n").filter((line) => line.startsWith("## ") || line.startsWith("### "));

    for (const heading of headingLines) {
      expect(chunks.filter((chunk) => chunk.text.split("\n")[0] === heading)).toHaveLength(1);
    }
    expect(chunks.every((chunk) => chunk.text.length > 0)).toBe(true);
  });

  it("skips a blank header and normalises CRLF line endings", () => {
    const chunks = chunkPolicyDocument("## Theft\r\nWe cover theft.\r\n", { sourceDocument: "home.md" });

    expect(chunks).toEqual([
      {
        text: "## Theft\nWe cover theft.",
        policy_type: "property",
        source_document: "home.md",
        section_name: "Theft",
        clause_category: "coverage"
      }
    ]);
  });

  it("returns one general chunk for text without headings and none for whitespace", () => {
    expect(chunkPolicyDocument("Plain text\nwith two lines", { sourceDocument: "x.md" })).toEqual([
      {
        text: "Plain text\nwith two lines",
        policy_type: "property",
        source_document: "x.md",
        section_name: POLICY_HEADER_SECTION,
        clause_category: "general"
      }
    ]);
    expect(chunkPolicyDocument("  \n\t\n", { sourceDocument: "x.md" })).toEqual([]);
  });

  it("uses the caller's policy type over the identifier", () => {
    const [chunk] = chunkPolicyDocument("## A\nText", { sourceDocument: "auto.md", policyType: "property" });

    expect(chunk?.policy_type).toBe("property");
  });

  it("names sections with empty headings", () => {
    const chunks = chunkPolicyDocument("## \nIntro\n### \nBody", { sourceDocument: "x.md" });

    expect(chunks.map((chunk) => chunk.section_name)).toEqual(["Unknown Section", "Unknown Section - Unknown Subsection"]);
  });

  describe("classifyClause", () => {
    it("checks heading exclusion before heading coverage", () => {
      expect(classifyClause("Coverage Exclusions", "We will pay")).toBe("exclusion");
    });

    it("checks the heading before the body", () => {
      expect(classifyClause("Collision Coverage", "This is not covered")).toBe("coverage");
    });

    it("checks body exclusion before body coverage", () => {
      expect(classifyClause("Terms", "We will pay unless the loss is excluded")).toBe("exclusion");
    });

    it("matches case-insensitively and falls back to general", () => {
      expect(classifyClause("Limits", "WE COVER towing")).toBe("coverage");
      expect(classifyClause("Limits", "Amounts are in dollars")).toBe("general");
    });

    it("accepts extended rule sets", () => {
      const rules = extendClauseCategoryRules(DEFAULT_CLAUSE_CATEGORY_RULES, {
        bodyExclusionPhrases: ["does not apply"]
      });

      expect(classifyClause("Limits", "This does not apply to rentals", rules)).toBe("exclusion");
      expect(classifyClause("Limits", "This does not apply to rentals")).toBe("general");
      expect(rules.headingCoverageKeywords).toEqual(DEFAULT_CLAUSE_CATEGORY_RULES.headingCoverageKeywords);
    });
  });

  it("infers the policy type from the identifier", () => {
    expect(inferPolicyType("AUTO_policy_2.md")).toBe("auto");
    expect(inferPolicyType("property_policy_1.md")).toBe("property");
    expect(inferPolicyType("homeowners.md")).toBe("property");
  });
});
