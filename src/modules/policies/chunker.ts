import type { Chunk, ClauseCategory, ClauseCategoryRules, PolicyType } from "./types.js";

export const POLICY_HEADER_SECTION = "Policy Header";

const TOP_LEVEL_MARKER = "## ";
const SUB_LEVEL_MARKER = "### ";
const TOP_LEVEL_SPLIT = /^(?=## )/m;
const SUB_LEVEL_SPLIT = /^(?=### )/m;

export const DEFAULT_CLAUSE_CATEGORY_RULES: ClauseCategoryRules = Object.freeze({
  headingExclusionKeywords: ["exclusion", "not covered"],
  headingCoverageKeywords: ["coverage", "perils insured"],
  bodyExclusionPhrases: ["not covered", "we do not cover", "excluded", "exclusion"],
  bodyCoveragePhrases: ["we will pay", "we cover", "coverage includes"]
});

export const extendClauseCategoryRules = (
  base: ClauseCategoryRules,
  extra: Partial<ClauseCategoryRules>
): ClauseCategoryRules => ({
  headingExclusionKeywords: [...base.headingExclusionKeywords, ...(extra.headingExclusionKeywords ?? [])],
  headingCoverageKeywords: [...base.headingCoverageKeywords, ...(extra.headingCoverageKeywords ?? [])],
  bodyExclusionPhrases: [...base.bodyExclusionPhrases, ...(extra.bodyExclusionPhrases ?? [])],
  bodyCoveragePhrases: [...base.bodyCoveragePhrases, ...(extra.bodyCoveragePhrases ?? [])]
});

const containsAny = (haystack: string, needles: readonly string[]): boolean => {
  const lowered = haystack.toLowerCase();
  return needles.some((needle) => needle.length > 0 && lowered.includes(needle.toLowerCase()));
};

/**
 * First match wins: heading exclusion, heading coverage, body exclusion, body coverage.
 */
export const classifyClause = (
  heading: string,
  body: string,
  rules: ClauseCategoryRules = DEFAULT_CLAUSE_CATEGORY_RULES
): ClauseCategory => {
  if (containsAny(heading, rules.headingExclusionKeywords)) {
    return "exclusion";
  }
  if (containsAny(heading, rules.headingCoverageKeywords)) {
    return "coverage";
  }
  if (containsAny(body, rules.bodyExclusionPhrases)) {
    return "exclusion";
  }
  if (containsAny(body, rules.bodyCoveragePhrases)) {
    return "coverage";
  }
  return "general";
};

export const inferPolicyType = (sourceDocument: string): PolicyType =>
  sourceDocument.toLowerCase().includes("auto") ? "auto" : "property";

const headingTitle = (segment: string, marker: string, fallback: string): string => {
  const firstLine = segment.split("\n", 1)[0] ?? "";
  const title = firstLine.slice(marker.length).trim();
  return title.length > 0 ? title : fallback;
};

export interface ChunkPolicyDocumentOptions {
  sourceDocument: string;
  policyType?: PolicyType;
  rules?: ClauseCategoryRules;
}

/**
 * Splits a markdown-style policy on `## ` headings, then on `### ` sub-headings.
 * Every heading ends up in exactly one chunk; chunk text keeps its heading line.
 */
export function chunkPolicyDocument(rawText: string, options: ChunkPolicyDocumentOptions): Chunk[] {
  const text = rawText.replace(/\r\n?/g, "\n");
  const rules = options.rules ?? DEFAULT_CLAUSE_CATEGORY_RULES;
  const policyType = options.policyType ?? inferPolicyType(options.sourceDocument);
  const chunks: Chunk[] = [];

  const push = (chunkText: string, sectionName: string, category: ClauseCategory): void => {
    chunks.push(
      Object.freeze({
        text: chunkText,
        policy_type: policyType,
        source_document: options.sourceDocument,
        section_name: sectionName,
        clause_category: category
      })
    );
  };

  const segments = text.split(TOP_LEVEL_SPLIT);
  for (const segment of segments) {
    if (!segment.startsWith(TOP_LEVEL_MARKER)) {
      const header = segment.trim();
      if (header.length > 0) {
        push(header, POLICY_HEADER_SECTION, "general");
      }
      continue;
    }

    const sectionText = segment.trim();
    const sectionTitle = headingTitle(segment, TOP_LEVEL_MARKER, "Unknown Section");
    const parts = segment.split(SUB_LEVEL_SPLIT);

    if (parts.length === 1) {
      push(sectionText, sectionTitle, classifyClause(sectionTitle, sectionText, rules));
      continue;
    }

    const [intro, ...subsections] = parts;
    const introText = (intro ?? "").trim();
    push(introText, sectionTitle, classifyClause(sectionTitle, introText, rules));

    for (const subsection of subsections) {
      const subsectionText = subsection.trim();
      const sectionName = `${sectionTitle} - ${headingTitle(subsection, SUB_LEVEL_MARKER, "Unknown Subsection")}`;
      push(subsectionText, sectionName, classifyClause(sectionName, subsectionText, rules));
    }
  }

  return chunks;
}
