export const POLICY_TYPES = ["auto", "property"] as const;

export type PolicyType = (typeof POLICY_TYPES)[number];

export type ClauseCategory = "coverage" | "exclusion" | "general";

export type Chunk = Readonly<{
  text: string;
  policy_type: PolicyType;
  source_document: string;
  section_name: string;
  clause_category: ClauseCategory;
}>;

/** Policy type → document identifier, for one user. */
export type UserPolicies = Readonly<Partial<Record<PolicyType, string>>>;

export type UserProfile = Readonly<{
  user_id: string;
  display_name: string;
  policies: UserPolicies;
}>;

export interface ClauseCategoryRules {
  headingExclusionKeywords: readonly string[];
  headingCoverageKeywords: readonly string[];
  bodyExclusionPhrases: readonly string[];
  bodyCoveragePhrases: readonly string[];
}

export interface PolicyDocumentSource {
  read(documentId: string): Promise<string>;
}

export interface UserPolicyDirectory {
  getUser(userId: string): Promise<UserProfile | null>;
  getUserPolicies(userId: string): Promise<UserPolicies | null>;
  listUsers(): Promise<UserProfile[]>;
}
