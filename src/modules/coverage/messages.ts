export const COVERAGE_DISCLAIMER =
  "This information is for educational purposes only and does not constitute a coverage determination " +
  "or claim decision. Actual coverage depends on the specific facts and circumstances of your situation " +
  "and the complete terms and conditions of your policy. For official coverage determinations, please " +
  "contact your insurance company or agent.";

export const CLARIFICATION_EXPLANATION = "Please clarify your question to get a specific coverage answer.";

export const EMPTY_RESULT_EXPLANATION =
  "Could not find relevant policy information to answer your question. Please try rephrasing.";

export const SYNTHESIS_FALLBACK_EXPLANATION =
  "I'm having trouble analyzing your policy. Please contact your insurance agent for specific coverage details.";

export const NO_POLICY_EXPLANATION =
  "We couldn't find an auto or property policy on file for you, so there is nothing to check this question against. " +
  "Please contact your insurance agent.";

export const SAFE_FAILURE_EXPLANATION =
  "I couldn't complete this coverage check right now. Please try again later or contact your insurance agent.";
