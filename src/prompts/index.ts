import type { RetrievalResult } from "../modules/rag/types.js";

export const INTENT_CLASSIFIER_SYSTEM_PROMPT = [
  "You route insurance coverage questions to the right policy.",
  "Decide whether a question concerns an auto policy, a property (home) policy, both, or is ambiguous.",
  "Return only valid JSON with the keys `classification`, `confidence` and `reasoning`."
].join(" ");

export const buildIntentClassifierUserPrompt = (question: string): string =>
  [
    "Question:",
    question,
    "",
    "Labels:",
    "- auto: vehicles, cars, motorcycles, collisions, vehicle theft or damage, traffic incidents.",
    "- property: houses, dwellings, roofs and other structures, belongings kept at home, damage to the home.",
    "- both: the user explicitly asks about all of their policies, e.g. \"any of my policies\" or \"which policy covers\".",
    "- ambiguous: the question could concern either policy and does not say which, e.g. \"is flood damage covered?\".",
    "",
    "Confidence is one of high, medium, low.",
    "Return JSON exactly like:",
    '{"classification":"auto","confidence":"high","reasoning":"Mentions a stolen car."}'
  ].join("\n");

export const SCENARIO_INTERPRETER_SYSTEM_PROMPT = [
  "You extract structured details from insurance coverage questions.",
  "Identify the insured asset, the event, and where it happened.",
  "Use \"unknown\" for anything the question does not state.",
  "Return only valid JSON."
].join(" ");

export const buildScenarioInterpreterUserPrompt = (question: string): string =>
  [
    "Question:",
    question,
    "",
    "Fields:",
    "- asset: what is insured (car, vehicle, house, roof, contents).",
    "- event: what happened or is being asked about (theft, fire, flood, collision, hail).",
    "- location: where it happened (highway, garage, driveway, inside the house), or \"unknown\".",
    "- policy_type: \"auto\" for vehicles, \"property\" for homes, \"ambiguous\" when it could be either.",
    "- confidence: high when every detail is explicit, medium when some are inferred, low when the question is vague.",
    "- needs_clarification: true when policy_type is ambiguous and confidence is not high.",
    "",
    "Return JSON exactly like:",
    '{"asset":"car","event":"theft","location":"unknown","policy_type":"auto","confidence":"high","reasoning":"Stolen car.","needs_clarification":false}'
  ].join("\n");

export const ANSWER_SYNTHESIS_SYSTEM_PROMPT = [
  "You explain insurance coverage in plain English using only the policy excerpts supplied.",
  "Never assume coverage the excerpts do not mention.",
  "Answer \"No\" when an excerpt explicitly excludes the scenario, \"Yes\" when one explicitly covers it, and \"It depends\" when coverage is conditional or unclear.",
  "Return only valid JSON with the keys `coverage_result` and `explanation`."
].join(" ");

const formatExcerpt = (chunk: RetrievalResult, index: number): string =>
  [
    `[Reference ${index + 1}] ${chunk.section_name} (${chunk.policy_type.toUpperCase()} Policy, ${chunk.clause_category})`,
    chunk.text
  ].join("\n");

export const buildPolicyExcerptsBlock = (chunks: readonly RetrievalResult[]): string =>
  chunks.length > 0 ? chunks.map(formatExcerpt).join("\n---\n") : "(none)";

export const buildAnswerSynthesisUserPrompt = (input: {
  question: string;
  chunks: readonly RetrievalResult[];
  policyApplied: string;
  scenarioSummary?: string;
}): string =>
  [
    "User question:",
    input.question,
    "",
    `Policy applied: ${input.policyApplied}`,
    ...(input.scenarioSummary ? [`Scenario: ${input.scenarioSummary}`] : []),
    "",
    "Policy excerpts:",
    buildPolicyExcerptsBlock(input.chunks),
    "",
    "Write the explanation as two to four sentences of friendly, semi-formal prose.",
    "Name the policy sections you rely on, e.g. \"as stated in Part D - Physical Damage Coverage\".",
    "No bullet points, emojis or symbols.",
    "Return JSON exactly like:",
    '{"coverage_result":"Yes","explanation":"I\'ve reviewed your policy and theft of your vehicle is covered under Comprehensive Coverage."}'
  ].join("\n");
