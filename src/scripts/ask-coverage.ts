#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { getCoverageServices, type CoverageRequestServices } from "../modules/coverage/container.js";
import { buildNoPolicyResponse } from "../modules/coverage/coverage-orchestrator.js";
import type { PipelineResponse } from "../modules/coverage/types.js";
import { listAvailablePolicyTypes } from "../modules/policies/user-directory.js";

export interface CliOptions {
  userId: string;
  question: string;
  topK?: number;
}

export const usage = `Usage:
  ask-coverage --user <id> [--top-k <n>] "<question>"

Options:
  --user <id>      User whose policies are searched (see config/users.json)
  --top-k <n>      Number of policy sections to retrieve. Default: RETRIEVAL_TOP_K

Environment:
  OPENAI_API_KEY   Required
  USERS_FILE       Users file. Default: config/users.json
  POLICIES_DIR     Policy documents directory. Default: policies
`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  let userId: string | undefined;
  let topK: number | undefined;
  const questionParts: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--user") {
      userId = argv[index + 1];
      index += 1;
      continue;
    }
    if (arg === "--top-k") {
      const raw = argv[index + 1] ?? "";
      const parsed = Number(raw);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new CliUsageError(`Invalid value for --top-k: '${raw}'`);
      }
      topK = parsed;
      index += 1;
      continue;
    }
    if (arg !== undefined) {
      questionParts.push(arg);
    }
  }

  if (!userId || userId.trim().length === 0) {
    throw new CliUsageError("Missing --user <id>");
  }
  const question = questionParts.join(" ").trim();
  if (question.length === 0) {
    throw new CliUsageError("Missing question");
  }

  return { userId: userId.trim(), question, topK };
}

export async function askCoverage(
  options: CliOptions,
  services: CoverageRequestServices
): Promise<PipelineResponse> {
  const user = await services.users.getUser(options.userId);
  if (!user) {
    throw new CliUsageError(`Unknown user "${options.userId}"`);
  }
  if (listAvailablePolicyTypes(user.policies).length === 0) {
    return buildNoPolicyResponse(user.user_id);
  }
  return services.orchestrator.run({
    userId: user.user_id,
    question: options.question,
    userPolicies: user.policies,
    topK: options.topK
  });
}

async function main(): Promise<void> {
  if (process.argv.includes("--help") || process.argv.includes("-h")) {
    console.info(usage);
    return;
  }

  const options = parseCliArgs(process.argv.slice(2));
  const response = await askCoverage(options, await getCoverageServices());
  console.info(JSON.stringify(response, null, 2));
}

const invokedPath = process.argv[1] ? realpathSync(process.argv[1]) : undefined;

if (invokedPath === fileURLToPath(import.meta.url)) {
  main().catch((error) => {
    if (error instanceof CliUsageError) {
      console.error(`${error.message}\n\n${usage}`);
    } else {
      console.error("ask-coverage failed", error);
    }
    process.exitCode = 1;
  });
}
