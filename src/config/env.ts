import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

export function parseDotEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const separatorIndex = trimmed.indexOf("=");
  if (separatorIndex <= 0) {
    return null;
  }

  const key = trimmed.slice(0, separatorIndex).trim();
  let value = trimmed.slice(separatorIndex + 1).trim();

  if (
    (value.startsWith('"') && value.endsWith('"')) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    value = value.slice(1, -1);
  }

  return [key, value];
}

export interface LoadModeEnvFileOptions {
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  existsSync?: (filePath: string) => boolean;
  readFileSync?: (filePath: string, encoding: "utf8") => string;
}

/**
 * Copies `.env.local` or `.env.prod` from the working directory into the process
 * environment. `APP_MODE` picks the file; without it the local file wins over the
 * prod one. Variables already present in the environment are never overwritten.
 */
export function loadModeEnvFile(options: LoadModeEnvFileOptions = {}): string | null {
  const cwd = options.cwd ?? process.cwd();
  const processEnv = options.processEnv ?? process.env;
  const existsSync = options.existsSync ?? ((filePath: string) => fs.existsSync(filePath));
  const readFileSync =
    options.readFileSync ?? ((filePath: string, encoding: "utf8") => fs.readFileSync(filePath, encoding));
  const protectedKeys = new Set(
    Object.keys(processEnv).filter((key) => processEnv[key] !== undefined)
  );
  const rawMode = processEnv.APP_MODE?.trim().toLowerCase();
  const explicitMode = rawMode === "local" || rawMode === "prod" ? rawMode : undefined;

  const modeCandidates = explicitMode ? [explicitMode] : ["local", "prod"];
  const envFilePath = modeCandidates
    .map((mode) => path.join(cwd, `.env.${mode}`))
    .find((candidate) => existsSync(candidate));
  if (!envFilePath) {
    return null;
  }

  const content = readFileSync(envFilePath, "utf8");
  for (const line of content.split(/\r?\n/)) {
    const entry = parseDotEnvLine(line);
    if (!entry) {
      continue;
    }
    const [key, value] = entry;
    if (protectedKeys.has(key)) {
      continue;
    }
    processEnv[key] = value;
  }

  return envFilePath;
}

const runtimeModeSchema = z.enum(["prod", "local"]);
const booleanFlagSchema = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === "boolean") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
  });

export const envSchema = z.object({
  APP_MODE: runtimeModeSchema.default("prod"),
  PORT: z.coerce.number().int().positive().default(3000),
  FRONTEND_ORIGIN: z.string().min(1).default("http://localhost:5173"),
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  OPENAI_BASE_URL: z.string().url("OPENAI_BASE_URL must be a URL").optional(),
  OPENAI_CLASSIFIER_MODEL: z.string().min(1).default("gpt-4.1-mini"),
  OPENAI_INTERPRETER_MODEL: z.string().min(1).default("gpt-4.1-mini"),
  OPENAI_SYNTHESIS_MODEL: z.string().min(1).default("gpt-4.1-mini"),
  EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  POLICIES_DIR: z.string().min(1).default("policies"),
  USERS_FILE: z.string().min(1).default("config/users.json"),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().max(50).default(5),
  INDEX_CACHE_ENABLED: booleanFlagSchema.default(false)
});

export type Env = z.infer<typeof envSchema>;

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim().length === 0 ? undefined : value;

export function parseEnv(rawEnv: NodeJS.ProcessEnv): Env {
  const cleaned = Object.fromEntries(
    Object.keys(envSchema.shape).map((key) => [key, blankToUndefined(rawEnv[key])])
  );
  const parsed = envSchema.safeParse(cleaned);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return parsed.data;
}
