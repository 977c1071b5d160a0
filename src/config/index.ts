import { loadModeEnvFile, parseEnv, type Env } from "./env.js";

export type { Env } from "./env.js";
export { envSchema, loadModeEnvFile, parseEnv } from "./env.js";

export type Config = Readonly<Env>;

let cached: Config | null = null;

export function getConfig(): Config {
  if (!cached) {
    loadModeEnvFile();
    cached = Object.freeze(parseEnv(process.env));
  }
  return cached;
}

export function resetConfigForTests(): void {
  cached = null;
}
