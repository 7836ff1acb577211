/**
 * .env support for the runner, so the API key can live beside the config.
 */

import { readFile } from "node:fs/promises";
import { parse } from "dotenv";

export const DEFAULT_ENV_FILE = ".env";

/**
 * Copy KEY=value pairs from `path` into `env`. Variables already set in
 * `env` are kept. Returns the names that were applied.
 */
export async function loadEnvFile(path: string, env: NodeJS.ProcessEnv): Promise<string[]> {
  const parsed = parse(await readFile(path, "utf-8"));
  const applied: string[] = [];
  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] !== undefined) continue;
    env[key] = value;
    applied.push(key);
  }
  return applied;
}
