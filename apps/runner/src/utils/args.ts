/**
 * Minimal argv parser for the runner.
 */

import type { ParsedArgs } from "../commands/base.js";

/**
 * Parse CLI arguments into ParsedArgs.
 *
 * Accepts `--key value`, `--key=value`, boolean `--flag` and `-f`.
 * The first bare word is the command, later ones are positional, and
 * everything after `--` is positional as-is.
 *
 *   parseArgs(["start", "--config", "./parley.json"])
 *     → { command: "start", flags: { config: "./parley.json" }, positional: [] }
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];
  let command = "";

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--") {
      positional.push(...argv.slice(i + 1));
      break;
    }

    if (arg.startsWith("--")) {
      const body = arg.slice(2);
      const eq = body.indexOf("=");
      if (eq !== -1) {
        flags[body.slice(0, eq)] = body.slice(eq + 1);
        continue;
      }
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith("-")) {
        flags[body] = next;
        i++;
      } else {
        flags[body] = true;
      }
      continue;
    }

    if (arg.startsWith("-") && arg.length === 2) {
      flags[arg.slice(1)] = true;
      continue;
    }

    if (arg.startsWith("-")) continue;

    if (!command) {
      command = arg;
    } else {
      positional.push(arg);
    }
  }

  return { command, flags, positional };
}
