#!/usr/bin/env node

/**
 * parley [start] [--config <path>] [--env-file <path>]   run the console responder (default)
 * parley version [--verbose]
 */

import { parseArgs } from "./utils/args.js";
import type { CliCommand } from "./commands/base.js";
import { StartCommand } from "./commands/start.js";
import { VersionCommand } from "./commands/version.js";

function printHelp(commands: CliCommand[]): void {
  console.log("Parley - a chat responder with short-term conversation memory");
  console.log("");
  console.log("Usage: parley <command> [options]");
  console.log("");
  console.log("Commands:");
  for (const cmd of commands) {
    console.log(`  ${cmd.name.padEnd(10)} ${cmd.description}`);
  }
  console.log("");
  console.log("Options:");
  console.log("  --config <path>   Path to config file (default: ./parley.json)");
  console.log("  --env-file <path> Env file to load (default: ./.env)");
  console.log("  --verbose         Show detailed output");
  console.log("  --help, -h        Show this help message");
}

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));
  const commands: CliCommand[] = [new StartCommand(), new VersionCommand()];

  if (parsed.flags.help === true || parsed.flags.h === true) {
    printHelp(commands);
    return 0;
  }

  const commandName = parsed.command || "start";
  const command = commands.find(cmd => cmd.name === commandName);
  if (!command) {
    console.error(`Unknown command: ${parsed.command}`);
    console.error(`Available commands: ${commands.map(c => c.name).join(", ")}`);
    return 1;
  }

  return command.execute(parsed);
}

main()
  .then(exitCode => process.exit(exitCode))
  .catch(err => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
