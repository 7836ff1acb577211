/**
 * Contract shared by the CLI subcommands.
 */

export interface ParsedArgs {
  /** Subcommand name, "" when none was given */
  command: string;

  /** Named flags (e.g., { config: "./parley.json", verbose: true }) */
  flags: Record<string, string | boolean>;

  positional: string[];
}

export interface CliCommand {
  name: string;

  /** One line shown in --help */
  description: string;

  /** Resolves to the process exit code: 0 on success */
  execute(args: ParsedArgs): Promise<number>;
}
