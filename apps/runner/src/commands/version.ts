/**
 * Version command - print the runner version.
 */

import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import type { CliCommand, ParsedArgs } from "./base.js";

const packageDir = resolve(dirname(fileURLToPath(import.meta.url)), "../..");

export class VersionCommand implements CliCommand {
  name = "version";
  description = "Display version information";

  async execute(args: ParsedArgs): Promise<number> {
    let version: string;
    try {
      version = readVersion(resolve(packageDir, "package.json"));
    } catch (err) {
      console.error(`Failed to read version information: ${err instanceof Error ? err.message : String(err)}`);
      return 1;
    }

    console.log(`Parley v${version}`);
    if (args.flags.verbose === true) {
      console.log(`Node.js ${process.version}`);
      console.log(`Platform: ${process.platform} ${process.arch}`);
    }
    return 0;
  }
}

function readVersion(pkgPath: string): string {
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  throw new Error(`no version field in ${pkgPath}`);
}
