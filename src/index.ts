#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import type { GlobalCliOptions } from "./cli/config.js";
import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

// Commander signals help and version output by throwing under exitOverride().
const INFORMATIONAL_EXITS = new Set([
  "commander.help",
  "commander.helpDisplayed",
  "commander.version",
]);

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError && INFORMATIONAL_EXITS.has(error.code)) {
      process.exitCode = error.exitCode;
      return;
    }

    console.error(renderCliError(error, { debug: debugRequested(argv, program) }));
    process.exitCode = failureExitCode(error);
  }
}

// Parse errors can fire before commander records --debug, so argv is checked first.
function debugRequested(argv: string[], program: Command): boolean {
  const separator = argv.indexOf("--");
  const flags = separator === -1 ? argv : argv.slice(0, separator);
  return flags.includes("--debug") || Boolean(program.opts<GlobalCliOptions>().debug);
}

function failureExitCode(error: unknown): number {
  if (error instanceof CommanderError && error.exitCode > 0) {
    return error.exitCode;
  }
  return 1;
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  return Boolean(entry) && import.meta.url === pathToFileURL(realpathSync(entry)).href;
}

if (invokedDirectly()) {
  void main(process.argv);
}
