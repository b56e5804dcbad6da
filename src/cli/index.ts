import { Command } from "commander";

import { registerRegistryCommand } from "./registry.js";
import { registerSmokeCommand } from "./smoke.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("querydeck")
    .description("Dune SQL query registry tooling (smoke tests and registry maintenance)")
    .version("0.1.0")
    .option(
      "--config <path>",
      "Override project config path (defaults to the nearest querydeck.yaml)",
    )
    .option("--debug", "Show error codes, causes and stack traces", false)
    // Set before registering so subcommands inherit it: failures reach main() as throws.
    .exitOverride()
    .configureOutput({ outputError: () => undefined });

  registerSmokeCommand(program);
  registerRegistryCommand(program);

  return program;
}
