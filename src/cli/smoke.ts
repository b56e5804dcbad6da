import type { Command } from "commander";

import {
  openSmokeSession,
  type AppContext,
  type OpenSmokeSessionOptions,
  type SmokeSession,
} from "../app/context.js";
import { runAllSmokeTests } from "../app/orchestrator/batch-runner.js";
import { runSmokeTest } from "../app/orchestrator/smoke-runner.js";
import { summarizeBatch, summarizeOutcome } from "../app/orchestrator/summaries.js";
import type { SmokeTestOutcome } from "../app/orchestrator/types.js";
import { formatErrorMessage } from "../core/error-format.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { ARCHITECTURES, listSmokeTests, type Architecture } from "../core/registry.js";
import { pluralize } from "../core/utils.js";

import type { GlobalCliOptions } from "./config.js";
import { loadConfigFromCommand, normalizePositiveInt, parseArchitecture } from "./flags.js";

const SMOKE_COMMAND_FAILURE_TITLE = "Smoke command failed.";
const RULE_WIDTH = 60;

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

type SmokeRunFlags = { timeout?: string; json: boolean };
type SmokeAllFlags = SmokeRunFlags & { architecture?: string };

export function registerSmokeCommand(program: Command): void {
  const smoke = program.command("smoke").description("Run smoke tests against Dune");

  smoke
    .command("run <name>")
    .description("Run the smoke test of one registry query")
    .option("--timeout <seconds>", "Timeout per execution in seconds (default: config)")
    .option("--json", "Emit JSON output", false)
    .action(async (name: string, opts: SmokeRunFlags, command: Command) => {
      const globals = command.optsWithGlobals<GlobalCliOptions>();
      const { appContext } = loadConfigFromCommand(command);
      const timeoutSeconds = resolveTimeout(opts.timeout, appContext);

      await smokeRunCommand(appContext, {
        name,
        timeoutSeconds,
        json: opts.json,
        debug: globals.debug,
      });
    });

  smoke
    .command("all")
    .description("Run every smoke test in registry order")
    .option("--architecture <arch>", `Only queries of this architecture (${ARCHITECTURES.join(", ")})`)
    .option("--timeout <seconds>", "Timeout per execution in seconds (default: config)")
    .option("--json", "Emit JSON output", false)
    .action(async (opts: SmokeAllFlags, command: Command) => {
      const globals = command.optsWithGlobals<GlobalCliOptions>();
      const { appContext } = loadConfigFromCommand(command);
      const timeoutSeconds = resolveTimeout(opts.timeout, appContext);

      await smokeAllCommand(appContext, {
        architecture: parseArchitecture(opts.architecture),
        timeoutSeconds,
        json: opts.json,
        debug: globals.debug,
      });
    });

  smoke
    .command("list")
    .description("List queries that declare a smoke test")
    .action(async (_opts: unknown, command: Command) => {
      const { appContext } = loadConfigFromCommand(command);
      await smokeListCommand(appContext);
    });
}

// =============================================================================
// COMMANDS
// =============================================================================

export type SmokeCommandOptions = Pick<OpenSmokeSessionOptions, "executor" | "runId"> & {
  timeoutSeconds: number;
  json?: boolean;
  debug?: boolean;
};

export async function smokeRunCommand(
  appContext: AppContext,
  opts: SmokeCommandOptions & { name: string },
): Promise<SmokeTestOutcome> {
  const session = await openSession(appContext, opts);

  try {
    if (!opts.json) {
      console.log(`Running smoke test: ${opts.name}`);
    }
    const outcome = await runSmokeTest(
      opts.name,
      { timeoutSeconds: opts.timeoutSeconds },
      session.context,
    );

    reportOutcomes([outcome], opts.json ?? false);
    if (!outcome.success) {
      process.exitCode = 1;
    }
    return outcome;
  } finally {
    session.close();
  }
}

export async function smokeAllCommand(
  appContext: AppContext,
  opts: SmokeCommandOptions & { architecture?: Architecture },
): Promise<SmokeTestOutcome[]> {
  const session = await openSession(appContext, opts);

  try {
    if (!opts.json) {
      const filter = opts.architecture ? ` (architecture=${opts.architecture})` : "";
      console.log(`Running all smoke tests${filter}...`);
    }

    const outcomes = await runAllSmokeTests(
      { architecture: opts.architecture, timeoutSeconds: opts.timeoutSeconds },
      session.context,
    );

    if (outcomes.length === 0 && !opts.json) {
      console.log("No smoke tests found matching criteria.");
      return outcomes;
    }

    reportOutcomes(outcomes, opts.json ?? false);
    if (outcomes.some((outcome) => !outcome.success)) {
      process.exitCode = 1;
    }
    return outcomes;
  } finally {
    session.close();
  }
}

export async function smokeListCommand(appContext: AppContext): Promise<void> {
  const registry = await appContext.registryStore.load();
  const tests = listSmokeTests(registry);

  console.log("Available smoke tests:");
  console.log("-".repeat(RULE_WIDTH));
  for (const test of tests) {
    console.log(`  ${test.name}`);
    console.log(`    File: ${test.smoke_test}`);
    console.log(`    Architecture: ${test.architecture}, Type: ${test.type}`);
  }
  console.log("");
  console.log(`Total: ${pluralize(tests.length, "test")}`);
}

// =============================================================================
// OUTPUT
// =============================================================================

export function formatOutcomeReport(outcomes: SmokeTestOutcome[]): string[] {
  const lines = ["=".repeat(RULE_WIDTH), "SMOKE TEST RESULTS", "=".repeat(RULE_WIDTH)];

  for (const outcome of outcomes) {
    lines.push("");
    lines.push(`${outcome.success ? "[+]" : "[X]"} ${outcome.name}: ${outcome.success ? "PASS" : "FAIL"}`);
    lines.push(`    ${summarizeOutcome(outcome)}`);

    const rowCount = outcome.executionResult?.rowCount ?? 0;
    if (rowCount > 0) {
      lines.push(`    Rows returned: ${rowCount}`);
    }

    for (const validation of outcome.validations) {
      if (!validation.passed) {
        lines.push(`    - ${validation.checkName}: ${validation.message}`);
      }
    }
  }

  const summary = summarizeBatch(outcomes);
  lines.push("");
  lines.push("-".repeat(RULE_WIDTH));
  lines.push(`TOTAL: ${summary.passed} passed, ${summary.failed} failed, ${summary.total} total`);
  lines.push("=".repeat(RULE_WIDTH));
  return lines;
}

function reportOutcomes(outcomes: SmokeTestOutcome[], json: boolean): void {
  if (json) {
    console.log(JSON.stringify(outcomes, null, 2));
    return;
  }
  console.log(formatOutcomeReport(outcomes).join("\n"));
}

// =============================================================================
// INTERNALS
// =============================================================================

async function openSession(
  appContext: AppContext,
  opts: SmokeCommandOptions,
): Promise<SmokeSession> {
  try {
    return await openSmokeSession(appContext, {
      executor: opts.executor,
      runId: opts.runId,
      debug: opts.debug,
    });
  } catch (error) {
    throw normalizeSmokeCommandError(error);
  }
}

function resolveTimeout(raw: string | undefined, appContext: AppContext): number {
  const timeout = normalizePositiveInt(raw);
  if (!timeout.ok) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.smoke,
      title: SMOKE_COMMAND_FAILURE_TITLE,
      message: `Timeout must be a positive integer number of seconds (received ${raw}).`,
    });
  }
  return timeout.value ?? appContext.config.smoke.timeout_seconds;
}

function normalizeSmokeCommandError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.smoke,
    title: SMOKE_COMMAND_FAILURE_TITLE,
    message: formatErrorMessage(error),
    cause: error,
  });
}
