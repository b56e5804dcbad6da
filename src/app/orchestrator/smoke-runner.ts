/*
Smoke test orchestrator.
Purpose: run one registry entry's smoke test end to end and package the verdict.
Assumptions: always resolves with an outcome; failures before execution become terminal errors
with a kind, and nothing is executed remotely for them.
*/

import { formatErrorMessage } from "../../core/error-format.js";
import { SqlFileNotFoundError } from "../../core/errors.js";
import { findEntry, hasSmokeTest, type RegistryEntry } from "../../core/registry.js";
import { batteryOptionsFromRegistry, runAllValidations, runSmokeBattery } from "../../validators/battery.js";

import { resolvePlaceholders } from "./placeholders.js";
import type { SmokeContext, SmokeLogSink } from "./ports.js";
import {
  DEFAULT_SMOKE_TIMEOUT_SECONDS,
  type SmokeErrorKind,
  type SmokeRunOptions,
  type SmokeTestOutcome,
} from "./types.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runSmokeTest(
  name: string,
  options: SmokeRunOptions,
  context: SmokeContext,
): Promise<SmokeTestOutcome> {
  const entry = findEntry(context.registry, name);
  if (!entry) {
    return terminalOutcome(name, "not-found", `Query '${name}' not found in registry`, context.log);
  }

  return runEntrySmokeTest(entry, options, context);
}

/** Runs the smoke test of an entry the caller already selected from the registry snapshot. */
export async function runEntrySmokeTest(
  entry: RegistryEntry,
  options: SmokeRunOptions,
  context: SmokeContext,
): Promise<SmokeTestOutcome> {
  const name = entry.name;
  if (!hasSmokeTest(entry)) {
    return terminalOutcome(
      name,
      "no-test-defined",
      `No smoke test defined for query '${name}'`,
      context.log,
    );
  }

  context.log.log({ type: "smoke.start", query: name, payload: { smoke_test: entry.smoke_test } });

  try {
    return await executeSmokeTest(entry, entry.smoke_test, options, context);
  } catch (err) {
    if (err instanceof SqlFileNotFoundError) {
      return terminalOutcome(name, "file-missing", err.message, context.log);
    }
    return terminalOutcome(
      name,
      "unexpected",
      `Unexpected error: ${formatErrorMessage(err)}`,
      context.log,
    );
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function executeSmokeTest(
  entry: RegistryEntry,
  smokeTestPath: string,
  options: SmokeRunOptions,
  context: SmokeContext,
): Promise<SmokeTestOutcome> {
  const rawSql = await context.sqlLoader.load(smokeTestPath);

  const resolution = resolvePlaceholders(rawSql, entry, context.registry, context.queryIds);
  if (!resolution.ok) {
    return terminalOutcome(entry.name, "unresolved-placeholder", resolution.message, context.log);
  }

  for (const pending of resolution.pending) {
    context.log.log({
      type: "smoke.placeholder.pending",
      query: entry.name,
      payload: { placeholder: pending.placeholder, dependency: pending.dependency },
    });
  }

  const executionResult = await context.executor.executeSql(resolution.sql, {
    timeoutSeconds: options.timeoutSeconds ?? DEFAULT_SMOKE_TIMEOUT_SECONDS,
  });

  const validations = entry.validations
    ? runAllValidations(executionResult, batteryOptionsFromRegistry(entry.validations))
    : runSmokeBattery(executionResult);
  const success = executionResult.success && validations.every((outcome) => outcome.passed);

  context.log.log({
    type: "smoke.complete",
    query: entry.name,
    payload: {
      success,
      state: executionResult.state,
      execution_id: executionResult.executionId,
      row_count: executionResult.rowCount,
      failed_checks: validations
        .filter((outcome) => !outcome.passed)
        .map((outcome) => outcome.checkName),
    },
  });

  return {
    name: entry.name,
    success,
    executionResult,
    validations,
    error: null,
    errorKind: null,
  };
}

function terminalOutcome(
  name: string,
  kind: SmokeErrorKind,
  error: string,
  log: SmokeLogSink,
): SmokeTestOutcome {
  log.log({ type: "smoke.error", query: name, payload: { kind, error } });

  return {
    name,
    success: false,
    executionResult: null,
    validations: [],
    error,
    errorKind: kind,
  };
}
