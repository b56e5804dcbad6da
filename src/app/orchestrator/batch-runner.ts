import { hasSmokeTest } from "../../core/registry.js";

import type { SmokeContext } from "./ports.js";
import { runEntrySmokeTest } from "./smoke-runner.js";
import { summarizeBatch } from "./summaries.js";
import type { BatchRunOptions, SmokeTestOutcome } from "./types.js";

/**
 * Runs every smoke test in registry order, one at a time.
 * Dependency edges do not affect ordering; smoke tests read already-assigned Dune ids.
 * Each selected entry runs as itself, so duplicate names each run their own smoke test.
 */
export async function runAllSmokeTests(
  options: BatchRunOptions,
  context: SmokeContext,
): Promise<SmokeTestOutcome[]> {
  const selected = context.registry.queries.filter(
    (entry) =>
      hasSmokeTest(entry) && (!options.architecture || entry.architecture === options.architecture),
  );

  context.log.log({
    type: "batch.start",
    payload: { architecture: options.architecture ?? null, tests: selected.length },
  });

  const outcomes: SmokeTestOutcome[] = [];
  for (const entry of selected) {
    outcomes.push(
      await runEntrySmokeTest(entry, { timeoutSeconds: options.timeoutSeconds }, context),
    );
  }

  const summary = summarizeBatch(outcomes);
  context.log.log({
    type: "batch.complete",
    payload: { passed: summary.passed, failed: summary.failed, total: summary.total },
  });

  return outcomes;
}
