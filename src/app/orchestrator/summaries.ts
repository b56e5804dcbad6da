/*
Smoke outcome summaries.
Purpose: the one-line verdict per outcome and the pass/fail counts per batch.
*/

import type { BatchSummary, SmokeTestOutcome } from "./types.js";

export function summarizeOutcome(outcome: SmokeTestOutcome): string {
  if (outcome.error) {
    return `ERROR: ${outcome.error}`;
  }

  const total = outcome.validations.length;
  const passed = outcome.validations.filter((validation) => validation.passed).length;

  if (outcome.success) {
    return `PASSED (${passed}/${total} validations)`;
  }

  const failed = outcome.validations
    .filter((validation) => !validation.passed)
    .map((validation) => validation.checkName);
  return `FAILED (${passed}/${total} validations, failed: ${failed.join(", ")})`;
}

export function summarizeBatch(outcomes: SmokeTestOutcome[]): BatchSummary {
  const passed = outcomes.filter((outcome) => outcome.success).length;
  return { passed, failed: outcomes.length - passed, total: outcomes.length };
}
