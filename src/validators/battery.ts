/*
Validation battery.
Purpose: run a configured set of checks against one execution in a fixed order.
Assumptions: every configured check runs, even after an earlier failure.
*/

import type { ExecutionResult } from "../dune/client.js";
import type { EntryValidations } from "../core/registry.js";

import {
  checkColumns,
  checkExecutionSuccess,
  checkMinRows,
  checkNoNulls,
  checkNonEmpty,
  checkValueInRange,
} from "./checks.js";
import type { ValidationBatteryOptions, ValidationOutcome, ValueRange } from "./types.js";

export function runAllValidations(
  result: ExecutionResult,
  options: ValidationBatteryOptions = {},
): ValidationOutcome[] {
  // execution_success first: content checks against a failed execution only make sense after it.
  const outcomes: ValidationOutcome[] = [
    checkExecutionSuccess(result),
    checkMinRows(result, options.minRows ?? 1),
  ];

  if (options.expectedColumns && options.expectedColumns.length > 0) {
    outcomes.push(checkColumns(result, options.expectedColumns));
  }

  for (const [column, range] of Object.entries(options.valueRanges ?? {})) {
    outcomes.push(checkValueInRange(result, column, range));
  }

  if (options.nonNullColumns && options.nonNullColumns.length > 0) {
    outcomes.push(checkNoNulls(result, options.nonNullColumns));
  }

  return outcomes;
}

/** Battery used by smoke runs when the registry entry configures no validations. */
export function runSmokeBattery(result: ExecutionResult): ValidationOutcome[] {
  return [checkExecutionSuccess(result), checkNonEmpty(result)];
}

export function batteryOptionsFromRegistry(config: EntryValidations): ValidationBatteryOptions {
  const valueRanges: Record<string, ValueRange> = {};
  for (const [column, [min, max]] of Object.entries(config.value_ranges ?? {})) {
    valueRanges[column] = { min, max };
  }

  return {
    expectedColumns: config.expected_columns,
    minRows: config.min_rows,
    valueRanges,
    nonNullColumns: config.non_null_columns,
  };
}
