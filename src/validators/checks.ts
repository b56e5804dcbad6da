/*
Result checks for smoke-test executions.
Purpose: inspect one ExecutionResult and report a pass/fail outcome with structured details.
Assumptions: checks are pure; malformed input (absent columns, non-numeric values) is a failing
outcome, never a thrown error.
*/

import { readColumn, type ExecutionResult } from "../dune/client.js";
import type { JsonObject, JsonValue } from "../core/logger.js";

import { CHECK_NAMES, type ValidationOutcome, type ValueRange } from "./types.js";

const MAX_REPORTED_VIOLATIONS = 10;

// =============================================================================
// EXECUTION
// =============================================================================

export function checkExecutionSuccess(result: ExecutionResult): ValidationOutcome {
  if (result.success) {
    return {
      checkName: CHECK_NAMES.executionSuccess,
      passed: true,
      message: "Query executed successfully",
      details: { state: result.state, execution_id: result.executionId },
    };
  }

  return {
    checkName: CHECK_NAMES.executionSuccess,
    passed: false,
    message: `Query execution failed: ${result.error}`,
    details: { state: result.state, error: result.error },
  };
}

// =============================================================================
// ROW COUNTS
// =============================================================================

export function checkNonEmpty(result: ExecutionResult): ValidationOutcome {
  if (result.rowCount > 0) {
    return {
      checkName: CHECK_NAMES.nonEmpty,
      passed: true,
      message: `Query returned ${result.rowCount} rows`,
      details: { row_count: result.rowCount },
    };
  }

  return {
    checkName: CHECK_NAMES.nonEmpty,
    passed: false,
    message: "Query returned no rows",
    details: { row_count: 0 },
  };
}

export function checkMinRows(result: ExecutionResult, minRows: number): ValidationOutcome {
  const passed = result.rowCount >= minRows;
  return {
    checkName: CHECK_NAMES.minRows,
    passed,
    message: passed
      ? `Row count ${result.rowCount} >= minimum ${minRows}`
      : `Row count ${result.rowCount} < minimum ${minRows}`,
    details: { row_count: result.rowCount, min_rows: minRows },
  };
}

// =============================================================================
// COLUMNS
// =============================================================================

export function checkColumns(
  result: ExecutionResult,
  expectedColumns: string[],
  strict = false,
): ValidationOutcome {
  const actual = new Set(result.columns);
  const expected = new Set(expectedColumns);

  const missing = [...expected].filter((column) => !actual.has(column));
  const extra = strict ? result.columns.filter((column) => !expected.has(column)) : [];

  if (missing.length === 0 && extra.length === 0) {
    return {
      checkName: CHECK_NAMES.columns,
      passed: true,
      message: `All ${expectedColumns.length} expected columns present`,
      details: { expected: [...expectedColumns], actual: [...result.columns] },
    };
  }

  const issues: string[] = [];
  if (missing.length > 0) issues.push(`missing: ${JSON.stringify(missing)}`);
  if (extra.length > 0) issues.push(`extra: ${JSON.stringify(extra)}`);

  return {
    checkName: CHECK_NAMES.columns,
    passed: false,
    message: `Column mismatch: ${issues.join("; ")}`,
    details: {
      expected: [...expectedColumns],
      actual: [...result.columns],
      missing,
      // null marks a non-exhaustive (non-strict) comparison
      extra: strict ? extra : null,
    },
  };
}

// =============================================================================
// VALUES
// =============================================================================

export function checkValueInRange(
  result: ExecutionResult,
  column: string,
  range: ValueRange = {},
): ValidationOutcome {
  const expectedMin = range.min ?? null;
  const expectedMax = range.max ?? null;

  if (!result.columns.includes(column)) {
    return {
      checkName: CHECK_NAMES.valueRange,
      passed: false,
      message: `Column '${column}' not found in results`,
      details: { column, available_columns: [...result.columns] },
    };
  }

  const values = collectNonNull(result, column);
  if (values.length === 0) {
    return {
      checkName: CHECK_NAMES.valueRange,
      passed: true,
      message: `Column '${column}' has no non-null values to check`,
      details: { column, value_count: 0 },
    };
  }

  const violations: JsonObject[] = [];
  let actualMin = Number.POSITIVE_INFINITY;
  let actualMax = Number.NEGATIVE_INFINITY;

  for (const { row, value } of values) {
    const numeric = toNumeric(value);
    if (numeric === null) {
      violations.push({ row, value, issue: "not numeric" });
      continue;
    }
    if (!Number.isFinite(numeric)) {
      violations.push({ row, value, issue: "not finite" });
      continue;
    }

    actualMin = Math.min(actualMin, numeric);
    actualMax = Math.max(actualMax, numeric);
    if (expectedMin !== null && numeric < expectedMin) {
      violations.push({ row, value, issue: `< ${expectedMin}` });
    }
    if (expectedMax !== null && numeric > expectedMax) {
      violations.push({ row, value, issue: `> ${expectedMax}` });
    }
  }

  if (violations.length === 0) {
    return {
      checkName: CHECK_NAMES.valueRange,
      passed: true,
      message: `All ${values.length} values in '${column}' within range`,
      details: {
        column,
        value_count: values.length,
        actual_min: actualMin,
        actual_max: actualMax,
        expected_min: expectedMin,
        expected_max: expectedMax,
      },
    };
  }

  return {
    checkName: CHECK_NAMES.valueRange,
    passed: false,
    message: `${violations.length} values in '${column}' out of range`,
    details: {
      column,
      violations: violations.slice(0, MAX_REPORTED_VIOLATIONS),
      total_violations: violations.length,
      expected_min: expectedMin,
      expected_max: expectedMax,
    },
  };
}

export function checkNoNulls(result: ExecutionResult, columns: string[]): ValidationOutcome {
  const present = new Set(result.columns);
  const missingColumns: string[] = [];
  const nullCounts: JsonObject = {};

  for (const column of columns) {
    if (!present.has(column)) {
      missingColumns.push(column);
      continue;
    }

    const nulls = result.rows.filter((row) => {
      const value = readColumn(row, column);
      return value === null || value === undefined;
    }).length;
    if (nulls > 0) {
      nullCounts[column] = nulls;
    }
  }

  const hasNulls = Object.keys(nullCounts).length > 0;
  if (missingColumns.length === 0 && !hasNulls) {
    return {
      checkName: CHECK_NAMES.noNulls,
      passed: true,
      message: `No null values in ${columns.length} checked columns`,
      details: { columns: [...columns] },
    };
  }

  const issues: string[] = [];
  if (missingColumns.length > 0) issues.push(`missing columns: ${JSON.stringify(missingColumns)}`);
  if (hasNulls) issues.push(`null values: ${JSON.stringify(nullCounts)}`);

  return {
    checkName: CHECK_NAMES.noNulls,
    passed: false,
    message: `Null check failed: ${issues.join("; ")}`,
    details: { missing_columns: missingColumns, null_counts: nullCounts },
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function collectNonNull(
  result: ExecutionResult,
  column: string,
): Array<{ row: number; value: JsonValue }> {
  const values: Array<{ row: number; value: JsonValue }> = [];
  result.rows.forEach((row, index) => {
    const value = readColumn(row, column);
    if (value !== null && value !== undefined) {
      values.push({ row: index, value });
    }
  });
  return values;
}

// Decimal notation with optional digit separators, plus the inf/infinity/nan words.
const DECIMAL_PATTERN = /^[+-]?(?:\d(?:_?\d)*(?:\.(?:\d(?:_?\d)*)?)?|\.\d(?:_?\d)*)(?:[eE][+-]?\d(?:_?\d)*)?$/;
const NON_FINITE_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

function toNumeric(value: JsonValue): number | null {
  if (typeof value === "number") return Number.isNaN(value) ? null : value;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value !== "string") return null;

  const trimmed = value.trim();
  if (DECIMAL_PATTERN.test(trimmed)) {
    return Number(trimmed.replace(/_/g, ""));
  }

  const special = NON_FINITE_PATTERN.exec(trimmed);
  if (!special) return null;
  if (special[2].toLowerCase() === "nan") return Number.NaN;
  return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
}
