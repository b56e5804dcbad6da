import type { JsonObject } from "../core/logger.js";

export const CHECK_NAMES = {
  executionSuccess: "execution_success",
  nonEmpty: "non_empty",
  minRows: "min_rows",
  columns: "columns",
  valueRange: "value_range",
  noNulls: "no_nulls",
} as const;

export type CheckName = (typeof CHECK_NAMES)[keyof typeof CHECK_NAMES];

export type ValidationOutcome = {
  checkName: CheckName;
  passed: boolean;
  message: string;
  details: JsonObject;
};

export type ValueRange = {
  min?: number | null;
  max?: number | null;
};

export type ValidationBatteryOptions = {
  expectedColumns?: string[];
  minRows?: number;
  // Insertion order decides the order of the value_range outcomes.
  valueRanges?: Record<string, ValueRange>;
  nonNullColumns?: string[];
};
