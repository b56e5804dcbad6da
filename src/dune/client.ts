import type { JsonObject, JsonValue } from "../core/logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type ResultRow = JsonObject;

export type SuccessfulExecution = {
  success: true;
  executionId: string;
  state: string;
  rows: ResultRow[];
  columns: string[];
  rowCount: number;
  error: null;
  executionTimeMs: number | null;
};

export type FailedExecution = {
  success: false;
  executionId: null;
  state: string;
  rows: ResultRow[];
  columns: string[];
  rowCount: 0;
  error: string;
  executionTimeMs: null;
};

export type ExecutionResult = SuccessfulExecution | FailedExecution;

export type QueryParameters = Record<string, string | number | boolean>;

export type ExecuteOptions = {
  parameters?: QueryParameters;
  timeoutSeconds?: number;
};

/**
 * Remote execution boundary. Implementations resolve ordinary remote failures
 * (HTTP errors, failed or timed-out executions) as failed results instead of rejecting.
 */
export interface QueryExecutor {
  executeSql(sql: string, options?: ExecuteOptions): Promise<ExecutionResult>;
  executeQuery(queryId: number, options?: ExecuteOptions): Promise<ExecutionResult>;
}

export const FAILED_STATE = "FAILED";

// =============================================================================
// RESULT BUILDERS
// =============================================================================

export function createExecutionResult(input: {
  executionId: string;
  state: string;
  rows: ResultRow[];
  executionTimeMs?: number | null;
}): SuccessfulExecution {
  const rows = input.rows;
  // Columns come from the first row; later rows are not checked against it.
  const columns = rows.length > 0 ? Object.keys(rows[0]) : [];

  return {
    success: true,
    executionId: input.executionId,
    state: input.state,
    rows,
    columns,
    rowCount: rows.length,
    error: null,
    executionTimeMs: input.executionTimeMs ?? null,
  };
}

export function createFailedExecution(error: string, state: string = FAILED_STATE): FailedExecution {
  return {
    success: false,
    executionId: null,
    state,
    rows: [],
    columns: [],
    rowCount: 0,
    error,
    executionTimeMs: null,
  };
}

export function readColumn(row: ResultRow, column: string): JsonValue | undefined {
  return Object.prototype.hasOwnProperty.call(row, column) ? row[column] : undefined;
}
