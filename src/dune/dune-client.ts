import {
  DuneClient as DuneSdkClient,
  QueryEngine,
  QueryParameter,
  type LatestResultArgs,
  type RunQueryArgs,
  type RunSqlArgs,
} from "@duneanalytics/client-sdk";
import { z } from "zod";

import { formatIssues } from "../core/config-loader.js";
import { formatErrorMessage } from "../core/error-format.js";
import { DuneError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import type { JsonValue } from "../core/logger.js";

import {
  createExecutionResult,
  createFailedExecution,
  type ExecuteOptions,
  type ExecutionResult,
  type QueryExecutor,
  type QueryParameters,
} from "./client.js";

// =============================================================================
// TYPES
// =============================================================================

/** The slice of the Dune SDK client this module calls. */
export type DuneSdkTransport = {
  runSql(args: RunSqlArgs): Promise<unknown>;
  runQuery(args: RunQueryArgs): Promise<unknown>;
  getLatestResult(args: LatestResultArgs): Promise<unknown>;
};

export type DunePerformance = "medium" | "large";

export type DuneClientOptions = {
  apiKey?: string;
  performance?: DunePerformance;
  pollIntervalMs?: number;
  defaultTimeoutSeconds?: number;
  transport?: DuneSdkTransport;
};

const DEFAULT_POLL_INTERVAL_MS = 2_000;
const DEFAULT_TIMEOUT_SECONDS = 300;
const DEFAULT_MAX_AGE_HOURS = 8;

export const COMPLETED_STATE = "QUERY_STATE_COMPLETED";
// Dune stopped early (row or size limit); the rows are a truncated prefix.
export const PARTIAL_STATE = "QUERY_STATE_COMPLETED_PARTIAL";

const QUERY_ENGINES = {
  medium: QueryEngine.Medium,
  large: QueryEngine.Large,
} satisfies Record<DunePerformance, QueryEngine>;

// =============================================================================
// RESPONSE SCHEMA
// =============================================================================

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

// The SDK types timestamps as Date but hands back the JSON strings.
const TimestampSchema = z.union([z.string(), z.date()]).nullish();

const ResultsResponseSchema = z.object({
  execution_id: z.string(),
  state: z.string(),
  execution_started_at: TimestampSchema,
  execution_ended_at: TimestampSchema,
  result: z
    .object({
      rows: z.array(z.record(JsonValueSchema)).default([]),
    })
    .nullish(),
  error: z
    .union([z.string(), z.object({ type: z.string().optional(), message: z.string().optional() })])
    .nullish(),
  next_offset: z.number().nullish(),
  next_uri: z.string().nullish(),
});

type ResultsResponse = z.infer<typeof ResultsResponseSchema>;

const TIMED_OUT = Symbol("timed-out");

type Settled = { ok: true; value: unknown } | { ok: false; error: unknown };

// =============================================================================
// CLIENT
// =============================================================================

export class DuneClient implements QueryExecutor {
  private readonly transport: DuneSdkTransport;
  private readonly performance: QueryEngine;
  private readonly pingFrequencySeconds: number;
  private readonly defaultTimeoutSeconds: number;

  constructor(options: DuneClientOptions = {}) {
    this.performance = QUERY_ENGINES[options.performance ?? "medium"];
    this.pingFrequencySeconds = Math.max(
      1,
      Math.round((options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS) / 1000),
    );
    this.defaultTimeoutSeconds = options.defaultTimeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;

    if (options.transport) {
      this.transport = options.transport;
    } else {
      const apiKey = options.apiKey ?? process.env.DUNE_API_KEY;
      if (!apiKey) {
        throw createMissingApiKeyError();
      }
      this.transport = new DuneSdkClient(apiKey);
    }
  }

  async executeSql(sql: string, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    return this.run(options.timeoutSeconds, () =>
      this.transport.runSql({
        query_sql: sql,
        query_parameters: toQueryParameters(options.parameters),
        performance: this.performance,
        archiveAfter: true,
        opts: { pingFrequency: this.pingFrequencySeconds },
      }),
    );
  }

  async executeQuery(queryId: number, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    return this.run(options.timeoutSeconds, () =>
      this.transport.runQuery({
        queryId,
        query_parameters: toQueryParameters(options.parameters),
        performance: this.performance,
        opts: { pingFrequency: this.pingFrequencySeconds },
      }),
    );
  }

  /** Latest result of a saved query; the SDK re-runs it when the cached one is too old. */
  async latestResult(
    queryId: number,
    options: { maxAgeHours?: number; timeoutSeconds?: number } = {},
  ): Promise<ExecutionResult> {
    return this.run(options.timeoutSeconds, () =>
      this.transport.getLatestResult({
        queryId,
        opts: { maxAgeHours: options.maxAgeHours ?? DEFAULT_MAX_AGE_HOURS },
      }),
    );
  }

  private async run(
    timeoutSeconds: number = this.defaultTimeoutSeconds,
    call: () => Promise<unknown>,
  ): Promise<ExecutionResult> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), timeoutSeconds * 1000);
    });

    try {
      // The SDK has no cancellation; a late settlement is observed here and dropped.
      const settled = call().then(
        (value): Settled => ({ ok: true, value }),
        (error: unknown): Settled => ({ ok: false, error }),
      );
      const outcome = await Promise.race([settled, expired]);

      if (outcome === TIMED_OUT) {
        return createFailedExecution(`Execution did not finish within ${timeoutSeconds}s.`);
      }
      if (!outcome.ok) {
        return createFailedExecution(describeSdkError(outcome.error));
      }
      return toExecutionResult(parseResponse(outcome.value));
    } catch (err) {
      return createFailedExecution(formatErrorMessage(err));
    } finally {
      clearTimeout(timer);
    }
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function createMissingApiKeyError(): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Dune API key missing.",
    message: "Dune API key is missing.",
    hint: "Set DUNE_API_KEY or dune.api_key in querydeck.yaml.",
  });
}

function toQueryParameters(parameters?: QueryParameters): QueryParameter[] | undefined {
  if (!parameters || Object.keys(parameters).length === 0) {
    return undefined;
  }
  return Object.entries(parameters).map(([key, value]) => QueryParameter.text(key, String(value)));
}

function parseResponse(value: unknown): ResultsResponse {
  const parsed = ResultsResponseSchema.safeParse(value);
  if (!parsed.success) {
    throw new DuneError(`Unexpected Dune response:\n${formatIssues(parsed.error.issues)}`, parsed.error);
  }
  return parsed.data;
}

function toExecutionResult(results: ResultsResponse): ExecutionResult {
  if (results.state !== COMPLETED_STATE) {
    return createFailedExecution(describeExecutionFailure(results), results.state);
  }

  // Rows must be the whole result set; a remaining page would skew every row-based check.
  if (results.next_uri || typeof results.next_offset === "number") {
    return createFailedExecution(
      `Execution ${results.execution_id} returned an incomplete result (more rows at offset ${results.next_offset ?? "unknown"}).`,
      results.state,
    );
  }

  const startedAt = parseTimestamp(results.execution_started_at);
  const endedAt = parseTimestamp(results.execution_ended_at);

  return createExecutionResult({
    executionId: results.execution_id,
    state: results.state,
    rows: results.result?.rows ?? [],
    executionTimeMs: startedAt !== null && endedAt !== null ? endedAt - startedAt : null,
  });
}

function describeExecutionFailure(results: ResultsResponse): string {
  const error = results.error;
  const fallback =
    results.state === PARTIAL_STATE ? "result truncated by Dune" : "no error detail";
  const detail = typeof error === "string" ? error : (error?.message ?? error?.type ?? fallback);
  return `Execution ${results.execution_id} ended in ${results.state}: ${detail}`;
}

function describeSdkError(error: unknown): string {
  const message = formatErrorMessage(error);
  const hint = /\b(401|403)\b/.test(message) ? " Check DUNE_API_KEY and permissions." : "";
  return `Dune request failed: ${message}${hint}`;
}

function parseTimestamp(value: string | Date | null | undefined): number | null {
  if (!value) return null;
  const parsed = value instanceof Date ? value.getTime() : Date.parse(value);
  return Number.isNaN(parsed) ? null : parsed;
}
