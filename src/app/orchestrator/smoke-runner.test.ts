import { describe, expect, it } from "vitest";

import { createFailedExecution } from "../../dune/client.js";

import {
  buildRegistry,
  completedResult,
  FakeExecutor,
  InMemorySqlLoader,
  RecordingLogSink,
} from "./__tests__/fakes.js";
import { createSmokeContext, type SmokeContext } from "./ports.js";
import { runSmokeTest } from "./smoke-runner.js";

const registry = buildRegistry([
  {
    name: "tx_base",
    file: "queries/v2/base/tx_base.sql",
    type: "base",
    architecture: "v2",
    dune_query_id: 5001,
    smoke_test: "tests/smoke/tx_base.sql",
  },
  {
    name: "daily_features",
    file: "queries/v2/nested/daily_features.sql",
    type: "nested",
    architecture: "v2",
    dependencies: ["tx_base"],
    smoke_test: "tests/smoke/daily_features.sql",
    validations: {
      expected_columns: ["day", "tx_count"],
      min_rows: 2,
      value_ranges: { tx_count: [0, null] },
    },
  },
  {
    name: "fee_rank",
    file: "queries/v2/nested/fee_rank.sql",
    type: "nested",
    architecture: "v2",
    dependencies: ["fee_stats"],
    smoke_test: "tests/smoke/fee_rank.sql",
  },
  {
    name: "fee_stats",
    file: "queries/v2/nested/fee_stats.sql",
    type: "nested",
    architecture: "v2",
  },
  {
    name: "orphan_check",
    file: "queries/v2/nested/orphan.sql",
    type: "nested",
    architecture: "v2",
    smoke_test: "tests/smoke/orphan.sql",
  },
  { name: "no_smoke", file: "queries/legacy/no_smoke.sql", type: "standalone", architecture: "legacy" },
]);

const files: Record<string, string> = {
  "tests/smoke/tx_base.sql": "select * from bitcoin.transactions limit 1",
  "tests/smoke/daily_features.sql": "select day, tx_count from query_<BASE_QUERY_ID>",
  "tests/smoke/fee_rank.sql": "select * from query_<FEE_STATS_QUERY_ID>",
  "tests/smoke/orphan.sql": "select * from query_<BASE_QUERY_ID>",
};

function makeContext(executor = new FakeExecutor()): {
  context: SmokeContext;
  executor: FakeExecutor;
  log: RecordingLogSink;
  sqlLoader: InMemorySqlLoader;
} {
  const log = new RecordingLogSink();
  const sqlLoader = new InMemorySqlLoader(files);
  const context = createSmokeContext({ registry, executor, sqlLoader, log });
  return { context, executor, log, sqlLoader };
}

describe("runSmokeTest", () => {
  it("substitutes placeholders and runs the default battery", async () => {
    const { context, executor, log } = makeContext();
    executor.queueResult(completedResult([{ day: "2024-01-01", tx_count: 3 }]));

    const outcome = await runSmokeTest("daily_features", { timeoutSeconds: 45 }, {
      ...context,
      registry: buildRegistry([
        { name: "tx_base", file: "b.sql", type: "base", architecture: "v2", dune_query_id: 5001 },
        {
          name: "daily_features",
          file: "d.sql",
          type: "nested",
          architecture: "v2",
          dependencies: ["tx_base"],
          smoke_test: "tests/smoke/daily_features.sql",
        },
      ]),
    });

    expect(executor.sqlCalls).toEqual([
      { sql: "select day, tx_count from query_5001", options: { timeoutSeconds: 45 } },
    ]);
    expect(outcome.success).toBe(true);
    expect(outcome.error).toBeNull();
    expect(outcome.errorKind).toBeNull();
    expect(outcome.validations.map((validation) => validation.checkName)).toEqual([
      "execution_success",
      "non_empty",
    ]);
    expect(log.types()).toEqual(["smoke.start", "smoke.complete"]);
    expect(log.events[1].payload).toEqual({
      success: true,
      state: "QUERY_STATE_COMPLETED",
      execution_id: "01HEXEC",
      row_count: 1,
      failed_checks: [],
    });
  });

  it("uses the validations configured on the registry entry", async () => {
    const { context, executor } = makeContext();
    executor.queueResult(completedResult([{ day: "2024-01-01", tx_count: -1 }]));

    const outcome = await runSmokeTest("daily_features", {}, context);

    expect(outcome.success).toBe(false);
    expect(outcome.error).toBeNull();
    expect(outcome.validations.map((validation) => [validation.checkName, validation.passed])).toEqual([
      ["execution_success", true],
      ["min_rows", false],
      ["columns", true],
      ["value_range", false],
    ]);
  });

  it("defaults the execution timeout to 300 seconds", async () => {
    const { context, executor } = makeContext();

    await runSmokeTest("tx_base", {}, context);

    expect(executor.sqlCalls[0].options).toEqual({ timeoutSeconds: 300 });
  });

  it("fails when the execution fails even without validation config", async () => {
    const { context, executor } = makeContext();
    executor.queueResult(createFailedExecution("Execution timed out", "QUERY_STATE_EXPIRED"));

    const outcome = await runSmokeTest("tx_base", {}, context);

    expect(outcome.success).toBe(false);
    expect(outcome.error).toBeNull();
    expect(outcome.executionResult?.state).toBe("QUERY_STATE_EXPIRED");
    expect(outcome.validations.every((validation) => !validation.passed)).toBe(true);
  });

  it("fails when the query returns no rows", async () => {
    const { context, executor } = makeContext();
    executor.queueResult(completedResult([]));

    const outcome = await runSmokeTest("tx_base", {}, context);

    expect(outcome.success).toBe(false);
    expect(outcome.validations[1]).toMatchObject({ checkName: "non_empty", passed: false });
  });

  it("reports unknown queries without executing anything", async () => {
    const { context, executor, log, sqlLoader } = makeContext();

    const outcome = await runSmokeTest("missing_query", {}, context);

    expect(outcome).toEqual({
      name: "missing_query",
      success: false,
      executionResult: null,
      validations: [],
      error: "Query 'missing_query' not found in registry",
      errorKind: "not-found",
    });
    expect(executor.sqlCalls).toHaveLength(0);
    expect(sqlLoader.loaded).toHaveLength(0);
    expect(log.events).toEqual([
      {
        type: "smoke.error",
        query: "missing_query",
        payload: { kind: "not-found", error: "Query 'missing_query' not found in registry" },
      },
    ]);
  });

  it("reports entries without a smoke test", async () => {
    const { context, executor } = makeContext();

    const outcome = await runSmokeTest("no_smoke", {}, context);

    expect(outcome.errorKind).toBe("no-test-defined");
    expect(outcome.error).toBe("No smoke test defined for query 'no_smoke'");
    expect(executor.sqlCalls).toHaveLength(0);
  });

  it("reports missing smoke test files", async () => {
    const { context, executor } = makeContext();
    const broken = {
      ...context,
      registry: buildRegistry([
        {
          name: "tx_base",
          file: "b.sql",
          type: "base",
          architecture: "v2",
          smoke_test: "tests/smoke/gone.sql",
        },
      ]),
    };

    const outcome = await runSmokeTest("tx_base", {}, broken);

    expect(outcome.errorKind).toBe("file-missing");
    expect(outcome.error).toBe("Smoke test not found: /project/tests/smoke/gone.sql");
    expect(executor.sqlCalls).toHaveLength(0);
  });

  it("reports placeholders that match no declared dependency", async () => {
    const { context, executor } = makeContext();

    const outcome = await runSmokeTest("orphan_check", {}, context);

    expect(outcome.errorKind).toBe("unresolved-placeholder");
    expect(outcome.error).toBe(
      "Placeholder query_<BASE_QUERY_ID> in 'orphan_check' cannot be resolved: no dependencies are declared",
    );
    expect(executor.sqlCalls).toHaveLength(0);
  });

  it("executes with pending placeholders left in place and logs them", async () => {
    const { context, executor, log } = makeContext();
    executor.queueResult(createFailedExecution("Query query_<FEE_STATS_QUERY_ID> does not exist"));

    const outcome = await runSmokeTest("fee_rank", {}, context);

    expect(executor.sqlCalls[0].sql).toBe("select * from query_<FEE_STATS_QUERY_ID>");
    expect(outcome.success).toBe(false);
    expect(log.events[1]).toEqual({
      type: "smoke.placeholder.pending",
      query: "fee_rank",
      payload: { placeholder: "query_<FEE_STATS_QUERY_ID>", dependency: "fee_stats" },
    });
  });

  it("turns executor exceptions into unexpected errors", async () => {
    const { context, executor } = makeContext();
    executor.queueResult(new Error("socket hang up"));

    const outcome = await runSmokeTest("tx_base", {}, context);

    expect(outcome).toMatchObject({
      success: false,
      executionResult: null,
      validations: [],
      error: "Unexpected error: socket hang up",
      errorKind: "unexpected",
    });
  });
});
