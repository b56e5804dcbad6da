import { describe, expect, it } from "vitest";

import { runAllSmokeTests } from "./batch-runner.js";
import {
  buildRegistry,
  completedResult,
  FakeExecutor,
  InMemorySqlLoader,
  RecordingLogSink,
} from "./__tests__/fakes.js";
import { createSmokeContext } from "./ports.js";

const registry = buildRegistry([
  {
    name: "mempool_daily",
    file: "queries/v2/base/mempool_daily.sql",
    type: "base",
    architecture: "v2",
    smoke_test: "tests/smoke/mempool_daily.sql",
  },
  {
    name: "fee_snapshot",
    file: "queries/v2/base/fee_snapshot.sql",
    type: "base",
    architecture: "v2",
  },
  {
    name: "legacy_blocks",
    file: "queries/legacy/blocks.sql",
    type: "standalone",
    architecture: "legacy",
    smoke_test: "tests/smoke/legacy_blocks.sql",
  },
]);

function makeContext() {
  const executor = new FakeExecutor();
  const log = new RecordingLogSink();
  const context = createSmokeContext({
    registry,
    executor,
    sqlLoader: new InMemorySqlLoader({
      "tests/smoke/mempool_daily.sql": "select 1 as ok",
      "tests/smoke/legacy_blocks.sql": "select 2 as ok",
    }),
    log,
  });
  return { context, executor, log };
}

describe("runAllSmokeTests", () => {
  it("runs every entry with a smoke test in registry order", async () => {
    const { context, executor, log } = makeContext();
    executor.queueResult(completedResult([]));

    const outcomes = await runAllSmokeTests({ timeoutSeconds: 60 }, context);

    expect(outcomes.map((outcome) => [outcome.name, outcome.success])).toEqual([
      ["mempool_daily", false],
      ["legacy_blocks", true],
    ]);
    expect(executor.sqlCalls.map((call) => call.sql)).toEqual(["select 1 as ok", "select 2 as ok"]);
    expect(executor.sqlCalls.map((call) => call.options)).toEqual([
      { timeoutSeconds: 60 },
      { timeoutSeconds: 60 },
    ]);
    expect(log.events[0]).toEqual({
      type: "batch.start",
      payload: { architecture: null, tests: 2 },
    });
    expect(log.events[log.events.length - 1]).toEqual({
      type: "batch.complete",
      payload: { passed: 1, failed: 1, total: 2 },
    });
  });

  it("filters by architecture", async () => {
    const { context, executor } = makeContext();

    const outcomes = await runAllSmokeTests({ architecture: "legacy" }, context);

    expect(outcomes.map((outcome) => outcome.name)).toEqual(["legacy_blocks"]);
    expect(executor.sqlCalls).toHaveLength(1);
  });

  it("returns an empty list when nothing matches", async () => {
    const { context, executor } = makeContext();
    const emptyContext = { ...context, registry: buildRegistry([]) };

    const outcomes = await runAllSmokeTests({}, emptyContext);

    expect(outcomes).toEqual([]);
    expect(executor.sqlCalls).toHaveLength(0);
  });

  it("runs each duplicate-named entry with its own smoke test", async () => {
    const executor = new FakeExecutor();
    const context = createSmokeContext({
      registry: buildRegistry([
        {
          name: "fee_stats",
          file: "queries/v2/fee_stats.sql",
          type: "base",
          architecture: "v2",
          smoke_test: "tests/smoke/fee_stats_v2.sql",
        },
        {
          name: "fee_stats",
          file: "queries/legacy/fee_stats.sql",
          type: "standalone",
          architecture: "legacy",
          smoke_test: "tests/smoke/fee_stats_legacy.sql",
        },
      ]),
      executor,
      sqlLoader: new InMemorySqlLoader({
        "tests/smoke/fee_stats_v2.sql": "select 'v2' as arch",
        "tests/smoke/fee_stats_legacy.sql": "select 'legacy' as arch",
      }),
      log: new RecordingLogSink(),
    });

    const outcomes = await runAllSmokeTests({}, context);

    expect(outcomes).toHaveLength(2);
    expect(executor.sqlCalls.map((call) => call.sql)).toEqual([
      "select 'v2' as arch",
      "select 'legacy' as arch",
    ]);
  });
});
