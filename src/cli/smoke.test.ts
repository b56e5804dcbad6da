import fs from "node:fs";
import path from "node:path";

import { describe, expect, it, vi } from "vitest";

import { makeTempDir } from "../../test/helpers/temp-dir.js";

import { createAppContext, type AppContext } from "../app/context.js";
import {
  completedResult,
  FakeExecutor,
} from "../app/orchestrator/__tests__/fakes.js";
import type { SmokeTestOutcome } from "../app/orchestrator/types.js";
import { loadProjectConfig } from "../core/config-loader.js";

import { formatOutcomeReport, smokeAllCommand, smokeListCommand, smokeRunCommand } from "./smoke.js";

// =============================================================================
// HELPERS
// =============================================================================

const RULE = "=".repeat(60);
const THIN_RULE = "-".repeat(60);

function setupProject(): AppContext {
  const root = makeTempDir("querydeck-smoke");
  fs.mkdirSync(path.join(root, "queries"), { recursive: true });
  fs.mkdirSync(path.join(root, "tests", "smoke"), { recursive: true });
  fs.writeFileSync(path.join(root, "querydeck.yaml"), "smoke:\n  timeout_seconds: 90\n");
  fs.writeFileSync(
    path.join(root, "queries", "registry.json"),
    JSON.stringify({
      queries: [
        {
          name: "tx_base",
          file: "queries/tx_base.sql",
          type: "base",
          architecture: "v2",
          dune_query_id: 77,
          smoke_test: "tests/smoke/tx_base.sql",
        },
        {
          name: "legacy_blocks",
          file: "queries/legacy_blocks.sql",
          type: "standalone",
          architecture: "legacy",
          smoke_test: "tests/smoke/legacy_blocks.sql",
        },
      ],
    }),
  );
  fs.writeFileSync(path.join(root, "tests", "smoke", "tx_base.sql"), "select 1 as ok");
  fs.writeFileSync(path.join(root, "tests", "smoke", "legacy_blocks.sql"), "select 2 as ok");

  const configPath = path.join(root, "querydeck.yaml");
  return createAppContext({ configPath, config: loadProjectConfig(configPath) });
}

function captureLogs(): string[] {
  const lines: string[] = [];
  vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    lines.push(args.map(String).join(" "));
  });
  return lines;
}

function passedOutcome(name: string, rows: number): SmokeTestOutcome {
  return {
    name,
    success: true,
    executionResult: completedResult(Array.from({ length: rows }, (_, index) => ({ n: index }))),
    validations: [
      { checkName: "execution_success", passed: true, message: "ok", details: {} },
      { checkName: "non_empty", passed: true, message: `Query returned ${rows} rows`, details: {} },
    ],
    error: null,
    errorKind: null,
  };
}

// =============================================================================
// TESTS
// =============================================================================

describe("formatOutcomeReport", () => {
  it("renders one block per outcome and the totals", () => {
    const failed: SmokeTestOutcome = {
      name: "fee_stats",
      success: false,
      executionResult: completedResult([]),
      validations: [
        { checkName: "execution_success", passed: true, message: "ok", details: {} },
        { checkName: "non_empty", passed: false, message: "Query returned no rows", details: {} },
      ],
      error: null,
      errorKind: null,
    };
    const errored: SmokeTestOutcome = {
      name: "ghost",
      success: false,
      executionResult: null,
      validations: [],
      error: "Query 'ghost' not found in registry",
      errorKind: "not-found",
    };

    expect(formatOutcomeReport([passedOutcome("tx_base", 3), failed, errored])).toEqual([
      RULE,
      "SMOKE TEST RESULTS",
      RULE,
      "",
      "[+] tx_base: PASS",
      "    PASSED (2/2 validations)",
      "    Rows returned: 3",
      "",
      "[X] fee_stats: FAIL",
      "    FAILED (1/2 validations, failed: non_empty)",
      "    - non_empty: Query returned no rows",
      "",
      "[X] ghost: FAIL",
      "    ERROR: Query 'ghost' not found in registry",
      "",
      THIN_RULE,
      "TOTAL: 1 passed, 2 failed, 3 total",
      RULE,
    ]);
  });
});

describe("smokeRunCommand", () => {
  it("runs one smoke test, writes the run log and reports success", async () => {
    const appContext = setupProject();
    const executor = new FakeExecutor();
    const lines = captureLogs();

    const outcome = await smokeRunCommand(appContext, {
      name: "tx_base",
      timeoutSeconds: 90,
      executor,
      runId: "run-1",
    });

    expect(outcome.success).toBe(true);
    expect(process.exitCode).toBeUndefined();
    expect(executor.sqlCalls).toEqual([{ sql: "select 1 as ok", options: { timeoutSeconds: 90 } }]);
    expect(lines[0]).toBe("Running smoke test: tx_base");
    expect(lines[1]).toContain("[+] tx_base: PASS");

    const logPath = path.join(appContext.config.logs_dir, "smoke-run-1.jsonl");
    const events = fs
      .readFileSync(logPath, "utf8")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line) as Record<string, unknown>);
    expect(events.map((event) => event.type)).toEqual(["smoke.start", "smoke.complete"]);
    expect(events.every((event) => event.run_id === "run-1")).toBe(true);
  });

  it("sets a failing exit code and prints JSON when asked", async () => {
    const appContext = setupProject();
    const executor = new FakeExecutor();
    executor.queueResult(completedResult([]));
    const lines = captureLogs();

    const outcome = await smokeRunCommand(appContext, {
      name: "tx_base",
      timeoutSeconds: 90,
      json: true,
      executor,
      runId: "run-2",
    });

    expect(outcome.success).toBe(false);
    expect(process.exitCode).toBe(1);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject([{ name: "tx_base", success: false }]);
  });
});

describe("smokeAllCommand", () => {
  it("filters by architecture", async () => {
    const appContext = setupProject();
    const executor = new FakeExecutor();
    const lines = captureLogs();

    const outcomes = await smokeAllCommand(appContext, {
      architecture: "legacy",
      timeoutSeconds: 30,
      executor,
      runId: "run-3",
    });

    expect(outcomes.map((outcome) => outcome.name)).toEqual(["legacy_blocks"]);
    expect(lines[0]).toBe("Running all smoke tests (architecture=legacy)...");
  });
});

describe("smokeListCommand", () => {
  it("lists queries with a smoke test", async () => {
    const appContext = setupProject();
    const lines = captureLogs();

    await smokeListCommand(appContext);

    expect(lines).toEqual([
      "Available smoke tests:",
      THIN_RULE,
      "  tx_base",
      "    File: tests/smoke/tx_base.sql",
      "    Architecture: v2, Type: base",
      "  legacy_blocks",
      "    File: tests/smoke/legacy_blocks.sql",
      "    Architecture: legacy, Type: standalone",
      "",
      "Total: 2 tests",
    ]);
  });
});
