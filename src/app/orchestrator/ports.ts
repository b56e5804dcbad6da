/**
 * Smoke pipeline ports: the boundary between the orchestrator and its collaborators.
 * Purpose: keep the registry snapshot, remote execution, SQL file access and logging replaceable.
 * Usage: build a SmokeContext with createSmokeContext() and pass it to runSmokeTest/runAllSmokeTests.
 */

import type { LogEventInput } from "../../core/logger.js";
import { buildQueryIdMap, type Registry } from "../../core/registry.js";
import type { SqlLoader } from "../../core/sql-loader.js";
import type { QueryExecutor } from "../../dune/client.js";

export type { RegistryStore } from "../../core/registry-store.js";
export type { SqlLoader } from "../../core/sql-loader.js";
export type { QueryExecutor } from "../../dune/client.js";

// =============================================================================
// PORTS
// =============================================================================

export interface SmokeLogSink {
  log(event: LogEventInput): void;
}

export type SmokeContext = {
  registry: Registry;
  // Built once per context so every run in a batch sees the same ids.
  queryIds: ReadonlyMap<string, number>;
  executor: QueryExecutor;
  sqlLoader: SqlLoader;
  log: SmokeLogSink;
};

export const noopLogSink: SmokeLogSink = {
  log: () => undefined,
};

export function createSmokeContext(input: {
  registry: Registry;
  executor: QueryExecutor;
  sqlLoader: SqlLoader;
  log?: SmokeLogSink;
}): SmokeContext {
  return {
    registry: input.registry,
    queryIds: buildQueryIdMap(input.registry),
    executor: input.executor,
    sqlLoader: input.sqlLoader,
    log: input.log ?? noopLogSink,
  };
}
