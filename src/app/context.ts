/**
 * AppContext resolves config-derived collaborators for one CLI invocation.
 * Purpose: make the registry path, logs location and Dune client explicit for commands.
 * Assumptions: config has already been validated by the loader.
 * Usage: const ctx = createAppContext({ configPath, config }); const session = await openSmokeSession(ctx);
 */

import path from "node:path";

import type { ProjectConfig } from "../core/config.js";
import { JsonlLogger, smokeLogPath } from "../core/logger.js";
import { JsonRegistryStore, type RegistryStore } from "../core/registry-store.js";
import { FileSqlLoader } from "../core/sql-loader.js";
import { defaultRunId } from "../core/utils.js";
import type { QueryExecutor } from "../dune/client.js";
import { DuneClient } from "../dune/dune-client.js";

import { createSmokeContext, type SmokeContext } from "./orchestrator/ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  configPath: string;
  config: ProjectConfig;
  projectRoot: string;
  registryStore: RegistryStore;
};

export type CreateAppContextInput = {
  configPath: string;
  config: ProjectConfig;
  registryStore?: RegistryStore;
};

export type SmokeSession = {
  runId: string;
  logPath: string;
  context: SmokeContext;
  close(): void;
};

export type OpenSmokeSessionOptions = {
  runId?: string;
  executor?: QueryExecutor;
  debug?: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput): AppContext {
  return {
    configPath: path.resolve(input.configPath),
    config: input.config,
    projectRoot: input.config.project_root,
    registryStore: input.registryStore ?? new JsonRegistryStore(input.config.registry_path),
  };
}

export function createDuneClient(config: ProjectConfig): DuneClient {
  return new DuneClient({
    apiKey: config.dune.api_key,
    performance: config.dune.performance,
    pollIntervalMs: config.dune.poll_interval_ms,
    defaultTimeoutSeconds: config.smoke.timeout_seconds,
  });
}

/** Loads the registry snapshot once and wires the collaborators for a smoke run. */
export async function openSmokeSession(
  appContext: AppContext,
  options: OpenSmokeSessionOptions = {},
): Promise<SmokeSession> {
  const registry = await appContext.registryStore.load();
  const executor = options.executor ?? createDuneClient(appContext.config);

  const runId = options.runId ?? defaultRunId();
  const logPath = smokeLogPath(appContext.config.logs_dir, runId);
  const logger = new JsonlLogger(logPath, { runId }, options.debug ?? false);

  return {
    runId,
    logPath,
    context: createSmokeContext({
      registry,
      executor,
      sqlLoader: new FileSqlLoader(appContext.projectRoot),
      log: logger,
    }),
    close: () => logger.close(),
  };
}
