import path from "node:path";

import { createAppContext, type AppContext } from "../app/context.js";
import { CONFIG_FILE_NAME, type ProjectConfig } from "../core/config.js";
import { findConfigPath, loadProjectConfig } from "../core/config-loader.js";

// =============================================================================
// CONFIG DISCOVERY (CLI)
//
// --config wins; otherwise the nearest querydeck.yaml from the cwd upwards.
// =============================================================================

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  cwd?: string;
};

export type GlobalCliOptions = {
  config?: string;
  debug?: boolean;
};

export function loadConfigForCli(args: LoadConfigForCliArgs): {
  appContext: AppContext;
  config: ProjectConfig;
  configPath: string;
} {
  const cwd = args.cwd ?? process.cwd();
  const configPath = args.explicitConfigPath
    ? path.resolve(cwd, args.explicitConfigPath)
    : (findConfigPath(cwd) ?? path.join(cwd, CONFIG_FILE_NAME));

  const config = loadProjectConfig(configPath);

  return {
    appContext: createAppContext({ configPath, config }),
    config,
    configPath,
  };
}
