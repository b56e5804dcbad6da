import { afterEach, beforeEach } from "vitest";

import { cleanupTempDirs } from "./helpers/temp-dir.js";

// =============================================================================
// ENVIRONMENT ISOLATION
// =============================================================================

let envSnapshot: NodeJS.ProcessEnv = {};

beforeEach(() => {
  envSnapshot = { ...process.env };
  delete process.env.DUNE_API_KEY;
  process.exitCode = undefined;
});

afterEach(() => {
  for (const key of Object.keys(process.env)) {
    if (!(key in envSnapshot)) {
      delete process.env[key];
    }
  }
  Object.assign(process.env, envSnapshot);
  process.exitCode = undefined;
  cleanupTempDirs();
});
