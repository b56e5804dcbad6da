/**
 * Smoke pipeline result types.
 * Purpose: one outcome per orchestrated smoke test, consumed by the batch runner and the CLI.
 * Assumptions: outcomes are created by runSmokeTest and never mutated afterwards.
 */

import type { Architecture } from "../../core/registry.js";
import type { ExecutionResult } from "../../dune/client.js";
import type { ValidationOutcome } from "../../validators/types.js";

// =============================================================================
// RESULTS
// =============================================================================

export type SmokeErrorKind =
  | "not-found"
  | "no-test-defined"
  | "file-missing"
  | "unresolved-placeholder"
  | "unexpected";

export type SmokeTestOutcome = {
  name: string;
  success: boolean;
  executionResult: ExecutionResult | null;
  validations: ValidationOutcome[];
  error: string | null;
  errorKind: SmokeErrorKind | null;
};

export type BatchSummary = {
  passed: number;
  failed: number;
  total: number;
};

// =============================================================================
// OPTIONS
// =============================================================================

export const DEFAULT_SMOKE_TIMEOUT_SECONDS = 300;

export type SmokeRunOptions = {
  timeoutSeconds?: number;
};

export type BatchRunOptions = SmokeRunOptions & {
  architecture?: Architecture;
};
