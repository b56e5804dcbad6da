import type { Command } from "commander";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { ARCHITECTURES, QUERY_TYPES, type Architecture, type QueryType } from "../core/registry.js";

import { loadConfigForCli, type GlobalCliOptions } from "./config.js";

export function loadConfigFromCommand(command: Command): ReturnType<typeof loadConfigForCli> {
  const globals = command.optsWithGlobals<GlobalCliOptions>();
  return loadConfigForCli({ explicitConfigPath: globals.config });
}

export function parseArchitecture(raw: string | undefined): Architecture | undefined {
  return parseChoice(raw, ARCHITECTURES, "architecture");
}

export function parseQueryType(raw: string | undefined): QueryType | undefined {
  return parseChoice(raw, QUERY_TYPES, "query type");
}

export function normalizePositiveInt(
  value: string | undefined,
): { ok: true; value: number | undefined } | { ok: false } {
  if (value === undefined) {
    return { ok: true, value: undefined };
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    return { ok: false };
  }

  return { ok: true, value: parsed };
}

function parseChoice<T extends string>(
  raw: string | undefined,
  choices: readonly T[],
  label: string,
): T | undefined {
  if (raw === undefined) return undefined;

  const match = choices.find((choice) => choice === raw);
  if (match === undefined) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.registry,
      title: `Invalid ${label}.`,
      message: `Unknown ${label} "${raw}".`,
      hint: `Use one of: ${choices.join(", ")}.`,
    });
  }
  return match;
}
