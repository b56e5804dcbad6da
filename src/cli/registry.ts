import type { Command } from "commander";

import type { AppContext } from "../app/context.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import {
  filterEntries,
  findEntry,
  QUERY_TYPES,
  setQueryId,
  validateRegistry,
  type RegistryEntry,
  type RegistryFilter,
} from "../core/registry.js";

import {
  loadConfigFromCommand,
  normalizePositiveInt,
  parseArchitecture,
  parseQueryType,
} from "./flags.js";

const REGISTRY_LIST_HINT = "Run `querydeck registry list` to see known queries.";

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

type RegistryListFlags = { architecture?: string; type?: string; withSmokeTest?: boolean };

export function registerRegistryCommand(program: Command): void {
  const registry = program.command("registry").description("Inspect and maintain the query registry");

  registry
    .command("list")
    .option("--architecture <arch>", "Filter by architecture (v2, legacy)")
    .option("--type <type>", `Filter by query type (${QUERY_TYPES.join(", ")})`)
    .option("--with-smoke-test", "Only queries that declare a smoke test")
    .action(async (opts: RegistryListFlags, command: Command) => {
      const { appContext } = loadConfigFromCommand(command);
      await registryListCommand(appContext, {
        architecture: parseArchitecture(opts.architecture),
        type: parseQueryType(opts.type),
        withSmokeTest: opts.withSmokeTest,
      });
    });

  registry
    .command("show <name>")
    .action(async (name: string, _opts: unknown, command: Command) => {
      const { appContext } = loadConfigFromCommand(command);
      await registryShowCommand(appContext, name);
    });

  registry
    .command("set-id <name> <duneId>")
    .description("Record the Dune query id of a registry entry")
    .action(async (name: string, duneId: string, _opts: unknown, command: Command) => {
      const { appContext } = loadConfigFromCommand(command);
      const queryId = normalizePositiveInt(duneId);
      if (!queryId.ok || queryId.value === undefined) {
        throw new UserFacingError({
          code: USER_FACING_ERROR_CODES.registry,
          title: "Invalid Dune query id.",
          message: `Dune query id must be a positive integer (received ${duneId}).`,
        });
      }
      await registrySetIdCommand(appContext, name, queryId.value);
    });

  registry
    .command("validate")
    .description("Check files, dependencies and ids referenced by the registry")
    .action(async (_opts: unknown, command: Command) => {
      const { appContext } = loadConfigFromCommand(command);
      await registryValidateCommand(appContext);
    });
}

// =============================================================================
// COMMANDS
// =============================================================================

export async function registryListCommand(
  appContext: AppContext,
  filter: RegistryFilter,
): Promise<void> {
  const registry = await appContext.registryStore.load();
  const entries = filterEntries(registry, filter);

  console.log(`Query Registry (${entries.length} queries)`);
  console.log("");
  if (entries.length === 0) {
    console.log("No queries found.");
    return;
  }
  console.log(formatEntryTable(entries).join("\n"));
}

export async function registryShowCommand(appContext: AppContext, name: string): Promise<void> {
  const registry = await appContext.registryStore.load();
  const entry = findEntry(registry, name);
  if (!entry) {
    throw createQueryNotFoundError(name);
  }

  console.log(`Query: ${entry.name}`);
  console.log(JSON.stringify(entry, null, 2));
}

export async function registrySetIdCommand(
  appContext: AppContext,
  name: string,
  queryId: number,
): Promise<void> {
  const registry = await appContext.registryStore.load();
  const updated = setQueryId(registry, name, queryId);
  if (!updated) {
    throw createQueryNotFoundError(name);
  }

  await appContext.registryStore.save(updated);
  console.log(`Updated '${name}' with Dune query ID: ${queryId}`);
}

export async function registryValidateCommand(appContext: AppContext): Promise<string[]> {
  const registry = await appContext.registryStore.load();
  const issues = await validateRegistry(registry, { projectRoot: appContext.projectRoot });

  if (issues.length === 0) {
    console.log("[+] Registry is valid!");
    return issues;
  }

  console.log(`[X] Found ${issues.length} error(s):`);
  for (const issue of issues) {
    console.log(`  - ${issue}`);
  }
  process.exitCode = 1;
  return issues;
}

// =============================================================================
// OUTPUT
// =============================================================================

type EntryRow = {
  name: string;
  type: string;
  architecture: string;
  duneId: string;
  smokeTest: string;
};

const TABLE_HEADERS: EntryRow = {
  name: "Name",
  type: "Type",
  architecture: "Arch",
  duneId: "Dune ID",
  smokeTest: "Smoke Test",
};

const TABLE_COLUMNS: Array<keyof EntryRow> = ["name", "type", "architecture", "duneId", "smokeTest"];

export function formatEntryTable(entries: RegistryEntry[]): string[] {
  const rows: EntryRow[] = entries.map((entry) => ({
    name: entry.name,
    type: entry.type,
    architecture: entry.architecture,
    duneId: entry.dune_query_id ? String(entry.dune_query_id) : "-",
    smokeTest: entry.smoke_test ? "Yes" : "No",
  }));

  const widths = TABLE_COLUMNS.map((column) =>
    Math.max(TABLE_HEADERS[column].length, ...rows.map((row) => row[column].length)),
  );

  const renderRow = (row: EntryRow): string =>
    TABLE_COLUMNS.map((column, index) => row[column].padEnd(widths[index]))
      .join(" | ")
      .trimEnd();

  const header = renderRow(TABLE_HEADERS);
  return [header, "-".repeat(header.length), ...rows.map(renderRow)];
}

// =============================================================================
// INTERNALS
// =============================================================================

function createQueryNotFoundError(name: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.registry,
    title: "Query not found.",
    message: `Query '${name}' not found in registry.`,
    hint: REGISTRY_LIST_HINT,
  });
}
