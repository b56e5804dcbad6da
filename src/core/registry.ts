/**
 * Query registry model.
 * Purpose: validate the registry JSON and answer lookups against an immutable snapshot.
 * Assumptions: the snapshot is loaded once per CLI invocation and never re-read mid-run.
 * Usage: const registry = await store.load(); findEntry(registry, "bitcoin_tx_features_daily").
 */

import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

// =============================================================================
// SCHEMA
// =============================================================================

export const QUERY_TYPES = ["base", "nested", "standalone"] as const;
export const ARCHITECTURES = ["v2", "legacy"] as const;

export type QueryType = (typeof QUERY_TYPES)[number];
export type Architecture = (typeof ARCHITECTURES)[number];

const RangeBoundSchema = z.number().nullable();

export const EntryValidationsSchema = z
  .object({
    expected_columns: z.array(z.string().min(1)).optional(),
    min_rows: z.number().int().nonnegative().optional(),
    value_ranges: z.record(z.tuple([RangeBoundSchema, RangeBoundSchema])).optional(),
    non_null_columns: z.array(z.string().min(1)).optional(),
  })
  .strict();

export const RegistryEntrySchema = z
  .object({
    name: z.string().min(1),
    file: z.string().min(1),
    type: z.enum(QUERY_TYPES),
    architecture: z.enum(ARCHITECTURES),
    description: z.string().optional(),
    dependencies: z.array(z.string().min(1)).default([]),
    smoke_test: z.string().nullable().optional(),
    dune_query_id: z.number().int().positive().nullable().optional(),
    validations: EntryValidationsSchema.optional(),
  })
  .passthrough();

export const RegistrySchema = z
  .object({
    queries: z.array(RegistryEntrySchema),
  })
  .passthrough();

export type EntryValidations = z.infer<typeof EntryValidationsSchema>;
export type RegistryEntry = z.infer<typeof RegistryEntrySchema>;
export type Registry = z.infer<typeof RegistrySchema>;

export type SmokeTestListing = {
  name: string;
  smoke_test: string;
  architecture: Architecture;
  type: QueryType;
};

export type RegistryFilter = {
  architecture?: Architecture;
  type?: QueryType;
  withSmokeTest?: boolean;
};

// =============================================================================
// LOOKUPS
// =============================================================================

export function findEntry(registry: Registry, name: string): RegistryEntry | null {
  return registry.queries.find((entry) => entry.name === name) ?? null;
}

export function hasSmokeTest(
  entry: RegistryEntry,
): entry is RegistryEntry & { smoke_test: string } {
  return typeof entry.smoke_test === "string" && entry.smoke_test.length > 0;
}

export function filterEntries(registry: Registry, filter: RegistryFilter = {}): RegistryEntry[] {
  return registry.queries.filter((entry) => {
    if (filter.architecture && entry.architecture !== filter.architecture) return false;
    if (filter.type && entry.type !== filter.type) return false;
    if (filter.withSmokeTest !== undefined && hasSmokeTest(entry) !== filter.withSmokeTest) {
      return false;
    }
    return true;
  });
}

export function listSmokeTests(registry: Registry): SmokeTestListing[] {
  return registry.queries.filter(hasSmokeTest).map((entry) => ({
    name: entry.name,
    smoke_test: entry.smoke_test,
    architecture: entry.architecture,
    type: entry.type,
  }));
}

/** Names mapped to assigned Dune ids; unassigned entries are left out. */
export function buildQueryIdMap(registry: Registry): Map<string, number> {
  const ids = new Map<string, number>();
  for (const entry of registry.queries) {
    if (entry.dune_query_id) {
      ids.set(entry.name, entry.dune_query_id);
    }
  }
  return ids;
}

// =============================================================================
// MAINTENANCE
// =============================================================================

export function setQueryId(registry: Registry, name: string, queryId: number): Registry | null {
  if (!findEntry(registry, name)) {
    return null;
  }

  return {
    ...registry,
    queries: registry.queries.map((entry) =>
      entry.name === name ? { ...entry, dune_query_id: queryId } : entry,
    ),
  };
}

export async function validateRegistry(
  registry: Registry,
  options: { projectRoot: string },
): Promise<string[]> {
  const issues: string[] = [];
  const names = new Set<string>();

  for (const entry of registry.queries) {
    if (names.has(entry.name)) {
      issues.push(`Duplicate query name: ${entry.name}`);
    }
    names.add(entry.name);
  }

  const ids = buildQueryIdMap(registry);

  for (const entry of registry.queries) {
    const prefix = `[${entry.name}]`;

    if (!(await fse.pathExists(path.resolve(options.projectRoot, entry.file)))) {
      issues.push(`${prefix} Query file not found: ${entry.file}`);
    }

    if (
      hasSmokeTest(entry) &&
      !(await fse.pathExists(path.resolve(options.projectRoot, entry.smoke_test)))
    ) {
      issues.push(`${prefix} Smoke test not found: ${entry.smoke_test}`);
    }

    for (const dependency of entry.dependencies) {
      if (!names.has(dependency)) {
        issues.push(`${prefix} Unknown dependency: ${dependency}`);
      } else if (entry.type === "nested" && !ids.has(dependency)) {
        issues.push(`${prefix} Dependency '${dependency}' has no Dune query ID set`);
      }
    }
  }

  return issues;
}
