/*
Cross-query placeholder resolution.
Purpose: rewrite `query_<TOKEN>` references in smoke-test SQL into `query_<dune id>`.
Assumptions: a token may only name a dependency the entry itself declares.
Usage: resolvePlaceholders(sql, entry, registry, context.queryIds).
*/

import { buildQueryIdMap, findEntry, type Registry, type RegistryEntry } from "../../core/registry.js";

// =============================================================================
// TYPES
// =============================================================================

export type PlaceholderSubstitution = {
  placeholder: string;
  dependency: string;
  queryId: number;
};

export type PendingPlaceholder = {
  placeholder: string;
  dependency: string;
};

export type PlaceholderResolution =
  | {
      ok: true;
      sql: string;
      substitutions: PlaceholderSubstitution[];
      // Declared dependencies without a Dune id; left as-is for the remote side to reject.
      pending: PendingPlaceholder[];
    }
  | {
      ok: false;
      placeholder: string;
      message: string;
    };

type DependencyMatch = { ok: true; dependency: string } | { ok: false; message: string };

const PLACEHOLDER_PATTERN = /query_<([A-Za-z0-9_]+)>/g;
const QUERY_ID_SUFFIX = /_QUERY_ID$/i;
const BASE_STEM = "base";

// =============================================================================
// PUBLIC API
// =============================================================================

export function findPlaceholders(sql: string): string[] {
  const found = new Set<string>();
  for (const match of sql.matchAll(PLACEHOLDER_PATTERN)) {
    found.add(match[0]);
  }
  return [...found];
}

export function resolvePlaceholders(
  sql: string,
  entry: RegistryEntry,
  registry: Registry,
  queryIds: ReadonlyMap<string, number> = buildQueryIdMap(registry),
): PlaceholderResolution {
  const replacements = new Map<string, string>();
  const substitutions: PlaceholderSubstitution[] = [];
  const pending: PendingPlaceholder[] = [];

  for (const placeholder of findPlaceholders(sql)) {
    const token = placeholder.slice("query_<".length, -1);
    const match = matchDependency(token, entry, registry);
    if (!match.ok) {
      return {
        ok: false,
        placeholder,
        message: `Placeholder ${placeholder} in '${entry.name}' ${match.message}`,
      };
    }

    const queryId = queryIds.get(match.dependency);
    if (queryId === undefined) {
      pending.push({ placeholder, dependency: match.dependency });
      continue;
    }

    replacements.set(placeholder, `query_${queryId}`);
    substitutions.push({ placeholder, dependency: match.dependency, queryId });
  }

  return {
    ok: true,
    sql: sql.replace(PLACEHOLDER_PATTERN, (text) => replacements.get(text) ?? text),
    substitutions,
    pending,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

// Token forms: the dependency name itself, `<STEM>_QUERY_ID` where the dependency name
// equals or ends with `_<stem>`, or `BASE_QUERY_ID` for the single declared base dependency.
function matchDependency(token: string, entry: RegistryEntry, registry: Registry): DependencyMatch {
  const declared = entry.dependencies;
  if (declared.length === 0) {
    return { ok: false, message: "cannot be resolved: no dependencies are declared" };
  }

  const normalized = token.toLowerCase();
  const exact = declared.find((dependency) => dependency.toLowerCase() === normalized);
  if (exact) {
    return { ok: true, dependency: exact };
  }

  const stem = normalized.replace(QUERY_ID_SUFFIX, "");
  const candidates =
    stem === BASE_STEM
      ? declared.filter((dependency) => findEntry(registry, dependency)?.type === "base")
      : declared.filter((dependency) => {
          const name = dependency.toLowerCase();
          return name === stem || name.endsWith(`_${stem}`);
        });

  if (candidates.length === 1) {
    return { ok: true, dependency: candidates[0] };
  }
  if (candidates.length === 0) {
    return {
      ok: false,
      message: `does not match any declared dependency (${declared.join(", ")})`,
    };
  }
  return {
    ok: false,
    message: `matches several declared dependencies (${candidates.join(", ")})`,
  };
}
