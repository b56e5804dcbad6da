import path from "node:path";

import fse from "fs-extra";

import { formatIssues } from "./config-loader.js";
import { RegistryError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { RegistrySchema, type Registry } from "./registry.js";

// =============================================================================
// TYPES
// =============================================================================

export interface RegistryStore {
  readonly registryPath: string;
  load(): Promise<Registry>;
  save(registry: Registry): Promise<void>;
}

const REGISTRY_HINT = "Check registry_path in querydeck.yaml.";

// =============================================================================
// JSON STORE
// =============================================================================

export class JsonRegistryStore implements RegistryStore {
  readonly registryPath: string;

  constructor(registryPath: string) {
    this.registryPath = path.resolve(registryPath);
  }

  async load(): Promise<Registry> {
    if (!(await fse.pathExists(this.registryPath))) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.registry,
        title: "Registry missing.",
        message: `Registry not found: ${this.registryPath}`,
        hint: REGISTRY_HINT,
      });
    }

    try {
      const raw = await fse.readFile(this.registryPath, "utf8");
      return parseRegistry(raw, this.registryPath);
    } catch (err) {
      if (err instanceof RegistryError) {
        throw new UserFacingError({
          code: USER_FACING_ERROR_CODES.registry,
          title: "Registry invalid.",
          message: err.message,
          hint: REGISTRY_HINT,
          cause: err,
        });
      }
      throw err;
    }
  }

  async save(registry: Registry): Promise<void> {
    await fse.ensureDir(path.dirname(this.registryPath));
    await fse.writeFile(this.registryPath, `${JSON.stringify(registry, null, 2)}\n`, "utf8");
  }
}

// =============================================================================
// PARSING
// =============================================================================

export function parseRegistry(raw: string, source: string): Registry {
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    throw new RegistryError(`Failed to parse registry JSON at ${source}`, err);
  }

  const parsed = RegistrySchema.safeParse(doc);
  if (!parsed.success) {
    throw new RegistryError(
      `Invalid registry at ${source}:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }

  return parsed.data;
}
