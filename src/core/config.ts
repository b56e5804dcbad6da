import { z } from "zod";

const DuneSchema = z.object({
  // Optional: the client falls back to DUNE_API_KEY.
  api_key: z.string().min(1).optional(),
  performance: z.enum(["medium", "large"]).default("medium"),
  poll_interval_ms: z.number().int().positive().default(2000),
});

const SmokeSchema = z.object({
  timeout_seconds: z.number().int().positive().default(300),
});

export const ProjectConfigSchema = z
  .object({
    project_root: z.string().min(1).default("."),
    registry_path: z.string().min(1).default("queries/registry.json"),
    logs_dir: z.string().min(1).default(".querydeck/logs"),
    dune: DuneSchema.default({}),
    smoke: SmokeSchema.default({}),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type DuneConfig = ProjectConfig["dune"];

export const CONFIG_FILE_NAME = "querydeck.yaml";
