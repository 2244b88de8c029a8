import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { lifecycleAppConfigSchema, type LifecycleAppConfig, type PipelineConfig } from "@shared/schema";
import { parsePipelineConfig } from "./src/lifecycle/config";
import { ConfigurationError } from "./src/lifecycle/errors";

export const DEFAULT_CONFIG_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
  "config",
  "lifecycle.json"
);

/**
 * Loads sheet names and the pipeline configuration. LIFECYCLE_CONFIG points
 * at an alternative JSON file.
 */
export function loadLifecycleAppConfig(
  configPath: string = process.env.LIFECYCLE_CONFIG || DEFAULT_CONFIG_PATH
): LifecycleAppConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read lifecycle configuration ${configPath}: ${reason}`, [], [reason]);
  }

  const result = lifecycleAppConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid lifecycle configuration ${configPath}`, [], issues);
  }

  console.log(`[Lifecycle] Configuration loaded from ${configPath}`);
  return { ...result.data, pipeline: parsePipelineConfig(result.data.pipeline) };
}

/**
 * Top-level keys of `override` replace the matching keys of the base
 * configuration; the result is validated again.
 */
export function withConfigOverride(base: PipelineConfig, override: unknown): PipelineConfig {
  if (override === undefined || override === null) return base;
  if (typeof override !== "object" || Array.isArray(override)) {
    throw new ConfigurationError("Configuration override must be a JSON object", [], ["override: expected object"]);
  }
  return parsePipelineConfig({ ...base, ...override });
}
