import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { ConfigError } from "../core/errors.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { LayerConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

export const DEFAULT_CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "LAYERCTL_";

type ConfigDoc = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigDoc {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigDoc, override: ConfigDoc): ConfigDoc {
  const result: ConfigDoc = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isPlainObject(val)) {
      const current = result[key];
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file as a mapping, or an empty object if not found. */
function loadYaml(filePath: string): ConfigDoc {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file is not a mapping: ${filePath}`);
  }
  return parsed;
}

function parseEnvValue(value: string): string | boolean {
  if (value === "true") return true;
  if (value === "false") return false;
  return value;
}

/**
 * Apply LAYERCTL_ prefixed environment variables.
 * A double underscore descends one level: LAYERCTL_STORAGE__BUCKET → storage.bucket.
 */
export function applyEnvOverrides(config: ConfigDoc, env: NodeJS.ProcessEnv = process.env): ConfigDoc {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter((s) => s.length > 0);
    if (segments.length === 0) continue;

    let patch: ConfigDoc = { [segments[segments.length - 1]]: parseEnvValue(value) };
    for (let i = segments.length - 2; i >= 0; i--) {
      patch = { [segments[i]]: patch };
    }
    result = deepMerge(result, patch);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← environment variables,
 * then validate it.
 *
 * @param envName - Optional environment name (e.g. "local"); loads `{envName}.yaml` over base.
 * @throws ConfigError when the merged document does not validate.
 */
export async function loadConfig(
  envName?: string,
  configDir?: string,
  env: NodeJS.ProcessEnv = process.env,
  registry?: SchemaRegistry,
): Promise<LayerConfig> {
  const dir = configDir ?? DEFAULT_CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }
  merged = applyEnvOverrides(merged, env);

  const res = await validateConfig(merged, registry);
  if (!res.valid) {
    throw new ConfigError("Invalid configuration", [res.errors]);
  }
  return res.config;
}
