import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { isRecord } from "../types/archive.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");
const ENV_PREFIX = "LATENCYCTL_";

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isRecord(val)) {
      const current = result[key];
      result[key] = deepMerge(isRecord(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = YAML.parse(raw);
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/** Environment values are read as YAML scalars ("4" → 4); unparseable text stays a string. */
function parseEnvValue(value: string): unknown {
  try {
    const parsed: unknown = YAML.parse(value);
    return parsed ?? value;
  } catch {
    return value;
  }
}

/**
 * Apply LATENCYCTL_ prefixed environment variable overrides.
 * LATENCYCTL_EXTRACTION__CONCURRENCY=4 → extraction.concurrency = 4
 */
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  let merged = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    let layer: Record<string, unknown> = { [segments[segments.length - 1]]: parseEnvValue(value) };
    for (let i = segments.length - 2; i >= 0; i--) {
      layer = { [segments[i]]: layer };
    }
    merged = deepMerge(merged, layer);
  }
  return merged;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← environment variables.
 *
 * The result is unvalidated; pass it through `validateConfig` before use.
 *
 * @param envName - Optional environment name; loads `config/{envName}.yaml` as override layer.
 * @param configDir - Optional config directory path override.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));

  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged, env);
}
