import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { ConfigError } from "../core/errors.js";
import { validateConfig } from "./validator.js";
import type { HarnessConfig } from "../types/config.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "ILPCOMPAT_";

type ConfigTree = { [key: string]: unknown };

function isTree(value: unknown): value is ConfigTree {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isTree(val)) {
      const current = result[key];
      result[key] = deepMerge(isTree(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigTree {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isTree(parsed)) throw new ConfigError(`${filePath} must contain a mapping`);
  return parsed;
}

/**
 * Apply ILPCOMPAT_ prefixed environment variable overrides.
 * `__` separates nesting levels: ILPCOMPAT_TIMEOUTS__START_SEC → timeouts.start_sec
 */
function applyEnvOverrides(config: ConfigTree, env: NodeJS.ProcessEnv): ConfigTree {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    const override = segments.reduceRight<unknown>((acc, segment) => ({ [segment]: acc }), value);
    if (isTree(override)) result = deepMerge(result, override);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← environment variables,
 * then validate it.
 *
 * @param envName - Optional environment name (e.g., "ci"). Loads `config/{envName}.yaml` as override layer.
 * @param configDir - Optional config directory path override.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): HarnessConfig {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }
  merged = applyEnvOverrides(merged, env);

  const res = validateConfig(merged);
  if (!res.valid) throw new ConfigError(`Invalid config in ${dir}: ${res.errors}`);
  return res.config;
}
