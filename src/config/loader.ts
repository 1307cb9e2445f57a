import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { resourceDir } from "../paths.js";
import { ConfigError } from "../errors.js";
import { validateConfig } from "./validator.js";
import type { ImagesmithConfig } from "../types/config.js";

export type ConfigTree = Record<string, unknown>;

export const ENV_PREFIX = "IMAGESMITH_";

function isPlainObject(value: unknown): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
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

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigTree {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (e) {
    throw new ConfigError(`Failed to parse ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) throw new ConfigError(`Config file is not a mapping: ${filePath}`);
  return parsed;
}

/** Parse an env value as a YAML scalar/flow node so "5" → 5 and "[a, b]" → ["a", "b"]. */
function parseEnvValue(value: string): unknown {
  try {
    const parsed: unknown = YAML.parse(value);
    return parsed ?? value;
  } catch {
    return value;
  }
}

function setPath(target: ConfigTree, keys: string[], value: unknown): void {
  let node = target;
  for (const key of keys.slice(0, -1)) {
    const next = node[key];
    if (isPlainObject(next)) {
      node = next;
    } else {
      const created: ConfigTree = {};
      node[key] = created;
      node = created;
    }
  }
  node[keys[keys.length - 1]] = value;
}

/**
 * Apply IMAGESMITH_ prefixed environment variable overrides.
 * IMAGESMITH_RUNS_DIR → runs_dir, IMAGESMITH_IMAGE__NAME → image.name
 */
export function applyEnvOverrides(config: ConfigTree, env: NodeJS.ProcessEnv = process.env): ConfigTree {
  const result = deepMerge({}, config);
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const keys = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .split("__")
      .filter((k) => k.length > 0);
    if (keys.length === 0) continue;
    setPath(result, keys, parseEnvValue(value));
  }
  return result;
}

/**
 * Load layered config: base.yaml ← env.yaml ← environment variables.
 *
 * @param envName - Optional environment name (e.g. "ci"). Loads `config/{envName}.yaml` as override layer.
 * @param configDir - Optional config directory path override.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): ConfigTree {
  const dir = configDir ?? resourceDir("config");

  // Layer 1: base.yaml
  const base = loadYaml(path.join(dir, "base.yaml"));

  // Layer 2: environment-specific override
  let merged = base;
  if (envName) {
    merged = deepMerge(base, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  // Layer 3: environment variables
  return applyEnvOverrides(merged, env);
}

/** Load and validate; throws ConfigError listing every schema violation. */
export async function loadValidatedConfig(opts: {
  envName?: string;
  configDir?: string;
  env?: NodeJS.ProcessEnv;
}): Promise<ImagesmithConfig> {
  if (opts.configDir && !fs.existsSync(opts.configDir)) {
    throw new ConfigError(`Config directory not found: ${path.resolve(opts.configDir)}`);
  }
  const raw = loadConfig(opts.envName, opts.configDir, opts.env);
  const res = await validateConfig(raw);
  if (!res.valid) throw new ConfigError(`Config invalid: ${res.errors}`);
  return res.config;
}
