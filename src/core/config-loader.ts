import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { ZodError } from "zod";
import { ConfigSchema, type Config } from "../schemas/config.schema.js";
import { ConfigValidationError, describeError } from "../utils/errors.js";
import { getUserConfigDir, workspacePath } from "../utils/paths.js";
import * as log from "../utils/logger.js";

type ConfigLayer = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigLayer {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Try to load a YAML file, return undefined if not found */
function tryLoadYaml(filePath: string): ConfigLayer | undefined {
  if (!fs.existsSync(filePath)) return undefined;
  let data: unknown;
  try {
    data = parseYaml(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigValidationError(`${filePath}: ${describeError(err)}`, "YAML");
  }
  // An empty file parses to null
  if (data === null || data === undefined) return {};
  if (!isPlainObject(data)) {
    throw new ConfigValidationError(`${filePath}: expected a mapping at the top level`, "YAML");
  }
  return data;
}

/** Deep merge objects: b overrides a, arrays are replaced */
export function deepMerge(a: ConfigLayer, b: ConfigLayer): ConfigLayer {
  const result = { ...a };
  for (const key of Object.keys(b)) {
    const bVal = b[key];
    const aVal = a[key];
    if (isPlainObject(bVal) && isPlainObject(aVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}

function toNumber(name: string, raw: string): number {
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(n)) {
    throw new ConfigValidationError(`${name} must be a number, got "${raw}"`, name);
  }
  return n;
}

/** FIRMFORGE_* variables, as a config layer */
export function envOverrides(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const layer: ConfigLayer = {};
  const section = (name: string): ConfigLayer => {
    const existing = layer[name];
    if (isPlainObject(existing)) return existing;
    const created: ConfigLayer = {};
    layer[name] = created;
    return created;
  };

  if (env.FIRMFORGE_DATA_DIR) section("storage").data_dir = env.FIRMFORGE_DATA_DIR;
  if (env.FIRMFORGE_MAX_CONCURRENT_COMPILES) {
    section("pool").max_concurrent_compiles = toNumber(
      "FIRMFORGE_MAX_CONCURRENT_COMPILES",
      env.FIRMFORGE_MAX_CONCURRENT_COMPILES,
    );
  }
  if (env.FIRMFORGE_LOG_LEVEL) section("logging").level = env.FIRMFORGE_LOG_LEVEL;
  if (env.FIRMFORGE_CATALOG_URL) section("catalog").index_url = env.FIRMFORGE_CATALOG_URL;
  if (env.FIRMFORGE_CATALOG_REFRESH_SEC) {
    section("catalog").refresh_interval_sec = toNumber(
      "FIRMFORGE_CATALOG_REFRESH_SEC",
      env.FIRMFORGE_CATALOG_REFRESH_SEC,
    );
  }
  return layer;
}

/** Validate a merged layer; zod issues become a ConfigValidationError naming the field */
export function parseConfig(raw: unknown): Config {
  try {
    return ConfigSchema.parse(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      const issue = err.issues[0];
      const field = issue && issue.path.length > 0 ? issue.path.join(".") : "root";
      throw new ConfigValidationError(
        `Invalid config at ${field}: ${issue?.message ?? err.message}`,
        field.toUpperCase().replace(/\./g, "_"),
      );
    }
    throw err;
  }
}

export interface LoadConfigOptions {
  cwd?: string;
  /** Directory holding the user-global config.yaml (default ~/.firmforge) */
  userConfigDir?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load config with 5-layer resolution:
 * 1. Schema defaults
 * 2. User global (~/.firmforge/config.yaml)
 * 3. Project shared (.firmforge/config.yaml)
 * 4. Project local (.firmforge/config.local.yaml)
 * 5. FIRMFORGE_* environment variables
 *
 * Each layer deep-merges over the previous. Every file is optional.
 */
export function resolveConfig(opts: LoadConfigOptions = {}): { config: Config; layers: string[] } {
  const layers: string[] = ["defaults"];
  let merged: ConfigLayer = {};

  const files: Array<[label: string, file: string]> = [
    ["~/.firmforge/config.yaml", path.join(opts.userConfigDir ?? getUserConfigDir(), "config.yaml")],
    [".firmforge/config.yaml", workspacePath("config.yaml", opts.cwd)],
    [".firmforge/config.local.yaml", workspacePath("config.local.yaml", opts.cwd)],
  ];
  for (const [label, file] of files) {
    const layer = tryLoadYaml(file);
    if (!layer) continue;
    merged = deepMerge(merged, layer);
    layers.push(label);
    log.debug(`Loaded config from ${label}`);
  }

  const fromEnv = envOverrides(opts.env);
  if (Object.keys(fromEnv).length > 0) {
    merged = deepMerge(merged, fromEnv);
    layers.push("environment");
  }

  return { config: parseConfig(merged), layers };
}

export function loadConfig(opts: LoadConfigOptions = {}): Config {
  return resolveConfig(opts).config;
}
