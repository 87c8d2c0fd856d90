import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { RelctlConfig } from "../types/config.js";
import { ReleaseError } from "../types/errors.js";
import { validateConfig } from "./validator.js";

const CONFIG_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");

export const ENV_PREFIX = "RELCTL_";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isRecord(val)) {
      const current = result[key];
      result[key] = deepMerge(isRecord(current) ? current : {}, val);
    } else if (val !== undefined && val !== null) {
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
  return isRecord(parsed) ? parsed : {};
}

/**
 * Apply RELCTL_ prefixed environment variable overrides.
 * A double underscore descends one level: RELCTL_GITLAB__TOKEN → gitlab.token.
 * A value becomes a number only where the layer below holds a number.
 */
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    const leaf = segments.pop();
    if (!leaf) continue;

    let target = config;
    for (const segment of segments) {
      const next = target[segment];
      if (isRecord(next)) {
        target = next;
      } else {
        const created: Record<string, unknown> = {};
        target[segment] = created;
        target = created;
      }
    }
    target[leaf] = typeof target[leaf] === "number" && /^\d+$/.test(value) ? Number(value) : value;
  }
  return config;
}

export type LoadConfigOpts = {
  /** Loads `{configDir}/{profile}.yaml` as override layer. */
  profile?: string;
  configDir?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Load layered config without validating it: base.yaml ← {profile}.yaml ← environment variables.
 */
export function loadRawConfig(opts: LoadConfigOpts = {}): Record<string, unknown> {
  const dir = opts.configDir ?? CONFIG_DIR;

  // Layer 1: base.yaml
  const base = loadYaml(path.join(dir, "base.yaml"));

  // Layer 2: profile override
  let merged = base;
  if (opts.profile) {
    merged = deepMerge(base, loadYaml(path.join(dir, `${opts.profile}.yaml`)));
  }

  // Layer 3: environment variables
  return applyEnvOverrides(merged, opts.env ?? process.env);
}

/** Load and validate the layered config. */
export async function loadConfig(opts: LoadConfigOpts = {}): Promise<RelctlConfig> {
  const raw = loadRawConfig(opts);
  const result = await validateConfig(raw);
  if (!result.valid) {
    throw new ReleaseError("CONFIG_INVALID", `Invalid configuration: ${result.errors}`, {
      help: `Check ${opts.configDir ?? CONFIG_DIR} and any ${ENV_PREFIX}* environment variables.`,
    });
  }
  return result.config;
}
