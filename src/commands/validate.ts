import fs from "node:fs";
import { loadRawConfig, type LoadConfigOpts } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { createRegistry } from "../schema/registry.js";
import { errMsg } from "../types/errors.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
};

export type ValidateResult =
  | { ok: true; schemas: string[]; warnings: Diagnostic[] }
  | { ok: false; exitCode: ExitCode; errors: Diagnostic[] };

function diag(level: Diagnostic["level"], code: string, message: string): Diagnostic {
  return { level, code, message };
}

/**
 * Validate the layered config and the response schemas. Reports every
 * problem found instead of stopping at the first.
 */
export async function validateAll(opts: LoadConfigOpts & { schemaDir?: string }): Promise<ValidateResult> {
  const errors: Diagnostic[] = [];
  const warnings: Diagnostic[] = [];

  if (opts.configDir && !fs.existsSync(opts.configDir)) {
    return {
      ok: false,
      exitCode: EXIT.INVALID_ARGS,
      errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${opts.configDir}`)],
    };
  }

  try {
    const result = await validateConfig(loadRawConfig(opts));
    if (!result.valid) {
      errors.push(diag("error", "CONFIG_INVALID", `Config invalid: ${result.errors}`));
    } else if (!result.config.gitlab.token) {
      warnings.push(diag("warn", "GITLAB_TOKEN_MISSING", "gitlab.token is empty; deploys will be rejected by GitLab."));
    }
  } catch (e) {
    errors.push(diag("error", "CONFIG_READ_FAILED", `Failed to read config: ${errMsg(e)}`));
  }

  let schemas: string[] = [];
  try {
    const registry = createRegistry(opts.schemaDir);
    for (const name of registry.names()) {
      // compiling rejects a malformed schema
      await registry.validate(name, null);
    }
    schemas = registry.names();
  } catch (e) {
    errors.push(diag("error", "SCHEMA_INVALID", `Failed to load schemas: ${errMsg(e)}`));
  }

  if (errors.length > 0) return { ok: false, exitCode: EXIT.INVALID_ARGS, errors };
  return { ok: true, schemas, warnings };
}
