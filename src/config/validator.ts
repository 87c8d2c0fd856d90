import { compileGuard } from "../schema/ajv.js";
import type { RelctlConfig } from "../types/config.js";

const NAME = { type: "string", minLength: 1 };

/** Config schema. Every key has a default in config/base.yaml. */
const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "remote", "ci_file", "branches", "gitlab", "deploy"],
  properties: {
    schema_version: NAME,
    remote: NAME,
    ci_file: { type: "string" },
    branches: {
      type: "object",
      required: ["stable", "integration"],
      properties: {
        stable: { type: "string" },
        integration: { type: "string" },
      },
    },
    gitlab: {
      type: "object",
      required: ["host", "token", "project"],
      properties: {
        host: NAME,
        token: { type: "string" },
        project: { type: "string" },
      },
    },
    deploy: {
      type: "object",
      required: ["jobs", "poll_interval_ms", "pipeline_attempts", "pipeline_statuses", "timeout_seconds"],
      properties: {
        jobs: {
          type: "object",
          required: ["production", "staging"],
          properties: {
            production: NAME,
            staging: NAME,
          },
        },
        poll_interval_ms: { type: "integer", minimum: 0 },
        pipeline_attempts: { type: "integer", minimum: 1 },
        pipeline_statuses: { type: "array", items: NAME, minItems: 1 },
        timeout_seconds: { type: "integer", minimum: 0 },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: RelctlConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a loaded config against the config schema. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const guard = await compileGuard<RelctlConfig>(CONFIG_SCHEMA);
  if (guard.check(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: guard.errorsText() };
}
