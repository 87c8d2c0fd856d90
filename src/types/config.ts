/** Layered configuration types. */

export type DeployConfig = {
  jobs: { production: string; staging: string };
  poll_interval_ms: number;
  pipeline_attempts: number;
  pipeline_statuses: string[];
  /** 0 disables the overall deploy deadline. */
  timeout_seconds: number;
};

export type RelctlConfig = {
  schema_version: string;
  remote: string;
  ci_file: string;
  /** Empty values are read from the repository's git-flow config. */
  branches: { stable: string; integration: string };
  gitlab: { host: string; token: string; project: string };
  deploy: DeployConfig;
};

/** Config with every repository-derived value filled in; built once per run. */
export type ReleaseSettings = {
  remote: string;
  ciFile: string;
  branches: { stable: string; integration: string };
  /** `project` is null when neither config nor the remote URL name one. */
  gitlab: { host: string; token: string; project: string | null };
  deploy: DeployConfig;
};
