import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { resolveSettings } from "../config/settings.js";
import { SshAgentCredentials } from "../git/credentials.js";
import { GitOperations } from "../git/operations.js";
import { createLogger, type Logger, type OutputFormat } from "../logging/logger.js";
import type { RelctlConfig, ReleaseSettings } from "../types/config.js";
import { withErrorCode } from "../types/errors.js";

/** Flags every command takes. */
export type CommonOpts = {
  /** Config directory; the bundled config/ when omitted. */
  config?: string;
  profile?: string;
  format: OutputFormat;
  verbose?: boolean;
};

export type RunContext = {
  repoPath: string;
  config: RelctlConfig;
  settings: ReleaseSettings;
  git: GitOperations;
  logger: Logger;
};

/**
 * Load config, wire the repository and logger, and resolve settings once.
 */
export async function createRunContext(opts: CommonOpts, repoPath: string = process.cwd()): Promise<RunContext> {
  const config = await loadConfig({
    profile: opts.profile,
    configDir: opts.config ? path.resolve(opts.config) : undefined,
  });
  const logger = createLogger({ format: opts.format, verbose: opts.verbose, secrets: [config.gitlab.token] });

  const credentials = new SshAgentCredentials();
  if (!credentials.hasAgent()) {
    logger.warn("SSH_AUTH_SOCK is not set; pushes over SSH will fail without an agent.");
  }
  const git = new GitOperations(repoPath, { credentials });

  const settings = await withErrorCode(
    "GIT_OPERATION_FAILED",
    "Failed to read repository settings",
    resolveSettings(config, git),
  );
  logger.debug("Resolved settings.", {
    remote: settings.remote,
    stable: settings.branches.stable,
    integration: settings.branches.integration,
    project: settings.gitlab.project,
  });

  return { repoPath, config, settings, git, logger };
}
