import type { RelctlConfig, ReleaseSettings } from "../types/config.js";
import { extractProjectPath, type GitOperations } from "../git/operations.js";
import { ReleaseError } from "../types/errors.js";

/** git-flow's own config keys for the two long-lived branches. */
export const GITFLOW_STABLE_KEY = "gitflow.branch.master";
export const GITFLOW_INTEGRATION_KEY = "gitflow.branch.develop";

type SettingsSource = Pick<GitOperations, "getConfig" | "remoteUrl">;

async function branchName(git: SettingsSource, configured: string, key: string): Promise<string> {
  if (configured) return configured;
  const fromGit = await git.getConfig(key);
  if (!fromGit) {
    throw new ReleaseError("GITFLOW_NOT_INITIALIZED", `git-flow branch "${key}" is not configured.`, {
      help: "Run 'git flow init' in this repository, or set branches.* in the relctl config.",
    });
  }
  return fromGit;
}

/**
 * Resolve the repository-derived parts of the config once, at startup.
 * The returned value is passed to every component; nothing reads config later.
 */
export async function resolveSettings(config: RelctlConfig, git: SettingsSource): Promise<ReleaseSettings> {
  const stable = await branchName(git, config.branches.stable, GITFLOW_STABLE_KEY);
  const integration = await branchName(git, config.branches.integration, GITFLOW_INTEGRATION_KEY);

  let project: string | null = config.gitlab.project || null;
  if (!project) {
    const url = await git.remoteUrl(config.remote);
    project = url ? extractProjectPath(url) : null;
  }

  return {
    remote: config.remote,
    ciFile: config.ci_file,
    branches: { stable, integration },
    gitlab: { host: config.gitlab.host, token: config.gitlab.token, project },
    deploy: config.deploy,
  };
}
