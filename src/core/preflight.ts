import fs from "node:fs";
import path from "node:path";
import type { GitOperations } from "../git/operations.js";
import type { ReleaseSettings } from "../types/config.js";
import { ReleaseError } from "../types/errors.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { gateSyncStatus, upstreamNotConfigured, type SyncStatusEvaluator } from "./sync-status.js";

/** git-flow-avh identifies itself with this marker in `git flow version`. */
export const GITFLOW_AVH_MARKER = "AVH";

export type PreflightGit = Pick<
  GitOperations,
  "gitInstalled" | "isRepository" | "gitflowVersion" | "gitflowConfig" | "currentBranch" | "revParse" | "isClean"
>;

export type PreflightOpts = {
  repoPath: string;
  force?: boolean;
};

export type PreflightCheck = {
  id: string;
  run: () => Promise<void>;
};

/**
 * Checks run before anything is mutated, in order. The first failure stops
 * the run; nothing after it executes.
 */
export function preflightChecks(
  git: PreflightGit,
  evaluator: Pick<SyncStatusEvaluator, "evaluate">,
  settings: ReleaseSettings,
  opts: PreflightOpts,
  logger: Logger = silentLogger,
): PreflightCheck[] {
  const { stable, integration } = settings.branches;

  return [
    {
      id: "git",
      run: async () => {
        const installed = await git.gitInstalled().catch(() => false);
        if (!installed) {
          throw new ReleaseError("GIT_NOT_FOUND", "git is not installed.", {
            help: "Install git with your package manager (brew install git, apt install git).",
          });
        }
      },
    },
    {
      id: "repository",
      run: async () => {
        if (!(await git.isRepository())) {
          throw new ReleaseError("NOT_GIT_REPOSITORY", "Not in a git repository.", {
            help: "Run relctl from within a git repository.",
          });
        }
      },
    },
    {
      id: "gitflow",
      run: async () => {
        let version: string;
        try {
          version = await git.gitflowVersion();
        } catch (e) {
          throw new ReleaseError("GITFLOW_NOT_FOUND", "git-flow is not installed.", {
            help: "Install git-flow-avh (brew install git-flow-avh, apt install git-flow).",
            cause: e,
          });
        }
        if (!version.includes(GITFLOW_AVH_MARKER)) {
          throw new ReleaseError("GITFLOW_WRONG_VERSION", `Unsupported git-flow edition: ${version}`, {
            help: "relctl needs git-flow-avh; replace the original git-flow with it.",
          });
        }
      },
    },
    {
      id: "gitflow-init",
      run: async () => {
        try {
          await git.gitflowConfig();
        } catch (e) {
          throw new ReleaseError("GITFLOW_NOT_INITIALIZED", "Repository is not initialized with git-flow.", {
            help: "Run 'git flow init'.",
            cause: e,
          });
        }
      },
    },
    {
      id: "branch",
      run: async () => {
        const branch = await git.currentBranch();
        if (branch !== integration) {
          throw new ReleaseError("WRONG_BRANCH", `Please checkout the ${integration} branch.`, {
            help: `git checkout ${integration}`,
          });
        }
      },
    },
    {
      id: "upstreams",
      run: async () => {
        for (const branch of [stable, integration]) {
          try {
            await git.revParse(`${branch}@{u}`);
          } catch (e) {
            throw upstreamNotConfigured(branch, e);
          }
        }
      },
    },
    {
      id: "sync",
      run: async () => {
        const snapshot = await evaluator.evaluate();
        gateSyncStatus(snapshot.status, { force: opts.force }, logger);
      },
    },
    {
      id: "ci-file",
      run: async () => {
        if (fs.existsSync(path.join(opts.repoPath, settings.ciFile))) {
          logger.debug(`${settings.ciFile} found.`);
        } else {
          logger.warn(`${settings.ciFile} not found.`);
        }
      },
    },
    {
      id: "clean",
      run: async () => {
        if (!(await git.isClean())) {
          throw new ReleaseError("REPOSITORY_DIRTY", "Repository is dirty.", {
            help: "Commit or stash your changes before running relctl.",
          });
        }
      },
    },
  ];
}

export async function runPreflight(checks: PreflightCheck[], logger: Logger = silentLogger): Promise<void> {
  for (const check of checks) {
    logger.debug(`[Setup] Checking ${check.id}.`);
    await check.run();
  }
}
