import type { GitOperations } from "../git/operations.js";
import { trackingRefspec } from "../git/operations.js";
import { ReleaseError, errMsg, withErrorCode } from "../types/errors.js";
import type { SyncStatus } from "../types/release.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";

/** Local HEAD and the branch it tracks. */
export const LOCAL_REV = "@{0}";
export const UPSTREAM_REV = "@{u}";

/**
 * Pure function: classify local vs. remote from three commit ids.
 */
export function evaluateSyncStatus(local: string, remote: string, mergeBase: string): SyncStatus {
  if (local === remote) return "up_to_date";
  if (local === mergeBase) return "need_to_pull";
  if (remote === mergeBase) return "need_to_push";
  return "diverged";
}

/**
 * Release gate: only `need_to_push` proceeds, or `up_to_date` with force.
 */
export function gateSyncStatus(status: SyncStatus, opts: { force?: boolean } = {}, logger: Logger = silentLogger): void {
  switch (status) {
    case "need_to_push":
      return;
    case "up_to_date":
      if (opts.force) {
        logger.info("[Setup] Repository is up-to-date, but force flag has been passed.");
        return;
      }
      throw new ReleaseError("REPOSITORY_UP_TO_DATE", "Repository is up-to-date, nothing to release.", {
        help: "Use --force to create a release anyway.",
      });
    case "need_to_pull":
      throw new ReleaseError("REPOSITORY_NEED_PULL", "Repository needs to be pulled first.", {
        help: "Run 'git pull' to bring in the remote changes.",
      });
    case "diverged":
      throw new ReleaseError("REPOSITORY_DIVERGED", "Local and remote branches have diverged.", {
        help: "Merge or rebase the branches before releasing.",
      });
  }
}

export type SyncSnapshot = {
  status: SyncStatus;
  local: string;
  remote: string;
  mergeBase: string;
};

/**
 * Fetches the long-lived branches, then compares local HEAD with its upstream.
 * Every call reads fresh state from the repository.
 */
export class SyncStatusEvaluator {
  constructor(
    private readonly git: Pick<GitOperations, "fetchRefs" | "revParse" | "mergeBase">,
    private readonly remote: string,
    private readonly branches: string[],
    private readonly logger: Logger = silentLogger,
  ) {}

  async evaluate(): Promise<SyncSnapshot> {
    const refspecs = this.branches.map((b) => trackingRefspec(this.remote, b));
    this.logger.debug("Fetching tracked branches.", { remote: this.remote, refspecs });
    try {
      await this.git.fetchRefs(this.remote, refspecs, { tags: true });
    } catch (e) {
      throw new ReleaseError("GIT_OPERATION_FAILED", `Failed to fetch from ${this.remote}: ${errMsg(e)}`, { cause: e });
    }

    let local: string;
    let remote: string;
    try {
      local = await this.git.revParse(LOCAL_REV);
      remote = await this.git.revParse(UPSTREAM_REV);
    } catch (e) {
      throw upstreamNotConfigured(undefined, e);
    }

    const mergeBase = await withErrorCode(
      "GIT_OPERATION_FAILED",
      "Failed to find the merge base",
      this.git.mergeBase(local, remote),
    );
    const status = evaluateSyncStatus(local, remote, mergeBase);
    this.logger.debug("Repository sync status.", { status, local, remote, mergeBase });
    return { status, local, remote, mergeBase };
  }
}

export function upstreamNotConfigured(branch?: string, cause?: unknown): ReleaseError {
  const help = branch
    ? `Run 'git checkout ${branch} && git branch --set-upstream-to=origin/${branch} ${branch}'.`
    : "Set an upstream with 'git branch --set-upstream-to=origin/<branch>'.";
  return new ReleaseError(
    "UPSTREAM_NOT_CONFIGURED",
    branch ? `Upstream branch is not configured for ${branch}.` : "Upstream branch is not configured.",
    { help, cause },
  );
}
