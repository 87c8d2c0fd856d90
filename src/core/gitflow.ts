import type { GitOperations } from "../git/operations.js";
import { withErrorCode } from "../types/errors.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";

type FlowGit = Pick<GitOperations, "flow" | "checkout">;

/**
 * Cut a release with git-flow: start and finish the release branch (merging
 * it into both long-lived branches and tagging it), then return to the
 * integration branch.
 */
export async function cutRelease(
  git: FlowGit,
  tag: string,
  integrationBranch: string,
  logger: Logger = silentLogger,
): Promise<void> {
  logger.info(`[Release] Creating release ${tag}.`);
  await withErrorCode("COMMAND_FAILED", "git flow release start failed", git.flow(["release", "start", tag]));
  await withErrorCode(
    "COMMAND_FAILED",
    "git flow release finish failed",
    git.flow(["release", "finish", "-m", tag, tag]),
  );
  await withErrorCode("GIT_OPERATION_FAILED", `Checkout of ${integrationBranch} failed`, git.checkout(integrationBranch));
}
