import { refByBranch, refByTag, type GitOperations } from "../git/operations.js";
import type { ReleaseSettings } from "../types/config.js";
import { withErrorCode } from "../types/errors.js";
import type { Environment } from "../types/release.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";

type PublishGit = Pick<GitOperations, "pushRefs" | "tagNames">;

/**
 * Pushes a release to the remote. A failed push stops the run: partial
 * pushes are never replayed.
 */
export class ReleasePublisher {
  constructor(
    private readonly git: PublishGit,
    private readonly settings: ReleaseSettings,
    private readonly logger: Logger = silentLogger,
  ) {}

  async push(environment: Environment): Promise<void> {
    const { remote, branches } = this.settings;

    if (environment === "staging") {
      this.logger.info(`[Push] Pushing ${branches.integration} to ${remote}.`);
      await this.pushRefs([refByBranch(branches.integration)]);
      return;
    }

    this.logger.info(`[Push] Pushing ${branches.stable} and ${branches.integration} to ${remote}.`);
    await this.pushRefs([refByBranch(branches.stable), refByBranch(branches.integration)]);

    const tags = await withErrorCode("GIT_OPERATION_FAILED", "Failed to list tags", this.git.tagNames());
    this.logger.info(`[Push] Pushing ${tags.length} tag(s) to ${remote}.`);
    await this.pushRefs(tags.map(refByTag));
  }

  private async pushRefs(refspecs: string[]): Promise<void> {
    const { remote } = this.settings;
    await withErrorCode("GIT_OPERATION_FAILED", `Push to ${remote} failed`, this.git.pushRefs(remote, refspecs));
  }
}
