import { cutRelease } from "../core/gitflow.js";
import { preflightChecks, runPreflight, type PreflightGit } from "../core/preflight.js";
import { ReleasePublisher } from "../core/publisher.js";
import { SyncStatusEvaluator } from "../core/sync-status.js";
import { formatVersion, nextVersion } from "../core/version.js";
import type { DeployOutcome } from "../core/deployer.js";
import type { GitOperations } from "../git/operations.js";
import { createGitLabClient } from "../gitlab/client.js";
import type { ConfirmAnswer } from "../prompt/confirm.js";
import { ReleaseError, withErrorCode } from "../types/errors.js";
import type { Environment, IncrementKind } from "../types/release.js";
import { deployExitCode, runDeploy, type DeployDeps } from "./deploy.js";
import { EXIT, toFailure, type CommandFailure, type ExitCode } from "./exit-codes.js";

export type ReleaseGit = PreflightGit &
  Pick<GitOperations, "fetchRefs" | "mergeBase" | "tagNames" | "flow" | "checkout" | "pushRefs">;

export type ReleaseOpts = {
  environment: Environment;
  kind: IncrementKind;
  /** Release even when there is nothing new to push. */
  force?: boolean;
  /** Skip the confirmation prompt. */
  yes?: boolean;
  /** Run the deploy job once the release is pushed. */
  deploy?: boolean;
  signal?: AbortSignal;
};

export type ReleaseDeps = DeployDeps & {
  repoPath: string;
  git: ReleaseGit;
  confirm: (question: string) => Promise<ConfirmAnswer>;
};

export type ReleaseResult =
  | {
      ok: true;
      exitCode: ExitCode;
      environment: Environment;
      /** Tag cut by this run; null for staging. */
      version: string | null;
      deploy: DeployOutcome | null;
    }
  | CommandFailure;

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new ReleaseError("RELEASE_CANCELLED", "Release cancelled.", { cause: signal.reason });
  }
}

async function confirmRelease(deps: ReleaseDeps, tag: string): Promise<void> {
  deps.logger.info(`[Release] This will create release tag ${tag}.`);
  const answer = await deps.confirm("Do you want to continue?");
  if (answer === "no") throw new ReleaseError("USER_DECLINED", "Cancelling.");
  if (answer === "dismissed") throw new ReleaseError("USER_DISMISSED", "Aborting.");
}

/**
 * Full release: preflight, cut the release (production), push, and
 * optionally deploy. Stops at the first failure; nothing is retried.
 */
export async function release(opts: ReleaseOpts, deps: ReleaseDeps): Promise<ReleaseResult> {
  const { git, settings, logger } = deps;
  const { stable, integration } = settings.branches;

  try {
    const evaluator = new SyncStatusEvaluator(git, settings.remote, [stable, integration], logger);
    await runPreflight(
      preflightChecks(git, evaluator, settings, { repoPath: deps.repoPath, force: opts.force }, logger),
      logger,
    );
    // Every precondition is settled before the first mutation.
    const service = opts.deploy ? (deps.service ?? createGitLabClient(settings.gitlab)) : undefined;
    throwIfCancelled(opts.signal);

    let version: string | null = null;
    if (opts.environment === "production") {
      const tags = await withErrorCode("GIT_OPERATION_FAILED", "Failed to list tags", git.tagNames());
      version = formatVersion(nextVersion(tags, opts.kind));
      if (opts.yes) {
        logger.info(`[Release] Creating release tag ${version}.`);
      } else {
        await confirmRelease(deps, version);
      }
      throwIfCancelled(opts.signal);
      await cutRelease(git, version, integration, logger);
    }

    throwIfCancelled(opts.signal);
    await new ReleasePublisher(git, settings, logger).push(opts.environment);

    if (!service) {
      return { ok: true, exitCode: EXIT.SUCCESS, environment: opts.environment, version, deploy: null };
    }

    const outcome = await runDeploy(opts.environment, { ...deps, service }, opts.signal);
    return { ok: true, exitCode: deployExitCode(outcome), environment: opts.environment, version, deploy: outcome };
  } catch (e) {
    return toFailure(e);
  }
}
