import { DeploymentOrchestrator, deployDeadline, type DeployOutcome } from "../core/deployer.js";
import type { Sleep } from "../core/poll.js";
import { environmentTarget } from "../core/environment.js";
import { createGitLabClient } from "../gitlab/client.js";
import type { PipelineService } from "../gitlab/service.js";
import type { Logger } from "../logging/logger.js";
import type { ReleaseSettings } from "../types/config.js";
import type { Environment } from "../types/release.js";
import { EXIT, toFailure, type CommandFailure, type ExitCode } from "./exit-codes.js";

export type DeployDeps = {
  settings: ReleaseSettings;
  logger: Logger;
  /** Defaults to a GitLab client built from settings. */
  service?: PipelineService;
  sleep?: Sleep;
  now?: () => number;
};

export type DeployCommandOpts = {
  environment: Environment;
  signal?: AbortSignal;
};

export type DeployResult = { ok: true; exitCode: ExitCode; outcome: DeployOutcome } | CommandFailure;

/** A failed deploy job is reported, not thrown; it still fails the run. */
export function deployExitCode(outcome: DeployOutcome): ExitCode {
  return outcome.kind === "failed" ? EXIT.DEPLOY_FAILED : EXIT.SUCCESS;
}

/** Drive the deploy job of the environment's latest pipeline. Throws on error. */
export async function runDeploy(
  environment: Environment,
  deps: DeployDeps,
  signal?: AbortSignal,
): Promise<DeployOutcome> {
  const now = deps.now ?? Date.now;
  const service = deps.service ?? createGitLabClient(deps.settings.gitlab);
  const orchestrator = new DeploymentOrchestrator({
    service,
    config: deps.settings.deploy,
    logger: deps.logger,
    sleep: deps.sleep,
    now,
  });
  const target = environmentTarget(environment, deps.settings);
  return orchestrator.deploy(target, {
    signal,
    deadline: deployDeadline(deps.settings.deploy.timeout_seconds, now()),
  });
}

export async function deploy(opts: DeployCommandOpts, deps: DeployDeps): Promise<DeployResult> {
  try {
    const outcome = await runDeploy(opts.environment, deps, opts.signal);
    return { ok: true, exitCode: deployExitCode(outcome), outcome };
  } catch (e) {
    return toFailure(e);
  }
}
