import type { PipelineService } from "../gitlab/service.js";
import type { DeployConfig } from "../types/config.js";
import { ReleaseError } from "../types/errors.js";
import type { Job } from "../types/gitlab.js";
import type { EnvironmentTarget } from "../types/release.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { waitFor, type PollOpts, type Sleep } from "./poll.js";

export type DeployOutcome =
  | { kind: "success"; pipelineId: number; job: Job }
  | { kind: "failed"; pipelineId: number; job: Job }
  | { kind: "no_job"; pipelineId: number };

export type DeployRunOpts = {
  signal?: AbortSignal;
  /** Epoch milliseconds; waiting past it throws DEPLOY_TIMEOUT. */
  deadline?: number;
};

export type DeployerDeps = {
  service: PipelineService;
  config: Pick<DeployConfig, "poll_interval_ms" | "pipeline_attempts" | "pipeline_statuses">;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
};

/** Absolute deadline for a deploy started at `startedAt`; none when the timeout is 0. */
export function deployDeadline(timeoutSeconds: number, startedAt: number): number | undefined {
  return timeoutSeconds > 0 ? startedAt + timeoutSeconds * 1000 : undefined;
}

/** A deploy job is done once it either succeeded or failed. */
function isSettled(job: Job): boolean {
  return job.status === "success" || job.status === "failed";
}

/**
 * Pick the first job, in the order the service lists them, whose name contains
 * the deploy token and which has not already succeeded or failed.
 */
export function selectDeployJob(jobs: Job[], deployJob: string): Job | null {
  return jobs.find((job) => job.name.includes(deployJob) && !isSettled(job)) ?? null;
}

/**
 * Finds the pipeline created by the last push and
 * drives its deploy job to completion.
 *
 * locate pipeline (bounded) → select job → wait while `created` → play → wait for success/failed
 */
export class DeploymentOrchestrator {
  private readonly service: PipelineService;
  private readonly config: DeployerDeps["config"];
  private readonly logger: Logger;
  private readonly sleep?: Sleep;
  private readonly now?: () => number;

  constructor(deps: DeployerDeps) {
    this.service = deps.service;
    this.config = deps.config;
    this.logger = deps.logger ?? silentLogger;
    this.sleep = deps.sleep;
    this.now = deps.now;
  }

  async deploy(target: EnvironmentTarget, opts: DeployRunOpts = {}): Promise<DeployOutcome> {
    this.logger.info("[Deploy] Fetching latest pipeline.", { ref: target.pipelineRef });
    const pipelineId = await this.locatePipeline(target.pipelineRef, opts);
    this.logger.info(`[Deploy] Found pipeline #${pipelineId}.`);

    const jobs = await this.service.listPipelineJobs(pipelineId);
    const selected = selectDeployJob(jobs, target.deployJob);
    if (!selected) {
      this.logger.info(`[Deploy] No pending "${target.deployJob}" job in pipeline #${pipelineId}, nothing to do.`);
      return { kind: "no_job", pipelineId };
    }

    // A `created` job is queued behind earlier jobs of the pipeline.
    if (selected.status === "created") {
      this.logger.info("[Deploy] Waiting for previous jobs to be over.");
      await this.waitForJob(selected.id, (job) => job.status !== "created", { ...opts, delayFirst: true }, "previous jobs");
    }

    await this.service.playJob(selected.id);
    this.logger.info(`[Deploy] Playing "${selected.name}" job.`, { jobId: selected.id });

    const job = await this.waitForJob(selected.id, isSettled, opts, `job "${selected.name}"`);
    if (job.status === "failed") {
      this.logger.error(`[Deploy] "${job.name}" job failed.`, { jobId: job.id });
      return { kind: "failed", pipelineId, job };
    }
    this.logger.info(`[Deploy] "${job.name}" job succeeded.`, { jobId: job.id });
    return { kind: "success", pipelineId, job };
  }

  /** Pipeline creation lags behind the push, so discovery retries a bounded number of times. */
  private async locatePipeline(ref: string, opts: DeployRunOpts): Promise<number> {
    const statuses = new Set(this.config.pipeline_statuses);
    const attempts = this.config.pipeline_attempts;

    const id = await waitFor(
      async () => {
        const pipelines = await this.service.listPipelines({ ref });
        const match = pipelines.find((p) => statuses.has(p.status));
        return match ? match.id : null;
      },
      { ...this.pollOpts(opts, `a pipeline on ${ref}`), maxAttempts: attempts, delayFirst: true },
    );

    if (id === null) {
      throw new ReleaseError(
        "PIPELINE_NOT_FOUND",
        `Pipeline was not found on ${ref} after ${attempts} attempts, aborting.`,
        { help: "Check that the push triggered a pipeline and that .gitlab-ci.yml is set up for this ref." },
      );
    }
    return id;
  }

  private async waitForJob(
    jobId: number,
    done: (job: Job) => boolean,
    opts: DeployRunOpts & { delayFirst?: boolean },
    what: string,
  ): Promise<Job> {
    const job = await waitFor(
      async () => {
        const current = await this.service.getJob(jobId);
        this.logger.debug("[Deploy] Job status.", { jobId, status: current.status });
        return done(current) ? current : null;
      },
      { ...this.pollOpts(opts, what), delayFirst: opts.delayFirst },
    );
    // Unbounded polls only come back empty-handed by throwing.
    if (job === null) throw new Error(`Polling for ${what} ended without a result`);
    return job;
  }

  private pollOpts(opts: DeployRunOpts, what: string): PollOpts {
    return {
      intervalMs: this.config.poll_interval_ms,
      signal: opts.signal,
      deadline: opts.deadline,
      what,
      sleep: this.sleep,
      now: this.now,
    };
  }
}
