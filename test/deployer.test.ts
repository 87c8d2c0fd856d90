import { describe, expect, it, vi } from "vitest";
import { DeploymentOrchestrator, deployDeadline, selectDeployJob } from "../src/core/deployer.js";
import type { EnvironmentTarget } from "../src/types/release.js";
import { FakePipelineService, pipeline, recordingLogger, testSettings } from "./fakes.js";

const PRODUCTION: EnvironmentTarget = {
  environment: "production",
  branch: "master",
  deployJob: "deploy_prod",
  pipelineRef: "master",
};

function orchestrator(service: FakePipelineService) {
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const logger = recordingLogger();
  const deployer = new DeploymentOrchestrator({
    service,
    config: testSettings().deploy,
    logger,
    sleep,
  });
  return { deployer, sleep, logger };
}

describe("selectDeployJob", () => {
  it("takes the first unsettled job whose name contains the token", () => {
    const jobs = [
      { id: 1, name: "build", status: "success" as const },
      { id: 2, name: "deploy_prod", status: "success" as const },
      { id: 3, name: "deploy_prod_eu", status: "manual" as const },
      { id: 4, name: "deploy_prod", status: "manual" as const },
    ];
    expect(selectDeployJob(jobs, "deploy_prod")?.id).toBe(3);
  });

  it("returns null when every match already succeeded or failed", () => {
    const jobs = [
      { id: 1, name: "deploy_prod", status: "success" as const },
      { id: 2, name: "deploy_prod", status: "failed" as const },
    ];
    expect(selectDeployJob(jobs, "deploy_prod")).toBeNull();
  });
});

describe("DeploymentOrchestrator", () => {
  it("gives up after the configured number of pipeline lookups", async () => {
    const service = new FakePipelineService();
    service.pipelineResponses = [[]];
    const { deployer, sleep } = orchestrator(service);

    await expect(deployer.deploy(PRODUCTION)).rejects.toMatchObject({
      code: "PIPELINE_NOT_FOUND",
      message: "Pipeline was not found on master after 60 attempts, aborting.",
    });
    expect(service.pipelineQueries).toHaveLength(60);
    expect(sleep).toHaveBeenCalledTimes(60);
    expect(service.played).toEqual([]);
  });

  it("plays the deploy job of the first running pipeline and waits for success", async () => {
    const service = new FakePipelineService();
    service.pipelineResponses = [[], [pipeline(7, "pending")], [pipeline(8, "running"), pipeline(7, "running")]];
    service.jobs = [
      { id: 1, name: "build", status: "success" },
      { id: 2, name: "deploy_prod", status: "manual" },
    ];
    service.jobStatuses.set(2, ["running", "success"]);
    const { deployer, sleep } = orchestrator(service);

    const outcome = await deployer.deploy(PRODUCTION);

    expect(outcome).toEqual({ kind: "success", pipelineId: 8, job: { id: 2, name: "deploy_prod", status: "success" } });
    expect(service.pipelineQueries).toEqual([{ ref: "master" }, { ref: "master" }, { ref: "master" }]);
    expect(service.played).toEqual([2]);
    expect(service.jobReads).toBe(2);
    // three before the pipeline lookups, one between the two job reads
    expect(sleep).toHaveBeenCalledTimes(4);
  });

  it("accepts a skipped pipeline", async () => {
    const service = new FakePipelineService();
    service.pipelineResponses = [[pipeline(11, "skipped")]];
    service.jobs = [{ id: 5, name: "deploy_prod", status: "manual" }];
    service.jobStatuses.set(5, ["success"]);
    const { deployer } = orchestrator(service);

    await expect(deployer.deploy(PRODUCTION)).resolves.toMatchObject({ kind: "success", pipelineId: 11 });
  });

  it("does nothing when there is no pending deploy job", async () => {
    const service = new FakePipelineService();
    service.pipelineResponses = [[pipeline(8, "running")]];
    service.jobs = [
      { id: 1, name: "build", status: "running" },
      { id: 2, name: "deploy_prod", status: "success" },
    ];
    const { deployer } = orchestrator(service);

    await expect(deployer.deploy(PRODUCTION)).resolves.toEqual({ kind: "no_job", pipelineId: 8 });
    expect(service.played).toEqual([]);
    expect(service.jobReads).toBe(0);
  });

  it("waits for earlier jobs before playing a created job, and reports failure", async () => {
    const service = new FakePipelineService();
    service.pipelineResponses = [[pipeline(8, "running")]];
    service.jobs = [{ id: 2, name: "deploy_prod", status: "created" }];
    service.jobStatuses.set(2, ["created", "manual", "running", "failed"]);
    const { deployer, logger } = orchestrator(service);

    const outcome = await deployer.deploy(PRODUCTION);

    expect(outcome).toEqual({ kind: "failed", pipelineId: 8, job: { id: 2, name: "deploy_prod", status: "failed" } });
    expect(service.played).toEqual([2]);
    expect(service.jobReads).toBe(4);
    expect(logger.entries.filter((e) => e.level === "error").map((e) => e.message)).toEqual([
      '[Deploy] "deploy_prod" job failed.',
    ]);
  });

  it("stops when cancelled", async () => {
    const service = new FakePipelineService();
    service.pipelineResponses = [[pipeline(8, "running")]];
    const controller = new AbortController();
    controller.abort();
    const { deployer } = orchestrator(service);

    await expect(deployer.deploy(PRODUCTION, { signal: controller.signal })).rejects.toMatchObject({
      code: "DEPLOY_CANCELLED",
    });
    expect(service.pipelineQueries).toEqual([]);
  });

  it("stops at the deadline while the job keeps running", async () => {
    let clock = 0;
    const service = new FakePipelineService();
    service.pipelineResponses = [[pipeline(8, "running")]];
    service.jobs = [{ id: 2, name: "deploy_prod", status: "manual" }];
    service.jobStatuses.set(2, ["running"]);
    const deployer = new DeploymentOrchestrator({
      service,
      config: testSettings().deploy,
      sleep: async (ms) => {
        clock += ms;
      },
      now: () => clock,
    });

    await expect(deployer.deploy(PRODUCTION, { deadline: 5000 })).rejects.toMatchObject({ code: "DEPLOY_TIMEOUT" });
    expect(service.played).toEqual([2]);
  });
});

describe("deployDeadline", () => {
  it("is absent for a zero timeout", () => {
    expect(deployDeadline(0, 1000)).toBeUndefined();
    expect(deployDeadline(30, 1000)).toBe(31000);
  });
});
