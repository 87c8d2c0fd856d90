import { describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { preflightChecks, runPreflight } from "../src/core/preflight.js";
import type { SyncStatus } from "../src/types/release.js";
import { recordingLogger, testSettings } from "./fakes.js";

function repoDir(withCiFile = true): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "relctl-preflight-"));
  if (withCiFile) fs.writeFileSync(path.join(dir, ".gitlab-ci.yml"), "stages: [deploy]\n");
  return dir;
}

function fakeGit() {
  return {
    gitInstalled: vi.fn(async () => true),
    isRepository: vi.fn(async () => true),
    gitflowVersion: vi.fn(async () => "1.12.3 (AVH Edition)"),
    gitflowConfig: vi.fn(async () => "Branch name for production releases: master\n"),
    currentBranch: vi.fn(async () => "develop"),
    revParse: vi.fn(async (_spec: string) => "aaa"),
    isClean: vi.fn(async () => true),
  };
}

function fakeEvaluator(status: SyncStatus = "need_to_push") {
  return { evaluate: vi.fn(async () => ({ status, local: "bbb", remote: "aaa", mergeBase: "aaa" })) };
}

async function run(
  git: ReturnType<typeof fakeGit>,
  evaluator = fakeEvaluator(),
  opts: { force?: boolean; repoPath?: string } = {},
) {
  const logger = recordingLogger();
  const checks = preflightChecks(git, evaluator, testSettings(), { repoPath: opts.repoPath ?? repoDir(), force: opts.force }, logger);
  await runPreflight(checks, logger);
  return logger;
}

describe("preflight", () => {
  it("runs the checks in order", () => {
    const checks = preflightChecks(fakeGit(), fakeEvaluator(), testSettings(), { repoPath: repoDir() });
    expect(checks.map((c) => c.id)).toEqual([
      "git",
      "repository",
      "gitflow",
      "gitflow-init",
      "branch",
      "upstreams",
      "sync",
      "ci-file",
      "clean",
    ]);
  });

  it("passes a releasable repository", async () => {
    const git = fakeGit();
    const logger = await run(git);
    expect(logger.entries.filter((e) => e.level === "warn")).toEqual([]);
    expect(git.revParse.mock.calls).toEqual([["master@{u}"], ["develop@{u}"]]);
  });

  it("stops at a missing git without running later checks", async () => {
    const git = fakeGit();
    git.gitInstalled.mockRejectedValueOnce(new Error("spawn git ENOENT"));

    await expect(run(git)).rejects.toMatchObject({ code: "GIT_NOT_FOUND", category: "precondition" });
    expect(git.isRepository).not.toHaveBeenCalled();
  });

  it("requires a git repository", async () => {
    const git = fakeGit();
    git.isRepository.mockResolvedValueOnce(false);
    await expect(run(git)).rejects.toMatchObject({ code: "NOT_GIT_REPOSITORY" });
  });

  it("requires git-flow, in its AVH edition", async () => {
    const missing = fakeGit();
    missing.gitflowVersion.mockRejectedValueOnce(new Error("git: 'flow' is not a git command."));
    await expect(run(missing)).rejects.toMatchObject({ code: "GITFLOW_NOT_FOUND" });

    const original = fakeGit();
    original.gitflowVersion.mockResolvedValueOnce("0.4.1");
    await expect(run(original)).rejects.toMatchObject({ code: "GITFLOW_WRONG_VERSION" });
  });

  it("requires git flow init", async () => {
    const git = fakeGit();
    git.gitflowConfig.mockRejectedValueOnce(new Error("Not a gitflow-enabled repo yet."));
    await expect(run(git)).rejects.toMatchObject({ code: "GITFLOW_NOT_INITIALIZED", help: "Run 'git flow init'." });
  });

  it("requires the integration branch to be checked out", async () => {
    const git = fakeGit();
    git.currentBranch.mockResolvedValueOnce("master");
    await expect(run(git)).rejects.toMatchObject({
      code: "WRONG_BRANCH",
      message: "Please checkout the develop branch.",
    });
  });

  it("requires an upstream for both long-lived branches", async () => {
    const git = fakeGit();
    const evaluator = fakeEvaluator();
    git.revParse.mockImplementation(async (spec: string) => {
      if (spec === "master@{u}") throw new Error("fatal: no upstream configured for branch 'master'");
      return "aaa";
    });

    await expect(run(git, evaluator)).rejects.toMatchObject({
      code: "UPSTREAM_NOT_CONFIGURED",
      message: "Upstream branch is not configured for master.",
    });
    expect(evaluator.evaluate).not.toHaveBeenCalled();
  });

  it("gates on the sync status, honouring force", async () => {
    await expect(run(fakeGit(), fakeEvaluator("up_to_date"))).rejects.toMatchObject({ code: "REPOSITORY_UP_TO_DATE" });
    await expect(run(fakeGit(), fakeEvaluator("diverged"))).rejects.toMatchObject({ code: "REPOSITORY_DIVERGED" });
    await expect(run(fakeGit(), fakeEvaluator("up_to_date"), { force: true })).resolves.toBeDefined();
  });

  it("only warns about a missing CI file", async () => {
    const logger = await run(fakeGit(), fakeEvaluator(), { repoPath: repoDir(false) });
    expect(logger.entries.filter((e) => e.level === "warn").map((e) => e.message)).toEqual([
      ".gitlab-ci.yml not found.",
    ]);
  });

  it("refuses a dirty working tree", async () => {
    const git = fakeGit();
    git.isClean.mockResolvedValueOnce(false);
    await expect(run(git)).rejects.toMatchObject({ code: "REPOSITORY_DIRTY" });
  });
});
