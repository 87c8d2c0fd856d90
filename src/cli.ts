#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from "commander";
import { createRunContext, type CommonOpts, type RunContext } from "./commands/context.js";
import { deploy } from "./commands/deploy.js";
import { EXIT, toFailure, type CommandFailure } from "./commands/exit-codes.js";
import { nextVersionCommand } from "./commands/next-version.js";
import { release } from "./commands/release.js";
import { status } from "./commands/status.js";
import { validateAll } from "./commands/validate.js";
import { SyncStatusEvaluator } from "./core/sync-status.js";
import type { DeployOutcome } from "./core/deployer.js";
import { createLogger, type Logger, type OutputFormat } from "./logging/logger.js";
import { confirm } from "./prompt/confirm.js";
import {
  ENVIRONMENTS,
  INCREMENT_KINDS,
  isEnvironment,
  isIncrementKind,
  type Environment,
  type IncrementKind,
} from "./types/release.js";

function parseFormat(value: string): OutputFormat {
  if (value === "human" || value === "jsonl") return value;
  throw new InvalidArgumentError("Expected human or jsonl.");
}

function parseEnvironment(value: string): Environment {
  if (isEnvironment(value)) return value;
  throw new InvalidArgumentError(`Expected one of ${ENVIRONMENTS.join(", ")}.`);
}

function parseKind(value: string): IncrementKind {
  if (isIncrementKind(value)) return value;
  throw new InvalidArgumentError(`Expected one of ${INCREMENT_KINDS.join(", ")}.`);
}

/** Shared flags; every subcommand gets its own copy, as commander expects. */
function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Path to config directory (default: bundled config/)")
    .option("--profile <name>", "Config profile layered over base.yaml")
    .addOption(new Option("--format <format>", "Output format: human|jsonl").default("human").argParser(parseFormat))
    .option("--verbose", "Print debug output");
}

/** SIGINT aborts the run once; a second one falls back to the default handler. */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort(new Error("Interrupted")));
  return controller.signal;
}

function emit(format: OutputFormat, record: Record<string, unknown>, human: string): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "info", code: "OK", ...record }) + "\n");
  } else {
    process.stdout.write(human + "\n");
  }
}

function fail(logger: Logger, failure: CommandFailure): never {
  logger.error(failure.message, { code: failure.code, ...(failure.help ? { help: failure.help } : {}) });
  process.exit(failure.exitCode);
}

function describeDeploy(outcome: DeployOutcome): string {
  switch (outcome.kind) {
    case "success":
      return `Deploy job "${outcome.job.name}" succeeded (pipeline #${outcome.pipelineId}).`;
    case "failed":
      return `Deploy job "${outcome.job.name}" failed (pipeline #${outcome.pipelineId}).`;
    case "no_job":
      return `No deploy job to run in pipeline #${outcome.pipelineId}.`;
  }
}

/**
 * Build the run context, or report why it could not be built. Loading
 * happens before the configured logger exists, so errors go to a plain one.
 */
async function contextOrExit(opts: CommonOpts): Promise<RunContext> {
  try {
    return await createRunContext(opts);
  } catch (e) {
    fail(createLogger({ format: opts.format, verbose: opts.verbose }), toFailure(e));
  }
}

const program = new Command();

program.name("relctl").description("git-flow release and GitLab deploy CLI").version("0.1.0");

withCommonOptions(
  program
    .command("release")
    .description("Check the repository, cut a release, push it, and optionally deploy it")
    .addOption(new Option("--env <environment>", "Target environment").default("production").argParser(parseEnvironment))
    .addOption(new Option("--semver <kind>", "Version increment: major|minor|patch").default("patch").argParser(parseKind))
    .option("--force", "Release even when the repository is up-to-date")
    .option("-y, --yes", "Do not ask for confirmation")
    .option("--deploy", "Run the deploy job once pushed"),
).action(
  async (
    opts: CommonOpts & {
      env: Environment;
      semver: IncrementKind;
      force?: boolean;
      yes?: boolean;
      deploy?: boolean;
    },
  ) => {
    const ctx = await contextOrExit(opts);
    const signal = interruptSignal();
    const res = await release(
      {
        environment: opts.env,
        kind: opts.semver,
        force: opts.force,
        yes: opts.yes,
        deploy: opts.deploy,
        signal,
      },
      {
        repoPath: ctx.repoPath,
        git: ctx.git,
        settings: ctx.settings,
        logger: ctx.logger,
        confirm: (question) => confirm(question, { input: process.stdin, output: process.stderr, signal }),
      },
    );

    if (!res.ok) fail(ctx.logger, res);

    const released = res.version ? `Released ${res.version} to ${res.environment}.` : `Pushed ${res.environment}.`;
    emit(
      opts.format,
      {
        environment: res.environment,
        version: res.version,
        deploy: res.deploy,
      },
      res.deploy ? `${released}\n${describeDeploy(res.deploy)}` : released,
    );
    process.exitCode = res.exitCode;
  },
);

withCommonOptions(
  program
    .command("deploy")
    .description("Run the deploy job of the latest pipeline, without releasing")
    .addOption(new Option("--env <environment>", "Target environment").default("production").argParser(parseEnvironment)),
).action(async (opts: CommonOpts & { env: Environment }) => {
  const ctx = await contextOrExit(opts);
  const res = await deploy({ environment: opts.env, signal: interruptSignal() }, { settings: ctx.settings, logger: ctx.logger });
  if (!res.ok) fail(ctx.logger, res);

  emit(opts.format, { environment: opts.env, deploy: res.outcome }, describeDeploy(res.outcome));
  process.exitCode = res.exitCode;
});

withCommonOptions(
  program
    .command("next-version")
    .description("Print the version the next production release would create")
    .addOption(new Option("--semver <kind>", "Version increment: major|minor|patch").default("patch").argParser(parseKind)),
).action(async (opts: CommonOpts & { semver: IncrementKind }) => {
  const ctx = await contextOrExit(opts);
  const res = await nextVersionCommand({ kind: opts.semver }, { git: ctx.git });
  if (!res.ok) fail(ctx.logger, res);

  emit(opts.format, { current: res.current, next: res.next }, res.next);
});

withCommonOptions(
  program.command("status").description("Fetch and show how the current branch relates to its upstream"),
).action(async (opts: CommonOpts) => {
  const ctx = await contextOrExit(opts);
  const { stable, integration } = ctx.settings.branches;
  const evaluator = new SyncStatusEvaluator(ctx.git, ctx.settings.remote, [stable, integration], ctx.logger);
  const res = await status({ evaluator });
  if (!res.ok) fail(ctx.logger, res);

  emit(
    opts.format,
    { status: res.status, local: res.local, remote: res.remote, merge_base: res.mergeBase },
    res.status,
  );
});

withCommonOptions(
  program.command("validate").description("Validate the layered config and the response schemas"),
).action(async (opts: CommonOpts) => {
  const logger = createLogger({ format: opts.format, verbose: opts.verbose });
  const res = await validateAll({ configDir: opts.config, profile: opts.profile });

  if (!res.ok) {
    for (const err of res.errors) logger.error(err.message, { code: err.code });
    process.exit(res.exitCode);
  }

  for (const warning of res.warnings) logger.warn(warning.message, { code: warning.code });
  emit(opts.format, { schemas: res.schemas }, "OK");
  process.exitCode = EXIT.SUCCESS;
});

program.parseAsync(process.argv).catch((e: unknown) => {
  fail(createLogger({ format: "human" }), toFailure(e));
});
