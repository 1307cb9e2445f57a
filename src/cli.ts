#!/usr/bin/env node

import fs from "node:fs";
import path from "node:path";
import { Command, InvalidArgumentError } from "commander";
import { build } from "./commands/build.js";
import { EXIT, exitCodeFor } from "./commands/exit-codes.js";
import { showPlan } from "./commands/plan.js";
import { release } from "./commands/release.js";
import { listRuns, status } from "./commands/status.js";
import { validateAll } from "./commands/validate.js";
import { showVersion } from "./commands/version.js";
import type { ErrorInfo } from "./errors.js";
import { createReporter, type OutputFormat, type Reporter } from "./output/reporter.js";
import { loadCredentials } from "./publish/tags.js";
import type { ReleaseTarget } from "./types/config.js";

type CommonFlags = { config?: string; env?: string; format: OutputFormat };

function parseFormat(value: string): OutputFormat {
  if (value === "human" || value === "jsonl") return value;
  throw new InvalidArgumentError("Expected human or jsonl.");
}

function parseTarget(value: string): ReleaseTarget {
  if (value === "base" || value === "rootless") return value;
  throw new InvalidArgumentError("Expected base or rootless.");
}

function reporterFor(format: OutputFormat): Reporter {
  const credentials = loadCredentials(process.env);
  return createReporter(format, { secrets: credentials ? [credentials.token] : [] });
}

function fail(reporter: Reporter, error: ErrorInfo, details?: Record<string, unknown>): never {
  reporter.error(error.code, error.message, details);
  process.exit(exitCodeFor(error.code));
}

const program = new Command();

program
  .name("imagesmith")
  .description("Build and publish versioned container images from a tagged revision")
  .version("0.1.0");

program
  .command("release")
  .description("Resolve the version, assemble the image and publish it under latest and the version tag")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay (config/<name>.yaml)")
  .option("--tag <name>", "Release for this pushed tag")
  .option("--manual", "Release as a manual dispatch")
  .option("--dry-run", "Simulate the build and publish to an in-memory registry")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (opts: CommonFlags & { tag?: string; manual?: boolean; dryRun?: boolean }) => {
    const reporter = reporterFor(opts.format);
    const res = await release({
      configDir: opts.config,
      envName: opts.env,
      tag: opts.tag,
      manual: opts.manual,
      dryRun: opts.dryRun,
      reporter,
    });

    if (!res.ok) fail(reporter, res.error, res.runId ? { run_id: res.runId } : undefined);

    reporter.info("PUBLISHED", `Published ${res.tags.join(", ")} at ${res.digest}${res.dryRun ? " (dry run)" : ""}`, {
      run_id: res.runId,
      version: res.version,
      digest: res.digest,
      tags: res.tags,
    });
  });

program
  .command("version")
  .description("Print the version the next release would publish")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay (config/<name>.yaml)")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (opts: CommonFlags) => {
    const reporter = reporterFor(opts.format);
    const res = await showVersion({ configDir: opts.config, envName: opts.env });
    if (!res.ok) fail(reporter, res.error);
    reporter.info("VERSION", res.version, { manifest: res.manifestPath });
  });

program
  .command("plan")
  .description("Show the stage arena and any plan violations")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay (config/<name>.yaml)")
  .option("--target <stage>", "Stage to publish: base|rootless", parseTarget)
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (opts: CommonFlags & { target?: ReleaseTarget }) => {
    const reporter = reporterFor(opts.format);
    const res = await showPlan({ configDir: opts.config, envName: opts.env, target: opts.target });
    if (!res.ok) fail(reporter, res.error);

    res.plan.stages.forEach((stage, i) => {
      const from = "image" in stage.from ? stage.from.image : res.plan.stages[stage.from.stage].name;
      const marker = i === res.plan.target ? " (target)" : "";
      reporter.info("STAGE", `${i}  ${stage.name}  FROM ${from}  ${stage.ops.length} ops${marker}`, {
        index: i,
        name: stage.name,
        from,
      });
    });
    for (const issue of res.issues) reporter.error(issue.code, issue.message, { stage: issue.stage });
    if (res.issues.length > 0) process.exit(EXIT.INVALID_ARGS);
  });

program
  .command("dockerfile")
  .description("Render the Dockerfile for the stage arena")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay (config/<name>.yaml)")
  .option("--output <file>", "Write to a file instead of stdout")
  .action(async (opts: { config?: string; env?: string; output?: string }) => {
    const res = await showPlan({ configDir: opts.config, envName: opts.env });
    if (!res.ok) fail(reporterFor("human"), res.error);

    if (opts.output) {
      fs.mkdirSync(path.dirname(path.resolve(opts.output)), { recursive: true });
      fs.writeFileSync(opts.output, res.dockerfile, "utf8");
    } else {
      process.stdout.write(res.dockerfile);
    }
  });

program
  .command("build")
  .description("Assemble the image for every configured platform without publishing")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay (config/<name>.yaml)")
  .option("--target <stage>", "Stage to build: base|rootless", parseTarget)
  .option("--dry-run", "Simulate the build")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (opts: CommonFlags & { target?: ReleaseTarget; dryRun?: boolean }) => {
    const reporter = reporterFor(opts.format);
    const res = await build({
      configDir: opts.config,
      envName: opts.env,
      target: opts.target,
      dryRun: opts.dryRun,
      reporter,
    });
    if (!res.ok) fail(reporter, res.error);

    for (const img of res.image.platforms) {
      reporter.info("IMAGE", `${img.platform}  ${img.ref}  user=${img.user}`, {
        platform: img.platform,
        ref: img.ref,
        digest: img.digest,
      });
    }
  });

program
  .command("status")
  .description("Show release run status")
  .argument("[id]", "Run ID (omit to list all)")
  .option("--runs-dir <path>", "Runs directory", ".imagesmith/runs")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action((id: string | undefined, opts: { runsDir: string; format: OutputFormat }) => {
    if (id) {
      const res = status({ runsDir: opts.runsDir, runId: id });
      if (!res.ok) {
        fail(reporterFor(opts.format), { code: "RUN_NOT_FOUND", message: res.error });
      }
      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify({ ...res.state, phase: res.phase }) + "\n");
      } else {
        console.log(JSON.stringify(res.state, null, 2));
      }
      return;
    }

    const list = listRuns(opts.runsDir);
    if (opts.format === "jsonl") {
      for (const item of list) process.stdout.write(JSON.stringify(item) + "\n");
    } else {
      if (list.length === 0) {
        console.log("No release runs found.");
        return;
      }
      for (const item of list) console.log(`${item.id}  ${item.status}  ${item.updated_at}`);
    }
  });

program
  .command("validate")
  .description("Validate config, stage plan and recorded runs")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay (config/<name>.yaml)")
  .option("--runs-dir <path>", "Runs directory to verify (default: runs_dir from config)")
  .option("--config-only", "Skip run directories")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (opts: CommonFlags & { runsDir?: string; configOnly?: boolean }) => {
    const reporter = reporterFor(opts.format);
    const res = await validateAll({
      configDir: opts.config,
      envName: opts.env,
      runsDir: opts.runsDir,
      configOnly: opts.configOnly,
    });

    if (!res.ok) {
      for (const err of res.errors) reporter.emit(err);
      process.exit(EXIT.RELEASE_FAILED);
    }
    reporter.info("OK", `OK (${res.checked} runs checked)`);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.RELEASE_FAILED);
});
