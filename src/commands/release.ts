import path from "node:path";
import { DockerBuilder } from "../assembler/docker-builder.js";
import { SimulatedBuilder } from "../assembler/simulated-builder.js";
import { ReleaseOrchestrator } from "../core/orchestrator.js";
import { createReleaseStepRunner, type BuilderFactory } from "../core/release-steps.js";
import { generateRunId } from "../core/run-id.js";
import { errorMessage, type ErrorInfo } from "../errors.js";
import { createCommandRunner, type CommandRunner } from "../exec/runner.js";
import { GitOperations, type RevisionSource } from "../git/operations.js";
import { silentReporter, type Reporter } from "../output/reporter.js";
import { DockerPublisher } from "../publish/docker-publisher.js";
import { MemoryRegistry } from "../publish/memory-registry.js";
import { loadCredentials, stagingRepository } from "../publish/tags.js";
import type { Publisher } from "../publish/types.js";
import { describeTrigger, resolveTrigger } from "../trigger/trigger.js";
import { loadForCommand, type ConfigOpts } from "./common.js";

export type ReleaseOpts = ConfigOpts & {
  tag?: string;
  manual?: boolean;
  /** Simulated build and in-memory registry: nothing leaves the machine. */
  dryRun?: boolean;
  reporter?: Reporter;
};

export type ReleaseCommandDeps = {
  git?: RevisionSource;
  runner?: CommandRunner;
  createBuilder?: BuilderFactory;
  publisher?: Publisher;
};

export type ReleaseResult =
  | { ok: true; runId: string; version: string; digest: string; tags: string[]; dryRun: boolean }
  | { ok: false; runId?: string; error: ErrorInfo };

export async function release(opts: ReleaseOpts, deps: ReleaseCommandDeps = {}): Promise<ReleaseResult> {
  const env = opts.env ?? process.env;
  const reporter = opts.reporter ?? silentReporter;

  const loaded = await loadForCommand(opts);
  if (!loaded.ok) return loaded;
  const { config, cwd } = loaded;

  const trigger = resolveTrigger({ tag: opts.tag, manual: opts.manual }, env);
  if (!trigger) {
    return {
      ok: false,
      error: {
        code: "TRIGGER_MISSING",
        message: "No release trigger: pass --tag <name> or --manual, or run from a tag push or workflow dispatch",
      },
    };
  }

  const credentials = loadCredentials(env);
  if (!opts.dryRun && !deps.publisher && !credentials) {
    return {
      ok: false,
      error: { code: "CREDENTIALS_MISSING", message: "Set REGISTRY_USERNAME and REGISTRY_TOKEN to publish" },
    };
  }

  const git = deps.git ?? new GitOperations(cwd);
  let revision: string;
  let commitTime: number;
  try {
    revision = await git.getCurrentSha();
    commitTime = await git.getCommitTime();
    if (trigger.kind === "tag" && !(await git.getTagsAtHead()).includes(trigger.ref)) {
      reporter.warn("TAG_NOT_AT_HEAD", `Tag ${trigger.ref} does not point at the checked-out revision ${revision.slice(0, 7)}`);
    }
    if (!(await git.isClean())) {
      reporter.warn("WORKTREE_DIRTY", "Working tree has uncommitted changes; the image will not match the revision");
    }
  } catch (e) {
    return { ok: false, error: { code: "REVISION_UNAVAILABLE", message: `Cannot read source revision: ${errorMessage(e)}` } };
  }

  const runsDir = path.resolve(cwd, config.runs_dir);
  const runner = deps.runner ?? createCommandRunner();
  const staging = stagingRepository(config);

  const createBuilder: BuilderFactory =
    deps.createBuilder ??
    (opts.dryRun
      ? () => new SimulatedBuilder(staging)
      : ({ runId, runDir, dockerfilePath }) =>
          new DockerBuilder({
            runner,
            stagingRepository: staging,
            tagPrefix: runId,
            dockerfilePath,
            workDir: path.join(runDir, "build"),
            sourceDateEpoch: commitTime,
          }));

  const publisher: Publisher =
    deps.publisher ??
    (opts.dryRun
      ? new MemoryRegistry()
      : new DockerPublisher({ runner, registry: config.release.registry, credentials, reporter }));

  const runId = generateRunId(trigger, revision, runsDir);
  reporter.info("RUN_STARTED", `Run ${runId}: ${describeTrigger(trigger)}${opts.dryRun ? " (dry run)" : ""}`, { run_id: runId });

  const orchestrator = new ReleaseOrchestrator(
    runsDir,
    createReleaseStepRunner({ config, cwd, runsDir, createBuilder, publisher, reporter }),
    reporter,
    credentials ? [credentials.token] : [],
  );
  const result = await orchestrator.run({ runId, trigger, revision });

  const { version, artifact } = result.state.outputs;
  if (!result.success || !version || !artifact) {
    return {
      ok: false,
      runId,
      error: result.error ?? { code: "RELEASE_FAILED", message: `Release ended in state ${result.final_status}` },
    };
  }

  return { ok: true, runId, version, digest: artifact.digest, tags: artifact.tags, dryRun: opts.dryRun ?? false };
}
