import fs from "node:fs";
import path from "node:path";
import { assemble } from "../assembler/assembler.js";
import { buildKey } from "../assembler/digest.js";
import { DockerBuilder } from "../assembler/docker-builder.js";
import { renderDockerfile } from "../assembler/dockerfile.js";
import { SimulatedBuilder } from "../assembler/simulated-builder.js";
import { defineStages } from "../assembler/stages.js";
import type { AssembledImage } from "../assembler/types.js";
import {
  collectBuildContext,
  contextSpecFromConfig,
  dockerignorePathFor,
  renderDockerignore,
} from "../context/build-context.js";
import type { BuilderFactory } from "../core/release-steps.js";
import { errorMessage, toErrorInfo, type ErrorInfo } from "../errors.js";
import { createCommandRunner, type CommandRunner } from "../exec/runner.js";
import { GitOperations, type RevisionSource } from "../git/operations.js";
import { silentReporter, type Reporter } from "../output/reporter.js";
import { stagingRepository } from "../publish/tags.js";
import type { ReleaseTarget } from "../types/config.js";
import { loadForCommand, type ConfigOpts } from "./common.js";

export type BuildOpts = ConfigOpts & {
  /** Stage to build; the rootless variant is only built when asked for. */
  target?: ReleaseTarget;
  dryRun?: boolean;
  reporter?: Reporter;
};

export type BuildCommandDeps = {
  git?: RevisionSource;
  runner?: CommandRunner;
  createBuilder?: BuilderFactory;
};

export type BuildResult =
  | { ok: true; image: AssembledImage; dockerfilePath: string }
  | { ok: false; error: ErrorInfo };

/**
 * Assemble an image locally without publishing it.
 * Work files go to `<runs_dir>/builds/<key>/`, keyed by Dockerfile and context content.
 */
export async function build(opts: BuildOpts, deps: BuildCommandDeps = {}): Promise<BuildResult> {
  const reporter = opts.reporter ?? silentReporter;
  const loaded = await loadForCommand(opts);
  if (!loaded.ok) return loaded;
  const { config, cwd } = loaded;

  try {
    const context = collectBuildContext(contextSpecFromConfig(config.context, cwd));
    const plan = defineStages(config.stages, context, opts.target ?? config.release.target);
    const key = buildKey(plan, context);
    const workDir = path.join(path.resolve(cwd, config.runs_dir), "builds", key);
    fs.mkdirSync(workDir, { recursive: true });
    const dockerfilePath = path.join(workDir, "Dockerfile");
    fs.writeFileSync(dockerfilePath, renderDockerfile(plan), "utf8");
    fs.writeFileSync(dockerignorePathFor(dockerfilePath), renderDockerignore(context), "utf8");

    let sourceDateEpoch: number | undefined;
    if (!opts.dryRun && !deps.createBuilder) {
      try {
        sourceDateEpoch = await (deps.git ?? new GitOperations(cwd)).getCommitTime();
      } catch (e) {
        reporter.warn("REVISION_UNAVAILABLE", `Building without SOURCE_DATE_EPOCH: ${errorMessage(e)}`);
      }
    }

    const runner = deps.runner ?? createCommandRunner();
    const createBuilder: BuilderFactory =
      deps.createBuilder ??
      (opts.dryRun
        ? () => new SimulatedBuilder(stagingRepository(config))
        : () =>
            new DockerBuilder({
              runner,
              stagingRepository: stagingRepository(config),
              tagPrefix: `build-${key}`,
              dockerfilePath,
              workDir,
              sourceDateEpoch,
            }));

    const image = await assemble({
      plan,
      platforms: config.image.platforms,
      context,
      builder: createBuilder({ runId: `build-${key}`, runDir: workDir, dockerfilePath }),
      reporter,
    });
    return { ok: true, image, dockerfilePath };
  } catch (e) {
    return { ok: false, error: toErrorInfo(e) };
  }
}
