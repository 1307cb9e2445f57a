import fs from "node:fs";
import path from "node:path";
import { BuildError } from "../errors.js";
import type { CommandRunner } from "../exec/runner.js";
import { tailLines } from "../exec/security.js";
import type { ImageBuilder, StageBuildRequest, StageImage } from "./types.js";

export type DockerBuilderOptions = {
  runner: CommandRunner;
  /** Repository of the local staging tags; kept apart from the release repository. */
  stagingRepository: string;
  /** Prefix of every staging tag; the run id, so concurrent runs never share a tag. */
  tagPrefix: string;
  dockerfilePath: string;
  /** Where iid files are written. */
  workDir: string;
  /** Commit time; pins file timestamps for reproducible layers. */
  sourceDateEpoch?: number;
};

export function platformSlug(platform: string): string {
  return platform.replace(/\//g, "-");
}

export function stagingRef(repository: string, prefix: string, stage: string, platform: string): string {
  return `${repository}:${prefix}-${stage}-${platformSlug(platform)}`;
}

/**
 * Builds one stage per call with `docker buildx build --target`, loading the result
 * into the local daemon under a staging tag.
 */
export class DockerBuilder implements ImageBuilder {
  constructor(private readonly opts: DockerBuilderOptions) {}

  async buildStage(req: StageBuildRequest): Promise<StageImage> {
    const stage = req.plan.stages[req.index];
    const ref = stagingRef(this.opts.stagingRepository, this.opts.tagPrefix, stage.name, req.platform);
    const iidFile = path.join(this.opts.workDir, `${stage.name}-${platformSlug(req.platform)}.iid`);

    fs.mkdirSync(this.opts.workDir, { recursive: true });
    fs.rmSync(iidFile, { force: true });

    const args = [
      "buildx",
      "build",
      "--file",
      this.opts.dockerfilePath,
      "--target",
      stage.name,
      "--platform",
      req.platform,
      "--load",
      "--tag",
      ref,
      "--iidfile",
      iidFile,
    ];
    if (this.opts.sourceDateEpoch !== undefined) {
      args.push("--build-arg", `SOURCE_DATE_EPOCH=${this.opts.sourceDateEpoch}`);
    }
    for (const key of Object.keys(req.labels).sort()) {
      args.push("--label", `${key}=${req.labels[key]}`);
    }
    args.push(req.context.root);

    const build = await this.opts.runner.run("docker", args, { cwd: req.context.root });
    if (build.code !== 0) {
      throw new BuildError(
        `docker build of stage ${stage.name} (${req.platform}) exited with code ${build.code}: ${tailLines(build.stderr)}`,
        stage.name,
      );
    }

    if (!fs.existsSync(iidFile)) {
      throw new BuildError(`docker build of stage ${stage.name} (${req.platform}) wrote no image id`, stage.name);
    }
    const digest = fs.readFileSync(iidFile, "utf8").trim();

    const inspect = await this.opts.runner.run("docker", ["image", "inspect", "--format", "{{.Config.User}}", ref]);
    if (inspect.code !== 0) {
      throw new BuildError(`docker image inspect ${ref} failed: ${tailLines(inspect.stderr)}`, stage.name);
    }

    return { stage: stage.name, platform: req.platform, ref, digest, user: inspect.stdout.trim() };
  }
}
