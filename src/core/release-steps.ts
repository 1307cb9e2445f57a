import path from "node:path";
import { assemble } from "../assembler/assembler.js";
import { renderDockerfile } from "../assembler/dockerfile.js";
import { defineStages } from "../assembler/stages.js";
import type { ImageBuilder } from "../assembler/types.js";
import { buildReleaseRecord } from "../artifact-writer/release-record.js";
import { ArtifactWriter } from "../artifact-writer/writer.js";
import {
  collectBuildContext,
  contextSpecFromConfig,
  dockerignorePathFor,
  renderDockerignore,
  type BuildContext,
} from "../context/build-context.js";
import { BuildError, PublishError } from "../errors.js";
import { silentReporter, type Reporter } from "../output/reporter.js";
import { releaseTags } from "../publish/tags.js";
import type { Publisher } from "../publish/types.js";
import type { ImagesmithConfig } from "../types/config.js";
import { resolveVersionFromFile } from "../version/resolver.js";
import type { ReleaseState, StepRunner } from "./orchestrator.js";

export const DOCKERFILE = "Dockerfile";
export const RELEASE_RECORD = "release.json";

export type BuilderFactory = (env: { runId: string; runDir: string; dockerfilePath: string }) => ImageBuilder;

export type ReleaseDeps = {
  config: ImagesmithConfig;
  /** Directory the config's relative paths resolve against. */
  cwd: string;
  runsDir: string;
  createBuilder: BuilderFactory;
  publisher: Publisher;
  reporter?: Reporter;
};

export function manifestPath(config: ImagesmithConfig, cwd: string): string {
  return path.resolve(cwd, config.context.root, config.manifest.path);
}

function labelsFor(state: ReleaseState, version: string): Record<string, string> {
  return {
    "org.opencontainers.image.version": version,
    "org.opencontainers.image.revision": state.revision,
  };
}

function requireVersion(state: ReleaseState): string {
  const version = state.outputs.version;
  if (!version) throw new BuildError("No resolved version in run state");
  return version;
}

/**
 * Step runner for a release: resolve → context → assemble → publish.
 * The build context is collected once and shared by the later steps.
 */
export function createReleaseStepRunner(deps: ReleaseDeps): StepRunner {
  const { config, cwd, runsDir } = deps;
  const reporter = deps.reporter ?? silentReporter;
  const contextSpec = contextSpecFromConfig(config.context, cwd);
  let context: BuildContext | null = null;

  const ensureContext = (): BuildContext => {
    if (!context) context = collectBuildContext(contextSpec);
    return context;
  };

  return async (step, state) => {
    switch (step) {
      case "resolve": {
        const version = resolveVersionFromFile(manifestPath(config, cwd), {
          scanLines: config.manifest.scan_lines,
          key: config.manifest.key,
          strict: config.manifest.strict,
        });
        reporter.info("VERSION_RESOLVED", `Resolved version ${version}`, { version });
        return { success: true, outputs: { version } };
      }

      case "context": {
        const ctx = ensureContext();
        reporter.info("CONTEXT_COLLECTED", `Build context: ${ctx.files.length} files, hash ${ctx.hash.slice(0, 12)}`, {
          files: ctx.files.length,
          hash: ctx.hash,
        });
        return { success: true, outputs: { context_hash: ctx.hash } };
      }

      case "assemble": {
        const version = requireVersion(state);
        const ctx = ensureContext();
        const plan = defineStages(config.stages, ctx, config.release.target);
        const writer = new ArtifactWriter(runsDir, state.run_id);
        const dockerfilePath = writer.writeText(DOCKERFILE, renderDockerfile(plan));
        writer.writeText(dockerignorePathFor(DOCKERFILE), renderDockerignore(ctx));

        const image = await assemble({
          plan,
          platforms: config.image.platforms,
          context: ctx,
          builder: deps.createBuilder({ runId: state.run_id, runDir: writer.getRunDir(), dockerfilePath }),
          labels: labelsFor(state, version),
          reporter,
        });
        return { success: true, outputs: { image } };
      }

      case "publish": {
        const version = requireVersion(state);
        const image = state.outputs.image;
        if (!image) throw new PublishError("No assembled image in run state");

        const tags = releaseTags(config.image.name, version, config.release.floating_tag);
        const artifact = await deps.publisher.push(image, tags);

        const writer = new ArtifactWriter(runsDir, state.run_id);
        writer.writeJson(
          RELEASE_RECORD,
          buildReleaseRecord({
            run_id: state.run_id,
            version,
            revision: state.revision,
            trigger: state.trigger,
            context_hash: state.outputs.context_hash ?? ensureContext().hash,
            image,
            artifact,
          }),
        );
        writer.writeIndex();
        return { success: true, outputs: { artifact } };
      }
    }
  };
}
