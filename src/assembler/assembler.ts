import type { BuildContext } from "../context/build-context.js";
import { BuildError, errorMessage } from "../errors.js";
import { silentReporter, type Reporter } from "../output/reporter.js";
import { assertValidPlan, effectiveUser, isRootUser, stageChain } from "./plan.js";
import type { AssembledImage, ImageBuilder, StageImage, StagePlan } from "./types.js";

export type AssembleOptions = {
  plan: StagePlan;
  platforms: string[];
  context: BuildContext;
  builder: ImageBuilder;
  /** Applied to the target stage only. */
  labels?: Record<string, string>;
  reporter?: Reporter;
};

function isRejected<T>(r: PromiseSettledResult<T>): r is PromiseRejectedResult {
  return r.status === "rejected";
}

function isFulfilled<T>(r: PromiseSettledResult<T>): r is PromiseFulfilledResult<T> {
  return r.status === "fulfilled";
}

async function buildPlatform(opts: AssembleOptions, chain: number[], platform: string): Promise<StageImage[]> {
  const { plan, builder, context } = opts;
  const reporter = opts.reporter ?? silentReporter;
  const built: StageImage[] = [];

  for (const index of chain) {
    const stage = plan.stages[index];
    reporter.info("STAGE_BUILD", `Building stage ${stage.name} (${platform})`, { stage: stage.name, platform });

    let image: StageImage;
    try {
      image = await builder.buildStage({
        plan,
        index,
        platform,
        context,
        dependencies: [...built],
        labels: index === plan.target ? (opts.labels ?? {}) : {},
      });
    } catch (e) {
      if (e instanceof BuildError) throw e;
      throw new BuildError(`Stage ${stage.name} failed (${platform}): ${errorMessage(e)}`, stage.name);
    }

    reporter.info("STAGE_BUILT", `Built stage ${stage.name} (${platform}) ${image.digest}`, {
      stage: stage.name,
      platform,
      digest: image.digest,
    });
    built.push(image);
  }

  const target = plan.stages[plan.target];
  const image = built[built.length - 1];
  const expected = effectiveUser(plan, plan.target);
  if (isRootUser(expected) !== isRootUser(image.user)) {
    throw new BuildError(
      `Stage ${target.name} (${platform}) runs as "${image.user || "root"}" but must run as ${expected}`,
      target.name,
    );
  }

  return built;
}

/**
 * Build the publish target and everything it depends on, stage by stage.
 *
 * Platforms build in parallel and are joined before returning; any stage failure on any
 * platform fails the whole assembly with a BuildError.
 */
export async function assemble(opts: AssembleOptions): Promise<AssembledImage> {
  assertValidPlan(opts.plan);
  if (opts.platforms.length === 0) {
    throw new BuildError("No target platforms configured");
  }

  const chain = stageChain(opts.plan);
  const settled = await Promise.allSettled(opts.platforms.map((p) => buildPlatform(opts, chain, p)));

  const failed = settled.filter(isRejected);
  if (failed.length > 0) {
    const reason: unknown = failed[0].reason;
    if (reason instanceof BuildError) throw reason;
    throw new BuildError(errorMessage(reason));
  }

  const perPlatform = settled.filter(isFulfilled).map((r) => r.value);
  return {
    target: opts.plan.stages[opts.plan.target].name,
    platforms: perPlatform.map((images) => images[images.length - 1]),
    stages: perPlatform.flat(),
  };
}
