import { computeSha256FromContent, contentDigest } from "../artifact-writer/checksum.js";
import type { BuildContext } from "../context/build-context.js";
import { BuildError } from "../errors.js";
import { renderDockerfile } from "./dockerfile.js";
import type { StageBuildRequest, StageImage, StagePlan } from "./types.js";

/** Short key naming staging images; identical Dockerfile and context give the same key. */
export function buildKey(plan: StagePlan, context: Pick<BuildContext, "hash">): string {
  return computeSha256FromContent(`${renderDockerfile(plan)}\0${context.hash}`).slice(0, 12);
}

function dependencyDigest(req: StageBuildRequest, index: number): string {
  const name = req.plan.stages[index]?.name;
  const dep = req.dependencies.find((d) => d.stage === name && d.platform === req.platform);
  if (!dep) {
    throw new BuildError(`Stage ${req.plan.stages[req.index].name} needs ${name ?? index}, which was not built`, name ?? null);
  }
  return dep.digest;
}

/**
 * Content digest of a stage as a function of its inputs only: the parent image or parent
 * digest, the layer ops (with stage references replaced by digests), the entrypoint,
 * the platform, and the context hash when the stage copies from the context.
 */
export function computeStageDigest(req: StageBuildRequest): string {
  const stage = req.plan.stages[req.index];
  const from = "image" in stage.from ? stage.from.image : dependencyDigest(req, stage.from.stage);
  const ops = stage.ops.map((op) =>
    op.op === "copy" && op.fromStage !== undefined ? { ...op, fromStage: dependencyDigest(req, op.fromStage) } : op,
  );
  const readsContext = stage.ops.some((op) => op.op === "copy" && op.fromStage === undefined);

  return contentDigest(
    JSON.stringify({
      from,
      ops,
      entrypoint: stage.entrypoint ?? null,
      platform: req.platform,
      context: readsContext ? req.context.hash : null,
      labels: Object.entries(req.labels).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
    }),
  );
}

/** Digest of a multi-platform manifest list over its per-platform images. */
export function computeManifestDigest(images: Pick<StageImage, "platform" | "digest">[]): string {
  const lines = images
    .map((i) => `${i.platform}=${i.digest}`)
    .sort()
    .join("\n");
  return contentDigest(lines);
}
