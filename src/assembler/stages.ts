import path from "node:path";
import type { BuildContextSpec } from "../context/build-context.js";
import type { ReleaseTarget, StagesConfig } from "../types/config.js";
import type { StageDescriptor, StagePlan } from "./types.js";

export const STAGE_NAMES = ["builder", "base", "rootless"] as const;

export type StageName = (typeof STAGE_NAMES)[number];

export const BUILDER = 0;
export const BASE = 1;
export const ROOTLESS = 2;

export function binaryName(artifact: string): string {
  return path.posix.basename(artifact);
}

/**
 * Build the three-stage arena: builder → base → rootless.
 *
 * Only the compiled artifact crosses from builder to base; rootless layers a fixed
 * non-privileged identity onto base.
 */
export function defineStages(
  stages: StagesConfig,
  context: Pick<BuildContextSpec, "lockFiles" | "sourceDirs" | "assetDirs">,
  target: ReleaseTarget = "base",
): StagePlan {
  const { builder, base, rootless } = stages;
  const installed = path.posix.join(base.install_dir, binaryName(builder.artifact));
  const home = `/home/${rootless.user}`;

  const builderStage: StageDescriptor = {
    name: "builder",
    from: { image: builder.image },
    ops: [
      { op: "workdir", path: builder.workdir },
      { op: "copy", sources: [...context.lockFiles], dest: "./" },
      ...[...context.sourceDirs, ...context.assetDirs].map((dir) => ({
        op: "copy" as const,
        sources: [dir],
        dest: `./${dir}`,
      })),
      { op: "run", argv: [...builder.command] },
    ],
  };

  const baseStage: StageDescriptor = {
    name: "base",
    from: { image: base.image },
    ops: [
      { op: "copy", sources: [builder.artifact], dest: `${base.install_dir.replace(/\/+$/, "")}/`, fromStage: BUILDER },
      { op: "install", packages: [...base.packages] },
    ],
    entrypoint: [installed],
  };

  const rootlessStage: StageDescriptor = {
    name: "rootless",
    from: { stage: BASE },
    ops: [
      { op: "create-user", name: rootless.user, uid: rootless.uid, gid: rootless.gid, home },
      { op: "workdir", path: home },
      { op: "user", uid: rootless.uid, gid: rootless.gid },
    ],
  };

  return {
    stages: [builderStage, baseStage, rootlessStage],
    target: target === "rootless" ? ROOTLESS : BASE,
  };
}

export function stageIndex(plan: StagePlan, name: string): number {
  return plan.stages.findIndex((s) => s.name === name);
}
