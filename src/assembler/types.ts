import type { BuildContext } from "../context/build-context.js";

/** Stage parent: a pinned distribution image, or an earlier stage by arena index. */
export type StageSource = { image: string } | { stage: number };

export type LayerOp =
  | { op: "workdir"; path: string }
  | { op: "copy"; sources: string[]; dest: string; fromStage?: number }
  | { op: "run"; argv: string[] }
  | { op: "install"; packages: string[] }
  | { op: "create-user"; name: string; uid: number; gid: number; home: string }
  | { op: "user"; uid: number; gid: number };

export type StageDescriptor = {
  name: string;
  from: StageSource;
  ops: LayerOp[];
  entrypoint?: string[];
};

/** Ordered arena of stages. References between stages are indices into `stages`. */
export type StagePlan = {
  stages: StageDescriptor[];
  /** Index of the stage selected for publishing. */
  target: number;
};

export type StageImage = {
  stage: string;
  platform: string;
  ref: string;
  digest: string;
  /** User reported by the image config; "" or "root" means root. */
  user: string;
};

export type AssembledImage = {
  target: string;
  /** Target stage image per platform. */
  platforms: StageImage[];
  /** Every stage built, all platforms. */
  stages: StageImage[];
};

export type StageBuildRequest = {
  plan: StagePlan;
  index: number;
  platform: string;
  context: BuildContext;
  /** Images of the stages already built for this platform, in build order. */
  dependencies: StageImage[];
  labels: Record<string, string>;
};

export interface ImageBuilder {
  buildStage(request: StageBuildRequest): Promise<StageImage>;
}
