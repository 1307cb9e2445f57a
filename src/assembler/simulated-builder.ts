import { computeStageDigest } from "./digest.js";
import { effectiveUser } from "./plan.js";
import type { ImageBuilder, StageBuildRequest, StageImage } from "./types.js";

/**
 * Builder for dry runs: no daemon, digests derived from stage inputs only.
 */
export class SimulatedBuilder implements ImageBuilder {
  constructor(private readonly repository: string) {}

  async buildStage(req: StageBuildRequest): Promise<StageImage> {
    const stage = req.plan.stages[req.index];
    const digest = computeStageDigest(req);
    return {
      stage: stage.name,
      platform: req.platform,
      ref: `${this.repository}@${digest}`,
      digest,
      user: effectiveUser(req.plan, req.index),
    };
  }
}
