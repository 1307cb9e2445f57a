import { renderDockerfile } from "../assembler/dockerfile.js";
import { validatePlan, type PlanIssue } from "../assembler/plan.js";
import { defineStages } from "../assembler/stages.js";
import type { StagePlan } from "../assembler/types.js";
import { contextSpecFromConfig } from "../context/build-context.js";
import type { ErrorInfo } from "../errors.js";
import type { ReleaseTarget } from "../types/config.js";
import { loadForCommand, type ConfigOpts } from "./common.js";

export type PlanResult =
  | { ok: true; plan: StagePlan; dockerfile: string; issues: PlanIssue[] }
  | { ok: false; error: ErrorInfo };

/** Stage arena and rendered Dockerfile for the configured project. */
export async function showPlan(opts: ConfigOpts & { target?: ReleaseTarget }): Promise<PlanResult> {
  const loaded = await loadForCommand(opts);
  if (!loaded.ok) return loaded;

  const { config, cwd } = loaded;
  const plan = defineStages(
    config.stages,
    contextSpecFromConfig(config.context, cwd),
    opts.target ?? config.release.target,
  );
  return { ok: true, plan, dockerfile: renderDockerfile(plan), issues: validatePlan(plan) };
}
