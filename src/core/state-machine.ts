import type { Trigger } from "../trigger/trigger.js";

/**
 * Release steps in order. While one of them is current the run is Triggered.
 */
export const RELEASE_STEPS = ["resolve", "context", "assemble", "publish"] as const;

export type ReleaseStep = (typeof RELEASE_STEPS)[number];

export type ReleaseStatus = "idle" | ReleaseStep | "published" | `failed_${ReleaseStep}`;

export type ReleasePhase = "idle" | "triggered" | "published" | "failed";

/**
 * Events that drive step transitions. There is no retry event: failure is terminal.
 */
export type TransitionEvent = "success" | "failure";

export function isReleaseStep(status: string): status is ReleaseStep {
  return (RELEASE_STEPS as readonly string[]).includes(status);
}

export function phaseOf(status: ReleaseStatus): ReleasePhase {
  if (status === "idle") return "idle";
  if (status === "published") return "published";
  if (isReleaseStep(status)) return "triggered";
  return "failed";
}

export function isTerminal(status: ReleaseStatus): boolean {
  const phase = phaseOf(status);
  return phase === "published" || phase === "failed";
}

/**
 * Idle → Triggered. A tag push needs a tag name; a manual dispatch needs nothing.
 * Any status other than idle is returned unchanged.
 */
export function fire(current: ReleaseStatus, trigger: Trigger): ReleaseStatus {
  if (current !== "idle") return current;
  if (trigger.kind === "tag" && trigger.ref.length === 0) return "idle";
  return RELEASE_STEPS[0];
}

/**
 * Pure function: given current step + event, return next state.
 */
export function nextState(current: ReleaseStep, event: TransitionEvent): ReleaseStatus {
  if (event === "failure") return `failed_${current}`;
  const idx = RELEASE_STEPS.indexOf(current);
  if (idx >= RELEASE_STEPS.length - 1) return "published";
  return RELEASE_STEPS[idx + 1];
}
