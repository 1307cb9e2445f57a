import { BuildError } from "../errors.js";
import type { StageDescriptor, StagePlan } from "./types.js";

export type PlanIssue = {
  code: string;
  message: string;
  stage?: string;
};

const STAGE_NAME_RE = /^[a-z][a-z0-9_-]*$/;
const PACKAGE_RE = /^[a-z0-9][a-z0-9+.-]*$/;
const USER_RE = /^[a-z_][a-z0-9_-]*$/;
const DIGEST_RE = /@sha256:[a-f0-9]{64}$/;

/**
 * A reference is pinned when it carries a digest, or an explicit tag other than "latest".
 * The tag is looked for after the last "/" so registry ports are not mistaken for tags.
 */
export function isPinnedImage(ref: string): boolean {
  if (DIGEST_RE.test(ref)) return true;
  const lastSegment = ref.slice(ref.lastIndexOf("/") + 1);
  const colon = lastSegment.indexOf(":");
  if (colon === -1) return false;
  const tag = lastSegment.slice(colon + 1);
  return tag.length > 0 && tag !== "latest";
}

/** Arena indices a stage reads from: its FROM parent and every COPY --from. */
export function dependenciesOf(stage: StageDescriptor): number[] {
  const deps = new Set<number>();
  if ("stage" in stage.from) deps.add(stage.from.stage);
  for (const op of stage.ops) {
    if (op.op === "copy" && op.fromStage !== undefined) deps.add(op.fromStage);
  }
  return [...deps].sort((a, b) => a - b);
}

/** Indices needed to build `target`, in build order, `target` last. */
export function stageChain(plan: StagePlan, target: number = plan.target): number[] {
  const needed = new Set<number>();
  const visit = (index: number): void => {
    if (needed.has(index) || index < 0 || index >= plan.stages.length) return;
    needed.add(index);
    for (const dep of dependenciesOf(plan.stages[index])) {
      if (dep < index) visit(dep);
    }
  };
  visit(target);
  return [...needed].sort((a, b) => a - b);
}

export function isRootUser(user: string): boolean {
  const name = user.split(":")[0].trim();
  return name === "" || name === "root" || name === "0";
}

/**
 * Effective user of a stage: the last USER along its FROM chain, "root" when none.
 */
export function effectiveUser(plan: StagePlan, index: number): string {
  let current = index;
  for (let hops = 0; hops <= plan.stages.length; hops++) {
    const stage = plan.stages[current];
    if (!stage) break;
    const userOp = [...stage.ops].reverse().find((op) => op.op === "user");
    if (userOp && userOp.op === "user") return `${userOp.uid}:${userOp.gid}`;
    if (!("stage" in stage.from)) break;
    current = stage.from.stage;
  }
  return "root";
}

/**
 * Structural checks on the arena: backward-only references, a linear FROM chain,
 * pinned root images, and shell-safe package and user names.
 */
export function validatePlan(plan: StagePlan): PlanIssue[] {
  const issues: PlanIssue[] = [];
  const names = new Set<string>();
  const fromChildren = new Map<number, string[]>();

  if (plan.stages.length === 0) {
    issues.push({ code: "PLAN_EMPTY", message: "Stage plan has no stages" });
  }
  if (plan.target < 0 || plan.target >= plan.stages.length) {
    issues.push({ code: "TARGET_MISSING", message: `Publish target index ${plan.target} is out of range` });
  }

  plan.stages.forEach((stage, index) => {
    if (!STAGE_NAME_RE.test(stage.name)) {
      issues.push({ code: "STAGE_NAME_INVALID", message: `Invalid stage name "${stage.name}"`, stage: stage.name });
    }
    if (names.has(stage.name)) {
      issues.push({ code: "STAGE_NAME_DUPLICATE", message: `Duplicate stage name "${stage.name}"`, stage: stage.name });
    }
    names.add(stage.name);

    if ("image" in stage.from) {
      if (!isPinnedImage(stage.from.image)) {
        issues.push({
          code: "IMAGE_NOT_PINNED",
          message: `Stage ${stage.name} uses floating image "${stage.from.image}"; pin a tag or digest`,
          stage: stage.name,
        });
      }
    } else {
      const children = fromChildren.get(stage.from.stage) ?? [];
      children.push(stage.name);
      fromChildren.set(stage.from.stage, children);
    }

    for (const dep of dependenciesOf(stage)) {
      if (dep < 0 || dep >= index) {
        issues.push({
          code: "FORWARD_REFERENCE",
          message: `Stage ${stage.name} references stage index ${dep}; only earlier stages may be referenced`,
          stage: stage.name,
        });
      }
    }

    for (const op of stage.ops) {
      if (op.op === "install") {
        for (const pkg of op.packages.filter((p) => !PACKAGE_RE.test(p))) {
          issues.push({ code: "PACKAGE_INVALID", message: `Invalid package name "${pkg}"`, stage: stage.name });
        }
      } else if (op.op === "create-user") {
        if (!USER_RE.test(op.name)) {
          issues.push({ code: "USER_INVALID", message: `Invalid user name "${op.name}"`, stage: stage.name });
        }
        if (op.uid <= 0 || op.gid <= 0) {
          issues.push({ code: "USER_PRIVILEGED", message: `User ${op.name} must have a non-zero uid and gid`, stage: stage.name });
        }
      } else if (op.op === "user" && (op.uid <= 0 || op.gid <= 0)) {
        issues.push({ code: "USER_PRIVILEGED", message: `USER ${op.uid}:${op.gid} is privileged`, stage: stage.name });
      } else if (op.op === "run" && op.argv.length === 0) {
        issues.push({ code: "RUN_EMPTY", message: "RUN with no command", stage: stage.name });
      }
    }
  });

  for (const [parent, children] of fromChildren) {
    if (children.length > 1) {
      const parentName = plan.stages[parent]?.name ?? String(parent);
      issues.push({
        code: "CHAIN_BRANCHES",
        message: `Stage ${parentName} is the parent of ${children.join(", ")}; the chain must be linear`,
        stage: parentName,
      });
    }
  }

  return issues;
}

export function assertValidPlan(plan: StagePlan): void {
  const issues = validatePlan(plan);
  if (issues.length > 0) {
    throw new BuildError(`Invalid stage plan: ${issues.map((i) => i.message).join("; ")}`);
  }
}
