import { describe, expect, it } from "vitest";
import { renderDockerfile } from "../src/assembler/dockerfile.js";
import {
  assertValidPlan,
  effectiveUser,
  isPinnedImage,
  isRootUser,
  stageChain,
  validatePlan,
} from "../src/assembler/plan.js";
import { BASE, BUILDER, ROOTLESS, defineStages, stageIndex } from "../src/assembler/stages.js";
import type { StagePlan } from "../src/assembler/types.js";
import { BuildError } from "../src/errors.js";
import { STAGES } from "./helpers.js";

const CONTEXT = { lockFiles: ["Cargo.toml", "Cargo.lock"], sourceDirs: ["src"], assetDirs: ["imgs"] };

function plan(target: "base" | "rootless" = "base"): StagePlan {
  return defineStages(STAGES, CONTEXT, target);
}

describe("defineStages", () => {
  it("lays out builder, base and rootless in arena order", () => {
    const p = plan();
    expect(p.stages.map((s) => s.name)).toEqual(["builder", "base", "rootless"]);
    expect(p.target).toBe(BASE);
    expect(plan("rootless").target).toBe(ROOTLESS);
    expect(stageIndex(p, "rootless")).toBe(2);
    expect(stageIndex(p, "missing")).toBe(-1);
  });

  it("copies only the compiled artifact from builder into base", () => {
    const base = plan().stages[BASE];
    expect(base.from).toEqual({ image: "debian:bullseye-20211201-slim" });
    expect(base.ops[0]).toEqual({
      op: "copy",
      sources: ["/app/target/release/app"],
      dest: "/usr/local/bin/",
      fromStage: BUILDER,
    });
    expect(base.entrypoint).toEqual(["/usr/local/bin/app"]);
  });

  it("derives rootless from base with a fixed identity", () => {
    const rootless = plan().stages[ROOTLESS];
    expect(rootless.from).toEqual({ stage: BASE });
    expect(rootless.ops).toEqual([
      { op: "create-user", name: "app", uid: 1000, gid: 1000, home: "/home/app" },
      { op: "workdir", path: "/home/app" },
      { op: "user", uid: 1000, gid: 1000 },
    ]);
  });
});

describe("stage plan checks", () => {
  it("accepts the default arena", () => {
    expect(validatePlan(plan())).toEqual([]);
    expect(() => assertValidPlan(plan())).not.toThrow();
  });

  it("recognises pinned images", () => {
    expect(isPinnedImage("rust:1.66.0-bullseye")).toBe(true);
    expect(isPinnedImage(`debian@sha256:${"a".repeat(64)}`)).toBe(true);
    expect(isPinnedImage("debian")).toBe(false);
    expect(isPinnedImage("debian:latest")).toBe(false);
    expect(isPinnedImage("registry.local:5000/debian")).toBe(false);
    expect(isPinnedImage("registry.local:5000/debian:12")).toBe(true);
  });

  it("rejects floating base images", () => {
    const p = defineStages({ ...STAGES, base: { ...STAGES.base, image: "debian:latest" } }, CONTEXT);
    expect(validatePlan(p).map((i) => i.code)).toEqual(["IMAGE_NOT_PINNED"]);
    expect(() => assertValidPlan(p)).toThrow(BuildError);
  });

  it("rejects forward references", () => {
    const p = plan();
    p.stages[BUILDER].ops.push({ op: "copy", sources: ["/etc/ssl"], dest: "/etc/ssl", fromStage: BASE });
    const issues = validatePlan(p);
    expect(issues).toHaveLength(1);
    expect(issues[0].code).toBe("FORWARD_REFERENCE");
    expect(issues[0].stage).toBe("builder");
  });

  it("rejects a stage that parents two stages", () => {
    const p = plan();
    p.stages.push({ name: "debug", from: { stage: BASE }, ops: [] });
    expect(validatePlan(p)).toEqual([
      {
        code: "CHAIN_BRANCHES",
        message: "Stage base is the parent of rootless, debug; the chain must be linear",
        stage: "base",
      },
    ]);
  });

  it("rejects a privileged rootless identity and unsafe package names", () => {
    const p = defineStages(
      {
        ...STAGES,
        base: { ...STAGES.base, packages: ["openssl; rm -rf /"] },
        rootless: { user: "app", uid: 0, gid: 0 },
      },
      CONTEXT,
    );
    expect(validatePlan(p).map((i) => i.code)).toEqual(["PACKAGE_INVALID", "USER_PRIVILEGED", "USER_PRIVILEGED"]);
  });

  it("reports a target outside the arena", () => {
    expect(validatePlan({ ...plan(), target: 5 }).map((i) => i.code)).toEqual(["TARGET_MISSING"]);
  });
});

describe("stage chain and users", () => {
  it("builds only what the target needs", () => {
    expect(stageChain(plan())).toEqual([0, 1]);
    expect(stageChain(plan("rootless"))).toEqual([0, 1, 2]);
  });

  it("runs base as root and rootless as a numeric non-root user", () => {
    const p = plan();
    expect(effectiveUser(p, BASE)).toBe("root");
    expect(effectiveUser(p, ROOTLESS)).toBe("1000:1000");
    expect(isRootUser(effectiveUser(p, BASE))).toBe(true);
    expect(isRootUser(effectiveUser(p, ROOTLESS))).toBe(false);
    expect(isRootUser("")).toBe(true);
    expect(isRootUser("0:0")).toBe(true);
  });
});

describe("renderDockerfile", () => {
  it("renders the three stages with a single cleanup-terminated install layer", () => {
    expect(renderDockerfile(plan())).toBe(
      [
        "FROM rust:1.66.0-bullseye AS builder",
        "",
        "WORKDIR /app",
        "COPY Cargo.toml Cargo.lock ./",
        "COPY src ./src",
        "COPY imgs ./imgs",
        'RUN ["cargo", "build", "--release", "--bin", "app", "--features=all"]',
        "",
        "FROM debian:bullseye-20211201-slim AS base",
        "",
        "COPY --from=builder /app/target/release/app /usr/local/bin/",
        "RUN apt-get update \\",
        "    && apt-get install -y openssl ca-certificates tzdata \\",
        "    && rm -rf /var/lib/apt/lists/*",
        'ENTRYPOINT ["/usr/local/bin/app"]',
        "",
        "FROM base AS rootless",
        "",
        "RUN groupadd --gid 1000 app \\",
        "    && useradd --create-home --home-dir /home/app --uid 1000 --gid 1000 app",
        "WORKDIR /home/app",
        "USER 1000:1000",
        "",
      ].join("\n"),
    );
  });

  it("omits the install layer when there are no packages", () => {
    const p = defineStages({ ...STAGES, base: { ...STAGES.base, packages: [] } }, CONTEXT);
    expect(renderDockerfile(p)).not.toContain("apt-get");
  });
});
