import { describe, expect, it } from "vitest";
import { assemble } from "../src/assembler/assembler.js";
import { buildKey, computeStageDigest } from "../src/assembler/digest.js";
import { SimulatedBuilder } from "../src/assembler/simulated-builder.js";
import { defineStages } from "../src/assembler/stages.js";
import type { ImageBuilder, StageBuildRequest, StageImage, StagePlan } from "../src/assembler/types.js";
import type { BuildContext } from "../src/context/build-context.js";
import { BuildError } from "../src/errors.js";
import { MemoryRegistry } from "../src/publish/memory-registry.js";
import { releaseTags } from "../src/publish/tags.js";
import { STAGES, recordingReporter } from "./helpers.js";

const CONTEXT: BuildContext = {
  root: "/work",
  lockFiles: ["Cargo.toml", "Cargo.lock"],
  sourceDirs: ["src"],
  assetDirs: ["imgs"],
  ignore: [],
  files: [],
  hash: "a".repeat(64),
};

function plan(target: "base" | "rootless" = "base"): StagePlan {
  return defineStages(STAGES, CONTEXT, target);
}

/** Delegates to the simulated builder, failing or rewriting selected stages. */
class ScriptedBuilder implements ImageBuilder {
  readonly requests: StageBuildRequest[] = [];
  private readonly inner = new SimulatedBuilder("example/app");

  constructor(
    private readonly script: {
      failOn?: { stage: string; platform?: string; error?: Error };
      user?: string;
    } = {},
  ) {}

  async buildStage(req: StageBuildRequest): Promise<StageImage> {
    this.requests.push(req);
    const name = req.plan.stages[req.index].name;
    const { failOn } = this.script;
    if (failOn && failOn.stage === name && (!failOn.platform || failOn.platform === req.platform)) {
      throw failOn.error ?? new Error("compiler exited with 101");
    }
    const image = await this.inner.buildStage(req);
    return this.script.user === undefined ? image : { ...image, user: this.script.user };
  }
}

describe("assemble", () => {
  it("builds the target chain for every platform", async () => {
    const builder = new ScriptedBuilder();
    const image = await assemble({
      plan: plan(),
      platforms: ["linux/amd64", "linux/arm64"],
      context: CONTEXT,
      builder,
    });

    expect(image.target).toBe("base");
    expect(image.platforms.map((p) => [p.stage, p.platform])).toEqual([
      ["base", "linux/amd64"],
      ["base", "linux/arm64"],
    ]);
    expect(image.stages).toHaveLength(4);
    expect(image.platforms[0].digest).not.toBe(image.platforms[1].digest);
    expect(builder.requests.some((r) => r.plan.stages[r.index].name === "rootless")).toBe(false);
  });

  it("produces identical digests for identical inputs", async () => {
    const opts = { plan: plan(), platforms: ["linux/amd64"], context: CONTEXT };
    const first = await assemble({ ...opts, builder: new SimulatedBuilder("example/app") });
    const second = await assemble({ ...opts, builder: new SimulatedBuilder("example/app") });
    expect(second.platforms[0].digest).toBe(first.platforms[0].digest);
    expect(buildKey(plan(), CONTEXT)).toBe(buildKey(plan(), { hash: CONTEXT.hash }));
  });

  it("changes the builder digest when the context changes", async () => {
    const a = await assemble({ plan: plan(), platforms: ["linux/amd64"], context: CONTEXT, builder: new SimulatedBuilder("r") });
    const b = await assemble({
      plan: plan(),
      platforms: ["linux/amd64"],
      context: { ...CONTEXT, hash: "b".repeat(64) },
      builder: new SimulatedBuilder("r"),
    });
    expect(b.stages[0].digest).not.toBe(a.stages[0].digest);
    expect(b.platforms[0].digest).not.toBe(a.platforms[0].digest);
  });

  it("applies labels to the target stage only", async () => {
    const builder = new ScriptedBuilder();
    await assemble({
      plan: plan(),
      platforms: ["linux/amd64"],
      context: CONTEXT,
      builder,
      labels: { "org.opencontainers.image.version": "1.4.2" },
    });
    expect(builder.requests.map((r) => r.labels)).toEqual([{}, { "org.opencontainers.image.version": "1.4.2" }]);
  });

  it("reports base as root and rootless as the configured uid", async () => {
    const base = await assemble({ plan: plan(), platforms: ["linux/amd64"], context: CONTEXT, builder: new SimulatedBuilder("r") });
    const rootless = await assemble({
      plan: plan("rootless"),
      platforms: ["linux/amd64"],
      context: CONTEXT,
      builder: new SimulatedBuilder("r"),
    });
    expect(base.platforms[0].user).toBe("root");
    expect(rootless.platforms[0].user).toBe("1000:1000");
  });

  it("fails when the built image runs as the wrong user", async () => {
    await expect(
      assemble({
        plan: plan("rootless"),
        platforms: ["linux/amd64"],
        context: CONTEXT,
        builder: new ScriptedBuilder({ user: "root" }),
      }),
    ).rejects.toThrow('Stage rootless (linux/amd64) runs as "root" but must run as 1000:1000');
  });

  it("wraps stage failures in a BuildError naming the stage", async () => {
    const reporter = recordingReporter();
    const run = assemble({
      plan: plan(),
      platforms: ["linux/amd64"],
      context: CONTEXT,
      builder: new ScriptedBuilder({ failOn: { stage: "builder" } }),
      reporter,
    });
    await expect(run).rejects.toBeInstanceOf(BuildError);
    await expect(run).rejects.toThrow("Stage builder failed (linux/amd64): compiler exited with 101");
    expect(reporter.diagnostics.map((d) => d.code)).toEqual(["STAGE_BUILD"]);
  });

  it("fails the assembly when any one platform fails", async () => {
    const builder = new ScriptedBuilder({ failOn: { stage: "base", platform: "linux/arm64" } });
    await expect(
      assemble({ plan: plan(), platforms: ["linux/amd64", "linux/arm64"], context: CONTEXT, builder }),
    ).rejects.toThrow("Stage base failed (linux/arm64)");
  });

  it("leaves the registry untouched when the build fails", async () => {
    const registry = new MemoryRegistry();
    const tags = releaseTags("example/app", "1.4.2");
    try {
      const image = await assemble({
        plan: plan(),
        platforms: ["linux/amd64"],
        context: CONTEXT,
        builder: new ScriptedBuilder({ failOn: { stage: "builder" } }),
      });
      await registry.push(image, tags);
    } catch (e) {
      expect(e).toBeInstanceOf(BuildError);
    }
    expect(registry.pushes).toBe(0);
    expect(registry.tags("example/app")).toEqual([]);
  });

  it("rejects an invalid plan before building anything", async () => {
    const builder = new ScriptedBuilder();
    const p = defineStages({ ...STAGES, builder: { ...STAGES.builder, image: "rust" } }, CONTEXT);
    await expect(assemble({ plan: p, platforms: ["linux/amd64"], context: CONTEXT, builder })).rejects.toThrow(
      'Invalid stage plan: Stage builder uses floating image "rust"; pin a tag or digest',
    );
    expect(builder.requests).toHaveLength(0);
  });

  it("requires at least one platform", async () => {
    await expect(
      assemble({ plan: plan(), platforms: [], context: CONTEXT, builder: new SimulatedBuilder("r") }),
    ).rejects.toThrow("No target platforms configured");
  });
});

describe("computeStageDigest", () => {
  it("needs the digests of the stages it depends on", () => {
    expect(() =>
      computeStageDigest({ plan: plan(), index: 1, platform: "linux/amd64", context: CONTEXT, dependencies: [], labels: {} }),
    ).toThrow("Stage base needs builder, which was not built");
  });
});
