import { describe, expect, it, beforeEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { SimulatedBuilder } from "../src/assembler/simulated-builder.js";
import type { ImageBuilder, StageBuildRequest, StageImage } from "../src/assembler/types.js";
import { loadValidatedConfig } from "../src/config/loader.js";
import {
  ReleaseOrchestrator,
  loadRunState,
  statePathFor,
  type ReleaseState,
  type StepRunner,
} from "../src/core/orchestrator.js";
import { createReleaseStepRunner } from "../src/core/release-steps.js";
import { generateRunId } from "../src/core/run-id.js";
import { RELEASE_STEPS, fire, isTerminal, nextState, phaseOf } from "../src/core/state-machine.js";
import { BuildError } from "../src/errors.js";
import { MemoryRegistry } from "../src/publish/memory-registry.js";
import type { Trigger } from "../src/trigger/trigger.js";
import type { ImagesmithConfig } from "../src/types/config.js";
import { SHA, makeProject, recordingReporter, tmpDir } from "./helpers.js";

const TAG: Trigger = { kind: "tag", ref: "v1.4.2" };

describe("state-machine", () => {
  it("moves from idle to the first step on a tag push or a manual dispatch", () => {
    expect(fire("idle", TAG)).toBe("resolve");
    expect(fire("idle", { kind: "manual", ref: null })).toBe("resolve");
    expect(fire("idle", { kind: "tag", ref: "" })).toBe("idle");
    expect(fire("published", TAG)).toBe("published");
  });

  it("advances through the steps and ends published", () => {
    expect(nextState("resolve", "success")).toBe("context");
    expect(nextState("context", "success")).toBe("assemble");
    expect(nextState("assemble", "success")).toBe("publish");
    expect(nextState("publish", "success")).toBe("published");
  });

  it("treats any failure as terminal", () => {
    for (const step of RELEASE_STEPS) {
      const status = nextState(step, "failure");
      expect(status).toBe(`failed_${step}`);
      expect(isTerminal(status)).toBe(true);
      expect(phaseOf(status)).toBe("failed");
    }
  });

  it("maps statuses to phases", () => {
    expect(phaseOf("idle")).toBe("idle");
    expect(phaseOf("assemble")).toBe("triggered");
    expect(phaseOf("published")).toBe("published");
    expect(isTerminal("publish")).toBe(false);
  });
});

describe("generateRunId", () => {
  it("combines the trigger, short sha, date and a sequence", () => {
    const runsDir = tmpDir("ids");
    const now = new Date("2024-03-09T12:00:00Z");
    expect(generateRunId(TAG, SHA, runsDir, now)).toBe("v1-4-2-4f2a9c1-20240309-001");

    fs.mkdirSync(path.join(runsDir, "v1-4-2-4f2a9c1-20240309-001"));
    fs.mkdirSync(path.join(runsDir, "manual-4f2a9c1-20240309-007"));
    expect(generateRunId(TAG, SHA, runsDir, now)).toBe("v1-4-2-4f2a9c1-20240309-002");
    expect(generateRunId({ kind: "manual", ref: "main" }, SHA, runsDir, now)).toBe("manual-4f2a9c1-20240309-008");
  });
});

describe("ReleaseOrchestrator", () => {
  let runsDir: string;

  beforeEach(() => {
    runsDir = tmpDir("runs");
  });

  it("runs every step in order and persists the final state", async () => {
    const seen: string[] = [];
    const runner: StepRunner = async (step) => {
      seen.push(step);
      return { success: true, outputs: step === "resolve" ? { version: "1.4.2" } : {} };
    };
    const reporter = recordingReporter();
    const result = await new ReleaseOrchestrator(runsDir, runner, reporter).run({ runId: "r1", trigger: TAG, revision: SHA });

    expect(seen).toEqual(["resolve", "context", "assemble", "publish"]);
    expect(result.success).toBe(true);
    expect(result.final_status).toBe("published");

    const saved = loadRunState(statePathFor(runsDir, "r1"));
    expect(saved.status).toBe("published");
    expect(saved.outputs.version).toBe("1.4.2");
    expect(saved.step_started_at).toBeNull();
    expect(Object.keys(saved.step_results)).toEqual(["resolve", "context", "assemble", "publish"]);
    expect(reporter.diagnostics[0]).toMatchObject({ code: "TRIGGERED", message: "Release r1 triggered by tag v1.4.2" });
  });

  it("stops at the failing step and redacts the stored error", async () => {
    const runner: StepRunner = async (step) =>
      step === "publish"
        ? { success: false, error: { code: "PUBLISH_FAILED", message: "denied for token test-secret" } }
        : { success: true };
    const result = await new ReleaseOrchestrator(runsDir, runner, undefined, ["test-secret"]).run({
      runId: "r2",
      trigger: TAG,
      revision: SHA,
    });

    expect(result.success).toBe(false);
    expect(result.final_status).toBe("failed_publish");
    expect(result.error).toEqual({ code: "PUBLISH_FAILED", message: "denied for token ***" });
    expect(loadRunState(statePathFor(runsDir, "r2")).step_results.publish?.error).toBe("denied for token ***");
  });

  it("turns a thrown error into a failed step", async () => {
    const runner: StepRunner = async (step) => {
      if (step === "assemble") throw new BuildError("Stage builder failed (linux/amd64): boom", "builder");
      return { success: true };
    };
    const result = await new ReleaseOrchestrator(runsDir, runner).run({ runId: "r3", trigger: TAG, revision: SHA });
    expect(result.final_status).toBe("failed_assemble");
    expect(result.error?.code).toBe("BUILD_FAILED");
  });

  it("returns a terminal run as is", async () => {
    let calls = 0;
    const runner: StepRunner = async () => {
      calls++;
      return { success: true };
    };
    const orchestrator = new ReleaseOrchestrator(runsDir, runner);
    await orchestrator.run({ runId: "r4", trigger: TAG, revision: SHA });
    const again = await orchestrator.run({ runId: "r4", trigger: TAG, revision: SHA });
    expect(calls).toBe(4);
    expect(again.final_status).toBe("published");
  });

  it("refuses a tag trigger without a tag name", async () => {
    const result = await new ReleaseOrchestrator(runsDir, async () => ({ success: true })).run({
      runId: "r5",
      trigger: { kind: "tag", ref: "" },
      revision: SHA,
    });
    expect(result.final_status).toBe("idle");
    expect(result.error?.code).toBe("TRIGGER_INVALID");
  });
});

class FailingBuilder implements ImageBuilder {
  async buildStage(req: StageBuildRequest): Promise<StageImage> {
    throw new Error(`cannot build ${req.plan.stages[req.index].name}`);
  }
}

describe("release steps", () => {
  let root: string;
  let config: ImagesmithConfig;
  let registry: MemoryRegistry;

  beforeEach(async () => {
    root = makeProject({ version: "1.4.2" });
    config = await loadValidatedConfig({ configDir: path.join(root, "config"), env: {} });
    registry = new MemoryRegistry();
  });

  async function release(runId: string, builder: ImageBuilder = new SimulatedBuilder(config.image.name)): Promise<ReleaseState> {
    const runsDir = path.join(root, config.runs_dir);
    const runner = createReleaseStepRunner({ config, cwd: root, runsDir, createBuilder: () => builder, publisher: registry });
    const result = await new ReleaseOrchestrator(runsDir, runner).run({ runId, trigger: TAG, revision: SHA });
    return result.state;
  }

  it("publishes latest and the version tag at the same digest", async () => {
    const state = await release("r1");

    expect(state.status).toBe("published");
    expect(state.outputs.version).toBe("1.4.2");
    const artifact = state.outputs.artifact;
    expect(artifact?.tags).toEqual(["example/app:latest", "example/app:1.4.2"]);
    expect(registry.resolve("example/app:latest")).toBe(artifact?.digest);
    expect(registry.resolve("example/app:1.4.2")).toBe(artifact?.digest);
    expect(registry.tags("example/app")).toEqual(["1.4.2", "latest"]);
  });

  it("writes the Dockerfile, its ignore file, release record and checksum index", async () => {
    await release("r1");
    const runDir = path.join(root, ".imagesmith/runs/r1");

    expect(fs.readdirSync(runDir).sort()).toEqual([
      "Dockerfile",
      "Dockerfile.dockerignore",
      "artifacts.json",
      "release.json",
      "state.json",
    ]);
    expect(fs.readFileSync(path.join(runDir, "Dockerfile.dockerignore"), "utf8")).toBe(
      "*\n!src\n!imgs\n**/target/**\n**/.git/**\n!Cargo.toml\n!Cargo.lock\n",
    );
    const index: unknown = JSON.parse(fs.readFileSync(path.join(runDir, "artifacts.json"), "utf8"));
    expect(index).toMatchObject({
      run_id: "r1",
      files: [{ path: "Dockerfile" }, { path: "Dockerfile.dockerignore" }, { path: "release.json" }],
    });
    const record: unknown = JSON.parse(fs.readFileSync(path.join(runDir, "release.json"), "utf8"));
    expect(record).toMatchObject({ version: "1.4.2", revision: SHA, target: "base", trigger: TAG });
  });

  it("yields the same digest when the same revision is released twice", async () => {
    const first = await release("r1");
    const second = await release("r2");
    expect(second.outputs.artifact?.digest).toBe(first.outputs.artifact?.digest);
    expect(registry.pushes).toBe(2);
  });

  it("publishes nothing when the version cannot be resolved", async () => {
    fs.writeFileSync(path.join(root, "Cargo.toml"), '[package]\nname = "app"\n');
    const state = await release("r1");
    expect(state.status).toBe("failed_resolve");
    expect(state.error?.code).toBe("RESOLUTION_FAILED");
    expect(registry.pushes).toBe(0);
  });

  it("publishes nothing when the build fails", async () => {
    const state = await release("r1", new FailingBuilder());
    expect(state.status).toBe("failed_assemble");
    expect(state.error).toEqual({ code: "BUILD_FAILED", message: "Stage builder failed (linux/amd64): cannot build builder" });
    expect(registry.pushes).toBe(0);
    expect(registry.tags("example/app")).toEqual([]);
  });

  it("fails the context step when a declared directory is missing", async () => {
    fs.rmSync(path.join(root, "imgs"), { recursive: true });
    const state = await release("r1");
    expect(state.status).toBe("failed_context");
    expect(state.error?.code).toBe("CONTEXT_INVALID");
  });

  it("passes a non-numeric version through to the tag", async () => {
    fs.writeFileSync(path.join(root, "Cargo.toml"), '[package]\nversion = "abc"\n');
    const state = await release("r1");
    expect(state.outputs.artifact?.tags).toEqual(["example/app:latest", "example/app:abc"]);
  });
});
