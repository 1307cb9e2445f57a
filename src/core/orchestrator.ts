import fs from "node:fs";
import path from "node:path";
import type { AssembledImage } from "../assembler/types.js";
import { redactSensitiveInfo } from "../exec/security.js";
import { toErrorInfo, type ErrorInfo } from "../errors.js";
import { silentReporter, type Reporter } from "../output/reporter.js";
import type { PublishedArtifact } from "../publish/types.js";
import { describeTrigger, type Trigger } from "../trigger/trigger.js";
import {
  type ReleaseStatus,
  type ReleaseStep,
  fire,
  isReleaseStep,
  isTerminal,
  nextState,
  phaseOf,
} from "./state-machine.js";

export type StepResult = { status: "success" | "failed"; duration_ms: number; error?: string };

export type ReleaseOutputs = {
  version?: string;
  context_hash?: string;
  image?: AssembledImage;
  artifact?: PublishedArtifact;
};

/** Persistent run state stored in runs/{id}/state.json */
export type ReleaseState = {
  run_id: string;
  trigger: Trigger;
  revision: string;
  status: ReleaseStatus;
  started_at: string;
  updated_at: string;
  step_started_at: string | null;
  step_results: Partial<Record<ReleaseStep, StepResult>>;
  outputs: ReleaseOutputs;
  error: ErrorInfo | null;
};

export type StepOutcome = { success: true; outputs?: ReleaseOutputs } | { success: false; error: ErrorInfo };

export type StepRunner = (step: ReleaseStep, state: ReleaseState) => Promise<StepOutcome>;

export type OrchestratorResult = {
  success: boolean;
  run_id: string;
  final_status: ReleaseStatus;
  state: ReleaseState;
  error?: ErrorInfo;
};

export function statePathFor(runsDir: string, runId: string): string {
  return path.join(runsDir, runId, "state.json");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isReleaseState(value: unknown): value is ReleaseState {
  return (
    isRecord(value) &&
    typeof value.run_id === "string" &&
    typeof value.status === "string" &&
    isRecord(value.trigger) &&
    isRecord(value.outputs)
  );
}

export function loadRunState(statePath: string): ReleaseState {
  const parsed: unknown = JSON.parse(fs.readFileSync(statePath, "utf8"));
  if (!isReleaseState(parsed)) throw new Error(`Not a release state file: ${statePath}`);
  return parsed;
}

/**
 * ReleaseOrchestrator: drives a release run through the state machine.
 *
 * Main loop: load state → execute step → persist → advance. A run that already
 * reached a terminal state is reported as is; a new trigger means a new run id.
 */
export class ReleaseOrchestrator {
  constructor(
    private readonly runsDir: string,
    private readonly stepRunner: StepRunner,
    private readonly reporter: Reporter = silentReporter,
    private readonly secrets: readonly string[] = [],
  ) {}

  async run(opts: { runId: string; trigger: Trigger; revision: string }): Promise<OrchestratorResult> {
    const statePath = statePathFor(this.runsDir, opts.runId);

    let state: ReleaseState;
    if (fs.existsSync(statePath)) {
      state = loadRunState(statePath);
    } else {
      fs.mkdirSync(path.dirname(statePath), { recursive: true });
      const now = new Date().toISOString();
      state = {
        run_id: opts.runId,
        trigger: opts.trigger,
        revision: opts.revision,
        status: "idle",
        started_at: now,
        updated_at: now,
        step_started_at: null,
        step_results: {},
        outputs: {},
        error: null,
      };
    }

    if (state.status === "idle") {
      state.status = fire(state.status, state.trigger);
      if (state.status === "idle") {
        state.error = { code: "TRIGGER_INVALID", message: `Cannot start a release from ${describeTrigger(state.trigger)}` };
        this.saveState(statePath, state);
        return this.result(state);
      }
      this.reporter.info("TRIGGERED", `Release ${state.run_id} triggered by ${describeTrigger(state.trigger)}`, {
        run_id: state.run_id,
        revision: state.revision,
      });
      this.saveState(statePath, state);
    }

    while (!isTerminal(state.status)) {
      const step = state.status;
      if (!isReleaseStep(step)) break;

      state.step_started_at = new Date().toISOString();
      state.updated_at = state.step_started_at;
      this.saveState(statePath, state);

      const stepStart = Date.now();
      let outcome: StepOutcome;
      try {
        outcome = await this.stepRunner(step, state);
      } catch (e) {
        outcome = { success: false, error: toErrorInfo(e) };
      }
      const duration_ms = Date.now() - stepStart;

      if (outcome.success) {
        state.step_results[step] = { status: "success", duration_ms };
        state.outputs = { ...state.outputs, ...outcome.outputs };
        state.status = nextState(step, "success");
      } else {
        const error = { code: outcome.error.code, message: redactSensitiveInfo(outcome.error.message, this.secrets) };
        state.step_results[step] = { status: "failed", duration_ms, error: error.message };
        state.status = nextState(step, "failure");
        state.error = error;
        this.reporter.error(error.code, `Release ${state.run_id} failed at ${step}: ${error.message}`, { run_id: state.run_id, step });
      }

      state.step_started_at = null;
      state.updated_at = new Date().toISOString();
      this.saveState(statePath, state);
    }

    return this.result(state);
  }

  private result(state: ReleaseState): OrchestratorResult {
    return {
      success: phaseOf(state.status) === "published",
      run_id: state.run_id,
      final_status: state.status,
      state,
      error: state.error ?? undefined,
    };
  }

  private saveState(statePath: string, state: ReleaseState): void {
    fs.writeFileSync(statePath, JSON.stringify(state, null, 2) + "\n", "utf8");
  }
}
