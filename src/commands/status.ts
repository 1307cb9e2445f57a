import fs from "node:fs";
import path from "node:path";
import { loadRunState, statePathFor, type ReleaseState } from "../core/orchestrator.js";
import { phaseOf, type ReleasePhase } from "../core/state-machine.js";
import { errorMessage } from "../errors.js";

export type StatusResult =
  | { ok: true; state: ReleaseState; phase: ReleasePhase }
  | { ok: false; error: string };

export type RunSummary = { id: string; status: string; phase: string; updated_at: string };

/**
 * Read release state for a given run ID.
 */
export function status(opts: { runsDir: string; runId: string }): StatusResult {
  const statePath = statePathFor(opts.runsDir, opts.runId);

  if (!fs.existsSync(statePath)) {
    return { ok: false, error: `No release run found: ${opts.runId}` };
  }

  try {
    const state = loadRunState(statePath);
    return { ok: true, state, phase: phaseOf(state.status) };
  } catch (e) {
    return { ok: false, error: `Failed to read state: ${errorMessage(e)}` };
  }
}

/**
 * List all runs with their current status, most recently updated first.
 */
export function listRuns(runsDir: string): RunSummary[] {
  if (!fs.existsSync(runsDir)) return [];

  const entries = fs.readdirSync(runsDir, { withFileTypes: true });
  const results: RunSummary[] = [];

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const statePath = path.join(runsDir, entry.name, "state.json");
    if (!fs.existsSync(statePath)) continue;

    try {
      const state = loadRunState(statePath);
      results.push({ id: entry.name, status: state.status, phase: phaseOf(state.status), updated_at: state.updated_at });
    } catch {
      results.push({ id: entry.name, status: "corrupted", phase: "unknown", updated_at: "" });
    }
  }

  return results.sort((a, b) => b.updated_at.localeCompare(a.updated_at));
}
