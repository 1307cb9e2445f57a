import fs from "node:fs";
import path from "node:path";
import { validatePlan } from "../assembler/plan.js";
import { defineStages } from "../assembler/stages.js";
import { computeSha256 } from "../artifact-writer/checksum.js";
import { INDEX_FILE, type ArtifactIndex } from "../artifact-writer/writer.js";
import { contextSpecFromConfig } from "../context/build-context.js";
import { RELEASE_RECORD } from "../core/release-steps.js";
import { errorMessage } from "../errors.js";
import { isWithinDir } from "../exec/security.js";
import { diag, type Diagnostic } from "../output/reporter.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import { loadForCommand, type ConfigOpts } from "./common.js";

export type ValidateResult = { ok: true; checked: number } | { ok: false; errors: Diagnostic[] };

export type ValidateOpts = ConfigOpts & {
  /** Runs directory to verify; defaults to the configured runs_dir. */
  runsDir?: string;
  /** Only check config and stage plan. */
  configOnly?: boolean;
  schemaDir?: string;
};

function readJson(filePath: string): { ok: true; data: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, data: JSON.parse(fs.readFileSync(filePath, "utf8")) };
  } catch (e) {
    return { ok: false, error: errorMessage(e) };
  }
}

async function checkSchema(
  registry: SchemaRegistry,
  schema: string,
  filePath: string,
  errors: Diagnostic[],
): Promise<unknown> {
  const parsed = readJson(filePath);
  if (!parsed.ok) {
    errors.push(diag("error", "JSON_INVALID", `Invalid JSON (${filePath}): ${parsed.error}`, { path: filePath }));
    return null;
  }
  const res = await registry.validate(schema, parsed.data);
  if (!res.valid) {
    errors.push(
      diag("error", "SCHEMA_VIOLATION", `${path.basename(filePath)} does not match ${schema}: ${res.errors}`, {
        path: filePath,
      }),
    );
    return null;
  }
  return parsed.data;
}

function isArtifactIndex(value: unknown): value is ArtifactIndex {
  return typeof value === "object" && value !== null && "files" in value && Array.isArray(value.files);
}

function checkIndexedFiles(runDir: string, index: ArtifactIndex, errors: Diagnostic[]): void {
  for (const entry of index.files) {
    const target = path.resolve(runDir, entry.path);
    if (!isWithinDir(runDir, target)) {
      errors.push(
        diag("error", "ARTIFACT_PATH_ESCAPES_DIR", `Index path escapes run dir: ${entry.path}`, { path: entry.path }),
      );
      continue;
    }
    if (!fs.existsSync(target) || !fs.statSync(target).isFile()) {
      errors.push(diag("error", "ARTIFACT_FILE_MISSING", `Missing artifact file: ${entry.path}`, { path: target }));
      continue;
    }

    const size = fs.statSync(target).size;
    if (size !== entry.bytes) {
      errors.push(
        diag("error", "ARTIFACT_SIZE_MISMATCH", `Artifact size mismatch (${entry.path}): index=${entry.bytes} actual=${size}`, {
          path: target,
          details: { expectedBytes: entry.bytes, actualBytes: size },
        }),
      );
    }

    const actual = computeSha256(target);
    if (actual !== entry.sha256) {
      errors.push(
        diag("error", "ARTIFACT_SHA256_MISMATCH", `Artifact sha256 mismatch (${entry.path}): index=${entry.sha256} actual=${actual}`, {
          path: target,
          details: { expectedSha256: entry.sha256, actualSha256: actual },
        }),
      );
    }
  }
}

/**
 * Validate the layered config, the stage plan it produces and, unless `configOnly`,
 * every run directory: state.json, release.json and the checksums in artifacts.json.
 */
export async function validateAll(opts: ValidateOpts): Promise<ValidateResult> {
  const loaded = await loadForCommand(opts);
  if (!loaded.ok) {
    return { ok: false, errors: [diag("error", loaded.error.code, loaded.error.message)] };
  }

  const { config, cwd } = loaded;
  const errors: Diagnostic[] = [];

  const plan = defineStages(config.stages, contextSpecFromConfig(config.context, cwd), config.release.target);
  for (const issue of validatePlan(plan)) {
    errors.push(diag("error", issue.code, issue.message, { details: { stage: issue.stage } }));
  }

  let checked = 0;
  const runsDir = path.resolve(cwd, opts.runsDir ?? config.runs_dir);
  if (!opts.configOnly && fs.existsSync(runsDir)) {
    let registry: SchemaRegistry;
    try {
      registry = await createRegistry(opts.schemaDir);
    } catch (e) {
      return { ok: false, errors: [...errors, diag("error", "SCHEMA_DIR_MISSING", errorMessage(e))] };
    }

    for (const entry of fs.readdirSync(runsDir, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      const runDir = path.join(runsDir, entry.name);
      const statePath = path.join(runDir, "state.json");
      if (!fs.existsSync(statePath)) continue;
      checked++;

      await checkSchema(registry, "run-state", statePath, errors);

      const recordPath = path.join(runDir, RELEASE_RECORD);
      if (fs.existsSync(recordPath)) {
        await checkSchema(registry, "release-record", recordPath, errors);
      }

      const indexPath = path.join(runDir, INDEX_FILE);
      if (fs.existsSync(indexPath)) {
        const index = await checkSchema(registry, "artifact-index", indexPath, errors);
        if (isArtifactIndex(index)) checkIndexedFiles(runDir, index, errors);
      }
    }
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, checked };
}
