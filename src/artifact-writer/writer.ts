import fs from "node:fs";
import path from "node:path";
import { computeSha256 } from "./checksum.js";

export const INDEX_FILE = "artifacts.json";
const UNINDEXED = new Set(["state.json", INDEX_FILE]);

export type IndexedArtifact = {
  path: string;
  sha256: string;
  bytes: number;
};

export type ArtifactIndex = {
  schema_version: string;
  run_id: string;
  created_at: string;
  files: IndexedArtifact[];
};

/**
 * Artifact Writer: manages the directory of one release run.
 * Writes individual artifacts and the checksum index over them.
 */
export class ArtifactWriter {
  private readonly runDir: string;

  constructor(
    runsDir: string,
    private readonly runId: string,
  ) {
    this.runDir = path.join(runsDir, runId);
  }

  /** Write a text artifact (e.g. the rendered Dockerfile). Returns its full path. */
  writeText(relativePath: string, content: string): string {
    const fullPath = path.join(this.runDir, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content, "utf8");
    return fullPath;
  }

  writeJson(relativePath: string, content: unknown): string {
    return this.writeText(relativePath, JSON.stringify(content, null, 2) + "\n");
  }

  /** Hash every artifact in the run directory and write artifacts.json. */
  writeIndex(): ArtifactIndex {
    const files: IndexedArtifact[] = [];
    collectFiles(this.runDir, this.runDir, files);

    const index: ArtifactIndex = {
      schema_version: "1.0.0",
      run_id: this.runId,
      created_at: new Date().toISOString(),
      files: files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)),
    };
    this.writeJson(INDEX_FILE, index);
    return index;
  }

  getRunDir(): string {
    return this.runDir;
  }
}

function collectFiles(baseDir: string, currentDir: string, out: IndexedArtifact[]): void {
  if (!fs.existsSync(currentDir)) return;
  const entries = fs.readdirSync(currentDir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = path.join(currentDir, entry.name);
    const rel = path.relative(baseDir, fullPath).split(path.sep).join("/");
    if (entry.isDirectory()) {
      collectFiles(baseDir, fullPath, out);
    } else if (entry.isFile() && !UNINDEXED.has(rel)) {
      out.push({ path: rel, sha256: computeSha256(fullPath), bytes: fs.statSync(fullPath).size });
    }
  }
}
