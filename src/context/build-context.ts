import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import { computeSha256, computeSha256FromContent } from "../artifact-writer/checksum.js";
import { isWithinDir } from "../exec/security.js";
import { ContextError } from "../errors.js";
import type { ContextConfig } from "../types/config.js";

export type BuildContextSpec = {
  root: string;
  /** Copied into the builder first so dependency resolution caches independently of source. */
  lockFiles: string[];
  sourceDirs: string[];
  assetDirs: string[];
  ignore: string[];
};

export type ContextFile = {
  path: string;
  sha256: string;
  bytes: number;
};

export type BuildContext = BuildContextSpec & {
  files: ContextFile[];
  /** sha256 over sorted paths and file hashes. */
  hash: string;
};

export function contextSpecFromConfig(config: ContextConfig, cwd: string): BuildContextSpec {
  return {
    root: path.resolve(cwd, config.root),
    lockFiles: config.lock_files,
    sourceDirs: config.source_dirs.map(trimSlashes),
    assetDirs: config.asset_dirs.map(trimSlashes),
    ignore: config.ignore,
  };
}

function trimSlashes(p: string): string {
  return p.replace(/^\.\//, "").replace(/\/+$/, "");
}

function toPosix(p: string): string {
  return p.split(path.sep).join("/");
}

function isIgnored(rel: string, patterns: string[]): boolean {
  return patterns.some((p) => minimatch(rel, p, { dot: true }));
}

function walk(root: string, dir: string, ignore: string[], out: ContextFile[]): void {
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    const rel = toPosix(path.relative(root, full));
    if (isIgnored(rel, ignore)) continue;
    if (entry.isDirectory()) {
      walk(root, full, ignore, out);
    } else if (entry.isFile()) {
      out.push({ path: rel, sha256: computeSha256(full), bytes: fs.statSync(full).size });
    }
  }
}

function contextPath(root: string, p: string): string {
  return toPosix(path.relative(root, path.resolve(root, p)));
}

/**
 * Ignore file handed to the docker build beside the Dockerfile. Everything but the declared
 * inputs is excluded, then the ignore globs; lock files come last since they are always hashed.
 */
export function renderDockerignore(spec: BuildContextSpec): string {
  const lines = [
    "*",
    ...[...spec.sourceDirs, ...spec.assetDirs].map((d) => `!${contextPath(spec.root, d)}`),
    ...spec.ignore,
    ...spec.lockFiles.map((f) => `!${contextPath(spec.root, f)}`),
  ];
  return lines.join("\n") + "\n";
}

/** BuildKit reads `<Dockerfile>.dockerignore` in place of the context's own ignore file. */
export function dockerignorePathFor(dockerfilePath: string): string {
  return `${dockerfilePath}.dockerignore`;
}

/**
 * Collect the files visible to the builder stage.
 * Every declared lock file and directory must exist inside the context root.
 */
export function collectBuildContext(spec: BuildContextSpec): BuildContext {
  if (!fs.existsSync(spec.root) || !fs.statSync(spec.root).isDirectory()) {
    throw new ContextError(`Build context root not found: ${spec.root}`);
  }

  const problems: string[] = [];
  const declared = [
    ...spec.lockFiles.map((p) => ({ p, kind: "file" as const })),
    ...[...spec.sourceDirs, ...spec.assetDirs].map((p) => ({ p, kind: "dir" as const })),
  ];

  for (const { p, kind } of declared) {
    if (!isWithinDir(spec.root, p)) {
      problems.push(`${p} escapes the context root`);
      continue;
    }
    const full = path.resolve(spec.root, p);
    if (!fs.existsSync(full)) {
      problems.push(`missing ${kind} ${p}`);
    } else if (kind === "file" && !fs.statSync(full).isFile()) {
      problems.push(`${p} is not a file`);
    } else if (kind === "dir" && !fs.statSync(full).isDirectory()) {
      problems.push(`${p} is not a directory`);
    }
  }

  if (problems.length > 0) {
    throw new ContextError(`Build context incomplete: ${problems.join("; ")}`);
  }

  const files: ContextFile[] = [];
  for (const lock of spec.lockFiles) {
    const full = path.resolve(spec.root, lock);
    files.push({ path: contextPath(spec.root, lock), sha256: computeSha256(full), bytes: fs.statSync(full).size });
  }
  for (const dir of [...spec.sourceDirs, ...spec.assetDirs]) {
    walk(spec.root, path.resolve(spec.root, dir), spec.ignore, files);
  }

  const unique = [...new Map(files.map((f) => [f.path, f])).values()].sort((a, b) =>
    a.path < b.path ? -1 : a.path > b.path ? 1 : 0,
  );
  const hash = computeSha256FromContent(unique.map((f) => `${f.path}\0${f.sha256}\n`).join(""));

  return { ...spec, files: unique, hash };
}
