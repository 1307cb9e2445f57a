import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { CommandResult, CommandRunner, RunOptions } from "../src/exec/runner.js";
import type { RevisionSource } from "../src/git/operations.js";
import type { Diagnostic, Reporter } from "../src/output/reporter.js";
import type { StagesConfig } from "../src/types/config.js";

export const REPO_CONFIG_DIR = path.resolve(import.meta.dirname, "../config");
export const SCHEMA_DIR = path.resolve(import.meta.dirname, "../schemas");

export const SHA = "4f2a9c1e0b7d3a5f6e8c9b0a1d2e3f4a5b6c7d8e";
export const COMMIT_TIME = 1700000000;

export const STAGES: StagesConfig = {
  builder: {
    image: "rust:1.66.0-bullseye",
    workdir: "/app",
    command: ["cargo", "build", "--release", "--bin", "app", "--features=all"],
    artifact: "/app/target/release/app",
  },
  base: {
    image: "debian:bullseye-20211201-slim",
    install_dir: "/usr/local/bin",
    packages: ["openssl", "ca-certificates", "tzdata"],
  },
  rootless: { user: "app", uid: 1000, gid: 1000 },
};

export function tmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `imagesmith-${prefix}-`));
}

function write(root: string, rel: string, content: string): void {
  const full = path.join(root, rel);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, content, "utf8");
}

/**
 * A minimal project matching config/base.yaml: manifest, lock file, one source
 * file, one asset and a copy of the config directory.
 */
export function makeProject(opts: { version?: string; manifest?: string } = {}): string {
  const root = tmpDir("project");
  const manifest =
    opts.manifest ?? ["[package]", 'name = "app"', `version = "${opts.version ?? "1.4.2"}"`, 'edition = "2021"', ""].join("\n");
  write(root, "Cargo.toml", manifest);
  write(root, "Cargo.lock", "# lock\n");
  write(root, "src/main.rs", "fn main() {}\n");
  write(root, "imgs/logo.txt", "logo\n");
  write(root, "target/release/app", "stale build output\n");
  fs.mkdirSync(path.join(root, "config"));
  fs.copyFileSync(path.join(REPO_CONFIG_DIR, "base.yaml"), path.join(root, "config", "base.yaml"));
  return root;
}

export class FakeGit implements RevisionSource {
  constructor(
    private readonly tags: string[] = ["v1.4.2"],
    private readonly clean = true,
    private readonly sha = SHA,
  ) {}

  async getCurrentSha(): Promise<string> {
    return this.sha;
  }

  async getCommitTime(): Promise<number> {
    return COMMIT_TIME;
  }

  async getTagsAtHead(): Promise<string[]> {
    return this.tags;
  }

  async isClean(): Promise<boolean> {
    return this.clean;
  }
}

export type RecordedCall = { command: string; args: string[]; input?: string };

/**
 * Records every invocation. `respond` picks the result; the default succeeds
 * with empty output.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly respond: (call: RecordedCall) => Partial<CommandResult> = () => ({})) {}

  async run(command: string, args: string[], opts: RunOptions = {}): Promise<CommandResult> {
    const call: RecordedCall = { command, args, input: opts.input };
    this.calls.push(call);
    const res = this.respond(call);
    return { code: res.code ?? 0, stdout: res.stdout ?? "", stderr: res.stderr ?? "" };
  }

  /** Joined argv of every call, for readable assertions. */
  lines(): string[] {
    return this.calls.map((c) => [c.command, ...c.args].join(" "));
  }
}

export function recordingReporter(): Reporter & { diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const push = (level: Diagnostic["level"]) => (code: string, message: string, details?: Record<string, unknown>) => {
    diagnostics.push({ level, code, message, ...(details ? { details } : {}) });
  };
  return {
    diagnostics,
    emit: (d) => {
      diagnostics.push(d);
    },
    info: push("info"),
    warn: push("warn"),
    error: push("error"),
  };
}
