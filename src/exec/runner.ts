import { spawn } from "node:child_process";
import { MAX_CMD_BUFFER_SIZE, sanitizeEnv } from "./security.js";

export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type RunOptions = {
  cwd?: string;
  /** Written to the child's stdin, which is then closed. */
  input?: string;
  env?: NodeJS.ProcessEnv;
};

export type OutputStream = "stdout" | "stderr";

/**
 * Subprocess seam for docker invocations. Tests substitute a recording fake.
 */
export interface CommandRunner {
  run(command: string, args: string[], opts?: RunOptions): Promise<CommandResult>;
}

/**
 * Spawn-backed runner. Output is buffered (capped) and optionally streamed line by line.
 * A command that cannot be started resolves with code 127 and the spawn error on stderr.
 */
export function createCommandRunner(onLine?: (line: string, stream: OutputStream) => void): CommandRunner {
  return {
    run(command, args, opts = {}) {
      return new Promise<CommandResult>((resolve) => {
        const child = spawn(command, args, {
          cwd: opts.cwd,
          env: { ...sanitizeEnv(process.env), ...opts.env },
          stdio: ["pipe", "pipe", "pipe"],
        });

        const buffers: Record<OutputStream, string> = { stdout: "", stderr: "" };
        let settled = false;

        const collect = (stream: OutputStream) => (chunk: Buffer) => {
          const text = chunk.toString("utf8");
          if (buffers[stream].length < MAX_CMD_BUFFER_SIZE) buffers[stream] += text;
          if (onLine) {
            for (const line of text.split("\n")) {
              if (line.length > 0) onLine(line, stream);
            }
          }
        };

        child.stdout.on("data", collect("stdout"));
        child.stderr.on("data", collect("stderr"));

        child.on("error", (err) => {
          if (settled) return;
          settled = true;
          resolve({ code: 127, stdout: buffers.stdout, stderr: `${buffers.stderr}${err.message}` });
        });

        child.on("close", (code) => {
          if (settled) return;
          settled = true;
          resolve({ code: code ?? 1, stdout: buffers.stdout, stderr: buffers.stderr });
        });

        // EPIPE when the child exits before reading its input
        child.stdin.on("error", (err) => {
          buffers.stderr += `stdin: ${err.message}\n`;
        });
        child.stdin.end(opts.input ?? "");
      });
    },
  };
}
