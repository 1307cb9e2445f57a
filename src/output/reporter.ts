import { redactSensitiveInfo, sanitizeLogMessage } from "../exec/security.js";

export type OutputFormat = "human" | "jsonl";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type TextSink = { write(chunk: string): unknown };

/**
 * Reporter: the CLI's single output channel.
 *
 * `human` prints the message alone (info to stdout, warnings and errors to stderr);
 * `jsonl` prints one diagnostic object per line on stdout.
 */
export type Reporter = {
  emit(d: Diagnostic): void;
  info(code: string, message: string, details?: Record<string, unknown>): void;
  warn(code: string, message: string, details?: Record<string, unknown>): void;
  error(code: string, message: string, details?: Record<string, unknown>): void;
};

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

export function createReporter(
  format: OutputFormat,
  opts: { stdout?: TextSink; stderr?: TextSink; secrets?: readonly string[] } = {},
): Reporter {
  const stdout = opts.stdout ?? process.stdout;
  const stderr = opts.stderr ?? process.stderr;
  const secrets = opts.secrets ?? [];

  const emit = (d: Diagnostic): void => {
    const message = redactSensitiveInfo(d.message, secrets);
    if (format === "jsonl") {
      stdout.write(JSON.stringify({ ...d, message }) + "\n");
      return;
    }
    const sink = d.level === "info" ? stdout : stderr;
    sink.write(sanitizeLogMessage(message) + "\n");
  };

  return {
    emit,
    info: (code, message, details) => emit(diag("info", code, message, details ? { details } : undefined)),
    warn: (code, message, details) => emit(diag("warn", code, message, details ? { details } : undefined)),
    error: (code, message, details) => emit(diag("error", code, message, details ? { details } : undefined)),
  };
}

export const silentReporter: Reporter = {
  emit: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
