import { resolve, isAbsolute, relative } from "node:path";

export const MAX_LOG_MESSAGE_LENGTH = 10000;
export const MAX_CMD_BUFFER_SIZE = 50 * 1024 * 1024; // 50MB

/** Variables passed through to docker and git subprocesses. */
const PASSTHROUGH_ENV = ["PATH", "HOME", "USER", "LANG", "LC_ALL", "TERM", "TMPDIR"];
const PASSTHROUGH_PREFIXES = ["DOCKER_", "BUILDX_", "BUILDKIT_"];

/**
 * Sanitize log message to prevent log injection.
 */
export function sanitizeLogMessage(s: string): string {
  if (!s) return "";
  return s.replace(/[\r\n]/g, "\\n").replace(/\t/g, "\\t").slice(0, MAX_LOG_MESSAGE_LENGTH);
}

/**
 * Redact sensitive information from error messages.
 * Known secret values are replaced verbatim before the pattern rules run.
 */
export function redactSensitiveInfo(s: string, secrets: readonly string[] = []): string {
  if (!s) return "";

  let result = s;

  for (const secret of secrets) {
    if (secret.length > 0) result = result.split(secret).join("***");
  }

  result = result.replace(/password[=:]\s*\S+/gi, "password=***");
  result = result.replace(/token[=:]\s*\S+/gi, "token=***");
  result = result.replace(/api[_-]?key[=:]\s*\S+/gi, "api_key=***");
  result = result.replace(/secret[=:]\s*\S+/gi, "secret=***");
  result = result.replace(/\/home\/[^/\s]+/g, "/home/***");
  result = result.replace(/\/Users\/[^/\s]+/g, "/Users/***");

  return result;
}

/**
 * Sanitize environment variables for subprocess execution.
 */
export function sanitizeEnv(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const safe: NodeJS.ProcessEnv = {};

  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) continue;
    if (PASSTHROUGH_ENV.includes(key) || PASSTHROUGH_PREFIXES.some((p) => key.startsWith(p))) {
      safe[key] = value;
    }
  }

  return safe;
}

/** True when `candidatePath` resolves strictly inside `rootDir`. */
export function isWithinDir(rootDir: string, candidatePath: string): boolean {
  const rel = relative(rootDir, resolve(rootDir, candidatePath));
  return rel !== "" && !rel.startsWith("..") && !isAbsolute(rel);
}

/** Last `maxLines` non-empty lines of command output, for error messages. */
export function tailLines(output: string, maxLines = 5): string {
  return output
    .split("\n")
    .map((l) => l.trimEnd())
    .filter((l) => l.length > 0)
    .slice(-maxLines)
    .join("\n");
}
