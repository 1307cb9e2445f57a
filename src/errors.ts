export type ErrorCode =
  | "CONFIG_INVALID"
  | "RESOLUTION_FAILED"
  | "CONTEXT_INVALID"
  | "BUILD_FAILED"
  | "PUBLISH_FAILED";

export type ErrorInfo = { code: string; message: string };

/** Base class for every failure that terminates a release run. */
export class ReleaseError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ReleaseError";
  }
}

export class ConfigError extends ReleaseError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

/** Manifest missing, version key absent from the scan window, or unusable value. */
export class ResolutionError extends ReleaseError {
  constructor(message: string) {
    super("RESOLUTION_FAILED", message);
    this.name = "ResolutionError";
  }
}

export class BuildError extends ReleaseError {
  constructor(
    message: string,
    readonly stage: string | null = null,
    code: ErrorCode = "BUILD_FAILED",
  ) {
    super(code, message);
    this.name = "BuildError";
  }
}

/** The build context lacks something the builder stage copies. */
export class ContextError extends BuildError {
  constructor(message: string) {
    super(message, "builder", "CONTEXT_INVALID");
    this.name = "ContextError";
  }
}

export class PublishError extends ReleaseError {
  constructor(message: string) {
    super("PUBLISH_FAILED", message);
    this.name = "PublishError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toErrorInfo(err: unknown, fallbackCode = "UNEXPECTED"): ErrorInfo {
  if (err instanceof ReleaseError) return { code: err.code, message: err.message };
  return { code: fallbackCode, message: errorMessage(err) };
}
