/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  RELEASE_FAILED: 1,
  INVALID_ARGS: 2,
  RESOLUTION_FAILED: 3,
  BUILD_FAILED: 4,
  PUBLISH_FAILED: 5,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(errorCode: string): ExitCode {
  switch (errorCode) {
    case "CONFIG_INVALID":
    case "TRIGGER_MISSING":
    case "TRIGGER_INVALID":
    case "CREDENTIALS_MISSING":
      return EXIT.INVALID_ARGS;
    case "RESOLUTION_FAILED":
      return EXIT.RESOLUTION_FAILED;
    case "CONTEXT_INVALID":
    case "BUILD_FAILED":
      return EXIT.BUILD_FAILED;
    case "PUBLISH_FAILED":
      return EXIT.PUBLISH_FAILED;
    default:
      return EXIT.RELEASE_FAILED;
  }
}
