import fs from "node:fs";
import { ResolutionError } from "../errors.js";

/** Lines scanned from the top of the manifest; covers a typical `[package]` header. */
export const DEFAULT_SCAN_LINES = 5;
export const DEFAULT_VERSION_KEY = "version";

const IMAGE_TAG_RE = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/;
const STRICT_VERSION_RE = /^\d+(\.\d+)*(-[0-9A-Za-z.-]+)?(\+[0-9A-Za-z.-]+)?$/;

export type ResolveOptions = {
  scanLines?: number;
  key?: string;
  /** Also require a dotted-numeric version. Off by default: quoted values pass through. */
  strict?: boolean;
};

function keyOf(line: string): string | null {
  const eq = line.indexOf("=");
  if (eq === -1) return null;
  return line.slice(0, eq).trim();
}

/**
 * Extract the release version from manifest text.
 *
 * Only the first `scanLines` lines are considered. The first line whose key equals `key`
 * wins, and the value is whatever sits between its first two double quotes.
 */
export function resolveVersion(content: string, opts: ResolveOptions = {}): string {
  const scanLines = opts.scanLines ?? DEFAULT_SCAN_LINES;
  const key = opts.key ?? DEFAULT_VERSION_KEY;

  const window = content.replace(/^\uFEFF/, "").split(/\r?\n/).slice(0, scanLines);
  const line = window.find((l) => keyOf(l) === key);
  if (line === undefined) {
    throw new ResolutionError(`No "${key}" field in the first ${scanLines} lines of the manifest`);
  }

  const open = line.indexOf('"');
  const close = open === -1 ? -1 : line.indexOf('"', open + 1);
  if (close === -1) {
    throw new ResolutionError(`"${key}" is not a quoted string: ${line.trim()}`);
  }

  const value = line.slice(open + 1, close);
  if (value.length === 0) {
    throw new ResolutionError(`"${key}" is empty`);
  }
  if (!IMAGE_TAG_RE.test(value)) {
    throw new ResolutionError(`"${key}" value "${value}" is not a valid image tag`);
  }
  if (opts.strict && !STRICT_VERSION_RE.test(value)) {
    throw new ResolutionError(`"${key}" value "${value}" is not a dotted-numeric version`);
  }

  return value;
}

/** Read the manifest and resolve its version; a missing file is a ResolutionError. */
export function resolveVersionFromFile(filePath: string, opts: ResolveOptions = {}): string {
  if (!fs.existsSync(filePath)) {
    throw new ResolutionError(`Manifest not found: ${filePath}`);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    throw new ResolutionError(`Failed to read manifest ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }

  return resolveVersion(content, opts);
}
