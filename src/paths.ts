import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const HERE = path.dirname(fileURLToPath(import.meta.url));

/**
 * Locate a directory shipped beside the sources (config/, schemas/).
 * Resolves from src/ when run from sources and from dist/src/ after a build.
 */
export function resourceDir(name: string): string {
  const candidates = [path.resolve(HERE, "..", name), path.resolve(HERE, "../..", name)];
  return candidates.find((c) => fs.existsSync(c)) ?? candidates[0];
}
