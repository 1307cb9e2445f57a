import { manifestPath } from "../core/release-steps.js";
import { toErrorInfo, type ErrorInfo } from "../errors.js";
import { resolveVersionFromFile } from "../version/resolver.js";
import { loadForCommand, type ConfigOpts } from "./common.js";

export type VersionResult =
  | { ok: true; version: string; manifestPath: string }
  | { ok: false; error: ErrorInfo };

/**
 * Resolve the release version exactly as a release would, without building anything.
 */
export async function showVersion(opts: ConfigOpts): Promise<VersionResult> {
  const loaded = await loadForCommand(opts);
  if (!loaded.ok) return loaded;

  const { config, cwd } = loaded;
  const file = manifestPath(config, cwd);
  try {
    const version = resolveVersionFromFile(file, {
      scanLines: config.manifest.scan_lines,
      key: config.manifest.key,
      strict: config.manifest.strict,
    });
    return { ok: true, version, manifestPath: file };
  } catch (e) {
    return { ok: false, error: toErrorInfo(e) };
  }
}
