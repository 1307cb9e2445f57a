import path from "node:path";
import { loadValidatedConfig } from "../config/loader.js";
import { toErrorInfo, type ErrorInfo } from "../errors.js";
import type { ImagesmithConfig } from "../types/config.js";

/** Options shared by every command that reads the layered config. */
export type ConfigOpts = {
  configDir?: string;
  envName?: string;
  /** Project directory; config paths resolve against it. */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export type Loaded =
  | { ok: true; config: ImagesmithConfig; cwd: string }
  | { ok: false; error: ErrorInfo };

export async function loadForCommand(opts: ConfigOpts): Promise<Loaded> {
  const cwd = path.resolve(opts.cwd ?? process.cwd());
  try {
    const config = await loadValidatedConfig({
      configDir: opts.configDir ? path.resolve(cwd, opts.configDir) : undefined,
      envName: opts.envName,
      env: opts.env ?? process.env,
    });
    return { ok: true, config, cwd };
  } catch (e) {
    return { ok: false, error: toErrorInfo(e, "CONFIG_INVALID") };
  }
}
