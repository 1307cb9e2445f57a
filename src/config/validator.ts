import { loadAjv } from "../schema/ajv.js";
import type { ImagesmithConfig } from "../types/config.js";

const STRING_LIST = { type: "array", items: { type: "string", minLength: 1 } };

/** Config schema: every section is required; unknown keys are rejected. */
export const CONFIG_SCHEMA = {
  type: "object",
  additionalProperties: false,
  required: ["schema_version", "runs_dir", "image", "manifest", "context", "stages", "release"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    runs_dir: { type: "string", minLength: 1 },
    image: {
      type: "object",
      additionalProperties: false,
      required: ["name", "platforms"],
      properties: {
        name: { type: "string", pattern: "^[a-z0-9]+([._/-][a-z0-9]+)*$" },
        platforms: {
          type: "array",
          minItems: 1,
          uniqueItems: true,
          items: { type: "string", pattern: "^[a-z0-9]+/[a-z0-9]+(/[a-z0-9]+)?$" },
        },
      },
    },
    manifest: {
      type: "object",
      additionalProperties: false,
      required: ["path", "scan_lines", "key", "strict"],
      properties: {
        path: { type: "string", minLength: 1 },
        scan_lines: { type: "integer", minimum: 1 },
        key: { type: "string", minLength: 1 },
        strict: { type: "boolean" },
      },
    },
    context: {
      type: "object",
      additionalProperties: false,
      required: ["root", "lock_files", "source_dirs", "asset_dirs", "ignore"],
      properties: {
        root: { type: "string", minLength: 1 },
        lock_files: { ...STRING_LIST, minItems: 1 },
        source_dirs: { ...STRING_LIST, minItems: 1 },
        asset_dirs: STRING_LIST,
        ignore: STRING_LIST,
      },
    },
    stages: {
      type: "object",
      additionalProperties: false,
      required: ["builder", "base", "rootless"],
      properties: {
        builder: {
          type: "object",
          additionalProperties: false,
          required: ["image", "workdir", "command", "artifact"],
          properties: {
            image: { type: "string", minLength: 1 },
            workdir: { type: "string", pattern: "^/" },
            command: { ...STRING_LIST, minItems: 1 },
            artifact: { type: "string", pattern: "^/" },
          },
        },
        base: {
          type: "object",
          additionalProperties: false,
          required: ["image", "install_dir", "packages"],
          properties: {
            image: { type: "string", minLength: 1 },
            install_dir: { type: "string", pattern: "^/" },
            packages: STRING_LIST,
          },
        },
        rootless: {
          type: "object",
          additionalProperties: false,
          required: ["user", "uid", "gid"],
          properties: {
            user: { type: "string", pattern: "^[a-z_][a-z0-9_-]*$" },
            uid: { type: "integer", minimum: 1 },
            gid: { type: "integer", minimum: 1 },
          },
        },
      },
    },
    release: {
      type: "object",
      additionalProperties: false,
      required: ["registry", "floating_tag", "target"],
      properties: {
        registry: { type: "string", minLength: 1 },
        floating_tag: { type: "string", pattern: "^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$" },
        target: { type: "string", enum: ["base", "rootless"] },
        staging_repository: { type: "string", pattern: "^[a-z0-9]+([._/-][a-z0-9]+)*$" },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: ImagesmithConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a loaded config against the config schema. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const ajv = await loadAjv();
  const validate = ajv.compile<ImagesmithConfig>(CONFIG_SCHEMA);
  if (validate(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
