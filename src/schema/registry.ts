import fs from "node:fs";
import path from "node:path";
import { resourceDir } from "../paths.js";
import { loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

/**
 * Schema registry: discovers and loads all JSON Schemas from a directory.
 * Provides compile-on-demand validation functions.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, AjvValidateFn>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));

      // "release-record.schema.json" → "release-record"
      const name = file.replace(/\.schema\.json$/, "");
      const version = extractVersion(schema) ?? "1.0.0";

      this.entries.set(name, { name, version, filePath, schema });
    }

    this.ajv = await loadAjv();
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  /** List all registered schema names. */
  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** Get the version registry map (name → version). */
  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) {
      result[name] = entry.version;
    }
    return result;
  }

  /** Compile and cache a validator for the given schema name. */
  async getValidator(name: string): Promise<AjvValidateFn> {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }

    const validate = (await this.getAjv()).compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  /** Validate data against a named schema. Returns errors or null. */
  async validate(name: string, data: unknown): Promise<{ valid: boolean; errors: string | null }> {
    const validate = await this.getValidator(name);
    const valid = validate(data);
    return {
      valid,
      errors: valid ? null : (await this.getAjv()).errorsText(validate.errors),
    };
  }

  private async getAjv(): Promise<AjvInstance> {
    if (!this.ajv) this.ajv = await loadAjv();
    return this.ajv;
  }
}

/** Version from an $id such as "urn:imagesmith:schema:run-state@1.0.0". */
function extractVersion(schema: unknown): string | null {
  if (typeof schema !== "object" || schema === null || !("$id" in schema)) return null;
  const id = schema.$id;
  if (typeof id !== "string") return null;
  const m = /@(\d+\.\d+\.\d+)$/.exec(id);
  return m ? m[1] : null;
}

/** Create and load a registry from the default schemas directory. */
export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? resourceDir("schemas"));
  await registry.load();
  return registry;
}
