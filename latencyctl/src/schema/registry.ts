import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { isRecord } from "../types/archive.js";
import { loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

/**
 * Schema registry — discovers and loads all JSON Schemas from a directory.
 * Provides compile-on-demand validation functions.
 */
export class SchemaRegistry {
  private schemas = new Map<string, Record<string, unknown>>();
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
      if (!isRecord(schema)) {
        throw new Error(`Schema is not an object: ${filePath}`);
      }

      // "latency-report.schema.json" → "latency-report"
      const name = file.replace(/\.schema\.json$/, "");
      this.schemas.set(name, schema);
    }

    this.ajv = await loadAjv();
  }

  private async getAjv(): Promise<AjvInstance> {
    if (!this.ajv) {
      this.ajv = await loadAjv();
    }
    return this.ajv;
  }

  /** Compile and cache a validator for the given schema name. */
  async getValidator(name: string): Promise<AjvValidateFn> {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const schema = this.schemas.get(name);
    if (!schema) {
      throw new Error(`Schema not found: ${name}`);
    }

    const ajv = await this.getAjv();
    const validate = ajv.compile(schema);
    this.validators.set(name, validate);
    return validate;
  }

  /** Validate data against a named schema. */
  async validate(name: string, data: unknown): Promise<{ valid: boolean; errors: string | null }> {
    const validate = await this.getValidator(name);
    const valid = validate(data);
    const ajv = await this.getAjv();

    return {
      valid,
      errors: valid ? null : ajv.errorsText(validate.errors),
    };
  }
}

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/** Create and load a registry from the default schemas directory. */
export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? DEFAULT_SCHEMA_DIR);
  await registry.load();
  return registry;
}
