import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  filePath: string;
  schema: unknown;
};

export type SchemaCheck<T> = { valid: true; value: T } | { valid: false; errors: string };

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/**
 * Discovers and loads all JSON Schemas from a directory.
 * Compiled validators are cached by Ajv per schema object.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
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

      // "build-request.schema.json" → "build-request"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, filePath, schema });
    }

    this.ajv = await loadAjv();
  }

  async getValidator<T>(name: string): Promise<AjvValidateFn<T>> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }
    const ajv = await this.instance();
    return ajv.compile<T>(entry.schema);
  }

  /** Validate data against a named schema, narrowing it on success. */
  async check<T>(name: string, data: unknown): Promise<SchemaCheck<T>> {
    const validate = await this.getValidator<T>(name);
    if (validate(data)) return { valid: true, value: data };
    const ajv = await this.instance();
    return { valid: false, errors: ajv.errorsText(validate.errors) };
  }

  private async instance(): Promise<AjvInstance> {
    if (!this.ajv) {
      this.ajv = await loadAjv();
    }
    return this.ajv;
  }
}

/** Create and load a registry from the default schemas directory. */
export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? DEFAULT_SCHEMA_DIR);
  await registry.load();
  return registry;
}
