import fs from "node:fs";
import path from "node:path";
import { compileGuard } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  filePath: string;
  schema: unknown;
};

export class SchemaViolationError extends Error {
  constructor(
    public readonly schemaName: string,
    public readonly details: string,
  ) {
    super(`Response does not match schema "${schemaName}": ${details}`);
    this.name = "SchemaViolationError";
  }
}

/**
 * Schema registry: discovers and loads all JSON Schemas from a directory.
 * Parsing narrows a value to the type its schema describes.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  load(): void {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));

      // "job.schema.json" → "job"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, filePath, schema });
    }
  }

  /** List all registered schema names. */
  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  private schemaFor(name: string): unknown {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }
    return entry.schema;
  }

  /** Validate data against a named schema. Returns errors or null. */
  async validate(name: string, data: unknown): Promise<{ valid: boolean; errors: string | null }> {
    const guard = await compileGuard<unknown>(this.schemaFor(name));
    const valid = guard.check(data);
    return { valid, errors: valid ? null : guard.errorsText() };
  }

  /** Narrow `data` to T, or throw SchemaViolationError. */
  async parse<T>(name: string, data: unknown): Promise<T> {
    const guard = await compileGuard<T>(this.schemaFor(name));
    if (!guard.check(data)) {
      throw new SchemaViolationError(name, guard.errorsText());
    }
    return data;
  }

  /** Narrow an array response whose items follow the named schema. */
  async parseList<T>(name: string, data: unknown): Promise<T[]> {
    if (!Array.isArray(data)) {
      throw new SchemaViolationError(name, "expected an array");
    }
    const items: T[] = [];
    for (const item of data) {
      items.push(await this.parse<T>(name, item));
    }
    return items;
  }
}

/** Create and load a registry from the default schemas directory. */
export function createRegistry(schemaDir?: string): SchemaRegistry {
  const dir = schemaDir ?? path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../schemas");
  const registry = new SchemaRegistry(dir);
  registry.load();
  return registry;
}
