import { describe, expect, it, beforeAll } from "vitest";
import path from "node:path";
import { SchemaRegistry, SchemaViolationError, createRegistry } from "../src/schema/registry.js";

const SCHEMA_DIR = path.resolve(import.meta.dirname, "../schemas");

describe("schema registry", () => {
  let registry: SchemaRegistry;

  beforeAll(() => {
    registry = createRegistry(SCHEMA_DIR);
  });

  it("discovers all schema files", () => {
    expect(registry.names()).toEqual(["job", "pipeline"]);
  });

  it("throws for a missing directory", () => {
    expect(() => createRegistry(path.join(SCHEMA_DIR, "missing"))).toThrow("Schema directory not found");
  });

  describe("job schema", () => {
    it("accepts a valid job", async () => {
      const { valid, errors } = await registry.validate("job", { id: 12, name: "deploy_prod", status: "manual" });
      expect(valid).toBe(true);
      expect(errors).toBeNull();
    });

    it("rejects an unknown status", async () => {
      const { valid, errors } = await registry.validate("job", { id: 12, name: "deploy_prod", status: "exploded" });
      expect(valid).toBe(false);
      expect(errors).toContain("allowed values");
    });
  });

  describe("pipeline schema", () => {
    it("rejects a pipeline missing fields", async () => {
      const { valid } = await registry.validate("pipeline", { id: 8, status: "running" });
      expect(valid).toBe(false);
    });
  });

  it("parse narrows or throws", async () => {
    await expect(registry.parse("job", { id: 1, name: "build", status: "success" })).resolves.toEqual({
      id: 1,
      name: "build",
      status: "success",
    });
    await expect(registry.parse("job", { id: "1" })).rejects.toBeInstanceOf(SchemaViolationError);
  });

  it("parseList requires an array", async () => {
    await expect(registry.parseList("job", { id: 1 })).rejects.toThrow(
      'Response does not match schema "job": expected an array',
    );
  });

  it("rejects unknown schema names", async () => {
    await expect(registry.validate("nope", {})).rejects.toThrow("Schema not found: nope");
  });
});
