/**
 * Tests for the Schema Inferencer
 */

import { describe, it, expect } from "vitest";
import { inferSchema, diffSchemas, topLevelFields, nestedFields, arrayFields } from "../../src/schema/inferencer.js";
import { SchemaInferenceError } from "../../src/errors.js";

describe("inferSchema", () => {
  it("should return an empty schema for no examples", () => {
    const schema = inferSchema([]);
    expect(schema.fields.size).toBe(0);
    expect(schema.exampleCount).toBe(0);
    expect(schema.maxDepth).toBe(0);
  });

  it("should record flat fields in first-seen order", () => {
    const schema = inferSchema([{ name: "Ada", age: 36, active: true }]);
    expect([...schema.fields.keys()]).toEqual(["name", "age", "active"]);
    expect(schema.fields.get("name")?.type).toBe("string");
    expect(schema.fields.get("age")?.type).toBe("integer");
    expect(schema.fields.get("active")?.type).toBe("boolean");
  });

  it("should join integer and float observations into float", () => {
    const schema = inferSchema([{ price: 10 }, { price: 10.5 }]);
    const price = schema.fields.get("price");
    expect(price?.type).toBe("float");
    expect(price?.observedTypes).toEqual(["integer", "float"]);
  });

  it("should mark a field nullable when any example holds null", () => {
    const schema = inferSchema([{ note: "a" }, { note: null }]);
    const note = schema.fields.get("note");
    expect(note?.type).toBe("string");
    expect(note?.nullable).toBe(true);
    expect(note?.required).toBe(true);
  });

  it("should type a field seen only as null as null", () => {
    const schema = inferSchema([{ note: null }]);
    expect(schema.fields.get("note")?.type).toBe("null");
  });

  it("should mark a field not required when absent from an example", () => {
    const schema = inferSchema([{ a: 1, b: 2 }, { a: 3 }]);
    expect(schema.fields.get("a")?.required).toBe(true);
    expect(schema.fields.get("b")?.required).toBe(false);
  });

  it("should union incompatible types to unknown", () => {
    const schema = inferSchema([{ id: 1 }, { id: "x-1" }]);
    expect(schema.fields.get("id")?.type).toBe("unknown");
    expect(schema.fields.get("id")?.observedTypes).toEqual(["integer", "string"]);
  });

  it("should walk nested maps and track depth", () => {
    const schema = inferSchema([{ main: { temp: 20.5, wind: { speed: 3 } } }]);
    expect(schema.fields.get("main")?.type).toBe("map");
    expect(schema.fields.get("main.temp")?.depth).toBe(1);
    expect(schema.fields.get("main.wind.speed")?.depth).toBe(2);
    expect(schema.maxDepth).toBe(2);
  });

  it("should describe arrays with element paths and item types", () => {
    const schema = inferSchema([{ tags: ["a", "b"], items: [{ sku: "X", qty: 2 }] }]);
    const tags = schema.fields.get("tags");
    expect(tags?.isArray).toBe(true);
    expect(tags?.itemType).toBe("string");
    expect(schema.fields.get("tags[]")?.type).toBe("string");
    expect(schema.fields.get("items[].qty")?.type).toBe("integer");
    expect(schema.fields.get("items[].qty")?.name).toBe("qty");
  });

  it("should classify dates and bigints", () => {
    const schema = inferSchema([
      {
        day: new Date("2024-03-01T00:00:00Z"),
        at: new Date("2024-03-01T10:30:00Z"),
        total: 12345678901234567890n,
      },
    ]);
    expect(schema.fields.get("day")?.type).toBe("date");
    expect(schema.fields.get("at")?.type).toBe("datetime");
    expect(schema.fields.get("total")?.type).toBe("decimal");
  });

  it("should keep keys holding path punctuation apart from nested paths", () => {
    const schema = inferSchema([{ "a.b": "x", a: { b: 5 }, "note]": 1, "[raw": true }]);
    expect(schema.fields.get('["a.b"]')?.type).toBe("string");
    expect(schema.fields.get('["a.b"]')?.name).toBe("a.b");
    expect(schema.fields.get('["a.b"]')?.depth).toBe(0);
    expect(schema.fields.get("a.b")?.type).toBe("integer");
    expect(schema.fields.get('["note]"]')?.type).toBe("integer");
    expect(schema.fields.get('["[raw"]')?.type).toBe("boolean");
    expect(topLevelFields(schema).map((f) => f.path)).toContain('["a.b"]');
  });

  it("should keep bounded distinct samples", () => {
    const examples = [1, 2, 2, 3, 4, 5, 6].map((n) => ({ n }));
    const schema = inferSchema(examples, { maxSamples: 3 });
    expect(schema.fields.get("n")?.samples).toEqual([1, 2, 3]);
  });

  it("should treat scalar examples as a root field", () => {
    const schema = inferSchema(["1,000", "2,000"]);
    expect(schema.fields.get("$")?.type).toBe("string");
  });

  it("should reject functions with the offending path", () => {
    expect(() => inferSchema([{ a: { b: () => 1 } }])).toThrow(SchemaInferenceError);
    try {
      inferSchema([{ a: { b: () => 1 } }]);
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaInferenceError);
      if (error instanceof SchemaInferenceError) expect(error.path).toBe("a.b");
    }
  });

  it("should reject circular references", () => {
    const node: Record<string, unknown> = { name: "loop" };
    node.self = node;
    expect(() => inferSchema([node])).toThrow(/Circular reference/);
  });

  it("should reject non-plain objects and non-finite numbers", () => {
    expect(() => inferSchema([{ m: new Map() }])).toThrow(/Unsupported Map value/);
    expect(() => inferSchema([{ n: Number.NaN }])).toThrow(SchemaInferenceError);
  });
});

describe("schema field helpers", () => {
  const schema = inferSchema([{ id: 1, main: { temp: 2 }, tags: ["x"] }]);

  it("should split top-level, nested and array fields", () => {
    expect(topLevelFields(schema).map((f) => f.path)).toEqual(["id", "main", "tags"]);
    expect(nestedFields(schema).map((f) => f.path)).toEqual(["main.temp"]);
    expect(arrayFields(schema).map((f) => f.path)).toEqual(["tags"]);
  });
});

describe("diffSchemas", () => {
  it("should report added, removed and type-changed fields in order", () => {
    const before = inferSchema([{ a: 1, b: "x", c: true }]);
    const after = inferSchema([{ a: "1", c: true, d: 5 }]);
    const diff = diffSchemas(before, after);
    expect(diff.map((d) => [d.kind, d.path])).toEqual([
      ["field-added", "d"],
      ["field-removed", "b"],
      ["type-changed", "a"],
    ]);
    expect(diff[2].fromType).toBe("integer");
    expect(diff[2].toType).toBe("string");
  });

  it("should infer a rename from shared samples", () => {
    const before = inferSchema([{ city: "Oslo" }, { city: "Lima" }]);
    const after = inferSchema([{ town: "Oslo" }, { town: "Lima" }]);
    const renamed = diffSchemas(before, after).find((d) => d.kind === "field-renamed");
    expect(renamed?.path).toBe("city");
    expect(renamed?.toPath).toBe("town");
    expect(renamed?.similarity).toBe(1);
  });

  it("should respect the rename similarity threshold", () => {
    const before = inferSchema([{ city: "Oslo" }, { city: "Lima" }]);
    const after = inferSchema([{ town: "Oslo" }, { town: "Kyiv" }]);
    // one shared sample out of three distinct: 1/3
    expect(diffSchemas(before, after).some((d) => d.kind === "field-renamed")).toBe(false);
    expect(
      diffSchemas(before, after, { renameSimilarity: 0.3 }).some((d) => d.kind === "field-renamed")
    ).toBe(true);
  });

  it("should not pair fields of different types", () => {
    const before = inferSchema([{ a: 1 }]);
    const after = inferSchema([{ b: "1" }]);
    expect(diffSchemas(before, after).some((d) => d.kind === "field-renamed")).toBe(false);
  });

  it("should reject a threshold outside [0, 1]", () => {
    const schema = inferSchema([{ a: 1 }]);
    expect(() => diffSchemas(schema, schema, { renameSimilarity: 1.5 })).toThrow(RangeError);
  });
});
