/**
 * Tests for the Pattern Detector
 */

import { describe, it, expect } from "vitest";
import { detectPatterns, PatternDetector } from "../../src/patterns/detector.js";
import { bestPattern, createPattern, patternsFor, type ExamplePair } from "../../src/patterns/types.js";

describe("PatternDetector", () => {
  describe("edge cases", () => {
    it("should return no patterns and zero confidence for no examples", () => {
      const parsed = detectPatterns([]);
      expect(parsed.patterns).toEqual([]);
      expect(parsed.confidence).toBe(0);
      expect(parsed.warnings).toEqual([]);
    });

    it("should reject a pattern confidence outside [0, 1]", () => {
      expect(() =>
        createPattern({
          kind: "constant",
          sourcePath: null,
          targetPath: "x",
          confidence: 1.2,
          consistency: 1,
          description: "bad",
        })
      ).toThrow(RangeError);
    });
  });

  describe("structural patterns", () => {
    it("should copy a key holding a dot as one field", () => {
      const pairs: ExamplePair[] = [7, 8, 9].map((n) => ({
        input: { "user.id": n, user: { id: n + 100 } },
        output: { "user.id": n },
      }));
      const parsed = detectPatterns(pairs);
      expect(parsed.targets).toEqual(['["user.id"]']);
      expect(bestPattern(parsed, '["user.id"]')).toMatchObject({
        kind: "direct-copy",
        sourcePath: '["user.id"]',
        confidence: 1,
      });
      expect(parsed.warnings.filter((w) => w.kind === "no-pattern")).toEqual([]);
    });

    it("should detect a direct copy with confidence 1.0", () => {
      const pairs: ExamplePair[] = [
        { input: { name: "Ada", age: 36 }, output: { name: "Ada" } },
        { input: { name: "Bob", age: 40 }, output: { name: "Bob" } },
        { input: { name: "Cy", age: 22 }, output: { name: "Cy" } },
      ];
      const parsed = detectPatterns(pairs);
      const best = bestPattern(parsed, "name");
      expect(best?.kind).toBe("direct-copy");
      expect(best?.sourcePath).toBe("name");
      expect(best?.confidence).toBe(1);
      expect(patternsFor(parsed, "name")).toHaveLength(1);
      expect(parsed.confidence).toBe(1);
      expect(parsed.warnings).toEqual([]);
    });

    it("should detect a rename", () => {
      const parsed = detectPatterns([
        { input: { full_name: "Ada L" }, output: { name: "Ada L" } },
        { input: { full_name: "Bob K" }, output: { name: "Bob K" } },
        { input: { full_name: "Cy M" }, output: { name: "Cy M" } },
      ]);
      const best = bestPattern(parsed, "name");
      expect(best?.kind).toBe("field-rename");
      expect(best?.sourcePath).toBe("full_name");
      expect(best?.confidence).toBe(1);
    });

    it("should detect nested extraction", () => {
      const parsed = detectPatterns([
        { input: { main: { temp: 20.5 }, name: "Oslo" }, output: { temperature: 20.5 } },
        { input: { main: { temp: 18 }, name: "Lima" }, output: { temperature: 18 } },
        { input: { main: { temp: 25.1 }, name: "Pune" }, output: { temperature: 25.1 } },
      ]);
      const best = bestPattern(parsed, "temperature");
      expect(best?.kind).toBe("nested-extraction");
      expect(best?.sourcePath).toBe("main.temp");
    });

    it("should detect taking the first array element", () => {
      const parsed = detectPatterns([
        { input: { weather: [{ description: "rain" }, { description: "wind" }] }, output: { summary: "rain" } },
        { input: { weather: [{ description: "sun" }, { description: "fog" }] }, output: { summary: "sun" } },
        { input: { weather: [{ description: "snow" }] }, output: { summary: "snow" } },
      ]);
      const best = bestPattern(parsed, "summary");
      expect(best?.kind).toBe("array-first");
      expect(best?.sourcePath).toBe("weather[0].description");
      expect(best?.confidence).toBe(1);
    });

    it("should detect a constant", () => {
      const parsed = detectPatterns([
        { input: { id: 1 }, output: { source: "api" } },
        { input: { id: 2 }, output: { source: "api" } },
        { input: { id: 3 }, output: { source: "api" } },
      ]);
      const best = bestPattern(parsed, "source");
      expect(best?.kind).toBe("constant");
      expect(best?.confidence).toBe(1);
      expect(best?.params.value).toBe("api");
    });

    it("should detect a default value for absent inputs", () => {
      const parsed = detectPatterns([
        { input: { country: "NO" }, output: { country: "NO" } },
        { input: { country: "SE" }, output: { country: "SE" } },
        { input: {}, output: { country: "US" } },
      ]);
      const candidates = patternsFor(parsed, "country");
      expect(candidates.map((p) => [p.kind, p.confidence])).toEqual([
        ["default-value", 1],
        ["direct-copy", 0.6667],
      ]);
      expect(candidates[0].params.default).toBe("US");
    });
  });

  describe("value transformations", () => {
    it("should detect numeric text converted to a number", () => {
      const pairs: ExamplePair[] = [
        { input: { amount: "1,000,000" }, output: { amount: 1000000 } },
        { input: { amount: "1,000,000" }, output: { amount: 1000000 } },
        { input: { amount: "1,000,000" }, output: { amount: 1000000 } },
      ];
      const parsed = detectPatterns(pairs);
      const conversion = patternsFor(parsed, "amount").find((p) => p.kind === "type-conversion");
      expect(conversion?.confidence).toBe(1);
      expect(conversion?.params.conversion).toBe("parse-number");
      expect(bestPattern(parsed, "amount")?.kind).toBe("type-conversion");
      expect(parsed.outputSchema.fields.get("amount")?.type).toBe("integer");
    });

    it("should detect string concatenation", () => {
      const parsed = detectPatterns([
        { input: { first: "Ada", last: "Lovelace" }, output: { full: "Ada Lovelace" } },
        { input: { first: "Grace", last: "Hopper" }, output: { full: "Grace Hopper" } },
        { input: { first: "Alan", last: "Turing" }, output: { full: "Alan Turing" } },
      ]);
      const best = bestPattern(parsed, "full");
      expect(best?.kind).toBe("string-concatenation");
      expect(best?.sourcePath).toBe("first");
      expect(best?.extraSources).toEqual(["last"]);
      expect(best?.params.separator).toBe(" ");
      expect(best?.confidence).toBe(0.95);
    });

    it("should detect a product of two inputs", () => {
      const parsed = detectPatterns([
        { input: { price: 10, qty: 3 }, output: { total: 30 } },
        { input: { price: 4, qty: 5 }, output: { total: 20 } },
        { input: { price: 2.5, qty: 2 }, output: { total: 5 } },
      ]);
      const best = bestPattern(parsed, "total");
      expect(best?.kind).toBe("calculation");
      expect(best?.params.operator).toBe("*");
      expect(best?.confidence).toBe(1);
    });

    it("should detect sums and counts over arrays", () => {
      const parsed = detectPatterns([
        { input: { items: [{ qty: 2 }, { qty: 3 }] }, output: { total_qty: 5, count: 2 } },
        { input: { items: [{ qty: 1 }] }, output: { total_qty: 1, count: 1 } },
        { input: { items: [{ qty: 4 }, { qty: 4 }, { qty: 1 }] }, output: { total_qty: 9, count: 3 } },
      ]);
      const sum = bestPattern(parsed, "total_qty");
      expect(sum?.kind).toBe("aggregation");
      expect(sum?.params.aggregate).toBe("sum");
      expect(sum?.params.key).toBe("qty");
      const count = bestPattern(parsed, "count");
      expect(count?.kind).toBe("aggregation");
      expect(count?.params.aggregate).toBe("count");
    });

    it("should detect a lookup table", () => {
      const parsed = detectPatterns([
        { input: { status: "A" }, output: { label: "Active" } },
        { input: { status: "I" }, output: { label: "Inactive" } },
        { input: { status: "A" }, output: { label: "Active" } },
        { input: { status: "I" }, output: { label: "Inactive" } },
      ]);
      const best = bestPattern(parsed, "label");
      expect(best?.kind).toBe("conditional");
      expect(best?.confidence).toBe(0.95);
    });

    it("should detect a numeric threshold", () => {
      const parsed = detectPatterns([
        { input: { score: 80 }, output: { passed: true } },
        { input: { score: 40 }, output: { passed: false } },
        { input: { score: 65 }, output: { passed: true } },
        { input: { score: 50 }, output: { passed: false } },
      ]);
      const best = bestPattern(parsed, "passed");
      expect(best?.kind).toBe("conditional");
      expect(best?.params.operator).toBe(">");
      expect(best?.params.threshold).toBe(50);
    });
  });

  describe("warnings", () => {
    it("should warn about fields no pattern explains", () => {
      const parsed = detectPatterns([
        { input: { a: 1 }, output: { b: "zzz" } },
        { input: { a: 2 }, output: { b: "qqq" } },
      ]);
      expect(patternsFor(parsed, "b")).toEqual([]);
      expect(parsed.warnings).toContainEqual({
        kind: "no-pattern",
        field: "b",
        message: "No pattern found for output field 'b'",
      });
      expect(parsed.warnings.some((w) => w.kind === "few-examples")).toBe(true);
    });

    it("should fall back to a complex pattern when the output draws on the input", () => {
      const parsed = detectPatterns([
        { input: { text: "Invoice 42 from Acme" }, output: { vendor: "ACME Corp" } },
        { input: { text: "Bill 7 from Globex" }, output: { vendor: "GLOBEX Corp" } },
      ]);
      const best = bestPattern(parsed, "vendor");
      expect(best?.kind).toBe("complex");
      expect(best?.confidence).toBe(0.3);
      expect(parsed.warnings.some((w) => w.kind === "complex-only" && w.field === "vendor")).toBe(true);
    });
  });

  describe("confidence bounds", () => {
    it("should keep every confidence within [0, 1]", () => {
      const detector = new PatternDetector();
      const parsed = detector.detect([
        { input: { a: "1", b: [1, 2], c: { d: true } }, output: { a: 1, n: 2, d: true, k: "x" } },
        { input: { a: "2", b: [3], c: { d: false } }, output: { a: 2, n: 1, d: false, k: "x" } },
      ]);
      expect(parsed.confidence).toBeGreaterThanOrEqual(0);
      expect(parsed.confidence).toBeLessThanOrEqual(1);
      for (const pattern of parsed.patterns) {
        expect(pattern.confidence).toBeGreaterThanOrEqual(0);
        expect(pattern.confidence).toBeLessThanOrEqual(1);
      }
    });

    it("should keep every candidate per field by default", () => {
      const pairs: ExamplePair[] = [3, 4, 5].map((n) => ({
        input: { a: n, b: n, c: n, d: n, e: n, f: n },
        output: { x: n },
      }));
      const candidates = patternsFor(detectPatterns(pairs), "x");
      const renames = candidates.filter((p) => p.kind === "field-rename").map((p) => p.sourcePath);
      expect(renames.sort()).toEqual(["a", "b", "c", "d", "e", "f"]);
      expect(candidates.length).toBeGreaterThan(5);
    });

    it("should cap candidates per field when asked", () => {
      const parsed = detectPatterns(
        [
          { input: { a: 1, b: 1, c: 1, d: 1 }, output: { x: 1 } },
          { input: { a: 1, b: 1, c: 1, d: 1 }, output: { x: 1 } },
        ],
        { maxCandidatesPerField: 2 }
      );
      expect(patternsFor(parsed, "x")).toHaveLength(2);
    });
  });
});
