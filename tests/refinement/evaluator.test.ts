/**
 * Tests for extractor evaluation
 */

import { describe, it, expect } from "vitest";
import { categorizeError, evaluateExtractor, valuesMatch } from "../../src/refinement/evaluator.js";
import type { Extractor } from "../../src/registry/types.js";
import type { TestCase } from "../../src/refinement/types.js";

function extractorReturning(fn: (input: unknown) => unknown): Extractor {
  return { extract: async (input) => fn(input) };
}

class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

const CASES: TestCase[] = [
  { input: "Acme paid 100", expected: { company: "Acme", amount: 100 }, description: "acme" },
  { input: "Globex paid 250", expected: { company: "Globex", amount: 250 } },
];

describe("valuesMatch", () => {
  it("should allow a small numeric difference", () => {
    expect(valuesMatch(100, 100.005)).toBe(true);
    expect(valuesMatch(1, 1.02)).toBe(false);
  });

  it("should compare strings trimmed and ignoring case", () => {
    expect(valuesMatch("Acme Corp", "  acme corp ")).toBe(true);
    expect(valuesMatch("Acme", "Acme Inc")).toBe(false);
  });

  it("should compare nested values", () => {
    expect(valuesMatch({ items: [1, "A"] }, { items: [1.001, "a"], extra: true })).toBe(true);
    expect(valuesMatch([1, 2], [1])).toBe(false);
    expect(valuesMatch({ a: 1 }, null)).toBe(false);
  });

  it("should accept an ISO string for a date", () => {
    expect(valuesMatch(new Date("2024-03-01T00:00:00Z"), "2024-03-01")).toBe(true);
    expect(valuesMatch(new Date("2024-03-01T00:00:00Z"), "2024-03-02")).toBe(false);
  });

  it("should not treat a number and its string as equal", () => {
    expect(valuesMatch(100, "100")).toBe(false);
  });
});

describe("categorizeError", () => {
  it("should map thrown errors to categories", () => {
    expect(categorizeError(new SyntaxError("Unexpected token"))).toBe("parsing-error");
    expect(categorizeError(new ValidationError("amount must be a number"))).toBe("validation-error");
    expect(categorizeError(new TypeError("boom"))).toBe("exception");
    expect(categorizeError("not an error")).toBe("exception");
  });
});

describe("evaluateExtractor", () => {
  it("should pass outputs that match within tolerance", async () => {
    const result = await evaluateExtractor(
      extractorReturning((input) =>
        input === "Acme paid 100" ? { company: "acme", amount: 100.001 } : { company: "Globex", amount: 250 }
      ),
      CASES
    );
    expect(result).toEqual({ total: 2, passed: 2, failed: 0, accuracy: 1, failures: [] });
  });

  it("should record a null result as missing data for every field", async () => {
    const result = await evaluateExtractor(extractorReturning(() => null), CASES.slice(0, 1));
    expect(result.accuracy).toBe(0);
    expect(result.failures[0]).toMatchObject({
      category: "missing-data",
      missingFields: ["company", "amount"],
      actual: null,
      description: "acme",
    });
  });

  it("should record a non-object result as a validation error", async () => {
    const result = await evaluateExtractor(extractorReturning(() => ["Acme", 100]), CASES.slice(0, 1));
    expect(result.failures[0].category).toBe("validation-error");
    expect(result.failures[0].error).toBe("Expected an object, got array");
  });

  it("should prefer missing data over incorrect values", async () => {
    const result = await evaluateExtractor(extractorReturning(() => ({ company: "Initech" })), CASES.slice(0, 1));
    expect(result.failures[0]).toMatchObject({
      category: "missing-data",
      missingFields: ["amount"],
      incorrectFields: ["company"],
    });
  });

  it("should record mismatched values as incorrect transformation", async () => {
    const result = await evaluateExtractor(
      extractorReturning(() => ({ company: "Acme", amount: "100" })),
      CASES.slice(0, 1)
    );
    expect(result.failures[0]).toMatchObject({
      category: "incorrect-transformation",
      incorrectFields: ["amount"],
      error: "Incorrect values: amount",
    });
  });

  it("should categorize thrown errors and keep evaluating", async () => {
    const errors = [new SyntaxError("Unexpected end of JSON input"), new ValidationError("bad amount")];
    let call = 0;
    const extractor: Extractor = {
      extract: async () => {
        throw errors[call++];
      },
    };
    const result = await evaluateExtractor(extractor, CASES);
    expect(result.failures.map((f) => f.category)).toEqual(["parsing-error", "validation-error"]);
    expect(result.failures[1]).toMatchObject({ error: "bad amount", description: "test case 2" });
  });

  it("should report partial accuracy", async () => {
    const result = await evaluateExtractor(
      extractorReturning((input) => (input === "Acme paid 100" ? { company: "Acme", amount: 100 } : null)),
      CASES
    );
    expect(result.passed).toBe(1);
    expect(result.failed).toBe(1);
    expect(result.accuracy).toBe(0.5);
  });

  it("should give zero accuracy for an empty test set", async () => {
    const result = await evaluateExtractor(extractorReturning(() => ({})), []);
    expect(result).toEqual({ total: 0, passed: 0, failed: 0, accuracy: 0, failures: [] });
  });
});
