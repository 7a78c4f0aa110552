/**
 * Tests for the Failure Categorizer
 */

import { describe, it, expect } from "vitest";
import { FailureCategorizer } from "../../src/refinement/failure-categorizer.js";
import { priorityRank, type FailureRecord } from "../../src/refinement/types.js";

function failure(overrides: Partial<FailureRecord> & Pick<FailureRecord, "category">): FailureRecord {
  return {
    input: "Total compensation table",
    expected: {},
    actual: null,
    error: null,
    description: "case",
    missingFields: [],
    incorrectFields: [],
    ...overrides,
  };
}

function missingSalary(): FailureRecord {
  return failure({
    category: "missing-data",
    expected: { name: "Jane Doe", salary: 500 },
    actual: { name: "Jane Doe" },
    missingFields: ["salary"],
  });
}

describe("FailureCategorizer", () => {
  const categorizer = new FailureCategorizer();

  it("should report full confidence and no refinements without failures", () => {
    const analysis = categorizer.analyze([]);
    expect(analysis).toEqual({
      totalFailures: 0,
      categories: {
        "parsing-error": 0,
        "validation-error": 0,
        "missing-data": 0,
        "incorrect-transformation": 0,
        exception: 0,
      },
      fields: [],
      patterns: [],
      confidence: 1,
    });
    expect(categorizer.suggestRefinements(analysis)).toEqual([]);
  });

  it("should detect a missing field pattern", () => {
    const failures = [missingSalary(), missingSalary(), missingSalary(), failure({ category: "exception", error: "boom" })];
    const analysis = categorizer.analyze(failures);

    expect(analysis.categories["missing-data"]).toBe(3);
    expect(analysis.categories.exception).toBe(1);
    expect(analysis.fields).toEqual([{ field: "salary", missing: 3, incorrect: 0, failureRate: 0.75 }]);
    expect(analysis.patterns.map((p) => p.name)).toEqual(["missing-field:salary"]);
    expect(analysis.patterns[0].frequency).toBe(0.75);
    expect(analysis.patterns[0].fields).toEqual(["salary"]);
    expect(analysis.patterns[0].examples).toHaveLength(3);
    expect(analysis.confidence).toBe(0.6);
  });

  it("should turn patterns and categories into prioritized refinements", () => {
    const failures = [missingSalary(), missingSalary(), missingSalary(), failure({ category: "exception", error: "boom" })];
    const refinements = categorizer.suggestRefinements(categorizer.analyze(failures));

    expect(refinements.map((r) => [r.kind, r.target, r.priority])).toEqual([
      ["extraction-rule", "salary", "high"],
      ["template-change", "extraction-logic", "medium"],
    ]);
    expect(refinements[0].addresses).toEqual(["missing-field:salary"]);
    expect(refinements[0].rationale).toBe("Field 'salary' missing in 75.0% of failures");
  });

  it("should detect numeric formatting and type mismatches", () => {
    const amountAsText = () =>
      failure({
        category: "incorrect-transformation",
        input: "Salary: $1,000,000",
        expected: { amount: 1000000 },
        actual: { amount: "1,000,000" },
        incorrectFields: ["amount"],
      });
    const analysis = categorizer.analyze([amountAsText(), amountAsText(), amountAsText()]);

    expect(analysis.patterns.map((p) => p.name)).toEqual(["numeric-formatting", "type-mismatch"]);
    expect(analysis.patterns[0].fields).toEqual(["amount"]);
    expect(analysis.confidence).toBe(0.7);

    const refinements = categorizer.suggestRefinements(analysis);
    expect(refinements.map((r) => r.kind)).toEqual(["worked-example", "validation-rule", "prompt-text"]);
    expect(refinements.every((r) => r.priority === "critical")).toBe(true);
    expect(refinements[0].example).toEqual({ input: "Salary: $1,000,000", output: { amount: 1000000 } });
    expect(refinements[1].target).toBe("output-schema");
  });

  it("should detect nested structure parsing failures", () => {
    const nested = () =>
      failure({
        category: "parsing-error",
        expected: { officers: [{ name: "Jane Doe", salary: 500 }] },
        error: "Unexpected token } in JSON at position 12",
      });
    const analysis = categorizer.analyze([nested(), nested()]);

    expect(analysis.patterns.map((p) => p.name)).toEqual(["nested-structure-parsing"]);
    expect(categorizer.suggestRefinements(analysis).map((r) => [r.kind, r.target])).toEqual([
      ["parsing-rule", "system-prompt"],
      ["parsing-rule", "output-format"],
    ]);
  });

  it("should not report a pattern seen fewer times than minFieldFailures", () => {
    const analysis = categorizer.analyze([
      missingSalary(),
      failure({ category: "validation-error", error: "Expected an object, got string" }),
    ]);
    expect(analysis.patterns).toEqual([]);
    expect(analysis.confidence).toBe(0.5);
  });

  it("should give a field missing in at least 30% of failures a medium or higher refinement", () => {
    const other = () => failure({ category: "incorrect-transformation", expected: { name: "A" }, actual: { name: "B" }, incorrectFields: ["name"] });
    const samples: FailureRecord[][] = [
      [missingSalary(), other()],
      [missingSalary(), other(), other()],
      [missingSalary(), missingSalary(), other(), other(), other()],
      [missingSalary(), missingSalary(), missingSalary(), other(), other(), other(), other(), other(), other(), other()],
    ];
    for (const sample of samples) {
      const refinements = categorizer.suggestRefinements(categorizer.analyze(sample));
      const salary = refinements.find((r) => r.target === "salary");
      expect(salary?.kind).toBe("extraction-rule");
      expect(priorityRank(salary?.priority ?? "low")).toBeLessThanOrEqual(priorityRank("medium"));
    }
  });

  it("should address the missing-data category for a field below the pattern count", () => {
    const refinements = categorizer.suggestRefinements(
      categorizer.analyze([missingSalary(), failure({ category: "exception" })])
    );
    const salary = refinements.find((r) => r.target === "salary");
    expect(salary).toMatchObject({ priority: "high", addresses: ["missing-data"] });
  });

  it("should honor a custom minimum pattern frequency", () => {
    const strict = new FailureCategorizer({ minPatternFrequency: 0.5 });
    const failures = [missingSalary(), missingSalary(), missingSalary(), failure({ category: "exception" })];
    expect(strict.suggestRefinements(strict.analyze(failures)).map((r) => r.kind)).toEqual(["extraction-rule"]);
  });

  it("should grow confidence with the number of failures", () => {
    const many = Array.from({ length: 20 }, () => failure({ category: "exception", error: "boom" }));
    expect(categorizer.analyze(many).confidence).toBe(0.77);
  });
});
