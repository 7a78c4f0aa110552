/**
 * Evaluating an extractor against labeled test cases
 *
 * A failing case is data, not an error: every case yields either a pass or a
 * FailureRecord with exactly one category.
 */

import { errorMessage } from "../errors.js";
import type { Extractor } from "../registry/types.js";
import { isPlainRecord } from "../schema/values.js";
import type { EvaluationResult, FailureCategory, FailureRecord, TestCase } from "./types.js";

const NUMERIC_TOLERANCE = 0.01;

/**
 * Compare an expected value with what the extractor produced. Numbers match
 * within 0.01; strings match after trimming, ignoring case.
 */
export function valuesMatch(expected: unknown, actual: unknown): boolean {
  if (expected === actual) return true;
  if (typeof expected === "number" && typeof actual === "number") {
    return Math.abs(expected - actual) < NUMERIC_TOLERANCE;
  }
  if (typeof expected === "bigint" || typeof actual === "bigint") {
    return String(expected) === String(actual);
  }
  if (typeof expected === "string" && typeof actual === "string") {
    return expected.trim().toLowerCase() === actual.trim().toLowerCase();
  }
  if (expected instanceof Date) {
    if (actual instanceof Date) return expected.getTime() === actual.getTime();
    if (typeof actual !== "string") return false;
    const iso = expected.toISOString();
    return actual === iso || actual === iso.slice(0, 10);
  }
  if (Array.isArray(expected)) {
    return (
      Array.isArray(actual) &&
      expected.length === actual.length &&
      expected.every((item, i) => valuesMatch(item, actual[i]))
    );
  }
  if (isPlainRecord(expected)) {
    if (!isPlainRecord(actual)) return false;
    return Object.keys(expected).every((key) => key in actual && valuesMatch(expected[key], actual[key]));
  }
  return false;
}

/** Category of an error thrown by an extractor */
export function categorizeError(error: unknown): FailureCategory {
  if (error instanceof SyntaxError) return "parsing-error";
  if (error instanceof Error && (error.name === "ValidationError" || error.name === "ZodError")) {
    return "validation-error";
  }
  return "exception";
}

function describe(testCase: TestCase, index: number): string {
  return testCase.description ?? `test case ${index + 1}`;
}

function compareOutput(testCase: TestCase, index: number, actual: unknown): FailureRecord | null {
  const expectedKeys = Object.keys(testCase.expected);
  const base = {
    input: testCase.input,
    expected: testCase.expected,
    actual,
    description: describe(testCase, index),
  };

  if (actual === null || actual === undefined) {
    return {
      ...base,
      actual: null,
      error: "Extractor returned no result",
      category: "missing-data",
      missingFields: expectedKeys,
      incorrectFields: [],
    };
  }
  if (!isPlainRecord(actual)) {
    return {
      ...base,
      error: `Expected an object, got ${Array.isArray(actual) ? "array" : typeof actual}`,
      category: "validation-error",
      missingFields: [],
      incorrectFields: [],
    };
  }

  const missingFields = expectedKeys.filter((key) => actual[key] === undefined);
  const incorrectFields = expectedKeys.filter(
    (key) => actual[key] !== undefined && !valuesMatch(testCase.expected[key], actual[key])
  );
  if (missingFields.length > 0) {
    return {
      ...base,
      error: `Missing fields: ${missingFields.join(", ")}`,
      category: "missing-data",
      missingFields,
      incorrectFields,
    };
  }
  if (incorrectFields.length > 0) {
    return {
      ...base,
      error: `Incorrect values: ${incorrectFields.join(", ")}`,
      category: "incorrect-transformation",
      missingFields,
      incorrectFields,
    };
  }
  return null;
}

/**
 * Run every test case through the extractor, one at a time.
 */
export async function evaluateExtractor(
  extractor: Extractor,
  testCases: readonly TestCase[]
): Promise<EvaluationResult> {
  const failures: FailureRecord[] = [];

  for (const [index, testCase] of testCases.entries()) {
    let actual: unknown;
    try {
      actual = await extractor.extract(testCase.input);
    } catch (error) {
      failures.push({
        input: testCase.input,
        expected: testCase.expected,
        actual: null,
        error: errorMessage(error),
        category: categorizeError(error),
        description: describe(testCase, index),
        missingFields: [],
        incorrectFields: [],
      });
      continue;
    }
    const failure = compareOutput(testCase, index, actual);
    if (failure) failures.push(failure);
  }

  const total = testCases.length;
  const failed = failures.length;
  return {
    total,
    passed: total - failed,
    failed,
    accuracy: total === 0 ? 0 : (total - failed) / total,
    failures,
  };
}
