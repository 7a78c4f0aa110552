/**
 * Refinement types
 */

import type { ExampleValue } from "../schema/types.js";

export type FailureCategory =
  | "parsing-error"
  | "validation-error"
  | "missing-data"
  | "incorrect-transformation"
  | "exception";

export const FAILURE_CATEGORIES: readonly FailureCategory[] = [
  "parsing-error",
  "validation-error",
  "missing-data",
  "incorrect-transformation",
  "exception",
];

/** A labeled input the artifact is evaluated against */
export interface TestCase {
  input: ExampleValue;
  expected: { [key: string]: ExampleValue };
  description?: string;
}

export interface FailureRecord {
  readonly input: ExampleValue;
  readonly expected: { readonly [key: string]: ExampleValue };
  /** What the extractor returned; null when it returned nothing or threw */
  readonly actual: unknown;
  readonly error: string | null;
  readonly category: FailureCategory;
  readonly description: string;
  /** Expected keys absent from the result */
  readonly missingFields: readonly string[];
  /** Expected keys whose value differed */
  readonly incorrectFields: readonly string[];
}

export interface EvaluationResult {
  readonly total: number;
  readonly passed: number;
  readonly failed: number;
  readonly accuracy: number;
  readonly failures: readonly FailureRecord[];
}

export interface FailurePattern {
  readonly name: string;
  /** Share of failures showing the pattern, in [0, 1] */
  readonly frequency: number;
  readonly fields: readonly string[];
  readonly categories: readonly FailureCategory[];
  readonly suggestedFix: string;
  readonly examples: readonly FailureRecord[];
}

export interface FieldStats {
  readonly field: string;
  readonly missing: number;
  readonly incorrect: number;
  /** (missing + incorrect) / total failures */
  readonly failureRate: number;
}

export interface FailureAnalysis {
  readonly totalFailures: number;
  readonly categories: Readonly<Record<FailureCategory, number>>;
  readonly fields: readonly FieldStats[];
  readonly patterns: readonly FailurePattern[];
  readonly confidence: number;
}

export type RefinementKind =
  | "prompt-text"
  | "parsing-rule"
  | "extraction-rule"
  | "validation-rule"
  | "worked-example"
  | "template-change";

export type RefinementPriority = "critical" | "high" | "medium" | "low";

export const PRIORITY_ORDER: readonly RefinementPriority[] = ["critical", "high", "medium", "low"];

export interface Refinement {
  readonly kind: RefinementKind;
  /** Field name, or the part of the artifact the change applies to */
  readonly target: string;
  readonly suggestion: string;
  readonly priority: RefinementPriority;
  readonly rationale: string;
  /** Names of the failure patterns this addresses */
  readonly addresses: readonly string[];
  /** Worked example to add to the prompt */
  readonly example?: { readonly input: ExampleValue; readonly output: ExampleValue };
}

export function priorityFor(frequency: number): RefinementPriority {
  if (frequency >= 0.8) return "critical";
  if (frequency >= 0.5) return "high";
  if (frequency >= 0.2) return "medium";
  return "low";
}

/** critical < high < medium < low, for sorting */
export function priorityRank(priority: RefinementPriority): number {
  return PRIORITY_ORDER.indexOf(priority);
}
