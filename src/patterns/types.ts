/**
 * Pattern types
 */

import { assertConfidence } from "../errors.js";
import type {
  ExampleValue,
  Schema,
  SchemaDifference,
} from "../schema/types.js";

export type PatternKind =
  | "direct-copy"
  | "field-rename"
  | "nested-extraction"
  | "array-first"
  | "array-element"
  | "type-conversion"
  | "string-concatenation"
  | "string-manipulation"
  | "constant"
  | "calculation"
  | "aggregation"
  | "conditional"
  | "default-value"
  | "complex";

export type ConfidenceLevel = "high" | "medium" | "low";

/** Structural hints an example may carry for section-locating domains */
export interface ExampleHints {
  sectionMarkers?: string[];
  requiredKeywords?: string[];
  rejectedKeywords?: string[];
  parsingRules?: string[];
}

export interface ExamplePair {
  input: ExampleValue;
  output: ExampleValue;
  hints?: ExampleHints;
}

export interface PatternExample {
  readonly input: ExampleValue | undefined;
  readonly output: ExampleValue | undefined;
}

export interface Pattern {
  readonly kind: PatternKind;
  /** Input path, or null when the output does not read a single input field */
  readonly sourcePath: string | null;
  /** Additional input paths (concatenation, binary calculations) */
  readonly extraSources: readonly string[];
  readonly targetPath: string;
  readonly confidence: number;
  /** Fraction of examples the rule reproduces */
  readonly consistency: number;
  readonly description: string;
  /** Expression over the source value(s), when the rule can be stated as code */
  readonly snippet?: string;
  /** Parameters of the rule (constant value, separator, operator...) */
  readonly params: Readonly<Record<string, ExampleValue>>;
  readonly examples: readonly PatternExample[];
}

export interface PatternInit {
  kind: PatternKind;
  sourcePath: string | null;
  extraSources?: string[];
  targetPath: string;
  confidence: number;
  consistency: number;
  description: string;
  snippet?: string;
  params?: Record<string, ExampleValue>;
  examples?: PatternExample[];
}

const MAX_PATTERN_EXAMPLES = 3;

/**
 * Build an immutable pattern. Confidence and consistency outside [0, 1] throw.
 */
export function createPattern(init: PatternInit): Pattern {
  assertConfidence(init.confidence);
  assertConfidence(init.consistency, "consistency");
  return Object.freeze({
    kind: init.kind,
    sourcePath: init.sourcePath,
    extraSources: Object.freeze([...(init.extraSources ?? [])]),
    targetPath: init.targetPath,
    confidence: init.confidence,
    consistency: init.consistency,
    description: init.description,
    ...(init.snippet ? { snippet: init.snippet } : {}),
    params: Object.freeze({ ...(init.params ?? {}) }),
    examples: Object.freeze((init.examples ?? []).slice(0, MAX_PATTERN_EXAMPLES)),
  });
}

export function confidenceLevel(confidence: number): ConfidenceLevel {
  if (confidence >= 0.9) return "high";
  if (confidence >= 0.7) return "medium";
  return "low";
}

export type WarningKind = "no-pattern" | "complex-only" | "low-confidence" | "few-examples";

/** Non-fatal detection problem, surfaced on ParsedExamples */
export interface PatternDetectionWarning {
  readonly kind: WarningKind;
  readonly field?: string;
  readonly message: string;
}

export interface ParsedExamples {
  readonly inputSchema: Schema;
  readonly outputSchema: Schema;
  /** Output fields patterns were sought for, in schema order */
  readonly targets: readonly string[];
  /** All candidates, grouped by target and sorted by confidence within a target */
  readonly patterns: readonly Pattern[];
  readonly schemaDifferences: readonly SchemaDifference[];
  readonly confidence: number;
  readonly exampleCount: number;
  readonly examples: readonly ExamplePair[];
  readonly warnings: readonly PatternDetectionWarning[];
}

export function patternsFor(parsed: ParsedExamples, target: string): Pattern[] {
  return parsed.patterns.filter((p) => p.targetPath === target);
}

export function bestPattern(parsed: ParsedExamples, target: string): Pattern | undefined {
  return parsed.patterns.find((p) => p.targetPath === target);
}
