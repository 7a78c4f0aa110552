/**
 * Failure Categorizer
 *
 * Turns a batch of FailureRecords into per-category counts, per-field
 * statistics and named failure patterns, then maps those onto prioritized
 * refinements for the synthesizer.
 *
 * A pattern is reported only when it is both common enough (frequency at
 * least minPatternFrequency) and seen often enough (minFieldFailures
 * occurrences).
 */

import { isPlainRecord } from "../schema/values.js";
import {
  FAILURE_CATEGORIES,
  priorityFor,
  priorityRank,
  type FailureAnalysis,
  type FailureCategory,
  type FailurePattern,
  type FailureRecord,
  type FieldStats,
  type Refinement,
} from "./types.js";

export interface CategorizerOptions {
  /** Minimum share of failures for a pattern to be reported (default 0.2) */
  minPatternFrequency?: number;
  /** Minimum number of failures for a pattern to be reported (default 2) */
  minFieldFailures?: number;
  /** Expected numbers above this are treated as formatted amounts (default 1000) */
  largeNumberThreshold?: number;
}

export const NESTED_STRUCTURE_PATTERN = "nested-structure-parsing";
export const NUMERIC_FORMATTING_PATTERN = "numeric-formatting";
export const TYPE_MISMATCH_PATTERN = "type-mismatch";
export const MISSING_FIELD_PREFIX = "missing-field:";

const EXAMPLES_PER_PATTERN = 3;
const FIELDS_PER_PATTERN = 5;

const CATEGORY_FIXES: Partial<Record<FailureCategory, Omit<Refinement, "priority" | "rationale">>> = {
  "parsing-error": {
    kind: "parsing-rule",
    target: "output-format",
    suggestion: "Return only valid JSON, with no markdown code fences or commentary around it.",
    addresses: ["parsing-error"],
  },
  "validation-error": {
    kind: "validation-rule",
    target: "schema-validation",
    suggestion: "Give every field the type the output schema declares; use null rather than an empty string.",
    addresses: ["validation-error"],
  },
  "incorrect-transformation": {
    kind: "prompt-text",
    target: "system-prompt",
    suggestion: "Take each value exactly as the input states it before converting it; never round or rescale numbers.",
    addresses: ["incorrect-transformation"],
  },
  exception: {
    kind: "template-change",
    target: "extraction-logic",
    suggestion: "Return null for a completion that cannot be parsed or validated instead of throwing.",
    addresses: ["exception"],
  },
};

function percent(frequency: number): string {
  return `${(frequency * 100).toFixed(1)}%`;
}

/** Coarse kind used to spot type mismatches */
function kindOf(value: unknown): string {
  if (value === null || value === undefined) return "null";
  if (typeof value === "bigint") return "number";
  if (value instanceof Date) return "date";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function isNested(value: unknown): boolean {
  return Array.isArray(value) || isPlainRecord(value);
}

function fieldValue(actual: unknown, field: string): unknown {
  return isPlainRecord(actual) ? actual[field] : undefined;
}

export class FailureCategorizer {
  private readonly minPatternFrequency: number;
  private readonly minFieldFailures: number;
  private readonly largeNumberThreshold: number;

  constructor(options: CategorizerOptions = {}) {
    this.minPatternFrequency = options.minPatternFrequency ?? 0.2;
    this.minFieldFailures = options.minFieldFailures ?? 2;
    this.largeNumberThreshold = options.largeNumberThreshold ?? 1000;
  }

  analyze(failures: readonly FailureRecord[]): FailureAnalysis {
    const categories: Record<FailureCategory, number> = {
      "parsing-error": 0,
      "validation-error": 0,
      "missing-data": 0,
      "incorrect-transformation": 0,
      exception: 0,
    };
    for (const failure of failures) categories[failure.category] += 1;

    if (failures.length === 0) {
      return { totalFailures: 0, categories, fields: [], patterns: [], confidence: 1 };
    }

    const fields = this.fieldStats(failures);
    const patterns = this.detectPatterns(failures, fields);
    return {
      totalFailures: failures.length,
      categories,
      fields,
      patterns,
      confidence: this.confidence(failures.length, patterns),
    };
  }

  /**
   * Map an analysis onto refinements, most urgent first.
   */
  suggestRefinements(analysis: FailureAnalysis): Refinement[] {
    const total = analysis.totalFailures;
    if (total === 0) return [];

    const refinements: Refinement[] = analysis.patterns.flatMap((p) => this.patternRefinements(p));

    // A field missing often but too few times to form a pattern still gets a rule
    for (const stats of analysis.fields) {
      const frequency = stats.missing / total;
      if (stats.missing === 0 || stats.missing >= this.minFieldFailures) continue;
      if (frequency < this.minPatternFrequency) continue;
      refinements.push({
        kind: "extraction-rule",
        target: stats.field,
        suggestion: missingFieldFix(stats.field),
        priority: priorityFor(frequency),
        rationale: `Field '${stats.field}' missing in ${percent(frequency)} of failures`,
        addresses: ["missing-data"],
      });
    }

    for (const category of FAILURE_CATEGORIES) {
      const fix = CATEGORY_FIXES[category];
      const frequency = analysis.categories[category] / total;
      if (!fix || frequency < this.minPatternFrequency) continue;
      refinements.push({
        ...fix,
        priority: priorityFor(frequency),
        rationale: `${category} accounts for ${percent(frequency)} of failures`,
      });
    }

    return refinements.sort((a, b) => priorityRank(a.priority) - priorityRank(b.priority));
  }

  private fieldStats(failures: readonly FailureRecord[]): FieldStats[] {
    const counts = new Map<string, { missing: number; incorrect: number }>();
    const entry = (field: string) => {
      let stats = counts.get(field);
      if (!stats) {
        stats = { missing: 0, incorrect: 0 };
        counts.set(field, stats);
      }
      return stats;
    };
    for (const failure of failures) {
      for (const field of failure.missingFields) entry(field).missing += 1;
      for (const field of failure.incorrectFields) entry(field).incorrect += 1;
    }
    return [...counts.entries()]
      .map(([field, { missing, incorrect }]) => ({
        field,
        missing,
        incorrect,
        failureRate: (missing + incorrect) / failures.length,
      }))
      .sort((a, b) => b.failureRate - a.failureRate);
  }

  private detectPatterns(failures: readonly FailureRecord[], fields: readonly FieldStats[]): FailurePattern[] {
    const patterns: FailurePattern[] = [];
    const total = failures.length;

    const add = (name: string, matched: readonly FailureRecord[], suggestedFix: string, affected?: string[]) => {
      const frequency = matched.length / total;
      if (matched.length < this.minFieldFailures || frequency < this.minPatternFrequency) return;
      patterns.push({
        name,
        frequency,
        fields: affected ?? affectedFields(matched),
        categories: [...new Set(matched.map((f) => f.category))],
        suggestedFix,
        examples: matched.slice(0, EXAMPLES_PER_PATTERN),
      });
    };

    add(
      NESTED_STRUCTURE_PATTERN,
      failures.filter((f) => {
        const parseFailure =
          f.category === "parsing-error" || /parse|json/i.test(f.error ?? "");
        return parseFailure && Object.values(f.expected).some(isNested);
      }),
      "Return nested objects and lists in exactly the shape the output schema gives them."
    );

    add(
      NUMERIC_FORMATTING_PATTERN,
      failures.filter(
        (f) =>
          (f.category === "missing-data" || f.category === "incorrect-transformation") &&
          Object.values(f.expected).some(
            (v) =>
              (typeof v === "number" || typeof v === "bigint") && Number(v) > this.largeNumberThreshold
          )
      ),
      "Add worked examples converting formatted amounts such as '$95,000' to 95000."
    );

    for (const stats of fields) {
      if (stats.missing === 0) continue;
      add(
        `${MISSING_FIELD_PREFIX}${stats.field}`,
        failures.filter((f) => f.missingFields.includes(stats.field)),
        missingFieldFix(stats.field),
        [stats.field]
      );
    }

    add(
      TYPE_MISMATCH_PATTERN,
      failures.filter(
        (f) =>
          f.category === "incorrect-transformation" &&
          f.incorrectFields.some((field) => kindOf(f.expected[field]) !== kindOf(fieldValue(f.actual, field)))
      ),
      "Return each field with the type the output schema declares, numbers as numbers rather than strings."
    );

    return patterns.sort((a, b) => b.frequency - a.frequency);
  }

  private patternRefinements(pattern: FailurePattern): Refinement[] {
    const priority = priorityFor(pattern.frequency);
    const base = { suggestion: pattern.suggestedFix, priority, addresses: [pattern.name] };

    if (pattern.name === NESTED_STRUCTURE_PATTERN) {
      return [
        {
          ...base,
          kind: "parsing-rule",
          target: "system-prompt",
          rationale: `Affects ${pattern.fields.length} fields in ${percent(pattern.frequency)} of failures`,
        },
      ];
    }
    if (pattern.name === NUMERIC_FORMATTING_PATTERN) {
      const [first] = pattern.examples;
      return [
        {
          ...base,
          kind: "worked-example",
          target: "prompt-examples",
          rationale: `Numeric values fail in ${percent(pattern.frequency)} of failures`,
          ...(first ? { example: { input: first.input, output: first.expected } } : {}),
        },
      ];
    }
    if (pattern.name.startsWith(MISSING_FIELD_PREFIX)) {
      const field = pattern.name.slice(MISSING_FIELD_PREFIX.length);
      return [
        {
          ...base,
          kind: "extraction-rule",
          target: field,
          rationale: `Field '${field}' missing in ${percent(pattern.frequency)} of failures`,
        },
      ];
    }
    if (pattern.name === TYPE_MISMATCH_PATTERN) {
      return [
        {
          ...base,
          kind: "validation-rule",
          target: "output-schema",
          rationale: `Type mismatches occur in ${percent(pattern.frequency)} of failures`,
        },
      ];
    }
    return [];
  }

  /** Sample-size adequacy blended with how clear the patterns are */
  private confidence(failureCount: number, patterns: readonly FailurePattern[]): number {
    const size =
      failureCount < 5 ? 0.5 : failureCount < 10 ? 0.7 : failureCount < 20 ? 0.85 : 0.95;
    const clarity =
      patterns.length > 0 ? patterns.reduce((sum, p) => sum + p.frequency, 0) / patterns.length : 0.5;
    return Math.round((0.6 * size + 0.4 * clarity) * 100) / 100;
  }
}

function missingFieldFix(field: string): string {
  return `Always extract '${field}'; look for it under other labels before returning null.`;
}

/** Fields most often missing or wrong across the given failures */
function affectedFields(failures: readonly FailureRecord[]): string[] {
  const counts = new Map<string, number>();
  for (const failure of failures) {
    for (const field of [...failure.missingFields, ...failure.incorrectFields]) {
      counts.set(field, (counts.get(field) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, FIELDS_PER_PATTERN)
    .map(([field]) => field);
}
