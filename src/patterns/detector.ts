/**
 * Pattern Detector
 *
 * Runs every recognizer against every output field and keeps all candidates,
 * sorted by confidence. Nothing is resolved here: callers pick a threshold.
 */

import { assertConfidence } from "../errors.js";
import { diffSchemas, inferSchema } from "../schema/inferencer.js";
import { ROOT_PATH, enumerateLocations, getValueAtPath, isElementPath } from "../schema/paths.js";
import type { ExampleValue, Schema } from "../schema/types.js";
import { isRecordValue, stableKey } from "../schema/values.js";
import {
  RECOGNIZERS,
  candidateExamples,
  recognizeComplex,
  type PatternCandidate,
  type Recognizer,
  type RecognizerContext,
} from "./recognizers.js";
import {
  createPattern,
  type ExamplePair,
  type ParsedExamples,
  type Pattern,
  type PatternDetectionWarning,
} from "./types.js";

export interface DetectorOptions {
  /** Candidates at or above this count as covering a field (default 0.5) */
  baselineConfidence?: number;
  /** Candidates kept per output field; every candidate when unset or null */
  maxCandidatesPerField?: number | null;
  maxSamples?: number;
  renameSimilarity?: number;
  /** Replaces the built-in recognizer list */
  recognizers?: readonly Recognizer[];
  verbose?: boolean;
}

export const COMPLEX_CONFIDENCE = 0.3;
const LOW_CONFIDENCE = 0.7;
const FEW_EXAMPLES = 3;

function round(value: number, places = 4): number {
  const factor = 10 ** places;
  return Math.min(1, Math.max(0, Math.round(value * factor) / factor));
}

export function scoreCandidate(candidate: PatternCandidate): number {
  if (candidate.kind === "complex") return COMPLEX_CONFIDENCE * candidate.consistency;
  return round(candidate.consistency * (0.9 + 0.1 * candidate.specificity));
}

function locationMap(value: ExampleValue): Map<string, ExampleValue> {
  const map = new Map<string, ExampleValue>();
  if (!isRecordValue(value)) map.set(ROOT_PATH, value);
  for (const location of enumerateLocations(value)) {
    map.set(location.path, location.value);
  }
  return map;
}

function candidateKey(candidate: PatternCandidate): string {
  return [candidate.kind, candidate.sourcePath ?? "", ...(candidate.extraSources ?? [])].join("|");
}

/**
 * Output fields patterns are sought for: everything outside arrays except
 * plain containers.
 */
export function targetFields(schema: Schema): string[] {
  return [...schema.fields.values()]
    .filter((f) => !isElementPath(f.path) && f.type !== "map")
    .map((f) => f.path);
}

export class PatternDetector {
  private baseline: number;
  private maxCandidates: number | null;
  private maxSamples: number;
  private renameSimilarity: number;
  private recognizers: readonly Recognizer[];
  private verbose: boolean;

  constructor(options: DetectorOptions = {}) {
    this.baseline = options.baselineConfidence ?? 0.5;
    this.maxCandidates = options.maxCandidatesPerField ?? null;
    this.maxSamples = options.maxSamples ?? 5;
    this.renameSimilarity = options.renameSimilarity ?? 0.5;
    this.recognizers = options.recognizers ?? RECOGNIZERS;
    this.verbose = options.verbose ?? false;
  }

  detect(pairs: readonly ExamplePair[]): ParsedExamples {
    const inputSchema = inferSchema(pairs.map((p) => p.input), { maxSamples: this.maxSamples });
    const outputSchema = inferSchema(pairs.map((p) => p.output), { maxSamples: this.maxSamples });

    if (pairs.length === 0) {
      return Object.freeze({
        inputSchema,
        outputSchema,
        targets: [],
        patterns: [],
        schemaDifferences: [],
        confidence: 0,
        exampleCount: 0,
        examples: [],
        warnings: [],
      });
    }

    const inputs = pairs.map((p) => locationMap(p.input));
    const inputPaths: string[] = [];
    const seen = new Set<string>();
    for (const map of inputs) {
      for (const path of map.keys()) {
        if (!seen.has(path)) {
          seen.add(path);
          inputPaths.push(path);
        }
      }
    }

    const targets = targetFields(outputSchema);
    const patterns: Pattern[] = [];
    const warnings: PatternDetectionWarning[] = [];
    const clarity: number[] = [];
    const consistency: number[] = [];
    let covered = 0;

    for (const target of targets) {
      const targetField = outputSchema.fields.get(target);
      if (!targetField) continue;
      const outputs = pairs.map((p) => getValueAtPath(p.output, target));
      const ctx: RecognizerContext = {
        target,
        targetField,
        pairs,
        outputs,
        inputs,
        present: outputs.flatMap((o, i) => (o === undefined ? [] : [i])),
        inputPaths,
        inputSchema,
        outputSchema,
      };

      const ranked = this.rank(ctx);
      for (const { candidate, confidence } of ranked) {
        patterns.push(
          createPattern({
            kind: candidate.kind,
            sourcePath: candidate.sourcePath,
            extraSources: candidate.extraSources,
            targetPath: target,
            confidence,
            consistency: candidate.consistency,
            description: candidate.description,
            snippet: candidate.snippet,
            params: candidate.params,
            examples: candidateExamples(ctx, candidate),
          })
        );
      }

      const top = ranked[0];
      if (!top) {
        warnings.push({ kind: "no-pattern", field: target, message: `No pattern found for output field '${target}'` });
        clarity.push(0);
        consistency.push(0);
        continue;
      }

      if (top.confidence >= this.baseline) covered++;
      const rival = ranked.find((r) => r.candidate.sourcePath !== top.candidate.sourcePath);
      const rivalConfidence = rival ? rival.confidence : 0;
      clarity.push((top.confidence * (1 + top.confidence - rivalConfidence)) / 2);
      consistency.push(top.candidate.consistency);

      if (top.candidate.kind === "complex") {
        warnings.push({
          kind: "complex-only",
          field: target,
          message: `Only a complex transformation explains '${target}'; extraction will rely on the prompt`,
        });
      } else if (top.confidence < LOW_CONFIDENCE) {
        warnings.push({
          kind: "low-confidence",
          field: target,
          message: `Best pattern for '${target}' has low confidence (${top.confidence.toFixed(2)})`,
        });
      }
    }

    if (pairs.length < FEW_EXAMPLES) {
      warnings.push({
        kind: "few-examples",
        message: `Only ${pairs.length} example(s) provided; at least ${FEW_EXAMPLES} are recommended`,
      });
    }

    const mean = (values: number[]): number =>
      values.length === 0 ? 0 : values.reduce((t, v) => t + v, 0) / values.length;
    const coverage = targets.length === 0 ? 0 : covered / targets.length;
    const confidence = assertConfidence(
      round(0.4 * mean(clarity) + 0.3 * coverage + 0.2 * mean(consistency) + 0.1 * diversity(pairs, inputSchema))
    );

    if (this.verbose) {
      console.log(
        `[Detector] ${pairs.length} examples, ${targets.length} output fields, ${patterns.length} candidates, confidence ${confidence}`
      );
      for (const warning of warnings) console.warn(`[Detector] ${warning.message}`);
    }

    return Object.freeze({
      inputSchema,
      outputSchema,
      targets: Object.freeze([...targets]),
      patterns: Object.freeze(patterns),
      schemaDifferences: Object.freeze(
        diffSchemas(inputSchema, outputSchema, { renameSimilarity: this.renameSimilarity })
      ),
      confidence,
      exampleCount: pairs.length,
      examples: Object.freeze([...pairs]),
      warnings: Object.freeze(warnings),
    });
  }

  private rank(ctx: RecognizerContext): Array<{ candidate: PatternCandidate; confidence: number }> {
    const byKey = new Map<string, { candidate: PatternCandidate; confidence: number; order: number }>();
    this.recognizers.forEach((recognizer, order) => {
      for (const candidate of recognizer.recognize(ctx)) {
        const confidence = scoreCandidate(candidate);
        const key = candidateKey(candidate);
        const existing = byKey.get(key);
        if (!existing || existing.confidence < confidence) {
          byKey.set(key, { candidate, confidence, order });
        }
      }
    });

    const ranked = [...byKey.values()].sort(
      (a, b) => b.confidence - a.confidence || a.order - b.order
    );
    if (!ranked.some((r) => r.confidence >= this.baseline)) {
      const complex = recognizeComplex(ctx);
      if (complex) {
        ranked.push({ candidate: complex, confidence: scoreCandidate(complex), order: this.recognizers.length });
        ranked.sort((a, b) => b.confidence - a.confidence || a.order - b.order);
      }
    }
    return this.maxCandidates === null ? ranked : ranked.slice(0, this.maxCandidates);
  }
}

/**
 * How much the inputs vary across examples: mean over scalar input fields of
 * (distinct values - 1) / (examples - 1).
 */
function diversity(pairs: readonly ExamplePair[], schema: Schema): number {
  if (pairs.length < 2) return 0;
  const ratios: number[] = [];
  for (const field of schema.fields.values()) {
    if (isElementPath(field.path) || field.type === "map" || field.type === "list") continue;
    const distinct = new Set<string>();
    for (const pair of pairs) {
      const value = getValueAtPath(pair.input, field.path);
      distinct.add(value === undefined ? "(absent)" : stableKey(value));
    }
    ratios.push((distinct.size - 1) / (pairs.length - 1));
  }
  if (ratios.length === 0) return 0;
  return ratios.reduce((t, v) => t + v, 0) / ratios.length;
}

export function detectPatterns(pairs: readonly ExamplePair[], options: DetectorOptions = {}): ParsedExamples {
  return new PatternDetector(options).detect(pairs);
}
