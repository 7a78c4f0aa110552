/**
 * Confidence-threshold filtering over detected patterns
 */

import { confidenceLevel, type ParsedExamples, type Pattern } from "./types.js";

export const THRESHOLD_PRESETS = {
  conservative: 0.8,
  balanced: 0.7,
  aggressive: 0.6,
} as const;

export type ThresholdPreset = keyof typeof THRESHOLD_PRESETS;

export interface FilteredPatterns {
  threshold: number;
  included: Pattern[];
  excluded: Pattern[];
  /** One line per excluded pattern, plus one per output field left uncovered */
  warnings: string[];
}

export function resolveThreshold(threshold: number | ThresholdPreset): number {
  const value = typeof threshold === "number" ? threshold : THRESHOLD_PRESETS[threshold];
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new RangeError(`Threshold must be within [0, 1], got ${value}`);
  }
  return value;
}

export function filterPatterns(
  parsed: ParsedExamples,
  threshold: number | ThresholdPreset = "balanced"
): FilteredPatterns {
  const limit = resolveThreshold(threshold);
  const included: Pattern[] = [];
  const excluded: Pattern[] = [];
  const warnings: string[] = [];

  for (const pattern of parsed.patterns) {
    if (pattern.confidence >= limit) {
      included.push(pattern);
    } else {
      excluded.push(pattern);
      warnings.push(
        `Excluded ${pattern.kind} for '${pattern.targetPath}' (confidence ${pattern.confidence.toFixed(2)} < ${limit.toFixed(2)})`
      );
    }
  }

  for (const target of parsed.targets) {
    if (!included.some((p) => p.targetPath === target)) {
      warnings.push(`No pattern for '${target}' meets the threshold; it will be extracted from the prompt alone`);
    }
  }

  return { threshold: limit, included, excluded, warnings };
}

/**
 * Multi-line summary: overall confidence and counts per confidence level.
 */
export function formatConfidenceSummary(parsed: ParsedExamples): string {
  const counts = { high: 0, medium: 0, low: 0 };
  for (const pattern of parsed.patterns) counts[confidenceLevel(pattern.confidence)]++;
  return [
    `Overall confidence: ${(parsed.confidence * 100).toFixed(1)}% (${confidenceLevel(parsed.confidence)})`,
    `Patterns: ${parsed.patterns.length} across ${parsed.targets.length} output fields`,
    `  high (>= 0.90): ${counts.high}`,
    `  medium (>= 0.70): ${counts.medium}`,
    `  low: ${counts.low}`,
    `Warnings: ${parsed.warnings.length}`,
  ].join("\n");
}
