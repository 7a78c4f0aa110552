/**
 * Synthesis types
 */

import type { ParsedExamples } from "../patterns/types.js";
import type { ExampleValue } from "../schema/types.js";
import type { Template } from "./template.js";

export type ArtifactPart = "dataModel" | "prompt" | "extractor" | "tests" | "manifest";

export const ARTIFACT_PARTS: readonly ArtifactPart[] = [
  "dataModel",
  "prompt",
  "extractor",
  "tests",
  "manifest",
];

/** One compiled template per artifact part */
export type TemplateBundle = Readonly<Record<ArtifactPart, Template>>;

export interface ContentRules {
  requiredKeywords: readonly string[];
  rejectedKeywords: readonly string[];
}

export interface PromptExample {
  input: ExampleValue;
  output: ExampleValue;
}

export interface FieldRule {
  field: string;
  rule: string;
}

export interface TemplateFlags {
  /** Wrap extraction so malformed completions yield null instead of throwing */
  guardExceptions: boolean;
  /** Validate the completion against the data model before returning */
  strictValidation: boolean;
}

/**
 * Everything the templates need, derived once from the examples and then
 * adjusted by refinements.
 */
export interface ArtifactAnalysis {
  readonly name: string;
  readonly symbolName: string;
  readonly modelName: string;
  readonly domain: string;
  readonly description: string;
  readonly version: string;
  readonly parsed: ParsedExamples;
  /** Minimum confidence for a pattern to become deterministic code */
  readonly threshold: number;
  readonly sectionMarkers: readonly string[];
  readonly contentRules: ContentRules;
  readonly systemPrompt: string;
  readonly parsingRules: readonly string[];
  readonly fieldRules: readonly FieldRule[];
  readonly promptExamples: readonly PromptExample[];
  readonly outputRequirements: readonly string[];
  readonly flags: TemplateFlags;
  readonly appliedRefinements: readonly string[];
  readonly confidence: number;
  readonly exampleCount: number;
}

export interface GeneratedFile {
  readonly fileName: string;
  readonly content: string;
}

export interface GeneratedArtifact {
  readonly name: string;
  readonly symbolName: string;
  readonly version: string;
  readonly domain: string;
  readonly files: Readonly<Record<ArtifactPart, GeneratedFile>>;
  readonly analysis: ArtifactAnalysis;
}
