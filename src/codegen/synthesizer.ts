/**
 * Artifact Synthesizer
 *
 * Two steps. analyze() derives everything an artifact needs from the
 * examples (patterns, data model, prompt rules, section markers) into an
 * ArtifactAnalysis; synthesize() renders that analysis through a template
 * bundle into five files. Refinements edit the analysis and re-render.
 */

import { SynthesisError, ExemplarError, errorMessage } from "../errors.js";
import { PatternDetector, type DetectorOptions } from "../patterns/detector.js";
import { resolveThreshold, type ThresholdPreset } from "../patterns/filter.js";
import { bestPattern, type ExamplePair, type ParsedExamples } from "../patterns/types.js";
import { ANY_ELEMENT, ROOT_PATH, parsePath } from "../schema/paths.js";
import { isRecordValue } from "../schema/values.js";
import { buildTemplateContext, describeRequirement, fileNamesFor, type ContextOptions } from "./context.js";
import { domainProfile } from "./domains.js";
import { toPascalCase } from "./template.js";
import {
  ARTIFACT_PARTS,
  type ArtifactAnalysis,
  type ArtifactPart,
  type FieldRule,
  type GeneratedArtifact,
  type GeneratedFile,
  type TemplateBundle,
} from "./types.js";

export const ARTIFACT_NAME = /^[a-z][a-z0-9_-]*$/;

export interface SynthesisRequest {
  name: string;
  domain?: string;
  description?: string;
  examples: readonly ExamplePair[];
  version?: string;
  /** Minimum confidence for deterministic resolvers */
  threshold?: number | ThresholdPreset;
  /** Reuse an earlier detection instead of running the detector again */
  parsed?: ParsedExamples;
}

export interface SynthesizerOptions extends ContextOptions {
  /** Bundle used when synthesize() is called without one */
  bundle?: TemplateBundle;
  detector?: DetectorOptions;
  threshold?: number | ThresholdPreset;
  verbose?: boolean;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function unique(values: Iterable<string>): string[] {
  return [...new Set([...values].map((v) => v.trim()).filter(Boolean))];
}

export class ArtifactSynthesizer {
  private readonly detector: PatternDetector;
  private readonly options: SynthesizerOptions;

  constructor(options: SynthesizerOptions = {}) {
    this.options = options;
    this.detector = new PatternDetector({ verbose: options.verbose, ...options.detector });
  }

  /**
   * Derive the artifact analysis from examples.
   */
  analyze(request: SynthesisRequest): ArtifactAnalysis {
    const { name, examples } = request;
    if (!ARTIFACT_NAME.test(name)) {
      throw new SynthesisError(
        `Invalid artifact name '${name}': use lowercase letters, digits, '-' and '_', starting with a letter`
      );
    }
    if (examples.length === 0) {
      throw new SynthesisError(`At least one example is required to synthesize '${name}'`);
    }
    if (!examples.every((e) => isRecordValue(e.output))) {
      throw new SynthesisError(`Every example output for '${name}' must be a record`);
    }

    const parsed = request.parsed ?? this.detector.detect(examples);
    if (parsed.outputSchema.fields.has(ROOT_PATH)) {
      throw new SynthesisError(`Every example output for '${name}' must be a record`);
    }
    const threshold = resolveThreshold(request.threshold ?? this.options.threshold ?? "balanced");
    const profile = domainProfile(request.domain ?? "generic");
    const pascal = toPascalCase(name);
    const modelName = `${pascal}Record`;
    const description = request.description?.trim() ?? "";

    const hints = examples.flatMap((e) => (e.hints ? [e.hints] : []));
    const sectionMarkers = unique([
      ...profile.sectionMarkers,
      ...hints.flatMap((h) => h.sectionMarkers ?? []).map(escapeRegExp),
    ]);
    // Tabular outputs name their columns; the section must mention them
    const columns = profile.locatesSection
      ? [...parsed.outputSchema.fields.values()]
          .filter((f) => {
            const [list, element, key, ...rest] = parsePath(f.path);
            return typeof list === "string" && element === ANY_ELEMENT && typeof key === "string" && rest.length === 0;
          })
          .map((f) => toPascalCase(f.name).replace(/([a-z0-9])([A-Z])/g, "$1 $2"))
      : [];
    const requiredKeywords = unique([
      ...profile.requiredKeywords,
      ...hints.flatMap((h) => h.requiredKeywords ?? []),
      ...columns,
    ]);
    const rejectedKeywords = unique([...profile.rejectedKeywords, ...hints.flatMap((h) => h.rejectedKeywords ?? [])]);

    const prompt = [`You are a careful data extraction assistant for ${profile.domain} documents.`];
    if (description) prompt.push(/[.!?]$/.test(description) ? description : `${description}.`);
    prompt.push(...profile.guidance);
    prompt.push(`Respond with a single JSON object matching the ${modelName} schema and nothing else.`);

    const types = [...parsed.outputSchema.fields.values()].map((f) => f.type);
    const parsingRules = [
      "Return exactly one JSON object; do not wrap it in prose.",
      "Use null for a value the input does not contain; never invent one.",
    ];
    if (types.some((t) => t === "integer" || t === "float" || t === "decimal")) {
      parsingRules.push("Write numbers as plain JSON numbers without currency symbols or thousands separators.");
    }
    if (types.includes("date")) parsingRules.push("Write dates as YYYY-MM-DD.");
    parsingRules.push(...hints.flatMap((h) => h.parsingRules ?? []));

    const fieldRules: FieldRule[] = [];
    for (const target of parsed.targets) {
      const pattern = bestPattern(parsed, target);
      if (pattern) fieldRules.push({ field: target, rule: pattern.description });
    }

    const analysis: ArtifactAnalysis = {
      name,
      symbolName: `${pascal}Extractor`,
      modelName,
      domain: profile.domain,
      description,
      version: request.version ?? "1.0.0",
      parsed,
      threshold,
      sectionMarkers,
      contentRules: { requiredKeywords, rejectedKeywords },
      systemPrompt: prompt.join(" "),
      parsingRules: unique(parsingRules),
      fieldRules,
      promptExamples: examples
        .slice(0, this.options.maxPromptExamples ?? 3)
        .map((e) => ({ input: e.input, output: e.output })),
      outputRequirements: parsed.targets.flatMap((target) => {
        const field = parsed.outputSchema.fields.get(target);
        return field ? [describeRequirement(field)] : [];
      }),
      flags: { guardExceptions: false, strictValidation: true },
      appliedRefinements: [],
      confidence: parsed.confidence,
      exampleCount: parsed.exampleCount,
    };

    if (this.options.verbose) {
      console.log(
        `[Synthesizer] Analyzed '${name}': ${parsed.patterns.length} patterns, confidence ${parsed.confidence.toFixed(2)}`
      );
    }
    return analysis;
  }

  /**
   * Render an analysis into the five artifact files.
   */
  synthesize(analysis: ArtifactAnalysis, bundle: TemplateBundle | undefined = this.options.bundle): GeneratedArtifact {
    if (!bundle) {
      throw new SynthesisError(`No template bundle to render '${analysis.name}'; load one with loadTemplateBundle()`);
    }
    const context = buildTemplateContext(analysis, this.options);
    const names = fileNamesFor(analysis.name);
    const files: Partial<Record<ArtifactPart, GeneratedFile>> = {};

    for (const part of ARTIFACT_PARTS) {
      const partContext =
        part === "extractor" || part === "tests"
          ? { ...context, promptText: files.prompt?.content ?? "" }
          : context;
      let content: string;
      try {
        content = bundle[part].render(partContext);
      } catch (error) {
        if (error instanceof ExemplarError) throw error;
        throw new SynthesisError(`Rendering ${part} failed: ${errorMessage(error)}`, {
          template: bundle[part].name,
          cause: error,
        });
      }
      files[part] = { fileName: names[part], content };
    }

    const { dataModel, prompt, extractor, tests, manifest } = files;
    if (!dataModel || !prompt || !extractor || !tests || !manifest) {
      throw new SynthesisError(`Synthesis of '${analysis.name}' produced an incomplete artifact`);
    }

    if (this.options.verbose) {
      console.log(`[Synthesizer] Rendered '${analysis.name}' v${analysis.version}`);
    }
    return {
      name: analysis.name,
      symbolName: analysis.symbolName,
      version: analysis.version,
      domain: analysis.domain,
      files: { dataModel, prompt, extractor, tests, manifest },
      analysis,
    };
  }

  /** analyze() then synthesize() */
  generate(request: SynthesisRequest, bundle?: TemplateBundle): GeneratedArtifact {
    return this.synthesize(this.analyze(request), bundle);
  }
}
