/**
 * ExemplarEngine - examples in, registered artifacts out
 *
 * Wires the pipeline stages together for callers that do not want to hold
 * each component themselves:
 * - create(): analyze -> synthesize -> validate -> deploy -> register
 * - refine(): evaluate a registered artifact and regenerate it until it
 *   meets the target accuracy
 *
 * Deployment (writing the rendered files and making the extractor loadable
 * under its symbol path) belongs to the caller and is passed in as a hook.
 */

import { loadTemplateBundle } from "../codegen/bundle.js";
import { ArtifactSynthesizer, type SynthesisRequest } from "../codegen/synthesizer.js";
import { toKebabCase } from "../codegen/template.js";
import type { ArtifactAnalysis, GeneratedArtifact, TemplateBundle } from "../codegen/types.js";
import { validateArtifact } from "../codegen/validator.js";
import { DEFAULT_CONFIG, type Config } from "../config.js";
import { RefinementError, errorMessage } from "../errors.js";
import { RefinementHistory } from "../refinement/history-db.js";
import { RefinementLoop, type DeployHook, type RefinementResult } from "../refinement/loop.js";
import type { TestCase } from "../refinement/types.js";
import { ArtifactRegistry } from "../registry/registry.js";
import { SymbolTable } from "../registry/symbol-table.js";
import type { ArtifactMetadata, CompletionFn, ListFilter } from "../registry/types.js";
import type { ExamplePair } from "../patterns/types.js";

export type CreateStage = "analyze" | "synthesize" | "validate" | "deploy" | "register";

export interface CreateRequest extends SynthesisRequest {
  tags?: string[];
}

export interface CreateResult {
  status: "success" | "validation-failed" | "error";
  /** Last stage reached */
  stage: CreateStage;
  name: string;
  analysis?: ArtifactAnalysis;
  artifact?: GeneratedArtifact;
  metadata?: ArtifactMetadata;
  errors: string[];
}

export interface RefineOptions {
  /** Re-derive the analysis when this engine did not create the artifact */
  examples?: readonly ExamplePair[];
  signal?: AbortSignal;
}

export interface ExemplarEngineOptions {
  registry: ArtifactRegistry;
  bundle: TemplateBundle;
  config?: Config;
  deploy?: DeployHook;
  /** Completion handed to extractors during refinement */
  complete?: CompletionFn;
  history?: RefinementHistory;
  verbose?: boolean;
}

export interface OpenEngineOptions {
  config?: Config;
  symbols?: SymbolTable;
  /** Template directory; defaults to the bundled templates */
  templateDir?: string;
  deploy?: DeployHook;
  complete?: CompletionFn;
  verbose?: boolean;
}

const noDeploy: DeployHook = async () => {};

export class ExemplarEngine {
  readonly registry: ArtifactRegistry;
  readonly synthesizer: ArtifactSynthesizer;
  readonly history: RefinementHistory | undefined;
  private readonly options: ExemplarEngineOptions;
  private readonly config: Config;
  private readonly analyses = new Map<string, ArtifactAnalysis>();

  constructor(options: ExemplarEngineOptions) {
    this.options = options;
    this.config = options.config ?? DEFAULT_CONFIG;
    this.registry = options.registry;
    this.history = options.history;
    this.synthesizer = new ArtifactSynthesizer({
      bundle: options.bundle,
      detector: this.config.detection,
      verbose: options.verbose,
    });
  }

  /**
   * Open the registry and refinement history named by the config and load
   * the template bundle.
   */
  static async open(options: OpenEngineOptions = {}): Promise<ExemplarEngine> {
    const config = options.config ?? DEFAULT_CONFIG;
    const registry = await ArtifactRegistry.open({
      path: config.registry.path,
      namespaces: config.registry.namespaces,
      symbols: options.symbols ?? new SymbolTable(),
      verbose: options.verbose,
    });
    const bundle = await loadTemplateBundle(options.templateDir);
    return new ExemplarEngine({
      registry,
      bundle,
      config,
      deploy: options.deploy,
      complete: options.complete,
      history: new RefinementHistory(config.history.path),
      verbose: options.verbose,
    });
  }

  private log(message: string): void {
    if (this.options.verbose) console.log(`[Engine] ${message}`);
  }

  /** Symbol path the extractor of `artifact` is registered under */
  symbolPathFor(name: string, symbolName: string): string {
    const [namespace] = this.registry.namespaces;
    return `${namespace}${toKebabCase(name)}.${symbolName}`;
  }

  analyze(request: SynthesisRequest): ArtifactAnalysis {
    return this.synthesizer.analyze(request);
  }

  /** Render without validating, deploying or registering */
  synthesize(request: SynthesisRequest): GeneratedArtifact {
    return this.synthesizer.generate(request);
  }

  async create(request: CreateRequest): Promise<CreateResult> {
    const { name } = request;
    let stage: CreateStage = "analyze";
    let analysis: ArtifactAnalysis | undefined;
    let artifact: GeneratedArtifact | undefined;

    try {
      analysis = this.synthesizer.analyze(request);
      for (const warning of analysis.parsed.warnings) {
        this.log(`Warning for '${name}': ${warning.message}`);
      }

      stage = "synthesize";
      artifact = this.synthesizer.synthesize(analysis);

      stage = "validate";
      const check = validateArtifact(artifact);
      if (!check.valid) {
        this.log(`'${name}' failed validation: ${check.errors.join("; ")}`);
        return { status: "validation-failed", stage, name, analysis, artifact, errors: check.errors };
      }

      stage = "deploy";
      await (this.options.deploy ?? noDeploy)(artifact);

      stage = "register";
      const metadata = await this.registry.register({
        name,
        symbolPath: this.symbolPathFor(name, artifact.symbolName),
        version: artifact.version,
        description: analysis.description,
        domain: analysis.domain,
        confidence: analysis.confidence,
        exampleCount: analysis.exampleCount,
        tags: request.tags ?? [analysis.domain, "generated"],
      });
      this.analyses.set(name, analysis);
      this.log(`Created '${name}' v${metadata.version} (confidence ${analysis.confidence.toFixed(2)})`);
      return { status: "success", stage, name, analysis, artifact, metadata, errors: [] };
    } catch (error) {
      this.log(`Creating '${name}' failed at ${stage}: ${errorMessage(error)}`);
      return { status: "error", stage, name, analysis, artifact, errors: [errorMessage(error)] };
    }
  }

  /**
   * Run the refinement loop on a registered artifact.
   */
  async refine(name: string, testCases: readonly TestCase[], options: RefineOptions = {}): Promise<RefinementResult> {
    const { complete } = this.options;
    if (!complete) {
      throw new RefinementError(`Cannot refine '${name}' without a completion function`);
    }
    const analysis = this.analysisFor(name, options.examples);
    const loop = new RefinementLoop({
      registry: this.registry,
      synthesizer: this.synthesizer,
      complete,
      deploy: this.options.deploy ?? noDeploy,
      categorizer: {
        minPatternFrequency: this.config.refinement.minPatternFrequency,
        minFieldFailures: this.config.refinement.minFieldFailures,
      },
      history: this.history,
      targetAccuracy: this.config.refinement.targetAccuracy,
      maxIterations: this.config.refinement.maxIterations,
      minImprovement: this.config.refinement.minImprovement,
      verbose: this.options.verbose,
    });
    const result = await loop.run(name, analysis, testCases, { signal: options.signal });
    this.analyses.set(name, result.analysis);
    return result;
  }

  list(filter?: ListFilter): ArtifactMetadata[] {
    return this.registry.list(filter);
  }

  close(): void {
    this.history?.close();
  }

  private analysisFor(name: string, examples: readonly ExamplePair[] | undefined): ArtifactAnalysis {
    const known = this.analyses.get(name);
    if (known) return known;
    if (!examples) {
      throw new RefinementError(`No analysis for '${name}'; pass its examples to refine it`);
    }
    let metadata: ArtifactMetadata;
    try {
      metadata = this.registry.getMetadata(name);
    } catch (error) {
      throw new RefinementError(`Cannot refine '${name}': ${errorMessage(error)}`, { cause: error });
    }
    return this.synthesizer.analyze({
      name,
      examples,
      domain: metadata.domain,
      description: metadata.description,
      version: metadata.version,
    });
  }
}
