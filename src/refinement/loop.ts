/**
 * Refinement Loop
 *
 * evaluate -> analyze-failures -> suggest-refinements -> regenerate -> evaluate
 *
 * Each pass loads the registered artifact, scores it against labeled test
 * cases, and when it falls short folds the suggested refinements into the
 * artifact's analysis, re-renders it, hands it to the deploy hook and bumps
 * the registered version. The loop stops on the first of:
 *
 * - target-met: accuracy reached the target
 * - plateau: the last two accuracy deltas were both below minImprovement
 * - max-iterations: the last allowed evaluation has run
 * - cancelled: the signal was aborted (checked after each evaluation)
 *
 * Failing test cases are data. Only infrastructure faults (the artifact cannot
 * be loaded, re-rendered, deployed or re-registered) throw RefinementError.
 */

import { randomUUID } from "node:crypto";
import { RefinementError, errorMessage } from "../errors.js";
import { applyRefinements } from "../codegen/refine.js";
import type { ArtifactSynthesizer } from "../codegen/synthesizer.js";
import type { ArtifactAnalysis, GeneratedArtifact, TemplateBundle } from "../codegen/types.js";
import { validateArtifact } from "../codegen/validator.js";
import type { ArtifactRegistry } from "../registry/registry.js";
import type { CompletionFn, Extractor } from "../registry/types.js";
import { bumpVersion } from "../registry/version.js";
import { evaluateExtractor } from "./evaluator.js";
import { FailureCategorizer, type CategorizerOptions } from "./failure-categorizer.js";
import type { RefinementHistory } from "./history-db.js";
import type { EvaluationResult, FailureAnalysis, Refinement, TestCase } from "./types.js";

export type LoopState = "evaluate" | "analyze-failures" | "suggest-refinements" | "regenerate";

export type LoopStatus = "target-met" | "plateau" | "max-iterations" | "cancelled";

/** Makes a regenerated artifact loadable under its registered symbol path */
export type DeployHook = (artifact: GeneratedArtifact) => Promise<void>;

export interface RefinementLoopOptions {
  registry: ArtifactRegistry;
  synthesizer: ArtifactSynthesizer;
  /** Completion handed to each loaded extractor */
  complete: CompletionFn;
  deploy: DeployHook;
  /** Bundle for re-rendering; defaults to the synthesizer's own */
  bundle?: TemplateBundle;
  categorizer?: CategorizerOptions;
  history?: RefinementHistory;
  targetAccuracy?: number;
  maxIterations?: number;
  minImprovement?: number;
  verbose?: boolean;
  onTransition?: (state: LoopState, iteration: number) => void;
}

export interface RunOptions {
  signal?: AbortSignal;
  runId?: string;
}

export interface IterationRecord {
  iteration: number;
  version: string;
  accuracy: number;
  delta: number | null;
  passed: number;
  failed: number;
  analysis: FailureAnalysis | null;
  refinements: Refinement[];
  /** Where the loop went after this evaluation */
  next: LoopState | LoopStatus;
}

export interface RefinementResult {
  runId: string;
  name: string;
  status: LoopStatus;
  iterations: number;
  initialAccuracy: number;
  finalAccuracy: number;
  bestAccuracy: number;
  /** Registered version after the run */
  version: string;
  /** Analysis the registered artifact was last rendered from */
  analysis: ArtifactAnalysis;
  history: IterationRecord[];
}

export class RefinementLoop {
  private readonly options: RefinementLoopOptions;
  private readonly categorizer: FailureCategorizer;
  private readonly targetAccuracy: number;
  private readonly maxIterations: number;
  private readonly minImprovement: number;

  constructor(options: RefinementLoopOptions) {
    this.options = options;
    this.categorizer = new FailureCategorizer(options.categorizer);
    this.targetAccuracy = options.targetAccuracy ?? 0.9;
    this.maxIterations = options.maxIterations ?? 5;
    this.minImprovement = options.minImprovement ?? 0.01;
    if (!Number.isInteger(this.maxIterations) || this.maxIterations < 1) {
      throw new RangeError(`maxIterations must be a positive integer, got ${this.maxIterations}`);
    }
    if (this.targetAccuracy < 0 || this.targetAccuracy > 1) {
      throw new RangeError(`targetAccuracy must be within [0, 1], got ${this.targetAccuracy}`);
    }
  }

  private log(message: string): void {
    if (this.options.verbose) console.log(`[Refinement] ${message}`);
  }

  /**
   * Refine the registered artifact `name`, starting from the analysis it was
   * rendered from.
   */
  async run(
    name: string,
    analysis: ArtifactAnalysis,
    testCases: readonly TestCase[],
    runOptions: RunOptions = {}
  ): Promise<RefinementResult> {
    const { signal } = runOptions;
    const runId = runOptions.runId ?? randomUUID();
    const history: IterationRecord[] = [];
    const deltas: number[] = [];
    let current = analysis;
    let previous: number | null = null;
    let best = 0;

    this.log(`Refining '${name}' against ${testCases.length} test cases (target ${this.targetAccuracy})`);

    for (let iteration = 1; ; iteration++) {
      this.transition("evaluate", iteration);
      const version = this.currentVersion(name);
      const evaluation = await evaluateExtractor(this.load(name), testCases);
      const { accuracy } = evaluation;
      const delta = previous === null ? null : accuracy - previous;
      if (delta !== null) deltas.push(delta);
      previous = accuracy;
      best = Math.max(best, accuracy);
      this.log(
        `Iteration ${iteration}: v${version} accuracy ${accuracy.toFixed(2)} (${evaluation.passed}/${evaluation.total})`
      );

      const status = this.terminalStatus(accuracy, deltas, iteration, signal);
      if (status) {
        this.record(runId, name, history, {
          iteration,
          version,
          evaluation,
          delta,
          analysis: null,
          refinements: [],
          next: status,
        });
        return this.finish(runId, name, status, current, history, best);
      }

      this.transition("analyze-failures", iteration);
      const failureAnalysis = this.categorizer.analyze(evaluation.failures);

      this.transition("suggest-refinements", iteration);
      const refinements = this.categorizer.suggestRefinements(failureAnalysis);
      if (refinements.length === 0) {
        this.log(`No refinements suggested for '${name}'; stopping`);
        this.record(runId, name, history, {
          iteration,
          version,
          evaluation,
          delta,
          analysis: failureAnalysis,
          refinements,
          next: "plateau",
        });
        return this.finish(runId, name, "plateau", current, history, best);
      }

      this.transition("regenerate", iteration);
      current = await this.regenerate(name, current, refinements);
      this.record(runId, name, history, {
        iteration,
        version,
        evaluation,
        delta,
        analysis: failureAnalysis,
        refinements,
        next: "evaluate",
      });
    }
  }

  private terminalStatus(
    accuracy: number,
    deltas: readonly number[],
    iteration: number,
    signal: AbortSignal | undefined
  ): LoopStatus | null {
    if (accuracy >= this.targetAccuracy) return "target-met";
    if (deltas.length >= 2 && deltas.slice(-2).every((d) => d < this.minImprovement)) return "plateau";
    if (iteration >= this.maxIterations) return "max-iterations";
    if (signal?.aborted) return "cancelled";
    return null;
  }

  private transition(state: LoopState, iteration: number): void {
    this.options.onTransition?.(state, iteration);
  }

  private currentVersion(name: string): string {
    try {
      return this.options.registry.getMetadata(name).version;
    } catch (error) {
      throw new RefinementError(`Cannot refine '${name}': ${errorMessage(error)}`, { cause: error });
    }
  }

  private load(name: string): Extractor {
    try {
      const ExtractorClass = this.options.registry.get(name);
      return new ExtractorClass(this.options.complete);
    } catch (error) {
      throw new RefinementError(`Failed to load '${name}': ${errorMessage(error)}`, { cause: error });
    }
  }

  private async regenerate(
    name: string,
    analysis: ArtifactAnalysis,
    refinements: readonly Refinement[]
  ): Promise<ArtifactAnalysis> {
    const version = bumpVersion(this.currentVersion(name), "minor");
    const next = applyRefinements(analysis, refinements, { version });

    let artifact: GeneratedArtifact;
    try {
      artifact = this.options.synthesizer.synthesize(next, this.options.bundle);
    } catch (error) {
      throw new RefinementError(`Re-synthesis of '${name}' failed: ${errorMessage(error)}`, { cause: error });
    }
    const check = validateArtifact(artifact);
    if (!check.valid) {
      throw new RefinementError(`Regenerated '${name}' is invalid: ${check.errors.join("; ")}`);
    }

    try {
      await this.options.deploy(artifact);
    } catch (error) {
      throw new RefinementError(`Deploy of '${name}' v${version} failed: ${errorMessage(error)}`, { cause: error });
    }
    try {
      await this.options.registry.update(name, { version, confidence: next.confidence });
    } catch (error) {
      throw new RefinementError(`Re-registration of '${name}' v${version} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    this.log(`Regenerated '${name}' as v${version} with ${refinements.length} refinements`);
    return next;
  }

  private record(
    runId: string,
    name: string,
    history: IterationRecord[],
    entry: {
      iteration: number;
      version: string;
      evaluation: EvaluationResult;
      delta: number | null;
      analysis: FailureAnalysis | null;
      refinements: Refinement[];
      next: LoopState | LoopStatus;
    }
  ): void {
    const { evaluation, ...rest } = entry;
    history.push({
      ...rest,
      accuracy: evaluation.accuracy,
      passed: evaluation.passed,
      failed: evaluation.failed,
    });
    this.options.history?.record({
      runId,
      artifact: name,
      iteration: entry.iteration,
      version: entry.version,
      accuracy: evaluation.accuracy,
      delta: entry.delta,
      failures: evaluation.failed,
      refinements: entry.refinements.length,
      state: entry.next,
    });
  }

  private finish(
    runId: string,
    name: string,
    status: LoopStatus,
    analysis: ArtifactAnalysis,
    history: IterationRecord[],
    best: number
  ): RefinementResult {
    const first = history[0];
    const last = history[history.length - 1];
    this.log(`Stopped '${name}' after ${history.length} iterations: ${status}`);
    return {
      runId,
      name,
      status,
      iterations: history.length,
      initialAccuracy: first ? first.accuracy : 0,
      finalAccuracy: last ? last.accuracy : 0,
      bestAccuracy: best,
      version: this.currentVersion(name),
      analysis,
      history,
    };
  }
}
