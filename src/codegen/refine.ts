/**
 * Folding refinements back into an analysis
 *
 * Each refinement becomes template input: a parsing rule, a field rule, a
 * worked example, a system prompt addition or a template flag. The result is
 * a new analysis; the original is left untouched.
 */

import type { Refinement } from "../refinement/types.js";
import type { ArtifactAnalysis, FieldRule, PromptExample } from "./types.js";

export interface ApplyRefinementsOptions {
  /** Version of the regenerated artifact */
  version: string;
}

function push(list: string[], text: string): void {
  if (!list.includes(text)) list.push(text);
}

export function applyRefinements(
  analysis: ArtifactAnalysis,
  refinements: readonly Refinement[],
  options: ApplyRefinementsOptions
): ArtifactAnalysis {
  const parsingRules = [...analysis.parsingRules];
  const fieldRules: FieldRule[] = [...analysis.fieldRules];
  const promptExamples: PromptExample[] = [...analysis.promptExamples];
  const applied = [...analysis.appliedRefinements];
  let systemPrompt = analysis.systemPrompt;
  let guardExceptions = analysis.flags.guardExceptions;

  for (const refinement of refinements) {
    switch (refinement.kind) {
      case "parsing-rule":
      case "validation-rule":
        push(parsingRules, refinement.suggestion);
        break;
      case "extraction-rule":
        if (!fieldRules.some((r) => r.field === refinement.target && r.rule === refinement.suggestion)) {
          fieldRules.push({ field: refinement.target, rule: refinement.suggestion });
        }
        push(parsingRules, `For \`${refinement.target}\`: ${refinement.suggestion}`);
        break;
      case "worked-example":
        if (refinement.example) {
          promptExamples.push({ input: refinement.example.input, output: refinement.example.output });
        }
        break;
      case "prompt-text":
        if (!systemPrompt.includes(refinement.suggestion)) {
          systemPrompt = `${systemPrompt} ${refinement.suggestion}`;
        }
        break;
      case "template-change":
        guardExceptions = true;
        break;
    }
    push(applied, `${refinement.kind}:${refinement.target}`);
  }

  return {
    ...analysis,
    version: options.version,
    systemPrompt,
    parsingRules,
    fieldRules,
    promptExamples,
    flags: { ...analysis.flags, guardExceptions },
    appliedRefinements: applied,
  };
}
