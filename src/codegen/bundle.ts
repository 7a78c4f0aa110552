/**
 * Template bundle loading
 *
 * A bundle is a directory holding one template per artifact part. The
 * default bundle ships in templates/artifact at the package root.
 */

import { access, readFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { SynthesisError, errorMessage } from "../errors.js";
import { Template } from "./template.js";
import { ARTIFACT_PARTS, type ArtifactPart, type TemplateBundle } from "./types.js";

export const TEMPLATE_FILES: Readonly<Record<ArtifactPart, string>> = {
  dataModel: "data-model.ts.tpl",
  prompt: "prompt.md.tpl",
  extractor: "extractor.ts.tpl",
  tests: "extractor.test.ts.tpl",
  manifest: "manifest.json.tpl",
};

const here = dirname(fileURLToPath(import.meta.url));

// src/codegen when run from sources, dist/src/codegen once built
const CANDIDATE_DIRS = [
  resolve(here, "../../templates/artifact"),
  resolve(here, "../../../templates/artifact"),
];

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function defaultTemplateDir(): Promise<string> {
  for (const dir of CANDIDATE_DIRS) {
    if (await exists(join(dir, TEMPLATE_FILES.extractor))) return dir;
  }
  throw new SynthesisError(`Template bundle not found; looked in ${CANDIDATE_DIRS.join(", ")}`);
}

/**
 * Compile every template in `dir` (default bundle when omitted).
 */
export async function loadTemplateBundle(dir?: string): Promise<TemplateBundle> {
  const root = dir ?? (await defaultTemplateDir());
  const entries = await Promise.all(
    ARTIFACT_PARTS.map(async (part): Promise<[ArtifactPart, Template]> => {
      const file = join(root, TEMPLATE_FILES[part]);
      let source: string;
      try {
        source = await readFile(file, "utf-8");
      } catch (error) {
        throw new SynthesisError(`Cannot read template ${file}: ${errorMessage(error)}`, {
          template: TEMPLATE_FILES[part],
          cause: error,
        });
      }
      return [part, new Template(TEMPLATE_FILES[part], source)];
    })
  );
  const bundle = Object.fromEntries(entries);
  return {
    dataModel: bundle.dataModel,
    prompt: bundle.prompt,
    extractor: bundle.extractor,
    tests: bundle.tests,
    manifest: bundle.manifest,
  };
}

/** Bundle from in-memory sources, for callers that ship their own templates */
export function compileTemplateBundle(sources: Readonly<Record<ArtifactPart, string>>): TemplateBundle {
  return {
    dataModel: new Template(TEMPLATE_FILES.dataModel, sources.dataModel),
    prompt: new Template(TEMPLATE_FILES.prompt, sources.prompt),
    extractor: new Template(TEMPLATE_FILES.extractor, sources.extractor),
    tests: new Template(TEMPLATE_FILES.tests, sources.tests),
    manifest: new Template(TEMPLATE_FILES.manifest, sources.manifest),
  };
}
