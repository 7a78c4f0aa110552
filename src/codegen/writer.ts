/**
 * Writes a generated artifact into <root>/<name>/, one file per part.
 */

import { join } from "node:path";
import { SynthesisError } from "../errors.js";
import { writeFileAtomic } from "../io/atomic-file.js";
import { ARTIFACT_PARTS, type GeneratedArtifact } from "./types.js";
import { validateArtifact } from "./validator.js";

export interface WrittenArtifact {
  directory: string;
  paths: string[];
}

export async function writeArtifact(artifact: GeneratedArtifact, root: string): Promise<WrittenArtifact> {
  const validation = validateArtifact(artifact);
  if (!validation.valid) {
    throw new SynthesisError(`Artifact '${artifact.name}' failed validation: ${validation.errors.join("; ")}`);
  }
  const directory = join(root, artifact.name);
  const paths: string[] = [];
  for (const part of ARTIFACT_PARTS) {
    const file = artifact.files[part];
    const path = join(directory, file.fileName);
    await writeFileAtomic(path, file.content);
    paths.push(path);
  }
  return { directory, paths };
}
