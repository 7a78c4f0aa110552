/**
 * Static checks on a generated artifact before it is written or registered
 */

import type { GeneratedArtifact } from "./types.js";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Constructs a generated module has no business using
 */
const DISALLOWED_PATTERNS: Array<{ pattern: RegExp; name: string }> = [
  { pattern: /\beval\s*\(/, name: "eval()" },
  { pattern: /\bnew\s+Function\s*\(/, name: "new Function()" },
  { pattern: /child_process/, name: "child_process" },
  { pattern: /\brequire\s*\(/, name: "require()" },
  { pattern: /\bprocess\.exit\b/, name: "process.exit" },
];

// A '/' after one of these starts a regex literal rather than a division
const REGEX_PRECEDERS = "(,=:[!&|?{};+-*%<>~^";

/**
 * First unbalanced delimiter in TypeScript source, skipping strings,
 * comments, regex literals and template text.
 */
export function findUnbalanced(source: string): string | null {
  const stack: string[] = [];
  const closers: Record<string, string> = { ")": "(", "]": "[", "}": "{" };
  let i = 0;
  let prev = "";

  // Called just past an opening backtick or the '}' that ends a `${`
  const templateText = (): boolean => {
    while (i < source.length) {
      const c = source[i];
      if (c === "\\") {
        i += 2;
      } else if (c === "`") {
        i++;
        return true;
      } else if (c === "$" && source[i + 1] === "{") {
        stack.push("${");
        i += 2;
        return true;
      } else {
        i++;
      }
    }
    return false;
  };

  while (i < source.length) {
    const ch = source[i];
    const next = source[i + 1];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (ch === "/" && next === "/") {
      const end = source.indexOf("\n", i);
      i = end === -1 ? source.length : end;
      continue;
    }
    if (ch === "/" && next === "*") {
      const end = source.indexOf("*/", i + 2);
      if (end === -1) return "Unterminated comment";
      i = end + 2;
      continue;
    }
    if (ch === '"' || ch === "'") {
      i++;
      while (i < source.length && source[i] !== ch) {
        if (source[i] === "\n") return "Unterminated string";
        i += source[i] === "\\" ? 2 : 1;
      }
      if (i >= source.length) return "Unterminated string";
      i++;
      prev = ch;
      continue;
    }
    if (ch === "`") {
      i++;
      if (!templateText()) return "Unterminated template literal";
      prev = "`";
      continue;
    }
    if (ch === "/" && (prev === "" || REGEX_PRECEDERS.includes(prev))) {
      i++;
      let inClass = false;
      while (i < source.length) {
        const c = source[i];
        if (c === "\n") return "Unterminated regular expression";
        if (c === "\\") {
          i += 2;
          continue;
        }
        if (c === "[") inClass = true;
        else if (c === "]") inClass = false;
        else if (c === "/" && !inClass) break;
        i++;
      }
      i++;
      while (i < source.length && /[a-z]/.test(source[i])) i++;
      prev = "/";
      continue;
    }
    if (ch === "(" || ch === "[" || ch === "{") {
      stack.push(ch);
    } else if (ch === ")" || ch === "]") {
      if (stack.pop() !== closers[ch]) return `Unbalanced '${ch}'`;
    } else if (ch === "}") {
      const open = stack.pop();
      if (open === "${") {
        i++;
        if (!templateText()) return "Unterminated template literal";
        prev = "`";
        continue;
      }
      if (open !== "{") return "Unbalanced '}'";
    }
    prev = ch;
    i++;
  }
  return stack.length > 0 ? `Unclosed '${stack[stack.length - 1]}'` : null;
}

export function validateArtifact(artifact: GeneratedArtifact): ValidationResult {
  const errors: string[] = [];
  const { files, symbolName } = artifact;
  const { modelName } = artifact.analysis;

  for (const part of [files.dataModel, files.extractor, files.tests]) {
    for (const { pattern, name } of DISALLOWED_PATTERNS) {
      if (pattern.test(part.content)) errors.push(`${part.fileName}: ${name} is not allowed`);
    }
  }

  if (!files.extractor.content.includes(`export class ${symbolName} `)) {
    errors.push(`${files.extractor.fileName}: missing class ${symbolName}`);
  }
  if (!/\basync extract\(/.test(files.extractor.content)) {
    errors.push(`${files.extractor.fileName}: missing extract()`);
  }
  if (!files.dataModel.content.includes(`export interface ${modelName} `)) {
    errors.push(`${files.dataModel.fileName}: missing interface ${modelName}`);
  }
  if (!/\bdescribe\(/.test(files.tests.content)) {
    errors.push(`${files.tests.fileName}: no describe() block`);
  }
  for (const part of [files.dataModel, files.extractor, files.tests]) {
    const problem = findUnbalanced(part.content);
    if (problem) errors.push(`${part.fileName}: ${problem}`);
  }
  if (!files.prompt.content.includes("%INPUT%")) {
    errors.push(`${files.prompt.fileName}: missing input placeholder`);
  }

  try {
    const manifest: unknown = JSON.parse(files.manifest.content);
    if (
      typeof manifest !== "object" ||
      manifest === null ||
      !("name" in manifest) ||
      !("version" in manifest) ||
      manifest.name !== artifact.name ||
      manifest.version !== artifact.version
    ) {
      errors.push(`${files.manifest.fileName}: name or version does not match the artifact`);
    }
  } catch (error) {
    errors.push(`${files.manifest.fileName}: ${error instanceof Error ? error.message : String(error)}`);
  }

  return { valid: errors.length === 0, errors };
}
